/**
 * @fileoverview Global exception filter for structured error logging.
 *
 * Exports:
 * - resolveErrorMessage (L16) - Extracts the client-facing message.
 * - AllExceptionsFilter (L40) - Logs errors with request context.
 */

import { ArgumentsHost, Catch, ExceptionFilter, HttpException } from "@nestjs/common";
import { Request, Response } from "express";

import { REQUEST_ID_HEADER } from "./request-id.middleware";

const INTERNAL_ERROR_MESSAGE = "Internal Server Error";

export const resolveErrorMessage = (exception: unknown): string => {
  if (!(exception instanceof HttpException)) {
    /* Hide internals of unexpected failures from clients. */
    return INTERNAL_ERROR_MESSAGE;
  }

  /* Prefer HttpException response body over generic message. */
  const body: unknown = exception.getResponse();
  if (typeof body === "string") {
    return body;
  }
  if (body && typeof body === "object" && "message" in body) {
    const { message } = body;
    if (typeof message === "string") {
      return message;
    }
    if (Array.isArray(message)) {
      return message.join("; ");
    }
  }
  return exception.message;
};

@Catch()
export class AllExceptionsFilter implements ExceptionFilter {
  public catch(exception: unknown, host: ArgumentsHost): void {
    /* Build structured log entry with request context. */
    const ctx = host.switchToHttp();
    const request = ctx.getRequest<Request>();
    const response = ctx.getResponse<Response>();
    const status = exception instanceof HttpException ? exception.getStatus() : 500;
    const requestId = request.headers[REQUEST_ID_HEADER];

    const errorPayload = {
      level: "error",
      status,
      requestId,
      method: request.method,
      path: request.url,
      error: exception instanceof Error ? exception.message : String(exception)
    };

    console.error(JSON.stringify(errorPayload));

    /* Never throw from the filter itself. */
    if (response.headersSent) {
      return;
    }

    response.status(status).json({ statusCode: status, message: resolveErrorMessage(exception), requestId });
  }
}

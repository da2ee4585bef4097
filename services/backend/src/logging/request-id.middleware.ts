/**
 * @fileoverview Middleware for attaching request ids.
 *
 * Exports:
 * - REQUEST_ID_HEADER (L13) - Header name for request id.
 * - resolveRequestId (L15) - Reuse a caller-supplied id or mint one.
 * - requestIdMiddleware (L21) - Adds x-request-id header.
 */

import { randomUUID } from "node:crypto";
import { Request, Response, NextFunction } from "express";

export const REQUEST_ID_HEADER = "x-request-id";

export const resolveRequestId = (incoming: string | string[] | undefined): string => {
  /* Keep the first non-empty id a proxy or client already assigned. */
  const candidate = Array.isArray(incoming) ? incoming[0] : incoming;
  return candidate && candidate.trim().length > 0 ? candidate.trim() : randomUUID();
};

export const requestIdMiddleware = (
  request: Request,
  response: Response,
  next: NextFunction
): void => {
  const requestId = resolveRequestId(request.headers[REQUEST_ID_HEADER]);
  request.headers[REQUEST_ID_HEADER] = requestId;
  response.setHeader(REQUEST_ID_HEADER, requestId);

  next();
};

/**
 * @fileoverview HTTP controller for custom performance entries.
 *
 * Exports:
 * - EntriesController (L25) - Controller for entry, mark and measure routes.
 */

import { BadRequestException, Body, Controller, Get, HttpCode, Post, Query } from "@nestjs/common";

import { InvalidEntryError } from "./custom-entry";
import { CustomEntryInit, CustomPerformanceEntry } from "./custom-entry.types";
import { UnknownMarkError } from "./entry-timeline";
import { EntriesService } from "./entries.service";
import { MarkRequest, MeasureRequest } from "./entries.types";

const toBadRequest = (error: unknown): unknown => {
  /* Domain validation errors become 400; anything else reaches the global filter. */
  if (error instanceof InvalidEntryError || error instanceof UnknownMarkError) {
    return new BadRequestException(error.message);
  }
  return error;
};

@Controller("api")
export class EntriesController {
  public constructor(private readonly entries: EntriesService) {}

  @Post("entries")
  public queueEntry(@Body() body: CustomEntryInit): CustomPerformanceEntry {
    try {
      return this.entries.queueEntry(body);
    } catch (error) {
      throw toBadRequest(error);
    }
  }

  @Get("entries")
  public listEntries(@Query("name") name?: string): CustomPerformanceEntry[] {
    /* Inspection only; the buffer keeps its contents. */
    return name ? this.entries.entriesByName(name) : this.entries.peek();
  }

  @Post("entries/drain")
  @HttpCode(200)
  public drainEntries(): CustomPerformanceEntry[] {
    return this.entries.drain();
  }

  @Post("marks")
  public mark(@Body() body: MarkRequest): CustomPerformanceEntry {
    if (!body || typeof body.name !== "string") {
      throw new BadRequestException("Mark name is required");
    }

    try {
      return this.entries.mark(body.name, { startTime: body.startTime, detail: body.detail });
    } catch (error) {
      throw toBadRequest(error);
    }
  }

  @Post("measures")
  public measure(@Body() body: MeasureRequest): CustomPerformanceEntry {
    if (!body || typeof body.name !== "string" || typeof body.start !== "string") {
      throw new BadRequestException("Measure name and start mark are required");
    }
    if (body.end !== undefined && typeof body.end !== "string") {
      throw new BadRequestException("Measure end must be a mark name");
    }

    try {
      return this.entries.measure(body.name, { start: body.start, end: body.end, detail: body.detail });
    } catch (error) {
      throw toBadRequest(error);
    }
  }
}

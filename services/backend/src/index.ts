/**
 * @fileoverview Public entry point for in-process use of the entry buffer.
 */

export { CUSTOM_ENTRY_TYPE } from "./entries/custom-entry.types";
export type { Clock, CustomEntryInit, CustomPerformanceEntry } from "./entries/custom-entry.types";
export { InvalidEntryError, createCustomEntry } from "./entries/custom-entry";
export { DEFAULT_ENTRY_BUFFER_CAPACITY, EntryBuffer } from "./entries/entry-buffer";
export { EntryTimeline, UnknownMarkError } from "./entries/entry-timeline";
export type { MarkOptions, MeasureOptions } from "./entries/entry-timeline";

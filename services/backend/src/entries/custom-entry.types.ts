/**
 * @fileoverview Shared types for custom performance entries.
 *
 * Exports:
 * - CUSTOM_ENTRY_TYPE (L11) - Entry type carried by every queued entry.
 * - CustomEntryInit (L14) - Caller submission for queueEntry.
 * - CustomPerformanceEntry (L21) - Accepted, immutable entry.
 * - Clock (L29) - Monotonic time source in milliseconds.
 */

export const CUSTOM_ENTRY_TYPE = "custom" as const;

/** Detail is opaque: the buffer stores it by reference and never reads it. */
export type CustomEntryInit<TDetail = unknown> = {
  name: string;
  startTime: number;
  duration: number;
  detail?: TDetail;
};

export type CustomPerformanceEntry<TDetail = unknown> = Readonly<{
  entryType: typeof CUSTOM_ENTRY_TYPE;
  name: string;
  startTime: number;
  duration: number;
  detail: TDetail | null;
}>;

export type Clock = () => number;

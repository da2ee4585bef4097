/**
 * @fileoverview queueEntry, mark and measure on top of one entry buffer.
 *
 * Exports:
 * - UnknownMarkError (L16) - Raised when measure references a missing mark.
 * - MarkOptions (L23) - Optional start time and detail for a mark.
 * - MeasureOptions (L28) - Start/end mark names and detail for a measure.
 * - EntryTimeline (L37) - Owns a buffer, a mark table and a clock.
 */

import { performance } from "node:perf_hooks";

import { EntryBuffer } from "./entry-buffer";
import { Clock, CustomEntryInit, CustomPerformanceEntry } from "./custom-entry.types";

export class UnknownMarkError extends Error {
  public constructor(public readonly markName: string) {
    super(`Unknown mark: ${markName}`);
    this.name = "UnknownMarkError";
  }
}

export type MarkOptions<TDetail = unknown> = {
  startTime?: number;
  detail?: TDetail;
};

export type MeasureOptions<TDetail = unknown> = {
  start: string;
  /** Mark name; the current clock reading is used when omitted. */
  end?: string;
  detail?: TDetail;
};

const defaultClock: Clock = () => performance.now();

export class EntryTimeline<TDetail = unknown> {
  /* Latest timestamp per mark name, scoped to this timeline. */
  private readonly marks = new Map<string, number>();

  public constructor(
    private readonly buffer: EntryBuffer<TDetail> = new EntryBuffer<TDetail>(),
    private readonly clock: Clock = defaultClock
  ) {}

  public queueEntry(init: CustomEntryInit<TDetail>): CustomPerformanceEntry<TDetail> {
    return this.buffer.enqueue(init);
  }

  public mark(name: string, options: MarkOptions<TDetail> = {}): CustomPerformanceEntry<TDetail> {
    const startTime = options.startTime ?? this.clock();

    /* Queue before recording so a rejected mark leaves the table unchanged. */
    const entry = this.buffer.enqueue({ name, startTime, duration: 0, detail: options.detail });
    this.marks.set(name, startTime);
    return entry;
  }

  public measure(name: string, options: MeasureOptions<TDetail>): CustomPerformanceEntry<TDetail> {
    const start = this.resolveMark(options.start);
    const end = options.end === undefined ? this.clock() : this.resolveMark(options.end);

    return this.buffer.enqueue({
      name,
      startTime: start,
      duration: end - start,
      detail: options.detail
    });
  }

  public clearMarks(name?: string): void {
    if (name === undefined) {
      this.marks.clear();
      return;
    }
    this.marks.delete(name);
  }

  public hasMark(name: string): boolean {
    return this.marks.has(name);
  }

  public drain(): CustomPerformanceEntry<TDetail>[] {
    return this.buffer.drain();
  }

  public peek(): CustomPerformanceEntry<TDetail>[] {
    return this.buffer.peek();
  }

  public size(): number {
    return this.buffer.size();
  }

  public get capacity(): number {
    return this.buffer.capacity;
  }

  private resolveMark(markName: string): number {
    const timestamp = this.marks.get(markName);
    if (timestamp === undefined) {
      throw new UnknownMarkError(markName);
    }
    return timestamp;
  }
}

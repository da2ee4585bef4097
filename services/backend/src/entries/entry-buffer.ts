/**
 * @fileoverview Capacity-bounded FIFO buffer of custom performance entries.
 *
 * Exports:
 * - DEFAULT_ENTRY_BUFFER_CAPACITY (L12) - Entries kept before eviction starts.
 * - EntryBuffer (L14) - Stores the last N entries until drained.
 */

import { createCustomEntry } from "./custom-entry";
import { CustomEntryInit, CustomPerformanceEntry } from "./custom-entry.types";

export const DEFAULT_ENTRY_BUFFER_CAPACITY = 100;

export class EntryBuffer<TDetail = unknown> {
  private items: CustomPerformanceEntry<TDetail>[] = [];

  public constructor(public readonly capacity: number = DEFAULT_ENTRY_BUFFER_CAPACITY) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`Entry buffer capacity must be a positive integer: ${capacity}`);
    }
  }

  public enqueue(init: CustomEntryInit<TDetail>): CustomPerformanceEntry<TDetail> {
    /* Validate first so a rejected entry never evicts an accepted one. */
    const entry = createCustomEntry(init);
    this.items.push(entry);
    if (this.items.length > this.capacity) {
      this.items.shift();
    }
    return entry;
  }

  public drain(): CustomPerformanceEntry<TDetail>[] {
    /* Hand over the current sequence and start a fresh one. */
    const out = this.items;
    this.items = [];
    return out;
  }

  public peek(): CustomPerformanceEntry<TDetail>[] {
    /* Return a shallow copy for safe iteration. */
    return [...this.items];
  }

  public size(): number {
    return this.items.length;
  }
}

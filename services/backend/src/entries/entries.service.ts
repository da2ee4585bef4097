/**
 * @fileoverview Process-wide owner of the custom entry timeline.
 *
 * Exports:
 * - EntriesService (L16) - Queues, inspects and drains custom entries.
 */

import { Inject, Injectable } from "@nestjs/common";

import { AppConfig, ConfigToken } from "../config/config.types";
import { CustomEntryInit, CustomPerformanceEntry } from "./custom-entry.types";
import { EntryBuffer } from "./entry-buffer";
import { EntryTimeline, MarkOptions, MeasureOptions } from "./entry-timeline";

@Injectable()
export class EntriesService {
  private readonly timeline: EntryTimeline;

  public constructor(@Inject(ConfigToken) config: AppConfig) {
    /* Initialize buffer with configured capacity. */
    this.timeline = new EntryTimeline(new EntryBuffer(config.entryBufferCapacity));
  }

  public queueEntry(init: CustomEntryInit): CustomPerformanceEntry {
    return this.track(() => this.timeline.queueEntry(init));
  }

  public mark(name: string, options?: MarkOptions): CustomPerformanceEntry {
    return this.track(() => this.timeline.mark(name, options));
  }

  public measure(name: string, options: MeasureOptions): CustomPerformanceEntry {
    return this.track(() => this.timeline.measure(name, options));
  }

  public peek(): CustomPerformanceEntry[] {
    return this.timeline.peek();
  }

  public entriesByName(name: string): CustomPerformanceEntry[] {
    return this.timeline.peek().filter((entry) => entry.name === name);
  }

  public drain(): CustomPerformanceEntry[] {
    const entries = this.timeline.drain();
    if (entries.length > 0) {
      console.log(`[entries] drained count=${entries.length}`);
    }
    return entries;
  }

  private track(queue: () => CustomPerformanceEntry): CustomPerformanceEntry {
    /* A full buffer stays full after enqueue, so one entry was evicted. */
    const wasFull = this.timeline.size() === this.timeline.capacity;
    const entry = queue();
    if (wasFull) {
      console.log(`[entries] evicted oldest entry capacity=${this.timeline.capacity}`);
    }
    return entry;
  }
}

/**
 * @fileoverview Tests for EntryBuffer ordering, eviction and draining.
 */

import { EntryBuffer } from "../entry-buffer";
import { InvalidEntryError } from "../custom-entry";

const entry = (name: string, startTime = 0) => ({ name, startTime, duration: 1 });

describe("EntryBuffer", () => {
  test("drains entries in arrival order while under capacity", () => {
    const buffer = new EntryBuffer(3);
    buffer.enqueue(entry("a", 1));
    buffer.enqueue(entry("b", 2));

    expect(buffer.drain().map((item) => item.name)).toEqual(["a", "b"]);
  });

  test("evicts the oldest entry once capacity is exceeded", () => {
    /* A, B, C into a buffer of two keeps the last two. */
    const buffer = new EntryBuffer(2);
    buffer.enqueue(entry("A"));
    buffer.enqueue(entry("B"));
    buffer.enqueue(entry("C"));

    expect(buffer.size()).toBe(2);
    expect(buffer.drain().map((item) => item.name)).toEqual(["B", "C"]);
  });

  test("keeps the last capacity entries for long sequences", () => {
    const buffer = new EntryBuffer(5);
    for (let index = 0; index < 12; index += 1) {
      buffer.enqueue(entry(`e${index}`, index));
    }

    expect(buffer.drain().map((item) => item.startTime)).toEqual([7, 8, 9, 10, 11]);
  });

  test("peek leaves contents intact and drain clears them", () => {
    const buffer = new EntryBuffer(2);
    buffer.enqueue(entry("A"));

    expect(buffer.peek().map((item) => item.name)).toEqual(["A"]);
    expect(buffer.size()).toBe(1);
    expect(buffer.drain().map((item) => item.name)).toEqual(["A"]);
    expect(buffer.drain()).toEqual([]);
  });

  test("peek returns a copy the caller cannot use to mutate the buffer", () => {
    const buffer = new EntryBuffer(2);
    buffer.enqueue(entry("A"));

    const snapshot = buffer.peek();
    snapshot.pop();

    expect(buffer.size()).toBe(1);
  });

  test("accepts negative durations unchanged", () => {
    const buffer = new EntryBuffer(2);
    const accepted = buffer.enqueue({ name: "rewind", startTime: 10, duration: -5 });

    expect(accepted).toEqual({
      entryType: "custom",
      name: "rewind",
      startTime: 10,
      duration: -5,
      detail: null
    });
  });

  test("rejected entries do not evict accepted ones", () => {
    const buffer = new EntryBuffer(1);
    buffer.enqueue(entry("kept"));

    expect(() => buffer.enqueue({ name: "bad", startTime: Number.NaN, duration: 0 })).toThrow(
      InvalidEntryError
    );
    expect(buffer.peek().map((item) => item.name)).toEqual(["kept"]);
  });

  test("defaults to a capacity of 100", () => {
    const buffer = new EntryBuffer();
    for (let index = 0; index < 101; index += 1) {
      buffer.enqueue(entry(`e${index}`, index));
    }

    const drained = buffer.drain();
    expect(buffer.capacity).toBe(100);
    expect(drained).toHaveLength(100);
    expect(drained[0]?.name).toBe("e1");
  });

  test.each([0, -1, 1.5, Number.NaN])("rejects capacity %p", (capacity) => {
    expect(() => new EntryBuffer(capacity)).toThrow(RangeError);
  });
});

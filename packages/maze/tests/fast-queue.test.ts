import { describe, expect, it } from "vitest";
import {
  coordFromKey,
  coordKey,
  CoordSet,
  FastQueue,
} from "../src/core/data-structures";

describe("FastQueue", () => {
  it("dequeues in insertion order", () => {
    const queue = FastQueue.from([1, 2, 3]);
    queue.enqueue(4);

    expect(queue.length).toBe(4);
    expect(queue.dequeue()).toBe(1);
    expect(queue.dequeue()).toBe(2);
    expect(queue.dequeue()).toBe(3);
    expect(queue.dequeue()).toBe(4);
    expect(queue.isEmpty).toBe(true);
    expect(queue.dequeue()).toBeUndefined();
  });

  it("stays correct after compacting its buffer", () => {
    const queue = new FastQueue<number>();
    for (let i = 0; i < 5000; i++) queue.enqueue(i);
    for (let i = 0; i < 4000; i++) queue.dequeue();

    expect(queue.length).toBe(1000);
    expect(queue.dequeue()).toBe(4000);
  });
});

describe("coordinate keys", () => {
  it("maps coordinates to row-major indices and back", () => {
    expect(coordKey(5, 10, 100)).toBe(1005);
    expect(coordFromKey(1005, 100)).toEqual({ x: 5, y: 10 });
  });
});

describe("CoordSet", () => {
  it("tracks membership and size", () => {
    const set = new CoordSet(40, 40);
    set.add(10, 20);
    set.add(10, 20);
    set.add(39, 39);

    expect(set.has(10, 20)).toBe(true);
    expect(set.has(20, 10)).toBe(false);
    expect(set.has(39, 39)).toBe(true);
    expect(set.size).toBe(2);

    set.clear();
    expect(set.size).toBe(0);
    expect(set.has(10, 20)).toBe(false);
  });
});

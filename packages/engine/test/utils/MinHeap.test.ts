import { describe, it, expect } from "vitest";
import { MinHeap } from "../../src/utils/MinHeap";

describe("MinHeap", () => {
  it("pops items in priority order", () => {
    const heap = new MinHeap<string>();
    heap.push("c", 3, 0);
    heap.push("a", 1, 1);
    heap.push("d", 4, 2);
    heap.push("b", 2, 3);

    expect(heap.size).toBe(4);
    expect(heap.peekPriority()).toBe(1);
    expect([heap.pop(), heap.pop(), heap.pop(), heap.pop()]).toEqual(["a", "b", "c", "d"]);
    expect(heap.size).toBe(0);
  });

  it("breaks priority ties by tie-break key", () => {
    const heap = new MinHeap<string>();
    heap.push("second", 5, 2);
    heap.push("third", 5, 3);
    heap.push("first", 5, 1);

    expect([heap.pop(), heap.pop(), heap.pop()]).toEqual(["first", "second", "third"]);
  });

  it("returns null when empty", () => {
    const heap = new MinHeap<number>();
    expect(heap.pop()).toBeNull();
    expect(heap.peekPriority()).toBeNull();
  });

  it("clear empties the heap", () => {
    const heap = new MinHeap<number>();
    heap.push(1, 1, 0);
    heap.push(2, 2, 1);
    heap.clear();
    expect(heap.size).toBe(0);
    expect(heap.pop()).toBeNull();
  });

  it("stays ordered across interleaved pushes and pops", () => {
    const heap = new MinHeap<number>();
    const priorities = [9, 4, 7, 1, 8, 2, 6, 3, 5, 0];
    priorities.forEach((p, i) => heap.push(p, p, i));

    const out: number[] = [];
    out.push(heap.pop() ?? -1, heap.pop() ?? -1);
    heap.push(-1, -1, 10);
    let next = heap.pop();
    while (next !== null) {
      out.push(next);
      next = heap.pop();
    }

    expect(out).toEqual([0, 1, -1, 2, 3, 4, 5, 6, 7, 8, 9]);
  });
});

// ---------------------------------------------------------------------------
// Binary min-heap with stable ordering
// ---------------------------------------------------------------------------
// Lower priority numbers come out first. Entries with equal priority come out
// in the order of their tie-break key (arrival order for the reorder buffer).
// ---------------------------------------------------------------------------

interface HeapEntry<T> {
  item: T;
  priority: number;
  tieBreak: number;
}

function lessThan<T>(a: HeapEntry<T>, b: HeapEntry<T>): boolean {
  if (a.priority !== b.priority) return a.priority < b.priority;
  return a.tieBreak < b.tieBreak;
}

export class MinHeap<T> {
  private entries: Array<HeapEntry<T>> = [];

  get size(): number {
    return this.entries.length;
  }

  push(item: T, priority: number, tieBreak: number): void {
    this.entries.push({ item, priority, tieBreak });
    this.siftUp(this.entries.length - 1);
  }

  /**
   * Priority of the smallest entry, or null when empty.
   */
  peekPriority(): number | null {
    const top = this.entries[0];
    return top === undefined ? null : top.priority;
  }

  /**
   * Remove and return the smallest item, or null when empty.
   */
  pop(): T | null {
    const top = this.entries[0];
    if (top === undefined) return null;

    const last = this.entries.pop();
    if (last !== undefined && this.entries.length > 0) {
      this.entries[0] = last;
      this.siftDown(0);
    }
    return top.item;
  }

  clear(): void {
    this.entries = [];
  }

  private siftUp(idx: number): void {
    const entries = this.entries;
    while (idx > 0) {
      const parentIdx = (idx - 1) >> 1;
      if (!lessThan(entries[idx], entries[parentIdx])) break;
      const tmp = entries[parentIdx];
      entries[parentIdx] = entries[idx];
      entries[idx] = tmp;
      idx = parentIdx;
    }
  }

  private siftDown(idx: number): void {
    const entries = this.entries;
    const len = entries.length;
    while (true) {
      let smallest = idx;
      const left = 2 * idx + 1;
      const right = 2 * idx + 2;

      if (left < len && lessThan(entries[left], entries[smallest])) {
        smallest = left;
      }
      if (right < len && lessThan(entries[right], entries[smallest])) {
        smallest = right;
      }
      if (smallest === idx) break;

      const tmp = entries[idx];
      entries[idx] = entries[smallest];
      entries[smallest] = tmp;
      idx = smallest;
    }
  }
}

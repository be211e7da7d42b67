/**
 * Generic binary min-heap.
 *
 * O(log n) push/pop; ordering, including tie-breaks, is entirely up to the
 * comparator. Used as the A* frontier.
 */

export type MinHeapCompare<T> = (a: T, b: T) => number;

export class MinHeap<T> {
  private readonly items: T[] = [];

  constructor(private readonly compare: MinHeapCompare<T>) {}

  get size(): number {
    return this.items.length;
  }

  get isEmpty(): boolean {
    return this.items.length === 0;
  }

  peek(): T | undefined {
    return this.items[0];
  }

  push(value: T): void {
    this.items.push(value);
    this.siftUp(this.items.length - 1);
  }

  pop(): T | undefined {
    const best = this.items[0];
    const tail = this.items.pop();
    if (best === undefined || tail === undefined) return undefined;

    if (this.items.length > 0) {
      this.items[0] = tail;
      this.siftDown(0);
    }
    return best;
  }

  clear(): void {
    this.items.length = 0;
  }

  private siftUp(startIndex: number): void {
    const value = this.items[startIndex];
    if (value === undefined) return;

    let index = startIndex;
    while (index > 0) {
      const parent = (index - 1) >> 1;
      const parentValue = this.items[parent];
      if (parentValue === undefined || this.compare(parentValue, value) <= 0) {
        break;
      }
      this.items[index] = parentValue;
      index = parent;
    }
    this.items[index] = value;
  }

  private siftDown(startIndex: number): void {
    const value = this.items[startIndex];
    if (value === undefined) return;

    let index = startIndex;
    const length = this.items.length;
    while (true) {
      const left = index * 2 + 1;
      const leftValue = this.items[left];
      if (left >= length || leftValue === undefined) break;

      let bestChild = left;
      let bestValue = leftValue;
      const rightValue = this.items[left + 1];
      if (rightValue !== undefined && this.compare(rightValue, bestValue) < 0) {
        bestChild = left + 1;
        bestValue = rightValue;
      }

      if (this.compare(value, bestValue) <= 0) break;

      this.items[index] = bestValue;
      index = bestChild;
    }
    this.items[index] = value;
  }
}

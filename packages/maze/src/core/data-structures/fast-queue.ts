/**
 * FIFO queue with O(1) amortized enqueue and dequeue.
 *
 * Array-backed with a moving head; the consumed prefix is dropped once it
 * outgrows the live part so long BFS runs do not hold every visited node.
 *
 * @example
 * ```typescript
 * const queue = new FastQueue<number>();
 * queue.enqueue(1);
 * queue.enqueue(2);
 * queue.dequeue();  // 1
 * ```
 */
export class FastQueue<T> {
  private items: T[] = [];
  private head = 0;

  get length(): number {
    return this.items.length - this.head;
  }

  get isEmpty(): boolean {
    return this.length === 0;
  }

  enqueue(item: T): void {
    this.items.push(item);
  }

  dequeue(): T | undefined {
    if (this.isEmpty) return undefined;

    const item = this.items[this.head];
    this.head++;

    if (this.head > 1000 && this.head > this.items.length / 2) {
      this.items = this.items.slice(this.head);
      this.head = 0;
    }

    return item;
  }

  static from<T>(items: Iterable<T>): FastQueue<T> {
    const queue = new FastQueue<T>();
    for (const item of items) {
      queue.enqueue(item);
    }
    return queue;
  }
}

/**
 * Row-major grid index of `(x, y)`.
 *
 * @example
 * ```typescript
 * coordKey(5, 10, 100);  // 1005
 * ```
 */
export function coordKey(x: number, y: number, width: number): number {
  return y * width + x;
}

/**
 * Inverse of {@link coordKey}.
 */
export function coordFromKey(
  key: number,
  width: number,
): { x: number; y: number } {
  return {
    x: key % width,
    y: Math.floor(key / width),
  };
}

/**
 * Bit set over the cells of one grid; about one bit per cell.
 *
 * @example
 * ```typescript
 * const visited = new CoordSet(100, 100);
 * visited.add(10, 20);
 * visited.has(10, 20);  // true
 * ```
 */
export class CoordSet {
  private readonly bits: Uint32Array;
  private count = 0;

  constructor(
    private readonly width: number,
    height: number,
  ) {
    this.bits = new Uint32Array(Math.ceil((width * height) / 32));
  }

  /** Number of coordinates in the set */
  get size(): number {
    return this.count;
  }

  has(x: number, y: number): boolean {
    const key = y * this.width + x;
    const word = this.bits[key >>> 5];
    return word !== undefined && (word & (1 << (key & 31))) !== 0;
  }

  add(x: number, y: number): void {
    const key = y * this.width + x;
    const index = key >>> 5;
    const bit = 1 << (key & 31);
    const word = this.bits[index];
    if (word === undefined || (word & bit) !== 0) return;
    this.bits[index] = word | bit;
    this.count++;
  }

  clear(): void {
    this.bits.fill(0);
    this.count = 0;
  }
}

/**
 * Union-Find (Disjoint Set Union) with path compression and union by rank.
 *
 * The maze validator feeds it every passage: a union that finds both ends
 * already joined is a cycle, and more than one root left at the end means
 * the maze is disconnected.
 *
 * @example
 * ```typescript
 * const uf = new UnionFind(4);
 * uf.union(0, 1);      // true
 * uf.union(1, 0);      // false, already joined
 * uf.connected(0, 2);  // false
 * uf.componentCount;   // 3
 * ```
 */
export class UnionFind {
  private readonly parent: Int32Array;
  private readonly rank: Uint8Array;
  private components: number;

  constructor(size: number) {
    this.parent = new Int32Array(size);
    this.rank = new Uint8Array(size);
    for (let i = 0; i < size; i++) {
      this.parent[i] = i;
    }
    this.components = size;
  }

  /** Number of disjoint sets */
  get componentCount(): number {
    return this.components;
  }

  /**
   * Root of the set containing `x`. Iterative, so long chains cannot
   * exhaust the call stack.
   */
  find(x: number): number {
    let root = x;
    let next = this.parent[root];
    while (next !== undefined && next !== root) {
      root = next;
      next = this.parent[root];
    }

    let node = x;
    while (node !== root) {
      const up = this.parent[node];
      if (up === undefined) break;
      this.parent[node] = root;
      node = up;
    }
    return root;
  }

  /**
   * Merge the sets containing `x` and `y`.
   * @returns false when they were already in the same set
   */
  union(x: number, y: number): boolean {
    const rootX = this.find(x);
    const rootY = this.find(y);
    if (rootX === rootY) return false;

    const rankX = this.rank[rootX] ?? 0;
    const rankY = this.rank[rootY] ?? 0;
    if (rankX < rankY) {
      this.parent[rootX] = rootY;
    } else if (rankX > rankY) {
      this.parent[rootY] = rootX;
    } else {
      this.parent[rootY] = rootX;
      this.rank[rootX] = rankX + 1;
    }
    this.components--;
    return true;
  }

  connected(x: number, y: number): boolean {
    return this.find(x) === this.find(y);
  }
}

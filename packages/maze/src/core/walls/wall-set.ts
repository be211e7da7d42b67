import type { WallPair } from "@labyrinth/contracts";
import { forEachInteriorEdge } from "../grid/edges";
import type { Cell } from "../geometry/types";
import { createWall, type Wall, wallFromKey, wallKey } from "./wall";

/**
 * Read-only view of a wall set.
 *
 * Search and validation only ever need this interface; the generator hands
 * its output out under this type so that callers cannot mutate it.
 *
 * @example
 * ```typescript
 * function countWallsAround(walls: ReadonlyWallSet, c: Cell): number {
 *   return [...walls].filter((w) => cellsEqual(w.a, c) || cellsEqual(w.b, c)).length;
 * }
 * ```
 */
export interface ReadonlyWallSet extends Iterable<Wall> {
  readonly size: number;

  /**
   * Whether a wall separates two cells.
   * @throws {MazeError} CELLS_NOT_ADJACENT for cells that are not one step apart
   */
  has(p: Cell, q: Cell): boolean;
  hasWall(wall: Wall): boolean;
  /** Lookup by numeric wall key, without any validation. */
  hasKey(key: number): boolean;

  /** Walls as `[[ax, ay], [bx, by]]` pairs in canonical order */
  toPairs(): WallPair[];
}

/**
 * Mutable set of canonical walls, keyed by {@link wallKey}.
 * Iteration is always in canonical (key) order.
 */
export class WallSet implements ReadonlyWallSet {
  private readonly keys = new Set<number>();

  /**
   * A wall between every pair of grid-adjacent cells:
   * `2 * width * height - width - height` walls.
   */
  static fullyWalled(width: number, height: number): WallSet {
    const set = new WallSet();
    forEachInteriorEdge(width, height, (key) => {
      set.keys.add(key);
    });
    return set;
  }

  /**
   * Build a set from cell pairs in any order, e.g. a hand-made test maze.
   * @throws {MazeError} when a pair is not a valid wall
   */
  static from(pairs: Iterable<readonly [Cell, Cell]>): WallSet {
    const set = new WallSet();
    for (const [p, q] of pairs) {
      set.add(p, q);
    }
    return set;
  }

  /**
   * Build a set from serialized `[[x, y], [x, y]]` pairs.
   * @throws {MazeError} when a pair is not a valid wall
   */
  static fromPairs(pairs: Iterable<WallPair>): WallSet {
    const set = new WallSet();
    for (const [[ax, ay], [bx, by]] of pairs) {
      set.add({ x: ax, y: ay }, { x: bx, y: by });
    }
    return set;
  }

  get size(): number {
    return this.keys.size;
  }

  add(p: Cell, q: Cell): this {
    this.keys.add(wallKey(createWall(p, q)));
    return this;
  }

  delete(p: Cell, q: Cell): boolean {
    return this.keys.delete(wallKey(createWall(p, q)));
  }

  has(p: Cell, q: Cell): boolean {
    return this.keys.has(wallKey(createWall(p, q)));
  }

  hasWall(wall: Wall): boolean {
    return this.keys.has(wallKey(wall));
  }

  hasKey(key: number): boolean {
    return this.keys.has(key);
  }

  clone(): WallSet {
    const copy = new WallSet();
    for (const key of this.keys) copy.keys.add(key);
    return copy;
  }

  *[Symbol.iterator](): IterableIterator<Wall> {
    const sorted = Array.from(this.keys).sort((x, y) => x - y);
    for (const key of sorted) {
      yield wallFromKey(key);
    }
  }

  toPairs(): WallPair[] {
    return Array.from(this, ({ a, b }): WallPair => [
      [a.x, a.y],
      [b.x, b.y],
    ]);
  }
}

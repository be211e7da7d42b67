/**
 * A* shortest-path search over a maze's passage graph.
 *
 * Unit edge costs with the Manhattan heuristic, which is consistent on a
 * 4-connected grid: the first time a cell is popped its distance is final,
 * and the returned path is a shortest one.
 *
 * Frontier ties (equal f) are broken by row-major cell order, so a given
 * maze and pair of endpoints always yields the same path and the same
 * exploration order.
 */

import { coordFromKey, CoordSet } from "../core/data-structures/fast-queue";
import { MinHeap } from "../core/data-structures/min-heap";
import {
  assertCellInBounds,
  assertDimensions,
  cellKey,
  cellsEqual,
  compareCells,
  formatCell,
  manhattanDistance,
} from "../core/geometry/cell";
import type { Cell } from "../core/geometry/types";
import { passageNeighbors } from "../core/grid/edges";
import type { ReadonlyWallSet } from "../core/walls/wall-set";
import { NO_OP_TRACE } from "../trace/collector";
import type { TraceCollector } from "../trace/types";
import type { SearchOptions, SearchResult } from "./types";

const SCOPE = "search.astar";

export interface FrontierEntry {
  /** g + h at push time */
  readonly f: number;
  readonly cell: Cell;
}

/**
 * Frontier order: lowest `f` first, equal `f` in row-major cell order.
 */
export function compareFrontier(a: FrontierEntry, b: FrontierEntry): number {
  return a.f !== b.f ? a.f - b.f : compareCells(a.cell, b.cell);
}

/**
 * Reusable search over one maze. Holds only the grid size and the wall set;
 * every {@link findPath} call starts from scratch and returns all its data.
 *
 * @example
 * ```typescript
 * const search = new AStarSearch(10, 10, walls);
 * const result = search.findPath({ x: 0, y: 0 }, { x: 9, y: 9 });
 * if (result.found) {
 *   console.log(`${result.path.length - 1} steps, ${result.exploredOrder.length} cells explored`);
 * }
 * ```
 */
export class AStarSearch {
  private readonly trace: TraceCollector;

  /**
   * @throws {MazeError} INVALID_DIMENSIONS
   */
  constructor(
    readonly width: number,
    readonly height: number,
    private readonly walls: ReadonlyWallSet,
    options: SearchOptions = {},
  ) {
    assertDimensions(width, height);
    this.trace = options.trace ?? NO_OP_TRACE;
  }

  /**
   * @throws {MazeError} INVALID_CELL when start or end lies outside the grid
   */
  findPath(start: Cell, end: Cell): SearchResult {
    assertCellInBounds(this, start);
    assertCellInBounds(this, end);

    const startTime = performance.now();
    this.trace.start(SCOPE);
    const result = this.search(start, end);

    if (result.found) {
      this.trace.decision(
        SCOPE,
        `Shortest route ${formatCell(start)} -> ${formatCell(end)}?`,
        [],
        result.path.length - 1,
        `end finalized after ${result.exploredOrder.length} cells`,
      );
    } else {
      this.trace.warning(
        SCOPE,
        `${formatCell(end)} is unreachable from ${formatCell(start)} (${result.exploredOrder.length} cells explored)`,
      );
    }
    this.trace.end(SCOPE, performance.now() - startTime);

    return result;
  }

  private search(start: Cell, end: Cell): SearchResult {
    const { width, height, walls } = this;
    const cellCount = width * height;

    // -1: no distance recorded yet / no parent
    const gScore = new Int32Array(cellCount).fill(-1);
    const parent = new Int32Array(cellCount).fill(-1);
    const finalized = new CoordSet(width, height);
    const exploredOrder: Cell[] = [];
    const frontier = new MinHeap<FrontierEntry>(compareFrontier);

    gScore[start.y * width + start.x] = 0;
    frontier.push({ f: manhattanDistance(start, end), cell: start });

    while (!frontier.isEmpty) {
      const entry = frontier.pop();
      if (entry === undefined) break;

      const current = entry.cell;
      if (finalized.has(current.x, current.y)) continue;
      finalized.add(current.x, current.y);
      exploredOrder.push(current);

      const currentIndex = current.y * width + current.x;
      if (cellsEqual(current, end)) {
        return {
          found: true,
          path: reconstructPath(parent, currentIndex, width),
          exploredOrder,
        };
      }

      const tentative = (gScore[currentIndex] ?? 0) + 1;
      for (const neighbor of passageNeighbors(width, height, walls, current)) {
        if (finalized.has(neighbor.x, neighbor.y)) continue;

        const neighborIndex = neighbor.y * width + neighbor.x;
        const known = gScore[neighborIndex] ?? -1;
        if (known !== -1 && tentative >= known) continue;

        gScore[neighborIndex] = tentative;
        parent[neighborIndex] = currentIndex;
        frontier.push({
          f: tentative + manhattanDistance(neighbor, end),
          cell: neighbor,
        });
      }
    }

    return { found: false, path: null, exploredOrder };
  }
}

function reconstructPath(
  parent: Int32Array,
  endIndex: number,
  width: number,
): Cell[] {
  const path: Cell[] = [];
  let index = endIndex;
  while (index !== -1) {
    path.push(coordFromKey(index, width));
    index = parent[index] ?? -1;
  }
  return path.reverse();
}

/**
 * Explored cells as a set of `cellKey`s, for renderers that only need
 * membership.
 */
export function exploredKeys(result: SearchResult): ReadonlySet<string> {
  return new Set(result.exploredOrder.map(cellKey));
}

/**
 * Number of steps on the path, or null when no path was found.
 */
export function pathLength(result: SearchResult): number | null {
  return result.found ? result.path.length - 1 : null;
}

/**
 * Randomized depth-first maze carver.
 *
 * Starts from a fully walled grid and walks from (0, 0), knocking down the
 * wall to a random unvisited neighbour and descending into it, backtracking
 * when a cell has none left. Every cell is entered exactly once, through
 * exactly one removed wall, so the passages form a spanning tree: a perfect
 * maze with one simple path between any two cells.
 *
 * The walk uses an explicit stack of frames rather than recursion, so grid
 * size is not limited by the call stack.
 */

import { SeededRandom } from "@labyrinth/contracts";
import { CoordSet } from "../../core/data-structures/fast-queue";
import {
  assertAdjacent,
  assertCellInBounds,
  assertDimensions,
  isInBounds,
} from "../../core/geometry/cell";
import { CARVE_DIRECTIONS, type Cell, type Offset } from "../../core/geometry/types";
import { type ReadonlyWallSet, WallSet } from "../../core/walls/wall-set";
import { NO_OP_TRACE } from "../../trace/collector";
import type { TraceCollector, TraceOptions } from "../../trace/types";
import { resolveSeed } from "../../seed";

const SCOPE = "generator.dfs";

export type MazeGeneratorOptions = TraceOptions;

/**
 * One level of the carving walk: a cell, its shuffled directions and the
 * next direction to try.
 */
interface CarveFrame {
  readonly cell: Cell;
  readonly directions: readonly Offset[];
  next: number;
}

export class MazeGenerator {
  readonly width: number;
  readonly height: number;
  /** Effective seed: the caller's, or one drawn at construction */
  readonly seed: number;

  private readonly seeded: boolean;
  private readonly trace: TraceCollector;
  private generated: WallSet | undefined;

  /**
   * @param seed - uint32 seed; omit for a fresh random maze
   * @throws {MazeError} INVALID_DIMENSIONS or INVALID_SEED
   */
  constructor(
    width: number,
    height: number,
    seed?: number,
    options: MazeGeneratorOptions = {},
  ) {
    assertDimensions(width, height);
    this.width = width;
    this.height = height;
    this.seeded = seed !== undefined;
    this.seed = resolveSeed(seed);
    this.trace = options.trace ?? NO_OP_TRACE;
  }

  /**
   * Carve a new maze. Each call restarts the random stream from `seed`, so
   * repeated calls return equal wall sets.
   */
  generate(): ReadonlyWallSet {
    const startTime = performance.now();
    this.trace.start(SCOPE);
    this.trace.decision(
      SCOPE,
      "Which seed drives the carve?",
      [],
      this.seed,
      this.seeded ? "seed supplied by caller" : "seed drawn from system randomness",
    );

    const walls = WallSet.fullyWalled(this.width, this.height);
    const removed = this.carve(walls, new SeededRandom(this.seed));

    this.trace.decision(
      SCOPE,
      "How many walls were removed?",
      [],
      removed,
      `spanning tree over ${this.width * this.height} cells leaves ${walls.size} walls`,
    );
    this.trace.end(SCOPE, performance.now() - startTime);

    this.generated = walls;
    return walls;
  }

  /**
   * Walls of the last generated maze, generating it on first access.
   */
  get walls(): ReadonlyWallSet {
    return this.generated ?? this.generate();
  }

  /**
   * @throws {MazeError} CELLS_NOT_ADJACENT when the cells are not one step apart
   * @throws {MazeError} INVALID_CELL when either cell lies outside the grid
   */
  isWallBetween(p: Cell, q: Cell): boolean {
    assertAdjacent(p, q);
    assertCellInBounds(this, p);
    assertCellInBounds(this, q);
    return this.walls.has(p, q);
  }

  private carve(walls: WallSet, rng: SeededRandom): number {
    const visited = new CoordSet(this.width, this.height);
    const enter = (cell: Cell): CarveFrame => {
      visited.add(cell.x, cell.y);
      return { cell, directions: rng.shuffle(CARVE_DIRECTIONS), next: 0 };
    };

    const stack: CarveFrame[] = [enter({ x: 0, y: 0 })];
    let removed = 0;

    while (stack.length > 0) {
      const frame = stack[stack.length - 1];
      if (frame === undefined) break;

      const direction = frame.directions[frame.next];
      if (direction === undefined) {
        stack.pop();
        continue;
      }
      frame.next++;

      const nx = frame.cell.x + direction.x;
      const ny = frame.cell.y + direction.y;
      if (!isInBounds(nx, ny, this.width, this.height) || visited.has(nx, ny)) {
        continue;
      }

      const neighbor: Cell = { x: nx, y: ny };
      walls.delete(frame.cell, neighbor);
      removed++;
      stack.push(enter(neighbor));
    }

    return removed;
  }
}

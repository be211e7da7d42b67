/**
 * Maze API
 *
 * High-level entry points: generate a maze, search it, or do both from a
 * config. Everything here is synchronous and keeps no state between calls.
 */

import {
  buildMazeConfig,
  type BuildConfigInput,
  Err,
  type MazeConfig,
  MazeError,
  Ok,
  type Result,
  WallPairsSchema,
} from "@labyrinth/contracts";
import { assertDimensions, containsCell, defaultEndpoints, formatCell } from "./core/geometry/cell";
import type { Cell } from "./core/geometry/types";
import { calculateWallSetChecksum } from "./core/hash/checksum";
import { type ReadonlyWallSet, WallSet } from "./core/walls/wall-set";
import { MazeGenerator } from "./generators/dfs/generator";
import { AStarSearch } from "./search/astar";
import type { SearchResult } from "./search/types";
import type { TraceOptions } from "./trace/types";

/**
 * Generate a perfect maze.
 *
 * @param seed - uint32 seed; omit for a random maze
 * @throws {MazeError} INVALID_DIMENSIONS or INVALID_SEED
 *
 * @example
 * ```typescript
 * const walls = generate(10, 10, 42);
 * walls.size;  // 81: 180 interior edges minus 99 passages
 * ```
 */
export function generate(
  width: number,
  height: number,
  seed?: number,
  options?: TraceOptions,
): ReadonlyWallSet {
  return new MazeGenerator(width, height, seed, options).generate();
}

/**
 * Shortest path between two cells of a maze, with the order in which the
 * search explored cells.
 *
 * @throws {MazeError} INVALID_DIMENSIONS or INVALID_CELL
 */
export function findPath(
  width: number,
  height: number,
  walls: ReadonlyWallSet,
  start: Cell,
  end: Cell,
  options?: TraceOptions,
): SearchResult {
  return new AStarSearch(width, height, walls, options).findPath(start, end);
}

/**
 * Everything produced by {@link solveMaze}.
 */
export interface MazeSolution {
  /** Validated config with the effective seed filled in */
  readonly config: Required<MazeConfig>;
  readonly start: Cell;
  readonly end: Cell;
  readonly walls: ReadonlyWallSet;
  readonly search: SearchResult;
  readonly checksum: string;
}

/**
 * Build a config (defaults 10x10, random seed), generate the maze and solve
 * it from the top-left to the bottom-right corner.
 *
 * @example
 * ```typescript
 * const solution = solveMaze({ width: 20, height: 15, seed: 7 });
 * if (solution.isOk() && solution.value.search.found) {
 *   console.log(solution.value.search.path.length);
 * }
 * ```
 */
export function solveMaze(
  input: BuildConfigInput = {},
  options?: TraceOptions,
): Result<MazeSolution, MazeError> {
  return buildMazeConfig(input).map((config): MazeSolution => {
    const generator = new MazeGenerator(
      config.width,
      config.height,
      config.seed,
      options,
    );
    const walls = generator.generate();
    const { start, end } = defaultEndpoints(config.width, config.height);
    const search = new AStarSearch(
      config.width,
      config.height,
      walls,
      options,
    ).findPath(start, end);

    return {
      config: { width: config.width, height: config.height, seed: generator.seed },
      start,
      end,
      walls,
      search,
      checksum: calculateWallSetChecksum(config.width, config.height, walls),
    };
  });
}

/**
 * Rebuild a wall set from its serialized `[[ax, ay], [bx, by]][]` form, as
 * produced by `walls.toPairs()`.
 *
 * @throws {MazeError} INVALID_DIMENSIONS for unsupported sizes
 */
export function parseWallPairs(
  width: number,
  height: number,
  input: unknown,
): Result<WallSet, MazeError> {
  assertDimensions(width, height);

  const parsed = WallPairsSchema.safeParse(input);
  if (!parsed.success) {
    return Err(MazeError.fromZodError("INVALID_WALL_SET", parsed.error));
  }

  const dimensions = { width, height };
  for (const [[ax, ay], [bx, by]] of parsed.data) {
    const a = { x: ax, y: ay };
    const b = { x: bx, y: by };
    if (!containsCell(dimensions, a) || !containsCell(dimensions, b)) {
      return Err(
        new MazeError(
          "INVALID_WALL_SET",
          `Wall ${formatCell(a)}-${formatCell(b)} lies outside the ${width}x${height} grid`,
          { wall: [[ax, ay], [bx, by]], width, height },
        ),
      );
    }
  }

  return Ok(WallSet.fromPairs(parsed.data));
}

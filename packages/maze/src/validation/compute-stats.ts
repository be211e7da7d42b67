import { assertDimensions, defaultEndpoints } from "../core/geometry/cell";
import type { Cell } from "../core/geometry/types";
import { calculateMazeDistances, shortestDistance } from "../core/graph/bfs-distance";
import { passageNeighbors } from "../core/grid/edges";
import type { ReadonlyWallSet } from "../core/walls/wall-set";

/**
 * Shape statistics of a maze
 */
export interface MazeStats {
  readonly cellCount: number;
  readonly wallCount: number;
  /** Pairs of adjacent cells not separated by a wall */
  readonly passageCount: number;
  /** Cells with exactly one passage */
  readonly deadEnds: number;
  /** Cells with three or more passages */
  readonly junctions: number;
  /** Steps on the shortest start-to-end route, null when unreachable */
  readonly solutionLength: number | null;
  /** Eccentricity of the start cell within its region */
  readonly maxDistanceFromStart: number;
}

/**
 * Compute statistics for a maze. Endpoints default to the top-left and
 * bottom-right corners.
 *
 * @throws {MazeError} INVALID_DIMENSIONS for unsupported sizes
 */
export function computeMazeStats(
  width: number,
  height: number,
  walls: ReadonlyWallSet,
  start?: Cell,
  end?: Cell,
): MazeStats {
  assertDimensions(width, height);
  const defaults = defaultEndpoints(width, height);
  const from = start ?? defaults.start;
  const to = end ?? defaults.end;

  let degreeSum = 0;
  let deadEnds = 0;
  let junctions = 0;
  for (let y = 0; y < height; y++) {
    for (let x = 0; x < width; x++) {
      const degree = passageNeighbors(width, height, walls, { x, y }).length;
      degreeSum += degree;
      if (degree === 1) deadEnds++;
      else if (degree >= 3) junctions++;
    }
  }

  return {
    cellCount: width * height,
    wallCount: walls.size,
    passageCount: degreeSum / 2,
    deadEnds,
    junctions,
    solutionLength: shortestDistance(width, height, walls, from, to),
    maxDistanceFromStart: calculateMazeDistances(width, height, walls, from)
      .maxDistance,
  };
}

/**
 * BFS Distance Calculation
 *
 * Unweighted shortest distances from one source, used for maze statistics
 * and as the brute-force reference the A* search is checked against.
 */

import { FastQueue } from "../data-structures/fast-queue";
import { containsCell } from "../geometry/cell";
import type { Cell } from "../geometry/types";
import { passageNeighbors } from "../grid/edges";
import type { ReadonlyWallSet } from "../walls/wall-set";

/**
 * Result of BFS distance calculation.
 */
export interface BFSDistanceResult<TNodeId> {
  /** Map from node ID to distance from source */
  readonly distances: Map<TNodeId, number>;
  /** Maximum distance from source */
  readonly maxDistance: number;
}

/**
 * Calculate distances from a source node using BFS.
 *
 * @param getNeighbors - Returns the nodes reachable in one step
 */
export function calculateBFSDistances<TNodeId>(
  sourceId: TNodeId,
  getNeighbors: (nodeId: TNodeId) => readonly TNodeId[],
): BFSDistanceResult<TNodeId> {
  const distances = new Map<TNodeId, number>([[sourceId, 0]]);
  const queue = FastQueue.from([sourceId]);
  let maxDistance = 0;

  while (!queue.isEmpty) {
    const current = queue.dequeue();
    if (current === undefined) break;
    const nextDistance = (distances.get(current) ?? 0) + 1;

    for (const neighbor of getNeighbors(current)) {
      if (distances.has(neighbor)) continue;
      distances.set(neighbor, nextDistance);
      if (nextDistance > maxDistance) {
        maxDistance = nextDistance;
      }
      queue.enqueue(neighbor);
    }
  }

  return { distances, maxDistance };
}

/**
 * Distances over a maze's passage graph, keyed by row-major cell index
 * (`y * width + x`).
 */
export function calculateMazeDistances(
  width: number,
  height: number,
  walls: ReadonlyWallSet,
  source: Cell,
): BFSDistanceResult<number> {
  return calculateBFSDistances(source.y * width + source.x, (index) =>
    passageNeighbors(width, height, walls, {
      x: index % width,
      y: Math.floor(index / width),
    }).map((n) => n.y * width + n.x),
  );
}

/**
 * Length in steps of the shortest passage route between two cells, or
 * null when `end` cannot be reached. Either cell outside the grid is
 * unreachable by definition.
 */
export function shortestDistance(
  width: number,
  height: number,
  walls: ReadonlyWallSet,
  start: Cell,
  end: Cell,
): number | null {
  const dimensions = { width, height };
  if (!containsCell(dimensions, start) || !containsCell(dimensions, end)) {
    return null;
  }
  const { distances } = calculateMazeDistances(width, height, walls, start);
  return distances.get(end.y * width + end.x) ?? null;
}

import { UnionFind } from "../core/algorithms/union-find";
import { assertDimensions, containsCell } from "../core/geometry/cell";
import { forEachInteriorEdge } from "../core/grid/edges";
import { formatWall } from "../core/walls/wall";
import type { ReadonlyWallSet } from "../core/walls/wall-set";
import {
  hasErrorViolations,
  type MazeValidationResult,
  type Violation,
} from "./result-types";

function checkWallBounds(
  width: number,
  height: number,
  walls: ReadonlyWallSet,
): Violation[] {
  const violations: Violation[] = [];
  const dimensions = { width, height };
  for (const wall of walls) {
    // `b` is the greater cell, so it is the one that can fall off the grid
    if (!containsCell(dimensions, wall.b)) {
      violations.push({
        type: "maze.wall.bounds",
        message: `Wall ${formatWall(wall)} lies outside the ${width}x${height} grid`,
        severity: "error",
      });
    }
  }
  return violations;
}

/**
 * Check that a wall set describes a perfect maze.
 *
 * Checks:
 * - Every wall lies between two cells of the grid
 * - The passages contain no cycle
 * - The passages connect every cell
 *
 * Together the last two mean the passages form a spanning tree, which is
 * what the generator guarantees.
 *
 * @throws {MazeError} INVALID_DIMENSIONS for unsupported sizes
 */
export function validateMaze(
  width: number,
  height: number,
  walls: ReadonlyWallSet,
): MazeValidationResult {
  assertDimensions(width, height);

  const violations = checkWallBounds(width, height, walls);
  const components = new UnionFind(width * height);
  let passageCount = 0;
  let cycleEdges = 0;

  forEachInteriorEdge(width, height, (key, a, b) => {
    if (walls.hasKey(key)) return;
    passageCount++;
    if (!components.union(a.y * width + a.x, b.y * width + b.x)) {
      cycleEdges++;
    }
  });

  if (cycleEdges > 0) {
    violations.push({
      type: "maze.cycle",
      message: `Passages contain ${cycleEdges} redundant edge(s) forming cycles`,
      severity: "error",
    });
  }

  if (components.componentCount > 1) {
    violations.push({
      type: "maze.connectivity",
      message: `Passages split the grid into ${components.componentCount} disconnected regions`,
      severity: "error",
    });
  }

  if (hasErrorViolations(violations)) {
    return { success: false, violations, passageCount };
  }
  return { success: true, violations, passageCount };
}

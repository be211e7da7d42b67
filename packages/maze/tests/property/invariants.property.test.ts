/**
 * Property-Based Invariant Tests
 *
 * Mazes and endpoints are drawn from a fixed-seed SeededRandom, so every run
 * checks the same cases.
 */

import { describe, expect, it } from "vitest";
import { SeededRandom } from "@labyrinth/contracts";
import { areAdjacent, cellKey } from "../../src/core/geometry";
import type { Cell } from "../../src/core/geometry/types";
import { shortestDistance } from "../../src/core/graph";
import { interiorEdgeCount } from "../../src/core/grid";
import { type ReadonlyWallSet, WallSet } from "../../src/core/walls";
import { MazeGenerator } from "../../src/generators";
import { AStarSearch } from "../../src/search";
import { validateMaze } from "../../src/validation";

const CASE_COUNT = 60;

interface MazeCase {
  readonly width: number;
  readonly height: number;
  readonly seed: number;
  readonly start: Cell;
  readonly end: Cell;
}

function drawCases(count: number, maxSide: number, rng: SeededRandom): MazeCase[] {
  const cases: MazeCase[] = [];
  for (let i = 0; i < count; i++) {
    const width = rng.range(1, maxSide);
    const height = rng.range(1, maxSide);
    cases.push({
      width,
      height,
      seed: rng.range(0, 0xffffffff),
      start: { x: rng.range(0, width - 1), y: rng.range(0, height - 1) },
      end: { x: rng.range(0, width - 1), y: rng.range(0, height - 1) },
    });
  }
  return cases;
}

/**
 * Remove random walls so the passage graph gains loops and several shortest
 * routes, which is where a search can go wrong.
 */
function openLoops(walls: WallSet, rng: SeededRandom): WallSet {
  const braided = walls.clone();
  for (const wall of walls) {
    if (rng.next() < 0.3) braided.delete(wall.a, wall.b);
  }
  return braided;
}

/**
 * Close random passages so some endpoints become unreachable.
 */
function closePassages(width: number, height: number, rng: SeededRandom): WallSet {
  const walls = new WallSet();
  for (const wall of WallSet.fullyWalled(width, height)) {
    if (rng.next() < 0.45) walls.add(wall.a, wall.b);
  }
  return walls;
}

function expectValidPath(
  path: readonly Cell[],
  walls: ReadonlyWallSet,
  start: Cell,
  end: Cell,
): void {
  expect(path[0]).toEqual(start);
  expect(path[path.length - 1]).toEqual(end);
  for (let i = 1; i < path.length; i++) {
    const previous = path[i - 1];
    const current = path[i];
    if (previous === undefined || current === undefined) throw new Error("gap in path");
    expect(areAdjacent(previous, current)).toBe(true);
    expect(walls.has(previous, current)).toBe(false);
  }
}

describe("generated mazes", () => {
  const rng = new SeededRandom(20240601);
  const cases = drawCases(CASE_COUNT, 30, rng);

  it("are spanning trees", () => {
    for (const { width, height, seed } of cases) {
      const walls = new MazeGenerator(width, height, seed).generate();
      expect(walls.size).toBe(interiorEdgeCount(width, height) - (width * height - 1));
      expect(validateMaze(width, height, walls).success).toBe(true);
    }
  });

  it("are solvable between any two cells along valid, optimal paths", () => {
    for (const { width, height, seed, start, end } of cases) {
      const walls = new MazeGenerator(width, height, seed).generate();
      const result = new AStarSearch(width, height, walls).findPath(start, end);

      if (!result.found) throw new Error(`seed ${seed}: no path in a perfect maze`);
      expectValidPath(result.path, walls, start, end);
      expect(result.path.length - 1).toBe(
        shortestDistance(width, height, walls, start, end),
      );
    }
  });

  it("explore each cell at most once and end on the goal", () => {
    for (const { width, height, seed, start, end } of cases) {
      const walls = new MazeGenerator(width, height, seed).generate();
      const result = new AStarSearch(width, height, walls).findPath(start, end);
      const explored = result.exploredOrder.map(cellKey);

      expect(new Set(explored).size).toBe(explored.length);
      expect(result.exploredOrder[result.exploredOrder.length - 1]).toEqual(end);
      for (const c of result.path ?? []) {
        expect(explored).toContain(cellKey(c));
      }
    }
  });
});

describe("search on mazes with loops", () => {
  const rng = new SeededRandom(777);
  const cases = drawCases(CASE_COUNT, 20, rng);

  it("returns shortest paths", () => {
    for (const { width, height, seed, start, end } of cases) {
      const generated = new MazeGenerator(width, height, seed).generate();
      const walls = openLoops(WallSet.fromPairs(generated.toPairs()), rng);
      const result = new AStarSearch(width, height, walls).findPath(start, end);

      if (!result.found) throw new Error(`seed ${seed}: loops cannot disconnect a maze`);
      expectValidPath(result.path, walls, start, end);
      expect(result.path.length - 1).toBe(
        shortestDistance(width, height, walls, start, end),
      );
    }
  });
});

describe("search on partially walled grids", () => {
  const rng = new SeededRandom(4242);
  const cases = drawCases(CASE_COUNT, 12, rng);

  it("agrees with BFS on reachability and distance", () => {
    for (const { width, height, start, end } of cases) {
      const walls = closePassages(width, height, rng);
      const result = new AStarSearch(width, height, walls).findPath(start, end);
      const expected = shortestDistance(width, height, walls, start, end);

      if (expected === null) {
        expect(result.found).toBe(false);
        expect(result.path).toBeNull();
        continue;
      }
      if (!result.found) throw new Error("search missed a reachable cell");
      expectValidPath(result.path, walls, start, end);
      expect(result.path.length - 1).toBe(expected);
    }
  });

  it("explores exactly the start's region when the goal is unreachable", () => {
    for (const { width, height, start, end } of cases) {
      const walls = closePassages(width, height, rng);
      const result = new AStarSearch(width, height, walls).findPath(start, end);
      if (result.found) continue;

      let reachable = 0;
      for (let y = 0; y < height; y++) {
        for (let x = 0; x < width; x++) {
          if (shortestDistance(width, height, walls, start, { x, y }) !== null) reachable++;
        }
      }
      expect(result.exploredOrder).toHaveLength(reachable);
    }
  });
});

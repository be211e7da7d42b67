import { describe, expect, it } from "vitest";
import { MazeError } from "@labyrinth/contracts";
import { interiorEdgeCount } from "../src/core/grid";
import { calculateWallSetChecksum } from "../src/core/hash";
import { MazeGenerator } from "../src/generators";
import { DefaultTraceCollector } from "../src/trace";
import { validateMaze } from "../src/validation";

function errorCode(fn: () => unknown): string | undefined {
  try {
    fn();
  } catch (error) {
    return MazeError.isMazeError(error) ? error.code : undefined;
  }
  return undefined;
}

describe("MazeGenerator", () => {
  it("carves a spanning tree", () => {
    for (const [width, height, seed] of [
      [10, 10, 1],
      [7, 3, 99],
      [1, 12, 5],
      [25, 25, 123456],
    ] as const) {
      const walls = new MazeGenerator(width, height, seed).generate();
      const removed = interiorEdgeCount(width, height) - walls.size;

      expect(removed).toBe(width * height - 1);
      expect(validateMaze(width, height, walls).success).toBe(true);
    }
  });

  it("produces an empty wall set for a single cell", () => {
    const walls = new MazeGenerator(1, 1, 0).generate();
    expect(walls.size).toBe(0);
  });

  it("leaves no walls in a one-wide corridor", () => {
    expect(new MazeGenerator(1, 6, 42).generate().size).toBe(0);
    expect(new MazeGenerator(6, 1, 42).generate().size).toBe(0);
  });

  it("reproduces the same maze from the same seed", () => {
    const first = new MazeGenerator(12, 9, 2024).generate();
    const second = new MazeGenerator(12, 9, 2024).generate();
    expect(second.toPairs()).toEqual(first.toPairs());
  });

  it("returns equal wall sets from repeated generate calls", () => {
    const generator = new MazeGenerator(8, 8, 7);
    const first = generator.generate().toPairs();
    const second = generator.generate().toPairs();
    expect(second).toEqual(first);
  });

  it("varies with the seed", () => {
    const a = new MazeGenerator(10, 10, 1).generate();
    const b = new MazeGenerator(10, 10, 2).generate();
    expect(calculateWallSetChecksum(10, 10, a)).not.toBe(
      calculateWallSetChecksum(10, 10, b),
    );
  });

  it("draws and exposes a seed when none is given", () => {
    const generator = new MazeGenerator(6, 6);
    expect(Number.isInteger(generator.seed)).toBe(true);
    expect(generator.seed).toBeGreaterThanOrEqual(0);
    expect(generator.seed).toBeLessThanOrEqual(0xffffffff);

    const replay = new MazeGenerator(6, 6, generator.seed);
    expect(replay.generate().toPairs()).toEqual(generator.generate().toPairs());
  });

  it("generates lazily through the walls getter", () => {
    const generator = new MazeGenerator(5, 5, 11);
    const walls = generator.walls;

    expect(generator.walls).toBe(walls);
    expect(walls.toPairs()).toEqual(new MazeGenerator(5, 5, 11).generate().toPairs());
  });

  it("answers wall queries consistently with its wall set", () => {
    const generator = new MazeGenerator(4, 4, 31);
    const walls = generator.generate();

    for (let y = 0; y < 4; y++) {
      for (let x = 0; x < 3; x++) {
        const p = { x, y };
        const q = { x: x + 1, y };
        expect(generator.isWallBetween(p, q)).toBe(walls.has(p, q));
        expect(generator.isWallBetween(q, p)).toBe(walls.has(p, q));
      }
    }
  });

  it("rejects wall queries between non-adjacent cells", () => {
    const generator = new MazeGenerator(3, 3, 1);
    expect(errorCode(() => generator.isWallBetween({ x: 0, y: 0 }, { x: 1, y: 1 }))).toBe(
      "CELLS_NOT_ADJACENT",
    );
    expect(errorCode(() => generator.isWallBetween({ x: 0, y: 0 }, { x: 0, y: 0 }))).toBe(
      "CELLS_NOT_ADJACENT",
    );
  });

  it("rejects wall queries that leave the grid on either side", () => {
    const generator = new MazeGenerator(5, 5, 3);
    expect(errorCode(() => generator.isWallBetween({ x: -1, y: 0 }, { x: 0, y: 0 }))).toBe(
      "INVALID_CELL",
    );
    expect(errorCode(() => generator.isWallBetween({ x: 4, y: 0 }, { x: 5, y: 0 }))).toBe(
      "INVALID_CELL",
    );
    expect(errorCode(() => generator.isWallBetween({ x: 4, y: 4 }, { x: 4, y: 5 }))).toBe(
      "INVALID_CELL",
    );
    expect(errorCode(() => generator.isWallBetween({ x: 40, y: 40 }, { x: 41, y: 40 }))).toBe(
      "INVALID_CELL",
    );
  });

  it("validates its arguments", () => {
    expect(errorCode(() => new MazeGenerator(0, 5, 1))).toBe("INVALID_DIMENSIONS");
    expect(errorCode(() => new MazeGenerator(5, 1001, 1))).toBe("INVALID_DIMENSIONS");
    expect(errorCode(() => new MazeGenerator(2.5, 5, 1))).toBe("INVALID_DIMENSIONS");
    expect(errorCode(() => new MazeGenerator(5, 5, -1))).toBe("INVALID_SEED");
    expect(errorCode(() => new MazeGenerator(5, 5, 1.5))).toBe("INVALID_SEED");
    expect(errorCode(() => new MazeGenerator(5, 5, 2 ** 32))).toBe("INVALID_SEED");
  });

  it("handles large grids without exhausting the call stack", () => {
    const walls = new MazeGenerator(300, 300, 77).generate();
    expect(walls.size).toBe(interiorEdgeCount(300, 300) - (300 * 300 - 1));
    expect(validateMaze(300, 300, walls).success).toBe(true);
  });

  it("records the seed and carve size in its trace", () => {
    const trace = new DefaultTraceCollector(true);
    new MazeGenerator(4, 3, 55, { trace }).generate();

    const events = trace.getEvents();
    expect(events.map((e) => e.eventType)).toEqual([
      "start",
      "decision",
      "decision",
      "end",
    ]);
    expect(events.every((e) => e.scope === "generator.dfs")).toBe(true);

    const decisions = trace.getDecisions();
    expect(decisions[0]?.data.chosen).toBe(55);
    expect(decisions[0]?.data.reason).toBe("seed supplied by caller");
    expect(decisions[1]?.data.chosen).toBe(11);
  });
});

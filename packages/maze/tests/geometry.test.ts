import { describe, expect, it } from "vitest";
import { MazeError } from "@labyrinth/contracts";
import {
  areAdjacent,
  assertAdjacent,
  assertCellInBounds,
  assertDimensions,
  cellKey,
  cellsEqual,
  compareCells,
  containsCell,
  defaultEndpoints,
  formatCell,
  manhattanDistance,
} from "../src/core/geometry";

function thrown(fn: () => unknown): MazeError {
  try {
    fn();
  } catch (error) {
    if (error instanceof MazeError) return error;
    throw error;
  }
  throw new Error("expected a MazeError");
}

describe("cell ordering", () => {
  it("orders row-major: y first, then x", () => {
    expect(compareCells({ x: 4, y: 0 }, { x: 0, y: 1 })).toBeLessThan(0);
    expect(compareCells({ x: 1, y: 2 }, { x: 0, y: 2 })).toBeGreaterThan(0);
    expect(compareCells({ x: 3, y: 3 }, { x: 3, y: 3 })).toBe(0);
  });

  it("compares cells by value", () => {
    expect(cellsEqual({ x: 1, y: 2 }, { x: 1, y: 2 })).toBe(true);
    expect(cellsEqual({ x: 1, y: 2 }, { x: 2, y: 1 })).toBe(false);
  });
});

describe("distances", () => {
  it("computes Manhattan distance", () => {
    expect(manhattanDistance({ x: 0, y: 0 }, { x: 4, y: 4 })).toBe(8);
    expect(manhattanDistance({ x: 3, y: 1 }, { x: 1, y: 2 })).toBe(3);
  });

  it("treats only orthogonal unit steps as adjacent", () => {
    expect(areAdjacent({ x: 0, y: 0 }, { x: 1, y: 0 })).toBe(true);
    expect(areAdjacent({ x: 2, y: 2 }, { x: 2, y: 1 })).toBe(true);
    expect(areAdjacent({ x: 0, y: 0 }, { x: 1, y: 1 })).toBe(false);
    expect(areAdjacent({ x: 0, y: 0 }, { x: 0, y: 0 })).toBe(false);
    expect(areAdjacent({ x: 0, y: 0 }, { x: 2, y: 0 })).toBe(false);
  });
});

describe("bounds", () => {
  const dims = { width: 5, height: 3 };

  it("accepts cells inside the grid", () => {
    expect(containsCell(dims, { x: 0, y: 0 })).toBe(true);
    expect(containsCell(dims, { x: 4, y: 2 })).toBe(true);
  });

  it("rejects cells outside the grid or with fractional coordinates", () => {
    expect(containsCell(dims, { x: 5, y: 0 })).toBe(false);
    expect(containsCell(dims, { x: 0, y: -1 })).toBe(false);
    expect(containsCell(dims, { x: 0.5, y: 0 })).toBe(false);
  });

  it("reports out-of-bounds cells as INVALID_CELL", () => {
    const error = thrown(() => assertCellInBounds(dims, { x: 5, y: 1 }));
    expect(error.code).toBe("INVALID_CELL");
    expect(error.message).toBe("Cell (5, 1) is outside the 5x3 grid");
  });

  it("reports non-adjacent pairs as CELLS_NOT_ADJACENT", () => {
    const error = thrown(() => assertAdjacent({ x: 0, y: 0 }, { x: 1, y: 1 }));
    expect(error.code).toBe("CELLS_NOT_ADJACENT");
    expect(error.message).toBe("Cells (0, 0) and (1, 1) are not adjacent");
  });

  it("validates dimensions", () => {
    expect(() => assertDimensions(1, 1)).not.toThrow();
    expect(() => assertDimensions(1000, 1000)).not.toThrow();

    const error = thrown(() => assertDimensions(0, 5));
    expect(error.code).toBe("INVALID_DIMENSIONS");
    expect(error.message).toBe("width: Dimension must be at least 1");
  });
});

describe("formatting", () => {
  it("builds string keys and labels", () => {
    expect(cellKey({ x: 3, y: 7 })).toBe("3,7");
    expect(formatCell({ x: 3, y: 7 })).toBe("(3, 7)");
  });

  it("places default endpoints at opposite corners", () => {
    expect(defaultEndpoints(10, 6)).toEqual({
      start: { x: 0, y: 0 },
      end: { x: 9, y: 5 },
    });
  });
});

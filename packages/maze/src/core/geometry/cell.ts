import { MazeConfigSchema, MazeError } from "@labyrinth/contracts";
import type { Cell, Dimensions } from "./types";

export function cellsEqual(a: Cell, b: Cell): boolean {
  return a.x === b.x && a.y === b.y;
}

/**
 * Row-major total order over cells: by `y`, then by `x`.
 *
 * Walls store their lower cell first under this order, and the search uses
 * it to break ties between frontier entries of equal cost.
 */
export function compareCells(a: Cell, b: Cell): number {
  return a.y !== b.y ? a.y - b.y : a.x - b.x;
}

export function manhattanDistance(a: Cell, b: Cell): number {
  return Math.abs(a.x - b.x) + Math.abs(a.y - b.y);
}

export function areAdjacent(a: Cell, b: Cell): boolean {
  return manhattanDistance(a, b) === 1;
}

export function isInBounds(
  x: number,
  y: number,
  width: number,
  height: number,
): boolean {
  return x >= 0 && x < width && y >= 0 && y < height;
}

export function containsCell(dimensions: Dimensions, c: Cell): boolean {
  return (
    Number.isInteger(c.x) &&
    Number.isInteger(c.y) &&
    isInBounds(c.x, c.y, dimensions.width, dimensions.height)
  );
}

/**
 * String key for value-based `Set`/`Map` membership: `"x,y"`.
 */
export function cellKey(c: Cell): string {
  return `${c.x},${c.y}`;
}

/**
 * Conventional endpoints: top-left corner to bottom-right corner.
 */
export function defaultEndpoints(
  width: number,
  height: number,
): { start: Cell; end: Cell } {
  return { start: { x: 0, y: 0 }, end: { x: width - 1, y: height - 1 } };
}

export function formatCell(c: Cell): string {
  return `(${c.x}, ${c.y})`;
}

/**
 * @throws {MazeError} INVALID_DIMENSIONS unless both sides are integers in [1, 1000]
 */
export function assertDimensions(width: number, height: number): void {
  const parsed = MazeConfigSchema.safeParse({ width, height });
  if (!parsed.success) {
    throw MazeError.fromZodError("INVALID_DIMENSIONS", parsed.error);
  }
}

/**
 * @throws {MazeError} INVALID_CELL when the cell lies outside the grid
 */
export function assertCellInBounds(dimensions: Dimensions, c: Cell): void {
  if (!containsCell(dimensions, c)) {
    throw MazeError.invalidCell(
      `Cell ${formatCell(c)} is outside the ${dimensions.width}x${dimensions.height} grid`,
      { cell: { x: c.x, y: c.y }, width: dimensions.width, height: dimensions.height },
    );
  }
}

/**
 * @throws {MazeError} CELLS_NOT_ADJACENT unless the cells are exactly one step apart
 */
export function assertAdjacent(a: Cell, b: Cell): void {
  if (!areAdjacent(a, b)) {
    throw MazeError.notAdjacent(
      `Cells ${formatCell(a)} and ${formatCell(b)} are not adjacent`,
      { a: { x: a.x, y: a.y }, b: { x: b.x, y: b.y } },
    );
  }
}

/**
 * Walls between grid-adjacent cells.
 *
 * A wall is stored canonically at construction: its lower cell (row-major)
 * comes first, so `{A, B}` and `{B, A}` are the same wall and lookups never
 * need to re-sort.
 */

import { MazeError } from "@labyrinth/contracts";
import { assertAdjacent, compareCells, formatCell } from "../geometry/cell";
import type { Cell } from "../geometry/types";

/**
 * Which side of its lower cell a wall sits on.
 */
export type WallOrientation = "east" | "south";

export interface Wall {
  /** Lower cell under row-major order */
  readonly a: Cell;
  /** `a` shifted one step east or south */
  readonly b: Cell;
}

/**
 * Coordinates are packed into one number per wall; each must stay below this.
 */
export const MAX_WALL_COORDINATE = 0xffff;

const KEY_STRIDE = MAX_WALL_COORDINATE + 1;

/**
 * Numeric key of the wall on the given side of `(x, y)`.
 *
 * Keys sort the same way walls do: row-major by lower cell, east before south.
 */
export function edgeKey(x: number, y: number, orientation: WallOrientation): number {
  return (y * KEY_STRIDE + x) * 2 + (orientation === "south" ? 1 : 0);
}

export function wallKey(wall: Wall): number {
  return edgeKey(wall.a.x, wall.a.y, wallOrientation(wall));
}

export function wallOrientation(wall: Wall): WallOrientation {
  return wall.b.x !== wall.a.x ? "east" : "south";
}

export function wallFromKey(key: number): Wall {
  const orientation: WallOrientation = key % 2 === 1 ? "south" : "east";
  const packed = Math.floor(key / 2);
  const a: Cell = { x: packed % KEY_STRIDE, y: Math.floor(packed / KEY_STRIDE) };
  const b: Cell =
    orientation === "east" ? { x: a.x + 1, y: a.y } : { x: a.x, y: a.y + 1 };
  return { a, b };
}

function assertWallCoordinate(c: Cell): void {
  const valid =
    Number.isInteger(c.x) &&
    Number.isInteger(c.y) &&
    c.x >= 0 &&
    c.y >= 0 &&
    c.x <= MAX_WALL_COORDINATE &&
    c.y <= MAX_WALL_COORDINATE;
  if (!valid) {
    throw MazeError.invalidCell(
      `Cell ${formatCell(c)} cannot bound a wall: coordinates must be integers in [0, ${MAX_WALL_COORDINATE}]`,
      { cell: { x: c.x, y: c.y } },
    );
  }
}

/**
 * Build the canonical wall between two cells, in either order.
 *
 * @throws {MazeError} INVALID_CELL for non-integer or negative coordinates
 * @throws {MazeError} CELLS_NOT_ADJACENT when the cells are not one step apart
 */
export function createWall(p: Cell, q: Cell): Wall {
  assertWallCoordinate(p);
  assertWallCoordinate(q);
  assertAdjacent(p, q);

  const [a, b] = compareCells(p, q) < 0 ? [p, q] : [q, p];
  return { a: { x: a.x, y: a.y }, b: { x: b.x, y: b.y } };
}

export function formatWall(wall: Wall): string {
  return `${formatCell(wall.a)}-${formatCell(wall.b)}`;
}

/**
 * Interior edges of the grid graph and the passage rule shared by the
 * generator, the search and the validators.
 */

import { isInBounds } from "../geometry/cell";
import { type Cell, NEIGHBOR_OFFSETS } from "../geometry/types";
import { edgeKey } from "../walls/wall";
import type { ReadonlyWallSet } from "../walls/wall-set";

/**
 * Number of interior edges (potential walls) of a `width x height` grid.
 */
export function interiorEdgeCount(width: number, height: number): number {
  return 2 * width * height - width - height;
}

/**
 * Visit every interior edge once, row-major by lower cell, east edge before
 * south edge. This order is part of the share-code format.
 */
export function forEachInteriorEdge(
  width: number,
  height: number,
  callback: (key: number, a: Cell, b: Cell) => void,
): void {
  for (let y = 0; y < height; y++) {
    for (let x = 0; x < width; x++) {
      if (x < width - 1) {
        callback(edgeKey(x, y, "east"), { x, y }, { x: x + 1, y });
      }
      if (y < height - 1) {
        callback(edgeKey(x, y, "south"), { x, y }, { x, y: y + 1 });
      }
    }
  }
}

/**
 * Key of the wall between `c` and its neighbour at `c + (dx, dy)`.
 */
function keyTowards(c: Cell, dx: number, dy: number): number {
  if (dx === 1) return edgeKey(c.x, c.y, "east");
  if (dx === -1) return edgeKey(c.x - 1, c.y, "east");
  if (dy === 1) return edgeKey(c.x, c.y, "south");
  return edgeKey(c.x, c.y - 1, "south");
}

/**
 * Traversable neighbours of a cell: in bounds and not separated by a wall.
 * Enumerated down, right, up, left.
 */
export function passageNeighbors(
  width: number,
  height: number,
  walls: ReadonlyWallSet,
  c: Cell,
): Cell[] {
  const neighbors: Cell[] = [];
  for (const offset of NEIGHBOR_OFFSETS) {
    const nx = c.x + offset.x;
    const ny = c.y + offset.y;
    if (!isInBounds(nx, ny, width, height)) continue;
    if (walls.hasKey(keyTowards(c, offset.x, offset.y))) continue;
    neighbors.push({ x: nx, y: ny });
  }
  return neighbors;
}

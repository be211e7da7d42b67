import type { Cell } from "../src/core/geometry/types";
import { WallSet } from "../src/core/walls/wall-set";

function pairs(list: ReadonlyArray<readonly [number, number, number, number]>): WallSet {
  return WallSet.from(
    list.map(([ax, ay, bx, by]): readonly [Cell, Cell] => [
      { x: ax, y: ay },
      { x: bx, y: by },
    ]),
  );
}

/**
 * 5x5 grid with a wall run across row 1 and two short walls further down.
 * Not a perfect maze: several loops remain.
 */
export function scenarioWalls(): WallSet {
  return pairs([
    [0, 1, 1, 1],
    [1, 1, 2, 1],
    [2, 1, 3, 1],
    [3, 1, 3, 2],
    [3, 2, 3, 3],
    [1, 3, 2, 3],
    [2, 3, 3, 3],
  ]);
}

/**
 * 3x3 perfect maze whose only route snakes right, left, right:
 * (0,0)->(2,0), down, (2,1)->(0,1), down, (0,2)->(2,2).
 */
export function serpentineWalls(): WallSet {
  return pairs([
    [0, 0, 0, 1],
    [1, 0, 1, 1],
    [1, 1, 1, 2],
    [2, 1, 2, 2],
  ]);
}

export function cells(list: ReadonlyArray<readonly [number, number]>): Cell[] {
  return list.map(([x, y]) => ({ x, y }));
}

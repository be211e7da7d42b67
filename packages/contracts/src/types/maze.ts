/**
 * Configuration of a single maze: grid size plus an optional seed.
 * Without a seed the generator draws one from system randomness.
 */
export interface MazeConfig {
  readonly width: number;
  readonly height: number;
  readonly seed?: number;
}

/**
 * Serialized cell coordinates: `[x, y]`.
 */
export type CellTuple = readonly [number, number];

/**
 * Serialized wall: the two cells it separates, lower cell first.
 */
export type WallPair = readonly [CellTuple, CellTuple];

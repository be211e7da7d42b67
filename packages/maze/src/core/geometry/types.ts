/**
 * Core geometry types for the maze grid.
 * All types are immutable value objects.
 */

/**
 * One grid position. `0 <= x < width`, `0 <= y < height`; y grows downwards.
 */
export interface Cell {
  readonly x: number;
  readonly y: number;
}

/**
 * Grid dimensions
 */
export interface Dimensions {
  readonly width: number;
  readonly height: number;
}

/**
 * Unit step between two grid-adjacent cells.
 */
export interface Offset {
  readonly x: 1 | 0 | -1;
  readonly y: 1 | 0 | -1;
}

/**
 * Directions tried by the carver before shuffling: right, down, left, up.
 */
export const CARVE_DIRECTIONS: readonly Offset[] = [
  { x: 1, y: 0 },
  { x: 0, y: 1 },
  { x: -1, y: 0 },
  { x: 0, y: -1 },
];

/**
 * Order in which the search enumerates a cell's neighbours: down, right, up, left.
 */
export const NEIGHBOR_OFFSETS: readonly Offset[] = [
  { x: 0, y: 1 },
  { x: 1, y: 0 },
  { x: 0, y: -1 },
  { x: -1, y: 0 },
];

/**
 * Labyrinth - perfect maze generation and shortest-path search
 *
 * A seeded depth-first carver produces a perfect maze (exactly one route
 * between any two cells); an A* search finds the shortest route and records
 * the order in which it explored the grid.
 *
 * @example
 * ```typescript
 * import { generate, findPath, defaultEndpoints } from "@labyrinth/maze";
 *
 * const walls = generate(10, 10, 42);
 * const { start, end } = defaultEndpoints(10, 10);
 * const result = findPath(10, 10, walls, start, end);
 *
 * if (result.found) {
 *   console.log(`Solved in ${result.path.length - 1} steps`);
 * }
 * ```
 */

// Core modules
export * from "./core";
// Generators
export * from "./generators";
// Search
export * from "./search";
// Tracing
export * from "./trace";
// Seeds
export * from "./seed";
// Validation & statistics
export * from "./validation";
// Determinism checks
export * from "./testing";
// High-level API
export {
  findPath,
  generate,
  type MazeSolution,
  parseWallPairs,
  solveMaze,
} from "./api";

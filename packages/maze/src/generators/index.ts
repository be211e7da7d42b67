/**
 * Maze generators
 */

export * from "./dfs";

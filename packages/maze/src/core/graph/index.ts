/**
 * Graph utilities over the maze passage graph.
 */

export * from "./bfs-distance";

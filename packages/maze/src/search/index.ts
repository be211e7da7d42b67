/**
 * Shortest-path search
 */

export * from "./astar";
export * from "./types";

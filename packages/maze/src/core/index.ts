/**
 * Core building blocks: geometry, walls, grid edges, data structures,
 * graph algorithms, hashing and share codes.
 */

export * from "./algorithms";
export * from "./data-structures";
export * from "./encoding";
export * from "./geometry";
export * from "./graph";
export * from "./grid";
export * from "./hash";
export * from "./walls";

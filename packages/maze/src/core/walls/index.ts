export * from "./wall";
export { type ReadonlyWallSet, WallSet } from "./wall-set";

export * from "./cell";
export * from "./types";

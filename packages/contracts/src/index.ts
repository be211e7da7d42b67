export * from "./random/rng";
export * from "./random/seeded-random";
export * from "./random/system-random";
export * from "./schemas/maze";
export * from "./schemas/seed";
export * from "./schemas/wall-pairs";
export * from "./types/error";
export * from "./types/maze";
export * from "./types/result";
export * from "./utils/builder";
export * from "./utils/encoding";

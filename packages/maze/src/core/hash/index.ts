export * from "./checksum";
export * from "./fnv64";

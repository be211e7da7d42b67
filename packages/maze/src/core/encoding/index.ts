export * from "./share-code";

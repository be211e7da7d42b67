export * from "./union-find";

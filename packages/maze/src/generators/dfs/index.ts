export * from "./generator";

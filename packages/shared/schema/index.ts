export * from "./videos";

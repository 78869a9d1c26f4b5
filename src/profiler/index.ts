export * from "./profiler";

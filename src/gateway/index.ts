export * from "./gateway";
export * from "./rate-limit";

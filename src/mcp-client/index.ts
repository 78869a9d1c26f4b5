export * from "./types";
export * from "./fake";
export * from "./local";
export * from "./remote";
export * from "./transport";

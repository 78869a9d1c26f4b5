// toolgate - MCP tool gateway
// Aggregates downstream MCP servers behind search, deferred activation and routed calls

export * from "./errors";
export * from "./logger";
export * from "./catalog";
export * from "./config";
export * from "./storage";
export * from "./registry";
export * from "./search";
export * from "./activation";
export * from "./cache";
export * from "./router";
export * from "./mcp-client";
export * from "./profiler";
export * from "./gateway";
export * from "./server";

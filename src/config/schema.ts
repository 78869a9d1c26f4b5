import { z } from "zod";
import { SEP } from "../catalog/types";

export const LoadingModeSchema = z.enum(["eager", "deferred"]);
export const ConnectionModeSchema = z.enum(["stateful", "stateless"]);

const ServerNameSchema = z
  .string()
  .min(1)
  .refine(name => !name.includes(SEP), { message: `Server name must not contain "${SEP}"` })
  // "a_" + "__" + "b" would parse back as server "a"
  .refine(name => !name.endsWith("_"), { message: `Server name must not end with "_"` });

const CommonServerFields = {
  connectionMode: ConnectionModeSchema.optional().describe("Keep a pooled connection or connect per request"),
  loadingMode: LoadingModeSchema.optional().describe("Expose tools immediately or only after search"),
  enabled: z.boolean().default(true).describe("Whether to load this server at startup"),
};

/**
 * HTTP MCP server configuration
 * Connects via Streamable HTTP, falling back to SSE
 */
export const HttpServerConfigSchema = z.object({
  transport: z.literal("http"),
  url: z.string().url().describe("MCP endpoint URL"),
  headers: z.record(z.string(), z.string()).optional().describe("Static HTTP headers for authentication"),
  ...CommonServerFields,
});

/**
 * Stdio MCP server configuration
 * Spawns a process and communicates via stdio
 */
export const StdioServerConfigSchema = z.object({
  transport: z.literal("stdio"),
  command: z.string().min(1).describe("Command to spawn the MCP server"),
  args: z.array(z.string()).default([]).describe("Arguments for the command"),
  env: z.record(z.string(), z.string()).optional().describe("Environment variables for the process"),
  headers: z.record(z.string(), z.string()).optional(),
  ...CommonServerFields,
});

export const ServerConfigSchema = z.discriminatedUnion("transport", [
  HttpServerConfigSchema,
  StdioServerConfigSchema,
]);

/**
 * Input accepted by registerServer (config entry plus its name)
 */
export const ServerRegistrationSchema = z.discriminatedUnion("transport", [
  HttpServerConfigSchema.extend({ name: ServerNameSchema }),
  StdioServerConfigSchema.extend({ name: ServerNameSchema, url: z.string().optional() }),
]);

export const SearchConfigSchema = z
  .object({
    /** Default number of search results to return */
    defaultLimit: z.number().int().min(1).max(100).default(5),
    /** Smallest effective result count */
    minLimit: z.number().int().min(1).max(100).default(1),
    /** Largest effective result count */
    maxLimit: z.number().int().min(1).max(100).default(10),
    /** Maximum regex pattern length */
    maxPatternLength: z.number().int().min(1).max(10000).default(200),
  })
  .refine(s => s.minLimit <= s.maxLimit, { message: "minLimit must not exceed maxLimit" });

export const CacheConfigSchema = z.object({
  /** Schema cache time-to-live in milliseconds (default: 5 minutes) */
  ttl: z.number().int().min(1).default(300_000),
  /** Maximum number of cached schemas */
  maxSize: z.number().int().min(1).default(1000),
});

/**
 * Connection settings for downstream MCP servers
 */
export const ConnectionConfigSchema = z.object({
  /** Connection timeout in milliseconds (default: 5000) */
  connectTimeout: z.number().min(100).max(60000).default(5000),
  /** Request timeout in milliseconds (default: 30000) */
  requestTimeout: z.number().min(10).max(300000).default(30000),
  /** Number of retry attempts on transient failure (default: 2) */
  retryAttempts: z.number().int().min(0).max(10).default(2),
  /** Base delay between retries in milliseconds (default: 1000) */
  retryDelay: z.number().min(0).max(30000).default(1000),
});

export const StorageConfigSchema = z.discriminatedUnion("type", [
  z.object({
    type: z.literal("memory"),
    retryAttempts: z.number().int().min(0).max(10).default(0),
    retryDelay: z.number().min(0).max(10000).default(0),
  }),
  z.object({
    type: z.literal("redis"),
    url: z.string().min(1).default("redis://localhost:6379/0"),
    retryAttempts: z.number().int().min(0).max(10).default(2),
    retryDelay: z.number().min(0).max(10000).default(100),
  }),
]);

export const RateLimitConfigSchema = z.object({
  /** Requests per minute per caller for search and call (0 disables) */
  requestsPerMinute: z.number().int().min(0).default(0),
});

export const LogLevelSchema = z.enum(["debug", "info", "warn", "error"]);

export const LogConfigSchema = z.object({
  level: LogLevelSchema.default("info"),
  /** Log file path; omit to disable file logging */
  file: z.string().optional(),
});

/**
 * Gateway settings
 */
export const SettingsConfigSchema = z.object({
  search: SearchConfigSchema.optional(),
  cache: CacheConfigSchema.optional(),
  connection: ConnectionConfigSchema.optional(),
  storage: StorageConfigSchema.optional(),
  defaultLoadingMode: LoadingModeSchema.default("deferred"),
  defaultConnectionMode: ConnectionModeSchema.default("stateless"),
  rateLimit: RateLimitConfigSchema.optional(),
  log: LogConfigSchema.optional(),
});

/**
 * Gateway configuration schema
 * Located at ~/.config/toolgate/config.jsonc
 */
export const ConfigSchema = z.object({
  /** Downstream MCP servers to register at startup */
  servers: z.record(ServerNameSchema, ServerConfigSchema).default({}),
  /** Gateway settings */
  settings: SettingsConfigSchema.optional(),
});

export type Config = z.infer<typeof ConfigSchema>;
export type ServerConfig = z.infer<typeof ServerConfigSchema>;
export type HttpServerConfig = z.infer<typeof HttpServerConfigSchema>;
export type StdioServerConfig = z.infer<typeof StdioServerConfigSchema>;
export type ServerRegistrationInput = z.input<typeof ServerRegistrationSchema>;
export type LoadingMode = z.infer<typeof LoadingModeSchema>;
export type ConnectionMode = z.infer<typeof ConnectionModeSchema>;
export type SearchConfig = z.infer<typeof SearchConfigSchema>;
export type CacheConfig = z.infer<typeof CacheConfigSchema>;
export type ConnectionConfig = z.infer<typeof ConnectionConfigSchema>;
export type StorageConfig = z.infer<typeof StorageConfigSchema>;
export type RateLimitConfig = z.infer<typeof RateLimitConfigSchema>;
export type LogLevel = z.infer<typeof LogLevelSchema>;
export type LogConfig = z.infer<typeof LogConfigSchema>;
export type SettingsConfig = z.infer<typeof SettingsConfigSchema>;

/**
 * Fully-defaulted settings passed to every component at construction
 */
export type GatewaySettings = {
  search: SearchConfig;
  cache: CacheConfig;
  connection: ConnectionConfig;
  storage: StorageConfig;
  defaultLoadingMode: LoadingMode;
  defaultConnectionMode: ConnectionMode;
  rateLimit: RateLimitConfig;
  log: LogConfig;
};

/**
 * Fill in defaults for every settings section
 */
export function resolveSettings(settings?: z.input<typeof SettingsConfigSchema>): GatewaySettings {
  const parsed = SettingsConfigSchema.parse(settings ?? {});
  return {
    search: parsed.search ?? SearchConfigSchema.parse({}),
    cache: parsed.cache ?? CacheConfigSchema.parse({}),
    connection: parsed.connection ?? ConnectionConfigSchema.parse({}),
    storage: parsed.storage ?? StorageConfigSchema.parse({ type: "memory" }),
    defaultLoadingMode: parsed.defaultLoadingMode,
    defaultConnectionMode: parsed.defaultConnectionMode,
    rateLimit: parsed.rateLimit ?? RateLimitConfigSchema.parse({}),
    log: parsed.log ?? LogConfigSchema.parse({}),
  };
}

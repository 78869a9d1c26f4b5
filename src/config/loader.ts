import { parse, printParseErrorCode } from "jsonc-parser";
import type { ParseError } from "jsonc-parser";
import { z } from "zod";
import { mkdir, readFile, writeFile } from "fs/promises";
import { homedir } from "os";
import { dirname, join } from "path";
import type { Config } from "./schema";
import { ConfigSchema } from "./schema";

export const DEFAULT_CONFIG_PATH = join(homedir(), ".config", "toolgate", "config.jsonc");
export const DEFAULT_LOG_PATH = join(homedir(), ".local", "share", "toolgate", "toolgate.log");

export type ConfigResult = { success: true; data: Config } | { success: false; error: z.ZodError };

/**
 * Expand a leading "~/" to the home directory
 */
export function expandHome(filePath: string): string {
  return filePath === "~" || filePath.startsWith("~/") ? join(homedir(), filePath.slice(1)) : filePath;
}

/**
 * Generate default config content
 */
export function generateDefaultConfig(): string {
  return `{
  "servers": {
    // Add your MCP servers here
    // Example:
    // "weather": {
    //   "transport": "http",
    //   "url": "https://weather.example.com/mcp",
    //   "headers": { "Authorization": "Bearer {env:WEATHER_TOKEN}" }
    // },
    // "time": {
    //   "transport": "stdio",
    //   "command": "npx",
    //   "args": ["-y", "mcp-server-time"],
    //   "loadingMode": "eager"
    // }
  },
  "settings": {
    "defaultLoadingMode": "deferred",
    "search": { "defaultLimit": 5 },
    "log": { "level": "info", "file": "${DEFAULT_LOG_PATH}" }
  }
}
`;
}

/**
 * Create default config file if it doesn't exist
 * @returns true if file was created, false if it already existed
 */
export async function createDefaultConfigIfMissing(filePath: string): Promise<boolean> {
  await mkdir(dirname(filePath), { recursive: true });
  try {
    await writeFile(filePath, generateDefaultConfig(), { encoding: "utf-8", flag: "wx" });
    return true;
  } catch (error) {
    if (error instanceof Error && "code" in error && error.code === "EEXIST") {
      return false;
    }
    throw error;
  }
}

/**
 * Interpolate environment variables in config values.
 * Handles the {env:VAR_NAME} pattern; unset variables become "".
 */
export function interpolateEnvVars(value: unknown, env: NodeJS.ProcessEnv = process.env): unknown {
  if (typeof value === "string") {
    return value.replace(/\{env:([A-Za-z_][A-Za-z0-9_]*)\}/g, (_, varName: string) => env[varName] ?? "");
  }

  if (Array.isArray(value)) {
    return value.map(item => interpolateEnvVars(item, env));
  }

  if (value && typeof value === "object") {
    const result: Record<string, unknown> = {};
    for (const [key, item] of Object.entries(value)) {
      result[key] = interpolateEnvVars(item, env);
    }
    return result;
  }

  return value;
}

function failure(message: string): ConfigResult {
  return {
    success: false,
    error: new z.ZodError([{ code: z.ZodIssueCode.custom, message, path: [] }]),
  };
}

/**
 * Parse and validate a JSONC config (comments and trailing commas allowed)
 */
export function parseConfig(jsonc: string, env?: NodeJS.ProcessEnv): ConfigResult {
  const errors: ParseError[] = [];
  const parsed: unknown = parse(jsonc, errors, { allowTrailingComma: true, allowEmptyContent: true });

  const first = errors[0];
  if (first) {
    return failure(`Failed to parse JSONC: ${printParseErrorCode(first.error)} at offset ${first.offset}`);
  }

  const result = ConfigSchema.safeParse(interpolateEnvVars(parsed ?? {}, env));
  return result.success ? { success: true, data: result.data } : { success: false, error: result.error };
}

/**
 * Load config from file path
 */
export async function loadConfig(filePath: string, env?: NodeJS.ProcessEnv): Promise<ConfigResult> {
  let content: string;
  try {
    content = await readFile(filePath, "utf-8");
  } catch (error) {
    return failure(`Failed to read config file: ${error instanceof Error ? error.message : String(error)}`);
  }
  return parseConfig(content, env);
}

/**
 * Human-readable summary of config validation issues
 */
export function formatConfigError(error: z.ZodError): string {
  return error.issues
    .map(issue => (issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message))
    .join(", ");
}

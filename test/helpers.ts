import type { Tool } from "@modelcontextprotocol/sdk/types.js";
import { normalizeTool, normalizeTools, toToolMetadata } from "../src/catalog/catalog";
import type { ToolDefinition, ToolMetadata } from "../src/catalog/types";
import { resolveSettings } from "../src/config/schema";
import type { GatewaySettings } from "../src/config/schema";
import { GatewayError } from "../src/errors";
import type { Logger } from "../src/logger";
import type { DownstreamTransport, ToolCallResult } from "../src/mcp-client/types";
import type { ServerRegistration } from "../src/registry/types";

/**
 * Build a ToolDefinition from a name, description and argument list.
 * Arguments are [name, description?, required?].
 */
export function definition(
  server: string,
  tool: string,
  description: string,
  args: Array<[string, string?, boolean?]> = []
): ToolDefinition {
  const properties: Record<string, unknown> = {};
  const required: string[] = [];
  for (const [name, argDescription, isRequired] of args) {
    properties[name] = argDescription ? { type: "string", description: argDescription } : { type: "string" };
    if (isRequired) required.push(name);
  }
  return normalizeTool(server, {
    name: tool,
    description,
    inputSchema: { type: "object", properties, required },
  });
}

export function metadata(
  server: string,
  tool: string,
  description: string,
  args: Array<[string, string?, boolean?]> = []
): ToolMetadata {
  return toToolMetadata(definition(server, tool, description, args));
}

export function httpRegistration(name: string, overrides: Partial<ServerRegistration> = {}): ServerRegistration {
  const url = `https://${name}.example.test/mcp`;
  return {
    name,
    url,
    transport: { type: "http", url },
    connectionMode: "stateless",
    loadingMode: "deferred",
    ...overrides,
  };
}

/**
 * Settings with retries that do not wait
 */
export function testSettings(overrides: Parameters<typeof resolveSettings>[0] = {}): GatewaySettings {
  return resolveSettings({
    connection: { retryAttempts: 2, retryDelay: 0, requestTimeout: 1000, connectTimeout: 1000 },
    ...overrides,
  });
}

export type LogEntry = { level: keyof Logger; message: string; extra?: Record<string, unknown> };

/**
 * Logger that keeps every entry in memory
 */
export function createMemoryLogger(): Logger & { entries: LogEntry[] } {
  const entries: LogEntry[] = [];
  const at = (level: keyof Logger) => (message: string, extra?: Record<string, unknown>) => {
    entries.push(extra ? { level, message, extra } : { level, message });
  };
  return { entries, debug: at("debug"), info: at("info"), warn: at("warn"), error: at("error") };
}

/**
 * Code of the GatewayError thrown by fn, "none" if it returned, "other" for other errors
 */
export function thrownCode(fn: () => unknown): string {
  try {
    fn();
  } catch (error) {
    return error instanceof GatewayError ? error.code : "other";
  }
  return "none";
}

export async function rejectedCode(promise: Promise<unknown>): Promise<string> {
  try {
    await promise;
  } catch (error) {
    return error instanceof GatewayError ? error.code : "other";
  }
  return "none";
}

export type RecordedCall = {
  server: string;
  tool: string;
  args: Record<string, unknown>;
  headers: Record<string, string>;
};

/**
 * In-process DownstreamTransport backed by static tool lists
 */
export class FakeTransport implements DownstreamTransport {
  readonly calls: RecordedCall[] = [];
  readonly discoveries: string[] = [];
  readonly disconnected: string[] = [];
  closed = false;

  constructor(
    private readonly tools: Record<string, Tool[]> = {},
    private readonly onCall: (call: RecordedCall) => Promise<ToolCallResult> = async call => ({
      content: [{ type: "text", text: `${call.server}:${call.tool}` }],
    })
  ) {}

  setTools(server: string, tools: Tool[]): void {
    this.tools[server] = tools;
  }

  async discoverTools(server: ServerRegistration): Promise<ToolDefinition[]> {
    this.discoveries.push(server.name);
    const tools = this.tools[server.name];
    if (!tools) {
      throw new GatewayError("connection_error", `Cannot reach ${server.name}: connection refused`);
    }
    return normalizeTools(server.name, tools);
  }

  async callTool(
    server: ServerRegistration,
    toolName: string,
    args: Record<string, unknown>,
    authHeaders: Record<string, string>
  ): Promise<ToolCallResult> {
    const call = { server: server.name, tool: toolName, args, headers: authHeaders };
    this.calls.push(call);
    return this.onCall(call);
  }

  async disconnect(serverName: string): Promise<void> {
    this.disconnected.push(serverName);
  }

  async closeAll(): Promise<void> {
    this.closed = true;
  }
}

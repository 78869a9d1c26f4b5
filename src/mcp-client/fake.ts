import { ErrorCode, McpError } from "@modelcontextprotocol/sdk/types.js";
import type { Tool } from "@modelcontextprotocol/sdk/types.js";
import type { MCPClient, ToolCallResult } from "./types";

export type FakeMCPClientConfig = {
  /** Tools this server provides */
  tools: Tool[];
  /** Simulated network delay in ms (default: 10) */
  delay?: number;
  /** Custom tool call handler */
  onCallTool?: (name: string, args: Record<string, unknown>) => Promise<ToolCallResult>;
  failConnect?: boolean;
  failListTools?: boolean;
  errorMessage?: string;
};

/**
 * In-process stand-in for a downstream MCP server
 */
export class FakeMCPClient implements MCPClient {
  private readonly config: FakeMCPClientConfig;
  private connected = false;
  readonly calls: Array<{ name: string; args: Record<string, unknown> }> = [];

  constructor(config: FakeMCPClientConfig) {
    this.config = { delay: 10, ...config };
  }

  private async simulateDelay(): Promise<void> {
    const delay = this.config.delay ?? 0;
    if (delay > 0) {
      await new Promise(resolve => setTimeout(resolve, delay));
    }
  }

  async connect(): Promise<void> {
    await this.simulateDelay();
    if (this.config.failConnect) {
      throw new Error(this.config.errorMessage ?? "Connection failed");
    }
    this.connected = true;
  }

  async listTools(): Promise<Tool[]> {
    await this.simulateDelay();
    if (this.config.failListTools) {
      throw new Error(this.config.errorMessage ?? "Failed to list tools");
    }
    return [...this.config.tools];
  }

  async callTool(name: string, args: Record<string, unknown>): Promise<ToolCallResult> {
    await this.simulateDelay();
    this.calls.push({ name, args });

    if (!this.config.tools.some(t => t.name === name)) {
      throw new McpError(ErrorCode.InvalidParams, `Tool not found: ${name}`);
    }

    if (this.config.onCallTool) {
      return this.config.onCallTool(name, args);
    }

    return { content: [{ type: "text", text: `Mock result for ${name}` }] };
  }

  async close(): Promise<void> {
    this.connected = false;
  }

  isConnected(): boolean {
    return this.connected;
  }
}

function objectSchema(
  properties: Record<string, { type: string; description: string }>,
  required: string[]
): Tool["inputSchema"] {
  return { type: "object", properties, required };
}

/**
 * Tool sets for common test scenarios
 */
export const FakeTools = {
  weather: [
    {
      name: "get_forecast",
      description: "Get the weather forecast for a location",
      inputSchema: objectSchema(
        {
          location: { type: "string", description: "City name or coordinates" },
          days: { type: "number", description: "Number of days to forecast" },
        },
        ["location"]
      ),
    },
    {
      name: "get_alerts",
      description: "Get active weather alerts for a region",
      inputSchema: objectSchema({ region: { type: "string", description: "Region code" } }, ["region"]),
    },
  ] satisfies Tool[],

  time: [
    {
      name: "get_current_time",
      description: "Get the current time in a specific timezone",
      inputSchema: objectSchema(
        { timezone: { type: "string", description: "IANA timezone name" } },
        ["timezone"]
      ),
    },
    {
      name: "convert_time",
      description: "Convert time between timezones",
      inputSchema: objectSchema(
        {
          time: { type: "string", description: "Time in HH:MM format" },
          source_timezone: { type: "string", description: "Source timezone" },
          target_timezone: { type: "string", description: "Target timezone" },
        },
        ["time", "source_timezone", "target_timezone"]
      ),
    },
  ] satisfies Tool[],

  calculator: [
    {
      name: "add",
      description: "Add two numbers",
      inputSchema: objectSchema(
        {
          a: { type: "number", description: "First number" },
          b: { type: "number", description: "Second number" },
        },
        ["a", "b"]
      ),
    },
    {
      name: "multiply",
      description: "Multiply two numbers",
      inputSchema: objectSchema(
        {
          a: { type: "number", description: "First number" },
          b: { type: "number", description: "Second number" },
        },
        ["a", "b"]
      ),
    },
  ] satisfies Tool[],
};

function textResult(value: unknown): ToolCallResult {
  return { content: [{ type: "text", text: JSON.stringify(value) }] };
}

/**
 * Tool call handlers with deterministic responses
 */
export const FakeToolHandlers = {
  weather: async (name: string, args: Record<string, unknown>): Promise<ToolCallResult> => {
    const place = typeof args.location === "string" ? args.location : String(args.region ?? "");
    if (name === "get_forecast") return textResult({ location: place, forecast: "sunny" });
    if (name === "get_alerts") return textResult({ region: place, alerts: [] });
    throw new Error(`Unknown tool: ${name}`);
  },

  calculator: async (name: string, args: Record<string, unknown>): Promise<ToolCallResult> => {
    const a = Number(args.a);
    const b = Number(args.b);
    if (name === "add") return textResult({ result: a + b });
    if (name === "multiply") return textResult({ result: a * b });
    throw new Error(`Unknown tool: ${name}`);
  },
};

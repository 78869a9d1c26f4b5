import { Client } from "@modelcontextprotocol/sdk/client/index.js";
import { StdioClientTransport, getDefaultEnvironment } from "@modelcontextprotocol/sdk/client/stdio.js";
import type { Tool } from "@modelcontextprotocol/sdk/types.js";
import type { LocalMCPServerConfig, MCPClient, ToolCallResult } from "./types";

export const CLIENT_VERSION = "0.1.0";

/**
 * Transport-like interface for DI/testing
 */
export interface ClosableTransport {
  close(): Promise<void>;
}

/**
 * Client-like interface for DI/testing
 */
export interface SdkClientLike {
  connect(transport: ClosableTransport): Promise<void>;
  listTools(): Promise<{ tools: Tool[] }>;
  callTool(request: { name: string; arguments: Record<string, unknown> }): Promise<ToolCallResult>;
}

export type StdioTransportOptions = {
  command: string;
  args: string[];
  env: Record<string, string>;
  stderr: "pipe" | "inherit" | "ignore";
};

export interface LocalMCPClientOptions {
  /** Override Client creation for testing */
  clientFactory?: (name: string) => SdkClientLike;
  /** Override transport creation for testing */
  transportFactory?: (opts: StdioTransportOptions) => ClosableTransport;
}

export function createSdkClient(name: string): SdkClientLike {
  return new Client({ name: `toolgate-client-${name}`, version: CLIENT_VERSION }, {});
}

/**
 * Downstream client for a server spawned as a child process over stdio
 */
export class LocalMCPClient implements MCPClient {
  private readonly client: SdkClientLike;
  private transport: ClosableTransport | null = null;
  private readonly name: string;
  private readonly config: LocalMCPServerConfig;
  private readonly transportFactory: (opts: StdioTransportOptions) => ClosableTransport;

  constructor(config: { name: string } & LocalMCPServerConfig, options?: LocalMCPClientOptions) {
    this.name = config.name;
    this.config = config;
    this.transportFactory = options?.transportFactory ?? (opts => new StdioClientTransport(opts));
    this.client = (options?.clientFactory ?? createSdkClient)(this.name);
  }

  async connect(): Promise<void> {
    if (!this.config.command) {
      throw new Error(`Local MCP server ${this.name} has no command`);
    }

    this.transport = this.transportFactory({
      command: this.config.command,
      args: this.config.args,
      env: { ...getDefaultEnvironment(), ...this.config.env },
      stderr: "pipe",
    });

    await this.client.connect(this.transport);
  }

  async listTools(): Promise<Tool[]> {
    const result = await this.client.listTools();
    return result.tools;
  }

  async callTool(name: string, args: Record<string, unknown>): Promise<ToolCallResult> {
    return this.client.callTool({ name, arguments: args });
  }

  async close(): Promise<void> {
    if (this.transport) {
      const transport = this.transport;
      this.transport = null;
      await transport.close();
    }
  }

  isConnected(): boolean {
    return this.transport !== null;
  }
}

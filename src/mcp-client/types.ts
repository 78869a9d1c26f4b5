import type { Tool } from "@modelcontextprotocol/sdk/types.js";
import type { ToolDefinition } from "../catalog/types";
import type { ServerRegistration } from "../registry/types";

/**
 * Raw result of a downstream tools/call, passed through untouched
 */
export type ToolCallResult = { [key: string]: unknown };

export type LocalMCPServerConfig = {
  type: "local";
  command: string;
  args: string[];
  env?: Record<string, string>;
};

export type RemoteMCPServerConfig = {
  type: "remote";
  url: string;
  headers?: Record<string, string>;
};

export type MCPServerConfig = LocalMCPServerConfig | RemoteMCPServerConfig;

export type MCPClient = {
  connect(): Promise<void>;
  listTools(): Promise<Tool[]>;
  callTool(name: string, args: Record<string, unknown>): Promise<ToolCallResult>;
  close(): Promise<void>;
};

/**
 * Everything the gateway needs from downstream servers.
 *
 * Failures are GatewayErrors: "connection_error" or "timeout" when the server
 * cannot be reached in time, "remote_error" for protocol-level errors.
 */
export interface DownstreamTransport {
  discoverTools(server: ServerRegistration): Promise<ToolDefinition[]>;
  callTool(
    server: ServerRegistration,
    toolName: string,
    args: Record<string, unknown>,
    authHeaders: Record<string, string>
  ): Promise<ToolCallResult>;
  /** Close pooled connections of one server */
  disconnect(serverName: string): Promise<void>;
  closeAll(): Promise<void>;
}

import { ErrorCode, McpError } from "@modelcontextprotocol/sdk/types.js";
import { LRUCache } from "lru-cache";
import { normalizeTools } from "../catalog/catalog";
import type { ToolDefinition } from "../catalog/types";
import type { ConnectionConfig } from "../config/schema";
import { GatewayError, errorMessage } from "../errors";
import type { Logger } from "../logger";
import { noopLogger } from "../logger";
import type { ServerRegistration } from "../registry/types";
import { withTimeout } from "../util/async";
import { LocalMCPClient } from "./local";
import { RemoteMCPClient } from "./remote";
import type { DownstreamTransport, MCPClient, MCPServerConfig, ToolCallResult } from "./types";

/**
 * Factory function type for creating MCP clients.
 * Used for dependency injection in tests.
 */
export type MCPClientFactory = (server: ServerRegistration, headers: Record<string, string>) => MCPClient;

export type McpDownstreamTransportOptions = {
  connection: ConnectionConfig;
  clientFactory?: MCPClientFactory;
  /** Upper bound on pooled stateful connections; least recently used are closed first (default 32) */
  maxPooled?: number;
  logger?: Logger;
};

type PoolEntry = { serverName: string; client: Promise<MCPClient> };

/**
 * Client config for a registration, with the headers to send on HTTP
 */
export function toClientConfig(server: ServerRegistration, headers: Record<string, string>): MCPServerConfig {
  if (server.transport.type === "stdio") {
    return {
      type: "local",
      command: server.transport.command,
      args: server.transport.args,
      env: server.transport.env,
    };
  }
  return { type: "remote", url: server.transport.url, headers };
}

/**
 * Map a downstream failure onto a gateway error code.
 * Protocol errors answered by the server are "remote_error"; anything that
 * prevented an answer is a "connection_error".
 */
export function classifyDownstreamError(error: unknown, serverName: string): GatewayError {
  if (error instanceof GatewayError) {
    return error;
  }
  if (error instanceof McpError) {
    if (error.code === ErrorCode.RequestTimeout) {
      return new GatewayError("timeout", `Request to ${serverName} timed out`, { cause: error });
    }
    if (error.code === ErrorCode.ConnectionClosed) {
      return new GatewayError("connection_error", `Connection to ${serverName} closed`, { cause: error });
    }
    return new GatewayError("remote_error", error.message, {
      cause: error,
      details: { server: serverName, code: error.code },
    });
  }
  return new GatewayError("connection_error", `Cannot reach ${serverName}: ${errorMessage(error)}`, {
    cause: error,
  });
}

/**
 * Pool key of a stateful connection. Stdio servers never see headers, so
 * they get one process per server whatever the caller's auth.
 */
export function poolKey(server: ServerRegistration, headers: Record<string, string>): string {
  if (server.transport.type === "stdio") {
    return server.name;
  }
  const entries = Object.entries(headers).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
  return `${server.name}\u0000${JSON.stringify(entries)}`;
}

/**
 * DownstreamTransport over MCP SDK clients.
 *
 * Stateful HTTP servers keep one connected client per (server, auth headers)
 * pair and stateful stdio servers one per server, in a bounded LRU pool;
 * stateless servers get a fresh connection per request, closed afterwards.
 */
export class McpDownstreamTransport implements DownstreamTransport {
  private readonly pool: LRUCache<string, PoolEntry>;
  private readonly clientFactory: MCPClientFactory;
  private readonly connection: ConnectionConfig;
  private readonly logger: Logger;

  constructor(options: McpDownstreamTransportOptions) {
    this.connection = options.connection;
    this.logger = options.logger ?? noopLogger;
    this.clientFactory = options.clientFactory ?? this.defaultClientFactory.bind(this);
    this.pool = new LRUCache<string, PoolEntry>({
      max: options.maxPooled ?? 32,
      dispose: (entry, _key, reason) => {
        // Explicit deletes release the client themselves
        if (reason === "evict") {
          this.logger.debug(`Closing least recently used connection to ${entry.serverName}`);
          void this.release(entry.client, entry.serverName);
        }
      },
    });
  }

  private defaultClientFactory(server: ServerRegistration, headers: Record<string, string>): MCPClient {
    const config = toClientConfig(server, headers);
    if (config.type === "local") {
      return new LocalMCPClient({ name: server.name, ...config });
    }
    return new RemoteMCPClient({ name: server.name, ...config }, { logger: this.logger });
  }

  async discoverTools(server: ServerRegistration): Promise<ToolDefinition[]> {
    const tools = await this.withClient(server, server.headers ?? {}, client =>
      withTimeout(
        client.listTools(),
        this.connection.requestTimeout,
        `Listing tools from ${server.name} timed out after ${this.connection.requestTimeout}ms`
      )
    );
    return normalizeTools(server.name, tools);
  }

  async callTool(
    server: ServerRegistration,
    toolName: string,
    args: Record<string, unknown>,
    authHeaders: Record<string, string>
  ): Promise<ToolCallResult> {
    return this.withClient(server, authHeaders, client => client.callTool(toolName, args));
  }

  async disconnect(serverName: string): Promise<void> {
    const entries = Array.from(this.pool.entries()).filter(([, entry]) => entry.serverName === serverName);
    for (const [key] of entries) {
      this.pool.delete(key);
    }
    await Promise.all(entries.map(([, entry]) => this.release(entry.client, serverName)));
  }

  async closeAll(): Promise<void> {
    const entries = Array.from(this.pool.values());
    this.pool.clear();
    await Promise.all(entries.map(entry => this.release(entry.client, entry.serverName)));
  }

  /** Number of pooled connections (stateful servers only) */
  get pooled(): number {
    return this.pool.size;
  }

  private async withClient<T>(
    server: ServerRegistration,
    headers: Record<string, string>,
    operation: (client: MCPClient) => Promise<T>
  ): Promise<T> {
    if (server.connectionMode === "stateless") {
      const client = await this.connect(server, headers);
      try {
        return await operation(client);
      } catch (error) {
        throw classifyDownstreamError(error, server.name);
      } finally {
        await this.release(Promise.resolve(client), server.name);
      }
    }

    const key = poolKey(server, headers);
    let entry = this.pool.get(key);
    if (!entry) {
      const connectHeaders = server.transport.type === "stdio" ? {} : headers;
      entry = { serverName: server.name, client: this.connect(server, connectHeaders) };
      this.pool.set(key, entry);
    }

    let client: MCPClient;
    try {
      client = await entry.client;
    } catch (error) {
      this.evict(key, entry.client);
      throw error;
    }

    try {
      return await operation(client);
    } catch (error) {
      const classified = classifyDownstreamError(error, server.name);
      if (classified.code === "connection_error") {
        // Drop the broken connection so the next attempt reconnects
        if (this.evict(key, entry.client)) {
          await this.release(entry.client, server.name);
        }
      }
      throw classified;
    }
  }

  private async connect(server: ServerRegistration, headers: Record<string, string>): Promise<MCPClient> {
    const client = this.clientFactory(server, headers);
    try {
      await withTimeout(
        client.connect(),
        this.connection.connectTimeout,
        `Connection to ${server.name} timed out after ${this.connection.connectTimeout}ms`
      );
    } catch (error) {
      await this.release(Promise.resolve(client), server.name);
      if (error instanceof GatewayError) {
        throw error;
      }
      throw new GatewayError("connection_error", `Failed to connect to ${server.name}: ${errorMessage(error)}`, {
        cause: error,
      });
    }
    this.logger.debug(`Connected to ${server.name}`, { mode: server.connectionMode });
    return client;
  }

  private evict(key: string, client: Promise<MCPClient>): boolean {
    if (this.pool.get(key)?.client === client) {
      this.pool.delete(key);
      return true;
    }
    return false;
  }

  private async release(client: Promise<MCPClient>, serverName: string): Promise<void> {
    try {
      await (await client).close();
    } catch (error) {
      this.logger.debug(`Ignoring close failure for ${serverName}`, { error: errorMessage(error) });
    }
  }
}

import { SSEClientTransport } from "@modelcontextprotocol/sdk/client/sse.js";
import { StreamableHTTPClientTransport } from "@modelcontextprotocol/sdk/client/streamableHttp.js";
import type { Tool } from "@modelcontextprotocol/sdk/types.js";
import type { Logger } from "../logger";
import { noopLogger } from "../logger";
import { createSdkClient } from "./local";
import type { ClosableTransport, SdkClientLike } from "./local";
import type { MCPClient, RemoteMCPServerConfig, ToolCallResult } from "./types";

export type RemoteTransportType = "streamable-http" | "sse";

export interface RemoteMCPClientOptions {
  /** Override Client creation for testing */
  clientFactory?: (name: string) => SdkClientLike;
  /** Override StreamableHTTP transport creation for testing */
  streamableTransportFactory?: (url: URL, headers?: Record<string, string>) => ClosableTransport;
  /** Override SSE transport creation for testing */
  sseTransportFactory?: (url: URL, headers: Record<string, string>) => ClosableTransport;
  logger?: Logger;
}

/**
 * Downstream client for an HTTP server.
 * Tries Streamable HTTP first and falls back to SSE.
 */
export class RemoteMCPClient implements MCPClient {
  private client: SdkClientLike;
  private transport: ClosableTransport | null = null;
  private transportType: RemoteTransportType | null = null;
  private readonly name: string;
  private readonly config: RemoteMCPServerConfig;
  private readonly options: RemoteMCPClientOptions;
  private readonly logger: Logger;

  constructor(config: { name: string } & RemoteMCPServerConfig, options?: RemoteMCPClientOptions) {
    this.name = config.name;
    this.config = config;
    this.options = options ?? {};
    this.logger = this.options.logger ?? noopLogger;
    this.client = this.createClient();
  }

  private createClient(): SdkClientLike {
    return (this.options.clientFactory ?? createSdkClient)(this.name);
  }

  private createStreamableTransport(url: URL): ClosableTransport {
    if (this.options.streamableTransportFactory) {
      return this.options.streamableTransportFactory(url, this.config.headers);
    }
    return new StreamableHTTPClientTransport(url, { requestInit: { headers: this.config.headers } });
  }

  private createSSETransport(url: URL, headers: Record<string, string>): ClosableTransport {
    if (this.options.sseTransportFactory) {
      return this.options.sseTransportFactory(url, headers);
    }
    return new SSEClientTransport(url, { requestInit: { headers } });
  }

  async connect(): Promise<void> {
    if (!this.config.url) {
      throw new Error(`Remote MCP server ${this.name} has no URL`);
    }

    const url = new URL(this.config.url);
    this.transportType = null;

    const streamable = this.createStreamableTransport(url);
    try {
      await this.client.connect(streamable);
      this.transport = streamable;
      this.transportType = "streamable-http";
      return;
    } catch (error) {
      this.logger.debug(`Streamable HTTP failed for ${this.name}, falling back to SSE`, {
        error: error instanceof Error ? error.message : String(error),
      });
      await this.closeQuietly(streamable);
      // A client cannot be reconnected after a failed connect
      this.client = this.createClient();
    }

    const sse = this.createSSETransport(url, { Accept: "text/event-stream", ...this.config.headers });
    try {
      await this.client.connect(sse);
      this.transport = sse;
      this.transportType = "sse";
    } catch (error) {
      await this.closeQuietly(sse);
      this.transport = null;
      this.transportType = null;
      throw error;
    }
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
    this.transportType = null;
  }

  getTransportType(): RemoteTransportType | null {
    return this.transportType;
  }

  private async closeQuietly(transport: ClosableTransport): Promise<void> {
    try {
      await transport.close();
    } catch (error) {
      this.logger.debug(`Ignoring close failure for ${this.name}`, {
        error: error instanceof Error ? error.message : String(error),
      });
    }
  }
}

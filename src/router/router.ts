import { parseNamespacedName } from "../catalog/catalog";
import type { NamespacedName, ToolDefinition } from "../catalog/types";
import type { SchemaCache } from "../cache/schema-cache";
import type { ConnectionConfig } from "../config/schema";
import { GatewayError, envelope } from "../errors";
import type { Envelope } from "../errors";
import type { Logger } from "../logger";
import { noopLogger } from "../logger";
import { classifyDownstreamError } from "../mcp-client/transport";
import type { DownstreamTransport, ToolCallResult } from "../mcp-client/types";
import type { ServerRecord, ServerRegistration } from "../registry/types";
import { backoffDelay, sleep, withTimeout } from "../util/async";

export type RouteOptions = {
  /** Authorization header value that replaces the server's static headers */
  authOverride?: string;
  signal?: AbortSignal;
};

export interface RouteLookup {
  getServer(name: string): Promise<ServerRecord | undefined>;
  getTool(name: NamespacedName): Promise<ToolDefinition | undefined>;
}

export interface ActivationLookup {
  isActive(name: NamespacedName): boolean;
}

export type RouterOptions = {
  registry: RouteLookup;
  tracker: ActivationLookup;
  cache: SchemaCache;
  transport: DownstreamTransport;
  connection: ConnectionConfig;
  logger?: Logger;
  /** Delay between retries (for testing) */
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
};

/**
 * Headers sent downstream: a per-call override wins, then the server's
 * static headers, then nothing.
 */
export function resolveAuthHeaders(
  server: Pick<ServerRegistration, "headers">,
  authOverride?: string
): Record<string, string> {
  if (authOverride) {
    return { Authorization: authOverride };
  }
  return { ...server.headers };
}

function isTransient(error: GatewayError): boolean {
  return error.code === "connection_error" || error.code === "timeout";
}

/**
 * Resolves a namespaced tool name to its server and forwards the call
 */
export class Router {
  private readonly registry: RouteLookup;
  private readonly tracker: ActivationLookup;
  private readonly cache: SchemaCache;
  private readonly transport: DownstreamTransport;
  private readonly connection: ConnectionConfig;
  private readonly logger: Logger;
  private readonly sleep: (ms: number, signal?: AbortSignal) => Promise<void>;

  constructor(options: RouterOptions) {
    this.registry = options.registry;
    this.tracker = options.tracker;
    this.cache = options.cache;
    this.transport = options.transport;
    this.connection = options.connection;
    this.logger = options.logger ?? noopLogger;
    this.sleep = options.sleep ?? sleep;
  }

  call(name: string, args: Record<string, unknown>, options: RouteOptions = {}): Promise<Envelope<ToolCallResult>> {
    return envelope(() => this.route(name, args, options));
  }

  /**
   * Input schema of a routable tool, read through the cache
   */
  async getSchema(name: NamespacedName): Promise<Record<string, unknown>> {
    const cached = this.cache.get(name);
    if (cached) {
      return cached;
    }

    const definition = await this.registry.getTool(name);
    if (!definition) {
      throw new GatewayError("not_found", `Tool '${name}' not found`);
    }
    this.cache.put(name, definition.inputSchema);
    return definition.inputSchema;
  }

  private async route(name: string, args: Record<string, unknown>, options: RouteOptions): Promise<ToolCallResult> {
    const parsed = parseNamespacedName(name);
    if (!parsed) {
      throw new GatewayError("invalid_request", `Invalid tool name '${name}': expected <server>__<tool>`);
    }

    const server = await this.registry.getServer(parsed.serverName);
    if (!server) {
      throw new GatewayError("not_found", `Server '${parsed.serverName}' not found`);
    }
    if (!this.tracker.isActive(parsed.namespacedName)) {
      throw new GatewayError("not_found", `Tool '${name}' is not active; search for it first`);
    }

    const headers = resolveAuthHeaders(server, options.authOverride);
    await this.getSchema(parsed.namespacedName);

    return this.forward(server, parsed.toolName, args, headers, options.signal);
  }

  private async forward(
    server: ServerRecord,
    toolName: string,
    args: Record<string, unknown>,
    headers: Record<string, string>,
    signal?: AbortSignal
  ): Promise<ToolCallResult> {
    const maxAttempts = this.connection.retryAttempts + 1;
    const timeout = this.connection.requestTimeout;

    for (let attempt = 1; ; attempt++) {
      try {
        const result = await withTimeout(
          this.transport.callTool(server, toolName, args, headers),
          timeout,
          `Tool execution timed out after ${timeout}ms`,
          signal
        );
        if (result.isError === true) {
          throw new GatewayError("remote_error", `Tool '${toolName}' on ${server.name} returned an error`, {
            details: { result },
          });
        }
        return result;
      } catch (error) {
        const failure = classifyDownstreamError(error, server.name);
        if (!isTransient(failure) || attempt >= maxAttempts) {
          throw failure;
        }

        const delay = backoffDelay(this.connection.retryDelay, attempt);
        this.logger.warn(`Retrying ${server.name}__${toolName} after ${failure.code}`, {
          attempt,
          maxAttempts,
          delayMs: delay,
        });
        await this.sleep(delay, signal);
      }
    }
  }
}

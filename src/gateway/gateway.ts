import { EventEmitter } from "events";
import { CapabilityTable } from "../activation/capability-table";
import { DeferredActivationTracker } from "../activation/tracker";
import { SchemaCache } from "../cache/schema-cache";
import { toToolMetadata, toolSignature } from "../catalog/catalog";
import type { NamespacedName, ToolDefinition, ToolMetadata } from "../catalog/types";
import { ServerRegistrationSchema } from "../config/schema";
import type { GatewaySettings, LoadingMode, ServerConfig } from "../config/schema";
import { GatewayError, envelope, errorMessage, fail, ok } from "../errors";
import type { Envelope } from "../errors";
import type { Logger } from "../logger";
import { noopLogger } from "../logger";
import type { DownstreamTransport, ToolCallResult } from "../mcp-client/types";
import { Profiler } from "../profiler/profiler";
import type { PerformanceReport } from "../profiler/profiler";
import { ServerRegistry } from "../registry/registry";
import type { SkippedEntry } from "../registry/registry";
import type { ServerRecord, ServerRegistration } from "../registry/types";
import { Router } from "../router/router";
import { SearchIndex } from "../search/search-index";
import type { RebuildReport } from "../search/search-index";
import type { StorageBackend } from "../storage/types";
import { SlidingWindowRateLimiter } from "./rate-limit";

export type SearchMode = "bm25" | "regex";

export type ToolReference = {
  type: "tool_reference";
  tool_name: NamespacedName;
};

export type SearchedTool = ToolReference & {
  description: string;
  input_schema: Record<string, unknown>;
  signature: string;
  score: number;
};

export type SearchResponse = {
  tool_references: ToolReference[];
  tools: SearchedTool[];
  total_matches: number;
  query: string;
  search_type: SearchMode;
  /** Tools that became callable because of this search */
  activated: NamespacedName[];
};

export type RegisterResult = {
  server: ServerRecord;
  toolCount: number;
};

export type RemoveResult = {
  name: string;
  removedTools: number;
};

export type RebuildResult = {
  indexed: number;
  skipped: { storage: SkippedEntry[]; index: RebuildReport["skipped"] };
  durationMs: number;
};

export type RestoreResult = {
  servers: number;
  tools: number;
  active: number;
};

export type GatewayStatus = {
  servers: {
    total: number;
    active: number;
    failed: number;
    unknown: number;
    details: Array<{
      name: string;
      status: ServerRecord["status"];
      transport: ServerRegistration["transport"]["type"];
      connectionMode: ServerRegistration["connectionMode"];
      loadingMode: LoadingMode;
      toolCount: number;
      error: string | null;
    }>;
  };
  tools: {
    indexed: number;
    active: number;
    dormant: number;
  };
  cache: ReturnType<SchemaCache["stats"]>;
  health: { status: "healthy" | "degraded" | "unknown"; message: string };
};

export type GatewayPerformance = PerformanceReport & {
  indexStats: ReturnType<SearchIndex["getStats"]>;
  cache: ReturnType<SchemaCache["stats"]>;
  config: {
    connectTimeout: number;
    requestTimeout: number;
    retryAttempts: number;
    defaultLoadingMode: LoadingMode;
  };
};

/**
 * Events emitted by Gateway
 */
export interface GatewayEvents {
  "server:registered": (record: ServerRecord) => void;
  "server:removed": (serverName: string) => void;
  /** Discovery against a registered server failed */
  "server:error": (serverName: string, error: string) => void;
  "tool:activated": (name: NamespacedName) => void;
}

export type GatewayOptions = {
  settings: GatewaySettings;
  storage: StorageBackend;
  transport: DownstreamTransport;
  logger?: Logger;
  profiler?: Profiler;
  /** Wall clock in milliseconds */
  now?: () => number;
  /** Delay between call retries (for testing) */
  sleep?: (ms: number) => Promise<void>;
};

export type CallOptions = {
  authOverride?: string;
  signal?: AbortSignal;
  caller?: string;
};

const ANONYMOUS_CALLER = "anonymous";

/**
 * Aggregates downstream MCP servers behind search and routed calls.
 *
 * Every public operation returns an envelope; nothing throws across this
 * boundary.
 */
export class Gateway extends EventEmitter {
  readonly registry: ServerRegistry;
  readonly index: SearchIndex;
  readonly cache: SchemaCache;
  readonly capabilities: CapabilityTable;
  readonly tracker: DeferredActivationTracker;
  readonly router: Router;
  readonly profiler: Profiler;

  private readonly settings: GatewaySettings;
  private readonly storage: StorageBackend;
  private readonly transport: DownstreamTransport;
  private readonly logger: Logger;
  private readonly limiter: SlidingWindowRateLimiter;
  private readonly now: () => number;

  constructor(options: GatewayOptions) {
    super();
    this.settings = options.settings;
    this.storage = options.storage;
    this.transport = options.transport;
    this.logger = options.logger ?? noopLogger;
    this.profiler = options.profiler ?? new Profiler();
    this.now = options.now ?? Date.now;

    const now = this.now;
    this.registry = new ServerRegistry(this.storage, { logger: this.logger, now: () => new Date(now()) });
    this.index = new SearchIndex(this.settings.search, { logger: this.logger });
    this.cache = new SchemaCache({ ...this.settings.cache, now });
    this.capabilities = new CapabilityTable();
    this.limiter = new SlidingWindowRateLimiter(this.settings.rateLimit.requestsPerMinute);

    this.tracker = new DeferredActivationTracker(
      this.registry,
      this.capabilities,
      name => (args, context) =>
        this.callTool(name, args, { authOverride: context.authHeader, signal: context.signal, caller: context.caller }),
      {
        logger: this.logger,
        onActivated: name => {
          this.profiler.recordActivations(1);
          this.emit("tool:activated", name);
        },
      }
    );

    this.router = new Router({
      registry: this.registry,
      tracker: this.tracker,
      cache: this.cache,
      transport: this.transport,
      connection: this.settings.connection,
      logger: this.logger,
      sleep: options.sleep,
    });
  }

  /**
   * Register a downstream server and, unless told otherwise, discover its
   * tools. A failed discovery keeps the registration with status "error".
   */
  async registerServer(
    input: unknown,
    options: { overwrite?: boolean; discover?: boolean } = {}
  ): Promise<Envelope<RegisterResult>> {
    return envelope(async () => {
      const registration = this.parseRegistration(input);
      if (options.overwrite) {
        await this.transport.disconnect(registration.name);
      }

      const record = await this.registry.register(registration, { overwrite: options.overwrite });
      this.logger.info(`Registered server ${record.name}`, {
        transport: record.transport.type,
        connectionMode: record.connectionMode,
        loadingMode: record.loadingMode,
      });
      this.emit("server:registered", record);

      if (options.discover === false) {
        return { server: record, toolCount: record.toolCount };
      }
      return this.discover(record);
    });
  }

  /**
   * Register every enabled server from the config file, replacing any
   * stored registration of the same name
   */
  async registerConfiguredServers(
    servers: Record<string, ServerConfig>
  ): Promise<Record<string, Envelope<RegisterResult>>> {
    const enabled = Object.entries(servers).filter(([, config]) => config.enabled);
    const results = await Promise.all(
      enabled.map(async ([name, config]) => {
        const result = await this.registerServer({ ...config, name }, { overwrite: true });
        if (!result.success) {
          this.logger.warn(`Failed to register configured server ${name}: ${result.error.message}`);
        }
        return [name, result] as const;
      })
    );
    return Object.fromEntries(results);
  }

  /**
   * Rediscover a server's tools and replace its tool set
   */
  async refreshServer(name: string): Promise<Envelope<RegisterResult>> {
    return envelope(async () => {
      const record = await this.registry.requireServer(name);
      await this.transport.disconnect(name);
      return this.discover(record);
    });
  }

  /**
   * Remove a server and everything derived from it
   */
  async removeServer(name: string): Promise<Envelope<RemoveResult>> {
    return envelope(async () => {
      const removed = await this.registry.remove(name);
      if (!removed) {
        throw new GatewayError("not_found", `Server '${name}' not found`);
      }

      const removedTools = this.index.removeServer(name);
      this.tracker.removeServer(name);
      this.cache.removeServer(name);
      this.profiler.recordIncrementalUpdate(-removedTools);
      this.profiler.removeServer(name);
      await this.transport.disconnect(name);

      this.logger.info(`Removed server ${name}`, { removedTools });
      this.emit("server:removed", name);
      return { name, removedTools };
    });
  }

  /**
   * Search the catalog. Every returned tool is activated before the
   * response is produced.
   */
  async search(
    query: string,
    options: { mode?: SearchMode; maxResults?: number; caller?: string } = {}
  ): Promise<Envelope<SearchResponse>> {
    const mode = options.mode ?? "bm25";
    const denied = this.checkRateLimit(options.caller);
    if (denied) {
      return denied;
    }

    const timer = this.profiler.startTimer(`search.${mode}`);
    const result = await envelope(async (): Promise<SearchResponse> => {
      const hits =
        mode === "regex"
          ? this.index.searchRegex(query, options.maxResults)
          : this.index.searchBm25(query, options.maxResults);

      const tools: SearchedTool[] = [];
      for (const hit of hits) {
        const definition = await this.registry.getTool(hit.namespacedName);
        if (!definition) {
          this.logger.warn(`Search hit ${hit.namespacedName} has no stored definition`);
          continue;
        }
        this.cache.put(definition.namespacedName, definition.inputSchema);
        tools.push({
          type: "tool_reference",
          tool_name: definition.namespacedName,
          description: definition.description,
          input_schema: definition.inputSchema,
          signature: toolSignature(definition),
          score: hit.score,
        });
      }

      const activated = await this.tracker.activate(tools.map(tool => tool.tool_name));
      // A server removed while this search ran leaves hits that never activated
      const live = tools.filter(tool => this.tracker.isActive(tool.tool_name));

      return {
        tool_references: live.map(tool => ({ type: tool.type, tool_name: tool.tool_name })),
        tools: live,
        total_matches: live.length,
        query,
        search_type: mode,
        activated,
      };
    });
    const duration = timer();

    if (result.success) {
      this.logger.info(
        `${mode} search completed: "${query}" -> ${result.data.total_matches} results in ${duration.toFixed(2)}ms`,
        { searchType: mode, resultsCount: result.data.total_matches, activated: result.data.activated.length }
      );
    } else {
      this.logger.warn(`${mode} search failed: "${query}" -> ${result.error.message}`, { code: result.error.code });
    }
    return result;
  }

  /**
   * Invoke an active tool through the router
   */
  async callTool(
    name: string,
    args: Record<string, unknown>,
    options: CallOptions = {}
  ): Promise<Envelope<ToolCallResult>> {
    const denied = this.checkRateLimit(options.caller);
    if (denied) {
      return denied;
    }

    const timer = this.profiler.startTimer("tool.execute");
    const result = await this.router.call(name, args, {
      authOverride: options.authOverride,
      signal: options.signal,
    });
    const duration = timer();

    if (result.success) {
      this.logger.info(`Tool executed successfully: ${name} in ${duration.toFixed(2)}ms`, { durationMs: duration });
    } else {
      this.logger.error(`Tool execution failed: ${name}: ${result.error.message}`, {
        code: result.error.code,
        durationMs: duration,
      });
    }
    return result;
  }

  /**
   * Rebuild the search index from stored metadata
   */
  async rebuildIndex(): Promise<Envelope<RebuildResult>> {
    return envelope(async () => (await this.rebuild()).result);
  }

  /**
   * Rebuild the index and activation state from storage: tools of eager
   * servers become active, tools of deferred servers dormant
   */
  async restore(): Promise<Envelope<RestoreResult>> {
    return envelope(async () => {
      const start = this.now();
      const servers = await this.registry.listServers();
      const { result, entries } = await this.rebuild();

      const byServer = new Map<string, NamespacedName[]>();
      for (const entry of entries) {
        const names = byServer.get(entry.serverName) ?? [];
        names.push(entry.namespacedName);
        byServer.set(entry.serverName, names);
      }

      for (const server of servers) {
        await this.tracker.discover(server.name, byServer.get(server.name) ?? [], server.loadingMode);
      }

      const restored = { servers: servers.length, tools: result.indexed, active: this.tracker.listActive().length };
      this.profiler.recordRestore(this.now() - start, restored.servers, restored.tools);
      this.logger.info(`Restored ${restored.servers} servers and ${restored.tools} tools from storage`, restored);
      return restored;
    });
  }

  async getStatus(): Promise<Envelope<GatewayStatus>> {
    return envelope(async (): Promise<GatewayStatus> => {
      const servers = await this.registry.listServers();
      const active = servers.filter(s => s.status === "active").length;
      const failed = servers.filter(s => s.status === "error").length;
      const counts = this.tracker.counts();

      return {
        servers: {
          total: servers.length,
          active,
          failed,
          unknown: servers.length - active - failed,
          details: servers.map(server => ({
            name: server.name,
            status: server.status,
            transport: server.transport.type,
            connectionMode: server.connectionMode,
            loadingMode: server.loadingMode,
            toolCount: server.toolCount,
            error: server.errorMessage ?? null,
          })),
        },
        tools: {
          indexed: this.index.size,
          active: counts.active,
          dormant: counts.dormant,
        },
        cache: this.cache.stats(),
        health: {
          status: servers.length === 0 ? "unknown" : failed === 0 ? "healthy" : "degraded",
          message:
            servers.length === 0
              ? "No servers registered"
              : failed === 0
                ? "All servers reachable"
                : `${failed} server(s) failed discovery`,
        },
      };
    });
  }

  getPerformance(): Envelope<GatewayPerformance> {
    return ok({
      ...this.profiler.export(),
      indexStats: this.index.getStats(),
      cache: this.cache.stats(),
      config: {
        connectTimeout: this.settings.connection.connectTimeout,
        requestTimeout: this.settings.connection.requestTimeout,
        retryAttempts: this.settings.connection.retryAttempts,
        defaultLoadingMode: this.settings.defaultLoadingMode,
      },
    });
  }

  async close(): Promise<void> {
    await this.transport.closeAll();
    await this.storage.close();
    this.removeAllListeners();
  }

  private parseRegistration(input: unknown): ServerRegistration {
    const parsed = ServerRegistrationSchema.safeParse(input);
    if (!parsed.success) {
      const issues = parsed.error.issues.map(issue => `${issue.path.join(".") || "input"}: ${issue.message}`);
      throw new GatewayError("invalid_request", `Invalid server registration: ${issues.join(", ")}`, {
        details: { issues },
      });
    }

    const data = parsed.data;
    const common = {
      name: data.name,
      connectionMode: data.connectionMode ?? this.settings.defaultConnectionMode,
      loadingMode: data.loadingMode ?? this.settings.defaultLoadingMode,
      ...(data.headers ? { headers: data.headers } : {}),
    };

    if (data.transport === "http") {
      return { ...common, url: data.url, transport: { type: "http", url: data.url } };
    }
    return {
      ...common,
      url: data.url ?? [data.command, ...data.args].join(" "),
      transport: {
        type: "stdio",
        command: data.command,
        args: data.args,
        ...(data.env ? { env: data.env } : {}),
      },
    };
  }

  private async discover(server: ServerRecord): Promise<RegisterResult> {
    const start = this.now();
    let tools: ToolDefinition[];

    try {
      tools = await this.transport.discoverTools(server);
    } catch (error) {
      const message = errorMessage(error);
      const updated = await this.registry.updateStatus(server.name, "error", message);
      this.profiler.recordServerDiscovery(server.name, this.now() - start, 0, "error", message);
      this.logger.warn(`Server ${server.name} failed discovery: ${message}`);
      this.emit("server:error", server.name, message);
      return { server: updated, toolCount: updated.toolCount };
    }

    await this.registry.storeTools(server.name, tools);
    const updated = await this.registry.updateStatus(server.name, "active");
    await this.applyToolSet(server.name, tools, server.loadingMode);

    const duration = this.now() - start;
    this.profiler.recordServerDiscovery(server.name, duration, tools.length, "active");
    this.logger.info(`Server ${server.name} discovered, indexed ${tools.length} tools in ${duration}ms`);
    return { server: updated, toolCount: tools.length };
  }

  private async applyToolSet(serverName: string, tools: ToolDefinition[], loadingMode: LoadingMode): Promise<void> {
    const removed = this.index.removeServer(serverName);
    this.index.upsertMany(tools.map(toToolMetadata));
    this.profiler.recordIncrementalUpdate(tools.length - removed);

    this.cache.removeServer(serverName);
    for (const tool of tools) {
      this.cache.put(tool.namespacedName, tool.inputSchema);
    }

    await this.tracker.discover(
      serverName,
      tools.map(tool => tool.namespacedName),
      loadingMode
    );
  }

  private async rebuild(): Promise<{ result: RebuildResult; entries: ToolMetadata[] }> {
    const { entries, skipped } = await this.registry.getAllToolMetadata();
    const report = await this.index.rebuild(entries);
    this.profiler.recordIndexBuild(report.durationMs, report.indexed);

    if (skipped.length > 0 || report.skipped.length > 0) {
      this.logger.warn(`Index rebuilt with skipped entries`, {
        storage: skipped.length,
        index: report.skipped.length,
      });
    }

    return {
      result: {
        indexed: report.indexed,
        skipped: { storage: skipped, index: report.skipped },
        durationMs: report.durationMs,
      },
      entries,
    };
  }

  private checkRateLimit(caller: string | undefined): Envelope<never> | null {
    const key = caller ?? ANONYMOUS_CALLER;
    const verdict = this.limiter.check(key, this.now());
    if (verdict.allowed) {
      return null;
    }
    this.logger.warn(`Rate limit exceeded for ${key}`, { retryAfterMs: verdict.retryAfterMs });
    return fail("rate_limited", `Rate limit exceeded; retry in ${verdict.retryAfterMs}ms`, {
      retryAfterMs: verdict.retryAfterMs,
    });
  }
}


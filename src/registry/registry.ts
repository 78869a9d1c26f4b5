import type { z } from "zod";
import { parseNamespacedName, toToolMetadata } from "../catalog/catalog";
import { SEP } from "../catalog/types";
import type { NamespacedName, ToolDefinition, ToolMetadata } from "../catalog/types";
import { GatewayError, errorMessage } from "../errors";
import type { Logger } from "../logger";
import { noopLogger } from "../logger";
import type { StorageBackend } from "../storage/types";
import { KeyedMutex } from "../util/keyed-mutex";
import { ServerRecordSchema, ToolDefinitionSchema, ToolMetadataSchema } from "./types";
import type { ServerRecord, ServerRegistration, ServerStatus } from "./types";

/**
 * Storage keys:
 * - toolgate:server:{name}           server record
 * - toolgate:tools:{name}            full tool definitions for a server
 * - toolgate:meta:{namespacedName}   compact metadata for one tool
 */
const SERVER_PREFIX = "toolgate:server:";
const TOOLS_PREFIX = "toolgate:tools:";
const META_PREFIX = "toolgate:meta:";

export type SkippedEntry = { key: string; reason: string };

export type RegistryOptions = {
  logger?: Logger;
  now?: () => Date;
};

/**
 * Registry of downstream servers and their tools.
 *
 * Every operation touching one server runs under that server's lock, so
 * readers never observe a half-written tool set, and concurrent writes to
 * the same server apply one after the other. Operations on different servers
 * proceed independently.
 */
export class ServerRegistry {
  private readonly locks = new KeyedMutex();
  private readonly logger: Logger;
  private readonly now: () => Date;

  constructor(private readonly storage: StorageBackend, options?: RegistryOptions) {
    this.logger = options?.logger ?? noopLogger;
    this.now = options?.now ?? (() => new Date());
  }

  /**
   * Register a server. Fails with "already_exists" unless overwrite is set.
   * Overwriting replaces the record but keeps the stored tool set.
   */
  async register(
    registration: ServerRegistration,
    options?: { overwrite?: boolean }
  ): Promise<ServerRecord> {
    return this.locks.run(registration.name, async () => {
      const existing = await this.readServer(registration.name);
      if (existing && !options?.overwrite) {
        throw new GatewayError("already_exists", `Server '${registration.name}' already registered`);
      }

      const record: ServerRecord = {
        ...registration,
        registeredAt: this.now().toISOString(),
        status: "unknown",
        toolCount: existing?.toolCount ?? 0,
      };

      await this.storage.set(serverKey(registration.name), JSON.stringify(record));
      return record;
    });
  }

  async getServer(name: string): Promise<ServerRecord | undefined> {
    return this.locks.run(name, () => this.readServer(name));
  }

  async requireServer(name: string): Promise<ServerRecord> {
    const server = await this.getServer(name);
    if (!server) {
      throw new GatewayError("not_found", `Server '${name}' not found`);
    }
    return server;
  }

  async listServers(): Promise<ServerRecord[]> {
    const keys = await this.storage.listKeys(SERVER_PREFIX);
    const servers: ServerRecord[] = [];

    for (const key of keys) {
      const server = await this.getServer(key.slice(SERVER_PREFIX.length));
      if (server) {
        servers.push(server);
      }
    }

    return servers;
  }

  async updateStatus(name: string, status: ServerStatus, message?: string): Promise<ServerRecord> {
    return this.locks.run(name, async () => {
      const server = await this.readServer(name);
      if (!server) {
        throw new GatewayError("not_found", `Server '${name}' not found`);
      }

      const { errorMessage: _previous, ...rest } = server;
      const updated: ServerRecord = message ? { ...rest, status, errorMessage: message } : { ...rest, status };
      await this.storage.set(serverKey(name), JSON.stringify(updated));
      return updated;
    });
  }

  /**
   * Replace the full tool set of a server together with its metadata
   */
  async storeTools(serverName: string, tools: ToolDefinition[]): Promise<void> {
    for (const tool of tools) {
      if (tool.serverName !== serverName) {
        throw new GatewayError(
          "invalid_request",
          `Tool '${tool.namespacedName}' does not belong to server '${serverName}'`
        );
      }
    }

    await this.locks.run(serverName, async () => {
      const server = await this.readServer(serverName);
      if (!server) {
        throw new GatewayError("not_found", `Server '${serverName}' not found`);
      }

      await this.storage.set(toolsKey(serverName), JSON.stringify(tools));

      const keep = new Set<string>();
      for (const tool of tools) {
        const key = metaKey(tool.namespacedName);
        keep.add(key);
        await this.storage.set(key, JSON.stringify(toToolMetadata(tool)));
      }

      for (const key of await this.listMetaKeys(serverName)) {
        if (!keep.has(key)) {
          await this.storage.delete(key);
        }
      }

      await this.storage.set(serverKey(serverName), JSON.stringify({ ...server, toolCount: tools.length }));
    });
  }

  async getTools(serverName: string): Promise<ToolDefinition[]> {
    return this.locks.run(serverName, async () => {
      const server = await this.readServer(serverName);
      if (!server) {
        throw new GatewayError("not_found", `Server '${serverName}' not found`);
      }
      return this.readTools(serverName);
    });
  }

  /**
   * Full definition of one tool, or undefined when the server or tool is unknown
   */
  async getTool(name: NamespacedName): Promise<ToolDefinition | undefined> {
    const parsed = parseNamespacedName(name);
    if (!parsed) return undefined;

    return this.locks.run(parsed.serverName, async () => {
      const tools = await this.readTools(parsed.serverName);
      return tools.find(tool => tool.namespacedName === name);
    });
  }

  async storeToolMetadata(meta: ToolMetadata): Promise<void> {
    await this.locks.run(meta.serverName, async () => {
      if (!(await this.readServer(meta.serverName))) {
        throw new GatewayError("not_found", `Server '${meta.serverName}' not found`);
      }
      await this.storage.set(metaKey(meta.namespacedName), JSON.stringify(meta));
    });
  }

  async getToolMetadata(name: NamespacedName): Promise<ToolMetadata | undefined> {
    const parsed = parseNamespacedName(name);
    if (!parsed) return undefined;

    return this.locks.run(parsed.serverName, async () => {
      const raw = await this.storage.get(metaKey(name));
      if (raw === undefined) return undefined;

      const result = parseStored(raw, ToolMetadataSchema);
      if (!result.ok) {
        this.logger.warn(`Ignoring malformed metadata for ${name}`, { reason: result.reason });
        return undefined;
      }
      return result.value;
    });
  }

  /**
   * Metadata for every tool of every registered server.
   * Malformed stored entries are reported in `skipped` rather than thrown.
   */
  async getAllToolMetadata(): Promise<{ entries: ToolMetadata[]; skipped: SkippedEntry[] }> {
    const entries: ToolMetadata[] = [];
    const skipped: SkippedEntry[] = [];

    for (const key of await this.storage.listKeys(SERVER_PREFIX)) {
      const serverName = key.slice(SERVER_PREFIX.length);

      await this.locks.run(serverName, async () => {
        for (const metaStorageKey of await this.listMetaKeys(serverName)) {
          const raw = await this.storage.get(metaStorageKey);
          if (raw === undefined) continue;

          const result = parseStored(raw, ToolMetadataSchema);
          if (result.ok) {
            entries.push(result.value);
          } else {
            skipped.push({ key: metaStorageKey, reason: result.reason });
          }
        }
      });
    }

    for (const entry of skipped) {
      this.logger.warn(`Skipping malformed tool metadata`, entry);
    }

    return { entries, skipped };
  }

  /**
   * Remove all tool metadata for a server; returns the number of entries removed
   */
  async removeToolMetadata(serverName: string): Promise<number> {
    return this.locks.run(serverName, () => this.deleteMetadata(serverName));
  }

  /**
   * Remove a server with its tools and metadata
   */
  async remove(serverName: string): Promise<boolean> {
    return this.locks.run(serverName, async () => {
      if (!(await this.readServer(serverName))) {
        return false;
      }

      await this.deleteMetadata(serverName);
      await this.storage.delete(toolsKey(serverName));
      await this.storage.delete(serverKey(serverName));
      return true;
    });
  }

  private async readServer(name: string): Promise<ServerRecord | undefined> {
    const raw = await this.storage.get(serverKey(name));
    if (raw === undefined) return undefined;

    const result = parseStored(raw, ServerRecordSchema);
    if (!result.ok) {
      throw new GatewayError("unavailable", `Stored record for server '${name}' is corrupt: ${result.reason}`);
    }
    return result.value;
  }

  private async readTools(serverName: string): Promise<ToolDefinition[]> {
    const raw = await this.storage.get(toolsKey(serverName));
    if (raw === undefined) return [];

    let items: unknown;
    try {
      items = JSON.parse(raw);
    } catch (error) {
      throw new GatewayError("unavailable", `Stored tools for '${serverName}' are corrupt: ${errorMessage(error)}`);
    }
    if (!Array.isArray(items)) {
      throw new GatewayError("unavailable", `Stored tools for '${serverName}' are corrupt: expected an array`);
    }

    const tools: ToolDefinition[] = [];
    for (const item of items) {
      const result = ToolDefinitionSchema.safeParse(item);
      if (result.success) {
        tools.push(result.data);
      } else {
        this.logger.warn(`Skipping malformed tool definition for ${serverName}`, {
          reason: result.error.issues.map(i => i.message).join(", "),
        });
      }
    }
    return tools;
  }

  private async listMetaKeys(serverName: string): Promise<string[]> {
    const keys = await this.storage.listKeys(`${META_PREFIX}${serverName}${SEP}`);
    return keys.filter(key => parseNamespacedName(key.slice(META_PREFIX.length))?.serverName === serverName);
  }

  private async deleteMetadata(serverName: string): Promise<number> {
    const keys = await this.listMetaKeys(serverName);
    for (const key of keys) {
      await this.storage.delete(key);
    }
    return keys.length;
  }
}

function serverKey(name: string): string {
  return `${SERVER_PREFIX}${name}`;
}

function toolsKey(name: string): string {
  return `${TOOLS_PREFIX}${name}`;
}

function metaKey(name: NamespacedName): string {
  return `${META_PREFIX}${name}`;
}

type ParseOutcome<T> = { ok: true; value: T } | { ok: false; reason: string };

function parseStored<T>(raw: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>): ParseOutcome<T> {
  let value: unknown;
  try {
    value = JSON.parse(raw);
  } catch (error) {
    return { ok: false, reason: `invalid JSON: ${errorMessage(error)}` };
  }

  const result = schema.safeParse(value);
  if (!result.success) {
    return { ok: false, reason: result.error.issues.map(issue => issue.message).join(", ") };
  }
  return { ok: true, value: result.data };
}

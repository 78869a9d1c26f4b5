import { parseNamespacedName } from "../catalog/catalog";
import type { NamespacedName, ToolDefinition } from "../catalog/types";
import type { LoadingMode } from "../config/schema";
import type { Logger } from "../logger";
import { noopLogger } from "../logger";
import type { ToolExposure, ToolHandler } from "./capability-table";

export type ToolState = "discovered" | "dormant" | "active";

/**
 * Read access to tool definitions used for existence checks
 */
export interface ToolSource {
  getTool(name: NamespacedName): Promise<ToolDefinition | undefined>;
}

export type TrackerOptions = {
  logger?: Logger;
  /** Called once per tool when it becomes callable */
  onActivated?: (name: NamespacedName) => void;
};

/**
 * Tracks which discovered tools are callable.
 *
 * Eager tools are exposed at discovery; deferred tools stay dormant until
 * something activates them (usually a search hit). Concurrent activations of
 * the same tool share one in-flight transition, so the exposure side effect
 * runs at most once.
 */
export class DeferredActivationTracker {
  private readonly states = new Map<NamespacedName, ToolState>();
  private readonly inFlight = new Map<NamespacedName, Promise<NamespacedName | null>>();
  // Bumped on removeServer so transitions started before it are discarded
  private readonly epochs = new Map<string, number>();
  private readonly logger: Logger;
  private readonly onActivated?: (name: NamespacedName) => void;

  constructor(
    private readonly tools: ToolSource,
    private readonly exposure: ToolExposure,
    private readonly createHandler: (name: NamespacedName) => ToolHandler,
    options?: TrackerOptions
  ) {
    this.logger = options?.logger ?? noopLogger;
    this.onActivated = options?.onActivated;
  }

  /**
   * Record a server's current tool set. Tools of the server that are no
   * longer present are dropped; tools already active stay active.
   */
  async discover(
    serverName: string,
    names: NamespacedName[],
    loadingMode: LoadingMode
  ): Promise<NamespacedName[]> {
    const current = new Set(names);
    for (const name of this.namesForServer(serverName)) {
      if (!current.has(name)) {
        this.drop(name);
      }
    }

    for (const name of names) {
      if (this.states.get(name) !== "active") {
        this.states.set(name, "discovered");
      }
    }

    if (loadingMode === "eager") {
      return this.activate(names);
    }

    for (const name of names) {
      if (this.states.get(name) === "discovered") {
        this.states.set(name, "dormant");
      }
    }
    return [];
  }

  /**
   * Make tools callable. Returns only the names this call newly activated;
   * unknown names and names already active are skipped.
   */
  async activate(names: Iterable<NamespacedName>): Promise<NamespacedName[]> {
    const unique = Array.from(new Set(names));
    const results = await Promise.all(unique.map(name => this.activateOne(name)));
    return results.filter((name): name is NamespacedName => name !== null);
  }

  getState(name: NamespacedName): ToolState | undefined {
    return this.states.get(name);
  }

  isActive(name: NamespacedName): boolean {
    return this.states.get(name) === "active";
  }

  listActive(): NamespacedName[] {
    const active: NamespacedName[] = [];
    for (const [name, state] of this.states) {
      if (state === "active") active.push(name);
    }
    return active.sort();
  }

  /**
   * Forget every tool of a server and withdraw the exposed ones
   */
  removeServer(serverName: string): NamespacedName[] {
    this.epochs.set(serverName, this.epoch(serverName) + 1);
    const removed = this.namesForServer(serverName);
    for (const name of removed) {
      this.drop(name);
    }
    return removed;
  }

  counts(): Record<ToolState, number> {
    const counts: Record<ToolState, number> = { discovered: 0, dormant: 0, active: 0 };
    for (const state of this.states.values()) {
      counts[state]++;
    }
    return counts;
  }

  private activateOne(name: NamespacedName): Promise<NamespacedName | null> {
    if (this.states.get(name) === "active") {
      return Promise.resolve(null);
    }

    const pending = this.inFlight.get(name);
    if (pending) {
      // Only the caller that started the transition reports it
      return pending.then(() => null);
    }

    const transition = this.transition(name).finally(() => {
      this.inFlight.delete(name);
    });
    this.inFlight.set(name, transition);
    return transition;
  }

  private async transition(name: NamespacedName): Promise<NamespacedName | null> {
    const parsed = parseNamespacedName(name);
    if (!parsed) {
      this.logger.debug(`Skipping activation of malformed name ${name}`);
      return null;
    }

    const epoch = this.epoch(parsed.serverName);
    const definition = await this.tools.getTool(name);

    if (!definition) {
      this.logger.debug(`Skipping activation of unknown tool ${name}`);
      return null;
    }
    if (epoch !== this.epoch(parsed.serverName)) {
      this.logger.debug(`Discarding activation of ${name}: server removed meanwhile`);
      return null;
    }
    if (this.states.get(name) === "active") {
      return null;
    }

    this.states.set(name, "active");
    this.exposure.registerCallable(
      name,
      { description: definition.description, inputSchema: definition.inputSchema },
      this.createHandler(name)
    );
    this.logger.debug(`Activated ${name}`);
    this.onActivated?.(name);
    return name;
  }

  private drop(name: NamespacedName): void {
    if (this.states.get(name) === "active") {
      this.exposure.unregisterCallable(name);
    }
    this.states.delete(name);
  }

  private namesForServer(serverName: string): NamespacedName[] {
    const names: NamespacedName[] = [];
    for (const name of this.states.keys()) {
      if (parseNamespacedName(name)?.serverName === serverName) {
        names.push(name);
      }
    }
    return names;
  }

  private epoch(serverName: string): number {
    return this.epochs.get(serverName) ?? 0;
  }
}

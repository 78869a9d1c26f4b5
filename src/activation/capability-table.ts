import type { NamespacedName } from "../catalog/types";
import type { Envelope } from "../errors";

export type CallContext = {
  /** Per-call Authorization header value */
  authHeader?: string;
  /** Rate-limit key of the consumer making the call */
  caller?: string;
  signal?: AbortSignal;
};

export type ToolHandler = (
  args: Record<string, unknown>,
  context: CallContext
) => Promise<Envelope<unknown>>;

export type CallableSchema = {
  description: string;
  inputSchema: Record<string, unknown>;
};

export type Capability = CallableSchema & {
  name: NamespacedName;
  handler: ToolHandler;
};

/**
 * Surface through which activated tools become callable
 */
export interface ToolExposure {
  registerCallable(name: NamespacedName, schema: CallableSchema, handler: ToolHandler): void;
  unregisterCallable(name: NamespacedName): void;
}

export type CapabilityChange = { type: "added" | "removed"; name: NamespacedName };

/**
 * Explicit name → handler table of callable tools.
 * Entries are added only through activation.
 */
export class CapabilityTable implements ToolExposure {
  private readonly entries = new Map<string, Capability>();
  private readonly listeners = new Set<(change: CapabilityChange) => void>();

  registerCallable(name: NamespacedName, schema: CallableSchema, handler: ToolHandler): void {
    this.entries.set(name, { name, ...schema, handler });
    this.notify({ type: "added", name });
  }

  unregisterCallable(name: NamespacedName): void {
    if (this.entries.delete(name)) {
      this.notify({ type: "removed", name });
    }
  }

  get(name: string): Capability | undefined {
    return this.entries.get(name);
  }

  has(name: string): boolean {
    return this.entries.has(name);
  }

  list(): Capability[] {
    return Array.from(this.entries.values()).sort((a, b) =>
      a.name < b.name ? -1 : a.name > b.name ? 1 : 0
    );
  }

  get size(): number {
    return this.entries.size;
  }

  /**
   * Subscribe to additions and removals; returns an unsubscribe function
   */
  onChange(listener: (change: CapabilityChange) => void): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  private notify(change: CapabilityChange): void {
    for (const listener of this.listeners) {
      listener(change);
    }
  }
}

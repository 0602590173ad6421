/**
 * Provider Registry & Simulated Provider
 *
 * The registry routes every call to the adapter registered for the node's
 * kind prefix (`aws` for `aws_vpc`). The simulated provider keeps resources
 * in memory and is what the CLI uses out of the box.
 */

import { createHash, randomBytes } from "node:crypto";
import { ProviderError } from "./errors.js";
import type {
  AttributeChange,
  ConcreteAttributes,
  ProviderAdapter,
  ProviderContext,
  RecordedResource,
  ResolvedNode,
} from "./types.js";

/** Text before the first `_` of a kind, or the whole kind. */
export function kindPrefix(kind: string): string {
  const index = kind.indexOf("_");
  return index === -1 ? kind : kind.slice(0, index);
}

// =============================================================================
// Registry
// =============================================================================

export class ProviderRegistry implements ProviderAdapter {
  private adapters = new Map<string, ProviderAdapter>();
  private fallback: ProviderAdapter | null = null;

  register(prefix: string, adapter: ProviderAdapter): this {
    if (this.adapters.has(prefix)) {
      throw new Error(`Provider for prefix "${prefix}" is already registered`);
    }
    this.adapters.set(prefix, adapter);
    return this;
  }

  /** Adapter used for kinds without a registered prefix. */
  setFallback(adapter: ProviderAdapter): this {
    this.fallback = adapter;
    return this;
  }

  prefixes(): string[] {
    return [...this.adapters.keys()];
  }

  /**
   * @throws ProviderError if no adapter handles the kind.
   */
  resolve(kind: string, address: string): ProviderAdapter {
    const adapter = this.adapters.get(kindPrefix(kind)) ?? this.fallback;
    if (!adapter) {
      throw new ProviderError(address, `No provider registered for kind "${kind}" (prefix "${kindPrefix(kind)}")`);
    }
    return adapter;
  }

  create(node: ResolvedNode, ctx: ProviderContext): Promise<ConcreteAttributes> {
    return this.resolve(node.kind, node.address).create(node, ctx);
  }

  update(node: ResolvedNode, changes: AttributeChange[], ctx: ProviderContext): Promise<ConcreteAttributes> {
    return this.resolve(node.kind, node.address).update(node, changes, ctx);
  }

  delete(resource: RecordedResource, ctx: ProviderContext): Promise<void> {
    return this.resolve(resource.kind, resource.address).delete(resource, ctx);
  }

  read(node: ResolvedNode, ctx: ProviderContext): Promise<ConcreteAttributes> {
    const adapter = this.resolve(node.kind, node.address);
    if (!adapter.read) {
      throw new ProviderError(node.address, `Provider for "${node.kind}" cannot read data sources`);
    }
    return adapter.read(node, ctx);
  }
}

// =============================================================================
// Simulated Provider
// =============================================================================

export type SimulatedOperation = "create" | "update" | "delete" | "read";

export interface SimulatedProviderOptions {
  /** Delay before every call completes, or per address. */
  latencyMs?: number | Record<string, number>;
  /** Calls that fail, as `operation:address` or a bare address (any operation). */
  failOn?: string[];
  /** Attributes returned for data sources, by kind. */
  dataSources?: Record<string, ConcreteAttributes>;
  /** Id generator; defaults to `<type>-<8 hex>`. */
  generateId?: (kind: string) => string;
  region?: string;
  accountId?: string;
}

export interface SimulatedCall {
  operation: SimulatedOperation;
  address: string;
}

/**
 * In-memory adapter. Assigns `id` and `arn` on create, merges changes on
 * update and forgets resources on delete. Update and delete work from the
 * recorded attributes, so a fresh instance can manage existing state.
 */
export class SimulatedProvider implements ProviderAdapter {
  private readonly options: SimulatedProviderOptions;
  private readonly store = new Map<string, ConcreteAttributes>();
  /** Every call in the order it was received. */
  readonly calls: SimulatedCall[] = [];

  constructor(options: SimulatedProviderOptions = {}) {
    this.options = options;
  }

  async create(node: ResolvedNode, ctx: ProviderContext): Promise<ConcreteAttributes> {
    await this.simulate("create", node.address, ctx);
    const id = (this.options.generateId ?? defaultId)(node.kind);
    const attributes: ConcreteAttributes = { ...node.attributes, id, arn: this.arn(node.kind, id) };
    this.store.set(node.address, attributes);
    ctx.logger.debug(`Created ${node.address}`, { id });
    return { ...attributes };
  }

  async update(node: ResolvedNode, changes: AttributeChange[], ctx: ProviderContext): Promise<ConcreteAttributes> {
    await this.simulate("update", node.address, ctx);
    const current = this.store.get(node.address) ?? node.prior ?? {};
    const attributes: ConcreteAttributes = { ...current, ...node.attributes };
    this.store.set(node.address, attributes);
    ctx.logger.debug(`Updated ${node.address}`, { fields: changes.map((c) => c.path) });
    return { ...attributes };
  }

  async delete(resource: RecordedResource, ctx: ProviderContext): Promise<void> {
    await this.simulate("delete", resource.address, ctx);
    this.store.delete(resource.address);
    ctx.logger.debug(`Deleted ${resource.address}`);
  }

  async read(node: ResolvedNode, ctx: ProviderContext): Promise<ConcreteAttributes> {
    await this.simulate("read", node.address, ctx);
    const found = this.options.dataSources?.[node.kind] ?? {};
    return { ...node.attributes, id: stableId(node.kind, node.address), ...found };
  }

  /** Resources currently held, by address. */
  resources(): Record<string, ConcreteAttributes> {
    return Object.fromEntries(this.store.entries());
  }

  private async simulate(operation: SimulatedOperation, address: string, ctx: ProviderContext): Promise<void> {
    this.calls.push({ operation, address });

    const { latencyMs } = this.options;
    const delay = typeof latencyMs === "number" ? latencyMs : (latencyMs?.[address] ?? 0);
    if (delay > 0) await sleep(delay, ctx.signal);
    if (ctx.signal.aborted) throw abortReason(ctx.signal);

    const failOn = this.options.failOn ?? [];
    if (failOn.includes(address) || failOn.includes(`${operation}:${address}`)) {
      throw new Error(`Simulated ${operation} failure for ${address}`);
    }
  }

  private arn(kind: string, id: string): string {
    const parts = kind.split("_").slice(1);
    const service = parts.length > 0 ? parts[0] : kind;
    const type = parts.length > 1 ? parts.slice(1).join("-") : service;
    const region = this.options.region ?? "us-east-1";
    const account = this.options.accountId ?? "000000000000";
    return `arn:sim:${service}:${region}:${account}:${type}/${id}`;
  }
}

function idType(kind: string): string {
  const type = kind.includes("_") ? kind.slice(kind.indexOf("_") + 1) : kind;
  return type.replace(/_/g, "-");
}

function defaultId(kind: string): string {
  return `${idType(kind)}-${randomBytes(4).toString("hex")}`;
}

/** Same address, same id: repeated reads of a data source agree. */
function stableId(kind: string, address: string): string {
  return `${idType(kind)}-${createHash("sha256").update(address).digest("hex").slice(0, 8)}`;
}

function abortReason(signal: AbortSignal): Error {
  return signal.reason instanceof Error ? signal.reason : new Error("Operation aborted");
}

function sleep(ms: number, signal: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal.aborted) {
      reject(abortReason(signal));
      return;
    }
    const onAbort = (): void => {
      clearTimeout(timer);
      reject(abortReason(signal));
    };
    const timer = setTimeout(() => {
      signal.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    signal.addEventListener("abort", onAbort, { once: true });
  });
}

/**
 * Resource Graph: Executor
 *
 * Walks a plan and drives the provider adapter:
 * - Refuses plans computed against another state version
 * - Resolves references against live state right before each call
 * - Bounds every provider call with a timeout and the caller's AbortSignal
 * - Skips everything downstream of a failed item, keeps going elsewhere
 * - Serializes state commits and persistence through a single writer
 * - Emits lifecycle events
 */

import type { Logger } from "../../../src/logging/index.js";
import { createSilentLogger } from "../../../src/logging/index.js";
import {
  PartialApplyError,
  ProviderError,
  StackplanError,
  StalePlanError,
  TimeoutError,
  errorMessage,
} from "./errors.js";
import { resolveOutputs, stateLookup } from "./outputs.js";
import { dependencyAddresses } from "./references.js";
import type { StateBackend } from "./state-backend.js";
import type { RecordedState } from "./state.js";
import type {
  ApplyEvent,
  ApplyEventListener,
  ApplyStatus,
  ConcreteAttributes,
  ItemResult,
  ItemStatus,
  Plan,
  PlanItem,
  ProviderAdapter,
  ProviderContext,
  RecordedOutput,
  ResolvedNode,
  StateEntry,
} from "./types.js";
import { deepEqual, resolveConcreteAttributes } from "./values.js";

// =============================================================================
// Options
// =============================================================================

export type PersistMode = "per-item" | "end";

export interface ExecutorOptions {
  /** Per provider call; 0 disables the timeout. */
  timeoutMs: number;
  /** Items in flight at once; 1 applies strictly in plan order. */
  concurrency: number;
  /** Cancels the whole apply. */
  signal?: AbortSignal;
  logger: Logger;
  /** Where state is persisted; without one the caller persists the result. */
  backend?: StateBackend;
  persist: PersistMode;
}

const DEFAULT_OPTIONS: ExecutorOptions = {
  timeoutMs: 300_000,
  concurrency: 1,
  logger: createSilentLogger("executor"),
  persist: "per-item",
};

export interface ApplyResult {
  status: ApplyStatus;
  /** State reflecting exactly the applied items. */
  state: RecordedState;
  items: ItemResult[];
  outputs: Record<string, RecordedOutput>;
  error?: PartialApplyError;
  startedAt: string;
  completedAt: string;
  durationMs: number;
}

// =============================================================================
// Serial Writer
// =============================================================================

/** Runs tasks one at a time, in submission order. */
export class SerialWriter {
  private tail: Promise<void> = Promise.resolve();

  run<T>(task: () => Promise<T> | T): Promise<T> {
    const next = this.tail.then(task);
    this.tail = next.then(
      () => undefined,
      () => undefined,
    );
    return next;
  }
}

// =============================================================================
// Executor
// =============================================================================

export class Executor {
  private readonly provider: ProviderAdapter;
  private readonly options: ExecutorOptions;
  private listeners: ApplyEventListener[] = [];

  constructor(provider: ProviderAdapter, options: Partial<ExecutorOptions> = {}) {
    this.provider = provider;
    this.options = { ...DEFAULT_OPTIONS, ...options };
    if (!Number.isInteger(this.options.concurrency) || this.options.concurrency < 1) {
      throw new RangeError(`concurrency must be a positive integer, got ${this.options.concurrency}`);
    }
  }

  /** Subscribe to apply lifecycle events. */
  on(listener: ApplyEventListener): () => void {
    this.listeners.push(listener);
    return () => {
      this.listeners = this.listeners.filter((l) => l !== listener);
    };
  }

  private emit(event: ApplyEvent): void {
    for (const listener of this.listeners) {
      try {
        listener(event);
      } catch (err) {
        this.options.logger.warn("Apply event listener threw", { event: event.type, error: errorMessage(err) });
      }
    }
  }

  /**
   * Apply `plan` on top of `state`. The input state is not modified.
   *
   * @throws StalePlanError if the plan was computed against another state.
   */
  async apply(plan: Plan, state: RecordedState): Promise<ApplyResult> {
    if (plan.stateSerial !== state.serial || plan.stateLineage !== state.lineage) {
      throw new StalePlanError(
        { serial: plan.stateSerial, lineage: plan.stateLineage },
        { serial: state.serial, lineage: state.lineage },
      );
    }

    const started = Date.now();
    const { logger, signal, backend, persist, concurrency } = this.options;
    const working = state.clone();
    const writer = new SerialWriter();
    const baseSerial = state.serial;
    let changed = false;

    // Per-item saves go out before `working` changes, so a failed save
    // leaves the item out of the returned state as well.
    const commit = (mutate: (s: RecordedState) => boolean): Promise<void> =>
      writer.run(async () => {
        if (backend && persist === "per-item") {
          const next = working.clone();
          if (!mutate(next)) return;
          next.serial = baseSerial + 1;
          await backend.save(next);
        }
        if (!mutate(working)) return;
        changed = true;
        working.serial = baseSerial + 1;
      });

    const statuses = new Map<string, ItemStatus>(plan.items.map((i) => [i.id, "pending"]));
    const results = new Map<string, ItemResult>();
    const followers = new Map<string, string[]>(plan.items.map((i) => [i.id, []]));
    for (const item of plan.items) {
      for (const before of item.after) followers.get(before)?.push(item.id);
    }
    const byId = new Map(plan.items.map((i) => [i.id, i]));

    const skip = (item: PlanItem, reason: string): void => {
      statuses.set(item.id, "skipped");
      results.set(item.id, { itemId: item.id, address: item.address, action: item.action, status: "skipped", durationMs: 0 });
      logger.info(`Skipped ${item.id}: ${reason}`, { resourceId: item.address });
      this.emit({ type: "item:skipped", itemId: item.id, address: item.address, reason, timestamp: new Date().toISOString() });
    };

    const skipDownstream = (failedId: string): void => {
      const queue = [...(followers.get(failedId) ?? [])];
      for (let id = queue.shift(); id !== undefined; id = queue.shift()) {
        const item = byId.get(id);
        if (!item || statuses.get(id) !== "pending") continue;
        skip(item, `depends on ${failedId}, which did not complete`);
        queue.push(...(followers.get(id) ?? []));
      }
    };

    const runItem = async (item: PlanItem): Promise<void> => {
      const itemStarted = Date.now();
      statuses.set(item.id, "in-progress");
      this.emit({ type: "item:start", itemId: item.id, address: item.address, timestamp: new Date().toISOString() });
      const itemLogger = logger.withContext({ resourceId: item.address });
      itemLogger.debug(`Starting ${item.id}`);

      try {
        await this.executeItem(item, plan, working, commit, itemLogger);
        const durationMs = Date.now() - itemStarted;
        statuses.set(item.id, "applied");
        results.set(item.id, { itemId: item.id, address: item.address, action: item.action, status: "applied", durationMs });
        itemLogger.info(`Applied ${item.id}`, { durationMs });
        this.emit({ type: "item:applied", itemId: item.id, address: item.address, durationMs, timestamp: new Date().toISOString() });
      } catch (err) {
        const message = errorMessage(err);
        statuses.set(item.id, "failed");
        results.set(item.id, {
          itemId: item.id,
          address: item.address,
          action: item.action,
          status: "failed",
          durationMs: Date.now() - itemStarted,
          error: message,
          ...(err instanceof StackplanError ? { errorCode: err.code } : {}),
        });
        itemLogger.error(`Failed ${item.id}: ${message}`);
        this.emit({ type: "item:failed", itemId: item.id, address: item.address, error: message, timestamp: new Date().toISOString() });
        skipDownstream(item.id);
      }
    };

    this.emit({ type: "apply:start", total: plan.items.length, timestamp: new Date().toISOString() });
    logger.info(`Applying ${plan.items.length} plan items`, { concurrency, persist });

    const running = new Set<Promise<void>>();
    const isReady = (item: PlanItem): boolean => item.after.every((id) => statuses.get(id) === "applied");

    for (;;) {
      if (signal?.aborted) {
        for (const item of plan.items) {
          if (statuses.get(item.id) === "pending") skip(item, "apply cancelled");
        }
      }

      const pending = plan.items.filter((i) => statuses.get(i.id) === "pending");
      if (pending.length === 0 && running.size === 0) break;

      for (const item of pending) {
        if (running.size >= concurrency) break;
        if (!isReady(item)) {
          if (concurrency === 1) break;
          continue;
        }
        const task: Promise<void> = runItem(item).finally(() => running.delete(task));
        running.add(task);
      }

      if (running.size === 0) {
        // Nothing can start: whatever is left waits on an item that will never apply.
        for (const item of pending) {
          if (statuses.get(item.id) === "pending") skip(item, "prerequisites did not complete");
        }
        continue;
      }
      await Promise.race(running);
    }

    // Outputs reflect whatever made it into state.
    const outputs = plan.destroy ? {} : resolveOutputs(plan.outputs, working);
    await commit((s) => {
      if (outputsEqual(s.getOutputs(), outputs)) return false;
      s.setOutputs(outputs);
      return true;
    });
    if (backend && persist === "end" && changed) {
      await writer.run(() => backend.save(working));
    }

    const items = plan.items.map(
      (item) =>
        results.get(item.id) ?? { itemId: item.id, address: item.address, action: item.action, status: "pending" as const, durationMs: 0 },
    );
    const failed = items.filter((r) => r.status === "failed");
    const skipped = items.filter((r) => r.status === "skipped");
    const applied = items.filter((r) => r.status === "applied" && r.action !== "no-op");

    let status: ApplyStatus;
    if (signal?.aborted) status = "cancelled";
    else if (failed.length === 0 && skipped.length === 0) status = "succeeded";
    else if (applied.length > 0) status = "partial";
    else status = "failed";

    const error =
      failed.length > 0 || skipped.length > 0
        ? new PartialApplyError(
            failed.map((r) => ({ itemId: r.itemId, address: r.address, error: r.error ?? "unknown error" })),
            skipped.map((r) => ({ itemId: r.itemId, address: r.address })),
          )
        : undefined;

    const completed = Date.now();
    this.emit({ type: "apply:complete", status, timestamp: new Date(completed).toISOString() });
    logger.info(`Apply ${status}`, {
      applied: applied.length,
      failed: failed.length,
      skipped: skipped.length,
      serial: working.serial,
    });

    return {
      status,
      state: working,
      items,
      outputs: working.getOutputs(),
      ...(error ? { error } : {}),
      startedAt: new Date(started).toISOString(),
      completedAt: new Date(completed).toISOString(),
      durationMs: completed - started,
    };
  }

  // ---------------------------------------------------------------------------
  // Item Execution
  // ---------------------------------------------------------------------------

  private async executeItem(
    item: PlanItem,
    plan: Plan,
    working: RecordedState,
    commit: (mutate: (s: RecordedState) => boolean) => Promise<void>,
    logger: Logger,
  ): Promise<void> {
    const { address } = item;

    if (item.action === "delete") {
      const entry = working.get(address);
      if (!entry) return;
      if (entry.mode === "managed") {
        await this.callProvider(address, logger, (ctx) => this.provider.delete({ ...entry, address }, ctx));
      }
      await commit((s) => s.remove(address));
      return;
    }

    const node = plan.nodes[address];
    if (!node) throw new ProviderError(address, `Plan has no declaration for "${address}"`);
    const dependencies = dependencyAddresses(node);

    if (item.action === "no-op") {
      await commit((s) => {
        const entry = s.get(address);
        if (!entry || deepEqual(entry.dependencies, dependencies)) return false;
        s.set(address, { ...entry, dependencies });
        return true;
      });
      return;
    }

    const prior = item.action === "update" ? (working.get(address)?.attributes ?? null) : null;
    const resolved: ResolvedNode = {
      kind: node.kind,
      name: node.name,
      address,
      mode: node.mode,
      attributes: resolveConcreteAttributes(node.attributes, stateLookup(working, address)),
      prior,
    };

    let returned: ConcreteAttributes;
    switch (item.action) {
      case "create":
        returned = await this.callProvider(address, logger, (ctx) => this.provider.create(resolved, ctx));
        break;
      case "update":
        returned = await this.callProvider(address, logger, (ctx) =>
          this.provider.update(resolved, item.changes, ctx),
        );
        break;
      case "read": {
        const read = this.provider.read?.bind(this.provider);
        if (!read) throw new ProviderError(address, `Provider cannot read data source "${address}"`);
        returned = await this.callProvider(address, logger, (ctx) => read(resolved, ctx));
        break;
      }
      default:
        throw new ProviderError(address, `Unsupported plan action for "${address}"`);
    }

    const attributes = { ...(prior ?? {}), ...resolved.attributes, ...returned };
    await commit((s) => {
      const before = s.get(address);
      const entry = { kind: node.kind, name: node.name, mode: node.mode, attributes, dependencies };
      if (before && entriesEqual(before, entry)) return false;
      s.set(address, entry);
      return true;
    });
  }

  /**
   * Run one provider call under the per-item timeout and the apply-wide
   * signal. Anything the adapter throws becomes a ProviderError.
   */
  private async callProvider<T>(address: string, logger: Logger, call: (ctx: ProviderContext) => Promise<T>): Promise<T> {
    const { timeoutMs, signal } = this.options;
    if (signal?.aborted) throw new ProviderError(address, `Provider call for "${address}" was cancelled`);
    const controller = new AbortController();
    const linked = signal ? linkSignals([signal, controller.signal]) : { signal: controller.signal, dispose: () => {} };
    let timer: ReturnType<typeof setTimeout> | undefined;
    let onAbort: (() => void) | undefined;

    const guards = new Promise<never>((_, reject) => {
      if (timeoutMs > 0) {
        timer = setTimeout(() => {
          const err = new TimeoutError(address, timeoutMs);
          controller.abort(err);
          reject(err);
        }, timeoutMs);
      }
      if (signal) {
        onAbort = () => reject(new ProviderError(address, `Provider call for "${address}" was cancelled`));
        if (signal.aborted) onAbort();
        else signal.addEventListener("abort", onAbort, { once: true });
      }
    });

    try {
      return await Promise.race([call({ signal: linked.signal, logger }), guards]);
    } catch (err) {
      if (err instanceof StackplanError) throw err;
      throw new ProviderError(address, errorMessage(err), err);
    } finally {
      if (timer) clearTimeout(timer);
      if (signal && onAbort) signal.removeEventListener("abort", onAbort);
      linked.dispose();
    }
  }
}

// =============================================================================
// Helpers
// =============================================================================

/**
 * Combine AbortSignals; the result aborts when any of them fires. `dispose`
 * detaches the listeners from the source signals.
 */
export function linkSignals(signals: AbortSignal[]): { signal: AbortSignal; dispose: () => void } {
  const controller = new AbortController();
  const detach: Array<() => void> = [];
  const dispose = (): void => {
    for (const off of detach.splice(0)) off();
  };

  for (const source of signals) {
    if (source.aborted) {
      dispose();
      controller.abort(source.reason);
      return { signal: controller.signal, dispose };
    }
    const onAbort = (): void => {
      dispose();
      controller.abort(source.reason);
    };
    source.addEventListener("abort", onAbort, { once: true });
    detach.push(() => source.removeEventListener("abort", onAbort));
  }
  return { signal: controller.signal, dispose };
}

function entriesEqual(a: StateEntry, b: StateEntry): boolean {
  return (
    a.kind === b.kind &&
    a.name === b.name &&
    a.mode === b.mode &&
    deepEqual(a.attributes, b.attributes) &&
    deepEqual(a.dependencies, b.dependencies)
  );
}

function outputsEqual(a: Record<string, RecordedOutput>, b: Record<string, RecordedOutput>): boolean {
  const keys = Object.keys(a);
  if (keys.length !== Object.keys(b).length) return false;
  return keys.every((key) => {
    const other = b[key];
    return other !== undefined && other.sensitive === a[key].sensitive && deepEqual(other.value, a[key].value);
  });
}

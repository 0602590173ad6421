/**
 * Resource Graph: Planner
 *
 * Diffs the declared graph against recorded state and produces an ordered
 * list of plan items. Planning is pure: neither the graph nor the state is
 * modified, and identical inputs always yield the same plan.
 */

import { diffAttributes } from "./diff.js";
import { UnsafeReplaceError } from "./errors.js";
import { stableTopologicalSort, type DependencyGraph } from "./graph.js";
import { ImmutabilityPolicy } from "./immutability.js";
import type { Reference } from "./nodes.js";
import type { RecordedState } from "./state.js";
import type {
  AttributeChange,
  OutputDeclaration,
  Plan,
  PlanAction,
  PlanItem,
  PlanReason,
  PlanSummary,
  ResourceNode,
  StateEntry,
} from "./types.js";
import { UNKNOWN, getPath, getPlanPath, resolvePlanAttributes, type PlanAttributes, type PlanValue } from "./values.js";

export interface PlanOptions {
  /** Defaults to the bundled immutability table. */
  immutability?: ImmutabilityPolicy;
  /** Plan deletion of every recorded resource. */
  destroy?: boolean;
  /** Declared outputs carried on the plan for resolution after apply. */
  outputs?: OutputDeclaration[];
}

/** How a declared node is classified before items are laid out. */
type Classification =
  | { kind: "create"; changes: AttributeChange[] }
  | { kind: "update"; changes: AttributeChange[] }
  | { kind: "replace"; changes: AttributeChange[] }
  | { kind: "no-op" }
  | { kind: "read" };

export function itemId(action: PlanAction, address: string): string {
  return `${action}:${address}`;
}

// =============================================================================
// Plan
// =============================================================================

/**
 * Compute the plan that converges `state` onto the declarations in `graph`.
 *
 * @throws CycleError if the graph (or the recorded dependencies) contain a cycle.
 * @throws UnsafeReplaceError if a replaced node would leave a dependent behind.
 */
export function plan(graph: DependencyGraph, state: RecordedState, options: PlanOptions = {}): Plan {
  const policy = options.immutability ?? ImmutabilityPolicy.defaults();
  const destroy = options.destroy ?? false;
  const order = graph.topoOrder();

  const classes = new Map<string, Classification>();
  if (!destroy) {
    const planned = new Map<string, PlanAttributes>();
    for (const node of order) {
      const lookup = (reference: Reference): PlanValue =>
        plannedValue(reference, graph, state, classes, planned);
      const resolved = resolvePlanAttributes(node.attributes, lookup);
      planned.set(node.address, resolved);
      classes.set(node.address, classify(node, resolved, state.get(node.address), policy));
    }
  }

  const removed = state.addresses().filter((address) => destroy || !graph.has(address));
  const removedSet = new Set(removed);

  assertSafeReplaces(graph, state, classes, removedSet);

  // ── Items in seed order ───────────────────────────────────────
  const items: PlanItem[] = [];
  const add = (
    node: Pick<StateEntry, "kind" | "name" | "mode">,
    address: string,
    action: PlanAction,
    reason: PlanReason,
    changes: AttributeChange[],
  ): void => {
    items.push({
      id: itemId(action, address),
      address,
      kind: node.kind,
      name: node.name,
      mode: node.mode,
      action,
      reason,
      changes,
      after: [],
    });
  };

  for (const node of order) {
    const c = classes.get(node.address);
    if (!c) continue;
    switch (c.kind) {
      case "create":
        add(node, node.address, "create", "new", c.changes);
        break;
      case "update":
        add(node, node.address, "update", "changed", c.changes);
        break;
      case "replace":
        add(node, node.address, "delete", "replace", []);
        add(node, node.address, "create", "replace", c.changes);
        break;
      case "no-op":
        add(node, node.address, "no-op", "unchanged", []);
        break;
      case "read":
        add(node, node.address, "read", "data", []);
        break;
    }
  }
  for (const address of removed) {
    const entry = state.get(address);
    if (entry) add(entry, address, "delete", "removed", []);
  }

  // ── Ordering constraints ──────────────────────────────────────
  const ids = new Set(items.map((i) => i.id));
  const prerequisites = new Map<string, Set<string>>(items.map((i) => [i.id, new Set<string>()]));
  const mustFollow = (id: string, before: string): void => {
    if (ids.has(before) && before !== id) prerequisites.get(id)?.add(before);
  };
  const applyItemOf = (address: string): string | null => {
    const c = classes.get(address);
    if (!c || c.kind === "no-op") return null;
    if (c.kind === "replace") return itemId("create", address);
    return itemId(c.kind, address);
  };

  // Recorded dependents per address, from state.
  const recordedDependents = new Map<string, string[]>();
  for (const address of state.addresses()) {
    for (const dependency of state.get(address)?.dependencies ?? []) {
      const list = recordedDependents.get(dependency) ?? [];
      list.push(address);
      recordedDependents.set(dependency, list);
    }
  }

  for (const item of items) {
    if (item.action === "create" || item.action === "update" || item.action === "read") {
      for (const dependency of graph.dependenciesOf(item.address)) {
        const before = applyItemOf(dependency);
        if (before) mustFollow(item.id, before);
      }
      if (item.reason === "replace") mustFollow(item.id, itemId("delete", item.address));
    }

    if (item.action === "delete") {
      for (const dependent of recordedDependents.get(item.address) ?? []) {
        mustFollow(item.id, itemId("delete", dependent));
        if (item.reason === "removed") mustFollow(item.id, itemId("update", dependent));
      }
    }
  }

  const sortedIds = stableTopologicalSort(
    items.map((i) => i.id),
    (id) => [...(prerequisites.get(id) ?? [])],
  );
  const position = new Map(sortedIds.map((id, i) => [id, i]));
  const byId = new Map(items.map((i) => [i.id, i]));

  const ordered = sortedIds
    .map((id) => byId.get(id))
    .filter((i): i is PlanItem => i !== undefined)
    .map((item) => ({
      ...item,
      after: [...(prerequisites.get(item.id) ?? [])].sort((a, b) => (position.get(a) ?? 0) - (position.get(b) ?? 0)),
    }));

  return {
    stateSerial: state.serial,
    stateLineage: state.lineage,
    destroy,
    items: ordered,
    nodes: destroy ? {} : Object.fromEntries(order.map((n) => [n.address, n])),
    outputs: destroy ? [] : [...(options.outputs ?? [])],
  };
}

// =============================================================================
// Classification
// =============================================================================

function classify(
  node: ResourceNode,
  resolved: PlanAttributes,
  recorded: StateEntry | undefined,
  policy: ImmutabilityPolicy,
): Classification {
  if (node.mode === "data") return { kind: "read" };

  if (!recorded || recorded.mode !== node.mode) {
    const changes = diffAttributes(node.kind, resolved, {}, policy).map((c) => ({ ...c, forcesReplacement: false }));
    return { kind: "create", changes };
  }

  const changes = diffAttributes(node.kind, resolved, recorded.attributes, policy);
  if (changes.length === 0) return { kind: "no-op" };
  if (changes.some((c) => c.forcesReplacement)) return { kind: "replace", changes };
  return { kind: "update", changes };
}

/**
 * Value a reference will have once the target is applied, as far as it is
 * known at plan time. Computed fields of a data source come from its last
 * recorded read.
 */
function plannedValue(
  reference: Reference,
  graph: DependencyGraph,
  state: RecordedState,
  classes: Map<string, Classification>,
  planned: Map<string, PlanAttributes>,
): PlanValue {
  const target = classes.get(reference.address);
  if (!target || target.kind === "create" || target.kind === "replace") return UNKNOWN;

  const topField = reference.field.split(".")[0];
  const declared = graph.get(reference.address)?.attributes ?? {};
  if (Object.prototype.hasOwnProperty.call(declared, topField)) {
    return getPlanPath(planned.get(reference.address) ?? {}, reference.field) ?? UNKNOWN;
  }
  return getPath(state.get(reference.address)?.attributes ?? {}, reference.field) ?? UNKNOWN;
}

/**
 * A replaced node is deleted before it is re-created. Every node that depends
 * on it must therefore go away first: be replaced itself or be removed.
 */
function assertSafeReplaces(
  graph: DependencyGraph,
  state: RecordedState,
  classes: Map<string, Classification>,
  removed: Set<string>,
): void {
  for (const [address, c] of classes) {
    if (c.kind !== "replace") continue;

    const dependents = new Set(graph.dependentsOf(address));
    for (const other of state.addresses()) {
      if (state.get(other)?.dependencies.includes(address)) dependents.add(other);
    }

    const blocking = [...dependents].filter((dependent) => {
      if (removed.has(dependent)) return false;
      const dc = classes.get(dependent);
      // A new dependent does not exist yet, so nothing is stranded.
      return dc !== undefined && dc.kind !== "replace" && dc.kind !== "read" && dc.kind !== "create";
    });
    if (blocking.length > 0) throw new UnsafeReplaceError(address, blocking.sort());
  }
}

// =============================================================================
// Summary
// =============================================================================

export function summarizePlan(plan: Plan): PlanSummary {
  const summary: PlanSummary = {
    creates: 0,
    updates: 0,
    deletes: 0,
    replaces: 0,
    reads: 0,
    noOps: 0,
    hasDestructiveChanges: false,
  };
  for (const item of plan.items) {
    if (item.reason === "replace") {
      if (item.action === "delete") summary.replaces++;
      continue;
    }
    switch (item.action) {
      case "create":
        summary.creates++;
        break;
      case "update":
        summary.updates++;
        break;
      case "delete":
        if (item.mode === "managed") summary.deletes++;
        break;
      case "read":
        summary.reads++;
        break;
      case "no-op":
        summary.noOps++;
        break;
    }
  }
  summary.hasDestructiveChanges = summary.deletes + summary.replaces > 0;
  return summary;
}

/** True when applying the plan would change nothing. */
export function isEmptyPlan(plan: Plan): boolean {
  return plan.items.every((item) => item.action === "no-op" || item.action === "read");
}

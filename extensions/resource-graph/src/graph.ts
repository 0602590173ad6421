/**
 * Resource Graph: Dependency Graph
 *
 * Directed graph over declared nodes, edges pointing from dependent to
 * dependency. Ordering is deterministic: among nodes whose dependencies are
 * satisfied, the one declared first wins.
 */

import { CycleError } from "./errors.js";
import type { ResourceNode } from "./types.js";

export interface GraphEdge {
  /** Dependent address. */
  from: string;
  /** Dependency address. */
  to: string;
  /** Attribute paths on `from` that reference `to`; empty for explicit dependsOn. */
  fields: string[];
}

// =============================================================================
// Stable Topological Sort (Kahn's algorithm)
// =============================================================================

/**
 * Order `keys` so every key comes after its prerequisites. Ties are broken by
 * position in `keys`. Prerequisites outside `keys` are ignored.
 *
 * @throws CycleError with the cycle path when no complete order exists.
 */
export function stableTopologicalSort(
  keys: readonly string[],
  prerequisites: (key: string) => readonly string[],
): string[] {
  const position = new Map(keys.map((k, i) => [k, i]));
  const remaining = new Map<string, number>();
  const followers = new Map<string, string[]>();

  for (const key of keys) {
    remaining.set(key, 0);
    followers.set(key, []);
  }
  for (const key of keys) {
    for (const pre of new Set(prerequisites(key))) {
      if (!position.has(pre)) continue;
      remaining.set(key, (remaining.get(key) ?? 0) + 1);
      followers.get(pre)?.push(key);
    }
  }

  // Ready keys stay sorted by declaration position.
  const ready = keys.filter((k) => remaining.get(k) === 0);
  const sorted: string[] = [];

  for (let key = ready.shift(); key !== undefined; key = ready.shift()) {
    sorted.push(key);

    for (const follower of followers.get(key) ?? []) {
      const left = (remaining.get(follower) ?? 1) - 1;
      remaining.set(follower, left);
      if (left === 0) insertByPosition(ready, follower, position);
    }
  }

  if (sorted.length < keys.length) {
    const done = new Set(sorted);
    const cycle = findCycle(
      keys.filter((k) => !done.has(k)),
      (key) => prerequisites(key).filter((p) => position.has(p) && !done.has(p)),
    );
    throw new CycleError(cycle);
  }

  return sorted;
}

function insertByPosition(ready: string[], key: string, position: Map<string, number>): void {
  const p = position.get(key) ?? 0;
  let lo = 0;
  let hi = ready.length;
  while (lo < hi) {
    const mid = (lo + hi) >> 1;
    if ((position.get(ready[mid]) ?? 0) < p) lo = mid + 1;
    else hi = mid;
  }
  ready.splice(lo, 0, key);
}

/**
 * DFS over the unsorted remainder. Every remaining key sits on or behind a
 * cycle, so a back edge is always found.
 */
function findCycle(keys: readonly string[], next: (key: string) => readonly string[]): string[] {
  const WHITE = 0, GRAY = 1, BLACK = 2;
  const color = new Map<string, number>(keys.map((k) => [k, WHITE]));
  const stack: string[] = [];

  const visit = (key: string): string[] | null => {
    color.set(key, GRAY);
    stack.push(key);
    for (const dep of next(key)) {
      if (color.get(dep) === GRAY) {
        return [...stack.slice(stack.indexOf(dep)), dep];
      }
      if (color.get(dep) === WHITE) {
        const found = visit(dep);
        if (found) return found;
      }
    }
    stack.pop();
    color.set(key, BLACK);
    return null;
  };

  for (const key of keys) {
    if (color.get(key) !== WHITE) continue;
    const found = visit(key);
    if (found) return found;
  }
  return [...keys];
}

// =============================================================================
// DependencyGraph
// =============================================================================

export class DependencyGraph {
  private readonly nodeList: ResourceNode[];
  private readonly byAddress: Map<string, ResourceNode>;
  private readonly dependencies = new Map<string, string[]>();
  private readonly dependents = new Map<string, string[]>();
  private readonly edgeList: GraphEdge[];

  constructor(nodes: readonly ResourceNode[], edges: readonly GraphEdge[]) {
    this.nodeList = [...nodes];
    this.byAddress = new Map(nodes.map((n) => [n.address, n]));
    this.edgeList = edges.map((e) => ({ ...e, fields: [...e.fields] }));

    for (const node of nodes) {
      this.dependencies.set(node.address, []);
      this.dependents.set(node.address, []);
    }
    for (const edge of edges) {
      const deps = this.dependencies.get(edge.from);
      if (deps && !deps.includes(edge.to)) deps.push(edge.to);
      const users = this.dependents.get(edge.to);
      if (users && !users.includes(edge.from)) users.push(edge.from);
    }
    // Dependents listed in declaration order regardless of edge order.
    const position = new Map(nodes.map((n, i) => [n.address, i]));
    for (const users of this.dependents.values()) {
      users.sort((a, b) => (position.get(a) ?? 0) - (position.get(b) ?? 0));
    }
  }

  /** Nodes in declaration order. */
  nodes(): ResourceNode[] {
    return [...this.nodeList];
  }

  get(address: string): ResourceNode | undefined {
    return this.byAddress.get(address);
  }

  has(address: string): boolean {
    return this.byAddress.has(address);
  }

  get size(): number {
    return this.nodeList.length;
  }

  edges(): GraphEdge[] {
    return this.edgeList.map((e) => ({ ...e, fields: [...e.fields] }));
  }

  dependenciesOf(address: string): string[] {
    return [...(this.dependencies.get(address) ?? [])];
  }

  dependentsOf(address: string): string[] {
    return [...(this.dependents.get(address) ?? [])];
  }

  /** Every node that depends on `address`, directly or transitively, in declaration order. */
  transitiveDependents(address: string): string[] {
    const seen = new Set<string>();
    const queue = [...this.dependentsOf(address)];
    for (let current = queue.shift(); current !== undefined; current = queue.shift()) {
      if (seen.has(current)) continue;
      seen.add(current);
      queue.push(...this.dependentsOf(current));
    }
    return this.nodeList.map((n) => n.address).filter((a) => seen.has(a));
  }

  /** Graphviz DOT, edges pointing from dependent to dependency. */
  toDot(name = "resources"): string {
    const quote = (value: string): string => JSON.stringify(value);
    const lines = [`digraph ${quote(name)} {`, '  rankdir = "RL";'];
    for (const node of this.nodeList) {
      lines.push(`  ${quote(node.address)}${node.mode === "data" ? " [shape=note]" : ""};`);
    }
    for (const edge of this.edgeList) {
      const label = edge.fields.length > 0 ? ` [label=${quote(edge.fields.join(", "))}]` : " [style=dashed]";
      lines.push(`  ${quote(edge.from)} -> ${quote(edge.to)}${label};`);
    }
    lines.push("}");
    return lines.join("\n");
  }

  /**
   * Apply order: every dependency before its dependents, ties broken by
   * declaration order.
   *
   * @throws CycleError if the graph is not acyclic.
   */
  topoOrder(): ResourceNode[] {
    const order = stableTopologicalSort(
      this.nodeList.map((n) => n.address),
      (address) => this.dependencies.get(address) ?? [],
    );
    return order.map((address) => this.byAddress.get(address)).filter((n): n is ResourceNode => n !== undefined);
  }
}

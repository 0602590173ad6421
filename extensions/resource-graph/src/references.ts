/**
 * Reference Resolver
 *
 * Turns reference placeholders and explicit dependsOn entries into graph
 * edges. Resolution is pure: the nodes are not modified.
 */

import { DuplicateIdentityError, UnknownReferenceError } from "./errors.js";
import { DependencyGraph, type GraphEdge } from "./graph.js";
import { DeclarationSet, collectReferences } from "./nodes.js";
import type { ResourceNode } from "./types.js";

/**
 * Build the dependency graph for a declaration set.
 *
 * @throws DuplicateIdentityError if two nodes share an address.
 * @throws UnknownReferenceError for the first reference whose target is not declared.
 */
export function resolveReferences(declarations: DeclarationSet | readonly ResourceNode[]): DependencyGraph {
  const nodes = declarations instanceof DeclarationSet ? declarations.nodes() : [...declarations];

  const known = new Set<string>();
  for (const node of nodes) {
    if (known.has(node.address)) throw new DuplicateIdentityError(node.address);
    known.add(node.address);
  }

  const edges: GraphEdge[] = [];
  for (const node of nodes) {
    const byTarget = new Map<string, GraphEdge>();

    for (const [field, value] of Object.entries(node.attributes)) {
      for (const { path, reference } of collectReferences(value, field)) {
        const target = reference.address;
        if (!known.has(target)) throw new UnknownReferenceError(node.address, target, path);

        const edge = byTarget.get(target);
        if (edge) {
          if (!edge.fields.includes(path)) edge.fields.push(path);
        } else {
          byTarget.set(target, { from: node.address, to: target, fields: [path] });
        }
      }
    }

    for (const target of node.dependsOn) {
      if (!known.has(target)) throw new UnknownReferenceError(node.address, target);
      if (!byTarget.has(target)) byTarget.set(target, { from: node.address, to: target, fields: [] });
    }

    edges.push(...byTarget.values());
  }

  return new DependencyGraph(nodes, edges);
}

/** Addresses a node depends on, in first-reference order. */
export function dependencyAddresses(node: ResourceNode): string[] {
  const addresses: string[] = [];
  for (const [field, value] of Object.entries(node.attributes)) {
    for (const { reference } of collectReferences(value, field)) {
      if (!addresses.includes(reference.address)) addresses.push(reference.address);
    }
  }
  for (const target of node.dependsOn) {
    if (!addresses.includes(target)) addresses.push(target);
  }
  return addresses;
}

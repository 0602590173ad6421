/**
 * Rendering
 *
 * Plain-text views of plans and apply results for the CLI.
 */

import type { ApplyResult } from "./executor.js";
import type { DependencyGraph } from "./graph.js";
import { summarizePlan } from "./planner.js";
import type { AttributeChange, ConcreteValue, Plan, PlanItem } from "./types.js";

const KNOWN_AFTER_APPLY = "(known after apply)";

export const ACTION_SYMBOLS = {
  create: "+",
  update: "~",
  delete: "-",
  replace: "-/+",
  read: "<=",
} as const;

function formatValue(value: ConcreteValue | undefined): string {
  return value === undefined ? "null" : JSON.stringify(value);
}

function formatAfter(change: AttributeChange): string {
  return change.unknown ? KNOWN_AFTER_APPLY : formatValue(change.after);
}

function changeLines(changes: AttributeChange[], mode: "create" | "update"): string[] {
  return changes.map((change) => {
    const suffix = change.forcesReplacement ? " (forces replacement)" : "";
    if (mode === "create" || change.before === undefined) {
      return `      + ${change.path} = ${formatAfter(change)}${suffix}`;
    }
    if (!change.unknown && change.after === undefined) {
      return `      - ${change.path} = ${formatValue(change.before)}${suffix}`;
    }
    return `      ~ ${change.path}: ${formatValue(change.before)} -> ${formatAfter(change)}${suffix}`;
  });
}

/** One-line-per-resource plan with attribute diffs and a summary line. */
export function renderPlan(plan: Plan): string {
  const lines: string[] = [];
  const replacements = new Map<string, PlanItem>();
  for (const item of plan.items) {
    if (item.action === "create" && item.reason === "replace") replacements.set(item.address, item);
  }

  for (const item of plan.items) {
    switch (item.action) {
      case "create":
        if (item.reason === "replace") break;
        lines.push(`  ${ACTION_SYMBOLS.create} ${item.address}`, ...changeLines(item.changes, "create"));
        break;
      case "update":
        lines.push(`  ${ACTION_SYMBOLS.update} ${item.address}`, ...changeLines(item.changes, "update"));
        break;
      case "delete":
        if (item.reason === "replace") {
          lines.push(
            `  ${ACTION_SYMBOLS.replace} ${item.address} (replace)`,
            ...changeLines(replacements.get(item.address)?.changes ?? [], "update"),
          );
        } else {
          lines.push(`  ${ACTION_SYMBOLS.delete} ${item.address}${item.mode === "data" ? " (data source)" : ""}`);
        }
        break;
      case "read":
        lines.push(`  ${ACTION_SYMBOLS.read} ${item.address}`);
        break;
      case "no-op":
        break;
    }
  }

  const summary = summarizePlan(plan);
  const add = summary.creates + summary.replaces;
  const destroy = summary.deletes + summary.replaces;
  if (add + summary.updates + destroy === 0) {
    return [...lines, ...(lines.length > 0 ? [""] : []), "No changes. Recorded state matches the declarations."].join("\n");
  }
  return [...lines, "", `Plan: ${add} to add, ${summary.updates} to change, ${destroy} to destroy.`].join("\n");
}

/** Outcome of an apply, one line per failed or skipped item. */
export function renderApplyResult(result: ApplyResult): string {
  let added = 0;
  let changed = 0;
  let destroyed = 0;
  for (const item of result.items) {
    if (item.status !== "applied") continue;
    if (item.action === "create") added++;
    else if (item.action === "update") changed++;
    else if (item.action === "delete") destroyed++;
  }

  const heading =
    result.status === "succeeded" ? "Apply complete!" : `Apply ${result.status}.`;
  const lines = [`${heading} Resources: ${added} added, ${changed} changed, ${destroyed} destroyed.`];
  for (const item of result.items) {
    if (item.status === "failed") lines.push(`  ✗ ${item.itemId}: ${item.error ?? "failed"}`);
    if (item.status === "skipped") lines.push(`  ○ ${item.itemId}: skipped`);
  }
  return lines.join("\n");
}

export function renderGraphDot(graph: DependencyGraph): string {
  return graph.toDot();
}

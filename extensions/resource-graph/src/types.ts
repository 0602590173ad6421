/**
 * Resource Graph: Type Definitions
 *
 * Declarations, plans, recorded state and the provider adapter contract.
 */

import type { Logger } from "../../../src/logging/index.js";
import type { Reference } from "./nodes.js";

// ── Values ──────────────────────────────────────────────────────

export type Literal = string | number | boolean | null;

/** A declared attribute value. References are resolved at plan/apply time. */
export type AttributeValue = Literal | Reference | AttributeValue[] | { [key: string]: AttributeValue };

export type Attributes = Record<string, AttributeValue>;

/** A value as recorded in state or returned by a provider. */
export type ConcreteValue = Literal | ConcreteValue[] | { [key: string]: ConcreteValue };

export type ConcreteAttributes = Record<string, ConcreteValue>;

// ── Declarations ────────────────────────────────────────────────

export type NodeMode = "managed" | "data";

export interface NodeIdentity {
  kind: string;
  name: string;
}

export interface ResourceNode {
  readonly kind: string;
  readonly name: string;
  /** `kind.name` */
  readonly address: string;
  readonly mode: NodeMode;
  readonly attributes: Attributes;
  /** Explicit dependencies (addresses) that carry no field reference. */
  readonly dependsOn: readonly string[];
}

export interface NodeOptions {
  mode?: NodeMode;
  dependsOn?: NodeIdentity[];
}

export interface OutputDeclaration {
  name: string;
  value: AttributeValue;
  sensitive: boolean;
  description?: string;
}

// ── Plan ────────────────────────────────────────────────────────

export type PlanAction = "create" | "update" | "delete" | "no-op" | "read";

export type PlanReason =
  | "new"
  | "changed"
  | "replace"
  | "removed"
  | "unchanged"
  | "data";

export interface AttributeChange {
  path: string;
  before?: ConcreteValue;
  /** Absent when `unknown` is set. */
  after?: ConcreteValue;
  /** Value depends on a resource that has not been applied yet. */
  unknown: boolean;
  forcesReplacement: boolean;
}

export interface PlanItem {
  /** `action:address`, unique within a plan. */
  id: string;
  address: string;
  kind: string;
  name: string;
  mode: NodeMode;
  action: PlanAction;
  reason: PlanReason;
  changes: AttributeChange[];
  /** Ids of plan items that must finish before this one starts. */
  after: string[];
}

export interface Plan {
  stateSerial: number;
  stateLineage: string;
  destroy: boolean;
  items: PlanItem[];
  /** Declared nodes keyed by address, needed to resolve references at apply time. */
  nodes: Record<string, ResourceNode>;
  outputs: OutputDeclaration[];
}

export interface PlanSummary {
  creates: number;
  updates: number;
  deletes: number;
  replaces: number;
  reads: number;
  noOps: number;
  hasDestructiveChanges: boolean;
}

// ── Recorded State ──────────────────────────────────────────────

export interface StateEntry {
  kind: string;
  name: string;
  mode: NodeMode;
  attributes: ConcreteAttributes;
  /** Addresses this resource depended on when it was last applied. */
  dependencies: string[];
}

export interface RecordedOutput {
  value: ConcreteValue;
  sensitive: boolean;
}

export interface StateDocument {
  version: 1;
  serial: number;
  lineage: string;
  resources: Record<string, StateEntry>;
  outputs: Record<string, RecordedOutput>;
}

// ── Provider Adapter ────────────────────────────────────────────

export interface ProviderContext {
  /** Aborted on timeout or cancellation. */
  signal: AbortSignal;
  logger: Logger;
}

/** A node with every reference replaced by its concrete value. */
export interface ResolvedNode {
  kind: string;
  name: string;
  address: string;
  mode: NodeMode;
  attributes: ConcreteAttributes;
  /** Recorded attributes for updates, null for creates. */
  prior: ConcreteAttributes | null;
}

export interface RecordedResource extends StateEntry {
  address: string;
}

export interface ProviderAdapter {
  create(node: ResolvedNode, ctx: ProviderContext): Promise<ConcreteAttributes>;
  update(node: ResolvedNode, changes: AttributeChange[], ctx: ProviderContext): Promise<ConcreteAttributes>;
  delete(resource: RecordedResource, ctx: ProviderContext): Promise<void>;
  /** Required for `data` nodes. */
  read?(node: ResolvedNode, ctx: ProviderContext): Promise<ConcreteAttributes>;
}

// ── Execution ───────────────────────────────────────────────────

export type ItemStatus = "pending" | "in-progress" | "applied" | "failed" | "skipped";

export interface ItemResult {
  itemId: string;
  address: string;
  action: PlanAction;
  status: ItemStatus;
  durationMs: number;
  error?: string;
  errorCode?: string;
}

export type ApplyStatus = "succeeded" | "partial" | "failed" | "cancelled";

export type ApplyEvent =
  | { type: "apply:start"; total: number; timestamp: string }
  | { type: "item:start"; itemId: string; address: string; timestamp: string }
  | { type: "item:applied"; itemId: string; address: string; durationMs: number; timestamp: string }
  | { type: "item:failed"; itemId: string; address: string; error: string; timestamp: string }
  | { type: "item:skipped"; itemId: string; address: string; reason: string; timestamp: string }
  | { type: "apply:complete"; status: ApplyStatus; timestamp: string };

export type ApplyEventListener = (event: ApplyEvent) => void;

// ── Apply History ───────────────────────────────────────────────

export interface ApplyRun {
  id: string;
  startedAt: string;
  completedAt: string;
  status: ApplyStatus;
  destroy: boolean;
  counts: Record<ItemStatus, number>;
  items: ItemResult[];
}

export interface HistoryStorage {
  initialize(): Promise<void>;
  saveRun(run: ApplyRun): Promise<void>;
  getRun(id: string): Promise<ApplyRun | null>;
  listRuns(limit?: number): Promise<ApplyRun[]>;
  close(): Promise<void>;
}

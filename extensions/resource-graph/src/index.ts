/**
 * Public API of the planner library
 */

export { DeclarationSet, Reference, formatAddress, parseAddress, ref, isReference, collectReferences } from "./nodes.js";
export { resolveReferences, dependencyAddresses } from "./references.js";
export { DependencyGraph, stableTopologicalSort, type GraphEdge } from "./graph.js";
export { ImmutabilityPolicy, type ImmutabilityTable } from "./immutability.js";
export { diffAttributes } from "./diff.js";
export { plan, itemId, summarizePlan, isEmptyPlan, type PlanOptions } from "./planner.js";
export { Executor, SerialWriter, linkSignals, type ApplyResult, type ExecutorOptions, type PersistMode } from "./executor.js";
export { RecordedState, stateDocumentSchema } from "./state.js";
export { InMemoryStateBackend, LocalStateBackend, type StateBackend } from "./state-backend.js";
export { resolveOutputs, maskOutput } from "./outputs.js";
export { ProviderRegistry, SimulatedProvider, kindPrefix, type SimulatedProviderOptions } from "./providers.js";
export { parseDeclarationDocument, loadDeclarationFile, declarationDocumentSchema, type DeclarationDocument } from "./declarations.js";
export { InMemoryHistoryStorage, SQLiteHistoryStorage, createApplyRun } from "./storage.js";
export { renderPlan, renderApplyResult, renderGraphDot } from "./render.js";
export { UNKNOWN, UnknownValue, type PlanValue, type PlanAttributes } from "./values.js";
export * from "./errors.js";
export type * from "./types.js";

/**
 * Resource Graph: Error Taxonomy
 *
 * Planning errors abort the pass before anything is mutated. Apply errors
 * are attached to a single plan item and aggregated into PartialApplyError.
 */

import { StackplanError } from "../../../src/errors.js";

export { StackplanError, ConfigError, errorMessage, type StackplanErrorCode } from "../../../src/errors.js";

// =============================================================================
// Planning-time errors
// =============================================================================

export class DuplicateIdentityError extends StackplanError {
  readonly address: string;

  constructor(address: string) {
    super("DUPLICATE_IDENTITY", `Resource "${address}" is declared more than once`, { address });
    this.address = address;
  }
}

export class DeclarationError extends StackplanError {
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super("DECLARATION_INVALID", issues.length > 0 ? `${message}: ${issues.join("; ")}` : message, { issues });
    this.issues = issues;
  }
}

export class UnknownReferenceError extends StackplanError {
  readonly source: string;
  readonly target: string;

  constructor(source: string, target: string, field?: string) {
    const where = field ? ` (attribute "${field}")` : "";
    super("UNKNOWN_REFERENCE", `Resource "${source}"${where} references undeclared resource "${target}"`, {
      source,
      target,
      field,
    });
    this.source = source;
    this.target = target;
  }
}

export class CycleError extends StackplanError {
  /** Addresses along the cycle; the first address is repeated at the end. */
  readonly cycle: string[];

  constructor(cycle: string[]) {
    super("CYCLE", `Dependency cycle detected: ${cycle.join(" → ")}`, { cycle });
    this.cycle = cycle;
  }
}

export class UnsafeReplaceError extends StackplanError {
  readonly address: string;
  readonly dependents: string[];

  constructor(address: string, dependents: string[]) {
    super(
      "UNSAFE_REPLACE",
      `Resource "${address}" must be replaced but ${dependents.join(", ")} would keep depending on it; ` +
        "change those resources so they are replaced too, or remove them",
      { address, dependents },
    );
    this.address = address;
    this.dependents = dependents;
  }
}

export class StalePlanError extends StackplanError {
  constructor(expected: { serial: number; lineage: string }, actual: { serial: number; lineage: string }) {
    super(
      "STALE_PLAN",
      `Plan was computed against state serial ${expected.serial} (${expected.lineage}) ` +
        `but the current state is serial ${actual.serial} (${actual.lineage})`,
      { expected, actual },
    );
  }
}

export class StateFormatError extends StackplanError {
  constructor(message: string, issues: string[] = []) {
    super("STATE_INVALID", issues.length > 0 ? `${message}: ${issues.join("; ")}` : message, { issues });
  }
}

export class NotFoundError extends StackplanError {
  constructor(what: string, name: string) {
    super("NOT_FOUND", `${what} "${name}" not found`, { what, name });
  }
}

// =============================================================================
// Apply-time errors
// =============================================================================

export class ProviderError extends StackplanError {
  readonly address: string;

  constructor(address: string, message: string, cause?: unknown) {
    super("PROVIDER_ERROR", message, { address });
    this.address = address;
    if (cause !== undefined) this.cause = cause;
  }
}

export class TimeoutError extends StackplanError {
  readonly address: string;
  readonly timeoutMs: number;

  constructor(address: string, timeoutMs: number) {
    super("TIMEOUT", `Provider call for "${address}" timed out after ${timeoutMs}ms`, { address, timeoutMs });
    this.address = address;
    this.timeoutMs = timeoutMs;
  }
}

export class UnresolvedValueError extends StackplanError {
  constructor(source: string, reference: string) {
    super("UNRESOLVED_VALUE", `Cannot resolve "${reference}" for "${source}": value not present in state`, {
      source,
      reference,
    });
  }
}

export class PartialApplyError extends StackplanError {
  readonly failed: Array<{ itemId: string; address: string; error: string }>;
  readonly skipped: Array<{ itemId: string; address: string }>;

  constructor(
    failed: Array<{ itemId: string; address: string; error: string }>,
    skipped: Array<{ itemId: string; address: string }>,
  ) {
    super(
      "PARTIAL_APPLY",
      `Apply incomplete: ${failed.length} failed, ${skipped.length} skipped` +
        (failed.length > 0 ? ` (${failed.map((f) => `${f.itemId}: ${f.error}`).join("; ")})` : ""),
      { failed, skipped },
    );
    this.failed = failed;
    this.skipped = skipped;
  }
}

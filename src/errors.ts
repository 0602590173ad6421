/**
 * Error Base
 *
 * Every error the tool raises on purpose carries a stable `code` and
 * JSON-safe `details`. The CLI prints `Error [code]: message`.
 */

export type StackplanErrorCode =
  | "DUPLICATE_IDENTITY"
  | "DECLARATION_INVALID"
  | "UNKNOWN_REFERENCE"
  | "CYCLE"
  | "UNSAFE_REPLACE"
  | "STALE_PLAN"
  | "STATE_INVALID"
  | "CONFIG_INVALID"
  | "NOT_FOUND"
  | "PROVIDER_ERROR"
  | "TIMEOUT"
  | "UNRESOLVED_VALUE"
  | "PARTIAL_APPLY";

export class StackplanError extends Error {
  readonly code: StackplanErrorCode;
  readonly details: Record<string, unknown>;

  constructor(code: StackplanErrorCode, message: string, details: Record<string, unknown> = {}) {
    super(message);
    this.name = new.target.name;
    this.code = code;
    this.details = details;
  }

  toJSON(): Record<string, unknown> {
    return { name: this.name, code: this.code, message: this.message, details: this.details };
  }
}

export class ConfigError extends StackplanError {
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super("CONFIG_INVALID", issues.length > 0 ? `${message}: ${issues.join("; ")}` : message, { issues });
    this.issues = issues;
  }
}

/** Normalize anything thrown into a message string. */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/** `Error [code]: message` for tool errors, `Error: message` otherwise. */
export function formatError(err: unknown): string {
  if (err instanceof StackplanError) return `Error [${err.code}]: ${err.message}`;
  return `Error: ${errorMessage(err)}`;
}

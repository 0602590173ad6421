/**
 * Recorded State
 *
 * Last-known concrete attributes per address. The document form is plain
 * JSON so it can be inspected and repaired by hand.
 */

import { randomUUID } from "node:crypto";
import { z } from "zod";
import { StateFormatError } from "./errors.js";
import { formatAddress } from "./nodes.js";
import type { ConcreteValue, RecordedOutput, StateDocument, StateEntry } from "./types.js";

// =============================================================================
// Document Schema
// =============================================================================

export const concreteValueSchema: z.ZodType<ConcreteValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number(),
    z.boolean(),
    z.null(),
    z.array(concreteValueSchema),
    z.record(z.string(), concreteValueSchema),
  ]),
);

const stateEntrySchema = z.object({
  kind: z.string().min(1),
  name: z.string().min(1),
  mode: z.enum(["managed", "data"]).default("managed"),
  attributes: z.record(z.string(), concreteValueSchema),
  dependencies: z.array(z.string()).default([]),
});

export const stateDocumentSchema = z.object({
  version: z.literal(1),
  serial: z.number().int().nonnegative(),
  lineage: z.string().min(1),
  resources: z.record(z.string(), stateEntrySchema).default({}),
  outputs: z
    .record(z.string(), z.object({ value: concreteValueSchema, sensitive: z.boolean().default(false) }))
    .default({}),
});

// =============================================================================
// RecordedState
// =============================================================================

export class RecordedState {
  serial: number;
  readonly lineage: string;
  private readonly entries = new Map<string, StateEntry>();
  private outputs = new Map<string, RecordedOutput>();

  private constructor(serial: number, lineage: string) {
    this.serial = serial;
    this.lineage = lineage;
  }

  static empty(lineage: string = randomUUID()): RecordedState {
    return new RecordedState(0, lineage);
  }

  /**
   * Build state from a parsed document.
   *
   * @throws StateFormatError if the document does not match the schema.
   */
  static fromDocument(doc: unknown): RecordedState {
    const parsed = stateDocumentSchema.safeParse(doc);
    if (!parsed.success) {
      throw new StateFormatError(
        "Invalid state document",
        parsed.error.issues.map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`),
      );
    }

    const state = new RecordedState(parsed.data.serial, parsed.data.lineage);
    for (const [address, entry] of Object.entries(parsed.data.resources)) {
      const expected = formatAddress(entry.kind, entry.name);
      if (address !== expected) {
        throw new StateFormatError(`State key "${address}" does not match its resource "${expected}"`);
      }
      state.entries.set(address, entry);
    }
    for (const [name, output] of Object.entries(parsed.data.outputs)) {
      state.outputs.set(name, output);
    }
    return state;
  }

  get size(): number {
    return this.entries.size;
  }

  has(address: string): boolean {
    return this.entries.has(address);
  }

  get(address: string): StateEntry | undefined {
    const entry = this.entries.get(address);
    return entry ? structuredClone(entry) : undefined;
  }

  /** Addresses in the order they were first recorded. */
  addresses(): string[] {
    return [...this.entries.keys()];
  }

  set(address: string, entry: StateEntry): void {
    this.entries.set(address, structuredClone(entry));
  }

  remove(address: string): boolean {
    return this.entries.delete(address);
  }

  getOutputs(): Record<string, RecordedOutput> {
    return Object.fromEntries([...this.outputs.entries()].map(([k, v]) => [k, structuredClone(v)]));
  }

  setOutputs(outputs: Record<string, RecordedOutput>): void {
    this.outputs = new Map(Object.entries(outputs).map(([k, v]) => [k, structuredClone(v)]));
  }

  clone(): RecordedState {
    return RecordedState.fromDocument(this.toDocument());
  }

  toDocument(): StateDocument {
    return {
      version: 1,
      serial: this.serial,
      lineage: this.lineage,
      resources: Object.fromEntries([...this.entries.entries()].map(([k, v]) => [k, structuredClone(v)])),
      outputs: this.getOutputs(),
    };
  }
}

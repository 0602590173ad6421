/**
 * Immutability Policy
 *
 * Which fields of a resource kind cannot be changed in place. A change to
 * any of them turns an update into a replace. The table is configuration:
 * built-in defaults ship in data/immutable-fields.json and the config file
 * overrides them per kind. The key "*" applies to every kind.
 */

import * as fs from "node:fs";

export type ImmutabilityTable = Record<string, string[]>;

const WILDCARD = "*";

// Source layout first, then the compiled layout under dist/.
const DEFAULT_TABLE_CANDIDATES = [
  "../data/immutable-fields.json",
  "../../../../extensions/resource-graph/data/immutable-fields.json",
];

export class ImmutabilityPolicy {
  private readonly table: Map<string, string[]>;

  constructor(table: ImmutabilityTable = {}) {
    this.table = new Map(Object.entries(table).map(([kind, fields]) => [kind, [...new Set(fields)]]));
  }

  /** Policy built from the bundled defaults. */
  static defaults(): ImmutabilityPolicy {
    return new ImmutabilityPolicy(loadDefaultTable());
  }

  /** New policy where each kind in `overrides` replaces this policy's entry. */
  withOverrides(overrides: ImmutabilityTable): ImmutabilityPolicy {
    return new ImmutabilityPolicy({ ...this.toTable(), ...overrides });
  }

  fieldsFor(kind: string): string[] {
    return [...(this.table.get(kind) ?? []), ...(this.table.get(WILDCARD) ?? [])];
  }

  /**
   * True when a change at `path` touches an immutable field: the path is the
   * field, lies below it, or contains it.
   */
  isImmutable(kind: string, path: string): boolean {
    return this.fieldsFor(kind).some(
      (field) => path === field || path.startsWith(`${field}.`) || field.startsWith(`${path}.`),
    );
  }

  toTable(): ImmutabilityTable {
    return Object.fromEntries([...this.table.entries()].map(([kind, fields]) => [kind, [...fields]]));
  }
}

function loadDefaultTable(): ImmutabilityTable {
  for (const candidate of DEFAULT_TABLE_CANDIDATES) {
    const url = new URL(candidate, import.meta.url);
    if (!fs.existsSync(url)) continue;
    const parsed: unknown = JSON.parse(fs.readFileSync(url, "utf-8"));
    return toTable(parsed);
  }
  return {};
}

function toTable(value: unknown): ImmutabilityTable {
  const table: ImmutabilityTable = {};
  if (value === null || typeof value !== "object" || Array.isArray(value)) return table;
  for (const [kind, fields] of Object.entries(value)) {
    if (Array.isArray(fields)) {
      table[kind] = fields.filter((f): f is string => typeof f === "string");
    }
  }
  return table;
}

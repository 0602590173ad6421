/**
 * Value Resolution
 *
 * Substitutes references with concrete values. During planning a value that
 * only exists after apply is represented by UNKNOWN.
 */

import { Reference } from "./nodes.js";
import type { AttributeValue, Attributes, ConcreteAttributes, ConcreteValue } from "./types.js";

/** Marker for a value that is only known after apply. */
export class UnknownValue {
  static readonly instance = new UnknownValue();

  private constructor() {}

  toJSON(): string {
    return "(known after apply)";
  }
}

export const UNKNOWN = UnknownValue.instance;

export type PlanValue = ConcreteValue | UnknownValue | PlanValue[] | { [key: string]: PlanValue };

export type PlanAttributes = Record<string, PlanValue>;

// =============================================================================
// Substitution
// =============================================================================

export function resolvePlanValue(value: AttributeValue, lookup: (ref: Reference) => PlanValue): PlanValue {
  if (value instanceof Reference) return lookup(value);
  if (Array.isArray(value)) return value.map((item) => resolvePlanValue(item, lookup));
  if (value !== null && typeof value === "object") {
    const out: { [key: string]: PlanValue } = {};
    for (const [key, item] of Object.entries(value)) out[key] = resolvePlanValue(item, lookup);
    return out;
  }
  return value;
}

export function resolvePlanAttributes(attributes: Attributes, lookup: (ref: Reference) => PlanValue): PlanAttributes {
  const out: PlanAttributes = {};
  for (const [key, value] of Object.entries(attributes)) out[key] = resolvePlanValue(value, lookup);
  return out;
}

export function resolveConcreteValue(value: AttributeValue, lookup: (ref: Reference) => ConcreteValue): ConcreteValue {
  if (value instanceof Reference) return lookup(value);
  if (Array.isArray(value)) return value.map((item) => resolveConcreteValue(item, lookup));
  if (value !== null && typeof value === "object") {
    const out: { [key: string]: ConcreteValue } = {};
    for (const [key, item] of Object.entries(value)) out[key] = resolveConcreteValue(item, lookup);
    return out;
  }
  return value;
}

export function resolveConcreteAttributes(
  attributes: Attributes,
  lookup: (ref: Reference) => ConcreteValue,
): ConcreteAttributes {
  const out: ConcreteAttributes = {};
  for (const [key, value] of Object.entries(attributes)) out[key] = resolveConcreteValue(value, lookup);
  return out;
}

// =============================================================================
// Paths
// =============================================================================

/** Read a dot-separated path; list segments are indices. */
export function getPath(root: ConcreteAttributes | ConcreteValue, path: string): ConcreteValue | undefined {
  let current: ConcreteValue | undefined = root;
  for (const segment of path.split(".")) {
    if (Array.isArray(current)) {
      const index = Number(segment);
      current = Number.isInteger(index) ? current[index] : undefined;
    } else if (current !== null && typeof current === "object") {
      current = Object.prototype.hasOwnProperty.call(current, segment) ? current[segment] : undefined;
    } else {
      return undefined;
    }
    if (current === undefined) return undefined;
  }
  return current;
}

/** Like getPath, but an UNKNOWN anywhere on the way yields UNKNOWN. */
export function getPlanPath(root: PlanAttributes | PlanValue, path: string): PlanValue | undefined {
  let current: PlanValue | undefined = root;
  for (const segment of path.split(".")) {
    if (current instanceof UnknownValue) return UNKNOWN;
    if (Array.isArray(current)) {
      const index = Number(segment);
      current = Number.isInteger(index) ? current[index] : undefined;
    } else if (current !== null && typeof current === "object") {
      current = Object.prototype.hasOwnProperty.call(current, segment) ? current[segment] : undefined;
    } else {
      return undefined;
    }
    if (current === undefined) return undefined;
  }
  return current;
}

export function containsUnknown(value: PlanValue): boolean {
  if (value instanceof UnknownValue) return true;
  if (Array.isArray(value)) return value.some(containsUnknown);
  if (value !== null && typeof value === "object") return Object.values(value).some(containsUnknown);
  return false;
}

/** Narrow a plan value with no UNKNOWN inside to a concrete value. */
export function toConcrete(value: PlanValue): ConcreteValue | undefined {
  if (value instanceof UnknownValue) return undefined;
  if (Array.isArray(value)) {
    const out: ConcreteValue[] = [];
    for (const item of value) {
      const concrete = toConcrete(item);
      if (concrete === undefined) return undefined;
      out.push(concrete);
    }
    return out;
  }
  if (value !== null && typeof value === "object") {
    const out: { [key: string]: ConcreteValue } = {};
    for (const [key, item] of Object.entries(value)) {
      const concrete = toConcrete(item);
      if (concrete === undefined) return undefined;
      out[key] = concrete;
    }
    return out;
  }
  return value;
}

// =============================================================================
// Equality
// =============================================================================

/** Structural equality; object key order is ignored. */
export function deepEqual(a: ConcreteValue | undefined, b: ConcreteValue | undefined): boolean {
  if (a === b) return true;
  if (a === undefined || b === undefined || a === null || b === null) return false;
  if (Array.isArray(a) || Array.isArray(b)) {
    if (!Array.isArray(a) || !Array.isArray(b) || a.length !== b.length) return false;
    return a.every((item, i) => deepEqual(item, b[i]));
  }
  if (typeof a === "object" && typeof b === "object") {
    const aKeys = Object.keys(a);
    const bKeys = Object.keys(b);
    if (aKeys.length !== bKeys.length) return false;
    return aKeys.every((key) => Object.prototype.hasOwnProperty.call(b, key) && deepEqual(a[key], b[key]));
  }
  return false;
}

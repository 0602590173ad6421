/**
 * Attribute Diff
 *
 * Compares declared (plan-resolved) attributes against recorded ones. Only
 * declared top-level fields are compared: everything else in state was
 * assigned by the provider. Nested mappings are compared key by key, lists
 * as a whole.
 */

import type { ImmutabilityPolicy } from "./immutability.js";
import type { AttributeChange, ConcreteAttributes, ConcreteValue } from "./types.js";
import { UnknownValue, containsUnknown, deepEqual, toConcrete, type PlanAttributes, type PlanValue } from "./values.js";

export function diffAttributes(
  kind: string,
  declared: PlanAttributes,
  recorded: ConcreteAttributes,
  policy: ImmutabilityPolicy,
): AttributeChange[] {
  const changes: AttributeChange[] = [];
  for (const [key, value] of Object.entries(declared)) {
    diffValue(kind, key, value, recorded[key], policy, changes);
  }
  return changes;
}

function diffValue(
  kind: string,
  path: string,
  declared: PlanValue,
  recorded: ConcreteValue | undefined,
  policy: ImmutabilityPolicy,
  changes: AttributeChange[],
): void {
  const forcesReplacement = policy.isImmutable(kind, path);

  if (isMapping(declared) && isConcreteMapping(recorded)) {
    const keys = new Set([...Object.keys(declared), ...Object.keys(recorded)]);
    for (const key of keys) {
      const childPath = `${path}.${key}`;
      const child = declared[key];
      if (child === undefined) {
        changes.push({
          path: childPath,
          before: recorded[key],
          unknown: false,
          forcesReplacement: policy.isImmutable(kind, childPath),
        });
      } else {
        diffValue(kind, childPath, child, recorded[key], policy, changes);
      }
    }
    return;
  }

  if (containsUnknown(declared)) {
    changes.push({ path, ...(recorded !== undefined ? { before: recorded } : {}), unknown: true, forcesReplacement });
    return;
  }

  const after = toConcrete(declared);
  if (after === undefined || deepEqual(after, recorded)) return;
  changes.push({ path, ...(recorded !== undefined ? { before: recorded } : {}), after, unknown: false, forcesReplacement });
}

function isMapping(value: PlanValue): value is { [key: string]: PlanValue } {
  return value !== null && typeof value === "object" && !Array.isArray(value) && !(value instanceof UnknownValue);
}

function isConcreteMapping(value: ConcreteValue | undefined): value is { [key: string]: ConcreteValue } {
  return value !== undefined && value !== null && typeof value === "object" && !Array.isArray(value);
}

import { UnresolvedValueError } from "./errors.js";
import type { Reference } from "./nodes.js";
import type { RecordedState } from "./state.js";
import type { ConcreteValue, OutputDeclaration, RecordedOutput } from "./types.js";
import { getPath, resolveConcreteValue } from "./values.js";

/** Lookup that reads a reference from state or fails with UnresolvedValueError. */
export function stateLookup(state: RecordedState, source: string): (reference: Reference) => ConcreteValue {
  return (reference) => {
    const entry = state.get(reference.address);
    const value = entry ? getPath(entry.attributes, reference.field) : undefined;
    if (value === undefined) throw new UnresolvedValueError(source, reference.toString());
    return value;
  };
}

/**
 * Resolve declared outputs against state. Outputs that reference a value not
 * (yet) in state are left out.
 */
export function resolveOutputs(outputs: readonly OutputDeclaration[], state: RecordedState): Record<string, RecordedOutput> {
  const resolved: Record<string, RecordedOutput> = {};
  for (const output of outputs) {
    try {
      const value = resolveConcreteValue(output.value, stateLookup(state, `output.${output.name}`));
      resolved[output.name] = { value, sensitive: output.sensitive };
    } catch (err) {
      if (err instanceof UnresolvedValueError) continue;
      throw err;
    }
  }
  return resolved;
}

export function maskOutput(output: RecordedOutput, showSensitive = false): ConcreteValue {
  return output.sensitive && !showSensitive ? "(sensitive)" : output.value;
}

import { describe, expect, it } from "vitest";
import { UnresolvedValueError } from "./errors.js";
import { ref } from "./nodes.js";
import { maskOutput, resolveOutputs, stateLookup } from "./outputs.js";
import { RecordedState } from "./state.js";

function state(): RecordedState {
  return RecordedState.fromDocument({
    version: 1,
    serial: 1,
    lineage: "l",
    resources: {
      "aws_vpc.main": { kind: "aws_vpc", name: "main", attributes: { id: "vpc-1", tags: { Name: "main" } } },
    },
  });
}

describe("resolveOutputs", () => {
  it("resolves references against state", () => {
    const outputs = resolveOutputs(
      [
        { name: "vpc", value: { id: ref("aws_vpc", "main", "id"), name: ref("aws_vpc", "main", "tags.Name") }, sensitive: false },
        { name: "static", value: "fixed", sensitive: true },
      ],
      state(),
    );
    expect(outputs).toEqual({
      vpc: { value: { id: "vpc-1", name: "main" }, sensitive: false },
      static: { value: "fixed", sensitive: true },
    });
  });

  it("leaves out outputs whose values are not in state", () => {
    const outputs = resolveOutputs(
      [
        { name: "instance", value: ref("aws_instance", "web", "id"), sensitive: false },
        { name: "vpc", value: ref("aws_vpc", "main", "id"), sensitive: false },
      ],
      state(),
    );
    expect(Object.keys(outputs)).toEqual(["vpc"]);
  });

  it("fails the lookup with the missing reference", () => {
    const lookup = stateLookup(state(), "aws_subnet.a");
    expect(() => lookup(ref("aws_vpc", "main", "arn"))).toThrow(UnresolvedValueError);
    expect(() => lookup(ref("aws_vpc", "main", "arn"))).toThrow(
      'Cannot resolve "aws_vpc.main.arn" for "aws_subnet.a": value not present in state',
    );
  });
});

describe("maskOutput", () => {
  it("hides sensitive values unless asked", () => {
    expect(maskOutput({ value: "test-secret", sensitive: true })).toBe("(sensitive)");
    expect(maskOutput({ value: "test-secret", sensitive: true }, true)).toBe("test-secret");
    expect(maskOutput({ value: 3, sensitive: false })).toBe(3);
  });
});

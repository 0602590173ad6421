import { describe, expect, it } from "vitest";
import { ref } from "./nodes.js";
import { UNKNOWN, deepEqual, getPath, getPlanPath, resolvePlanAttributes, toConcrete } from "./values.js";

describe("values", () => {
  it("reads dotted paths through mappings and lists", () => {
    const attrs = { tags: { Name: "main" }, subnets: ["a", "b"] };
    expect(getPath(attrs, "tags.Name")).toBe("main");
    expect(getPath(attrs, "subnets.1")).toBe("b");
    expect(getPath(attrs, "subnets.x")).toBeUndefined();
    expect(getPath(attrs, "tags.Name.length")).toBeUndefined();
  });

  it("propagates UNKNOWN along plan paths", () => {
    expect(getPlanPath({ network: UNKNOWN }, "network.subnet_id")).toBe(UNKNOWN);
    expect(getPlanPath({ network: { subnet_id: "s-1" } }, "network.subnet_id")).toBe("s-1");
  });

  it("substitutes references through the lookup", () => {
    const resolved = resolvePlanAttributes(
      { vpc_id: ref("aws_vpc", "main", "id"), ids: [ref("aws_vpc", "main", "id"), "static"] },
      () => UNKNOWN,
    );
    expect(resolved).toEqual({ vpc_id: UNKNOWN, ids: [UNKNOWN, "static"] });
    expect(toConcrete(resolved.ids)).toBeUndefined();
    expect(toConcrete({ a: [1, { b: null }] })).toEqual({ a: [1, { b: null }] });
  });

  it("compares structurally, ignoring key order", () => {
    expect(deepEqual({ a: 1, b: [1, 2] }, { b: [1, 2], a: 1 })).toBe(true);
    expect(deepEqual([1, 2], [2, 1])).toBe(false);
    expect(deepEqual({ a: null }, { b: null })).toBe(false);
    expect(deepEqual(null, undefined)).toBe(false);
  });
});

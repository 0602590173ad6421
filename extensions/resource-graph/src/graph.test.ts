import { describe, expect, it } from "vitest";
import { CycleError } from "./errors.js";
import { stableTopologicalSort } from "./graph.js";
import { DeclarationSet, ref } from "./nodes.js";
import { resolveReferences } from "./references.js";

describe("stableTopologicalSort", () => {
  it("breaks ties by input position", () => {
    const prereqs: Record<string, string[]> = { c: [], a: [], b: ["c"] };
    expect(stableTopologicalSort(["c", "a", "b"], (k) => prereqs[k] ?? [])).toEqual(["c", "a", "b"]);
    expect(stableTopologicalSort(["b", "a", "c"], (k) => prereqs[k] ?? [])).toEqual(["a", "c", "b"]);
  });

  it("ignores prerequisites outside the key set", () => {
    expect(stableTopologicalSort(["x", "y"], (k) => (k === "x" ? ["y", "elsewhere"] : []))).toEqual(["y", "x"]);
  });

  it("reports the cycle path", () => {
    const prereqs: Record<string, string[]> = { a: ["b"], b: ["c"], c: ["a"], d: [] };
    let caught: unknown;
    try {
      stableTopologicalSort(["a", "b", "c", "d"], (k) => prereqs[k] ?? []);
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(CycleError);
    if (!(caught instanceof CycleError)) return;
    expect(caught.cycle).toEqual(["a", "b", "c", "a"]);
    expect(caught.message).toBe("Dependency cycle detected: a → b → c → a");
  });
});

describe("DependencyGraph", () => {
  function network(): DeclarationSet {
    const set = new DeclarationSet();
    set.defineNode("aws_instance", "web", { subnet_id: ref("aws_subnet", "a", "id") });
    set.defineNode("aws_subnet", "a", { vpc_id: ref("aws_vpc", "main", "id") });
    set.defineNode("aws_vpc", "main", { cidr_block: "10.0.0.0/16" });
    set.defineNode("aws_s3_bucket", "logs", {});
    return set;
  }

  it("orders dependencies before dependents", () => {
    const order = resolveReferences(network()).topoOrder().map((n) => n.address);
    expect(order).toEqual(["aws_vpc.main", "aws_subnet.a", "aws_instance.web", "aws_s3_bucket.logs"]);
  });

  it("is deterministic across calls", () => {
    const graph = resolveReferences(network());
    const first = graph.topoOrder().map((n) => n.address);
    expect(graph.topoOrder().map((n) => n.address)).toEqual(first);
  });

  it("detects a self reference", () => {
    const set = new DeclarationSet();
    set.defineNode("aws_security_group", "self", { source: ref("aws_security_group", "self", "id") });
    expect(() => resolveReferences(set).topoOrder()).toThrow(
      "Dependency cycle detected: aws_security_group.self → aws_security_group.self",
    );
  });

  it("detects a two-node cycle", () => {
    const set = new DeclarationSet();
    set.defineNode("t", "a", { x: ref("t", "b", "id") });
    set.defineNode("t", "b", { y: ref("t", "a", "id") });
    expect(() => resolveReferences(set).topoOrder()).toThrow(CycleError);
  });

  it("lists transitive dependents in declaration order", () => {
    const graph = resolveReferences(network());
    expect(graph.transitiveDependents("aws_vpc.main")).toEqual(["aws_instance.web", "aws_subnet.a"]);
    expect(graph.transitiveDependents("aws_s3_bucket.logs")).toEqual([]);
  });

  it("renders DOT", () => {
    const set = new DeclarationSet();
    set.defineNode("aws_ami", "ubuntu", { owner: "self" }, { mode: "data" });
    set.defineNode("aws_vpc", "main", {});
    set.defineNode(
      "aws_instance",
      "web",
      { ami: ref("aws_ami", "ubuntu", "id") },
      { dependsOn: [{ kind: "aws_vpc", name: "main" }] },
    );
    expect(resolveReferences(set).toDot()).toBe(
      [
        'digraph "resources" {',
        '  rankdir = "RL";',
        '  "aws_ami.ubuntu" [shape=note];',
        '  "aws_vpc.main";',
        '  "aws_instance.web";',
        '  "aws_instance.web" -> "aws_ami.ubuntu" [label="ami"];',
        '  "aws_instance.web" -> "aws_vpc.main" [style=dashed];',
        "}",
      ].join("\n"),
    );
  });
});

import { fileURLToPath } from "node:url";
import { describe, expect, it } from "vitest";
import { loadDeclarationFile, parseDeclarationDocument } from "./declarations.js";
import { DeclarationError, DuplicateIdentityError } from "./errors.js";
import { Reference } from "./nodes.js";
import { resolveReferences } from "./references.js";

describe("parseDeclarationDocument", () => {
  it("decodes references and explicit dependencies", () => {
    const set = parseDeclarationDocument({
      resources: [
        { kind: "aws_vpc", name: "main", attributes: { cidr_block: "10.0.0.0/16" } },
        {
          kind: "aws_subnet",
          name: "a",
          attributes: { vpc_id: { $ref: "aws_vpc.main.id" }, tags: { Vpc: { $ref: "aws_vpc.main.tags.Name" } } },
          dependsOn: ["aws_vpc.main"],
        },
      ],
      outputs: { subnet_id: { value: { $ref: "aws_subnet.a.id" }, sensitive: true } },
    });

    const subnet = set.get("aws_subnet.a");
    expect(subnet?.attributes.vpc_id).toBeInstanceOf(Reference);
    expect(String(subnet?.attributes.vpc_id)).toBe("aws_vpc.main.id");
    expect(subnet?.dependsOn).toEqual(["aws_vpc.main"]);
    expect(set.outputs()).toEqual([
      { name: "subnet_id", value: new Reference("aws_subnet", "a", "id"), sensitive: true },
    ]);
  });

  it("accepts JSON text and defaults attributes", () => {
    const set = parseDeclarationDocument('{"resources":[{"kind":"aws_ami","name":"base","mode":"data"}]}');
    expect(set.get("aws_ami.base")).toMatchObject({ mode: "data", attributes: {}, dependsOn: [] });
  });

  it("rejects invalid JSON", () => {
    expect(() => parseDeclarationDocument("{")).toThrow(/^Declaration document is not valid JSON/);
  });

  it("rejects unknown fields", () => {
    expect(() => parseDeclarationDocument({ resources: [{ kind: "aws_vpc", name: "main", count: 2 }] })).toThrow(
      DeclarationError,
    );
    expect(() => parseDeclarationDocument({})).toThrow(/^Invalid declaration document: resources/);
  });

  it("rejects a malformed reference object", () => {
    expect(() =>
      parseDeclarationDocument({
        resources: [{ kind: "aws_subnet", name: "a", attributes: { vpc_id: { $ref: "aws_vpc.main.id", extra: 1 } } }],
      }),
    ).toThrow(
      'Invalid reference at aws_subnet.a.vpc_id: a reference is an object with a single "$ref" string, e.g. {"$ref": "aws_vpc.main.id"}',
    );
  });

  it("rejects bad dependsOn addresses and duplicates", () => {
    expect(() =>
      parseDeclarationDocument({ resources: [{ kind: "aws_vpc", name: "main", dependsOn: ["nope"] }] }),
    ).toThrow('Invalid resource address "nope"');
    expect(() =>
      parseDeclarationDocument({
        resources: [
          { kind: "aws_vpc", name: "main" },
          { kind: "aws_vpc", name: "main" },
        ],
      }),
    ).toThrow(DuplicateIdentityError);
  });
});

describe("loadDeclarationFile", () => {
  it("loads the bundled network example", async () => {
    const file = fileURLToPath(new URL("../../../examples/network-stack.json", import.meta.url));
    const set = await loadDeclarationFile(file);
    const graph = resolveReferences(set);

    expect(set.size).toBe(11);
    expect(set.outputs().map((o) => o.name)).toEqual(["vpc_id", "instance_arn", "role_arn"]);
    expect(graph.topoOrder().map((n) => n.address)).toEqual(set.nodes().map((n) => n.address));
    expect(graph.dependenciesOf("aws_instance.web")).toEqual([
      "aws_subnet.public",
      "aws_security_group.web",
      "aws_iam_instance_profile.web",
      "aws_iam_role_policy_attachment.web_logs",
      "aws_route_table_association.public",
    ]);
  });

  it("reports a missing file", async () => {
    await expect(loadDeclarationFile("/nonexistent/stack.json")).rejects.toThrow(
      /^Cannot read declaration file \/nonexistent\/stack.json/,
    );
  });
});

import { describe, expect, it } from "vitest";
import { diffAttributes } from "./diff.js";
import { ImmutabilityPolicy } from "./immutability.js";
import { UNKNOWN } from "./values.js";

describe("diffAttributes", () => {
  const none = new ImmutabilityPolicy();

  it("ignores recorded fields that are not declared", () => {
    expect(diffAttributes("aws_vpc", { cidr_block: "10.0.0.0/16" }, { cidr_block: "10.0.0.0/16", id: "vpc-1" }, none)).toEqual([]);
  });

  it("compares lists as a whole", () => {
    expect(diffAttributes("aws_instance", { ports: [80, 443] }, { ports: [80] }, none)).toEqual([
      { path: "ports", before: [80], after: [80, 443], unknown: false, forcesReplacement: false },
    ]);
  });

  it("reports unknown values with the recorded value", () => {
    expect(diffAttributes("aws_subnet", { vpc_id: UNKNOWN }, { vpc_id: "vpc-1" }, none)).toEqual([
      { path: "vpc_id", before: "vpc-1", unknown: true, forcesReplacement: false },
    ]);
  });

  it("replaces a mapping that used to be a scalar", () => {
    expect(diffAttributes("aws_s3_bucket", { config: { a: 1 } }, { config: "legacy" }, none)).toEqual([
      { path: "config", before: "legacy", after: { a: 1 }, unknown: false, forcesReplacement: false },
    ]);
  });

  it("marks nested changes under an immutable field", () => {
    const policy = new ImmutabilityPolicy({ aws_s3_bucket: ["config"] });
    expect(
      diffAttributes("aws_s3_bucket", { config: { region: "eu-west-1", size: 1 } }, { config: { region: "us-east-1", size: 1 } }, policy),
    ).toEqual([
      { path: "config.region", before: "us-east-1", after: "eu-west-1", unknown: false, forcesReplacement: true },
    ]);
  });
});

describe("ImmutabilityPolicy", () => {
  it("matches fields, their children and their parents", () => {
    const policy = new ImmutabilityPolicy({ aws_instance: ["network.subnet_id"] });
    expect(policy.isImmutable("aws_instance", "network.subnet_id")).toBe(true);
    expect(policy.isImmutable("aws_instance", "network.subnet_id.0")).toBe(true);
    expect(policy.isImmutable("aws_instance", "network")).toBe(true);
    expect(policy.isImmutable("aws_instance", "network.tags")).toBe(false);
    expect(policy.isImmutable("aws_vpc", "network.subnet_id")).toBe(false);
  });

  it("applies wildcard fields to every kind", () => {
    const policy = new ImmutabilityPolicy({ "*": ["region"], aws_vpc: ["cidr_block"] });
    expect(policy.fieldsFor("aws_vpc")).toEqual(["cidr_block", "region"]);
    expect(policy.isImmutable("aws_subnet", "region")).toBe(true);
  });

  it("lets overrides replace a kind's entry", () => {
    const policy = new ImmutabilityPolicy({ aws_vpc: ["cidr_block"], aws_subnet: ["vpc_id"] }).withOverrides({ aws_vpc: [] });
    expect(policy.fieldsFor("aws_vpc")).toEqual([]);
    expect(policy.fieldsFor("aws_subnet")).toEqual(["vpc_id"]);
  });

  it("ships defaults for the common network kinds", () => {
    const policy = ImmutabilityPolicy.defaults();
    expect(policy.fieldsFor("aws_vpc")).toEqual(["cidr_block", "instance_tenancy"]);
    expect(policy.isImmutable("aws_instance", "ami")).toBe(true);
    expect(policy.isImmutable("aws_instance", "instance_type")).toBe(false);
  });
});

import * as fs from "node:fs/promises";
import * as os from "node:os";
import * as path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { StateFormatError } from "./errors.js";
import { InMemoryStateBackend, LocalStateBackend } from "./state-backend.js";
import { RecordedState } from "./state.js";

const doc = {
  version: 1,
  serial: 2,
  lineage: "lineage-1",
  resources: {
    "aws_vpc.main": {
      kind: "aws_vpc",
      name: "main",
      mode: "managed",
      attributes: { cidr_block: "10.0.0.0/16", id: "vpc-1" },
      dependencies: [],
    },
  },
  outputs: { vpc_id: { value: "vpc-1", sensitive: false } },
};

describe("RecordedState", () => {
  it("starts empty at serial 0", () => {
    const state = RecordedState.empty("fixed");
    expect(state.serial).toBe(0);
    expect(state.lineage).toBe("fixed");
    expect(state.size).toBe(0);
  });

  it("round-trips its document form", () => {
    expect(RecordedState.fromDocument(doc).toDocument()).toEqual(doc);
  });

  it("fills defaults for mode and dependencies", () => {
    const state = RecordedState.fromDocument({
      version: 1,
      serial: 0,
      lineage: "l",
      resources: { "aws_vpc.main": { kind: "aws_vpc", name: "main", attributes: {} } },
    });
    expect(state.get("aws_vpc.main")).toEqual({
      kind: "aws_vpc",
      name: "main",
      mode: "managed",
      attributes: {},
      dependencies: [],
    });
    expect(state.getOutputs()).toEqual({});
  });

  it("rejects malformed documents", () => {
    expect(() => RecordedState.fromDocument({ version: 2, serial: 0, lineage: "l" })).toThrow(StateFormatError);
    expect(() => RecordedState.fromDocument({ version: 1, serial: -1, lineage: "l" })).toThrow(/^Invalid state document: serial/);
  });

  it("rejects keys that do not match the entry", () => {
    expect(() =>
      RecordedState.fromDocument({
        ...doc,
        resources: { "aws_vpc.other": doc.resources["aws_vpc.main"] },
      }),
    ).toThrow('State key "aws_vpc.other" does not match its resource "aws_vpc.main"');
  });

  it("hands out copies", () => {
    const state = RecordedState.fromDocument(doc);
    const entry = state.get("aws_vpc.main");
    if (entry) entry.attributes.cidr_block = "changed";
    expect(state.get("aws_vpc.main")?.attributes.cidr_block).toBe("10.0.0.0/16");

    const copy = state.clone();
    copy.remove("aws_vpc.main");
    copy.serial = 9;
    expect(state.has("aws_vpc.main")).toBe(true);
    expect(state.serial).toBe(2);
  });
});

describe("InMemoryStateBackend", () => {
  it("returns empty state until something is saved", async () => {
    const backend = new InMemoryStateBackend();
    expect((await backend.load()).size).toBe(0);

    await backend.save(RecordedState.fromDocument(doc));
    const loaded = await backend.load();
    expect(loaded.toDocument()).toEqual(doc);
    expect(backend.saves).toBe(1);
  });
});

describe("LocalStateBackend", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), "stackplan-state-"));
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it("loads empty state when the file does not exist", async () => {
    const state = await new LocalStateBackend(path.join(dir, "missing.json")).load();
    expect(state.size).toBe(0);
    expect(state.serial).toBe(0);
  });

  it("saves, reloads and keeps a backup of the previous file", async () => {
    const backend = new LocalStateBackend(path.join(dir, "nested", "state.json"));
    const state = RecordedState.fromDocument(doc);
    await backend.save(state);
    expect((await backend.load()).toDocument()).toEqual(doc);

    state.serial = 3;
    await backend.save(state);
    expect((await backend.load()).serial).toBe(3);

    const backup: unknown = JSON.parse(await fs.readFile(backend.backupPath, "utf-8"));
    expect(backup).toMatchObject({ serial: 2 });
    expect((await fs.readdir(path.join(dir, "nested"))).sort()).toEqual(["state.json", "state.json.backup"]);
  });

  it("reports a corrupt file", async () => {
    const file = path.join(dir, "state.json");
    await fs.writeFile(file, "{ not json", "utf-8");
    await expect(new LocalStateBackend(file).load()).rejects.toBeInstanceOf(StateFormatError);
  });
});

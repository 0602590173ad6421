import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { resolveConfigPath, resolveStateDir } from "./paths.js";

const home = () => "/home/tester";

describe("resolveStateDir", () => {
  it("defaults to ~/.stackplan", () => {
    expect(resolveStateDir({}, home)).toBe(path.join("/home/tester", ".stackplan"));
  });

  it("honors STACKPLAN_STATE_DIR, expanding ~", () => {
    expect(resolveStateDir({ STACKPLAN_STATE_DIR: "~/data" }, home)).toBe(path.join("/home/tester", "data"));
    expect(resolveStateDir({ STACKPLAN_STATE_DIR: "/custom/state" }, home)).toBe(path.resolve("/custom/state"));
  });

  it("ignores a blank override", () => {
    expect(resolveStateDir({ STACKPLAN_STATE_DIR: "  " }, home)).toBe(path.join("/home/tester", ".stackplan"));
  });
});

describe("resolveConfigPath", () => {
  let cwd: string;
  let stateDir: string;

  beforeEach(async () => {
    cwd = await fs.mkdtemp(path.join(os.tmpdir(), "stackplan-cwd-"));
    stateDir = await fs.mkdtemp(path.join(os.tmpdir(), "stackplan-state-"));
  });

  afterEach(async () => {
    await fs.rm(cwd, { recursive: true, force: true });
    await fs.rm(stateDir, { recursive: true, force: true });
  });

  it("prefers STACKPLAN_CONFIG_PATH", () => {
    expect(resolveConfigPath({ STACKPLAN_CONFIG_PATH: "~/cfg.json" }, stateDir, home, () => cwd)).toBe(
      path.join("/home/tester", "cfg.json"),
    );
  });

  it("uses stackplan.json in the working directory when present", async () => {
    await fs.writeFile(path.join(cwd, "stackplan.json"), "{}");
    await fs.writeFile(path.join(stateDir, "stackplan.json"), "{}");
    expect(resolveConfigPath({}, stateDir, home, () => cwd)).toBe(path.join(cwd, "stackplan.json"));
  });

  it("falls back to the state dir, existing or not", async () => {
    expect(resolveConfigPath({}, stateDir, home, () => cwd)).toBe(path.join(stateDir, "stackplan.json"));
    await fs.writeFile(path.join(stateDir, "stackplan.json"), "{}");
    expect(resolveConfigPath({}, stateDir, home, () => cwd)).toBe(path.join(stateDir, "stackplan.json"));
  });
});

import * as fs from "node:fs/promises";
import * as os from "node:os";
import * as path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import type { ApplyResult } from "./executor.js";
import { RecordedState } from "./state.js";
import { InMemoryHistoryStorage, SQLiteHistoryStorage, createApplyRun } from "./storage.js";
import type { HistoryStorage } from "./types.js";

function result(startedAt: string, status: ApplyResult["status"] = "succeeded"): ApplyResult {
  return {
    status,
    state: RecordedState.empty("l"),
    items: [
      { itemId: "create:aws_vpc.main", address: "aws_vpc.main", action: "create", status: "applied", durationMs: 12 },
      {
        itemId: "create:aws_subnet.a",
        address: "aws_subnet.a",
        action: "create",
        status: status === "succeeded" ? "applied" : "failed",
        durationMs: 3,
        ...(status === "succeeded" ? {} : { error: "boom", errorCode: "PROVIDER_ERROR" }),
      },
    ],
    outputs: {},
    startedAt,
    completedAt: startedAt,
    durationMs: 15,
  };
}

describe("createApplyRun", () => {
  it("counts item statuses", () => {
    const run = createApplyRun(result("2026-01-01T00:00:00.000Z", "partial"), false, "run-1");
    expect(run).toMatchObject({
      id: "run-1",
      status: "partial",
      destroy: false,
      counts: { pending: 0, "in-progress": 0, applied: 1, failed: 1, skipped: 0 },
    });
    expect(run.items[1].error).toBe("boom");
  });
});

function suite(name: string, create: (dir: string) => HistoryStorage): void {
  describe(name, () => {
    let dir: string;
    let storage: HistoryStorage;

    beforeEach(async () => {
      dir = await fs.mkdtemp(path.join(os.tmpdir(), "stackplan-history-"));
      storage = create(dir);
      await storage.initialize();
    });

    afterEach(async () => {
      await storage.close();
      await fs.rm(dir, { recursive: true, force: true });
    });

    it("saves and fetches a run", async () => {
      const run = createApplyRun(result("2026-01-01T00:00:00.000Z"), true, "run-1");
      await storage.saveRun(run);
      expect(await storage.getRun("run-1")).toEqual(run);
      expect(await storage.getRun("missing")).toBeNull();
    });

    it("lists newest first, up to the limit", async () => {
      await storage.saveRun(createApplyRun(result("2026-01-01T00:00:00.000Z"), false, "old"));
      await storage.saveRun(createApplyRun(result("2026-03-01T00:00:00.000Z"), false, "new"));
      await storage.saveRun(createApplyRun(result("2026-02-01T00:00:00.000Z"), false, "mid"));

      expect((await storage.listRuns()).map((r) => r.id)).toEqual(["new", "mid", "old"]);
      expect((await storage.listRuns(2)).map((r) => r.id)).toEqual(["new", "mid"]);
    });
  });
}

suite("InMemoryHistoryStorage", () => new InMemoryHistoryStorage());
suite("SQLiteHistoryStorage", (dir) => new SQLiteHistoryStorage(path.join(dir, "history.db")));

describe("SQLiteHistoryStorage lifecycle", () => {
  it("refuses to work before initialize", async () => {
    await expect(new SQLiteHistoryStorage(":memory:").listRuns()).rejects.toThrow("History storage is not initialized");
  });
});

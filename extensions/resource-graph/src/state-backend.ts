/**
 * State Backends (InMemory + local file)
 */

import * as fs from "node:fs/promises";
import * as path from "node:path";
import { StateFormatError, errorMessage } from "./errors.js";
import { RecordedState } from "./state.js";
import type { StateDocument } from "./types.js";

export interface StateBackend {
  /** Load state; a backend with nothing stored yields empty state. */
  load(): Promise<RecordedState>;
  save(state: RecordedState): Promise<void>;
}

// ── InMemory ────────────────────────────────────────────────────

export class InMemoryStateBackend implements StateBackend {
  private document: StateDocument | null;
  /** Number of successful saves, exposed for inspection. */
  saves = 0;

  constructor(initial?: RecordedState) {
    this.document = initial ? initial.toDocument() : null;
  }

  async load(): Promise<RecordedState> {
    return this.document ? RecordedState.fromDocument(structuredClone(this.document)) : RecordedState.empty();
  }

  async save(state: RecordedState): Promise<void> {
    this.document = state.toDocument();
    this.saves++;
  }
}

// ── Local File ──────────────────────────────────────────────────

/**
 * JSON state file. Writes go to a temporary sibling and are renamed into
 * place; the previous file is kept as `<path>.backup`.
 */
export class LocalStateBackend implements StateBackend {
  readonly filePath: string;

  constructor(filePath: string) {
    this.filePath = path.resolve(filePath);
  }

  get backupPath(): string {
    return `${this.filePath}.backup`;
  }

  async load(): Promise<RecordedState> {
    let raw: string;
    try {
      raw = await fs.readFile(this.filePath, "utf-8");
    } catch (err: unknown) {
      if (isNotFound(err)) return RecordedState.empty();
      throw err;
    }

    let doc: unknown;
    try {
      doc = JSON.parse(raw);
    } catch (err: unknown) {
      throw new StateFormatError(`State file ${this.filePath} is not valid JSON`, [errorMessage(err)]);
    }
    return RecordedState.fromDocument(doc);
  }

  async save(state: RecordedState): Promise<void> {
    await fs.mkdir(path.dirname(this.filePath), { recursive: true });

    const tmpPath = `${this.filePath}.tmp-${process.pid}`;
    await fs.writeFile(tmpPath, JSON.stringify(state.toDocument(), null, 2) + "\n", "utf-8");

    try {
      await fs.copyFile(this.filePath, this.backupPath);
    } catch (err: unknown) {
      if (!isNotFound(err)) throw err;
    }
    await fs.rename(tmpPath, this.filePath);
  }
}

function isNotFound(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}

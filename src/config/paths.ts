import fs from "node:fs";
import os from "node:os";
import path from "node:path";

export const CONFIG_FILENAME = "stackplan.json";
export const STATE_DIRNAME = ".stackplan";
export const DEFAULT_STATE_FILENAME = "stackplan.state.json";
export const HISTORY_FILENAME = "history.db";

function resolveUserPath(input: string, homedir: () => string): string {
  if (input === "~") return homedir();
  if (input.startsWith("~/")) return path.join(homedir(), input.slice(2));
  return path.resolve(input);
}

/**
 * Directory for per-user data (history database, fallback config).
 * `STACKPLAN_STATE_DIR` wins over `~/.stackplan`.
 */
export function resolveStateDir(
  env: NodeJS.ProcessEnv = process.env,
  homedir: () => string = os.homedir,
): string {
  const override = env.STACKPLAN_STATE_DIR?.trim();
  if (override) return resolveUserPath(override, homedir);
  return path.join(homedir(), STATE_DIRNAME);
}

/**
 * Active config path: `STACKPLAN_CONFIG_PATH`, then the first existing
 * candidate, then the file in the state dir (which may not exist yet).
 */
export function resolveConfigPath(
  env: NodeJS.ProcessEnv = process.env,
  stateDir: string = resolveStateDir(env, os.homedir),
  homedir: () => string = os.homedir,
  cwd: () => string = process.cwd,
): string {
  const override = env.STACKPLAN_CONFIG_PATH?.trim();
  if (override) return resolveUserPath(override, homedir);

  const candidates = [path.join(cwd(), CONFIG_FILENAME), path.join(stateDir, CONFIG_FILENAME)];
  return candidates.find((candidate) => fs.existsSync(candidate)) ?? candidates[candidates.length - 1];
}

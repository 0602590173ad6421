import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { ConfigError, errorMessage } from "../errors.js";
import { resolveConfigPath, resolveStateDir } from "./paths.js";
import { getDefaultConfig, parseConfig, type StackplanConfig } from "./schema.js";

export type ConfigIODeps = {
  env?: NodeJS.ProcessEnv;
  homedir?: () => string;
  cwd?: () => string;
  /** Explicit path, e.g. from `--config`. */
  configPath?: string;
};

export type ConfigIO = {
  readonly configPath: string;
  readonly stateDir: string;
  /** Parsed config, or defaults when the file does not exist. */
  loadConfig(): StackplanConfig;
  /** Resolve a config-relative path (relative paths resolve against the working directory). */
  resolvePath(p: string): string;
};

export function createConfigIO(deps: ConfigIODeps = {}): ConfigIO {
  const env = deps.env ?? process.env;
  const homedir = deps.homedir ?? os.homedir;
  const cwd = deps.cwd ?? process.cwd;
  const stateDir = resolveStateDir(env, homedir);
  const configPath = deps.configPath
    ? path.resolve(cwd(), deps.configPath)
    : resolveConfigPath(env, stateDir, homedir, cwd);

  return {
    configPath,
    stateDir,

    loadConfig(): StackplanConfig {
      let raw: string;
      try {
        raw = fs.readFileSync(configPath, "utf-8");
      } catch (err) {
        if (err instanceof Error && "code" in err && err.code === "ENOENT" && !deps.configPath) {
          return getDefaultConfig();
        }
        throw new ConfigError(`Cannot read config file ${configPath}`, [errorMessage(err)]);
      }

      let parsed: unknown;
      try {
        parsed = JSON.parse(raw);
      } catch (err) {
        throw new ConfigError(`Config file ${configPath} is not valid JSON`, [errorMessage(err)]);
      }
      return parseConfig(parsed, `config file ${configPath}`);
    },

    resolvePath(p: string): string {
      if (p === "~" || p.startsWith("~/")) return path.join(homedir(), p.slice(1));
      return path.resolve(cwd(), p);
    },
  };
}

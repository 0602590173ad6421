import type { Command } from "commander";
import type { StackplanConfig } from "../config/schema.js";
import type { Logger } from "../logging/index.js";
import type { RuntimeEnv } from "../runtime.js";

/** Everything a command needs once global options are known. */
export type CommandEnvironment = {
  config: StackplanConfig;
  configPath: string;
  stateDir: string;
  logger: Logger;
  resolvePath: (input: string) => string;
};

export type CliContext = {
  program: Command;
  runtime: RuntimeEnv;
  /** Loads config on first use, honouring `--config`, `--state` and `--log-level`. */
  environment: () => CommandEnvironment;
};

export type CliRegistrar = (ctx: CliContext) => void;

export type StackplanPluginApi = {
  id: string;
  logger: Logger;
  /** Resolve a path inside the state directory. */
  resolvePath: (input: string) => string;
  registerCli: (registrar: CliRegistrar, opts?: { commands?: string[] }) => void;
};

export type StackplanPlugin = {
  id: string;
  name: string;
  register: (api: StackplanPluginApi) => void;
};

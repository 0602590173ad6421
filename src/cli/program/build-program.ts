import { Command, InvalidArgumentError } from "commander";
import { createConfigIO, type ConfigIODeps } from "../../config/io.js";
import { createLogger, isLogLevel, type Logger, type LogLevel } from "../../logging/index.js";
import { loadPlugins } from "../../plugins/registry.js";
import type { CliContext, CommandEnvironment, StackplanPlugin } from "../../plugins/types.js";
import type { RuntimeEnv } from "../../runtime.js";
import { VERSION } from "../../version.js";

export type GlobalOptions = {
  config?: string;
  state?: string;
  logLevel?: LogLevel;
};

export type BuildProgramOptions = {
  runtime: RuntimeEnv;
  env?: NodeJS.ProcessEnv;
  homedir?: () => string;
  cwd?: () => string;
  plugins?: readonly StackplanPlugin[];
};

export type BuiltProgram = {
  program: Command;
  /** Close the logger if any command created one. */
  dispose: () => Promise<void>;
};

function parseLogLevel(value: string): LogLevel {
  if (!isLogLevel(value)) {
    throw new InvalidArgumentError("Expected one of trace, debug, info, warn, error, fatal.");
  }
  return value;
}

export function buildProgram(options: BuildProgramOptions): BuiltProgram {
  const { runtime } = options;
  const program = new Command();

  program
    .name("stackplan")
    .description("Plan and apply declarative resource graphs")
    .version(VERSION)
    .option("--config <path>", "Config file (default: ./stackplan.json, then ~/.stackplan/stackplan.json)")
    .option("--state <path>", "State file (overrides state.path from config)")
    .option("--log-level <level>", "Log level for this run", parseLogLevel)
    .showHelpAfterError()
    .exitOverride()
    .configureOutput({
      writeOut: (str) => runtime.log(str.trimEnd()),
      writeErr: (str) => runtime.error(str.trimEnd()),
    });

  let cached: CommandEnvironment | null = null;
  const environment = (): CommandEnvironment => {
    if (cached) return cached;
    const globals = program.opts<GlobalOptions>();
    const deps: ConfigIODeps = {
      env: options.env,
      homedir: options.homedir,
      cwd: options.cwd,
      ...(globals.config ? { configPath: globals.config } : {}),
    };
    const io = createConfigIO(deps);
    const loaded = io.loadConfig();
    const config = {
      ...loaded,
      state: { ...loaded.state, path: globals.state ?? loaded.state.path },
      logging: { ...loaded.logging, level: globals.logLevel ?? loaded.logging.level },
    };
    const logger: Logger = createLogger("stackplan", config.logging);
    logger.debug("Loaded configuration", { configPath: io.configPath });
    cached = {
      config,
      configPath: io.configPath,
      stateDir: io.stateDir,
      logger,
      resolvePath: io.resolvePath,
    };
    return cached;
  };

  const stateDir = createConfigIO({ env: options.env, homedir: options.homedir, cwd: options.cwd }).stateDir;
  const registry = loadPlugins({
    plugins: options.plugins,
    stateDir,
    logger: createLogger("plugins", { level: "warn" }),
  });

  const ctx: CliContext = { program, runtime, environment };
  for (const registration of registry.cliRegistrations) {
    registration.registrar(ctx);
  }

  return {
    program,
    dispose: async () => {
      if (cached) await cached.logger.close();
    },
  };
}

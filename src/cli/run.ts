import { CommanderError } from "commander";
import { formatError } from "../errors.js";
import { defaultRuntime, type RuntimeEnv } from "../runtime.js";
import { buildProgram, type BuildProgramOptions } from "./program/build-program.js";

export type RunCliOptions = Partial<BuildProgramOptions>;

/**
 * Parse `argv` (including the node and script entries) and run the matching
 * command. Resolves to the exit code instead of exiting.
 */
export async function runCli(argv: string[], options: RunCliOptions = {}): Promise<number> {
  const base = options.runtime ?? defaultRuntime;
  let exitCode = 0;
  const runtime: RuntimeEnv = {
    log: base.log,
    error: base.error,
    exit: (code) => {
      exitCode = code;
    },
  };

  const { program, dispose } = buildProgram({ ...options, runtime });
  try {
    await program.parseAsync(argv);
  } catch (err) {
    if (err instanceof CommanderError) {
      exitCode = err.exitCode;
    } else {
      runtime.error(formatError(err));
      exitCode = 1;
    }
  } finally {
    await dispose();
  }

  base.exit(exitCode);
  return exitCode;
}

export type RuntimeEnv = {
  log: (...args: unknown[]) => void;
  error: (...args: unknown[]) => void;
  /** Records the process exit code; the process is left to finish on its own. */
  exit: (code: number) => void;
};

export const defaultRuntime: RuntimeEnv = {
  log: (...args) => {
    console.log(...args);
  },
  error: (...args) => {
    console.error(...args);
  },
  exit: (code) => {
    process.exitCode = code;
  },
};

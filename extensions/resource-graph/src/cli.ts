/**
 * CLI Commands
 */

import { InvalidArgumentError } from "commander";
import type { CliContext, CommandEnvironment } from "../../../src/plugins/types.js";
import { loadDeclarationFile } from "./declarations.js";
import { NotFoundError } from "./errors.js";
import { Executor, type ApplyResult, type PersistMode } from "./executor.js";
import { ImmutabilityPolicy } from "./immutability.js";
import { maskOutput } from "./outputs.js";
import { isEmptyPlan, plan, summarizePlan } from "./planner.js";
import { ProviderRegistry, SimulatedProvider } from "./providers.js";
import { resolveReferences } from "./references.js";
import { renderApplyResult, renderGraphDot, renderPlan } from "./render.js";
import { LocalStateBackend } from "./state-backend.js";
import { createApplyRun } from "./storage.js";
import type { HistoryStorage, ProviderAdapter } from "./types.js";

export const RESOURCE_GRAPH_COMMANDS = ["validate", "graph", "plan", "apply", "destroy", "state", "output", "history"];

export interface ResourceGraphCliDeps {
  /** Defaults to the simulated provider configured under `simulator`. */
  createProvider?: (env: CommandEnvironment) => ProviderAdapter;
  openHistory: (env: CommandEnvironment) => HistoryStorage;
}

function parsePositiveInt(value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n < 1) throw new InvalidArgumentError("Expected a positive integer.");
  return n;
}

function parseNonNegativeInt(value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n < 0) throw new InvalidArgumentError("Expected a non-negative integer.");
  return n;
}

function parsePersistMode(value: string): PersistMode {
  if (value !== "per-item" && value !== "end") throw new InvalidArgumentError('Expected "per-item" or "end".');
  return value;
}

function defaultProvider(env: CommandEnvironment): ProviderAdapter {
  const { latencyMs, failOn, region } = env.config.simulator;
  return new ProviderRegistry().setFallback(new SimulatedProvider({ latencyMs, failOn, region }));
}

type ApplyOptions = {
  autoApprove?: boolean;
  concurrency?: number;
  timeout?: number;
  persist?: PersistMode;
};

export function createResourceGraphCli(deps: ResourceGraphCliDeps) {
  const createProvider = deps.createProvider ?? defaultProvider;
  const { openHistory } = deps;

  return (ctx: CliContext): void => {
    const { program, runtime, environment } = ctx;

    const stateBackend = (env: CommandEnvironment): LocalStateBackend =>
      new LocalStateBackend(env.resolvePath(env.config.state.path));

    const immutability = (env: CommandEnvironment): ImmutabilityPolicy =>
      ImmutabilityPolicy.defaults().withOverrides(env.config.immutability);

    async function withHistory<T>(env: CommandEnvironment, fn: (storage: HistoryStorage) => Promise<T>): Promise<T> {
      const storage = openHistory(env);
      await storage.initialize();
      try {
        return await fn(storage);
      } finally {
        await storage.close();
      }
    }

    async function runApply(file: string | undefined, destroy: boolean, opts: ApplyOptions): Promise<void> {
      const env = environment();
      const declarations = file ? await loadDeclarationFile(env.resolvePath(file)) : null;
      const graph = resolveReferences(declarations ?? []);
      const backend = stateBackend(env);
      const state = await backend.load();
      const planned = plan(graph, state, {
        immutability: immutability(env),
        destroy,
        outputs: declarations?.outputs() ?? [],
      });

      if (!opts.autoApprove) {
        runtime.log(renderPlan(planned));
        if (!isEmptyPlan(planned)) {
          runtime.log("");
          runtime.log(`Run again with --auto-approve to ${destroy ? "destroy" : "apply"} these changes.`);
        }
        return;
      }

      const controller = new AbortController();
      const onInterrupt = (): void => {
        env.logger.warn("Interrupted, finishing in-flight items and skipping the rest");
        controller.abort();
      };
      process.once("SIGINT", onInterrupt);

      const executor = new Executor(createProvider(env), {
        timeoutMs: opts.timeout ?? env.config.execution.timeoutMs,
        concurrency: opts.concurrency ?? env.config.execution.concurrency,
        persist: opts.persist ?? env.config.execution.persist,
        backend,
        signal: controller.signal,
        logger: env.logger.child("apply"),
      });

      let result: ApplyResult;
      try {
        result = await executor.apply(planned, state);
      } finally {
        process.removeListener("SIGINT", onInterrupt);
      }

      if (env.config.history.enabled) {
        const run = createApplyRun(result, destroy);
        await withHistory(env, (storage) => storage.saveRun(run));
        env.logger.debug(`Recorded apply run ${run.id}`);
      }

      runtime.log(renderApplyResult(result));
      const outputs = Object.entries(result.outputs);
      if (outputs.length > 0) {
        runtime.log("");
        runtime.log("Outputs:");
        for (const [name, output] of outputs) runtime.log(`  ${name} = ${JSON.stringify(maskOutput(output))}`);
      }
      if (result.error) throw result.error;
    }

    // ── validate ────────────────────────────────────────────────
    program
      .command("validate")
      .description("Check a declaration file: schema, references and cycles")
      .argument("<file>", "Declaration file (JSON)")
      .action(async (file: string) => {
        const env = environment();
        const declarations = await loadDeclarationFile(env.resolvePath(file));
        const graph = resolveReferences(declarations);
        graph.topoOrder();
        runtime.log(
          `Valid: ${declarations.size} resources, ${graph.edges().length} dependencies, ${declarations.outputs().length} outputs.`,
        );
      });

    // ── graph ───────────────────────────────────────────────────
    program
      .command("graph")
      .description("Print the dependency graph")
      .argument("<file>", "Declaration file (JSON)")
      .option("--order", "Print the apply order instead of DOT")
      .action(async (file: string, opts: { order?: boolean }) => {
        const env = environment();
        const graph = resolveReferences(await loadDeclarationFile(env.resolvePath(file)));
        if (opts.order) {
          graph.topoOrder().forEach((node, i) => runtime.log(`${i + 1}. ${node.address}`));
          return;
        }
        runtime.log(renderGraphDot(graph));
      });

    // ── plan ────────────────────────────────────────────────────
    program
      .command("plan")
      .description("Show the changes needed to converge recorded state onto the declarations")
      .argument("<file>", "Declaration file (JSON)")
      .option("--destroy", "Plan deletion of every recorded resource")
      .option("--json", "Output as JSON")
      .action(async (file: string, opts: { destroy?: boolean; json?: boolean }) => {
        const env = environment();
        const declarations = await loadDeclarationFile(env.resolvePath(file));
        const state = await stateBackend(env).load();
        const planned = plan(resolveReferences(declarations), state, {
          immutability: immutability(env),
          destroy: opts.destroy ?? false,
          outputs: declarations.outputs(),
        });

        if (opts.json) {
          runtime.log(
            JSON.stringify(
              {
                stateSerial: planned.stateSerial,
                stateLineage: planned.stateLineage,
                destroy: planned.destroy,
                summary: summarizePlan(planned),
                items: planned.items,
              },
              null,
              2,
            ),
          );
          return;
        }
        runtime.log(renderPlan(planned));
      });

    // ── apply / destroy ─────────────────────────────────────────
    program
      .command("apply")
      .description("Plan and apply the declarations")
      .argument("<file>", "Declaration file (JSON)")
      .option("--auto-approve", "Apply without stopping at the plan")
      .option("--concurrency <n>", "Items applied at once", parsePositiveInt)
      .option("--timeout <ms>", "Timeout per provider call (0 disables)", parseNonNegativeInt)
      .option("--persist <mode>", 'When state is saved: "per-item" or "end"', parsePersistMode)
      .action(async (file: string, opts: ApplyOptions) => {
        await runApply(file, false, opts);
      });

    program
      .command("destroy")
      .description("Delete every recorded resource")
      .option("--auto-approve", "Destroy without stopping at the plan")
      .option("--concurrency <n>", "Items applied at once", parsePositiveInt)
      .option("--timeout <ms>", "Timeout per provider call (0 disables)", parseNonNegativeInt)
      .action(async (opts: ApplyOptions) => {
        await runApply(undefined, true, opts);
      });

    // ── state ───────────────────────────────────────────────────
    const state = program.command("state").description("Inspect recorded state");

    state
      .command("list")
      .description("List recorded resource addresses")
      .action(async () => {
        const recorded = await stateBackend(environment()).load();
        for (const address of recorded.addresses()) runtime.log(address);
      });

    state
      .command("show")
      .description("Show one recorded resource")
      .argument("<address>", "Resource address (kind.name)")
      .action(async (address: string) => {
        const entry = (await stateBackend(environment()).load()).get(address);
        if (!entry) throw new NotFoundError("Resource", address);
        runtime.log(JSON.stringify({ address, ...entry }, null, 2));
      });

    // ── output ──────────────────────────────────────────────────
    program
      .command("output")
      .description("Show recorded outputs")
      .argument("[name]", "A single output")
      .option("--json", "Output as JSON")
      .option("--show-sensitive", "Print sensitive values")
      .action(async (name: string | undefined, opts: { json?: boolean; showSensitive?: boolean }) => {
        const outputs = (await stateBackend(environment()).load()).getOutputs();
        const show = opts.showSensitive ?? false;

        if (name !== undefined) {
          const output = outputs[name];
          if (!output) throw new NotFoundError("Output", name);
          runtime.log(JSON.stringify(maskOutput(output, show)));
          return;
        }

        if (opts.json) {
          const masked = Object.fromEntries(
            Object.entries(outputs).map(([key, output]) => [key, { value: maskOutput(output, show), sensitive: output.sensitive }]),
          );
          runtime.log(JSON.stringify(masked, null, 2));
          return;
        }
        for (const [key, output] of Object.entries(outputs)) {
          runtime.log(`${key} = ${JSON.stringify(maskOutput(output, show))}`);
        }
      });

    // ── history ─────────────────────────────────────────────────
    program
      .command("history")
      .description("List recent apply runs")
      .option("--limit <n>", "Number of runs", parsePositiveInt, 10)
      .option("--json", "Output as JSON")
      .action(async (opts: { limit: number; json?: boolean }) => {
        const env = environment();
        if (!env.config.history.enabled) {
          runtime.log("Apply history is disabled.");
          return;
        }
        const runs = await withHistory(env, (storage) => storage.listRuns(opts.limit));
        if (opts.json) {
          runtime.log(JSON.stringify(runs, null, 2));
          return;
        }
        if (runs.length === 0) {
          runtime.log("No apply runs recorded.");
          return;
        }
        for (const run of runs) {
          const { applied, failed, skipped } = run.counts;
          runtime.log(
            `${run.startedAt}  ${run.status.padEnd(9)}  ${run.id}  applied=${applied} failed=${failed} skipped=${skipped}${run.destroy ? "  (destroy)" : ""}`,
          );
        }
      });
  };
}

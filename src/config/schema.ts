/**
 * Configuration Schema
 *
 * Every key is optional; defaults fill in the rest.
 */

import { z } from "zod";
import { ConfigError } from "../errors.js";
import { DEFAULT_STATE_FILENAME } from "./paths.js";

export const logLevelSchema = z.enum(["trace", "debug", "info", "warn", "error", "fatal"]);

const logDestinationSchema = z.discriminatedUnion("type", [
  z.object({
    type: z.literal("console"),
    minLevel: logLevelSchema.optional(),
    format: z.enum(["text", "json"]).optional(),
  }),
  z.object({
    type: z.literal("file"),
    path: z.string().min(1),
    minLevel: logLevelSchema.optional(),
    format: z.enum(["text", "json"]).optional(),
  }),
]);

export const loggingConfigSchema = z
  .object({
    level: logLevelSchema.default("warn"),
    destinations: z.array(logDestinationSchema).default([]),
    redactPatterns: z.array(z.string()).default([]),
  })
  .default({});

export const stateConfigSchema = z
  .object({
    path: z.string().min(1).default(DEFAULT_STATE_FILENAME),
  })
  .default({});

export const executionConfigSchema = z
  .object({
    timeoutMs: z.number().int().nonnegative().default(300_000),
    concurrency: z.number().int().positive().default(1),
    persist: z.enum(["per-item", "end"]).default("per-item"),
  })
  .default({});

export const historyConfigSchema = z
  .object({
    enabled: z.boolean().default(true),
    path: z.string().min(1).optional(),
  })
  .default({});

/** Settings for the built-in simulated provider. */
export const simulatorConfigSchema = z
  .object({
    latencyMs: z.number().int().nonnegative().default(0),
    failOn: z.array(z.string()).default([]),
    region: z.string().default("us-east-1"),
  })
  .default({});

export const stackplanConfigSchema = z
  .object({
    $schema: z.string().optional(),
    logging: loggingConfigSchema,
    state: stateConfigSchema,
    execution: executionConfigSchema,
    immutability: z.record(z.string(), z.array(z.string().min(1))).default({}),
    history: historyConfigSchema,
    simulator: simulatorConfigSchema,
  })
  .strict();

export type StackplanConfig = z.output<typeof stackplanConfigSchema>;
export type StackplanConfigInput = z.input<typeof stackplanConfigSchema>;

export function validateConfig(config: unknown): ReturnType<typeof stackplanConfigSchema.safeParse> {
  return stackplanConfigSchema.safeParse(config);
}

/**
 * Parse and default a raw config object.
 *
 * @throws ConfigError listing every schema issue.
 */
export function parseConfig(config: unknown, source = "config"): StackplanConfig {
  const result = validateConfig(config);
  if (!result.success) {
    throw new ConfigError(
      `Invalid ${source}`,
      result.error.issues.map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`),
    );
  }
  return result.data;
}

export function getDefaultConfig(): StackplanConfig {
  return parseConfig({});
}

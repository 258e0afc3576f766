/**
 * State Graph — Configuration
 *
 * Defaults, an optional JSON config file, then environment overrides; the
 * merged result is validated with zod.
 */

import * as fs from "node:fs";
import { z } from "zod";
import { ConfigError } from "./errors.js";
import { formatIssues } from "./schema.js";
import { DEFAULT_STDIN_LIMIT } from "./state-file.js";

export const loggingConfigSchema = z.object({
  level: z.enum(["trace", "debug", "info", "warn", "error", "fatal"]).default("info"),
  timestamps: z.boolean().default(true),
  colors: z.boolean().optional(),
});

export const inferenceConfigSchema = z.object({
  onAmbiguousSource: z.enum(["abort", "skip"]).default("abort"),
});

export const ioConfigSchema = z.object({
  stdinLimitBytes: z.number().int().positive().default(DEFAULT_STDIN_LIMIT),
});

export const stateGraphConfigSchema = z.object({
  logging: loggingConfigSchema.default({}),
  inference: inferenceConfigSchema.default({}),
  io: ioConfigSchema.default({}),
});

export type StateGraphConfig = z.infer<typeof stateGraphConfigSchema>;

export const ENV_CONFIG_FILE = "STATEGRAPH_CONFIG";
export const ENV_LOG_LEVEL = "STATEGRAPH_LOG_LEVEL";
export const ENV_ON_AMBIGUOUS_SOURCE = "STATEGRAPH_ON_AMBIGUOUS_SOURCE";

export interface LoadConfigOptions {
  /** Config file path; falls back to $STATEGRAPH_CONFIG. */
  file?: string;
  env?: NodeJS.ProcessEnv;
}

function isObject(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null && !Array.isArray(v);
}

function readConfigFile(file: string): Record<string, unknown> {
  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(file, "utf-8"));
  } catch (err) {
    throw new ConfigError(`cannot read config file "${file}"`, [err instanceof Error ? err.message : String(err)]);
  }
  if (!isObject(raw)) throw new ConfigError(`config file "${file}" must contain a JSON object`);
  return raw;
}

function section(base: Record<string, unknown>, name: string): Record<string, unknown> {
  const v = base[name];
  return isObject(v) ? { ...v } : {};
}

export function loadConfig(options: LoadConfigOptions = {}): StateGraphConfig {
  const env = options.env ?? process.env;
  const file = options.file ?? env[ENV_CONFIG_FILE];
  const base = file ? readConfigFile(file) : {};

  const merged: Record<string, unknown> = { ...base };
  const logging = section(base, "logging");
  const inference = section(base, "inference");
  if (env[ENV_LOG_LEVEL]) logging.level = env[ENV_LOG_LEVEL];
  if (env[ENV_ON_AMBIGUOUS_SOURCE]) inference.onAmbiguousSource = env[ENV_ON_AMBIGUOUS_SOURCE];
  merged.logging = logging;
  merged.inference = inference;

  const result = stateGraphConfigSchema.safeParse(merged);
  if (!result.success) throw new ConfigError("invalid configuration", formatIssues(result.error));
  return result.data;
}

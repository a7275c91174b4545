// =============================================================================
// Interpreter Config — Defaults, JSON config file, and environment overrides
// =============================================================================

import { existsSync, readFileSync } from "node:fs";
import { z } from "zod";
import { DEFAULT_MAX_LINE_LENGTH } from "../adapters/decoder/json-line-decoder.adapter.js";
import { DEFAULT_BINDING_KEY } from "../adapters/binding/state-binding-resolver.adapter.js";
import { ConfigValidationError } from "../errors.js";
import { LOG_LEVELS } from "../logging/logger.js";

export const InterpreterConfigSchema = z
  .object({
    bindingKey: z.string().min(1).default(DEFAULT_BINDING_KEY),
    maxListeners: z.number().int().positive().default(100),
    maxLineLength: z.number().int().positive().default(DEFAULT_MAX_LINE_LENGTH),
    logLevel: z.enum(LOG_LEVELS).default("info"),
  })
  .strict();

export type InterpreterConfig = z.output<typeof InterpreterConfigSchema>;
export type InterpreterConfigInput = z.input<typeof InterpreterConfigSchema>;

const ConfigObjectSchema = z.record(z.string(), z.unknown());

/** Environment variables read by {@link configFromEnv}. */
export const ENV_MAP = {
  logLevel: "GSP_LOG_LEVEL",
  bindingKey: "GSP_BINDING_KEY",
  maxLineLength: "GSP_MAX_LINE_LENGTH",
} as const;

export function parseConfig(input: unknown): InterpreterConfig {
  const result = InterpreterConfigSchema.safeParse(input);
  if (result.success) return result.data;
  const issue = result.error.issues[0];
  const field = issue && issue.path.length > 0 ? issue.path.join(".") : undefined;
  throw new ConfigValidationError(issue?.message ?? "Invalid configuration", field);
}

/** Reads a JSON config file. Values are validated when the layers are merged. */
export function loadConfigFile(path: string): Record<string, unknown> {
  if (!existsSync(path)) {
    throw new ConfigValidationError(`Config file not found: ${path}`);
  }
  let parsed: unknown;
  try {
    parsed = JSON.parse(readFileSync(path, "utf-8"));
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new ConfigValidationError(`Config file ${path} is not valid JSON (${reason})`);
  }
  const object = ConfigObjectSchema.safeParse(parsed);
  if (!object.success) {
    throw new ConfigValidationError(`Config file ${path} must contain a JSON object`);
  }
  // Field types are checked by parseConfig once every layer is merged.
  return object.data;
}

export function configFromEnv(env: NodeJS.ProcessEnv = process.env): Record<string, unknown> {
  const out: Record<string, unknown> = {};
  const logLevel = env[ENV_MAP.logLevel];
  if (logLevel) out.logLevel = logLevel;
  const bindingKey = env[ENV_MAP.bindingKey];
  if (bindingKey) out.bindingKey = bindingKey;
  const maxLineLength = env[ENV_MAP.maxLineLength];
  if (maxLineLength) out.maxLineLength = Number(maxLineLength);
  return out;
}

export interface ResolveConfigOptions {
  /** Path to a JSON config file. */
  file?: string;
  /** Environment to read overrides from (default: process.env). */
  env?: NodeJS.ProcessEnv;
  /** Explicit values; win over every other source. */
  overrides?: Record<string, unknown>;
}

/** Layers defaults → file → environment → overrides, then validates. */
export function resolveConfig(options: ResolveConfigOptions = {}): InterpreterConfig {
  const fromFile = options.file ? loadConfigFile(options.file) : {};
  return parseConfig({
    ...fromFile,
    ...configFromEnv(options.env),
    ...options.overrides,
  });
}

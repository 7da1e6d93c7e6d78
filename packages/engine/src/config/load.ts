/**
 * Configuration loading (priority: CLI > ENV > sealbox.config.json > preset > defaults)
 */

import { readFile } from "node:fs/promises";
import { z } from "zod";
import {
  CAPABILITIES,
  ConfigError,
  DEFAULT_CONFIG,
  LIMIT_PRESETS,
  LIMIT_PRESET_NAMES,
  createLimits,
  type LimitsPreset,
  type ResourceLimits,
  type SealboxConfig,
} from "@sealbox/shared";

export const CONFIG_FILE_NAME = "sealbox.config.json";

export const configSchema = z
  .object({
    max_module_size_kb: z.number().positive(),
    memory_limit_mb: z.number().positive(),
    execution_time_ms: z.number().int().positive(),
    fuel_limit: z.number().int().positive().max(Number.MAX_SAFE_INTEGER),
    capabilities: z.array(z.enum(CAPABILITIES)),
    signing_key_path: z.string().min(1).optional(),
    failure_receipts: z.enum(["none", "signed"]).optional(),
    nonce_source: z.enum(["counter", "random"]).optional(),
    preset: z.enum(LIMIT_PRESET_NAMES).optional(),
  })
  .strict();

/**
 * Partial overrides from the environment or command-line flags
 */
export type ConfigOverrides = Partial<SealboxConfig>;

const ENV_KEYS = {
  SEALBOX_MAX_MODULE_SIZE_KB: "max_module_size_kb",
  SEALBOX_MEMORY_LIMIT_MB: "memory_limit_mb",
  SEALBOX_EXECUTION_TIME_MS: "execution_time_ms",
  SEALBOX_FUEL_LIMIT: "fuel_limit",
} as const;

function parseNumber(name: string, raw: string): number {
  const value = Number(raw);
  if (raw.trim() === "" || !Number.isFinite(value)) {
    throw new ConfigError(`${name} must be a number, got "${raw}"`);
  }
  return value;
}

/**
 * Comma-separated capability list, e.g. `Hash,Json`
 */
export function parseCapabilityList(raw: string): SealboxConfig["capabilities"] {
  const names = raw
    .split(",")
    .map((name) => name.trim())
    .filter((name) => name.length > 0);
  const parsed = z.array(z.enum(CAPABILITIES)).safeParse(names);
  if (!parsed.success) {
    throw new ConfigError(`Unknown capability in "${raw}", expected ${CAPABILITIES.join(", ")}`);
  }
  return parsed.data;
}

export function parsePreset(name: string, raw: string): LimitsPreset {
  const parsed = z.enum(LIMIT_PRESET_NAMES).safeParse(raw.trim());
  if (!parsed.success) {
    throw new ConfigError(`${name} must be one of ${LIMIT_PRESET_NAMES.join(", ")}, got "${raw}"`);
  }
  return parsed.data;
}

function presetConfig(preset: LimitsPreset): ConfigOverrides {
  const limits = LIMIT_PRESETS[preset];
  return {
    memory_limit_mb: limits.memoryLimitMb,
    execution_time_ms: limits.executionTimeMs,
    fuel_limit: limits.fuelLimit,
    capabilities: [...limits.capabilities],
  };
}

export function overridesFromEnv(env: NodeJS.ProcessEnv = process.env): ConfigOverrides {
  const overrides: ConfigOverrides = {};
  for (const [variable, key] of Object.entries(ENV_KEYS)) {
    const raw = env[variable];
    if (raw !== undefined) overrides[key] = parseNumber(variable, raw);
  }
  if (env.SEALBOX_CAPABILITIES !== undefined) {
    overrides.capabilities = parseCapabilityList(env.SEALBOX_CAPABILITIES);
  }
  if (env.SEALBOX_PRESET !== undefined) {
    overrides.preset = parsePreset("SEALBOX_PRESET", env.SEALBOX_PRESET);
  }
  return overrides;
}

/**
 * Merge layers over the selected preset and the defaults (later layers win,
 * unset keys are skipped) and validate the result. The preset fills only the
 * limits that no layer sets.
 */
export function resolveConfig(...layers: ConfigOverrides[]): SealboxConfig {
  const explicit: Record<string, unknown> = {};
  for (const layer of layers) {
    for (const [key, value] of Object.entries(layer)) {
      if (value !== undefined) explicit[key] = value;
    }
  }
  const preset = z.enum(LIMIT_PRESET_NAMES).optional().safeParse(explicit.preset);
  const base = preset.success && preset.data ? presetConfig(preset.data) : {};
  const parsed = configSchema.safeParse({ ...DEFAULT_CONFIG, ...base, ...explicit });
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new ConfigError(
      issue ? `Invalid configuration at ${issue.path.join(".") || "(root)"}: ${issue.message}` : "Invalid configuration"
    );
  }
  return { ...DEFAULT_CONFIG, ...parsed.data };
}

export async function readConfigFile(path: string): Promise<ConfigOverrides> {
  let text: string;
  try {
    text = await readFile(path, "utf-8");
  } catch (error) {
    if (error instanceof Error && "code" in error && error.code === "ENOENT") return {};
    throw error;
  }
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    throw new ConfigError(`${path} is not valid JSON`, { cause: error });
  }
  const parsed = configSchema.partial().safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new ConfigError(`Invalid ${path}: ${issue ? `${issue.path.join(".")} ${issue.message}` : "unknown error"}`);
  }
  return parsed.data;
}

export interface LoadConfigOptions {
  path?: string;
  env?: NodeJS.ProcessEnv;
  /** Command-line flags, highest priority */
  flags?: ConfigOverrides;
}

export async function loadConfig(options: LoadConfigOptions = {}): Promise<SealboxConfig> {
  const file = await readConfigFile(options.path ?? CONFIG_FILE_NAME);
  return resolveConfig(file, overridesFromEnv(options.env), options.flags ?? {});
}

export function limitsFromConfig(config: SealboxConfig): ResourceLimits {
  return createLimits(
    {
      memoryLimitMb: config.memory_limit_mb,
      executionTimeMs: config.execution_time_ms,
      fuelLimit: config.fuel_limit,
      capabilities: config.capabilities,
    },
    LIMIT_PRESETS[config.preset ?? "default"]
  );
}

/**
 * Configuration types - sealbox.config.json
 */

import type { Capability, ResourceLimits } from "./capsule.js";

/**
 * On-disk configuration surface. Keys keep their documented snake_case names.
 */
export interface SealboxConfig {
  max_module_size_kb: number;
  memory_limit_mb: number;
  execution_time_ms: number;
  fuel_limit: number;
  capabilities: Capability[];
  signing_key_path?: string; // default ".sealbox/keys/"
  failure_receipts?: FailureReceiptMode; // default "none"
  nonce_source?: NonceSource; // default "counter"
  /** Supplies the limits that no other layer sets */
  preset?: LimitsPreset; // default "default"
}

/**
 * Whether a failed execution still yields a signed receipt
 */
export type FailureReceiptMode = "none" | "signed";

export type NonceSource = "counter" | "random";

export const LIMIT_PRESET_NAMES = ["default", "development", "production"] as const;

export type LimitsPreset = (typeof LIMIT_PRESET_NAMES)[number];

/**
 * Default limits
 */
export const DEFAULT_LIMITS: ResourceLimits = Object.freeze({
  memoryLimitMb: 32,
  executionTimeMs: 1000,
  fuelLimit: 1_000_000,
  capabilities: Object.freeze<Capability[]>(["Hash", "Json"]),
});

/**
 * Permissive limits for local development
 */
export const DEVELOPMENT_LIMITS: ResourceLimits = Object.freeze({
  memoryLimitMb: 64,
  executionTimeMs: 5000,
  fuelLimit: 10_000_000,
  capabilities: Object.freeze<Capability[]>(["Hash", "Json", "Base64", "Time", "Random"]),
});

/**
 * Restrictive limits for production nodes
 */
export const PRODUCTION_LIMITS: ResourceLimits = Object.freeze({
  memoryLimitMb: 16,
  executionTimeMs: 500,
  fuelLimit: 500_000,
  capabilities: Object.freeze<Capability[]>(["Hash"]),
});

export const LIMIT_PRESETS: Record<LimitsPreset, ResourceLimits> = {
  default: DEFAULT_LIMITS,
  development: DEVELOPMENT_LIMITS,
  production: PRODUCTION_LIMITS,
};

export const DEFAULT_CONFIG: SealboxConfig = {
  max_module_size_kb: 5,
  memory_limit_mb: DEFAULT_LIMITS.memoryLimitMb,
  execution_time_ms: DEFAULT_LIMITS.executionTimeMs,
  fuel_limit: DEFAULT_LIMITS.fuelLimit,
  capabilities: [...DEFAULT_LIMITS.capabilities],
  signing_key_path: ".sealbox/keys/",
  failure_receipts: "none",
  nonce_source: "counter",
};

/**
 * Build a frozen ResourceLimits value
 */
export function createLimits(
  overrides: Partial<ResourceLimits> = {},
  base: ResourceLimits = DEFAULT_LIMITS
): ResourceLimits {
  const capabilities = overrides.capabilities ?? base.capabilities;
  return Object.freeze({
    memoryLimitMb: overrides.memoryLimitMb ?? base.memoryLimitMb,
    executionTimeMs: overrides.executionTimeMs ?? base.executionTimeMs,
    fuelLimit: overrides.fuelLimit ?? base.fuelLimit,
    capabilities: Object.freeze([...new Set(capabilities)]),
  });
}

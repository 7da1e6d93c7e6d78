/**
 * Capsule types - untrusted modules, capabilities and execution limits
 */

import type { ValidationError } from "../errors.js";

/**
 * Closed set of capability grants. Adding a variant is a design change,
 * not configuration.
 */
export const CAPABILITIES = ["Hash", "Json", "Base64", "Time", "Random"] as const;

export type Capability = (typeof CAPABILITIES)[number];

/**
 * Host functions a capsule may import from the `env` namespace
 */
export const HOST_FUNCTION_NAMES = [
  "hash_commit",
  "json_path",
  "base64_encode",
  "base64_decode",
  "time_now_ms",
  "random_bytes",
] as const;

export type HostFunctionName = (typeof HOST_FUNCTION_NAMES)[number];

export interface CapsuleModule {
  readonly bytes: Uint8Array;
  /** SHA-256 of `bytes`, lowercase hex */
  readonly id: string;
}

export interface ResourceLimits {
  readonly memoryLimitMb: number;
  readonly executionTimeMs: number;
  readonly fuelLimit: number;
  readonly capabilities: readonly Capability[];
}

/**
 * Import as declared by the module, `env::hash_commit` style when printed
 */
export interface ModuleImport {
  namespace: string;
  name: string;
}

export type ValidationResult = ValidationSuccess | ValidationFailure;

interface ValidationBase {
  sizeBytes: number;
  sizeKb: number;
  exports: string[];
  imports: ModuleImport[];
  warnings: string[];
}

export interface ValidationSuccess extends ValidationBase {
  valid: true;
}

export interface ValidationFailure extends ValidationBase {
  valid: false;
  error: ValidationError;
}

/**
 * Values the caller injects so host functions stay reproducible
 */
export interface HostEnvironment {
  /** Returned by `time_now_ms` */
  timeMs: number;
  /** Keys the `random_bytes` stream */
  seed: Uint8Array;
}

export interface AccessLogEntry {
  seq: number;
  capability: Capability;
  function: HostFunctionName;
}

/**
 * Wire format: field names are part of the receipt encoding
 */
export interface ExecMetrics {
  fuel_used: number;
  memory_mb: number;
  duration_ms: number;
  host_calls: number;
}

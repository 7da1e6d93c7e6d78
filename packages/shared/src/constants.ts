/**
 * Shared constants
 */

/**
 * Module size ceiling (validator default)
 */
export const DEFAULT_MAX_MODULE_SIZE_KB = 5;

/**
 * Warn once a module passes this share of the size ceiling
 */
export const SIZE_WARNING_RATIO = 0.8;

/**
 * Guest ABI
 */
export const GUEST_ABI = {
  ENTRY_EXPORT: "run",
  MEMORY_EXPORT: "memory",
  HOST_NAMESPACE: "env",
  INPUT_OFFSET: 1024,
  MAX_IO_BYTES: 1024 * 1024, // 1MB
  WASM_PAGE_BYTES: 64 * 1024,
} as const;

/**
 * Export names injected by the fuel/memory instrumentation; guests may not use the prefix
 */
export const METERING_EXPORTS = {
  PREFIX: "__sealbox_",
  FUEL: "__sealbox_fuel",
  MEMORY_LIMIT: "__sealbox_mem_limit",
  OOM: "__sealbox_oom",
  START: "__sealbox_start",
  CHECKPOINT: "__sealbox_checkpoint",
  CHECKPOINT_TABLE: "__sealbox_checkpoint_table",
} as const;

/**
 * Fuel units between progress reports a running guest leaves for the engine.
 * Metrics of a guest stopped by its deadline are accurate to this many units.
 */
export const CHECKPOINT_INTERVAL = 10_000;

/**
 * Largest single host-function transfer between guest and host
 */
export const HOST_TRANSFER_LIMIT = 64 * 1024;

/**
 * Host function return codes visible to guests
 */
export const HOST_STATUS = {
  NOT_FOUND: -1,
  OUTPUT_TOO_SMALL: -2,
} as const;

/**
 * Receipt encoding
 */
export const RECEIPT_FORMAT = {
  PAYLOAD_TAG: "SEALBOX_RECEIPT_V1",
  DIGEST_HEX_LENGTH: 64,
  PUBLIC_KEY_HEX_LENGTH: 64,
  DEFAULT_MAX_AGE_SECONDS: 3600,
} as const;

/**
 * Module cache bounds
 */
export const MODULE_CACHE = {
  MAX_ENTRIES: 64,
} as const;

/**
 * CLI exit codes
 */
export const EXIT_CODES = {
  OK: 0,
  INTERNAL: 1,
  VALIDATION: 2,
  SECURITY: 3,
  EXECUTION: 4,
  RECEIPT: 5,
  CONFIG: 6,
} as const;

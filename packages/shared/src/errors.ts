/**
 * Error taxonomy shared by every pipeline stage
 *
 * Each class carries a string `code` so callers can switch on it without
 * instanceof checks across package boundaries.
 */

import type { ExecMetrics, ExecutionReceipt } from "./types/index.js";

export type ValidationErrorCode =
  | "TooLarge"
  | "Malformed"
  | "MissingExport"
  | "UnauthorizedImport";

export type SecurityErrorCode = "CapabilityDenied";

export type ResourceKind = "Fuel" | "Memory";

export type ExecutionErrorCode =
  | "Trap"
  | "Timeout"
  | "ResourceExceeded"
  | "HostFunctionFailure";

export type ReceiptErrorCode =
  | "SignatureInvalid"
  | "CommitmentMismatch"
  | "MalformedReceipt"
  | "Expired";

export abstract class SealboxError extends Error {
  abstract readonly code: string;

  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class ValidationError extends SealboxError {
  constructor(
    readonly code: ValidationErrorCode,
    message: string,
    options?: ErrorOptions
  ) {
    super(message, options);
  }
}

export class SecurityError extends SealboxError {
  readonly code: SecurityErrorCode = "CapabilityDenied";

  constructor(
    readonly namespace: string,
    readonly importName: string
  ) {
    super(`Import ${namespace}::${importName} is not granted by the capability set`);
  }
}

export class ExecutionError extends SealboxError {
  /** Signed failure receipt, when the runtime is configured to record failures */
  receipt?: ExecutionReceipt;

  constructor(
    readonly code: ExecutionErrorCode,
    message: string,
    readonly metrics: ExecMetrics,
    readonly resource?: ResourceKind,
    options?: ErrorOptions
  ) {
    super(message, options);
  }

  /**
   * `ResourceExceeded(Fuel)` style label used in logs and failure commitments
   */
  get label(): string {
    return this.resource ? `${this.code}(${this.resource})` : this.code;
  }
}

/**
 * Unreadable or invalid configuration: the config file, a SEALBOX_*
 * variable or a command-line flag
 */
export class ConfigError extends SealboxError {
  readonly code = "InvalidConfig";
}

export class ReceiptError extends SealboxError {
  constructor(
    readonly code: ReceiptErrorCode,
    message: string
  ) {
    super(message);
  }
}

export function isSealboxError(error: unknown): error is SealboxError {
  return error instanceof SealboxError;
}

/**
 * Execution receipt types (wire format)
 */

import type { ExecMetrics } from "./capsule.js";
import type { ReceiptErrorCode } from "../errors.js";

/**
 * Signed record that a capsule, given an input, produced an output.
 * Field names and order are fixed; see `canonicalPayload`.
 */
export interface ExecutionReceipt {
  capsule_id: string;
  input_commit: string;
  output_commit: string;
  exec_metrics: ExecMetrics;
  /** Hex-encoded raw Ed25519 public key of the signer */
  node_id: string;
  nonce: number;
  /** ISO 8601, UTC, millisecond precision */
  timestamp: string;
  /** base64url Ed25519 signature */
  signature: string;
}

export type UnsignedReceipt = Omit<ExecutionReceipt, "signature">;

export interface ReceiptVerification {
  valid: boolean;
  errors: ReceiptErrorCode[];
}

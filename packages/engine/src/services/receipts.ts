/**
 * Execution receipts - signed attestations binding a capsule, its input and
 * output to the metrics of one execution.
 *
 * The signature is a JWS (EdDSA) with a detached, unencoded payload
 * (`b64: false`): the signed bytes are exactly the canonical payload lines.
 */

import { FlattenedSign, base64url, flattenedVerify, type KeyLike } from "jose";
import { z } from "zod";
import {
  RECEIPT_FORMAT,
  ReceiptError,
  type ExecMetrics,
  type ExecutionReceipt,
  type ReceiptErrorCode,
  type ReceiptVerification,
  type UnsignedReceipt,
} from "@sealbox/shared";
import { systemClock, type Clock } from "../harness/clock.js";
import { loadPublicKey, publicKeyFromNodeId, sha256Hex, type SigningIdentity } from "./crypto.js";

const PROTECTED_HEADER = { alg: "EdDSA", b64: false, crit: ["b64"] };
const ENCODED_HEADER = base64url.encode(JSON.stringify(PROTECTED_HEADER));

const digest = z.string().regex(/^[0-9a-f]+$/).length(RECEIPT_FORMAT.DIGEST_HEX_LENGTH);

export const receiptSchema = z
  .object({
    capsule_id: digest,
    input_commit: digest,
    output_commit: digest,
    exec_metrics: z
      .object({
        fuel_used: z.number().int().nonnegative(),
        memory_mb: z.number().nonnegative().finite(),
        duration_ms: z.number().nonnegative().finite(),
        host_calls: z.number().int().nonnegative(),
      })
      .strict(),
    node_id: z.string().regex(/^[0-9a-f]+$/).length(RECEIPT_FORMAT.PUBLIC_KEY_HEX_LENGTH),
    nonce: z.number().int().nonnegative(),
    timestamp: z.string().datetime({ precision: 3 }),
    signature: z.string().regex(/^[A-Za-z0-9_-]+$/),
  })
  .strict();

export interface ReceiptInput {
  moduleBytes: Uint8Array;
  inputBytes: Uint8Array;
  outputBytes: Uint8Array;
  metrics: ExecMetrics;
  identity: SigningIdentity;
  nonce: number;
  /** Milliseconds since the epoch, from the caller's clock */
  issuedAt: number;
}

function formatNumber(value: number): string {
  return Object.is(value, -0) ? "-0" : String(value);
}

/**
 * The exact bytes covered by the signature
 */
export function canonicalPayload(receipt: UnsignedReceipt): Uint8Array {
  const m = receipt.exec_metrics;
  const lines = [
    RECEIPT_FORMAT.PAYLOAD_TAG,
    `capsule_id:${receipt.capsule_id}`,
    `input_commit:${receipt.input_commit}`,
    `output_commit:${receipt.output_commit}`,
    `fuel_used:${formatNumber(m.fuel_used)}`,
    `memory_mb:${formatNumber(m.memory_mb)}`,
    `duration_ms:${formatNumber(m.duration_ms)}`,
    `host_calls:${formatNumber(m.host_calls)}`,
    `node_id:${receipt.node_id}`,
    `nonce:${formatNumber(receipt.nonce)}`,
    `timestamp:${receipt.timestamp}`,
  ];
  return new TextEncoder().encode(lines.join("\n"));
}

export async function makeReceipt(input: ReceiptInput): Promise<ExecutionReceipt> {
  const unsigned: UnsignedReceipt = {
    capsule_id: sha256Hex(input.moduleBytes),
    input_commit: sha256Hex(input.inputBytes),
    output_commit: sha256Hex(input.outputBytes),
    exec_metrics: { ...input.metrics },
    node_id: input.identity.nodeId,
    nonce: input.nonce,
    timestamp: new Date(input.issuedAt).toISOString(),
  };
  const jws = await new FlattenedSign(canonicalPayload(unsigned))
    .setProtectedHeader(PROTECTED_HEADER)
    .sign(input.identity.privateKey);
  return { ...unsigned, signature: jws.signature };
}

/**
 * Check the signature against `publicKey`. Never throws for a bad receipt.
 */
export async function verifyReceipt(receipt: unknown, publicKey: KeyLike | string): Promise<boolean> {
  const parsed = receiptSchema.safeParse(receipt);
  if (!parsed.success) return false;
  try {
    const key = typeof publicKey === "string" ? await loadPublicKey(publicKey) : publicKey;
    return await checkSignature(parsed.data, key);
  } catch {
    return false;
  }
}

/**
 * Verify against the key the receipt names in `node_id`. This proves the
 * receipt is self-consistent, not that the node is trusted.
 */
export async function verifyNodeSignature(receipt: unknown): Promise<boolean> {
  const parsed = receiptSchema.safeParse(receipt);
  if (!parsed.success) return false;
  try {
    return await checkSignature(parsed.data, await publicKeyFromNodeId(parsed.data.node_id));
  } catch {
    return false;
  }
}

async function checkSignature(receipt: ExecutionReceipt, key: KeyLike): Promise<boolean> {
  const { signature, ...unsigned } = receipt;
  try {
    await flattenedVerify(
      { protected: ENCODED_HEADER, payload: canonicalPayload(unsigned), signature },
      key,
      { algorithms: ["EdDSA"] }
    );
    return true;
  } catch {
    return false;
  }
}

export function verifyCommitments(
  receipt: UnsignedReceipt,
  moduleBytes: Uint8Array,
  inputBytes: Uint8Array,
  outputBytes: Uint8Array
): boolean {
  return (
    receipt.capsule_id === sha256Hex(moduleBytes) &&
    receipt.input_commit === sha256Hex(inputBytes) &&
    receipt.output_commit === sha256Hex(outputBytes)
  );
}

export interface DetailedVerificationOptions {
  /** Defaults to the key named by the receipt's `node_id` */
  publicKey?: KeyLike | string;
  artifacts?: { module: Uint8Array; input: Uint8Array; output: Uint8Array };
  /** Reject receipts older than this many seconds */
  maxAgeSeconds?: number;
  clock?: Clock;
}

/**
 * Run every applicable check and report each failure by code
 */
export async function verifyReceiptDetailed(
  receipt: unknown,
  options: DetailedVerificationOptions = {}
): Promise<ReceiptVerification> {
  const parsed = receiptSchema.safeParse(receipt);
  if (!parsed.success) return { valid: false, errors: ["MalformedReceipt"] };
  const value = parsed.data;
  const errors: ReceiptErrorCode[] = [];

  const signed =
    options.publicKey === undefined ? await verifyNodeSignature(value) : await verifyReceipt(value, options.publicKey);
  if (!signed) errors.push("SignatureInvalid");

  if (options.artifacts) {
    const { module, input, output } = options.artifacts;
    if (!verifyCommitments(value, module, input, output)) errors.push("CommitmentMismatch");
  }

  if (options.maxAgeSeconds !== undefined) {
    const now = (options.clock ?? systemClock).now();
    if (now - Date.parse(value.timestamp) > options.maxAgeSeconds * 1000) errors.push("Expired");
  }

  return { valid: errors.length === 0, errors };
}

/**
 * Verifier for receipts arriving from other nodes: signature by `node_id`
 * plus a maximum age
 */
export class ReceiptVerifier {
  readonly maxAgeSeconds: number;
  private clock: Clock;

  constructor(options: { maxAgeSeconds?: number; clock?: Clock } = {}) {
    this.maxAgeSeconds = options.maxAgeSeconds ?? RECEIPT_FORMAT.DEFAULT_MAX_AGE_SECONDS;
    this.clock = options.clock ?? systemClock;
  }

  async verify(receipt: unknown): Promise<ReceiptVerification> {
    return verifyReceiptDetailed(receipt, { maxAgeSeconds: this.maxAgeSeconds, clock: this.clock });
  }
}

/**
 * Stable identifier for deduplicating receipts
 */
export function receiptId(receipt: UnsignedReceipt): string {
  return sha256Hex(
    [receipt.capsule_id, receipt.input_commit, receipt.output_commit, receipt.node_id, formatNumber(receipt.nonce)].join(":")
  );
}

export function serializeReceipt(receipt: ExecutionReceipt): string {
  return JSON.stringify(receipt, null, 2);
}

/**
 * @throws ReceiptError with code MalformedReceipt
 */
export function parseReceipt(json: string): ExecutionReceipt {
  let raw: unknown;
  try {
    raw = JSON.parse(json);
  } catch {
    throw new ReceiptError("MalformedReceipt", "Receipt is not valid JSON");
  }
  const parsed = receiptSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new ReceiptError(
      "MalformedReceipt",
      issue ? `Invalid receipt field ${issue.path.join(".") || "(root)"}: ${issue.message}` : "Invalid receipt"
    );
  }
  return parsed.data;
}

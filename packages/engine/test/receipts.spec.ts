import { beforeAll, describe, expect, it } from "vitest";
import { ReceiptError, type ExecutionReceipt } from "@sealbox/shared";
import { ManualClock } from "../src/harness/clock.js";
import {
  createSigningIdentity,
  exportSigningIdentity,
  fingerprint,
  loadSigningIdentity,
  nodeIdFromPublicKey,
  publicKeyFromNodeId,
  sha256Hex,
  type SigningIdentity,
} from "../src/services/crypto.js";
import {
  ReceiptVerifier,
  canonicalPayload,
  makeReceipt,
  parseReceipt,
  receiptId,
  serializeReceipt,
  verifyCommitments,
  verifyNodeSignature,
  verifyReceipt,
  verifyReceiptDetailed,
} from "../src/services/receipts.js";

const text = (value: string) => new TextEncoder().encode(value);
const moduleBytes = text("module-bytes");
const inputBytes = text('{"name":"Alice"}');
const outputBytes = text('Hello {"name":"Alice"}');
const ISSUED_AT = Date.UTC(2026, 0, 2, 3, 4, 5, 678);

let identity: SigningIdentity;
let receipt: ExecutionReceipt;

beforeAll(async () => {
  identity = await createSigningIdentity();
  receipt = await makeReceipt({
    moduleBytes,
    inputBytes,
    outputBytes,
    metrics: { fuel_used: 317, memory_mb: 0.0625, duration_ms: 12, host_calls: 0 },
    identity,
    nonce: 1,
    issuedAt: ISSUED_AT,
  });
});

/** Flip one bit of a number's IEEE-754 representation */
function flipNumber(value: number, bit: number): number {
  const view = new DataView(new ArrayBuffer(8));
  view.setFloat64(0, value);
  const byte = 7 - Math.floor(bit / 8);
  view.setUint8(byte, view.getUint8(byte) ^ (1 << bit % 8));
  return view.getFloat64(0);
}

function captureError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  throw new Error("Expected the call to throw");
}

function flipChar(value: string, index: number): string {
  return value.slice(0, index) + String.fromCharCode(value.charCodeAt(index) ^ 1) + value.slice(index + 1);
}

describe("makeReceipt", () => {
  it("commits to the module, input and output", () => {
    expect(receipt.capsule_id).toBe(sha256Hex(moduleBytes));
    expect(receipt.input_commit).toBe(sha256Hex(inputBytes));
    expect(receipt.output_commit).toBe(sha256Hex(outputBytes));
    expect(receipt.node_id).toBe(identity.nodeId);
    expect(receipt.timestamp).toBe("2026-01-02T03:04:05.678Z");
    expect(receipt.nonce).toBe(1);
  });

  it("signs the canonical payload lines", () => {
    const { signature: _signature, ...unsigned } = receipt;
    expect(new TextDecoder().decode(canonicalPayload(unsigned)).split("\n")).toEqual([
      "SEALBOX_RECEIPT_V1",
      `capsule_id:${receipt.capsule_id}`,
      `input_commit:${receipt.input_commit}`,
      `output_commit:${receipt.output_commit}`,
      "fuel_used:317",
      "memory_mb:0.0625",
      "duration_ms:12",
      "host_calls:0",
      `node_id:${identity.nodeId}`,
      "nonce:1",
      "timestamp:2026-01-02T03:04:05.678Z",
    ]);
  });
});

describe("verifyReceipt", () => {
  it("accepts a genuine receipt", async () => {
    expect(await verifyReceipt(receipt, identity.publicKey)).toBe(true);
    expect(await verifyNodeSignature(receipt)).toBe(true);
  });

  it("accepts an SPKI PEM key", async () => {
    const { publicKey } = await exportSigningIdentity(identity);
    expect(await verifyReceipt(receipt, publicKey)).toBe(true);
  });

  it("rejects a different key", async () => {
    const other = await createSigningIdentity();
    expect(await verifyReceipt(receipt, other.publicKey)).toBe(false);
  });

  it("rejects any single-bit flip in a covered string field", async () => {
    const fields = ["capsule_id", "input_commit", "output_commit", "node_id", "timestamp"] as const;
    for (const field of fields) {
      for (const index of [0, 10, receipt[field].length - 1]) {
        const tampered = { ...receipt, [field]: flipChar(receipt[field], index) };
        expect(await verifyReceipt(tampered, identity.publicKey), `${field}[${index}]`).toBe(false);
      }
    }
  });

  it("rejects any single-bit flip in a covered number", async () => {
    const metrics = ["fuel_used", "memory_mb", "duration_ms", "host_calls"] as const;
    for (const bit of [0, 1, 30, 51, 52, 62, 63]) {
      for (const field of metrics) {
        const tampered = {
          ...receipt,
          exec_metrics: { ...receipt.exec_metrics, [field]: flipNumber(receipt.exec_metrics[field], bit) },
        };
        expect(await verifyReceipt(tampered, identity.publicKey), `${field} bit ${bit}`).toBe(false);
      }
      const nonce = { ...receipt, nonce: flipNumber(receipt.nonce, bit) };
      expect(await verifyReceipt(nonce, identity.publicKey), `nonce bit ${bit}`).toBe(false);
    }
  });

  it("rejects a tampered signature", async () => {
    expect(await verifyReceipt({ ...receipt, signature: flipChar(receipt.signature, 5) }, identity.publicKey)).toBe(false);
  });

  it("returns false for malformed input instead of throwing", async () => {
    expect(await verifyReceipt({ hello: "world" }, identity.publicKey)).toBe(false);
    expect(await verifyReceipt(null, identity.publicKey)).toBe(false);
    expect(await verifyReceipt(receipt, "not a pem")).toBe(false);
    expect(await verifyNodeSignature({ ...receipt, node_id: "00".repeat(32) })).toBe(false);
  });
});

describe("verifyCommitments", () => {
  it("binds the receipt to its artifacts", () => {
    expect(verifyCommitments(receipt, moduleBytes, inputBytes, outputBytes)).toBe(true);
    expect(verifyCommitments(receipt, text("other"), inputBytes, outputBytes)).toBe(false);
    expect(verifyCommitments(receipt, moduleBytes, text("other"), outputBytes)).toBe(false);
    expect(verifyCommitments(receipt, moduleBytes, inputBytes, text("other"))).toBe(false);
  });
});

describe("verifyReceiptDetailed", () => {
  it("lists every failed check", async () => {
    const tampered = { ...receipt, output_commit: sha256Hex("forged") };
    const result = await verifyReceiptDetailed(tampered, {
      artifacts: { module: moduleBytes, input: inputBytes, output: outputBytes },
      maxAgeSeconds: 60,
      clock: new ManualClock(ISSUED_AT + 61_000),
    });
    expect(result).toEqual({ valid: false, errors: ["SignatureInvalid", "CommitmentMismatch", "Expired"] });
  });

  it("passes a genuine receipt", async () => {
    const result = await verifyReceiptDetailed(receipt, {
      publicKey: identity.publicKey,
      artifacts: { module: moduleBytes, input: inputBytes, output: outputBytes },
    });
    expect(result).toEqual({ valid: true, errors: [] });
  });

  it("reports malformed receipts", async () => {
    expect(await verifyReceiptDetailed({ ...receipt, nonce: -1 })).toEqual({ valid: false, errors: ["MalformedReceipt"] });
  });
});

describe("ReceiptVerifier", () => {
  it("accepts receipts inside the age window and expires older ones", async () => {
    const clock = new ManualClock(ISSUED_AT + 3_600_000);
    const verifier = new ReceiptVerifier({ clock });
    expect(verifier.maxAgeSeconds).toBe(3600);
    expect(await verifier.verify(receipt)).toEqual({ valid: true, errors: [] });
    clock.advance(1);
    expect(await verifier.verify(receipt)).toEqual({ valid: false, errors: ["Expired"] });
  });
});

describe("receiptId", () => {
  it("hashes the identifying fields", () => {
    const expected = sha256Hex(
      `${receipt.capsule_id}:${receipt.input_commit}:${receipt.output_commit}:${receipt.node_id}:1`
    );
    expect(receiptId(receipt)).toBe(expected);
    expect(receiptId({ ...receipt, nonce: 2 })).not.toBe(expected);
  });
});

describe("serialization", () => {
  it("round trips through JSON", async () => {
    const parsed = parseReceipt(serializeReceipt(receipt));
    expect(parsed).toEqual(receipt);
    expect(await verifyReceipt(parsed, identity.publicKey)).toBe(true);
  });

  it("rejects malformed JSON and unknown fields", () => {
    expect(() => parseReceipt("{")).toThrow(ReceiptError);
    expect(() => parseReceipt(JSON.stringify({ ...receipt, extra: 1 }))).toThrow(/MalformedReceipt|Invalid receipt/);
    const error = captureError(() => parseReceipt(JSON.stringify({ ...receipt, nonce: "1" })));
    expect(error).toBeInstanceOf(ReceiptError);
    expect(error).toMatchObject({ code: "MalformedReceipt" });
  });
});

describe("keys", () => {
  it("derives node_id from the raw public key", async () => {
    expect(identity.nodeId).toMatch(/^[0-9a-f]{64}$/);
    const rebuilt = await publicKeyFromNodeId(identity.nodeId);
    expect(await nodeIdFromPublicKey(rebuilt)).toBe(identity.nodeId);
  });

  it("round trips PEM exports", async () => {
    const exported = await exportSigningIdentity(identity);
    expect(exported.privateKey).toContain("BEGIN PRIVATE KEY");
    expect(exported.publicKey).toContain("BEGIN PUBLIC KEY");
    expect(exported.fingerprint).toBe(fingerprint(identity.nodeId));
    expect(exported.fingerprint).toHaveLength(16);

    const loaded = await loadSigningIdentity(exported.privateKey, exported.publicKey);
    expect(loaded.nodeId).toBe(identity.nodeId);
    const signed = await makeReceipt({
      moduleBytes,
      inputBytes,
      outputBytes,
      metrics: receipt.exec_metrics,
      identity: loaded,
      nonce: 9,
      issuedAt: ISSUED_AT,
    });
    expect(await verifyReceipt(signed, identity.publicKey)).toBe(true);
  });
});

/**
 * Host function implementations. They run on the engine's thread; the guest
 * runner copies their inputs out of guest memory and their outputs back in.
 */

import { createHash } from "node:crypto";
import {
  HOST_STATUS,
  HOST_TRANSFER_LIMIT,
  type HostEnvironment,
  type HostFunctionName,
} from "@sealbox/shared";
import { JsonPathError, selectJsonPath } from "./json-path.js";

export interface HostCall {
  /** Raw wasm arguments: i32 as number, i64 as bigint */
  args: readonly (number | bigint)[];
  /** Byte regions read from guest memory, in descriptor order */
  reads: readonly Uint8Array[];
}

export interface HostCallResult {
  value: number | bigint;
  /** Bytes for the guest runner to write at the call's output pointer */
  output?: Uint8Array;
}

export type HostFunctionImpl = (call: HostCall) => HostCallResult;

export class HostFunctionError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "HostFunctionError";
  }
}

const BASE64 = /^(?:[A-Za-z0-9+/]{4})*(?:[A-Za-z0-9+/]{2}==|[A-Za-z0-9+/]{3}=)?$/;

/**
 * SHA-256 counter-mode byte stream: block i = SHA-256(seed || u32be(i))
 */
export class DeterministicStream {
  private counter = 0;
  private buffered: Uint8Array = new Uint8Array(0);

  constructor(private readonly seed: Uint8Array) {}

  next(length: number): Uint8Array {
    const out = new Uint8Array(length);
    let filled = 0;
    while (filled < length) {
      if (this.buffered.length === 0) this.buffered = this.block();
      const take = Math.min(this.buffered.length, length - filled);
      out.set(this.buffered.subarray(0, take), filled);
      this.buffered = this.buffered.subarray(take);
      filled += take;
    }
    return out;
  }

  private block(): Uint8Array {
    const counter = Buffer.alloc(4);
    counter.writeUInt32BE(this.counter++);
    return createHash("sha256").update(this.seed).update(counter).digest();
  }
}

function arg(call: HostCall, index: number): number {
  const value = call.args[index];
  if (typeof value !== "number") throw new HostFunctionError(`Missing i32 argument ${index}`);
  return value;
}

function read(call: HostCall, index: number): Uint8Array {
  const region = call.reads[index];
  if (!region) throw new HostFunctionError(`Missing input region ${index}`);
  return region;
}

/**
 * Write `bytes` if they fit the guest's buffer, otherwise report OUTPUT_TOO_SMALL
 */
function bounded(bytes: Uint8Array, capacity: number): HostCallResult {
  if (bytes.length > HOST_TRANSFER_LIMIT) {
    throw new HostFunctionError(`Output of ${bytes.length} bytes exceeds the ${HOST_TRANSFER_LIMIT} byte transfer limit`);
  }
  if (bytes.length > capacity >>> 0) return { value: HOST_STATUS.OUTPUT_TOO_SMALL };
  return { value: bytes.length, output: bytes };
}

const utf8 = new TextDecoder("utf-8", { fatal: true });

function decodeText(bytes: Uint8Array, what: string): string {
  try {
    return utf8.decode(bytes);
  } catch (error) {
    throw new HostFunctionError(`${what} is not valid UTF-8`, { cause: error });
  }
}

/**
 * Build the host function table for one execution. The random stream is
 * per-table, so two executions with the same seed see the same bytes.
 */
export function createHostFunctions(env: HostEnvironment): Record<HostFunctionName, HostFunctionImpl> {
  const stream = new DeterministicStream(env.seed);

  return {
    hash_commit: (call) => {
      const digest = createHash("sha256").update(read(call, 0)).digest();
      return { value: digest.length, output: new Uint8Array(digest) };
    },

    json_path: (call) => {
      const text = decodeText(read(call, 0), "JSON document");
      const path = decodeText(read(call, 1), "JSON path");
      let document: unknown;
      try {
        document = JSON.parse(text);
      } catch (error) {
        throw new HostFunctionError("Invalid JSON document", { cause: error });
      }
      let selected: unknown;
      try {
        selected = selectJsonPath(document, path);
      } catch (error) {
        if (error instanceof JsonPathError) throw new HostFunctionError(error.message, { cause: error });
        throw error;
      }
      if (selected === undefined) return { value: HOST_STATUS.NOT_FOUND };
      return bounded(new TextEncoder().encode(JSON.stringify(selected)), arg(call, 5));
    },

    base64_encode: (call) => {
      const encoded = Buffer.from(read(call, 0)).toString("base64");
      return bounded(new TextEncoder().encode(encoded), arg(call, 3));
    },

    base64_decode: (call) => {
      const text = decodeText(read(call, 0), "Base64 input");
      if (!BASE64.test(text)) throw new HostFunctionError("Invalid base64 input");
      return bounded(new Uint8Array(Buffer.from(text, "base64")), arg(call, 3));
    },

    time_now_ms: () => ({ value: BigInt(Math.trunc(env.timeMs)) }),

    random_bytes: (call) => {
      const length = arg(call, 1) >>> 0;
      if (length > HOST_TRANSFER_LIMIT) {
        throw new HostFunctionError(`Requested ${length} random bytes, limit is ${HOST_TRANSFER_LIMIT}`);
      }
      return { value: length, output: stream.next(length) };
    },
  };
}

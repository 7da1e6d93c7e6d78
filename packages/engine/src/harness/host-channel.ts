/**
 * Synchronous host-call channel between the engine thread and a guest worker.
 *
 * Shared buffer layout:
 *   [0..16)   Int32 x4: state, status, length, checkpoint pages
 *   [16..24)  BigInt64: return value
 *   [24..32)  BigInt64: checkpoint fuel balance (-1 until the first checkpoint)
 *   [32..)    payload (output bytes, or a UTF-8 error message)
 *
 * The worker clears `state`, posts a `host-call` message and blocks in
 * Atomics.wait; the engine fills the buffer, sets `state` and notifies.
 * Checkpoints are written by the guest as it runs and stay readable after
 * the worker is terminated.
 */

import { z } from "zod";
import { HOST_FUNCTION_NAMES, HOST_TRANSFER_LIMIT } from "@sealbox/shared";
import type { HostCallResult } from "../policy/host-functions.js";

export const CHANNEL_LAYOUT = {
  STATE: 0,
  STATUS: 1,
  LENGTH: 2,
  CHECKPOINT_PAGES: 3,
  RESULT_OFFSET: 16,
  CHECKPOINT_FUEL_OFFSET: 24,
  PAYLOAD_OFFSET: 32,
} as const;

export const CALL_STATE = { PENDING: 0, DONE: 1 } as const;
export const CALL_STATUS = { OK: 0, FAILED: 1 } as const;

/**
 * Last progress report a guest left in the channel
 */
export interface Checkpoint {
  fuelRemaining: bigint;
  pages: number;
}

export class HostChannel {
  readonly buffer: SharedArrayBuffer;
  private control: Int32Array;
  private result: BigInt64Array;
  private checkpointFuel: BigInt64Array;
  private payload: Uint8Array;

  constructor() {
    this.buffer = new SharedArrayBuffer(CHANNEL_LAYOUT.PAYLOAD_OFFSET + HOST_TRANSFER_LIMIT);
    this.control = new Int32Array(this.buffer, 0, 4);
    this.result = new BigInt64Array(this.buffer, CHANNEL_LAYOUT.RESULT_OFFSET, 1);
    this.checkpointFuel = new BigInt64Array(this.buffer, CHANNEL_LAYOUT.CHECKPOINT_FUEL_OFFSET, 1);
    this.payload = new Uint8Array(this.buffer, CHANNEL_LAYOUT.PAYLOAD_OFFSET);
    Atomics.store(this.checkpointFuel, 0, -1n);
  }

  checkpoint(): Checkpoint | null {
    const fuelRemaining = Atomics.load(this.checkpointFuel, 0);
    if (fuelRemaining < 0n) return null;
    return { fuelRemaining, pages: Atomics.load(this.control, CHANNEL_LAYOUT.CHECKPOINT_PAGES) };
  }

  resolve(result: HostCallResult): void {
    const output = result.output ?? new Uint8Array(0);
    this.payload.set(output);
    this.result[0] = BigInt(result.value);
    this.release(CALL_STATUS.OK, output.length);
  }

  reject(message: string): void {
    const encoded = new TextEncoder().encode(message).subarray(0, this.payload.length);
    this.payload.set(encoded);
    this.result[0] = 0n;
    this.release(CALL_STATUS.FAILED, encoded.length);
  }

  private release(status: number, length: number): void {
    Atomics.store(this.control, CHANNEL_LAYOUT.STATUS, status);
    Atomics.store(this.control, CHANNEL_LAYOUT.LENGTH, length);
    Atomics.store(this.control, CHANNEL_LAYOUT.STATE, CALL_STATE.DONE);
    Atomics.notify(this.control, CHANNEL_LAYOUT.STATE);
  }
}

const bytes = z.instanceof(Uint8Array);
const usage = {
  fuelRemaining: z.bigint().nullable(),
  memoryBytes: z.number().int().nonnegative(),
};

/**
 * Messages a guest worker posts back to the engine
 */
export const workerMessageSchema = z.discriminatedUnion("type", [
  z.object({ type: z.literal("ready") }),
  z.object({
    type: z.literal("host-call"),
    name: z.enum(HOST_FUNCTION_NAMES),
    args: z.array(z.union([z.number(), z.bigint()])),
    reads: z.array(bytes),
    ...usage,
  }),
  z.object({ type: z.literal("done"), output: bytes, ...usage }),
  z.object({
    type: z.literal("failed"),
    reason: z.enum(["Trap", "Fuel", "Memory", "HostFunctionFailure"]),
    message: z.string(),
    ...usage,
  }),
]);

export type WorkerMessage = z.infer<typeof workerMessageSchema>;

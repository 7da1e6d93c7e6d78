/**
 * Guest runner - the script each execution worker evaluates.
 *
 * Plain JavaScript so a fresh worker starts without a TypeScript loader. It
 * instantiates the instrumented module, forwards imports over the host
 * channel, calls `run` and reports the outcome with the fuel and memory it
 * observed.
 */

import type { HostTransfer } from "../policy/capabilities.js";

/**
 * Data handed to the worker at spawn
 */
export interface GuestWorkerData {
  module: WebAssembly.Module;
  /** Wraps the checkpoint callback as a funcref, see `checkpointBridge` */
  bridge: WebAssembly.Module;
  input: Uint8Array;
  fuelLimit: bigint;
  memoryLimitPages: number;
  transfers: Record<string, HostTransfer>;
  channel: SharedArrayBuffer;
  abi: {
    entry: string;
    memory: string;
    inputOffset: number;
    pageBytes: number;
    fuel: string;
    memoryLimit: string;
    oom: string;
    start: string;
    checkpoint: string;
    checkpointTable: string;
    checkpointPages: number;
    checkpointFuelOffset: number;
    payloadOffset: number;
    resultOffset: number;
    transferLimit: number;
  };
}

export const GUEST_RUNNER_SOURCE = `
"use strict";
const { parentPort, workerData } = require("node:worker_threads");
const { module, bridge, input, fuelLimit, memoryLimitPages, transfers, channel, abi } = workerData;

const control = new Int32Array(channel, 0, 4);
const result = new BigInt64Array(channel, abi.resultOffset, 1);
const checkpointFuel = new BigInt64Array(channel, abi.checkpointFuelOffset, 1);
const payload = new Uint8Array(channel, abi.payloadOffset);

class HostFailure extends Error {}

let instance = null;
let memory = null;

function fuelRemaining() {
  return instance === null ? null : instance.exports[abi.fuel].value;
}

function memoryBytes() {
  return memory === null ? 0 : memory.buffer.byteLength;
}

function checkpoint(fuel, pages) {
  Atomics.store(control, abi.checkpointPages, pages);
  Atomics.store(checkpointFuel, 0, fuel);
}

function guestBytes() {
  if (memory === null) throw new HostFailure("guest memory is not available yet");
  return new Uint8Array(memory.buffer);
}

function readRegion(ptr, len) {
  if (len > abi.transferLimit) {
    throw new HostFailure("host transfer of " + len + " bytes exceeds the " + abi.transferLimit + " byte limit");
  }
  const view = guestBytes();
  if (ptr + len > view.length) {
    throw new HostFailure("guest region " + ptr + "+" + len + " is outside linear memory");
  }
  return view.slice(ptr, ptr + len);
}

function hostFunction(name, transfer) {
  return (...args) => {
    const reads = transfer.reads.map(([ptr, len]) => readRegion(args[ptr] >>> 0, args[len] >>> 0));
    Atomics.store(control, 0, 0);
    parentPort.postMessage({
      type: "host-call",
      name,
      args,
      reads,
      fuelRemaining: fuelRemaining(),
      memoryBytes: memoryBytes(),
    });
    Atomics.wait(control, 0, 0);

    const length = Atomics.load(control, 2);
    if (Atomics.load(control, 1) !== 0) {
      throw new HostFailure(new TextDecoder().decode(payload.slice(0, length)));
    }
    if (transfer.write !== null && length > 0) {
      const ptr = args[transfer.write] >>> 0;
      const view = guestBytes();
      if (ptr + length > view.length) {
        throw new HostFailure("output region " + ptr + "+" + length + " is outside linear memory");
      }
      view.set(payload.subarray(0, length), ptr);
    }
    return transfer.result === "i64" ? result[0] : Number(result[0]);
  };
}

function classify(error) {
  if (error instanceof HostFailure) return { reason: "HostFunctionFailure", message: error.message };
  const fuel = fuelRemaining();
  if (fuel !== null && fuel < 0n) return { reason: "Fuel", message: "fuel budget exhausted" };
  if (instance !== null && instance.exports[abi.oom].value === 1) {
    return { reason: "Memory", message: "memory.grow would exceed the memory limit" };
  }
  if (error instanceof RangeError && /call stack/i.test(error.message)) {
    return { reason: "Trap", message: "call stack exhausted" };
  }
  return { reason: "Trap", message: error instanceof Error ? error.message : String(error) };
}

function fail(reason, message) {
  parentPort.postMessage({ type: "failed", reason, message, fuelRemaining: fuelRemaining(), memoryBytes: memoryBytes() });
}

function main() {
  const env = {};
  for (const name of Object.keys(transfers)) env[name] = hostFunction(name, transfers[name]);

  instance = new WebAssembly.Instance(module, { env });
  memory = instance.exports[abi.memory];
  instance.exports[abi.fuel].value = fuelLimit;
  instance.exports[abi.memoryLimit].value = memoryLimitPages;
  const report = new WebAssembly.Instance(bridge, { env: { checkpoint } }).exports.checkpoint;
  instance.exports[abi.checkpointTable].set(0, report);
  checkpoint(fuelLimit, memory.buffer.byteLength / abi.pageBytes);
  instance.exports[abi.checkpoint].value = fuelLimit;
  if (typeof instance.exports[abi.start] === "function") instance.exports[abi.start]();

  const needed = abi.inputOffset + input.length;
  if (needed > memory.buffer.byteLength) {
    const pages = Math.ceil((needed - memory.buffer.byteLength) / abi.pageBytes);
    if (memory.buffer.byteLength / abi.pageBytes + pages > memoryLimitPages) {
      return fail("Memory", "input does not fit within the memory limit");
    }
    memory.grow(pages);
  }
  new Uint8Array(memory.buffer).set(input, abi.inputOffset);

  const packed = instance.exports[abi.entry](abi.inputOffset, input.length) >>> 0;
  const outputLength = packed >>> 16;
  const outputPtr = packed & 0xffff;
  const view = new Uint8Array(memory.buffer);
  if (outputPtr + outputLength > view.length) {
    return fail("Trap", "output region " + outputPtr + "+" + outputLength + " is outside linear memory");
  }
  parentPort.postMessage({
    type: "done",
    output: view.slice(outputPtr, outputPtr + outputLength),
    fuelRemaining: fuelRemaining(),
    memoryBytes: memoryBytes(),
  });
}

parentPort.postMessage({ type: "ready" });
try {
  main();
} catch (error) {
  const { reason, message } = classify(error);
  fail(reason, message);
}
`;

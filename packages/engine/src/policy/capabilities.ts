/**
 * Capability catalogue: which host functions each capability grants, and the
 * exact guest-facing signature of each host function
 */

import {
  CAPABILITIES,
  GUEST_ABI,
  HOST_FUNCTION_NAMES,
  type Capability,
  type HostFunctionName,
} from "@sealbox/shared";
import type { FuncType } from "../wasm/module.js";

export const CAPABILITY_FUNCTIONS: Readonly<Record<Capability, readonly HostFunctionName[]>> = {
  Hash: ["hash_commit"],
  Json: ["json_path"],
  Base64: ["base64_encode", "base64_decode"],
  Time: ["time_now_ms"],
  Random: ["random_bytes"],
};

export const HOST_FUNCTION_CAPABILITY: ReadonlyMap<HostFunctionName, Capability> = new Map(
  CAPABILITIES.flatMap((capability) =>
    CAPABILITY_FUNCTIONS[capability].map((name): [HostFunctionName, Capability] => [name, capability])
  )
);

export function isCapability(value: string): value is Capability {
  return CAPABILITIES.some((capability) => capability === value);
}

export function isHostFunctionName(name: string): name is HostFunctionName {
  return HOST_FUNCTION_NAMES.some((known) => known === name);
}

/**
 * How the guest runner moves bytes across the boundary for one call.
 * `reads` are (pointer, length) argument index pairs copied out of guest
 * memory; `write` is the argument index of the output pointer.
 */
export interface HostTransfer {
  reads: readonly (readonly [number, number])[];
  write: number | null;
  result: "i32" | "i64";
}

export interface HostFunctionSpec {
  signature: FuncType;
  transfer: HostTransfer;
}

export const HOST_FUNCTIONS: Readonly<Record<HostFunctionName, HostFunctionSpec>> = {
  // hash_commit(in_ptr, in_len, out_ptr) -> 32
  hash_commit: {
    signature: { params: ["i32", "i32", "i32"], results: ["i32"] },
    transfer: { reads: [[0, 1]], write: 2, result: "i32" },
  },
  // json_path(json_ptr, json_len, path_ptr, path_len, out_ptr, out_cap) -> written | -1 | -2
  json_path: {
    signature: { params: ["i32", "i32", "i32", "i32", "i32", "i32"], results: ["i32"] },
    transfer: { reads: [[0, 1], [2, 3]], write: 4, result: "i32" },
  },
  // base64_encode(in_ptr, in_len, out_ptr, out_cap) -> written | -2
  base64_encode: {
    signature: { params: ["i32", "i32", "i32", "i32"], results: ["i32"] },
    transfer: { reads: [[0, 1]], write: 2, result: "i32" },
  },
  base64_decode: {
    signature: { params: ["i32", "i32", "i32", "i32"], results: ["i32"] },
    transfer: { reads: [[0, 1]], write: 2, result: "i32" },
  },
  // time_now_ms() -> i64
  time_now_ms: {
    signature: { params: [], results: ["i64"] },
    transfer: { reads: [], write: null, result: "i64" },
  },
  // random_bytes(out_ptr, len) -> len
  random_bytes: {
    signature: { params: ["i32", "i32"], results: ["i32"] },
    transfer: { reads: [], write: 0, result: "i32" },
  },
};

/**
 * Host functions granted by a capability set, in catalogue order
 */
export function grantedFunctions(capabilities: readonly Capability[]): HostFunctionName[] {
  const granted = new Set(capabilities);
  return HOST_FUNCTION_NAMES.filter((name) => {
    const capability = HOST_FUNCTION_CAPABILITY.get(name);
    return capability !== undefined && granted.has(capability);
  });
}

/**
 * Import allow-list in `namespace::name` form
 */
export function allowList(capabilities: readonly Capability[]): string[] {
  return grantedFunctions(capabilities).map((name) => `${GUEST_ABI.HOST_NAMESPACE}::${name}`);
}

export function allowsImport(capabilities: readonly Capability[], namespace: string, name: string): boolean {
  return (
    namespace === GUEST_ABI.HOST_NAMESPACE &&
    isHostFunctionName(name) &&
    grantedFunctions(capabilities).includes(name)
  );
}

/**
 * @sealbox/engine - validate, meter, execute and attest WebAssembly capsules
 */

export * from "@sealbox/shared";

export { CapsuleValidator, type InspectedModule, type ValidatorOptions } from "./capsule/validator.js";
export {
  CAPABILITY_FUNCTIONS,
  HOST_FUNCTIONS,
  allowList,
  allowsImport,
  grantedFunctions,
  isCapability,
} from "./policy/capabilities.js";
export { BoundImports, CapabilitySandbox } from "./policy/sandbox.js";
export { DeterministicStream, HostFunctionError, createHostFunctions } from "./policy/host-functions.js";
export { parseJsonPath, selectJsonPath, JsonPathError } from "./policy/json-path.js";
export { ExecutionEngine, type ExecutionEngineOptions, type ExecutionResult } from "./harness/executor.js";
export { ModuleCache, type CompiledCapsule, type ModuleCacheStats } from "./harness/module-cache.js";
export { ManualClock, systemClock, type Clock } from "./harness/clock.js";
export {
  createSigningIdentity,
  exportSigningIdentity,
  fingerprint,
  generateSigningKeys,
  loadSigningIdentity,
  nodeIdFromPublicKey,
  publicKeyFromNodeId,
  sha256Hex,
  type SigningIdentity,
} from "./services/crypto.js";
export * from "./services/receipts.js";
export { CapsuleRuntime, type CapsuleRuntimeOptions, type RunRequest, type RunResult } from "./services/runtime.js";
export { ensureSigningIdentity, readSigningIdentity, writeSigningKeys } from "./services/keystore.js";
export { loadConfig, limitsFromConfig, resolveConfig, overridesFromEnv, CONFIG_FILE_NAME } from "./config/load.js";
export { createLogger } from "./logger.js";

/**
 * Capsule validator - static checks on an untrusted module. Never
 * instantiates or runs guest code.
 */

import type { Logger } from "pino";
import {
  DEFAULT_LIMITS,
  DEFAULT_MAX_MODULE_SIZE_KB,
  GUEST_ABI,
  METERING_EXPORTS,
  SIZE_WARNING_RATIO,
  ValidationError,
  type ModuleImport,
  type ResourceLimits,
  type ValidationResult,
  type ValidationSuccess,
} from "@sealbox/shared";
import { HOST_FUNCTIONS, allowsImport, isHostFunctionName } from "../policy/capabilities.js";
import { WasmFormatError } from "../wasm/binary.js";
import { functionType, parseModule, sameSignature, type FuncType, type ModuleLayout } from "../wasm/module.js";
import { planModule } from "../wasm/meter.js";
import { silentLogger } from "../logger.js";

export interface ValidatorOptions {
  maxModuleSizeKb?: number;
  logger?: Logger;
}

/**
 * Validation outcome plus the parsed layout, for callers that go on to execute
 */
export interface InspectedModule {
  result: ValidationResult;
  layout: ModuleLayout | null;
}

const ENTRY_SIGNATURE: FuncType = { params: ["i32", "i32"], results: ["i32"] };

export class CapsuleValidator {
  readonly maxModuleSizeKb: number;
  private logger: Logger;

  constructor(options: ValidatorOptions = {}) {
    this.maxModuleSizeKb = options.maxModuleSizeKb ?? DEFAULT_MAX_MODULE_SIZE_KB;
    this.logger = options.logger ?? silentLogger;
  }

  /**
   * Check `bytes` against the validator's size limit and the capabilities
   * granted in `limits`
   */
  validate(bytes: Uint8Array, limits: ResourceLimits = DEFAULT_LIMITS): ValidationResult {
    return this.inspect(bytes, limits).result;
  }

  /**
   * @throws ValidationError when the module fails any check
   */
  assertValid(bytes: Uint8Array, limits: ResourceLimits = DEFAULT_LIMITS): ValidationSuccess {
    const result = this.validate(bytes, limits);
    if (!result.valid) throw result.error;
    return result;
  }

  inspect(bytes: Uint8Array, limits: ResourceLimits = DEFAULT_LIMITS): InspectedModule {
    const { capabilities } = limits;
    const sizeBytes = bytes.length;
    const sizeKb = sizeBytes / 1024;
    const maxBytes = this.maxModuleSizeKb * 1024;
    const warnings: string[] = [];
    let exports: string[] = [];
    let imports: ModuleImport[] = [];
    const summary = () => ({ sizeBytes, sizeKb, exports, imports, warnings });

    const fail = (error: ValidationError, layout: ModuleLayout | null = null): InspectedModule => {
      this.logger.info({ code: error.code, sizeBytes }, `Capsule rejected: ${error.message}`);
      return { result: { ...summary(), valid: false, error }, layout };
    };

    // 1. Size
    if (sizeBytes > maxBytes) {
      return fail(
        new ValidationError("TooLarge", `Module is ${sizeKb.toFixed(2)} KB, limit is ${this.maxModuleSizeKb} KB`)
      );
    }
    if (sizeBytes > maxBytes * SIZE_WARNING_RATIO) {
      warnings.push(
        `Module is ${sizeKb.toFixed(2)} KB, over ${SIZE_WARNING_RATIO * 100}% of the ${this.maxModuleSizeKb} KB limit`
      );
    }

    // 2. Structure
    // copied so views over shared or larger buffers validate like plain ones
    if (!WebAssembly.validate(new Uint8Array(bytes))) {
      return fail(new ValidationError("Malformed", "Module is not a valid WebAssembly binary"));
    }
    let layout: ModuleLayout;
    try {
      layout = parseModule(bytes);
      planModule(bytes, layout);
    } catch (error) {
      if (error instanceof WasmFormatError) {
        return fail(new ValidationError("Malformed", error.message, { cause: error }));
      }
      throw error;
    }
    exports = layout.exports.map((entry) => entry.name);
    imports = layout.imports.map(({ namespace, name }) => ({ namespace, name }));

    const reserved = layout.exports.find((entry) => entry.name.startsWith(METERING_EXPORTS.PREFIX));
    if (reserved) {
      return fail(new ValidationError("Malformed", `Export name ${reserved.name} uses a reserved prefix`), layout);
    }
    const memoryCount = layout.memories.length + layout.imports.filter((entry) => entry.kind === "memory").length;
    if (memoryCount > 1) {
      return fail(new ValidationError("Malformed", `Module declares ${memoryCount} memories, at most one is supported`), layout);
    }

    // 3. Required exports
    const entry = layout.exports.find((e) => e.name === GUEST_ABI.ENTRY_EXPORT && e.kind === "func");
    const entryType = entry ? functionType(layout, entry.index) : undefined;
    if (!entryType || !sameSignature(entryType, ENTRY_SIGNATURE)) {
      return fail(
        new ValidationError("MissingExport", `Module must export function ${GUEST_ABI.ENTRY_EXPORT}(i32, i32) -> i32`),
        layout
      );
    }
    if (!layout.exports.some((e) => e.name === GUEST_ABI.MEMORY_EXPORT && e.kind === "memory")) {
      return fail(new ValidationError("MissingExport", `Module must export its memory as "${GUEST_ABI.MEMORY_EXPORT}"`), layout);
    }

    // 4. Imports against the capability allow-list
    for (const imported of layout.imports) {
      const label = `${imported.namespace}::${imported.name}`;
      if (imported.kind !== "func" || !allowsImport(capabilities, imported.namespace, imported.name)) {
        return fail(new ValidationError("UnauthorizedImport", `Import ${label} is not allowed`), layout);
      }
      const declared = imported.typeIndex === undefined ? undefined : layout.types[imported.typeIndex];
      const expected = isHostFunctionName(imported.name) ? HOST_FUNCTIONS[imported.name].signature : undefined;
      if (!declared || !expected || !sameSignature(declared, expected)) {
        return fail(new ValidationError("UnauthorizedImport", `Import ${label} has the wrong signature`), layout);
      }
    }

    this.logger.debug({ sizeBytes, exports: exports.length, imports: imports.length }, "Capsule validated");
    return { result: { ...summary(), valid: true }, layout };
  }
}

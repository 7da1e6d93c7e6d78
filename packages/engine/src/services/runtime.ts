/**
 * Capsule runtime - the full pipeline: validate, bind capabilities, execute,
 * sign a receipt
 */

import { randomInt } from "node:crypto";
import type { Logger } from "pino";
import {
  DEFAULT_LIMITS,
  ExecutionError,
  ValidationError,
  type AccessLogEntry,
  type CapsuleModule,
  type ExecMetrics,
  type ExecutionReceipt,
  type FailureReceiptMode,
  type HostEnvironment,
  type NonceSource,
  type ResourceLimits,
  type ValidationResult,
} from "@sealbox/shared";
import { CapsuleValidator } from "../capsule/validator.js";
import { ExecutionEngine } from "../harness/executor.js";
import { systemClock, type Clock } from "../harness/clock.js";
import { CapabilitySandbox } from "../policy/sandbox.js";
import { silentLogger } from "../logger.js";
import { sha256Hex, type SigningIdentity } from "./crypto.js";
import { makeReceipt } from "./receipts.js";

export interface CapsuleRuntimeOptions {
  identity: SigningIdentity;
  maxModuleSizeKb?: number;
  limits?: ResourceLimits;
  failureReceipts?: FailureReceiptMode;
  nonceSource?: NonceSource;
  engine?: ExecutionEngine;
  clock?: Clock;
  logger?: Logger;
}

export interface RunRequest {
  module: Uint8Array;
  input: Uint8Array;
  /** Overrides the runtime's limits for this run */
  limits?: ResourceLimits;
  /** Host function inputs; time defaults to the clock, seed to the input commitment */
  environment?: Partial<HostEnvironment>;
}

export interface RunResult {
  executionId: string;
  output: Uint8Array;
  metrics: ExecMetrics;
  receipt: ExecutionReceipt;
  accessLog: AccessLogEntry[];
  validation: ValidationResult;
}

/** Largest nonce the random source produces (randomInt's exclusive bound) */
const RANDOM_NONCE_BOUND = 2 ** 48 - 1;

export class CapsuleRuntime {
  readonly validator: CapsuleValidator;
  readonly engine: ExecutionEngine;
  readonly limits: ResourceLimits;
  private identity: SigningIdentity;
  private failureReceipts: FailureReceiptMode;
  private nonceSource: NonceSource;
  private counter = 0;
  private clock: Clock;
  private logger: Logger;

  constructor(options: CapsuleRuntimeOptions) {
    this.identity = options.identity;
    this.logger = options.logger ?? silentLogger;
    this.clock = options.clock ?? systemClock;
    this.limits = options.limits ?? DEFAULT_LIMITS;
    this.failureReceipts = options.failureReceipts ?? "none";
    this.nonceSource = options.nonceSource ?? "counter";
    this.validator = new CapsuleValidator({ maxModuleSizeKb: options.maxModuleSizeKb, logger: this.logger });
    this.engine = options.engine ?? new ExecutionEngine({ clock: this.clock, logger: this.logger });
  }

  get nodeId(): string {
    return this.identity.nodeId;
  }

  /**
   * @throws ValidationError, SecurityError or ExecutionError
   */
  async run(request: RunRequest): Promise<RunResult> {
    const limits = request.limits ?? this.limits;
    const inspected = this.validator.inspect(request.module, limits);
    const validation = inspected.result;
    if (!validation.valid) throw validation.error;
    if (!inspected.layout) throw new ValidationError("Malformed", "Module layout unavailable after validation");

    const capsule: CapsuleModule = { bytes: request.module, id: sha256Hex(request.module) };
    const environment: HostEnvironment = {
      timeMs: request.environment?.timeMs ?? this.clock.now(),
      seed: request.environment?.seed ?? Buffer.from(sha256Hex(request.input), "hex"),
    };

    const sandbox = new CapabilitySandbox(limits.capabilities, { logger: this.logger });
    const bound = sandbox.bind(validation.imports, environment);
    await this.engine.prepare(capsule, inspected.layout);

    try {
      const result = await this.engine.execute(capsule, bound, request.input, limits);
      const receipt = await this.sign(request.module, request.input, result.output, result.metrics);
      this.logger.info(
        { executionId: result.executionId, capsuleId: capsule.id, nonce: receipt.nonce },
        "Receipt issued"
      );
      return { ...result, receipt, validation };
    } catch (error) {
      if (error instanceof ExecutionError && this.failureReceipts === "signed") {
        const failure = new TextEncoder().encode(`failure:${error.label}`);
        error.receipt = await this.sign(request.module, request.input, failure, error.metrics);
      }
      throw error;
    }
  }

  /**
   * Next receipt nonce: monotonic per runtime, or random when so configured
   */
  nextNonce(): number {
    if (this.nonceSource === "random") return randomInt(0, RANDOM_NONCE_BOUND);
    this.counter += 1;
    return this.counter;
  }

  private sign(moduleBytes: Uint8Array, inputBytes: Uint8Array, outputBytes: Uint8Array, metrics: ExecMetrics) {
    return makeReceipt({
      moduleBytes,
      inputBytes,
      outputBytes,
      metrics,
      identity: this.identity,
      nonce: this.nextNonce(),
      issuedAt: this.clock.now(),
    });
  }
}

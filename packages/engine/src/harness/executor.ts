/**
 * Node harness executor - runs one capsule per worker thread.
 *
 * Each execution compiles (or reuses) the instrumented module, spawns a fresh
 * worker that evaluates the guest runner, serves the guest's host calls on
 * this thread and terminates the worker on completion or deadline.
 */

import { Worker } from "node:worker_threads";
import { nanoid } from "nanoid";
import type { Logger } from "pino";
import {
  ExecutionError,
  GUEST_ABI,
  HOST_TRANSFER_LIMIT,
  METERING_EXPORTS,
  ValidationError,
  type AccessLogEntry,
  type CapsuleModule,
  type ExecMetrics,
  type ExecutionErrorCode,
  type ResourceKind,
  type ResourceLimits,
} from "@sealbox/shared";
import { HOST_FUNCTIONS, type HostTransfer } from "../policy/capabilities.js";
import type { BoundImports } from "../policy/sandbox.js";
import { WasmFormatError } from "../wasm/binary.js";
import { checkpointBridge, instrumentModule, planModule } from "../wasm/meter.js";
import { parseModule, type ModuleLayout } from "../wasm/module.js";
import { systemClock, type Clock } from "./clock.js";
import { GUEST_RUNNER_SOURCE, type GuestWorkerData } from "./guest-runner.js";
import {
  CHANNEL_LAYOUT,
  HostChannel,
  workerMessageSchema,
  type Checkpoint,
  type WorkerMessage,
} from "./host-channel.js";
import { ModuleCache, type CompiledCapsule } from "./module-cache.js";
import { silentLogger } from "../logger.js";
import { sha256Hex } from "../services/crypto.js";

const BYTES_PER_MB = 1024 * 1024;

export interface ExecutionEngineOptions {
  cache?: ModuleCache;
  clock?: Clock;
  logger?: Logger;
  /** How long a worker may take to start before the execution is abandoned */
  bootTimeoutMs?: number;
}

export interface ExecutionResult {
  executionId: string;
  output: Uint8Array;
  metrics: ExecMetrics;
  accessLog: AccessLogEntry[];
}

interface Usage {
  fuelRemaining: bigint | null;
  memoryBytes: number;
}

type WorkerOutcome =
  | { kind: "done"; output: Uint8Array; usage: Usage }
  | { kind: "failed"; code: ExecutionErrorCode; resource?: ResourceKind; message: string; usage: Usage };

type FailedMessage = Extract<WorkerMessage, { type: "failed" }>;

export class ExecutionEngine {
  readonly cache: ModuleCache;
  private clock: Clock;
  private logger: Logger;
  private bootTimeoutMs: number;
  private bridge: Promise<WebAssembly.Module> | null = null;

  constructor(options: ExecutionEngineOptions = {}) {
    this.cache = options.cache ?? new ModuleCache();
    this.clock = options.clock ?? systemClock;
    this.logger = options.logger ?? silentLogger;
    this.bootTimeoutMs = options.bootTimeoutMs ?? 10_000;
  }

  /**
   * Instrument and compile a capsule, reusing the cached module when present.
   * The cache is keyed by the digest of the bytes, never by the caller's id.
   *
   * @throws ValidationError when `capsule.id` is not the digest of `capsule.bytes`
   */
  async prepare(capsule: CapsuleModule, layout?: ModuleLayout): Promise<CompiledCapsule> {
    const id = sha256Hex(capsule.bytes);
    if (capsule.id !== id) {
      throw new ValidationError("Malformed", `Capsule id ${capsule.id} is not the SHA-256 of its bytes (${id})`);
    }
    return this.cache.getOrCompile(id, () => this.compile(capsule.bytes, id, layout));
  }

  /**
   * Run a validated capsule against `input` under `limits`.
   *
   * @throws ExecutionError carrying the metrics gathered up to the failure
   */
  async execute(
    capsule: CapsuleModule,
    bound: BoundImports,
    input: Uint8Array,
    limits: ResourceLimits
  ): Promise<ExecutionResult> {
    const started = this.clock.now();
    const executionId = nanoid();
    const log = this.logger.child({ executionId, capsuleId: capsule.id });
    const callsBefore = bound.callCount;
    const limitPages = Math.floor((limits.memoryLimitMb * BYTES_PER_MB) / GUEST_ABI.WASM_PAGE_BYTES);

    const metricsFor = (usage: Usage): ExecMetrics => ({
      fuel_used: fuelUsed(limits.fuelLimit, usage.fuelRemaining),
      memory_mb: usage.memoryBytes / BYTES_PER_MB,
      duration_ms: Math.max(0, this.clock.now() - started),
      host_calls: bound.callCount - callsBefore,
    });

    if (input.length > GUEST_ABI.MAX_IO_BYTES) {
      throw new ExecutionError(
        "ResourceExceeded",
        `Input of ${input.length} bytes exceeds the ${GUEST_ABI.MAX_IO_BYTES} byte limit`,
        metricsFor({ fuelRemaining: null, memoryBytes: 0 }),
        "Memory"
      );
    }

    const compiled = await this.prepare(capsule);
    const bridge = await this.checkpointBridge();
    const initialBytes = compiled.initialPages * GUEST_ABI.WASM_PAGE_BYTES;
    if (compiled.initialPages > limitPages) {
      throw new ExecutionError(
        "ResourceExceeded",
        `Initial memory of ${compiled.initialPages} pages exceeds the ${limitPages} page limit`,
        metricsFor({ fuelRemaining: null, memoryBytes: initialBytes }),
        "Memory"
      );
    }

    log.debug({ fuelLimit: limits.fuelLimit, memoryLimitMb: limits.memoryLimitMb }, "Starting execution");
    const outcome = await this.runWorker(compiled, bridge, bound, input, limits, limitPages, log);
    const metrics = metricsFor({
      fuelRemaining: outcome.usage.fuelRemaining,
      memoryBytes: Math.max(initialBytes, outcome.usage.memoryBytes),
    });

    if (outcome.kind === "failed") {
      const error = new ExecutionError(outcome.code, outcome.message, metrics, outcome.resource);
      log.warn({ code: error.label, fuelUsed: metrics.fuel_used, durationMs: metrics.duration_ms }, error.message);
      throw error;
    }

    log.info(
      { fuelUsed: metrics.fuel_used, memoryMb: metrics.memory_mb, durationMs: metrics.duration_ms, hostCalls: metrics.host_calls },
      "Capsule executed"
    );
    return {
      executionId,
      output: outcome.output,
      metrics,
      accessLog: bound.accessLog.slice(callsBefore),
    };
  }

  private async compile(bytes: Uint8Array, id: string, known?: ModuleLayout): Promise<CompiledCapsule> {
    let layout: ModuleLayout;
    let module: WebAssembly.Module;
    try {
      layout = known ?? parseModule(bytes);
      const instrumented = instrumentModule(bytes, layout, planModule(bytes, layout));
      module = await WebAssembly.compile(new Uint8Array(instrumented));
      this.logger.debug({ capsuleId: id, instrumentedBytes: instrumented.length }, "Capsule compiled");
    } catch (error) {
      if (error instanceof WasmFormatError || error instanceof WebAssembly.CompileError) {
        throw new ValidationError("Malformed", error.message, { cause: error });
      }
      throw error;
    }
    return { id, module, layout, initialPages: layout.memories[0]?.min ?? 0 };
  }

  private checkpointBridge(): Promise<WebAssembly.Module> {
    this.bridge ??= WebAssembly.compile(new Uint8Array(checkpointBridge()));
    return this.bridge;
  }

  private runWorker(
    compiled: CompiledCapsule,
    bridge: WebAssembly.Module,
    bound: BoundImports,
    input: Uint8Array,
    limits: ResourceLimits,
    limitPages: number,
    log: Logger
  ): Promise<WorkerOutcome> {
    const channel = new HostChannel();
    const transfers: Record<string, HostTransfer> = {};
    for (const name of bound.names) transfers[name] = HOST_FUNCTIONS[name].transfer;

    const workerData: GuestWorkerData = {
      module: compiled.module,
      bridge,
      input,
      fuelLimit: BigInt(limits.fuelLimit),
      memoryLimitPages: limitPages,
      transfers,
      channel: channel.buffer,
      abi: {
        entry: GUEST_ABI.ENTRY_EXPORT,
        memory: GUEST_ABI.MEMORY_EXPORT,
        inputOffset: GUEST_ABI.INPUT_OFFSET,
        pageBytes: GUEST_ABI.WASM_PAGE_BYTES,
        fuel: METERING_EXPORTS.FUEL,
        memoryLimit: METERING_EXPORTS.MEMORY_LIMIT,
        oom: METERING_EXPORTS.OOM,
        start: METERING_EXPORTS.START,
        checkpoint: METERING_EXPORTS.CHECKPOINT,
        checkpointTable: METERING_EXPORTS.CHECKPOINT_TABLE,
        checkpointPages: CHANNEL_LAYOUT.CHECKPOINT_PAGES,
        checkpointFuelOffset: CHANNEL_LAYOUT.CHECKPOINT_FUEL_OFFSET,
        payloadOffset: CHANNEL_LAYOUT.PAYLOAD_OFFSET,
        resultOffset: CHANNEL_LAYOUT.RESULT_OFFSET,
        transferLimit: HOST_TRANSFER_LIMIT,
      },
    };

    return new Promise((resolve) => {
      const worker = new Worker(GUEST_RUNNER_SOURCE, {
        eval: true,
        workerData,
        resourceLimits: { maxOldGenerationSizeMb: 64, maxYoungGenerationSizeMb: 16 },
      });
      let usage: Usage = { fuelRemaining: null, memoryBytes: 0 };
      let deadline: ReturnType<typeof setTimeout> | undefined;
      let settled = false;

      const finish = (outcome: WorkerOutcome): void => {
        if (settled) return;
        settled = true;
        clearTimeout(boot);
        clearTimeout(deadline);
        worker.removeAllListeners();
        // The guest's last checkpoint is only final once the worker is gone
        worker.terminate().then(
          () => resolve(withCheckpoint(outcome, channel.checkpoint())),
          (error: unknown) => {
            log.warn({ err: error }, "Failed to terminate execution worker");
            resolve(withCheckpoint(outcome, channel.checkpoint()));
          }
        );
      };
      const fail = (code: ExecutionErrorCode, message: string, resource?: ResourceKind): void =>
        finish({ kind: "failed", code, resource, message, usage });

      const boot = setTimeout(() => fail("Trap", "Execution worker did not start"), this.bootTimeoutMs);

      worker.on("message", (raw: unknown) => {
        const parsed = workerMessageSchema.safeParse(raw);
        if (!parsed.success) {
          fail("Trap", "Unexpected message from execution worker");
          return;
        }
        const message = parsed.data;
        switch (message.type) {
          case "ready":
            clearTimeout(boot);
            deadline = setTimeout(
              () => fail("Timeout", `Execution exceeded ${limits.executionTimeMs} ms`),
              limits.executionTimeMs
            );
            break;
          case "host-call":
            usage = { fuelRemaining: message.fuelRemaining, memoryBytes: message.memoryBytes };
            try {
              channel.resolve(bound.invoke(message.name, { args: message.args, reads: message.reads }));
            } catch (error) {
              log.debug({ function: message.name, err: error }, "Host function failed");
              channel.reject(error instanceof Error ? error.message : String(error));
            }
            break;
          case "done":
            usage = { fuelRemaining: message.fuelRemaining, memoryBytes: message.memoryBytes };
            finish({ kind: "done", output: message.output, usage });
            break;
          case "failed":
            usage = { fuelRemaining: message.fuelRemaining, memoryBytes: message.memoryBytes };
            fail(...failureOf(message));
            break;
        }
      });
      worker.on("error", (error) => fail("Trap", `Execution worker crashed: ${error.message}`));
      worker.on("exit", (code) => fail("Trap", `Execution worker exited with code ${code}`));
    });
  }
}

/**
 * Fold the guest's last checkpoint into an outcome's usage. Fuel only falls
 * and memory only grows, so the lower balance and the larger size are the
 * more recent observations.
 */
function withCheckpoint(outcome: WorkerOutcome, checkpoint: Checkpoint | null): WorkerOutcome {
  if (checkpoint === null) return outcome;
  const reported = outcome.usage.fuelRemaining;
  const usage: Usage = {
    fuelRemaining:
      reported === null || checkpoint.fuelRemaining < reported ? checkpoint.fuelRemaining : reported,
    memoryBytes: Math.max(outcome.usage.memoryBytes, checkpoint.pages * GUEST_ABI.WASM_PAGE_BYTES),
  };
  return { ...outcome, usage };
}

function failureOf(message: FailedMessage): [ExecutionErrorCode, string, ResourceKind?] {
  switch (message.reason) {
    case "Fuel":
      return ["ResourceExceeded", message.message, "Fuel"];
    case "Memory":
      return ["ResourceExceeded", message.message, "Memory"];
    case "HostFunctionFailure":
      return ["HostFunctionFailure", message.message];
    case "Trap":
      return ["Trap", message.message];
  }
}

/**
 * Fuel consumed, clamped to [0, limit]; an overdrawn balance counts as the full limit
 */
export function fuelUsed(limit: number, remaining: bigint | null): number {
  if (remaining === null) return 0;
  const used = BigInt(limit) - remaining;
  if (used <= 0n) return 0;
  return used >= BigInt(limit) ? limit : Number(used);
}

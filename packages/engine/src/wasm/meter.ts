/**
 * Fuel and memory-ceiling instrumentation.
 *
 * Rewrites a validated module so that:
 * - every function entry and every loop iteration charges the instructions
 *   of its straight-line region against an exported i64 fuel global and
 *   traps once the balance drops below zero
 * - every `memory.grow` is preceded by a check against an exported page
 *   ceiling, which raises an exported OOM flag before trapping
 * - the start function is exported instead of run at instantiation, so the
 *   host can set the budgets first
 * - once armed through an exported threshold global, charges periodically
 *   call the function in an exported one-slot table with the fuel balance and
 *   page count, so a host can observe a guest it may later have to kill
 *
 * New types, tables and globals are appended after the module's own, so no
 * existing index moves.
 */

import { CHECKPOINT_INTERVAL, METERING_EXPORTS } from "@sealbox/shared";
import {
  ByteReader,
  WasmFormatError,
  concatBytes,
  encodeName,
  encodeS64,
  encodeSection,
  encodeU32,
  encodeVector,
} from "./binary.js";
import { SECTION, WASM_MAGIC, WASM_VERSION, countImports, type FunctionBody, type ModuleLayout } from "./module.js";
import { BLOCKTYPE_EMPTY, OP, readInstruction } from "./opcodes.js";

interface ChargePoint {
  offset: number;
  cost: number;
}

interface GrowSite {
  start: number;
  end: number;
  memory: number;
}

export interface BodyPlan {
  body: FunctionBody;
  charges: ChargePoint[];
  grows: GrowSite[];
  instructionCount: number;
}

/**
 * Walk one function body and work out where fuel is charged and how much.
 * Each region (function top level or loop body) pays for all of its own
 * instructions up front; nested loops are charged separately per iteration.
 */
export function planBody(bytes: Uint8Array, body: FunctionBody): BodyPlan {
  const reader = new ByteReader(bytes, body.codeStart, body.end);
  const charges: ChargePoint[] = [{ offset: body.codeStart, cost: 0 }];
  const grows: GrowSite[] = [];
  const regions: number[] = [0];
  const control: ("block" | "loop")[] = [];
  let instructionCount = 0;
  let closed = false;

  while (!reader.eof) {
    if (closed) reader.fail("instructions after the end of a function body");
    const instruction = readInstruction(reader);
    instructionCount++;
    const region = charges[regions[regions.length - 1] ?? 0];
    if (region) region.cost++;

    switch (instruction.kind) {
      case "block":
      case "if":
        control.push("block");
        break;
      case "loop":
        control.push("loop");
        charges.push({ offset: instruction.end, cost: 0 });
        regions.push(charges.length - 1);
        break;
      case "end": {
        const closing = control.pop();
        if (closing === undefined) closed = true;
        else if (closing === "loop") regions.pop();
        break;
      }
      case "memory.grow":
        grows.push({ start: instruction.start, end: instruction.end, memory: instruction.memory ?? 0 });
        break;
      case "else":
      case "plain":
        break;
    }
  }
  if (!closed) throw new WasmFormatError("function body is missing its final end", body.end);
  return { body, charges, grows, instructionCount };
}

/**
 * Decode every function body; throws WasmFormatError on anything the
 * instrumenter cannot handle.
 */
export function planModule(bytes: Uint8Array, layout: ModuleLayout): BodyPlan[] {
  return layout.bodies.map((body) => planBody(bytes, body));
}

interface MeterGlobals {
  fuel: number;
  memoryLimit: number;
  oom: number;
  scratch: number;
  checkpoint: number;
}

interface MeterContext {
  globals: MeterGlobals;
  /** Type and table index of the checkpoint callback */
  checkpointType: number;
  checkpointTable: number;
  hasMemory: boolean;
}

const I64_MAX = 0x7fff_ffff_ffff_ffffn;

/**
 * Charge `cost`, trap when the balance goes negative, and report progress
 * through the checkpoint table once the balance falls below the armed threshold
 */
function chargeSequence(context: MeterContext, cost: number): number[] {
  const fuel = encodeU32(context.globals.fuel);
  const checkpoint = encodeU32(context.globals.checkpoint);
  return [
    OP.GLOBAL_GET, ...fuel,
    OP.I64_CONST, ...encodeS64(cost),
    OP.I64_SUB,
    OP.GLOBAL_SET, ...fuel,
    OP.GLOBAL_GET, ...fuel,
    OP.I64_CONST, 0x00,
    OP.I64_LT_S,
    OP.IF, BLOCKTYPE_EMPTY,
    OP.UNREACHABLE,
    OP.END,
    OP.GLOBAL_GET, ...fuel,
    OP.GLOBAL_GET, ...checkpoint,
    OP.I64_LT_S,
    OP.IF, BLOCKTYPE_EMPTY,
    OP.GLOBAL_GET, ...fuel,
    ...(context.hasMemory ? [OP.MEMORY_SIZE, 0x00] : [OP.I32_CONST, 0x00]),
    OP.I32_CONST, 0x00,
    OP.CALL_INDIRECT, ...encodeU32(context.checkpointType), ...encodeU32(context.checkpointTable),
    OP.GLOBAL_GET, ...fuel,
    OP.I64_CONST, ...encodeS64(CHECKPOINT_INTERVAL),
    OP.I64_SUB,
    OP.GLOBAL_SET, ...checkpoint,
    OP.END,
  ];
}

function growGuard(context: MeterContext, memory: number): number[] {
  const { globals } = context;
  const scratch = encodeU32(globals.scratch);
  const checkpoint = encodeU32(globals.checkpoint);
  const memoryIndex = encodeU32(memory);
  return [
    OP.GLOBAL_SET, ...scratch,
    OP.MEMORY_SIZE, ...memoryIndex,
    OP.GLOBAL_GET, ...scratch,
    OP.I32_ADD,
    OP.GLOBAL_GET, ...encodeU32(globals.memoryLimit),
    OP.I32_GT_U,
    OP.IF, BLOCKTYPE_EMPTY,
    OP.I32_CONST, 0x01,
    OP.GLOBAL_SET, ...encodeU32(globals.oom),
    OP.UNREACHABLE,
    OP.END,
    // report the new size at the next charge, when checkpoints are armed
    OP.GLOBAL_GET, ...checkpoint,
    OP.I64_CONST, 0x00,
    OP.I64_GT_S,
    OP.IF, BLOCKTYPE_EMPTY,
    OP.I64_CONST, ...encodeS64(I64_MAX),
    OP.GLOBAL_SET, ...checkpoint,
    OP.END,
    OP.GLOBAL_GET, ...scratch,
    OP.MEMORY_GROW, ...memoryIndex,
  ];
}

function rewriteBody(bytes: Uint8Array, plan: BodyPlan, context: MeterContext): number[] {
  const { body } = plan;
  const edits = [
    ...plan.charges.map((charge) => ({ at: charge.offset, skip: 0, insert: chargeSequence(context, charge.cost) })),
    ...plan.grows.map((grow) => ({ at: grow.start, skip: grow.end - grow.start, insert: growGuard(context, grow.memory) })),
  ].sort((a, b) => a.at - b.at);

  const out: number[] = Array.from(bytes.subarray(body.start, body.codeStart));
  const copy = (from: number, to: number): void => {
    for (let i = from; i < to; i++) out.push(bytes[i] ?? 0);
  };
  let cursor = body.codeStart;
  for (const edit of edits) {
    copy(cursor, edit.at);
    for (const byte of edit.insert) out.push(byte);
    cursor = edit.at + edit.skip;
  }
  copy(cursor, body.end);
  return [...encodeU32(out.length), ...out];
}

const MUTABLE = 0x01;
const I32 = 0x7f;
const I64 = 0x7e;
const FUNCREF = 0x70;
const FUNC_TYPE = 0x60;

function meterGlobalEntries(): number[][] {
  return [
    [I64, MUTABLE, OP.I64_CONST, 0x00, OP.END], // fuel
    [I32, MUTABLE, OP.I32_CONST, 0x00, OP.END], // memory ceiling, in pages
    [I32, MUTABLE, OP.I32_CONST, 0x00, OP.END], // oom flag
    [I32, MUTABLE, OP.I32_CONST, 0x00, OP.END], // grow scratch
    [I64, MUTABLE, OP.I64_CONST, 0x00, OP.END], // checkpoint threshold, 0 = disarmed
  ];
}

/** `(fuel: i64, pages: i32) -> ()` */
const CHECKPOINT_TYPE = [FUNC_TYPE, 0x02, I64, I32, 0x00];

const EXPORT_KIND = { func: 0x00, table: 0x01, global: 0x03 } as const;

function exportEntry(name: string, kind: number, index: number): number[] {
  return [...encodeName(name), kind, ...encodeU32(index)];
}

/**
 * A module that re-exports an imported `env.checkpoint` function, turning a
 * host callback into a funcref the checkpoint table can hold
 */
export function checkpointBridge(): Uint8Array {
  return concatBytes([
    [...WASM_MAGIC, ...WASM_VERSION],
    encodeSection(SECTION.TYPE, encodeVector([CHECKPOINT_TYPE])),
    encodeSection(SECTION.IMPORT, encodeVector([[...encodeName("env"), ...encodeName("checkpoint"), EXPORT_KIND.func, 0x00]])),
    encodeSection(SECTION.EXPORT, encodeVector([exportEntry("checkpoint", EXPORT_KIND.func, 0)])),
  ]);
}

/** Canonical ordering of the non-custom sections */
const SECTION_RANK: Record<number, number> = {
  [SECTION.TYPE]: 1,
  [SECTION.IMPORT]: 2,
  [SECTION.FUNCTION]: 3,
  [SECTION.TABLE]: 4,
  [SECTION.MEMORY]: 5,
  [SECTION.TAG]: 6,
  [SECTION.GLOBAL]: 7,
  [SECTION.EXPORT]: 8,
  [SECTION.START]: 9,
  [SECTION.ELEMENT]: 10,
  [SECTION.DATA_COUNT]: 11,
  [SECTION.CODE]: 12,
  [SECTION.DATA]: 13,
};

interface VectorTail {
  count: number;
  entries: Uint8Array;
}

function vectorTail(bytes: Uint8Array, payloadStart: number, end: number): VectorTail {
  const reader = new ByteReader(bytes, payloadStart, end);
  const count = reader.u32();
  return { count, entries: bytes.subarray(reader.position, end) };
}

function sectionTail(bytes: Uint8Array, layout: ModuleLayout, id: number): VectorTail | null {
  const section = layout.sections.find((candidate) => candidate.id === id);
  return section ? vectorTail(bytes, section.payloadStart, section.end) : null;
}

/**
 * Produce the instrumented module binary.
 */
export function instrumentModule(bytes: Uint8Array, layout: ModuleLayout, plans = planModule(bytes, layout)): Uint8Array {
  const base = countImports(layout, "global") + layout.globalCount;
  const context: MeterContext = {
    globals: { fuel: base, memoryLimit: base + 1, oom: base + 2, scratch: base + 3, checkpoint: base + 4 },
    checkpointType: layout.types.length,
    checkpointTable: countImports(layout, "table") + (sectionTail(bytes, layout, SECTION.TABLE)?.count ?? 0),
    hasMemory: countImports(layout, "memory") + layout.memories.length > 0,
  };
  const { globals } = context;

  const exports = [
    exportEntry(METERING_EXPORTS.FUEL, EXPORT_KIND.global, globals.fuel),
    exportEntry(METERING_EXPORTS.MEMORY_LIMIT, EXPORT_KIND.global, globals.memoryLimit),
    exportEntry(METERING_EXPORTS.OOM, EXPORT_KIND.global, globals.oom),
    exportEntry(METERING_EXPORTS.CHECKPOINT, EXPORT_KIND.global, globals.checkpoint),
    exportEntry(METERING_EXPORTS.CHECKPOINT_TABLE, EXPORT_KIND.table, context.checkpointTable),
  ];
  if (layout.startFunction !== null) {
    exports.push(exportEntry(METERING_EXPORTS.START, EXPORT_KIND.func, layout.startFunction));
  }

  // Entries appended to existing sections (or to new ones); nothing existing is renumbered
  const additions = new Map<number, number[][]>([
    [SECTION.TYPE, [CHECKPOINT_TYPE]],
    [SECTION.TABLE, [[FUNCREF, 0x00, 0x01]]],
    [SECTION.GLOBAL, meterGlobalEntries()],
    [SECTION.EXPORT, exports],
  ]);
  const appended = (id: number, added: number[][], existing: VectorTail | null): number[] =>
    encodeSection(id, [
      ...encodeU32((existing?.count ?? 0) + added.length),
      ...(existing?.entries ?? []),
      ...added.flat(),
    ]);

  const parts: ArrayLike<number>[] = [bytes.subarray(0, 8)];
  const flushBefore = (rank: number): void => {
    for (const [id, added] of additions) {
      if ((SECTION_RANK[id] ?? 0) < rank) {
        parts.push(appended(id, added, null));
        additions.delete(id);
      }
    }
  };

  for (const section of layout.sections) {
    if (section.id !== SECTION.CUSTOM) flushBefore(SECTION_RANK[section.id] ?? 0);
    const added = additions.get(section.id);
    if (added) {
      parts.push(appended(section.id, added, vectorTail(bytes, section.payloadStart, section.end)));
      additions.delete(section.id);
      continue;
    }
    switch (section.id) {
      case SECTION.START:
        break;
      case SECTION.CODE: {
        const bodies = plans.map((plan) => rewriteBody(bytes, plan, context));
        parts.push(encodeSection(SECTION.CODE, [...encodeU32(bodies.length), ...bodies.flat()]));
        break;
      }
      default:
        parts.push(bytes.subarray(section.start, section.end));
    }
  }
  flushBefore(Number.POSITIVE_INFINITY);

  return concatBytes(parts);
}

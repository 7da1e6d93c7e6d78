/**
 * Instruction decoder covering the WebAssembly 2.0 scalar instruction set
 * (MVP, sign extension, saturating truncation, bulk memory, reference types,
 * tail calls). SIMD, threads and exception handling are rejected.
 */

import type { ByteReader } from "./binary.js";

export type InstructionKind = "block" | "loop" | "if" | "else" | "end" | "memory.grow" | "plain";

export interface Instruction {
  opcode: number;
  kind: InstructionKind;
  start: number;
  end: number;
  /** Memory index, for memory.grow */
  memory?: number;
}

export const OP = {
  UNREACHABLE: 0x00,
  BLOCK: 0x02,
  LOOP: 0x03,
  IF: 0x04,
  ELSE: 0x05,
  END: 0x0b,
  BR_TABLE: 0x0e,
  CALL: 0x10,
  CALL_INDIRECT: 0x11,
  RETURN_CALL: 0x12,
  RETURN_CALL_INDIRECT: 0x13,
  SELECT_TYPED: 0x1c,
  LOCAL_GET: 0x20,
  LOCAL_SET: 0x21,
  LOCAL_TEE: 0x22,
  GLOBAL_GET: 0x23,
  GLOBAL_SET: 0x24,
  TABLE_GET: 0x25,
  TABLE_SET: 0x26,
  MEMORY_SIZE: 0x3f,
  MEMORY_GROW: 0x40,
  I32_CONST: 0x41,
  I64_CONST: 0x42,
  F32_CONST: 0x43,
  F64_CONST: 0x44,
  I32_ADD: 0x6a,
  I32_GT_U: 0x4b,
  I64_LT_S: 0x53,
  I64_GT_S: 0x55,
  I64_SUB: 0x7d,
  REF_NULL: 0xd0,
  REF_IS_NULL: 0xd1,
  REF_FUNC: 0xd2,
  PREFIX_MISC: 0xfc,
  PREFIX_SIMD: 0xfd,
  PREFIX_THREADS: 0xfe,
} as const;

export const BLOCKTYPE_EMPTY = 0x40;

const SINGLE_BYTE_BLOCKTYPES = new Set([BLOCKTYPE_EMPTY, 0x7f, 0x7e, 0x7d, 0x7c, 0x7b, 0x70, 0x6f]);

function skipBlockType(reader: ByteReader): void {
  if (SINGLE_BYTE_BLOCKTYPES.has(reader.peek())) {
    reader.u8();
    return;
  }
  reader.skipSigned(33);
}

function skipMemArg(reader: ByteReader): void {
  const align = reader.u32();
  if ((align & 0x40) !== 0) reader.u32();
  reader.u32();
}

/** Immediates of the 0xFC prefixed instructions, as a count of u32 fields */
const MISC_IMMEDIATES: Record<number, number> = {
  0: 0, 1: 0, 2: 0, 3: 0, 4: 0, 5: 0, 6: 0, 7: 0,
  8: 2, // memory.init
  9: 1, // data.drop
  10: 2, // memory.copy
  11: 1, // memory.fill
  12: 2, // table.init
  13: 1, // elem.drop
  14: 2, // table.copy
  15: 1, // table.grow
  16: 1, // table.size
  17: 1, // table.fill
};

/**
 * Decode one instruction at the reader's position and advance past it.
 *
 * @throws WasmFormatError on unknown or unsupported opcodes
 */
export function readInstruction(reader: ByteReader): Instruction {
  const start = reader.position;
  const opcode = reader.u8();
  let kind: InstructionKind = "plain";
  let memory: number | undefined;

  switch (opcode) {
    case OP.BLOCK:
      kind = "block";
      skipBlockType(reader);
      break;
    case OP.LOOP:
      kind = "loop";
      skipBlockType(reader);
      break;
    case OP.IF:
      kind = "if";
      skipBlockType(reader);
      break;
    case OP.ELSE:
      kind = "else";
      break;
    case OP.END:
      kind = "end";
      break;
    case 0x0c: // br
    case 0x0d: // br_if
    case OP.CALL:
    case OP.RETURN_CALL:
    case OP.LOCAL_GET:
    case OP.LOCAL_SET:
    case OP.LOCAL_TEE:
    case OP.GLOBAL_GET:
    case OP.GLOBAL_SET:
    case OP.TABLE_GET:
    case OP.TABLE_SET:
    case OP.MEMORY_SIZE:
    case OP.REF_FUNC:
      reader.u32();
      break;
    case OP.BR_TABLE:
      for (let n = reader.u32(); n > 0; n--) reader.u32();
      reader.u32();
      break;
    case OP.CALL_INDIRECT:
    case OP.RETURN_CALL_INDIRECT:
      reader.u32();
      reader.u32();
      break;
    case OP.SELECT_TYPED:
      for (let n = reader.u32(); n > 0; n--) reader.u8();
      break;
    case OP.MEMORY_GROW:
      kind = "memory.grow";
      memory = reader.u32();
      break;
    case OP.I32_CONST:
      reader.skipSigned(32);
      break;
    case OP.I64_CONST:
      reader.skipSigned(64);
      break;
    case OP.F32_CONST:
      reader.skip(4);
      break;
    case OP.F64_CONST:
      reader.skip(8);
      break;
    case OP.REF_NULL:
      reader.u8();
      break;
    case OP.PREFIX_MISC: {
      const sub = reader.u32();
      const fields = MISC_IMMEDIATES[sub];
      if (fields === undefined) reader.fail(`unknown 0xfc instruction ${sub}`);
      for (let i = 0; i < fields; i++) reader.u32();
      break;
    }
    case OP.PREFIX_SIMD:
      reader.fail("SIMD instructions are not supported");
      break;
    case OP.PREFIX_THREADS:
      reader.fail("atomic instructions are not supported");
      break;
    default:
      if (opcode >= 0x28 && opcode <= 0x3e) {
        skipMemArg(reader);
      } else if (!isPlainOpcode(opcode)) {
        reader.position = start;
        reader.fail(`unsupported opcode 0x${opcode.toString(16)}`);
      }
  }

  return { opcode, kind, start, end: reader.position, memory };
}

function isPlainOpcode(opcode: number): boolean {
  return (
    opcode === OP.UNREACHABLE ||
    opcode === 0x01 || // nop
    opcode === 0x0f || // return
    opcode === 0x1a || // drop
    opcode === 0x1b || // select
    opcode === OP.REF_IS_NULL ||
    (opcode >= 0x45 && opcode <= 0xc4)
  );
}

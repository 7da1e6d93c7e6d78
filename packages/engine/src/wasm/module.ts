/**
 * Structural parser for WebAssembly modules.
 *
 * Only reads what validation and instrumentation need; semantic checks are
 * left to `WebAssembly.validate`.
 */

import { ByteReader, WasmFormatError } from "./binary.js";

export type ValType = "i32" | "i64" | "f32" | "f64" | "v128" | "funcref" | "externref";
export type ExternalKind = "func" | "table" | "memory" | "global" | "tag";

export interface FuncType {
  params: ValType[];
  results: ValType[];
}

export interface ImportEntry {
  namespace: string;
  name: string;
  kind: ExternalKind;
  /** Type index, for function imports */
  typeIndex?: number;
}

export interface ExportEntry {
  name: string;
  kind: ExternalKind;
  index: number;
}

export interface MemoryLimits {
  min: number;
  max?: number;
}

export interface SectionSpan {
  id: number;
  /** Offset of the section id byte */
  start: number;
  /** Offset of the first payload byte */
  payloadStart: number;
  end: number;
}

export interface FunctionBody {
  /** First byte after the body size prefix */
  start: number;
  /** First instruction byte */
  codeStart: number;
  end: number;
}

export interface ModuleLayout {
  sections: SectionSpan[];
  types: FuncType[];
  imports: ImportEntry[];
  /** Type index of each defined (non-imported) function */
  functions: number[];
  memories: MemoryLimits[];
  /** Number of defined (non-imported) globals */
  globalCount: number;
  exports: ExportEntry[];
  startFunction: number | null;
  bodies: FunctionBody[];
}

export const SECTION = {
  CUSTOM: 0,
  TYPE: 1,
  IMPORT: 2,
  FUNCTION: 3,
  TABLE: 4,
  MEMORY: 5,
  GLOBAL: 6,
  EXPORT: 7,
  START: 8,
  ELEMENT: 9,
  CODE: 10,
  DATA: 11,
  DATA_COUNT: 12,
  TAG: 13,
} as const;

export const WASM_MAGIC = [0x00, 0x61, 0x73, 0x6d];
export const WASM_VERSION = [0x01, 0x00, 0x00, 0x00];

const VALTYPES: Record<number, ValType> = {
  0x7f: "i32",
  0x7e: "i64",
  0x7d: "f32",
  0x7c: "f64",
  0x7b: "v128",
  0x70: "funcref",
  0x6f: "externref",
};

const KINDS: ExternalKind[] = ["func", "table", "memory", "global", "tag"];

export function readValType(reader: ReadonlyValReader): ValType {
  const byte = reader.u8();
  const type = VALTYPES[byte];
  if (type === undefined) reader.fail(`unsupported value type 0x${byte.toString(16)}`);
  return type;
}

type ReadonlyValReader = Pick<ByteReader, "u8" | "fail">;

function readLimits(reader: ByteReader): MemoryLimits {
  const flags = reader.u8();
  if (flags > 0x03) reader.fail("64-bit or unknown limits are not supported");
  const min = reader.u32();
  return (flags & 0x01) === 1 ? { min, max: reader.u32() } : { min };
}

function readKind(reader: ByteReader): ExternalKind {
  const byte = reader.u8();
  return KINDS[byte] ?? reader.fail(`unknown external kind 0x${byte.toString(16)}`);
}

function parseTypes(reader: ByteReader): FuncType[] {
  const count = reader.u32();
  const types: FuncType[] = [];
  for (let i = 0; i < count; i++) {
    if (reader.u8() !== 0x60) reader.fail("only function types are supported");
    const params: ValType[] = [];
    for (let n = reader.u32(); n > 0; n--) params.push(readValType(reader));
    const results: ValType[] = [];
    for (let n = reader.u32(); n > 0; n--) results.push(readValType(reader));
    types.push({ params, results });
  }
  return types;
}

function parseImports(reader: ByteReader): ImportEntry[] {
  const count = reader.u32();
  const imports: ImportEntry[] = [];
  for (let i = 0; i < count; i++) {
    const namespace = reader.name();
    const name = reader.name();
    const kind = readKind(reader);
    switch (kind) {
      case "func":
        imports.push({ namespace, name, kind, typeIndex: reader.u32() });
        break;
      case "table":
        readValType(reader);
        readLimits(reader);
        imports.push({ namespace, name, kind });
        break;
      case "memory":
        readLimits(reader);
        imports.push({ namespace, name, kind });
        break;
      case "global":
        readValType(reader);
        reader.u8();
        imports.push({ namespace, name, kind });
        break;
      case "tag":
        reader.u8();
        reader.u32();
        imports.push({ namespace, name, kind });
        break;
    }
  }
  return imports;
}

function parseExports(reader: ByteReader): ExportEntry[] {
  const count = reader.u32();
  const exports: ExportEntry[] = [];
  for (let i = 0; i < count; i++) {
    const name = reader.name();
    const kind = readKind(reader);
    exports.push({ name, kind, index: reader.u32() });
  }
  return exports;
}

function parseCode(reader: ByteReader): FunctionBody[] {
  const count = reader.u32();
  const bodies: FunctionBody[] = [];
  for (let i = 0; i < count; i++) {
    const size = reader.u32();
    const start = reader.position;
    const end = start + size;
    if (end > reader.end) reader.fail("function body runs past end of section");
    const body = new ByteReader(reader.bytes, start, end);
    for (let groups = body.u32(); groups > 0; groups--) {
      body.u32();
      readValType(body);
    }
    bodies.push({ start, codeStart: body.position, end });
    reader.position = end;
  }
  return bodies;
}

/**
 * Parse a module's section layout.
 *
 * @throws WasmFormatError when the binary is not structurally sound
 */
export function parseModule(bytes: Uint8Array): ModuleLayout {
  const reader = new ByteReader(bytes);
  const header = reader.take(Math.min(8, bytes.length));
  if (header.length < 8 || WASM_MAGIC.some((b, i) => header[i] !== b)) {
    throw new WasmFormatError("missing WebAssembly magic number", 0);
  }
  if (WASM_VERSION.some((b, i) => header[i + 4] !== b)) {
    throw new WasmFormatError("unsupported WebAssembly version", 4);
  }

  const layout: ModuleLayout = {
    sections: [],
    types: [],
    imports: [],
    functions: [],
    memories: [],
    globalCount: 0,
    exports: [],
    startFunction: null,
    bodies: [],
  };

  while (!reader.eof) {
    const start = reader.position;
    const id = reader.u8();
    const size = reader.u32();
    const payloadStart = reader.position;
    const end = payloadStart + size;
    if (end > bytes.length) reader.fail("section runs past end of module");
    const section = new ByteReader(bytes, payloadStart, end);
    layout.sections.push({ id, start, payloadStart, end });

    switch (id) {
      case SECTION.TYPE:
        layout.types = parseTypes(section);
        break;
      case SECTION.IMPORT:
        layout.imports = parseImports(section);
        break;
      case SECTION.FUNCTION:
        for (let n = section.u32(); n > 0; n--) layout.functions.push(section.u32());
        break;
      case SECTION.MEMORY:
        for (let n = section.u32(); n > 0; n--) layout.memories.push(readLimits(section));
        break;
      case SECTION.GLOBAL:
        layout.globalCount = section.u32();
        break;
      case SECTION.EXPORT:
        layout.exports = parseExports(section);
        break;
      case SECTION.START:
        layout.startFunction = section.u32();
        break;
      case SECTION.CODE:
        layout.bodies = parseCode(section);
        break;
      case SECTION.CUSTOM:
      case SECTION.TABLE:
      case SECTION.ELEMENT:
      case SECTION.DATA:
      case SECTION.DATA_COUNT:
        break;
      case SECTION.TAG:
        reader.fail("exception handling is not supported");
        break;
      default:
        throw new WasmFormatError(`unknown section id ${id}`, start);
    }
    reader.position = end;
  }

  if (layout.bodies.length !== layout.functions.length) {
    throw new WasmFormatError("function and code section counts differ", bytes.length);
  }
  return layout;
}

export function countImports(layout: ModuleLayout, kind: ExternalKind): number {
  return layout.imports.filter((entry) => entry.kind === kind).length;
}

/**
 * Signature of a function in the module's function index space
 */
export function functionType(layout: ModuleLayout, index: number): FuncType | undefined {
  const imported = layout.imports.filter((entry) => entry.kind === "func");
  const typeIndex =
    index < imported.length ? imported[index]?.typeIndex : layout.functions[index - imported.length];
  return typeIndex === undefined ? undefined : layout.types[typeIndex];
}

export function sameSignature(a: FuncType, b: FuncType): boolean {
  return (
    a.params.length === b.params.length &&
    a.results.length === b.results.length &&
    a.params.every((type, i) => type === b.params[i]) &&
    a.results.every((type, i) => type === b.results[i])
  );
}

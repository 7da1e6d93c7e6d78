import { describe, expect, it } from "vitest";
import { CHECKPOINT_INTERVAL, METERING_EXPORTS } from "@sealbox/shared";
import { ByteReader, WasmFormatError, encodeS64, encodeU32 } from "../src/wasm/binary.js";
import { checkpointBridge, instrumentModule, planBody, planModule } from "../src/wasm/meter.js";
import { functionType, parseModule } from "../src/wasm/module.js";
import { readInstruction } from "../src/wasm/opcodes.js";
import {
  globalCounterCapsule,
  growCapsule,
  growThenSpinCapsule,
  hashCapsule,
  helloCapsule,
  helloFuel,
  spinCapsule,
  startCapsule,
} from "./helpers/capsules.js";
import { WasmBuilder, op } from "./helpers/wasm-builder.js";

function instantiate(bytes: Uint8Array, imports: WebAssembly.Imports = {}): WebAssembly.Instance {
  const layout = parseModule(bytes);
  const instrumented = instrumentModule(bytes, layout);
  return new WebAssembly.Instance(new WebAssembly.Module(new Uint8Array(instrumented)), imports);
}

function global(instance: WebAssembly.Instance, name: string): WebAssembly.Global {
  const value = instance.exports[name];
  if (!(value instanceof WebAssembly.Global)) throw new Error(`${name} is not an exported global`);
  return value;
}

function func(instance: WebAssembly.Instance, name: string): (...args: number[]) => unknown {
  const value = instance.exports[name];
  if (typeof value !== "function") throw new Error(`${name} is not an exported function`);
  return (...args: number[]) => Reflect.apply(value, undefined, args);
}

describe("LEB128", () => {
  it("encodes unsigned values", () => {
    expect(encodeU32(0)).toEqual([0x00]);
    expect(encodeU32(127)).toEqual([0x7f]);
    expect(encodeU32(128)).toEqual([0x80, 0x01]);
    expect(encodeU32(624485)).toEqual([0xe5, 0x8e, 0x26]);
  });

  it("encodes signed values", () => {
    expect(encodeS64(0)).toEqual([0x00]);
    expect(encodeS64(-1)).toEqual([0x7f]);
    expect(encodeS64(63)).toEqual([0x3f]);
    expect(encodeS64(64)).toEqual([0xc0, 0x00]);
    expect(encodeS64(-123456)).toEqual([0xc0, 0xbb, 0x78]);
  });

  it("reads back what it writes", () => {
    const reader = new ByteReader(new Uint8Array([...encodeU32(624485), ...encodeU32(0xffffffff)]));
    expect(reader.u32()).toBe(624485);
    expect(reader.u32()).toBe(0xffffffff);
    expect(reader.eof).toBe(true);
  });

  it("rejects over-long encodings", () => {
    const reader = new ByteReader(new Uint8Array([0x80, 0x80, 0x80, 0x80, 0x80, 0x01]));
    expect(() => reader.u32()).toThrow(WasmFormatError);
  });
});

describe("parseModule", () => {
  it("reads imports, exports and memory limits", () => {
    const layout = parseModule(hashCapsule());
    expect(layout.imports).toEqual([{ namespace: "env", name: "hash_commit", kind: "func", typeIndex: 0 }]);
    expect(layout.exports.map((e) => [e.name, e.kind])).toEqual([
      ["memory", "memory"],
      ["run", "func"],
    ]);
    expect(layout.memories).toEqual([{ min: 1 }]);
    expect(layout.functions).toHaveLength(1);
  });

  it("resolves signatures across imported and defined functions", () => {
    const layout = parseModule(hashCapsule());
    expect(functionType(layout, 0)).toEqual({ params: ["i32", "i32", "i32"], results: ["i32"] });
    expect(functionType(layout, 1)).toEqual({ params: ["i32", "i32"], results: ["i32"] });
    expect(functionType(layout, 2)).toBeUndefined();
  });

  it("records the start function", () => {
    expect(parseModule(startCapsule()).startFunction).toBe(0);
    expect(parseModule(helloCapsule()).startFunction).toBeNull();
  });

  it("rejects data without the magic number", () => {
    expect(() => parseModule(new Uint8Array([1, 2, 3, 4, 5, 6, 7, 8]))).toThrow(/magic/);
  });
});

describe("readInstruction", () => {
  it("decodes immediates", () => {
    const bytes = new Uint8Array([...op.i32Const(-123456), ...op.call(300), ...op.memoryGrow]);
    const reader = new ByteReader(bytes);
    expect(readInstruction(reader)).toMatchObject({ opcode: 0x41, kind: "plain", start: 0, end: 4 });
    expect(readInstruction(reader)).toMatchObject({ opcode: 0x10, start: 4, end: 7 });
    expect(readInstruction(reader)).toMatchObject({ kind: "memory.grow", memory: 0 });
    expect(reader.eof).toBe(true);
  });

  it("rejects SIMD", () => {
    expect(() => readInstruction(new ByteReader(new Uint8Array(op.simdPrefix)))).toThrow(/SIMD/);
  });
});

describe("planBody", () => {
  it("charges the function entry and each loop separately", () => {
    const bytes = helloCapsule();
    const layout = parseModule(bytes);
    const body = layout.bodies[0];
    if (!body) throw new Error("missing body");
    const plan = planBody(bytes, body);
    expect(plan.charges.map((c) => c.cost)).toEqual([11, 18]);
    expect(plan.instructionCount).toBe(29);
    expect(plan.grows).toEqual([]);
  });

  it("finds memory.grow sites", () => {
    const bytes = growCapsule(2);
    const [plan] = planModule(bytes, parseModule(bytes));
    expect(plan?.grows).toHaveLength(1);
  });
});

describe("instrumentModule", () => {
  it("produces a valid module that exports the metering globals", () => {
    const bytes = helloCapsule();
    const instrumented = instrumentModule(bytes, parseModule(bytes));
    expect(WebAssembly.validate(new Uint8Array(instrumented))).toBe(true);
    const names = parseModule(instrumented).exports.map((e) => e.name);
    expect(names).toEqual([
      "memory",
      "run",
      METERING_EXPORTS.FUEL,
      METERING_EXPORTS.MEMORY_LIMIT,
      METERING_EXPORTS.OOM,
      METERING_EXPORTS.CHECKPOINT,
      METERING_EXPORTS.CHECKPOINT_TABLE,
    ]);
  });

  it("charges exactly the executed regions", () => {
    const instance = instantiate(helloCapsule());
    const fuel = global(instance, METERING_EXPORTS.FUEL);
    fuel.value = 1_000n;
    const memory = instance.exports.memory;
    if (!(memory instanceof WebAssembly.Memory)) throw new Error("no memory");
    const input = new TextEncoder().encode('{"name":"Alice"}');
    new Uint8Array(memory.buffer).set(input, 1024);

    const result = func(instance, "run")(1024, input.length);

    expect(1_000n - BigInt(fuel.value)).toBe(BigInt(helloFuel(input.length)));
    expect(result).toBe(((input.length + 6) << 16) | 4096);
    expect(new TextDecoder().decode(new Uint8Array(memory.buffer, 4096, input.length + 6))).toBe('Hello {"name":"Alice"}');
  });

  it("traps once fuel runs out", () => {
    const instance = instantiate(spinCapsule());
    const fuel = global(instance, METERING_EXPORTS.FUEL);
    fuel.value = 500n;
    expect(() => func(instance, "run")(0, 0)).toThrow(WebAssembly.RuntimeError);
    expect(BigInt(fuel.value) < 0n).toBe(true);
  });

  it("stops memory.grow at the page ceiling and raises the flag", () => {
    const instance = instantiate(growCapsule(8));
    global(instance, METERING_EXPORTS.FUEL).value = 1_000n;
    global(instance, METERING_EXPORTS.MEMORY_LIMIT).value = 4;
    expect(() => func(instance, "run")(0, 0)).toThrow(WebAssembly.RuntimeError);
    expect(global(instance, METERING_EXPORTS.OOM).value).toBe(1);
  });

  it("lets growth within the ceiling through", () => {
    const instance = instantiate(growCapsule(2));
    global(instance, METERING_EXPORTS.FUEL).value = 1_000n;
    global(instance, METERING_EXPORTS.MEMORY_LIMIT).value = 4;
    func(instance, "run")(0, 0);
    const memory = instance.exports.memory;
    if (!(memory instanceof WebAssembly.Memory)) throw new Error("no memory");
    expect(memory.buffer.byteLength).toBe(3 * 65536);
    expect(global(instance, METERING_EXPORTS.OOM).value).toBe(0);
  });

  it("keeps the module's own global indices", () => {
    const instance = instantiate(globalCounterCapsule());
    global(instance, METERING_EXPORTS.FUEL).value = 100n;
    func(instance, "run")(0, 0);
    const memory = instance.exports.memory;
    if (!(memory instanceof WebAssembly.Memory)) throw new Error("no memory");
    expect(new Uint8Array(memory.buffer)[8192]).toBe(7);
  });

  it("defers the start function to an export", () => {
    const instance = instantiate(startCapsule());
    const memory = instance.exports.memory;
    if (!(memory instanceof WebAssembly.Memory)) throw new Error("no memory");
    expect(new Uint8Array(memory.buffer)[8192]).toBe(0);
    global(instance, METERING_EXPORTS.FUEL).value = 100n;
    func(instance, METERING_EXPORTS.START)();
    expect(new Uint8Array(memory.buffer)[8192]).toBe(0x21);
  });

  it("adds a global section when the module has none", () => {
    const b = new WasmBuilder().addMemory(1).exportMemory();
    const run = b.addFunction(["i32", "i32"], ["i32"], [...op.i32Const(0)]);
    const bytes = b.exportFunction("run", run).build();
    const instrumented = instrumentModule(bytes, parseModule(bytes));
    expect(parseModule(instrumented).globalCount).toBe(5);
  });
});

describe("checkpoints", () => {
  function armed(bytes: Uint8Array, fuel: bigint) {
    const instance = instantiate(bytes);
    const reports: Array<[bigint, number]> = [];
    const checkpoint = (remaining: bigint, pages: number): void => {
      reports.push([remaining, pages]);
    };
    const bridge = new WebAssembly.Instance(new WebAssembly.Module(new Uint8Array(checkpointBridge())), {
      env: { checkpoint },
    });
    const table = instance.exports[METERING_EXPORTS.CHECKPOINT_TABLE];
    if (!(table instanceof WebAssembly.Table)) throw new Error("no checkpoint table");
    table.set(0, bridge.exports.checkpoint);
    global(instance, METERING_EXPORTS.FUEL).value = fuel;
    global(instance, METERING_EXPORTS.CHECKPOINT).value = fuel;
    global(instance, METERING_EXPORTS.MEMORY_LIMIT).value = 16;
    return { instance, reports };
  }

  it("compiles the bridge module", () => {
    expect(WebAssembly.validate(new Uint8Array(checkpointBridge()))).toBe(true);
  });

  it("reports remaining fuel and pages at most once per interval", () => {
    const { instance, reports } = armed(helloCapsule(), 100_000n);
    func(instance, "run")(1024, 3);
    // one report at the entry charge, then the loop stays within the interval
    expect(reports).toEqual([[100_000n - 11n, 1]]);
    expect(global(instance, METERING_EXPORTS.CHECKPOINT).value).toBe(100_000n - 11n - BigInt(CHECKPOINT_INTERVAL));
  });

  it("keeps reporting while a guest spins", () => {
    const { instance, reports } = armed(spinCapsule(), 50_000n);
    expect(() => func(instance, "run")(0, 0)).toThrow(WebAssembly.RuntimeError);
    expect(reports.length).toBeGreaterThanOrEqual(4);
    const last = reports[reports.length - 1];
    expect(last?.[0]).toBeLessThan(50_000n - 3n * BigInt(CHECKPOINT_INTERVAL));
  });

  it("reports the grown size at the next charge", () => {
    const { instance, reports } = armed(growThenSpinCapsule(2), 100_000n);
    expect(() => func(instance, "run")(0, 0)).toThrow(WebAssembly.RuntimeError);
    const pages = reports.map(([, size]) => size);
    expect(pages.slice(0, 2)).toEqual([1, 3]);
    expect(new Set(pages.slice(1))).toEqual(new Set([3]));
  });

  it("stays silent while disarmed", () => {
    const instance = instantiate(spinCapsule());
    global(instance, METERING_EXPORTS.FUEL).value = 50_000n;
    expect(() => func(instance, "run")(0, 0)).toThrow(WebAssembly.RuntimeError);
    // the empty table slot is never called, so only the fuel check traps
    expect(BigInt(global(instance, METERING_EXPORTS.FUEL).value) < 0n).toBe(true);
  });
});

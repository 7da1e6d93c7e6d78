import { createHash } from "node:crypto";
import { describe, expect, it } from "vitest";
import { HOST_STATUS, SecurityError, type HostEnvironment } from "@sealbox/shared";
import { allowList, allowsImport, grantedFunctions } from "../src/policy/capabilities.js";
import { DeterministicStream, HostFunctionError, createHostFunctions } from "../src/policy/host-functions.js";
import { JsonPathError, parseJsonPath, selectJsonPath } from "../src/policy/json-path.js";
import { CapabilitySandbox } from "../src/policy/sandbox.js";

const env: HostEnvironment = { timeMs: 1_700_000_000_000, seed: new TextEncoder().encode("test-seed") };
const text = (value: string) => new TextEncoder().encode(value);
const decode = (bytes: Uint8Array | undefined) => new TextDecoder().decode(bytes);

describe("capabilities", () => {
  it("maps each capability to its host functions", () => {
    expect(grantedFunctions(["Base64"])).toEqual(["base64_encode", "base64_decode"]);
    expect(grantedFunctions(["Random", "Hash"])).toEqual(["hash_commit", "random_bytes"]);
    expect(grantedFunctions([])).toEqual([]);
  });

  it("builds the env:: allow-list", () => {
    expect(allowList(["Hash", "Time"])).toEqual(["env::hash_commit", "env::time_now_ms"]);
  });

  it("only allows granted functions in the env namespace", () => {
    expect(allowsImport(["Hash"], "env", "hash_commit")).toBe(true);
    expect(allowsImport(["Hash"], "env", "json_path")).toBe(false);
    expect(allowsImport(["Hash"], "wasi_snapshot_preview1", "hash_commit")).toBe(false);
    expect(allowsImport(["Hash"], "env", "fd_write")).toBe(false);
  });
});

describe("CapabilitySandbox", () => {
  it("binds granted imports and logs each call in order", () => {
    const sandbox = new CapabilitySandbox(["Hash", "Time"]);
    const bound = sandbox.bind(
      [
        { namespace: "env", name: "time_now_ms" },
        { namespace: "env", name: "hash_commit" },
      ],
      env
    );
    expect(bound.names).toEqual(["time_now_ms", "hash_commit"]);

    bound.invoke("hash_commit", { args: [0, 3, 64], reads: [text("abc")] });
    bound.invoke("time_now_ms", { args: [], reads: [] });

    expect(bound.accessLog).toEqual([
      { seq: 1, capability: "Hash", function: "hash_commit" },
      { seq: 2, capability: "Time", function: "time_now_ms" },
    ]);
    expect(bound.callCount).toBe(2);
  });

  it("refuses imports outside the capability set", () => {
    const sandbox = new CapabilitySandbox(["Json"]);
    expect(() => sandbox.bind([{ namespace: "env", name: "random_bytes" }], env)).toThrow(SecurityError);
    try {
      sandbox.bind([{ namespace: "env", name: "random_bytes" }], env);
    } catch (error) {
      expect(error).toMatchObject({ code: "CapabilityDenied", namespace: "env", importName: "random_bytes" });
    }
  });

  it("refuses to invoke a function that was not bound", () => {
    const bound = new CapabilitySandbox(["Hash", "Random"]).bind([{ namespace: "env", name: "hash_commit" }], env);
    expect(() => bound.invoke("random_bytes", { args: [0, 4], reads: [] })).toThrow(SecurityError);
    expect(bound.accessLog).toEqual([]);
  });

  it("deduplicates capabilities", () => {
    expect(new CapabilitySandbox(["Hash", "Hash", "Json"]).capabilities).toEqual(["Hash", "Json"]);
  });
});

describe("host functions", () => {
  const fns = createHostFunctions(env);

  it("hash_commit returns the SHA-256 digest", () => {
    const result = fns.hash_commit({ args: [0, 3, 100], reads: [text("abc")] });
    expect(result.value).toBe(32);
    expect(Buffer.from(result.output ?? []).toString("hex")).toBe(
      createHash("sha256").update("abc").digest("hex")
    );
  });

  it("json_path selects a value as JSON text", () => {
    const doc = text('{"user":{"name":"Alice","tags":["a","b"]}}');
    const call = (path: string, cap = 64) => fns.json_path({ args: [0, 0, 0, 0, 0, cap], reads: [doc, text(path)] });

    expect(decode(call("$.user.name").output)).toBe('"Alice"');
    expect(call("$.user.name").value).toBe(7);
    expect(decode(call("$.user.tags[1]").output)).toBe('"b"');
    expect(decode(call("$['user']['tags']").output)).toBe('["a","b"]');
    expect(call("$.user.missing")).toEqual({ value: HOST_STATUS.NOT_FOUND });
    expect(call("$.user.name", 3)).toEqual({ value: HOST_STATUS.OUTPUT_TOO_SMALL });
  });

  it("json_path fails on invalid JSON or path syntax", () => {
    expect(() => fns.json_path({ args: [0, 0, 0, 0, 0, 64], reads: [text("{oops"), text("$")] })).toThrow(
      HostFunctionError
    );
    expect(() => fns.json_path({ args: [0, 0, 0, 0, 0, 64], reads: [text("{}"), text("name")] })).toThrow(
      /must start with \$/
    );
  });

  it("base64 round trips and reports small buffers", () => {
    const encoded = fns.base64_encode({ args: [0, 0, 0, 64], reads: [text("hello")] });
    expect(decode(encoded.output)).toBe("aGVsbG8=");
    expect(encoded.value).toBe(8);
    expect(fns.base64_encode({ args: [0, 0, 0, 4], reads: [text("hello")] }).value).toBe(HOST_STATUS.OUTPUT_TOO_SMALL);

    const decoded = fns.base64_decode({ args: [0, 0, 0, 64], reads: [text("aGVsbG8=")] });
    expect(decode(decoded.output)).toBe("hello");
    expect(() => fns.base64_decode({ args: [0, 0, 0, 64], reads: [text("not base64!")] })).toThrow(HostFunctionError);
  });

  it("time_now_ms returns the injected time", () => {
    expect(fns.time_now_ms({ args: [], reads: [] })).toEqual({ value: 1_700_000_000_000n });
  });

  it("random_bytes is a deterministic SHA-256 stream", () => {
    const first = createHostFunctions(env).random_bytes({ args: [0, 40], reads: [] });
    const second = createHostFunctions(env).random_bytes({ args: [0, 40], reads: [] });
    expect(first.value).toBe(40);
    expect(first.output).toEqual(second.output);

    const block0 = createHash("sha256").update(env.seed).update(Buffer.from([0, 0, 0, 0])).digest();
    const block1 = createHash("sha256").update(env.seed).update(Buffer.from([0, 0, 0, 1])).digest();
    expect(Buffer.from(first.output ?? []).toString("hex")).toBe(
      Buffer.concat([block0, block1.subarray(0, 8)]).toString("hex")
    );
  });

  it("random_bytes refuses oversized requests", () => {
    expect(() => fns.random_bytes({ args: [0, 70_000], reads: [] })).toThrow(/limit is 65536/);
  });
});

describe("DeterministicStream", () => {
  it("continues where the previous read stopped", () => {
    const seed = text("s");
    const whole = new DeterministicStream(seed).next(48);
    const split = new DeterministicStream(seed);
    const joined = Buffer.concat([split.next(10), split.next(38)]);
    expect(Buffer.from(whole).equals(joined)).toBe(true);
  });
});

describe("json path", () => {
  it("parses every segment form", () => {
    expect(parseJsonPath(`$.a["b c"][2]['d']`)).toEqual([
      { type: "key", key: "a" },
      { type: "key", key: "b c" },
      { type: "index", index: 2 },
      { type: "key", key: "d" },
    ]);
    expect(parseJsonPath("$")).toEqual([]);
  });

  it("rejects malformed paths", () => {
    expect(() => parseJsonPath("$.")).toThrow(JsonPathError);
    expect(() => parseJsonPath("$[x]")).toThrow(JsonPathError);
    expect(() => parseJsonPath("$['open")).toThrow(JsonPathError);
  });

  it("does not index objects by position or arrays by key", () => {
    expect(selectJsonPath({ 0: "zero" }, "$[0]")).toBeUndefined();
    expect(selectJsonPath(["x"], "$.length")).toBeUndefined();
    expect(selectJsonPath({ a: null }, "$.a")).toBeNull();
  });
});

/**
 * Low-level WebAssembly binary encoding helpers (LEB128, names, sections)
 */

export class WasmFormatError extends Error {
  constructor(
    message: string,
    readonly offset: number
  ) {
    super(`${message} (at byte ${offset})`);
    this.name = "WasmFormatError";
  }
}

const utf8 = new TextDecoder("utf-8", { fatal: true });

/**
 * Forward-only cursor over a byte range
 */
export class ByteReader {
  position: number;

  constructor(
    readonly bytes: Uint8Array,
    start = 0,
    readonly end = bytes.length
  ) {
    this.position = start;
  }

  get eof(): boolean {
    return this.position >= this.end;
  }

  fail(message: string): never {
    throw new WasmFormatError(message, this.position);
  }

  u8(): number {
    if (this.position >= this.end) this.fail("unexpected end of data");
    const byte = this.bytes[this.position];
    this.position++;
    return byte ?? this.fail("unexpected end of data");
  }

  peek(): number {
    const byte = this.bytes[this.position];
    if (byte === undefined || this.position >= this.end) this.fail("unexpected end of data");
    return byte;
  }

  /** Unsigned LEB128, at most 32 bits */
  u32(): number {
    let result = 0;
    let shift = 0;
    for (let i = 0; i < 5; i++) {
      const byte = this.u8();
      result += (byte & 0x7f) * 2 ** shift;
      if ((byte & 0x80) === 0) {
        if (result > 0xffffffff) this.fail("u32 out of range");
        return result;
      }
      shift += 7;
    }
    this.fail("u32 LEB128 too long");
  }

  /** Signed LEB128 of `bits` width; only the encoding is checked, value is discarded */
  skipSigned(bits: 32 | 33 | 64): void {
    const maxBytes = Math.ceil(bits / 7);
    for (let i = 0; i < maxBytes; i++) {
      if ((this.u8() & 0x80) === 0) return;
    }
    this.fail(`s${bits} LEB128 too long`);
  }

  take(length: number): Uint8Array {
    if (this.position + length > this.end) this.fail("length runs past end of data");
    const slice = this.bytes.subarray(this.position, this.position + length);
    this.position += length;
    return slice;
  }

  skip(length: number): void {
    this.take(length);
  }

  name(): string {
    const length = this.u32();
    const start = this.position;
    const raw = this.take(length);
    try {
      return utf8.decode(raw);
    } catch {
      throw new WasmFormatError("name is not valid UTF-8", start);
    }
  }
}

export function encodeU32(value: number): number[] {
  const out: number[] = [];
  let remaining = value >>> 0;
  do {
    let byte = remaining & 0x7f;
    remaining >>>= 7;
    if (remaining !== 0) byte |= 0x80;
    out.push(byte);
  } while (remaining !== 0);
  return out;
}

export function encodeS64(value: bigint | number): number[] {
  const out: number[] = [];
  let remaining = BigInt(value);
  for (;;) {
    const byte = Number(remaining & 0x7fn);
    remaining >>= 7n;
    const signBit = (byte & 0x40) !== 0;
    if ((remaining === 0n && !signBit) || (remaining === -1n && signBit)) {
      out.push(byte);
      return out;
    }
    out.push(byte | 0x80);
  }
}

export function encodeS32(value: number): number[] {
  return encodeS64(value | 0);
}

export function encodeName(name: string): number[] {
  const bytes = new TextEncoder().encode(name);
  return [...encodeU32(bytes.length), ...bytes];
}

export function encodeSection(id: number, payload: ArrayLike<number>): number[] {
  return [id, ...encodeU32(payload.length), ...Array.from(payload)];
}

/**
 * Vector of already-encoded entries, prefixed with the entry count
 */
export function encodeVector(entries: number[][]): number[] {
  return [...encodeU32(entries.length), ...entries.flat()];
}

export function concatBytes(parts: ArrayLike<number>[]): Uint8Array {
  const total = parts.reduce((sum, part) => sum + part.length, 0);
  const out = new Uint8Array(total);
  let offset = 0;
  for (const part of parts) {
    out.set(part, offset);
    offset += part.length;
  }
  return out;
}

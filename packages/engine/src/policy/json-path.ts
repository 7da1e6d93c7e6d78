/**
 * Minimal JSON path selector: `$`, `.key`, `['key']`, `["key"]`, `[index]`
 */

export type PathSegment = { type: "key"; key: string } | { type: "index"; index: number };

export class JsonPathError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "JsonPathError";
  }
}

const KEY_CHAR = /[A-Za-z0-9_$-]/;

export function parseJsonPath(path: string): PathSegment[] {
  if (!path.startsWith("$")) throw new JsonPathError(`Path must start with $: ${path}`);
  const segments: PathSegment[] = [];
  let i = 1;

  while (i < path.length) {
    const char = path[i];
    if (char === ".") {
      let end = i + 1;
      while (end < path.length && KEY_CHAR.test(path[end] ?? "")) end++;
      if (end === i + 1) throw new JsonPathError(`Empty key at position ${i}`);
      segments.push({ type: "key", key: path.slice(i + 1, end) });
      i = end;
    } else if (char === "[") {
      const quote = path[i + 1];
      if (quote === "'" || quote === '"') {
        const close = path.indexOf(quote, i + 2);
        if (close === -1 || path[close + 1] !== "]") {
          throw new JsonPathError(`Unterminated key at position ${i}`);
        }
        segments.push({ type: "key", key: path.slice(i + 2, close) });
        i = close + 2;
      } else {
        const close = path.indexOf("]", i);
        const digits = close === -1 ? "" : path.slice(i + 1, close);
        if (!/^\d+$/.test(digits)) throw new JsonPathError(`Invalid index at position ${i}`);
        segments.push({ type: "index", index: Number(digits) });
        i = close + 1;
      }
    } else {
      throw new JsonPathError(`Unexpected character '${char}' at position ${i}`);
    }
  }
  return segments;
}

/**
 * Select a value; `undefined` when the path matches nothing
 */
export function selectJsonPath(document: unknown, path: string): unknown {
  let current: unknown = document;
  for (const segment of parseJsonPath(path)) {
    if (segment.type === "index") {
      if (!Array.isArray(current) || segment.index >= current.length) return undefined;
      current = current[segment.index];
    } else {
      if (current === null || typeof current !== "object" || Array.isArray(current)) return undefined;
      if (!Object.hasOwn(current, segment.key)) return undefined;
      current = Reflect.get(current, segment.key);
    }
  }
  return current;
}

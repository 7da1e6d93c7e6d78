/**
 * Compiled module cache, keyed by the capsule's content digest.
 *
 * Bounded LRU: a Map keeps insertion order, and every hit re-inserts the
 * entry, so the first key is always the least recently used.
 */

import type { ModuleLayout } from "../wasm/module.js";
import { MODULE_CACHE } from "@sealbox/shared";

export interface CompiledCapsule {
  id: string;
  /** Instrumented module, ready to instantiate */
  module: WebAssembly.Module;
  layout: ModuleLayout;
  /** Declared initial memory, in pages */
  initialPages: number;
}

export interface ModuleCacheStats {
  entries: number;
  hits: number;
  misses: number;
  evictions: number;
}

export class ModuleCache {
  private entries = new Map<string, CompiledCapsule>(); // digest → compiled module
  private pending = new Map<string, Promise<CompiledCapsule>>();
  private hits = 0;
  private misses = 0;
  private evictions = 0;

  constructor(readonly maxEntries: number = MODULE_CACHE.MAX_ENTRIES) {
    if (!Number.isInteger(maxEntries) || maxEntries < 1) {
      throw new RangeError(`Module cache needs at least one entry, got ${maxEntries}`);
    }
  }

  get size(): number {
    return this.entries.size;
  }

  has(id: string): boolean {
    return this.entries.has(id);
  }

  get(id: string): CompiledCapsule | undefined {
    const entry = this.entries.get(id);
    if (entry) {
      this.entries.delete(id);
      this.entries.set(id, entry);
    }
    return entry;
  }

  /**
   * Return the cached module or compile it once, even under concurrent callers
   */
  async getOrCompile(id: string, compile: () => Promise<CompiledCapsule>): Promise<CompiledCapsule> {
    const cached = this.get(id);
    if (cached) {
      this.hits++;
      return cached;
    }
    const inFlight = this.pending.get(id);
    if (inFlight) {
      this.hits++;
      return inFlight;
    }

    this.misses++;
    const compiling = compile()
      .then((entry) => {
        this.insert(id, entry);
        return entry;
      })
      .finally(() => {
        this.pending.delete(id);
      });
    this.pending.set(id, compiling);
    return compiling;
  }

  clear(): void {
    this.entries.clear();
  }

  stats(): ModuleCacheStats {
    return { entries: this.entries.size, hits: this.hits, misses: this.misses, evictions: this.evictions };
  }

  private insert(id: string, entry: CompiledCapsule): void {
    this.entries.delete(id);
    this.entries.set(id, entry);
    while (this.entries.size > this.maxEntries) {
      // Remove oldest entry (first key in Map)
      const oldest = this.entries.keys().next();
      if (oldest.done) break;
      this.entries.delete(oldest.value);
      this.evictions++;
    }
  }
}

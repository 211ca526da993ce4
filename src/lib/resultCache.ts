// src/lib/resultCache.ts
import crypto from "crypto";
import type { AnalysisOptions, MarkSheet } from "../types/results";

export const DEFAULT_CACHE_CAPACITY = 32;

/** Bounded memo of derived results; least recently used entries go first. */
export class ResultCache<T> {
  private readonly entries = new Map<string, { value: T }>();
  private hits = 0;
  private misses = 0;

  constructor(private readonly capacity: number = DEFAULT_CACHE_CAPACITY) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new Error(`Cache capacity must be a positive integer, got ${capacity}`);
    }
  }

  get size(): number {
    return this.entries.size;
  }

  has(key: string): boolean {
    return this.entries.has(key);
  }

  getOrCompute(key: string, compute: () => T): T {
    const cached = this.entries.get(key);
    if (cached) {
      // re-insert to mark as most recently used
      this.entries.delete(key);
      this.entries.set(key, cached);
      this.hits++;
      return cached.value;
    }

    this.misses++;
    const value = compute();
    this.entries.set(key, { value });
    while (this.entries.size > this.capacity) {
      const oldest = this.entries.keys().next();
      if (oldest.done) break;
      this.entries.delete(oldest.value);
    }
    return value;
  }

  clear(): void {
    this.entries.clear();
  }

  stats() {
    return { size: this.entries.size, capacity: this.capacity, hits: this.hits, misses: this.misses };
  }
}

/** JSON with object keys sorted at every level. */
export function stableStringify(value: unknown): string {
  if (Array.isArray(value)) return `[${value.map(stableStringify).join(",")}]`;
  if (value !== null && typeof value === "object") {
    const entries = Object.entries(value)
      .filter(([, v]) => v !== undefined)
      .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
      .map(([k, v]) => `${JSON.stringify(k)}:${stableStringify(v)}`);
    return `{${entries.join(",")}}`;
  }
  return JSON.stringify(value ?? null);
}

export function hashMarkSheet(sheet: MarkSheet): string {
  return crypto
    .createHash("sha256")
    .update(JSON.stringify(sheet.columns))
    .update(JSON.stringify(sheet.rows.map((row) => sheet.columns.map((c) => row[c] ?? null))))
    .digest("hex");
}

/**
 * Mapping and credit keys are serialised sorted; the engine reads them in the
 * same sorted order, so configs that differ only in key order share a result.
 */
export function buildResultCacheKey(contentHash: string, options: AnalysisOptions): string {
  return [
    contentHash,
    // range order decides which range matches first, so keep it as given
    JSON.stringify(Object.entries(options.sections?.ranges ?? {})),
    stableStringify(options.sections?.mapping ?? {}),
    stableStringify(options.credits ?? null),
    options.mode ?? "",
    options.metric ?? "",
    stableStringify(options.subjects ?? []),
  ].join("|");
}

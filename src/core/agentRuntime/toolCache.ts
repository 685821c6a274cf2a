export interface ToolCacheEntry {
  key: string;
  name: string;
  result: unknown;
  createdAt: number;
}

function stableStringify(value: unknown): string {
  if (value === null || typeof value !== 'object') {
    return JSON.stringify(value) ?? 'null';
  }

  if (Array.isArray(value)) {
    return `[${value.map((item) => stableStringify(item)).join(',')}]`;
  }

  const parts = Object.entries(value)
    .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
    .map(([key, item]) => `${JSON.stringify(key)}:${stableStringify(item)}`);
  return `{${parts.join(',')}}`;
}

/** Cache key independent of argument key order. */
export function buildToolCacheKey(name: string, args: unknown): string {
  return `${name}::${stableStringify(args)}`;
}

/** Per-worker memo of successful tool results, evicting the oldest entry past capacity. */
export class ToolResultCache {
  private readonly maxEntries: number;
  private readonly entries = new Map<string, ToolCacheEntry>();
  private hitCount = 0;

  constructor(maxEntries = 50) {
    this.maxEntries = Math.max(1, Math.floor(maxEntries));
  }

  get hits(): number {
    return this.hitCount;
  }

  get size(): number {
    return this.entries.size;
  }

  get(name: string, args: unknown): ToolCacheEntry | null {
    const entry = this.entries.get(buildToolCacheKey(name, args)) ?? null;
    if (entry) this.hitCount += 1;
    return entry;
  }

  set(name: string, args: unknown, result: unknown): ToolCacheEntry {
    const key = buildToolCacheKey(name, args);
    const entry: ToolCacheEntry = { key, name, result, createdAt: Date.now() };

    this.entries.set(key, entry);

    if (this.entries.size > this.maxEntries) {
      const oldestKey = this.entries.keys().next().value;
      if (oldestKey !== undefined) {
        this.entries.delete(oldestKey);
      }
    }

    return entry;
  }
}

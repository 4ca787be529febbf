import { LRUCache } from "lru-cache";

export type CompletionCacheOptions = {
  ttlMs?: number;
  maxEntries?: number;
  /** Characters of the partial token that take part in the cache key. */
  partialKeyLength?: number;
};

export const DEFAULT_COMPLETION_TTL_MS = 2000;
export const DEFAULT_COMPLETION_MAX_ENTRIES = 1000;
export const DEFAULT_PARTIAL_KEY_LENGTH = 10;

/**
 * Bounded TTL cache of argument suggestion lists. Cached lists are frozen.
 * A ttl of zero or less turns caching off.
 */
export class CompletionCache {
  private readonly cache: LRUCache<string, readonly string[]>;
  private readonly partialKeyLength: number;
  private readonly enabled: boolean;

  constructor(options: CompletionCacheOptions = {}) {
    const ttlMs = options.ttlMs ?? DEFAULT_COMPLETION_TTL_MS;
    this.enabled = ttlMs > 0;
    this.partialKeyLength = options.partialKeyLength ?? DEFAULT_PARTIAL_KEY_LENGTH;
    this.cache = new LRUCache<string, readonly string[]>({
      max: options.maxEntries ?? DEFAULT_COMPLETION_MAX_ENTRIES,
      ttl: this.enabled ? ttlMs : 0,
    });
  }

  truncate(partial: string): string {
    return partial.slice(0, this.partialKeyLength).toLowerCase();
  }

  key(nodeId: number, position: number, typeName: string, partial: string): string {
    return `${nodeId}:${position}:${typeName}:${this.truncate(partial)}`;
  }

  get(key: string): readonly string[] | undefined {
    return this.cache.get(key);
  }

  set(key: string, values: readonly string[]): readonly string[] {
    const frozen = Object.freeze([...values]);
    if (this.enabled) {
      this.cache.set(key, frozen);
    }
    return frozen;
  }

  /**
   * Cached suggestions for one argument position. `compute` receives the truncated
   * partial, so its result must still be filtered by the caller.
   */
  getOrCompute(
    nodeId: number,
    position: number,
    typeName: string,
    partial: string,
    compute: (truncatedPartial: string) => readonly string[],
  ): readonly string[] {
    const key = this.key(nodeId, position, typeName, partial);
    const cached = this.cache.get(key);
    if (cached) {
      return cached;
    }
    return this.set(key, compute(this.truncate(partial)));
  }

  invalidate(): void {
    this.cache.clear();
  }

  get size(): number {
    return this.cache.size;
  }
}

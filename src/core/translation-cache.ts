export interface TranslationCacheOptions {
  /** Maximum number of entries; 0 keeps every entry. */
  maxEntries?: number;
}

export interface CacheStats {
  size: number;
  maxEntries: number;
  hits: number;
  misses: number;
  evictions: number;
}

/**
 * In-memory memo of completed translations keyed by
 * (normalized text, engine, target language).
 *
 * Map insertion order doubles as recency order: reads move an entry to the
 * back, and eviction removes from the front.
 */
export class TranslationCache {
  private entries: Map<string, string> = new Map();
  private maxEntries: number;
  private hits = 0;
  private misses = 0;
  private evictions = 0;

  constructor(options: TranslationCacheOptions = {}) {
    this.maxEntries = Math.max(0, options.maxEntries ?? 1000);
  }

  static normalize(text: string): string {
    return text.trim().replace(/\s+/g, ' ');
  }

  private getCacheKey(text: string, engine: string, target: string): string {
    return `${engine}::${target}::${TranslationCache.normalize(text)}`;
  }

  get(text: string, engine: string, target: string): string | undefined {
    const key = this.getCacheKey(text, engine, target);
    const value = this.entries.get(key);

    if (value === undefined) {
      this.misses++;
      return undefined;
    }

    this.hits++;
    this.entries.delete(key);
    this.entries.set(key, value);
    return value;
  }

  set(text: string, engine: string, target: string, translated: string): void {
    const key = this.getCacheKey(text, engine, target);
    this.entries.delete(key);
    this.entries.set(key, translated);
    this.evictOverflow();
  }

  has(text: string, engine: string, target: string): boolean {
    return this.entries.has(this.getCacheKey(text, engine, target));
  }

  delete(text: string, engine: string, target: string): boolean {
    return this.entries.delete(this.getCacheKey(text, engine, target));
  }

  get size(): number {
    return this.entries.size;
  }

  /**
   * Change the bound; shrinking evicts the least recently used entries.
   */
  resize(maxEntries: number): void {
    this.maxEntries = Math.max(0, maxEntries);
    this.evictOverflow();
  }

  clear(): void {
    this.entries.clear();
  }

  getStats(): CacheStats {
    return {
      size: this.entries.size,
      maxEntries: this.maxEntries,
      hits: this.hits,
      misses: this.misses,
      evictions: this.evictions,
    };
  }

  private evictOverflow(): void {
    if (this.maxEntries === 0) {
      return;
    }

    while (this.entries.size > this.maxEntries) {
      const oldest = this.entries.keys().next();
      if (oldest.done) {
        return;
      }
      this.entries.delete(oldest.value);
      this.evictions++;
    }
  }
}

export default TranslationCache;

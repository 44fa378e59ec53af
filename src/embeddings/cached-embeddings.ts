import type { EmbeddingProvider } from './embedding.js';
import { LruCache } from './lru.js';

export interface CachedEmbeddingOptions {
  maxEntries?: number;
  ttlMs?: number;
}

/**
 * Memoises vectors by exact text.
 */
export class CachedEmbeddingProvider implements EmbeddingProvider {
  readonly id: string;
  private readonly cache: LruCache<string, number[]>;

  constructor(private readonly inner: EmbeddingProvider, opts: CachedEmbeddingOptions = {}) {
    this.id = inner.id;
    this.cache = new LruCache({ maxEntries: opts.maxEntries ?? 256, ttlMs: opts.ttlMs });
  }

  async embed(texts: string[]): Promise<number[][]> {
    const missing = [...new Set(texts.filter((t) => this.cache.get(t) === undefined))];
    if (missing.length > 0) {
      const vectors = await this.inner.embed(missing);
      missing.forEach((t, i) => {
        const v = vectors[i];
        if (v) this.cache.set(t, v);
      });
    }
    // A vector evicted between the two passes is re-embedded individually.
    const out: number[][] = [];
    for (const t of texts) {
      const hit = this.cache.get(t);
      out.push(hit ?? (await this.inner.embed([t]))[0] ?? []);
    }
    return out;
  }

  get cachedCount(): number {
    return this.cache.size;
  }
}

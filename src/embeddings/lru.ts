export interface LruOptions {
  maxEntries: number;
  ttlMs?: number;
}

type Entry<V> = { value: V; expiresAt: number | null };

export class LruCache<K, V> {
  private readonly map = new Map<K, Entry<V>>();
  private readonly maxEntries: number;
  private readonly ttlMs?: number;

  constructor(opts: LruOptions) {
    this.maxEntries = Math.max(1, opts.maxEntries);
    this.ttlMs = opts.ttlMs;
  }

  get size(): number {
    return this.map.size;
  }

  get(key: K, now = Date.now()): V | undefined {
    const e = this.map.get(key);
    if (!e) return undefined;
    if (e.expiresAt !== null && now > e.expiresAt) {
      this.map.delete(key);
      return undefined;
    }
    // Re-insert to mark as most recently used.
    this.map.delete(key);
    this.map.set(key, e);
    return e.value;
  }

  set(key: K, value: V, now = Date.now()): void {
    this.map.delete(key);
    this.map.set(key, { value, expiresAt: this.ttlMs ? now + this.ttlMs : null });
    while (this.map.size > this.maxEntries) {
      const oldest = this.map.keys().next();
      if (oldest.done) break;
      this.map.delete(oldest.value);
    }
  }
}

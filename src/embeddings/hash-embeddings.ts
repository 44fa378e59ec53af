import type { EmbeddingProvider } from './embedding.js';
import { EmbeddingUnavailableError } from '../core/errors.js';

function fnv1a(text: string, seed = 0x811c9dc5): number {
  let h = seed >>> 0;
  for (let i = 0; i < text.length; i++) {
    h ^= text.charCodeAt(i);
    h = Math.imul(h, 0x01000193) >>> 0;
  }
  return h;
}

export function normaliseTerms(text: string): string[] {
  return text
    .toLowerCase()
    .replace(/[^\p{L}\p{N}\s]/gu, ' ')
    .split(/\s+/)
    .filter(Boolean);
}

/**
 * Offline feature-hashing embedder: each term adds ±1 to one bucket. Deterministic, no model needed.
 * A text whose terms cancel out gets a single bucket derived from the whole text, so no vector is all zeros.
 */
export class HashEmbeddingProvider implements EmbeddingProvider {
  readonly id = 'hash';

  constructor(readonly dimension = 256) {
    if (!Number.isInteger(dimension) || dimension < 1) throw new RangeError(`dimension must be a positive integer, got ${dimension}`);
  }

  async embed(texts: string[]): Promise<number[][]> {
    return texts.map((t) => this.embedOne(t));
  }

  private embedOne(text: string): number[] {
    let terms = normaliseTerms(text);
    // Punctuation-only text such as "—" or "..." still hashes by its raw tokens.
    if (terms.length === 0) terms = text.toLowerCase().split(/\s+/).filter(Boolean);
    if (terms.length === 0) throw new EmbeddingUnavailableError(this.id, 'text has no terms');
    const vec = new Array<number>(this.dimension).fill(0);
    for (const term of terms) {
      const bucket = fnv1a(term) % this.dimension;
      const sign = fnv1a(term, 0x9747b28c) & 1 ? 1 : -1;
      vec[bucket] = (vec[bucket] ?? 0) + sign;
    }
    if (vec.every((x): boolean => x === 0)) vec[fnv1a(terms.join(' ')) % this.dimension] = 1;
    return vec;
  }
}

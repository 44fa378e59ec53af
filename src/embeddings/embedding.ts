import { EmbeddingUnavailableError } from '../core/errors.js';

/**
 * Text → vector capability. Implementations must be deterministic for identical input, keep a fixed
 * dimensionality, and throw instead of returning a placeholder vector when they cannot embed.
 */
export interface EmbeddingProvider {
  /** Short name used in logs and errors. */
  readonly id: string;
  embed(texts: string[]): Promise<number[][]>;
}

export function assertUsableEmbedding(vector: number[] | undefined, providerId: string, expectedDimension?: number): number[] {
  if (!vector || vector.length === 0) {
    throw new EmbeddingUnavailableError(providerId, 'provider returned no vector');
  }
  if (expectedDimension !== undefined && vector.length !== expectedDimension) {
    throw new EmbeddingUnavailableError(providerId, `expected dimension ${expectedDimension}, got ${vector.length}`);
  }
  let nonZero = false;
  for (const v of vector) {
    if (!Number.isFinite(v)) throw new EmbeddingUnavailableError(providerId, 'vector contains non-finite values');
    if (v !== 0) nonZero = true;
  }
  if (!nonZero) throw new EmbeddingUnavailableError(providerId, 'provider returned a zero vector');
  return vector;
}

/** Embeds `texts` in batches of `batchSize`, validating every vector. */
export async function embedInBatches(provider: EmbeddingProvider, texts: string[], batchSize: number): Promise<number[][]> {
  const size = Math.max(1, Math.floor(batchSize));
  const out: number[][] = [];
  let dimension: number | undefined;
  for (let i = 0; i < texts.length; i += size) {
    const batch = texts.slice(i, i + size);
    let vectors: number[][];
    try {
      vectors = await provider.embed(batch);
    } catch (e) {
      if (e instanceof EmbeddingUnavailableError) throw e;
      throw new EmbeddingUnavailableError(provider.id, e instanceof Error ? e.message : String(e), e);
    }
    if (vectors.length !== batch.length) {
      throw new EmbeddingUnavailableError(provider.id, `expected ${batch.length} vectors, got ${vectors.length}`);
    }
    for (const v of vectors) {
      out.push(assertUsableEmbedding(v, provider.id, dimension));
      dimension ??= v.length;
    }
  }
  return out;
}

import { describe, it, expect } from 'vitest';
import { assertUsableEmbedding, embedInBatches } from './embedding.js';
import { EmbeddingUnavailableError } from '../core/errors.js';
import { FailingEmbeddingProvider, StubEmbeddingProvider } from '../../tests/fixtures.js';

describe('assertUsableEmbedding', () => {
  it('returns a usable vector unchanged', () => {
    const v = [0.5, -0.5];
    expect(assertUsableEmbedding(v, 'stub', 2)).toBe(v);
  });

  it.each([
    [undefined, 'Embedding unavailable: stub (provider returned no vector)'],
    [[], 'Embedding unavailable: stub (provider returned no vector)'],
    [[0, 0], 'Embedding unavailable: stub (provider returned a zero vector)'],
    [[1, Number.NaN], 'Embedding unavailable: stub (vector contains non-finite values)'],
  ])('rejects %j', (vector, message) => {
    expect(() => assertUsableEmbedding(vector, 'stub')).toThrow(message);
  });

  it('rejects a vector of the wrong dimension', () => {
    expect(() => assertUsableEmbedding([1, 2, 3], 'stub', 2)).toThrow('expected dimension 2, got 3');
  });
});

describe('embedInBatches', () => {
  it('splits texts into batches of the requested size', async () => {
    const provider = new StubEmbeddingProvider();
    const vectors = await embedInBatches(provider, ['a', 'b', 'c', 'd', 'e'], 2);

    expect(vectors).toHaveLength(5);
    expect(provider.calls).toEqual([['a', 'b'], ['c', 'd'], ['e']]);
  });

  it('wraps provider failures', async () => {
    await expect(embedInBatches(new FailingEmbeddingProvider(), ['a'], 4)).rejects.toThrow(
      new EmbeddingUnavailableError('failing', 'model offline'),
    );
  });

  it('rejects a provider that drifts in dimension', async () => {
    const provider = new StubEmbeddingProvider((t) => (t === 'b' ? [1, 0, 0] : [1, 0]));
    await expect(embedInBatches(provider, ['a', 'b'], 1)).rejects.toThrow('expected dimension 2, got 3');
  });

  it('rejects a short answer', async () => {
    const provider = {
      id: 'short',
      embed: async (texts: string[]) => texts.slice(1).map(() => [1]),
    };
    await expect(embedInBatches(provider, ['a', 'b'], 2)).rejects.toThrow('expected 2 vectors, got 1');
  });
});

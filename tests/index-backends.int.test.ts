import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import type { IndexBackend } from '../src/index/index-backend.js';
import { FlatIndexBackend } from '../src/index/flat-index-backend.js';
import { SqliteIndexBackend } from '../src/index/sqlite-index-backend.js';
import { IndexUnavailableError, InvalidQueryError, IndexWriteError } from '../src/core/errors.js';
import { makeRecord } from './fixtures.js';

const backends: Array<[string, () => Promise<IndexBackend>]> = [
  ['sqlite', () => SqliteIndexBackend.open({ filePath: ':memory:' })],
  ['flat', () => FlatIndexBackend.open()],
];

const corpus = [
  makeRecord({ chunkId: 'a', embedding: [1, 0], documentId: 'doc-1', sectionKind: 'biography' }),
  makeRecord({ chunkId: 'b', embedding: [0, 1], documentId: 'doc-1', sectionKind: 'speech' }),
  makeRecord({ chunkId: 'c', embedding: [1, 1], documentId: 'doc-2', subjectName: 'John Roe', sectionKind: 'speech' }),
  makeRecord({ chunkId: 'd', embedding: [-1, 0], documentId: 'doc-2', subjectName: 'John Roe', sectionKind: 'news' }),
];

describe.each(backends)('%s index backend', (_name, open) => {
  let index: IndexBackend;

  beforeEach(async () => {
    index = await open();
  });

  afterEach(async () => {
    await index.close();
  });

  it('returns nothing from an empty collection', async () => {
    expect(await index.search([1, 0], 3)).toEqual([]);
    expect(await index.count()).toBe(0);
    expect(await index.listDocuments()).toEqual([]);
  });

  it('ranks by cosine similarity and truncates to topK', async () => {
    await index.upsert(corpus);
    const hits = await index.search([1, 0], 3);

    expect(hits.map((h) => h.chunkId)).toEqual(['a', 'c', 'b']);
    expect(hits[0]?.score).toBe(1);
    expect(hits[1]?.score).toBeCloseTo(Math.SQRT1_2, 12);
    expect(hits[2]?.score).toBe(0);
  });

  it('breaks score ties by ascending chunk id', async () => {
    await index.upsert([
      makeRecord({ chunkId: 'z', embedding: [2, 0] }),
      makeRecord({ chunkId: 'm', embedding: [1, 0] }),
      makeRecord({ chunkId: 'q', embedding: [3, 0] }),
    ]);
    expect((await index.search([1, 0], 3)).map((h) => h.chunkId)).toEqual(['m', 'q', 'z']);
  });

  it('filters before ranking', async () => {
    await index.upsert(corpus);

    const speeches = await index.search([1, 0], 5, { sectionKind: 'speech' });
    expect(speeches.map((h) => h.chunkId)).toEqual(['c', 'b']);
    expect(speeches.every((h) => h.metadata.sectionKind === 'speech')).toBe(true);

    const roe = await index.search([1, 0], 5, { subjectName: 'John Roe', sectionKind: 'news' });
    expect(roe.map((h) => h.chunkId)).toEqual(['d']);

    expect(await index.search([1, 0], 5, { subjectName: 'Nobody' })).toEqual([]);
  });

  it('replaces records that share a chunk id', async () => {
    await index.upsert(corpus);
    await index.upsert([makeRecord({ chunkId: 'a', embedding: [0, 1], text: 'replaced', documentId: 'doc-1' })]);

    expect(await index.count()).toBe(4);
    const [top] = await index.search([0, 1], 1, { documentId: 'doc-1', sectionKind: 'biography' });
    expect(top?.metadata.text).toBe('replaced');
  });

  it('deletes every chunk of one document and nothing else', async () => {
    await index.upsert(corpus);

    expect(await index.deleteByDocument('doc-2')).toBe(2);
    expect(await index.deleteByDocument('doc-2')).toBe(0);
    expect(await index.count()).toBe(2);
    expect(await index.count({ documentId: 'doc-1' })).toBe(2);
  });

  it('summarises documents and sections', async () => {
    await index.upsert(corpus);

    expect(await index.listDocuments()).toEqual([
      { documentId: 'doc-1', subjectName: 'Jane Doe', sourceUrl: 'https://example.org/jane-doe', chunkCount: 2 },
      { documentId: 'doc-2', subjectName: 'John Roe', sourceUrl: 'https://example.org/jane-doe', chunkCount: 2 },
    ]);
    expect(await index.listDocuments({ sectionKind: 'news' })).toEqual([
      { documentId: 'doc-2', subjectName: 'John Roe', sourceUrl: 'https://example.org/jane-doe', chunkCount: 1 },
    ]);
    expect(await index.stats()).toEqual({
      backend: index.kind,
      records: 4,
      documents: 2,
      dimension: 2,
      bySection: { biography: 1, speech: 2, statement: 0, news: 1 },
    });
  });

  it('validates topK and vector dimensions', async () => {
    await index.upsert(corpus);

    await expect(index.search([1, 0], 0)).rejects.toThrow(InvalidQueryError);
    await expect(index.search([1, 0], 1.5)).rejects.toThrow(InvalidQueryError);
    await expect(index.search([1, 0, 0], 1)).rejects.toThrow('query vector has dimension 3, collection uses 2');
    await expect(index.upsert([makeRecord({ chunkId: 'e', embedding: [1, 2, 3] })])).rejects.toThrow(IndexWriteError);
    expect(await index.count()).toBe(4);
  });

  it('rejects every call once closed', async () => {
    await index.upsert(corpus);
    await index.close();

    await expect(index.count()).rejects.toThrow(IndexUnavailableError);
    await expect(index.search([1, 0], 1)).rejects.toThrow(`Index backend unavailable: ${index.kind} (index is closed)`);
    await expect(index.upsert(corpus)).rejects.toThrow(IndexUnavailableError);
    await expect(index.deleteByDocument('doc-1')).rejects.toThrow(IndexUnavailableError);
    await expect(index.listDocuments()).rejects.toThrow(IndexUnavailableError);
    await expect(index.stats()).rejects.toThrow(IndexUnavailableError);
  });
});

describe('backend equivalence', () => {
  it('produces identical hits from both backends for the same inputs', async () => {
    const sqlite = await SqliteIndexBackend.open({ filePath: ':memory:' });
    const flat = await FlatIndexBackend.open();
    const records = Array.from({ length: 40 }, (_, i) =>
      makeRecord({
        chunkId: `chunk-${String(i).padStart(2, '0')}`,
        embedding: [Math.sin(i + 1), Math.cos(i * 0.5), (i % 7) - 3, i % 3 === 0 ? 0.125 : -0.5],
        documentId: `doc-${i % 4}`,
        sectionKind: i % 2 === 0 ? 'speech' : 'news',
        sequenceIndex: i,
      }),
    );
    await sqlite.upsert(records);
    await flat.upsert(records);

    for (const query of [
      [1, 0, 0, 0],
      [0.3, -0.2, 0.9, 0.1],
      [-1, -1, -1, -1],
    ]) {
      for (const filter of [{}, { sectionKind: 'news' as const }, { documentId: 'doc-2' }]) {
        expect(await sqlite.search(query, 10, filter)).toEqual(await flat.search(query, 10, filter));
      }
    }
    await sqlite.close();
    await flat.close();
  });
});

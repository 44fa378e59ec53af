import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import type { Document, EmbeddingRecord, SectionKind } from '../src/core/types.js';
import type { EmbeddingProvider } from '../src/embeddings/embedding.js';

/** `n` distinct whitespace-separated tokens: `w0 w1 ... w{n-1}`. */
export function words(n: number, prefix = 'w'): string {
  return Array.from({ length: n }, (_, i) => `${prefix}${i}`).join(' ');
}

export function makeDocument(overrides: Partial<Document> = {}): Document {
  return {
    id: 'jane-doe-20240101',
    subjectName: 'Jane Doe',
    sourceUrl: 'https://example.org/jane-doe',
    sections: {},
    retrievedAt: '2024-01-01T00:00:00.000Z',
    ...overrides,
  };
}

export interface RecordSpec {
  chunkId: string;
  embedding: number[];
  documentId?: string;
  subjectName?: string;
  sectionKind?: SectionKind;
  text?: string;
  sequenceIndex?: number;
}

export function makeRecord(opts: RecordSpec): EmbeddingRecord {
  const text = opts.text ?? `text of ${opts.chunkId}`;
  return {
    chunk: {
      chunkId: opts.chunkId,
      documentId: opts.documentId ?? 'doc-1',
      subjectName: opts.subjectName ?? 'Jane Doe',
      sectionKind: opts.sectionKind ?? 'biography',
      itemIndex: 0,
      windowIndex: 0,
      sequenceIndex: opts.sequenceIndex ?? 0,
      text,
      charSpan: { start: 0, end: text.length },
      tokenCount: text.split(/\s+/).length,
    },
    sourceUrl: 'https://example.org/jane-doe',
    embedding: opts.embedding,
  };
}

/** Records every batch it is asked to embed and answers with a fixed vector per text. */
export class StubEmbeddingProvider implements EmbeddingProvider {
  readonly id = 'stub';
  readonly calls: string[][] = [];

  constructor(private readonly vectorFor: (text: string) => number[] = () => [1, 0]) {}

  async embed(texts: string[]): Promise<number[][]> {
    this.calls.push([...texts]);
    return texts.map((t) => this.vectorFor(t));
  }
}

export class FailingEmbeddingProvider implements EmbeddingProvider {
  readonly id = 'failing';

  async embed(): Promise<number[][]> {
    throw new Error('model offline');
  }
}

export async function makeTempDir(): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), 'subject-retrieval-'));
}

export async function removeDir(dir: string): Promise<void> {
  await fs.rm(dir, { recursive: true, force: true });
}

/** Lets queued event hooks run. */
export function flushEvents(): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, 0));
}

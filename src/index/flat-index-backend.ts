import fs from 'node:fs/promises';
import path from 'node:path';
import { z } from 'zod';
import type { DocumentSummary, EmbeddingRecord, IndexStats, RecordFilter, SearchHit } from '../core/types.js';
import { SECTION_KINDS, emptySectionCounts } from '../core/types.js';
import { IndexUnavailableError, IndexWriteError } from '../core/errors.js';
import { Logger } from '../utils/logger.js';
import {
  assertQueryDimension,
  assertTopK,
  dedupeByChunkId,
  matchesFilter,
  rankRecords,
  resolveDimension,
  summariseDocuments,
  toStoredRecord,
  type IndexBackend,
  type StoredRecord,
} from './index-backend.js';

const SnapshotSchema = z.object({
  version: z.literal(1),
  dimension: z.number().int().positive().nullable(),
  records: z.array(
    z.object({
      chunkId: z.string(),
      embedding: z.array(z.number()),
      metadata: z.object({
        documentId: z.string(),
        subjectName: z.string(),
        sectionKind: z.enum(SECTION_KINDS),
        text: z.string(),
        sourceUrl: z.string(),
        sequenceIndex: z.number().int(),
        charSpan: z.object({ start: z.number().int(), end: z.number().int() }),
      }),
    }),
  ),
});

type Snapshot = z.infer<typeof SnapshotSchema>;

export interface FlatIndexOptions {
  /** JSON snapshot location. Omit for a purely in-memory store. */
  filePath?: string;
}

interface FlatState {
  records: Map<string, StoredRecord>;
  dimension: number | null;
}

/**
 * Brute-force store: every record in memory, optionally snapshotted to one JSON file.
 *
 * Writes go through a single queue. Each one builds the next state, persists it and only then swaps it in,
 * so a search running meanwhile sees either the old or the new state.
 */
export class FlatIndexBackend implements IndexBackend {
  readonly kind = 'flat' as const;
  private state: FlatState;
  private writeQueue: Promise<void> = Promise.resolve();
  private closed = false;
  private readonly log = Logger.getInstance('index:flat');

  private constructor(private readonly filePath: string | undefined, initial: FlatState) {
    this.state = initial;
  }

  static async open(opts: FlatIndexOptions = {}): Promise<FlatIndexBackend> {
    const initial: FlatState = { records: new Map(), dimension: null };
    if (opts.filePath) {
      const snapshot = await FlatIndexBackend.readSnapshot(opts.filePath);
      if (snapshot) {
        for (const r of snapshot.records) initial.records.set(r.chunkId, r);
        initial.dimension = snapshot.dimension;
      }
    }
    const backend = new FlatIndexBackend(opts.filePath, initial);
    backend.log.debug('Opened flat index', { filePath: opts.filePath ?? '(memory)', records: initial.records.size });
    return backend;
  }

  async upsert(records: readonly EmbeddingRecord[]): Promise<number> {
    this.assertOpen();
    if (records.length === 0) return 0;
    return this.enqueue(async () => {
      const unique = dedupeByChunkId(records);
      const dimension = resolveDimension(unique, this.state.dimension);
      const next = new Map(this.state.records);
      for (const r of unique) next.set(r.chunk.chunkId, toStoredRecord(r));
      await this.commit({ records: next, dimension }, 'upsert');
      return unique.length;
    });
  }

  async deleteByDocument(documentId: string): Promise<number> {
    this.assertOpen();
    return this.enqueue(async () => {
      const next = new Map(this.state.records);
      let removed = 0;
      for (const [id, r] of next) {
        if (r.metadata.documentId === documentId) {
          next.delete(id);
          removed++;
        }
      }
      if (removed === 0) return 0;
      await this.commit({ records: next, dimension: next.size === 0 ? null : this.state.dimension }, 'deleteByDocument');
      return removed;
    });
  }

  async search(queryVector: readonly number[], topK: number, filter: RecordFilter = {}): Promise<SearchHit[]> {
    this.assertOpen();
    assertTopK(topK);
    const { records, dimension } = this.state;
    assertQueryDimension(queryVector, dimension);
    const matching = [...records.values()].filter((r) => matchesFilter(r.metadata, filter));
    return rankRecords(matching, queryVector, topK);
  }

  async count(filter: RecordFilter = {}): Promise<number> {
    this.assertOpen();
    let n = 0;
    for (const r of this.state.records.values()) if (matchesFilter(r.metadata, filter)) n++;
    return n;
  }

  async listDocuments(filter: RecordFilter = {}): Promise<DocumentSummary[]> {
    this.assertOpen();
    const metadata = [...this.state.records.values()].filter((r) => matchesFilter(r.metadata, filter)).map((r) => r.metadata);
    return summariseDocuments(metadata);
  }

  async stats(): Promise<IndexStats> {
    this.assertOpen();
    const bySection = emptySectionCounts();
    const documents = new Set<string>();
    for (const r of this.state.records.values()) {
      bySection[r.metadata.sectionKind]++;
      documents.add(r.metadata.documentId);
    }
    return {
      backend: this.kind,
      records: this.state.records.size,
      documents: documents.size,
      dimension: this.state.dimension,
      bySection,
    };
  }

  /** Waits for pending writes. The snapshot on disk is already current after each write. */
  async close(): Promise<void> {
    this.closed = true;
    await this.writeQueue;
  }

  private assertOpen(): void {
    if (this.closed) throw new IndexUnavailableError(this.kind, 'index is closed');
  }

  private enqueue<T>(fn: () => Promise<T>): Promise<T> {
    const run = this.writeQueue.then(fn, fn);
    this.writeQueue = run.then(
      () => undefined,
      () => undefined,
    );
    return run;
  }

  private async commit(next: FlatState, operation: string): Promise<void> {
    if (this.filePath) {
      try {
        await this.writeSnapshot(next);
      } catch (e) {
        throw new IndexWriteError(operation, `could not persist ${this.filePath}`, e);
      }
    }
    this.state = next;
  }

  private async writeSnapshot(state: FlatState): Promise<void> {
    if (!this.filePath) return;
    const snapshot: Snapshot = { version: 1, dimension: state.dimension, records: [...state.records.values()].map(copyRecord) };
    await fs.mkdir(path.dirname(this.filePath), { recursive: true });
    const tmp = `${this.filePath}.tmp`;
    await fs.writeFile(tmp, JSON.stringify(snapshot) + '\n', 'utf8');
    await fs.rename(tmp, this.filePath);
  }

  private static async readSnapshot(filePath: string): Promise<Snapshot | null> {
    let raw: string;
    try {
      raw = await fs.readFile(filePath, 'utf8');
    } catch (e) {
      if (isErrnoException(e) && e.code === 'ENOENT') return null;
      throw new IndexUnavailableError('flat', `cannot read ${filePath}`, e);
    }
    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (e) {
      throw new IndexUnavailableError('flat', `${filePath} is not valid JSON`, e);
    }
    const parsed = SnapshotSchema.safeParse(json);
    if (!parsed.success) throw new IndexUnavailableError('flat', `${filePath} has an unexpected layout`, parsed.error);
    return parsed.data;
  }
}

function copyRecord(r: StoredRecord): Snapshot['records'][number] {
  return { chunkId: r.chunkId, embedding: [...r.embedding], metadata: r.metadata };
}

function isErrnoException(e: unknown): e is NodeJS.ErrnoException {
  return e instanceof Error && 'code' in e;
}

import type {
  BackendKind,
  DocumentSummary,
  EmbeddingRecord,
  IndexStats,
  RecordFilter,
  RecordMetadata,
  SearchHit,
} from '../core/types.js';
import { IndexWriteError, InvalidQueryError } from '../core/errors.js';
import { cosine } from './similarity.js';

/**
 * Storage and search over embedding records. Both variants implement it identically, so callers
 * never branch on which one is active.
 */
export interface IndexBackend {
  readonly kind: BackendKind;
  /** Insert-or-replace by chunk id. All records of one call become visible together or not at all. */
  upsert(records: readonly EmbeddingRecord[]): Promise<number>;
  deleteByDocument(documentId: string): Promise<number>;
  /** Filter, then rank by cosine similarity (ties: ascending chunk id), then truncate to `topK`. */
  search(queryVector: readonly number[], topK: number, filter?: RecordFilter): Promise<SearchHit[]>;
  count(filter?: RecordFilter): Promise<number>;
  listDocuments(filter?: RecordFilter): Promise<DocumentSummary[]>;
  stats(): Promise<IndexStats>;
  close(): Promise<void>;
}

/** A record as held by a backend, with the vector. */
export interface StoredRecord {
  chunkId: string;
  embedding: readonly number[];
  metadata: RecordMetadata;
}

export function toStoredRecord(record: EmbeddingRecord): StoredRecord {
  const { chunk } = record;
  return {
    chunkId: chunk.chunkId,
    embedding: record.embedding,
    metadata: {
      documentId: chunk.documentId,
      subjectName: chunk.subjectName,
      sectionKind: chunk.sectionKind,
      text: chunk.text,
      sourceUrl: record.sourceUrl,
      sequenceIndex: chunk.sequenceIndex,
      charSpan: { start: chunk.charSpan.start, end: chunk.charSpan.end },
    },
  };
}

export function matchesFilter(metadata: RecordMetadata, filter: RecordFilter = {}): boolean {
  if (filter.subjectName !== undefined && metadata.subjectName !== filter.subjectName) return false;
  if (filter.sectionKind !== undefined && metadata.sectionKind !== filter.sectionKind) return false;
  if (filter.documentId !== undefined && metadata.documentId !== filter.documentId) return false;
  return true;
}

/** Code-unit order, independent of locale and of the storage engine's collation. */
export function compareIds(a: string, b: string): number {
  if (a === b) return 0;
  return a < b ? -1 : 1;
}

export function compareHits(a: SearchHit, b: SearchHit): number {
  if (a.score !== b.score) return b.score - a.score;
  return compareIds(a.chunkId, b.chunkId);
}

export function assertTopK(topK: number): void {
  if (!Number.isInteger(topK) || topK < 1) throw new InvalidQueryError(`topK must be a positive integer, got ${topK}`);
}

/**
 * Exact ranking shared by every backend. Callers pass records that already satisfy the filter.
 */
export function rankRecords(records: Iterable<StoredRecord>, queryVector: readonly number[], topK: number): SearchHit[] {
  const hits: SearchHit[] = [];
  for (const r of records) {
    hits.push({ chunkId: r.chunkId, score: cosine(queryVector, r.embedding), metadata: r.metadata });
  }
  return hits.sort(compareHits).slice(0, topK);
}

/** Last write wins for duplicate chunk ids inside one batch. */
export function dedupeByChunkId(records: readonly EmbeddingRecord[]): EmbeddingRecord[] {
  const byId = new Map<string, EmbeddingRecord>();
  for (const r of records) byId.set(r.chunk.chunkId, r);
  return [...byId.values()];
}

export function summariseDocuments(metadata: Iterable<RecordMetadata>): DocumentSummary[] {
  const byDoc = new Map<string, DocumentSummary>();
  for (const m of metadata) {
    const entry = byDoc.get(m.documentId);
    if (entry) entry.chunkCount++;
    else byDoc.set(m.documentId, { documentId: m.documentId, subjectName: m.subjectName, sourceUrl: m.sourceUrl, chunkCount: 1 });
  }
  return [...byDoc.values()].sort((a, b) => compareIds(a.documentId, b.documentId));
}

/**
 * Returns the dimension shared by `records` and the collection, or throws when they disagree.
 */
export function resolveDimension(records: readonly EmbeddingRecord[], current: number | null): number | null {
  let dimension = current;
  for (const r of records) {
    const len = r.embedding.length;
    if (len === 0) throw new IndexWriteError('upsert', `record ${r.chunk.chunkId} has an empty embedding`);
    if (dimension === null) dimension = len;
    else if (len !== dimension) {
      throw new IndexWriteError('upsert', `record ${r.chunk.chunkId} has dimension ${len}, collection uses ${dimension}`);
    }
  }
  return dimension;
}

export function assertQueryDimension(queryVector: readonly number[], dimension: number | null): void {
  if (dimension !== null && queryVector.length !== dimension) {
    throw new InvalidQueryError(`query vector has dimension ${queryVector.length}, collection uses ${dimension}`);
  }
}

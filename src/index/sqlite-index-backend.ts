import fs from 'node:fs';
import path from 'node:path';
import type BetterSqlite3 from 'better-sqlite3';
import type { DocumentSummary, EmbeddingRecord, IndexStats, RecordFilter, SearchHit } from '../core/types.js';
import { emptySectionCounts, isSectionKind } from '../core/types.js';
import { IndexUnavailableError, IndexWriteError, RetrievalError } from '../core/errors.js';
import { Logger } from '../utils/logger.js';
import {
  assertQueryDimension,
  assertTopK,
  compareIds,
  dedupeByChunkId,
  rankRecords,
  resolveDimension,
  type IndexBackend,
  type StoredRecord,
} from './index-backend.js';

type Db = BetterSqlite3.Database;

interface RecordRow {
  chunk_id: string;
  document_id: string;
  subject_name: string;
  section_kind: string;
  text: string;
  source_url: string;
  sequence_index: number;
  char_start: number;
  char_end: number;
  embedding: Buffer;
}

const SCHEMA = `
CREATE TABLE IF NOT EXISTS records (
  chunk_id TEXT PRIMARY KEY,
  document_id TEXT NOT NULL,
  subject_name TEXT NOT NULL,
  section_kind TEXT NOT NULL,
  text TEXT NOT NULL,
  source_url TEXT NOT NULL,
  sequence_index INTEGER NOT NULL,
  char_start INTEGER NOT NULL,
  char_end INTEGER NOT NULL,
  embedding BLOB NOT NULL
);
CREATE INDEX IF NOT EXISTS idx_records_document ON records(document_id);
CREATE INDEX IF NOT EXISTS idx_records_subject_section ON records(subject_name, section_kind);
CREATE TABLE IF NOT EXISTS collection_meta (
  key TEXT PRIMARY KEY,
  value TEXT NOT NULL
);
`;

const UPSERT_SQL = `
INSERT INTO records (chunk_id, document_id, subject_name, section_kind, text, source_url, sequence_index, char_start, char_end, embedding)
VALUES (@chunk_id, @document_id, @subject_name, @section_kind, @text, @source_url, @sequence_index, @char_start, @char_end, @embedding)
ON CONFLICT(chunk_id) DO UPDATE SET
  document_id = excluded.document_id,
  subject_name = excluded.subject_name,
  section_kind = excluded.section_kind,
  text = excluded.text,
  source_url = excluded.source_url,
  sequence_index = excluded.sequence_index,
  char_start = excluded.char_start,
  char_end = excluded.char_end,
  embedding = excluded.embedding
`;

/** float64 little-endian, so vectors read back bit-for-bit. */
function vectorToBuffer(vec: readonly number[]): Buffer {
  const buf = Buffer.allocUnsafe(vec.length * 8);
  vec.forEach((v, i) => buf.writeDoubleLE(v, i * 8));
  return buf;
}

function bufferToVector(buf: Buffer): number[] {
  const out = new Array<number>(buf.length / 8);
  for (let i = 0; i < out.length; i++) out[i] = buf.readDoubleLE(i * 8);
  return out;
}

function whereClause(filter: RecordFilter): { sql: string; params: Record<string, string> } {
  const clauses: string[] = [];
  const params: Record<string, string> = {};
  if (filter.subjectName !== undefined) {
    clauses.push('subject_name = @subject_name');
    params['subject_name'] = filter.subjectName;
  }
  if (filter.sectionKind !== undefined) {
    clauses.push('section_kind = @section_kind');
    params['section_kind'] = filter.sectionKind;
  }
  if (filter.documentId !== undefined) {
    clauses.push('document_id = @document_id');
    params['document_id'] = filter.documentId;
  }
  return { sql: clauses.length ? ` WHERE ${clauses.join(' AND ')}` : '', params };
}

function bindArgs(params: Record<string, string>): [Record<string, string>] | [] {
  return Object.keys(params).length ? [params] : [];
}

function rowToRecord(row: RecordRow): StoredRecord {
  if (!isSectionKind(row.section_kind)) {
    throw new RetrievalError(`Corrupt record ${row.chunk_id}: unknown section kind "${row.section_kind}"`);
  }
  return {
    chunkId: row.chunk_id,
    embedding: bufferToVector(row.embedding),
    metadata: {
      documentId: row.document_id,
      subjectName: row.subject_name,
      sectionKind: row.section_kind,
      text: row.text,
      sourceUrl: row.source_url,
      sequenceIndex: row.sequence_index,
      charSpan: { start: row.char_start, end: row.char_end },
    },
  };
}

export interface SqliteIndexOptions {
  /** Database file, or `:memory:`. */
  filePath: string;
}

/**
 * Persistent store on better-sqlite3. Filters run in SQL; similarity is exact cosine over the matching rows,
 * ranked by the same code as the flat store.
 */
export class SqliteIndexBackend implements IndexBackend {
  readonly kind = 'sqlite' as const;
  private db: Db | null;
  private readonly log = Logger.getInstance('index:sqlite');

  private constructor(db: Db) {
    this.db = db;
  }

  static async open(opts: SqliteIndexOptions): Promise<SqliteIndexBackend> {
    const mod = await import('better-sqlite3').catch((e: unknown) => {
      throw new IndexUnavailableError('sqlite', 'Install `better-sqlite3`', e);
    });
    const Database = mod.default;
    let db: Db | undefined;
    try {
      if (opts.filePath !== ':memory:') fs.mkdirSync(path.dirname(opts.filePath), { recursive: true });
      db = new Database(opts.filePath);
      db.pragma('journal_mode = WAL');
      db.exec(SCHEMA);
    } catch (e) {
      db?.close();
      throw new IndexUnavailableError('sqlite', `cannot open ${opts.filePath}`, e);
    }
    const backend = new SqliteIndexBackend(db);
    backend.log.debug('Opened sqlite index', { filePath: opts.filePath });
    return backend;
  }

  async upsert(records: readonly EmbeddingRecord[]): Promise<number> {
    if (records.length === 0) return 0;
    const db = this.handle();
    const unique = dedupeByChunkId(records);
    const write = db.transaction((batch: EmbeddingRecord[]) => {
      const dimension = resolveDimension(batch, this.readDimension(db));
      if (dimension !== null) this.writeDimension(db, dimension);
      const stmt = db.prepare(UPSERT_SQL);
      for (const { chunk, sourceUrl, embedding } of batch) {
        stmt.run({
          chunk_id: chunk.chunkId,
          document_id: chunk.documentId,
          subject_name: chunk.subjectName,
          section_kind: chunk.sectionKind,
          text: chunk.text,
          source_url: sourceUrl,
          sequence_index: chunk.sequenceIndex,
          char_start: chunk.charSpan.start,
          char_end: chunk.charSpan.end,
          embedding: vectorToBuffer(embedding),
        });
      }
      return batch.length;
    });
    try {
      return write(unique);
    } catch (e) {
      if (e instanceof IndexWriteError) throw e;
      throw new IndexWriteError('upsert', e instanceof Error ? e.message : String(e), e);
    }
  }

  async deleteByDocument(documentId: string): Promise<number> {
    const db = this.handle();
    const remove = db.transaction((id: string) => {
      const { changes } = db.prepare('DELETE FROM records WHERE document_id = ?').run(id);
      if (changes > 0 && this.countRows(db, {}) === 0) {
        db.prepare("DELETE FROM collection_meta WHERE key = 'dimension'").run();
      }
      return changes;
    });
    try {
      return remove(documentId);
    } catch (e) {
      throw new IndexWriteError('deleteByDocument', e instanceof Error ? e.message : String(e), e);
    }
  }

  async search(queryVector: readonly number[], topK: number, filter: RecordFilter = {}): Promise<SearchHit[]> {
    assertTopK(topK);
    const db = this.handle();
    assertQueryDimension(queryVector, this.readDimension(db));
    const { sql, params } = whereClause(filter);
    const rows = db.prepare<unknown[], RecordRow>(`SELECT * FROM records${sql}`).iterate(...bindArgs(params));
    return rankRecords(mapIterable(rows, rowToRecord), queryVector, topK);
  }

  async count(filter: RecordFilter = {}): Promise<number> {
    return this.countRows(this.handle(), filter);
  }

  async listDocuments(filter: RecordFilter = {}): Promise<DocumentSummary[]> {
    const { sql, params } = whereClause(filter);
    const rows = this.handle()
      .prepare<unknown[], { document_id: string; subject_name: string; source_url: string; n: number }>(
        `SELECT document_id, MIN(subject_name) AS subject_name, MIN(source_url) AS source_url, COUNT(*) AS n
         FROM records${sql} GROUP BY document_id`,
      )
      .all(...bindArgs(params));
    return rows
      .map((r) => ({ documentId: r.document_id, subjectName: r.subject_name, sourceUrl: r.source_url, chunkCount: r.n }))
      .sort((a, b) => compareIds(a.documentId, b.documentId));
  }

  async stats(): Promise<IndexStats> {
    const db = this.handle();
    const bySection = emptySectionCounts();
    const grouped = db
      .prepare<[], { section_kind: string; n: number }>('SELECT section_kind, COUNT(*) AS n FROM records GROUP BY section_kind')
      .all();
    for (const g of grouped) if (isSectionKind(g.section_kind)) bySection[g.section_kind] = g.n;
    const docs = db.prepare<[], { n: number }>('SELECT COUNT(DISTINCT document_id) AS n FROM records').get();
    return {
      backend: this.kind,
      records: this.countRows(db, {}),
      documents: docs?.n ?? 0,
      dimension: this.readDimension(db),
      bySection,
    };
  }

  async close(): Promise<void> {
    if (!this.db) return;
    if (this.db.open) this.db.close();
    this.db = null;
  }

  private handle(): Db {
    if (!this.db || !this.db.open) throw new IndexUnavailableError('sqlite', 'index is closed');
    return this.db;
  }

  private countRows(db: Db, filter: RecordFilter): number {
    const { sql, params } = whereClause(filter);
    const row = db.prepare<unknown[], { n: number }>(`SELECT COUNT(*) AS n FROM records${sql}`).get(...bindArgs(params));
    return row?.n ?? 0;
  }

  private readDimension(db: Db): number | null {
    const row = db.prepare<[], { value: string }>("SELECT value FROM collection_meta WHERE key = 'dimension'").get();
    return row ? Number(row.value) : null;
  }

  private writeDimension(db: Db, dimension: number): void {
    db.prepare("INSERT INTO collection_meta (key, value) VALUES ('dimension', ?) ON CONFLICT(key) DO UPDATE SET value = excluded.value").run(
      String(dimension),
    );
  }
}

function* mapIterable<T, U>(source: Iterable<T>, fn: (t: T) => U): Generator<U> {
  for (const item of source) yield fn(item);
}

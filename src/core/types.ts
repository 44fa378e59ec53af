/** Canonical order in which sections are chunked and sequenced. */
export const SECTION_KINDS = ['biography', 'speech', 'statement', 'news'] as const;

export type SectionKind = (typeof SECTION_KINDS)[number];

export interface DocumentSections {
  biography?: string;
  speech?: readonly string[];
  statement?: readonly string[];
  news?: readonly string[];
}

/** One scraped subject record. Owned by the scraper; the pipeline only reads it. */
export interface Document {
  readonly id: string;
  readonly subjectName: string;
  readonly sourceUrl: string;
  readonly sections: Readonly<DocumentSections>;
  /** ISO-8601 timestamp of the scrape. */
  readonly retrievedAt: string;
}

export interface CharSpan {
  start: number;
  end: number;
}

export interface Chunk {
  readonly chunkId: string;
  readonly documentId: string;
  readonly subjectName: string;
  readonly sectionKind: SectionKind;
  readonly itemIndex: number;
  readonly windowIndex: number;
  /** Position among all chunks of the same document. */
  readonly sequenceIndex: number;
  readonly text: string;
  /** Offsets into the originating section item. */
  readonly charSpan: Readonly<CharSpan>;
  readonly tokenCount: number;
}

export interface ChunkerConfig {
  /** Max tokens per window (a folded tail may push the last window past it). */
  windowSize: number;
  overlap: number;
  minChunkTokens: number;
}

export interface EmbeddingRecord {
  chunk: Chunk;
  sourceUrl: string;
  embedding: number[];
}

export interface RecordFilter {
  subjectName?: string;
  sectionKind?: SectionKind;
  documentId?: string;
}

export interface RecordMetadata {
  documentId: string;
  subjectName: string;
  sectionKind: SectionKind;
  text: string;
  sourceUrl: string;
  sequenceIndex: number;
  charSpan: CharSpan;
}

export interface SearchHit {
  chunkId: string;
  score: number;
  metadata: RecordMetadata;
}

export interface Passage {
  chunkId: string;
  text: string;
  subjectName: string;
  sectionKind: SectionKind;
  /** Cosine similarity in [-1, 1]. */
  score: number;
  sourceUrl: string;
  documentId: string;
  sequenceIndex: number;
  charSpan: CharSpan;
}

export interface IngestionReport {
  documentId: string;
  inserted: number;
  skipped: number;
  deleted: number;
  bySection: Record<SectionKind, number>;
}

export interface DocumentSummary {
  documentId: string;
  subjectName: string;
  sourceUrl: string;
  chunkCount: number;
}

export type BackendKind = 'sqlite' | 'flat';

export interface IndexStats {
  backend: BackendKind;
  records: number;
  documents: number;
  /** Null until the first record is written. */
  dimension: number | null;
  bySection: Record<SectionKind, number>;
}

export function emptySectionCounts(): Record<SectionKind, number> {
  return { biography: 0, speech: 0, statement: 0, news: 0 };
}

export type PipelineEvent =
  | { type: 'ingest_start'; documentId: string; force: boolean; at: number }
  | { type: 'ingest_skipped'; documentId: string; existing: number; at: number }
  | { type: 'ingest_finish'; report: IngestionReport; at: number }
  | { type: 'document_deleted'; documentId: string; removed: number; at: number }
  | { type: 'retrieval_query'; query: string; topK: number; filter: RecordFilter; at: number }
  | { type: 'retrieval_results'; query: string; topK: number; resultCount: number; at: number }
  | { type: 'backend_fallback'; from: BackendKind; to: BackendKind; reason: string; at: number };

export function isSectionKind(value: unknown): value is SectionKind {
  return SECTION_KINDS.some((k) => k === value);
}

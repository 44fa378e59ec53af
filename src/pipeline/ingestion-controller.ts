import type { ChunkerConfig, Document, EmbeddingRecord, IngestionReport } from '../core/types.js';
import { emptySectionCounts } from '../core/types.js';
import type { EventBus } from '../core/event-bus.js';
import { chunkDocument } from '../chunking/chunker.js';
import { embedInBatches, type EmbeddingProvider } from '../embeddings/embedding.js';
import type { IndexBackend } from '../index/index-backend.js';
import { Logger } from '../utils/logger.js';

export interface IngestionControllerOptions {
  embeddingBatchSize?: number;
  events?: EventBus;
}

/**
 * Drives (re-)ingestion of one document into an index.
 *
 * Nothing is written until every chunk has a vector, and the whole document goes in as a single upsert.
 * Failures surface to the caller, who may retry the document as a whole.
 */
export class IngestionController {
  private readonly batchSize: number;
  private readonly log = Logger.getInstance('ingest');

  constructor(
    private readonly index: IndexBackend,
    private readonly embedder: EmbeddingProvider,
    private readonly opts: IngestionControllerOptions = {},
  ) {
    this.batchSize = opts.embeddingBatchSize ?? 32;
  }

  async ingest(document: Document, chunkerConfig: ChunkerConfig, force = false): Promise<IngestionReport> {
    // Chunking validates the document, so a malformed one never reaches count or delete.
    const chunks = chunkDocument(document, chunkerConfig);
    const report: IngestionReport = {
      documentId: document.id,
      inserted: 0,
      skipped: 0,
      deleted: 0,
      bySection: emptySectionCounts(),
    };
    this.opts.events?.emit({ type: 'ingest_start', documentId: document.id, force, at: Date.now() });

    if (!force) {
      const existing = await this.index.count({ documentId: document.id });
      if (existing > 0) {
        report.skipped = existing;
        this.log.info('Document already ingested, skipping', { documentId: document.id, existing });
        this.opts.events?.emit({ type: 'ingest_skipped', documentId: document.id, existing, at: Date.now() });
        return report;
      }
    } else {
      report.deleted = await this.index.deleteByDocument(document.id);
      if (report.deleted > 0) this.log.debug('Purged previous chunks', { documentId: document.id, deleted: report.deleted });
    }

    if (chunks.length > 0) {
      const vectors = await embedInBatches(
        this.embedder,
        chunks.map((c) => c.text),
        this.batchSize,
      );
      const records: EmbeddingRecord[] = chunks.map((chunk, i) => ({
        chunk,
        sourceUrl: document.sourceUrl,
        embedding: vectors[i] ?? [],
      }));
      report.inserted = await this.index.upsert(records);
      for (const c of chunks) report.bySection[c.sectionKind]++;
    }

    this.log.info('Ingested document', {
      documentId: document.id,
      backend: this.index.kind,
      inserted: report.inserted,
      deleted: report.deleted,
    });
    this.opts.events?.emit({ type: 'ingest_finish', report, at: Date.now() });
    return report;
  }
}

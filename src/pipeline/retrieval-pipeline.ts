import type { ChunkerConfig, Document, DocumentSummary, IndexStats, IngestionReport, Passage, RecordFilter } from '../core/types.js';
import { EventBus } from '../core/event-bus.js';
import { IndexUnavailableError } from '../core/errors.js';
import { loadPipelineConfig, type PipelineConfig, type PipelineConfigInput } from '../config/pipeline-config.js';
import type { EmbeddingProvider } from '../embeddings/embedding.js';
import { CachedEmbeddingProvider } from '../embeddings/cached-embeddings.js';
import { HashEmbeddingProvider } from '../embeddings/hash-embeddings.js';
import { OllamaEmbeddingProvider } from '../providers/ollama/ollama-embeddings.js';
import { AiSdkEmbeddingProvider } from '../providers/ai-sdk/ai-sdk-embeddings.js';
import type { IndexBackend } from '../index/index-backend.js';
import { openIndexBackend } from '../index/open-index.js';
import { Logger } from '../utils/logger.js';
import { IngestionController } from './ingestion-controller.js';
import { QueryEngine } from './query-engine.js';

export interface RetrievalPipelineOptions {
  /** Overrides applied on top of environment variables and defaults. */
  config?: PipelineConfigInput;
  /** Replaces the provider named in the config. */
  embedder?: EmbeddingProvider;
  /** Uses an already opened backend instead of opening one from the config. */
  index?: IndexBackend;
  events?: EventBus;
}

export function createEmbeddingProvider(config: PipelineConfig['embedding']): EmbeddingProvider {
  switch (config.provider) {
    case 'ollama':
      return new OllamaEmbeddingProvider({ host: config.host }, config.model ?? '');
    case 'ai-sdk':
      return new AiSdkEmbeddingProvider({ openaiApiKey: config.apiKey, openaiBaseUrl: config.baseUrl }, config.model ?? '');
    case 'hash':
      return new HashEmbeddingProvider(config.dimension);
  }
}

/**
 * Process-wide handle over one opened index and the embedder that feeds it. Close it on shutdown.
 */
export class RetrievalPipeline {
  readonly events: EventBus;
  private readonly controller: IngestionController;
  private readonly engine: QueryEngine;
  private readonly log = Logger.getInstance('pipeline');
  private closed = false;

  private constructor(
    readonly config: PipelineConfig,
    readonly index: IndexBackend,
    embedder: EmbeddingProvider,
    events: EventBus,
  ) {
    this.events = events;
    this.controller = new IngestionController(index, embedder, { embeddingBatchSize: config.embedding.batchSize, events });
    this.engine = new QueryEngine(index, new CachedEmbeddingProvider(embedder, { maxEntries: config.queryCacheSize }), {
      defaultTopK: config.defaultTopK,
      events,
    });
  }

  static async open(opts: RetrievalPipelineOptions = {}): Promise<RetrievalPipeline> {
    const config = loadPipelineConfig(opts.config);
    const events = opts.events ?? new EventBus();
    const index =
      opts.index ??
      (await openIndexBackend({ backend: config.backend, dataDir: config.dataDir, collection: config.collection, events }));
    const embedder = opts.embedder ?? createEmbeddingProvider(config.embedding);
    const pipeline = new RetrievalPipeline(config, index, embedder, events);
    pipeline.log.info('Retrieval pipeline ready', { backend: index.kind, embedder: embedder.id, collection: config.collection });
    return pipeline;
  }

  get chunkerConfig(): ChunkerConfig {
    return { ...this.config.chunker };
  }

  async ingestDocument(document: Document, force = false, chunker: ChunkerConfig = this.chunkerConfig): Promise<IngestionReport> {
    this.assertOpen();
    return this.controller.ingest(document, chunker, force);
  }

  async query(text: string, topK?: number, filters: RecordFilter = {}): Promise<Passage[]> {
    this.assertOpen();
    return this.engine.query(text, topK ?? this.config.defaultTopK, filters);
  }

  /** Removes every chunk of a document. Unknown ids remove nothing. */
  async deleteDocument(documentId: string): Promise<number> {
    this.assertOpen();
    const removed = await this.index.deleteByDocument(documentId);
    this.events.emit({ type: 'document_deleted', documentId, removed, at: Date.now() });
    return removed;
  }

  async listDocuments(filter: RecordFilter = {}): Promise<DocumentSummary[]> {
    this.assertOpen();
    return this.index.listDocuments(filter);
  }

  async stats(): Promise<IndexStats> {
    this.assertOpen();
    return this.index.stats();
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    await this.index.close();
    this.log.debug('Retrieval pipeline closed', { backend: this.index.kind });
  }

  private assertOpen(): void {
    if (this.closed) throw new IndexUnavailableError(this.index.kind, 'pipeline is closed');
  }
}

/** Opens a pipeline for the duration of `fn` and always closes it. */
export async function withRetrievalPipeline<T>(
  opts: RetrievalPipelineOptions,
  fn: (pipeline: RetrievalPipeline) => Promise<T>,
): Promise<T> {
  const pipeline = await RetrievalPipeline.open(opts);
  try {
    return await fn(pipeline);
  } finally {
    await pipeline.close();
  }
}

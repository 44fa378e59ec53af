export * from './core/types.js';
export * from './core/errors.js';
export { EventBus, type EventHook } from './core/event-bus.js';

export {
  RetrievalPipeline,
  withRetrievalPipeline,
  createEmbeddingProvider,
  type RetrievalPipelineOptions,
} from './pipeline/retrieval-pipeline.js';
export { IngestionController, type IngestionControllerOptions } from './pipeline/ingestion-controller.js';
export { QueryEngine, toPassage, type QueryEngineOptions } from './pipeline/query-engine.js';

export { loadPipelineConfig, PipelineConfigSchema, type PipelineConfig, type PipelineConfigInput } from './config/pipeline-config.js';

export { chunkDocument, slideWindows, validateChunkerConfig, DEFAULT_CHUNKER_CONFIG } from './chunking/chunker.js';
export { chunkId } from './chunking/chunk-id.js';
export { tokenize, type Token } from './chunking/tokenizer.js';
export { parseScrapedRecord, documentSlug, ScrapedRecordSchema, type ScrapedRecord } from './documents/document.js';

export { embedInBatches, assertUsableEmbedding, type EmbeddingProvider } from './embeddings/embedding.js';
export { HashEmbeddingProvider } from './embeddings/hash-embeddings.js';
export { CachedEmbeddingProvider, type CachedEmbeddingOptions } from './embeddings/cached-embeddings.js';
export { AiSdkEmbeddingProvider } from './providers/ai-sdk/ai-sdk-embeddings.js';
export { OllamaEmbeddingProvider } from './providers/ollama/ollama-embeddings.js';
export type { OllamaProviderConfig, AiSdkProviderConfig } from './providers/provider-config.js';

export type { IndexBackend } from './index/index-backend.js';
export { FlatIndexBackend, type FlatIndexOptions } from './index/flat-index-backend.js';
export { SqliteIndexBackend, type SqliteIndexOptions } from './index/sqlite-index-backend.js';
export { openIndexBackend, collectionPaths, type BackendChoice, type OpenIndexOptions } from './index/open-index.js';
export { cosine } from './index/similarity.js';

export { Logger, LogLevel, logger, type LogContext } from './utils/logger.js';

import type { Passage, RecordFilter, SearchHit } from '../core/types.js';
import { EmbeddingUnavailableError } from '../core/errors.js';
import type { EventBus } from '../core/event-bus.js';
import { embedInBatches, type EmbeddingProvider } from '../embeddings/embedding.js';
import { assertTopK, type IndexBackend } from '../index/index-backend.js';

export interface QueryEngineOptions {
  defaultTopK?: number;
  events?: EventBus;
}

export function toPassage(hit: SearchHit): Passage {
  const m = hit.metadata;
  return {
    chunkId: hit.chunkId,
    text: m.text,
    subjectName: m.subjectName,
    sectionKind: m.sectionKind,
    score: hit.score,
    sourceUrl: m.sourceUrl,
    documentId: m.documentId,
    sequenceIndex: m.sequenceIndex,
    charSpan: { ...m.charSpan },
  };
}

export class QueryEngine {
  readonly defaultTopK: number;

  constructor(
    private readonly index: IndexBackend,
    private readonly embedder: EmbeddingProvider,
    private readonly opts: QueryEngineOptions = {},
  ) {
    this.defaultTopK = opts.defaultTopK ?? 3;
  }

  /** Ranked passages for `text`; an empty index or an unmatched filter yields `[]`. */
  async query(text: string, topK: number = this.defaultTopK, filter: RecordFilter = {}): Promise<Passage[]> {
    assertTopK(topK);
    if (!text.trim()) throw new EmbeddingUnavailableError(this.embedder.id, 'query text is empty');

    this.opts.events?.emit({ type: 'retrieval_query', query: text, topK, filter, at: Date.now() });
    const [vector] = await embedInBatches(this.embedder, [text], 1);
    const hits = await this.index.search(vector ?? [], topK, filter);
    const passages = hits.map(toPassage);
    this.opts.events?.emit({ type: 'retrieval_results', query: text, topK, resultCount: passages.length, at: Date.now() });
    return passages;
  }
}

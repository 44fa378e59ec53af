import type { EmbeddingProvider } from '../../embeddings/embedding.js';
import type { OllamaProviderConfig } from '../provider-config.js';
import { EmbeddingUnavailableError } from '../../core/errors.js';

type OllamaClient = import('ollama').Ollama;

export class OllamaEmbeddingProvider implements EmbeddingProvider {
  readonly id = 'ollama';
  private clientPromise: Promise<OllamaClient> | null = null;

  constructor(private readonly cfg: OllamaProviderConfig, private readonly embeddingModel: string) {}

  async embed(texts: string[]): Promise<number[][]> {
    if (texts.some((t) => !t.trim())) throw new EmbeddingUnavailableError(this.id, 'cannot embed blank text');
    const client = await this.getClient();
    const res = await client.embed({ model: this.embeddingModel, input: texts }).catch((e: unknown) => {
      throw new EmbeddingUnavailableError(this.id, `embed call failed for model ${this.embeddingModel}`, e);
    });
    if (!Array.isArray(res.embeddings) || res.embeddings.length !== texts.length) {
      throw new EmbeddingUnavailableError(this.id, 'unexpected embed response');
    }
    return res.embeddings;
  }

  private getClient(): Promise<OllamaClient> {
    this.clientPromise ??= import('ollama')
      .then((mod) => new mod.Ollama({ host: this.cfg.host }))
      .catch((e: unknown) => {
        this.clientPromise = null;
        throw new EmbeddingUnavailableError(this.id, 'Install `ollama`', e);
      });
    return this.clientPromise;
  }
}

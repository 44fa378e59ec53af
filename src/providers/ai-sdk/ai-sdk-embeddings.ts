import type { EmbeddingProvider } from '../../embeddings/embedding.js';
import type { AiSdkProviderConfig } from '../provider-config.js';
import { EmbeddingUnavailableError } from '../../core/errors.js';

/**
 * Embeddings through the AI SDK. `embeddingModel` is an OpenAI model id, optionally prefixed with `openai/`.
 */
export class AiSdkEmbeddingProvider implements EmbeddingProvider {
  readonly id = 'ai-sdk';

  constructor(private readonly cfg: AiSdkProviderConfig, private readonly embeddingModel: string) {}

  async embed(texts: string[]): Promise<number[][]> {
    if (texts.some((t) => !t.trim())) throw new EmbeddingUnavailableError(this.id, 'cannot embed blank text');
    const [ai, openaiMod] = await Promise.all([import('ai'), import('@ai-sdk/openai')]).catch((e: unknown) => {
      throw new EmbeddingUnavailableError(this.id, 'Install `ai` and `@ai-sdk/openai`', e);
    });
    const openai = openaiMod.createOpenAI({ apiKey: this.cfg.openaiApiKey, baseURL: this.cfg.openaiBaseUrl });
    const model = openai.embedding(this.embeddingModel.replace(/^openai\//, ''));
    try {
      const res = await ai.embedMany({ model, values: texts });
      return res.embeddings;
    } catch (e) {
      throw new EmbeddingUnavailableError(this.id, `embedMany failed for ${this.embeddingModel}`, e);
    }
  }
}

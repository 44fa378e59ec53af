import { z } from 'zod';
import { ConfigError } from '../core/errors.js';

const positiveInt = z.coerce.number().int().positive();

export const ChunkerConfigSchema = z
  .object({
    windowSize: positiveInt.default(200),
    overlap: z.coerce.number().int().nonnegative().default(50),
    minChunkTokens: z.coerce.number().int().nonnegative().default(20),
  })
  .refine((c) => c.overlap < c.windowSize, { message: 'overlap must be smaller than windowSize', path: ['overlap'] });

export const EmbeddingConfigSchema = z.object({
  provider: z.enum(['hash', 'ollama', 'ai-sdk']).default('hash'),
  /** Model id for ollama / ai-sdk. */
  model: z.string().min(1).optional(),
  host: z.string().url().optional(),
  apiKey: z.string().min(1).optional(),
  baseUrl: z.string().url().optional(),
  /** Vector size of the hash provider. */
  dimension: positiveInt.default(256),
  batchSize: positiveInt.default(32),
});

export const PipelineConfigSchema = z.object({
  backend: z.enum(['auto', 'sqlite', 'flat']).default('auto'),
  /** `null` keeps the index in memory. */
  dataDir: z.string().min(1).nullable().default('.retrieval'),
  collection: z
    .string()
    .regex(/^[A-Za-z0-9_-]+$/, 'collection may only contain letters, digits, "_" and "-"')
    .default('subjects'),
  defaultTopK: positiveInt.default(3),
  queryCacheSize: positiveInt.default(256),
  chunker: ChunkerConfigSchema.default({}),
  embedding: EmbeddingConfigSchema.default({}),
});

export type PipelineConfig = z.infer<typeof PipelineConfigSchema>;
export type PipelineConfigInput = z.input<typeof PipelineConfigSchema>;

type Env = Record<string, string | undefined>;

function fromEnv(env: Env): Record<string, unknown> {
  const pick = (key: string): string | undefined => {
    const v = env[key]?.trim();
    return v ? v : undefined;
  };
  const defined = (obj: Record<string, unknown>): Record<string, unknown> =>
    Object.fromEntries(Object.entries(obj).filter(([, v]) => v !== undefined));

  return defined({
    backend: pick('RETRIEVAL_BACKEND'),
    dataDir: pick('RETRIEVAL_DATA_DIR'),
    collection: pick('RETRIEVAL_COLLECTION'),
    defaultTopK: pick('RETRIEVAL_TOP_K'),
    chunker: defined({
      windowSize: pick('RETRIEVAL_WINDOW_SIZE'),
      overlap: pick('RETRIEVAL_OVERLAP'),
      minChunkTokens: pick('RETRIEVAL_MIN_CHUNK_TOKENS'),
    }),
    embedding: defined({
      provider: pick('EMBEDDING_PROVIDER'),
      model: pick('EMBEDDING_MODEL'),
      host: pick('OLLAMA_HOST'),
      apiKey: pick('OPENAI_API_KEY'),
      baseUrl: pick('OPENAI_BASE_URL'),
      dimension: pick('EMBEDDING_DIMENSION'),
      batchSize: pick('EMBEDDING_BATCH_SIZE'),
    }),
  });
}

function isPlainObject(v: unknown): v is Record<string, unknown> {
  return typeof v === 'object' && v !== null && !Array.isArray(v);
}

function merge(base: Record<string, unknown>, over: Record<string, unknown>): Record<string, unknown> {
  const out: Record<string, unknown> = { ...base };
  for (const [k, v] of Object.entries(over)) {
    if (v === undefined) continue;
    const prev = out[k];
    out[k] = isPlainObject(prev) && isPlainObject(v) ? merge(prev, v) : v;
  }
  return out;
}

/**
 * Resolves the pipeline config: defaults, then environment variables, then explicit overrides.
 */
export function loadPipelineConfig(overrides: PipelineConfigInput = {}, env: Env = process.env): PipelineConfig {
  const parsed = PipelineConfigSchema.safeParse(merge(fromEnv(env), { ...overrides }));
  if (!parsed.success) {
    const detail = parsed.error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`).join('; ');
    throw new ConfigError(detail, parsed.error);
  }
  const config = parsed.data;
  if (config.embedding.provider !== 'hash' && !config.embedding.model) {
    throw new ConfigError(`embedding.model is required for provider "${config.embedding.provider}"`);
  }
  return config;
}

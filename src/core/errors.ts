export class RetrievalError extends Error {
  constructor(message: string, cause?: unknown) {
    super(message, cause ? { cause } : undefined);
    this.name = 'RetrievalError';
  }
}

/** Malformed document or chunker config. Callers skip the document and carry on. */
export class ChunkingError extends RetrievalError {
  constructor(detail: string, readonly documentId?: string) {
    super(`Cannot chunk${documentId ? ` document ${documentId}` : ' document'}: ${detail}`);
    this.name = 'ChunkingError';
  }
}

export class EmbeddingUnavailableError extends RetrievalError {
  constructor(provider: string, detail?: string, cause?: unknown) {
    super(`Embedding unavailable: ${provider}${detail ? ` (${detail})` : ''}`, cause);
    this.name = 'EmbeddingUnavailableError';
  }
}

/** No index backend could be opened. Fatal at startup. */
export class IndexUnavailableError extends RetrievalError {
  constructor(backend: string, detail?: string, cause?: unknown) {
    super(`Index backend unavailable: ${backend}${detail ? ` (${detail})` : ''}`, cause);
    this.name = 'IndexUnavailableError';
  }
}

export class IndexWriteError extends RetrievalError {
  constructor(operation: string, detail?: string, cause?: unknown) {
    super(`Index write failed: ${operation}${detail ? ` (${detail})` : ''}`, cause);
    this.name = 'IndexWriteError';
  }
}

export class InvalidQueryError extends RetrievalError {
  constructor(detail: string) {
    super(`Invalid query: ${detail}`);
    this.name = 'InvalidQueryError';
  }
}

export class ConfigError extends RetrievalError {
  constructor(detail: string, cause?: unknown) {
    super(`Invalid configuration: ${detail}`, cause);
    this.name = 'ConfigError';
  }
}

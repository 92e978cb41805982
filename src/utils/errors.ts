/**
 * Error taxonomy shared by the pipeline, the index and the HTTP layer.
 *
 * EmbeddingUnavailable and GenerationUnavailable are recovered where they occur;
 * InvalidArgument rejects the offending call; StoreUnavailable aborts a run.
 */

export type PipelineErrorCode =
  | 'EMBEDDING_UNAVAILABLE'
  | 'GENERATION_UNAVAILABLE'
  | 'INVALID_ARGUMENT'
  | 'STORE_UNAVAILABLE';

export class PipelineError extends Error {
  readonly code: PipelineErrorCode;
  readonly status: number;

  constructor(code: PipelineErrorCode, status: number, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
    this.status = status;
  }
}

export class EmbeddingUnavailable extends PipelineError {
  constructor(message = 'Embedding provider unavailable', options?: { cause?: unknown }) {
    super('EMBEDDING_UNAVAILABLE', 503, message, options);
  }
}

export class GenerationUnavailable extends PipelineError {
  constructor(message = 'Text generation unavailable', options?: { cause?: unknown }) {
    super('GENERATION_UNAVAILABLE', 503, message, options);
  }
}

export class InvalidArgument extends PipelineError {
  constructor(message: string) {
    super('INVALID_ARGUMENT', 400, message);
  }
}

export class StoreUnavailable extends PipelineError {
  constructor(message = 'Article store unavailable', options?: { cause?: unknown }) {
    super('STORE_UNAVAILABLE', 503, message, options);
  }
}

export function isPipelineError(error: unknown): error is PipelineError {
  return error instanceof PipelineError;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

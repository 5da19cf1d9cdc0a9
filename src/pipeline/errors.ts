/**
 * Error taxonomy for the ingestion pipeline and query path
 */

export type BackendName = 'probe' | 'decoder' | 'transcription' | 'diarization' | 'embedding' | 'store';

/**
 * Base class for all pipeline errors
 */
export class PipelineError extends Error {
  code: string;
  retryable: boolean;
  details?: Record<string, unknown>;

  constructor(message: string, code: string, retryable: boolean, details?: Record<string, unknown>) {
    super(message);
    this.name = 'PipelineError';
    this.code = code;
    this.retryable = retryable;
    this.details = details;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  toString(): string {
    const parts = [`${this.name}: ${this.message}`];
    parts.push(`(code: ${this.code})`);
    if (this.retryable) {
      parts.push('(retryable)');
    }
    return parts.join(' ');
  }
}

/**
 * Quota, network or process failures of an external backend. Retried with backoff.
 */
export class TransientBackendError extends PipelineError {
  backend: BackendName;

  constructor(message: string, backend: BackendName, code = 'TRANSIENT_BACKEND', details?: Record<string, unknown>) {
    super(message, code, true, details);
    this.name = 'TransientBackendError';
    this.backend = backend;
  }
}

export class BackendUnavailableError extends TransientBackendError {
  constructor(message: string, backend: BackendName, details?: Record<string, unknown>) {
    super(message, backend, 'BACKEND_UNAVAILABLE', details);
    this.name = 'BackendUnavailableError';
  }
}

export class BackendTimeoutError extends TransientBackendError {
  timeoutMs: number;

  constructor(message: string, backend: BackendName, timeoutMs: number) {
    super(message, backend, 'BACKEND_TIMEOUT', { timeoutMs });
    this.name = 'BackendTimeoutError';
    this.timeoutMs = timeoutMs;
  }
}

/**
 * The index transaction for a media item was rolled back.
 */
export class StoreWriteError extends TransientBackendError {
  constructor(message: string, mediaId: string) {
    super(message, 'store', 'STORE_WRITE', { mediaId });
    this.name = 'StoreWriteError';
  }
}

/**
 * Corrupt or unsupported input. Never retried.
 */
export class PermanentInputError extends PipelineError {
  constructor(message: string, code = 'PERMANENT_INPUT', details?: Record<string, unknown>) {
    super(message, code, false, details);
    this.name = 'PermanentInputError';
  }
}

export class UnsupportedFormatError extends PermanentInputError {
  path: string;
  backend: BackendName;

  constructor(message: string, path: string, backend: BackendName = 'probe') {
    super(message, 'UNSUPPORTED_FORMAT', { path, backend });
    this.name = 'UnsupportedFormatError';
    this.path = path;
    this.backend = backend;
  }
}

export class InvalidQueryError extends PermanentInputError {
  constructor(message: string) {
    super(message, 'INVALID_QUERY');
    this.name = 'InvalidQueryError';
  }
}

/**
 * Systemic misconfiguration. Halts the whole run instead of failing one item.
 */
export class ConfigurationError extends PipelineError {
  constructor(message: string, code = 'CONFIGURATION', details?: Record<string, unknown>) {
    super(message, code, false, details);
    this.name = 'ConfigurationError';
  }
}

export class DimensionMismatchError extends ConfigurationError {
  constructor(expected: number, actual: number, model: string) {
    super(
      `Embedding dimension mismatch for model ${model}: expected ${expected}, got ${actual}`,
      'DIMENSION_MISMATCH',
      { expected, actual, model }
    );
    this.name = 'DimensionMismatchError';
  }
}

export class ModelMismatchError extends ConfigurationError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'MODEL_MISMATCH', details);
    this.name = 'ModelMismatchError';
  }
}

/**
 * An internal invariant was violated. The item fails; nothing is corrected silently.
 */
export class ConsistencyError extends PipelineError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'CONSISTENCY', false, details);
    this.name = 'ConsistencyError';
  }
}

/**
 * Work was cancelled by shutdown. The item returns to its last checkpoint.
 */
export class CancelledError extends PipelineError {
  constructor(message = 'Operation cancelled') {
    super(message, 'CANCELLED', true);
    this.name = 'CancelledError';
  }
}

export function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}

/**
 * Whether a failed item may be picked up again by a later run.
 */
export function isRetryable(e: unknown): boolean {
  if (e instanceof PipelineError) return e.retryable;
  // Unknown errors are treated as transient; invariant and input failures are typed.
  return true;
}

export function errorCode(e: unknown): string {
  return e instanceof PipelineError ? e.code : 'UNKNOWN';
}

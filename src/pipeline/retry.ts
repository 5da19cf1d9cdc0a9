/**
 * Retry with exponential backoff, and watchdog timeouts for backend calls
 */

import {
  BackendTimeoutError,
  CancelledError,
  TransientBackendError,
  type BackendName,
} from './errors';

export interface RetryConfig {
  /** Maximum number of retry attempts */
  maxRetries: number;
  /** Initial delay between retries in milliseconds */
  initialDelay: number;
  /** Maximum delay between retries in milliseconds */
  maxDelay: number;
  /** Exponential backoff base */
  exponentialBase: number;
  /** Add random jitter to delays */
  jitter: boolean;
}

export const DEFAULT_RETRY_CONFIG: RetryConfig = {
  maxRetries: 2,
  initialDelay: 1000,
  maxDelay: 60000,
  exponentialBase: 2,
  jitter: true,
};

export interface RetryHooks {
  signal?: AbortSignal;
  onRetry?: (attempt: number, error: TransientBackendError, delayMs: number) => void;
}

export function calculateDelay(attempt: number, config: RetryConfig): number {
  let delay = Math.min(
    config.initialDelay * Math.pow(config.exponentialBase, attempt),
    config.maxDelay
  );

  if (config.jitter) {
    // equal jitter: between 50% and 100% of the delay
    delay = delay * (0.5 + Math.random() * 0.5);
  }

  return delay;
}

export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(new CancelledError());
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      reject(new CancelledError());
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

/**
 * Execute fn, retrying TransientBackendError only. Everything else propagates at once.
 */
export async function withRetry<T>(
  fn: (attempt: number) => Promise<T>,
  config: RetryConfig = DEFAULT_RETRY_CONFIG,
  hooks: RetryHooks = {}
): Promise<T> {
  const { signal, onRetry } = hooks;
  for (let attempt = 0; ; attempt++) {
    if (signal?.aborted) throw new CancelledError();
    try {
      return await fn(attempt);
    } catch (error) {
      if (signal?.aborted) throw new CancelledError();
      if (!(error instanceof TransientBackendError) || attempt >= config.maxRetries) {
        throw error;
      }
      const delay = calculateDelay(attempt, config);
      onRetry?.(attempt + 1, error, delay);
      await sleep(delay, signal);
    }
  }
}

/**
 * Run fn with a child signal that aborts on parent abort or after timeoutMs (0 disables the watchdog).
 * A watchdog expiry becomes BackendTimeoutError, a parent abort CancelledError.
 */
export async function withTimeout<T>(
  fn: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number,
  backend: BackendName,
  parent?: AbortSignal
): Promise<T> {
  const controller = new AbortController();
  let timedOut = false;
  let timeoutHandle: NodeJS.Timeout | null = null;
  let rejectAbort: (e: Error) => void = () => undefined;
  const aborted = new Promise<never>((_, reject) => {
    rejectAbort = reject;
  });
  // the race below may settle first; keep the loser from surfacing as unhandled
  aborted.catch(() => undefined);

  const onParentAbort = () => {
    controller.abort();
    rejectAbort(new CancelledError());
  };
  if (parent?.aborted) throw new CancelledError();
  parent?.addEventListener('abort', onParentAbort, { once: true });

  if (timeoutMs > 0) {
    timeoutHandle = setTimeout(() => {
      timedOut = true;
      controller.abort();
      rejectAbort(new BackendTimeoutError(`${backend} call exceeded ${timeoutMs}ms`, backend, timeoutMs));
    }, timeoutMs);
  }

  try {
    return await Promise.race([fn(controller.signal), aborted]);
  } catch (e) {
    if (timedOut) throw new BackendTimeoutError(`${backend} call exceeded ${timeoutMs}ms`, backend, timeoutMs);
    if (parent?.aborted) throw new CancelledError();
    throw e;
  } finally {
    if (timeoutHandle) clearTimeout(timeoutHandle);
    parent?.removeEventListener('abort', onParentAbort);
  }
}

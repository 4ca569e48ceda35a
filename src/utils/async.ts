import { StorageUnavailableError, TurnCancelledError } from './errors.js';

export interface TimeoutOptions {
  timeoutMs: number;
  signal?: AbortSignal;
  onTimeout: () => Error;
}

/**
 * Runs `operation` with its own AbortSignal that fires when the caller's signal
 * aborts or `timeoutMs` elapses. The returned promise always settles: a timeout
 * rejects with `onTimeout()`, a caller abort with TurnCancelledError, even if the
 * operation itself ignores its signal.
 */
export async function withTimeout<T>(
  operation: (signal: AbortSignal) => Promise<T>,
  options: TimeoutOptions
): Promise<T> {
  if (options.signal?.aborted) {
    throw new TurnCancelledError();
  }

  const controller = new AbortController();
  let timer: NodeJS.Timeout | undefined;
  let onCallerAbort: (() => void) | undefined;

  const guard = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      controller.abort();
      reject(options.onTimeout());
    }, options.timeoutMs);

    onCallerAbort = () => {
      controller.abort();
      reject(new TurnCancelledError());
    };
    options.signal?.addEventListener('abort', onCallerAbort, { once: true });
  });

  try {
    return await Promise.race([operation(controller.signal), guard]);
  } finally {
    clearTimeout(timer);
    if (onCallerAbort) {
      options.signal?.removeEventListener('abort', onCallerAbort);
    }
  }
}

/**
 * Calls `fn` and, when it fails with an error `shouldRetry` accepts, calls it
 * again up to `retries` more times. Only for idempotent operations.
 */
export async function withRetry<T>(
  fn: () => Promise<T>,
  shouldRetry: (error: unknown) => boolean,
  retries = 1
): Promise<T> {
  for (let attempt = 0; ; attempt++) {
    try {
      return await fn();
    } catch (error) {
      if (attempt >= retries || !shouldRetry(error)) {
        throw error;
      }
    }
  }
}

export interface StorageCallOptions {
  timeoutMs: number;
  signal?: AbortSignal;
  // Reads may be retried once; writes never are.
  idempotent: boolean;
}

/**
 * Runs one Task Store or Conversation Log call under the storage timeout.
 * A timeout surfaces as StorageUnavailableError.
 */
export function storageCall<T>(call: () => Promise<T>, options: StorageCallOptions): Promise<T> {
  const attempt = (): Promise<T> =>
    withTimeout(() => call(), {
      timeoutMs: options.timeoutMs,
      signal: options.signal,
      onTimeout: () => new StorageUnavailableError(`Storage did not answer within ${options.timeoutMs}ms`),
    });
  if (!options.idempotent) {
    return attempt();
  }
  return withRetry(attempt, (error) => error instanceof StorageUnavailableError);
}

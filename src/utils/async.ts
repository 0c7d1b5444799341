/**
 * Async Utilities
 */

export interface WithTimeoutOptions {
  /** Names the operation in the error message */
  context?: string;
  /** Rejects with the signal's reason as soon as it aborts */
  signal?: AbortSignal;
}

/**
 * Thrown when an operation wrapped in withTimeout() does not settle in time.
 */
export class TimeoutError extends Error {
  readonly timeoutMs: number;

  constructor(timeoutMs: number, context?: string) {
    super(
      context ? `Timeout after ${timeoutMs}ms: ${context}` : `Operation timed out after ${timeoutMs}ms`
    );
    this.name = 'TimeoutError';
    this.timeoutMs = timeoutMs;
  }
}

/**
 * Race a promise against a timer and, when given, an abort signal. A
 * non-positive or missing timeout leaves only the signal in the race.
 *
 * @example
 * const vector = await withTimeout(embedding.embed(query), 4000, { context: 'query embedding' });
 */
export async function withTimeout<T>(
  promise: Promise<T>,
  timeoutMs?: number,
  options?: WithTimeoutOptions
): Promise<T> {
  const signal = options?.signal;
  const timed = timeoutMs !== undefined && Number.isFinite(timeoutMs) && timeoutMs > 0;
  if (!timed && !signal) {
    return promise;
  }

  let timeoutId: ReturnType<typeof setTimeout> | undefined;
  let onAbort: (() => void) | undefined;
  const contenders: Promise<T>[] = [promise];

  if (timed) {
    contenders.push(
      new Promise<T>((_, reject) => {
        timeoutId = setTimeout(() => {
          reject(new TimeoutError(timeoutMs, options?.context));
        }, timeoutMs);
      })
    );
  }
  if (signal) {
    contenders.push(
      new Promise<T>((_, reject) => {
        const abort = () => reject(signal.reason);
        onAbort = abort;
        if (signal.aborted) abort();
        else signal.addEventListener('abort', abort, { once: true });
      })
    );
  }

  try {
    return await Promise.race(contenders);
  } finally {
    if (timeoutId !== undefined) clearTimeout(timeoutId);
    if (signal && onAbort) signal.removeEventListener('abort', onAbort);
  }
}

import { logDispatch } from "../logging.js";

export class TimeoutError extends Error {
  constructor(
    public readonly label: string,
    public readonly ms: number,
  ) {
    super(`${label} timed out after ${ms}ms`);
    this.name = "TimeoutError";
  }
}

/**
 * Wrap a promise with a timeout.
 * The underlying work is not killed; when a controller is given it is
 * aborted so SDKs that honour AbortSignal can stop early.
 * @param promise The promise to await
 * @param ms Timeout in milliseconds
 * @param label Label for error message
 * @param controller Aborted when the timeout fires
 * @returns Result of the promise
 */
export async function withTimeout<T>(
  promise: Promise<T>,
  ms: number,
  label: string = "operation",
  controller?: AbortController,
): Promise<T> {
  let timer: ReturnType<typeof setTimeout> | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      controller?.abort();
      reject(new TimeoutError(label, ms));
    }, ms);
  });
  try {
    return await Promise.race([promise, timeout]);
  } finally {
    if (timer !== undefined) clearTimeout(timer);
  }
}

export interface RetryOptions {
  retries?: number;
  delayMs?: number;
  label?: string;
  /** Return false to fail immediately without further attempts */
  shouldRetry?: (err: Error) => boolean;
}

/**
 * Retry an async operation with linear backoff (delayMs, 2·delayMs, ...).
 * @param fn Async function to retry
 * @param opts Retry options
 * @returns Result of the function
 */
export async function withRetry<T>(fn: () => Promise<T>, opts: RetryOptions = {}): Promise<T> {
  const { retries = 1, delayMs = 500, label = "operation", shouldRetry = () => true } = opts;
  for (let attempt = 0; ; attempt++) {
    try {
      return await fn();
    } catch (e: unknown) {
      const err = e instanceof Error ? e : new Error(String(e));
      if (attempt >= retries || !shouldRetry(err)) throw err;
      const wait = delayMs * (attempt + 1);
      logDispatch.warn(`${label} attempt ${attempt + 1} failed, retrying in ${wait}ms: ${err.message}`);
      await new Promise((r) => setTimeout(r, wait));
    }
  }
}

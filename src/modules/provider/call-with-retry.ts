import { QueryAbortedError } from "../errors.js";

export interface CallWithRetryOptions {
  timeoutMs: number;
  retries?: number;
  retryDelayMs?: number;
  isTransient?: (error: unknown) => boolean;
  signal?: AbortSignal;
  delay?: (ms: number) => Promise<void>;
}

export class ProviderTimeoutError extends Error {
  constructor(timeoutMs: number) {
    super(`Provider call timed out after ${timeoutMs}ms.`);
    this.name = "ProviderTimeoutError";
  }
}

const DEFAULT_RETRIES = 1;
const DEFAULT_RETRY_DELAY_MS = 300;

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

async function withTimeout<T>(
  operation: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number,
  callerSignal?: AbortSignal
): Promise<T> {
  const controller = new AbortController();
  let timedOut = false;
  const timeoutHandle = setTimeout(() => {
    timedOut = true;
    controller.abort();
  }, timeoutMs);
  const onCallerAbort = () => controller.abort();
  callerSignal?.addEventListener("abort", onCallerAbort, { once: true });

  try {
    return await operation(controller.signal);
  } catch (error) {
    if (callerSignal?.aborted) {
      throw new QueryAbortedError();
    }
    if (timedOut) {
      throw new ProviderTimeoutError(timeoutMs);
    }
    throw error;
  } finally {
    clearTimeout(timeoutHandle);
    callerSignal?.removeEventListener("abort", onCallerAbort);
  }
}

/**
 * Runs a provider call under a per-attempt timeout. Transient failures get
 * `retries` more attempts; caller aborts are never retried.
 */
export async function callWithRetry<T>(
  operation: (signal: AbortSignal) => Promise<T>,
  options: CallWithRetryOptions
): Promise<T> {
  const retries = Math.max(0, options.retries ?? DEFAULT_RETRIES);
  const retryDelayMs = options.retryDelayMs ?? DEFAULT_RETRY_DELAY_MS;
  const isTransient = options.isTransient ?? (() => true);
  const delay = options.delay ?? sleep;

  for (let attempt = 0; ; attempt += 1) {
    if (options.signal?.aborted) {
      throw new QueryAbortedError();
    }
    try {
      return await withTimeout(operation, options.timeoutMs, options.signal);
    } catch (error) {
      if (error instanceof QueryAbortedError) {
        throw error;
      }
      const retryable = error instanceof ProviderTimeoutError || isTransient(error);
      if (!retryable || attempt >= retries) {
        throw error;
      }
      await delay(retryDelayMs * (attempt + 1));
    }
  }
}

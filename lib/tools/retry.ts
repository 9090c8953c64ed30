import { debugLog } from "@/lib/utils/debugLog";

export type RetryOptions = {
  maxAttempts?: number;
  initialDelayMs?: number;
  factor?: number;
  /** Decide si el error admite otro intento. Por defecto: siempre. */
  shouldRetry?: (err: unknown) => boolean;
  signal?: AbortSignal;
  sleep?: (ms: number) => Promise<void>;
};

const defaultSleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

/** Reintento con backoff exponencial: 1s, 2s, 4s… hasta `maxAttempts` intentos. */
export async function retryWithBackoff<T>(fn: (attempt: number) => Promise<T>, opts: RetryOptions = {}): Promise<T> {
  const maxAttempts = opts.maxAttempts ?? 3;
  const factor = opts.factor ?? 2;
  const sleep = opts.sleep ?? defaultSleep;
  let delay = opts.initialDelayMs ?? 1000;

  for (let attempt = 1; ; attempt++) {
    opts.signal?.throwIfAborted();
    try {
      return await fn(attempt);
    } catch (err) {
      const retryable = opts.shouldRetry ? opts.shouldRetry(err) : true;
      if (!retryable || attempt >= maxAttempts || opts.signal?.aborted) throw err;
      debugLog(`[retry] intento ${attempt}/${maxAttempts} falló, reintento en ${delay}ms`);
      await sleep(delay);
      delay *= factor;
    }
  }
}

/**
 * fetch with a fixed-delay retry policy.
 *
 * An attempt is retried when fetch throws or the server answers 429 / 5xx.
 * Any other response is handed straight back to the caller. If every
 * attempt threw, the call rejects with TransientNetworkError; if the last
 * attempt produced a response, that response is returned whatever its status.
 */

import { TransientNetworkError, toError } from '../core/index.js';

export interface RetryPolicy {
  /** Total number of attempts, including the first. */
  attempts: number;
  /** Delay between attempts. */
  delayMs: number;
}

/** Billing API calls. */
export const REGISTRY_RETRY: RetryPolicy = { attempts: 3, delayMs: 250 };

/** Local tunnel inspection API, which may still be booting. */
export const LOCAL_API_RETRY: RetryPolicy = { attempts: 5, delayMs: 1_000 };

export function isRetryableStatus(status: number): boolean {
  return status === 429 || status >= 500;
}

export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    if (ms <= 0 || signal?.aborted) {
      resolve();
      return;
    }
    const timer = setTimeout(done, ms);
    function done(): void {
      clearTimeout(timer);
      signal?.removeEventListener('abort', done);
      resolve();
    }
    signal?.addEventListener('abort', done, { once: true });
  });
}

export async function fetchWithRetry(
  url: string,
  init: RequestInit,
  policy: RetryPolicy,
): Promise<Response> {
  const attempts = Math.max(1, policy.attempts);
  let lastError: Error | undefined;

  for (let attempt = 1; attempt <= attempts; attempt++) {
    try {
      const response = await fetch(url, init);
      if (!isRetryableStatus(response.status) || attempt === attempts) {
        return response;
      }
      lastError = undefined;
    } catch (err) {
      lastError = toError(err);
    }

    if (attempt < attempts) {
      await sleep(policy.delayMs);
    }
  }

  throw new TransientNetworkError(url, attempts, lastError);
}

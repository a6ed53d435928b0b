import { vi } from 'vitest';
import { TransientNetworkError } from '../core/index.js';
import { fetchWithRetry, isRetryableStatus, sleep, REGISTRY_RETRY, LOCAL_API_RETRY } from './http.js';

const originalFetch = globalThis.fetch;

afterEach(() => {
  globalThis.fetch = originalFetch;
  vi.restoreAllMocks();
});

const NO_DELAY = { attempts: 3, delayMs: 0 };

describe('retry policies', () => {
  it('registry calls make 3 attempts 250ms apart', () => {
    expect(REGISTRY_RETRY).toEqual({ attempts: 3, delayMs: 250 });
  });

  it('local API calls make 5 attempts 1s apart', () => {
    expect(LOCAL_API_RETRY).toEqual({ attempts: 5, delayMs: 1_000 });
  });
});

describe('isRetryableStatus', () => {
  it('retries 429 and 5xx only', () => {
    expect(isRetryableStatus(429)).toBe(true);
    expect(isRetryableStatus(500)).toBe(true);
    expect(isRetryableStatus(503)).toBe(true);
    expect(isRetryableStatus(404)).toBe(false);
    expect(isRetryableStatus(201)).toBe(false);
  });
});

describe('fetchWithRetry', () => {
  it('returns the first non-retryable response', async () => {
    const fetchMock = vi.fn(async () => new Response('{}', { status: 201 }));
    globalThis.fetch = fetchMock;

    const response = await fetchWithRetry('https://api.test/webhooks', { method: 'POST' }, NO_DELAY);

    expect(response.status).toBe(201);
    expect(fetchMock).toHaveBeenCalledTimes(1);
  });

  it('does not retry client errors', async () => {
    const fetchMock = vi.fn(async () => new Response(null, { status: 404 }));
    globalThis.fetch = fetchMock;

    const response = await fetchWithRetry('https://api.test/webhooks/1', { method: 'DELETE' }, NO_DELAY);

    expect(response.status).toBe(404);
    expect(fetchMock).toHaveBeenCalledTimes(1);
  });

  it('retries server errors and returns the last response', async () => {
    const fetchMock = vi.fn(async () => new Response(null, { status: 500 }));
    globalThis.fetch = fetchMock;

    const response = await fetchWithRetry('https://api.test/webhooks', { method: 'POST' }, NO_DELAY);

    expect(response.status).toBe(500);
    expect(fetchMock).toHaveBeenCalledTimes(3);
  });

  it('recovers when a later attempt succeeds', async () => {
    const fetchMock = vi
      .fn()
      .mockRejectedValueOnce(new Error('ECONNRESET'))
      .mockResolvedValueOnce(new Response(null, { status: 503 }))
      .mockResolvedValueOnce(new Response(null, { status: 204 }));
    globalThis.fetch = fetchMock;

    const response = await fetchWithRetry('https://api.test/webhooks/1', { method: 'DELETE' }, NO_DELAY);

    expect(response.status).toBe(204);
    expect(fetchMock).toHaveBeenCalledTimes(3);
  });

  it('throws TransientNetworkError when every attempt throws', async () => {
    globalThis.fetch = vi.fn(async () => {
      throw new Error('ECONNREFUSED');
    });

    const promise = fetchWithRetry('http://localhost:4040/api/tunnels', {}, { attempts: 5, delayMs: 0 });

    await expect(promise).rejects.toBeInstanceOf(TransientNetworkError);
    await expect(promise).rejects.toThrow(
      'Request to http://localhost:4040/api/tunnels failed after 5 attempts: ECONNREFUSED',
    );
  });

  it('waits the policy delay between attempts', async () => {
    const fetchMock = vi
      .fn()
      .mockRejectedValueOnce(new Error('down'))
      .mockResolvedValueOnce(new Response(null, { status: 200 }));
    globalThis.fetch = fetchMock;

    const started = Date.now();
    const response = await fetchWithRetry('https://api.test', {}, { attempts: 2, delayMs: 50 });

    expect(response.status).toBe(200);
    expect(fetchMock).toHaveBeenCalledTimes(2);
    expect(Date.now() - started).toBeGreaterThanOrEqual(45);
  });
});

describe('sleep', () => {
  it('resolves immediately when the signal is already aborted', async () => {
    const controller = new AbortController();
    controller.abort();
    const started = Date.now();
    await sleep(10_000, controller.signal);
    expect(Date.now() - started).toBeLessThan(1_000);
  });

  it('wakes up early when the signal aborts', async () => {
    const controller = new AbortController();
    const pending = sleep(10_000, controller.signal);
    setTimeout(() => controller.abort(), 5);
    await expect(pending).resolves.toBeUndefined();
  });
});

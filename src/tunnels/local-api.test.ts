import { vi } from 'vitest';
import { NoopObserver } from '../observability/noop-observer.js';
import { LocalApiResolver } from './local-api.js';

const originalFetch = globalThis.fetch;

afterEach(() => {
  globalThis.fetch = originalFetch;
  vi.restoreAllMocks();
});

function jsonResponse(data: unknown, status = 200): Response {
  return new Response(JSON.stringify(data), {
    status,
    headers: { 'Content-Type': 'application/json' },
  });
}

const FAST = { attempts: 2, delayMs: 0 };

describe('LocalApiResolver', () => {
  it('returns the first tunnel public URL', async () => {
    const fetchMock = vi.fn(async () =>
      jsonResponse({
        tunnels: [
          { public_url: 'https://abc.ngrok-free.app' },
          { public_url: 'https://other.ngrok-free.app' },
        ],
      }),
    );
    globalThis.fetch = fetchMock;

    const resolver = new LocalApiResolver({ apiUrl: 'http://localhost:4040/api/', retry: FAST });

    expect(await resolver.resolve()).toBe('https://abc.ngrok-free.app');
    expect(fetchMock).toHaveBeenCalledWith('http://localhost:4040/api/tunnels', expect.anything());
  });

  it('returns null while no tunnel is listed', async () => {
    globalThis.fetch = vi.fn(async () => jsonResponse({ tunnels: [] }));

    const resolver = new LocalApiResolver({ retry: FAST });

    expect(await resolver.resolve()).toBeNull();
  });

  it('returns null for a value that is not an http URL', async () => {
    globalThis.fetch = vi.fn(async () => jsonResponse({ tunnels: [{ public_url: 'tcp://0.tcp.ngrok.io:1234' }] }));

    const resolver = new LocalApiResolver({ retry: FAST });

    expect(await resolver.resolve()).toBeNull();
  });

  it('returns null for a malformed body', async () => {
    globalThis.fetch = vi.fn(async () => new Response('not json', { status: 200 }));

    const resolver = new LocalApiResolver({ retry: FAST });

    expect(await resolver.resolve()).toBeNull();
  });

  it('returns null for a non-success status', async () => {
    globalThis.fetch = vi.fn(async () => jsonResponse({ error: 'nope' }, 404));

    const resolver = new LocalApiResolver({ retry: FAST });

    expect(await resolver.resolve()).toBeNull();
  });

  it('warns and returns null when the API is unreachable', async () => {
    const fetchMock = vi.fn(async (): Promise<Response> => {
      throw new TypeError('fetch failed');
    });
    globalThis.fetch = fetchMock;
    const observer = new NoopObserver();
    const warn = vi.spyOn(observer, 'onWarning');

    const resolver = new LocalApiResolver({ retry: FAST, observer });

    expect(await resolver.resolve()).toBeNull();
    expect(fetchMock).toHaveBeenCalledTimes(2);
    expect(warn).toHaveBeenCalledWith('Tunnel inspection API is not reachable yet.', {
      url: 'http://localhost:4040/api/tunnels',
      attempts: 2,
    });
  });

  it('retries a 502 and succeeds once the agent is up', async () => {
    const fetchMock = vi
      .fn(async () => jsonResponse({ tunnels: [{ public_url: 'https://late.ngrok-free.app' }] }))
      .mockResolvedValueOnce(jsonResponse({}, 502));
    globalThis.fetch = fetchMock;

    const resolver = new LocalApiResolver({ retry: FAST });

    expect(await resolver.resolve()).toBe('https://late.ngrok-free.app');
    expect(fetchMock).toHaveBeenCalledTimes(2);
  });
});

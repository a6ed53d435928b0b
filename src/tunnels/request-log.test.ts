import { vi } from 'vitest';
import { RequestLogTail, formatClock, formatRequestLine } from './request-log.js';

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

function request(id: string, status: number | null, date?: string) {
  return {
    id,
    request: { method: 'POST', uri: '/lemon-squeezy/webhook' },
    response:
      status === null
        ? null
        : { status_code: status, headers: date ? { Date: [date] } : {} },
  };
}

describe('formatRequestLine', () => {
  it('pads the uri column with dots and prints the UTC time', () => {
    const line = formatRequestLine({
      id: 'a',
      statusCode: 200,
      method: 'POST',
      uri: '/lemon-squeezy/webhook',
      timestamp: new Date('2026-01-05T14:03:27Z'),
    });

    expect(line).toBe(`200 POST /lemon-squeezy/webhook${'.'.repeat(26)} 14:03:27`);
  });

  it('cuts a long uri at 48 characters', () => {
    const uri = `/${'x'.repeat(60)}`;
    const line = formatRequestLine({ id: 'a', statusCode: 500, method: 'GET', uri, timestamp: null });

    expect(line).toBe(`500 GET /${'x'.repeat(47)} --:--:--`);
  });
});

describe('formatClock', () => {
  it('zero-pads each field', () => {
    expect(formatClock(new Date('2026-01-05T01:02:03Z'))).toBe('01:02:03');
  });

  it('prints a placeholder without a date', () => {
    expect(formatClock(null)).toBe('--:--:--');
  });
});

describe('RequestLogTail', () => {
  it('asks for the most recent requests', async () => {
    const fetchMock = vi.fn(async () => jsonResponse({ requests: [] }));
    globalThis.fetch = fetchMock;

    const tail = new RequestLogTail({ apiUrl: 'http://localhost:4040/api', limit: 10 });
    await tail.poll();

    expect(fetchMock).toHaveBeenCalledWith('http://localhost:4040/api/requests/http?limit=10', expect.anything());
  });

  it('returns each answered request once', async () => {
    globalThis.fetch = vi.fn(async () =>
      jsonResponse({ requests: [request('r1', 200, 'Mon, 05 Jan 2026 14:03:27 GMT'), request('r2', 404)] }),
    );

    const tail = new RequestLogTail();
    const first = await tail.poll();
    const second = await tail.poll();

    expect(first.ok).toBe(true);
    if (!first.ok) return;
    expect(first.value).toEqual([
      {
        id: 'r1',
        statusCode: 200,
        method: 'POST',
        uri: '/lemon-squeezy/webhook',
        timestamp: new Date('2026-01-05T14:03:27Z'),
      },
      { id: 'r2', statusCode: 404, method: 'POST', uri: '/lemon-squeezy/webhook', timestamp: null },
    ]);

    expect(second.ok).toBe(true);
    if (!second.ok) return;
    expect(second.value).toEqual([]);
  });

  it('holds back a request until it has a response', async () => {
    globalThis.fetch = vi
      .fn(async () => jsonResponse({ requests: [request('r1', 201)] }))
      .mockResolvedValueOnce(jsonResponse({ requests: [request('r1', null)] }));

    const tail = new RequestLogTail();
    const pending = await tail.poll();
    const answered = await tail.poll();

    expect(pending.ok && pending.value).toEqual([]);
    expect(answered.ok && answered.value.map((e) => e.id)).toEqual(['r1']);
  });

  it('reads the Date header case-insensitively', async () => {
    globalThis.fetch = vi.fn(async () =>
      jsonResponse({
        requests: [
          {
            id: 'r1',
            request: { method: 'POST', uri: '/' },
            response: { status_code: 200, headers: { date: ['Mon, 05 Jan 2026 09:15:00 GMT'] } },
          },
        ],
      }),
    );

    const result = await new RequestLogTail().poll();

    expect(result.ok && result.value[0]?.timestamp).toEqual(new Date('2026-01-05T09:15:00Z'));
  });

  it('shares the seen set with the caller', async () => {
    globalThis.fetch = vi.fn(async () => jsonResponse({ requests: [request('r1', 200), request('r2', 200)] }));

    const seen = new Set(['r1']);
    const result = await new RequestLogTail({ seen }).poll();

    expect(result.ok && result.value.map((e) => e.id)).toEqual(['r2']);
    expect([...seen]).toEqual(['r1', 'r2']);
  });

  it('treats a null request list as empty', async () => {
    globalThis.fetch = vi.fn(async () => jsonResponse({ requests: null }));

    const result = await new RequestLogTail().poll();

    expect(result.ok && result.value).toEqual([]);
  });

  it('returns an error when the API is unreachable', async () => {
    globalThis.fetch = vi.fn(async (): Promise<Response> => {
      throw new TypeError('fetch failed');
    });

    const result = await new RequestLogTail().poll();

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.message).toBe('fetch failed');
  });

  it('returns an error for a non-success status', async () => {
    globalThis.fetch = vi.fn(async () => jsonResponse({}, 502));

    const result = await new RequestLogTail().poll();

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.message).toBe('Request log returned HTTP 502');
  });
});

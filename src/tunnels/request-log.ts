/**
 * RequestLogTail: live log of the HTTP requests ngrok forwarded.
 *
 * Polls the inspection API's recent-requests endpoint and hands back only
 * the entries not seen before, in the order the API returned them. Entries
 * still waiting for a response are left unseen so they show up once the
 * local app has answered.
 */

import { z } from 'zod';
import { Err, Ok, toError } from '../core/index.js';
import type { RequestLogEntry, Result } from '../core/index.js';
import { NGROK_API_URL } from './services.js';

const URI_COLUMN_WIDTH = 48;

const requestsSchema = z.object({
  requests: z
    .array(
      z.object({
        id: z.string(),
        request: z.object({
          method: z.string(),
          uri: z.string(),
        }),
        response: z
          .object({
            status_code: z.number().int(),
            headers: z.record(z.array(z.string())).optional(),
          })
          .nullish(),
      }),
    )
    .nullish(),
});

export interface RequestLogTailOptions {
  /** Default: http://localhost:4040/api */
  apiUrl?: string;
  /** Most recent requests to ask for on each poll. Default: 50. */
  limit?: number;
  /** Ids already printed; shared with the run so it outlives the tail. */
  seen?: Set<string>;
}

export class RequestLogTail {
  private readonly apiUrl: string;
  private readonly limit: number;
  readonly seen: Set<string>;

  constructor(options: RequestLogTailOptions = {}) {
    this.apiUrl = (options.apiUrl ?? NGROK_API_URL).replace(/\/+$/, '');
    this.limit = options.limit ?? 50;
    this.seen = options.seen ?? new Set();
  }

  async poll(): Promise<Result<RequestLogEntry[], Error>> {
    const url = `${this.apiUrl}/requests/http?limit=${this.limit}`;

    let body: unknown;
    try {
      const response = await fetch(url, { headers: { Accept: 'application/json' } });
      if (!response.ok) {
        return Err(new Error(`Request log returned HTTP ${response.status}`));
      }
      body = await response.json();
    } catch (err) {
      return Err(toError(err));
    }

    const parsed = requestsSchema.safeParse(body);
    if (!parsed.success) {
      return Err(new Error('Request log had an unexpected shape'));
    }

    const fresh: RequestLogEntry[] = [];
    for (const item of parsed.data.requests ?? []) {
      if (this.seen.has(item.id) || !item.response) continue;

      this.seen.add(item.id);
      fresh.push({
        id: item.id,
        statusCode: item.response.status_code,
        method: item.request.method,
        uri: item.request.uri,
        timestamp: parseDateHeader(item.response.headers),
      });
    }

    return Ok(fresh);
  }
}

// ---------------------------------------------------------------------------
// Formatting
// ---------------------------------------------------------------------------

/** `200 POST /lemon-squeezy/webhook.......................... 14:03:27` */
export function formatRequestLine(entry: RequestLogEntry): string {
  const uri = entry.uri.slice(0, URI_COLUMN_WIDTH).padEnd(URI_COLUMN_WIDTH, '.');
  return `${entry.statusCode} ${entry.method} ${uri} ${formatClock(entry.timestamp)}`;
}

/** HH:MM:SS in UTC, the zone HTTP Date headers are written in. */
export function formatClock(date: Date | null): string {
  if (!date) return '--:--:--';
  const pad = (n: number) => String(n).padStart(2, '0');
  return `${pad(date.getUTCHours())}:${pad(date.getUTCMinutes())}:${pad(date.getUTCSeconds())}`;
}

function parseDateHeader(headers: Record<string, string[]> | undefined): Date | null {
  if (!headers) return null;
  const key = Object.keys(headers).find((name) => name.toLowerCase() === 'date');
  const value = key ? headers[key]?.[0] : undefined;
  if (!value) return null;
  const date = new Date(value);
  return Number.isNaN(date.getTime()) ? null : date;
}

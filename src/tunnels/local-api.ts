/**
 * Asks the tunnel agent's inspection API which public URL it was assigned.
 *
 * ngrok serves tunnel info at http://localhost:4040/api/tunnels. The agent
 * takes a moment to boot, so each lookup is retried (5 attempts, 1s apart)
 * before the tick gives up and tries again on the next one.
 */

import { z } from 'zod';
import { TransientNetworkError } from '../core/index.js';
import type { IObserver, ITunnelUrlResolver } from '../core/index.js';
import { LOCAL_API_RETRY, fetchWithRetry, type RetryPolicy } from '../webhooks/http.js';
import { NGROK_API_URL } from './services.js';

const tunnelsSchema = z.object({
  tunnels: z.array(
    z.object({
      public_url: z.string().optional(),
    }),
  ),
});

export interface LocalApiResolverOptions {
  /** Default: http://localhost:4040/api */
  apiUrl?: string;
  retry?: RetryPolicy;
  observer?: IObserver;
}

export class LocalApiResolver implements ITunnelUrlResolver {
  readonly id = 'local-api';

  private readonly apiUrl: string;
  private readonly retry: RetryPolicy;
  private readonly observer?: IObserver;

  constructor(options: LocalApiResolverOptions = {}) {
    this.apiUrl = (options.apiUrl ?? NGROK_API_URL).replace(/\/+$/, '');
    this.retry = options.retry ?? LOCAL_API_RETRY;
    this.observer = options.observer;
  }

  async resolve(): Promise<string | null> {
    const url = `${this.apiUrl}/tunnels`;

    let response: Response;
    try {
      response = await fetchWithRetry(url, { headers: { Accept: 'application/json' } }, this.retry);
    } catch (err) {
      if (!(err instanceof TransientNetworkError)) throw err;
      this.observer?.onWarning('Tunnel inspection API is not reachable yet.', { url, attempts: err.attempts });
      return null;
    }

    if (!response.ok) return null;

    let body: unknown;
    try {
      body = await response.json();
    } catch {
      return null;
    }

    const parsed = tunnelsSchema.safeParse(body);
    if (!parsed.success) return null;

    const publicUrl = parsed.data.tunnels[0]?.public_url ?? null;
    if (publicUrl && (publicUrl.startsWith('https://') || publicUrl.startsWith('http://'))) {
      return publicUrl;
    }

    return null;
  }
}

/**
 * The binary each tunnel provider runs and the domains its public URLs
 * live under.
 */

import { createHash } from 'node:crypto';
import type { TunnelProcessSpec } from '../core/index.js';

export const EXPOSE_DOMAINS = ['sharedwithexpose.com'] as const;

export const NGROK_DOMAINS = ['ngrok-free.app', 'ngrok-free.dev', 'ngrok.app', 'ngrok.io'] as const;

/** ngrok's local inspection API. */
export const NGROK_API_URL = 'http://localhost:4040/api';

/**
 * `expose share` with a throwaway subdomain derived from the current time,
 * so two runs never ask for the same name.
 */
export function exposeCommand(localUrl: string, now: number = Date.now()): TunnelProcessSpec {
  const subdomain = createHash('sha1').update(String(Math.floor(now / 1000))).digest('hex');
  return {
    command: 'expose',
    args: ['share', localUrl, `--subdomain=${subdomain}`, '--no-interaction'],
  };
}

/** `ngrok http` rewriting the Host header so the local app sees its own host. */
export function ngrokCommand(localUrl: string): TunnelProcessSpec {
  return {
    command: 'ngrok',
    args: ['http', localUrl, '--host-header=rewrite'],
  };
}

/** Host of a custom base URL, used to find its webhooks during cleanup. */
export function customDomains(baseUrl: string): string[] {
  try {
    return [new URL(baseUrl).hostname];
  } catch {
    return [baseUrl];
  }
}

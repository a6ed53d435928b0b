/**
 * Bulk removal of webhooks left behind by earlier tunnel sessions.
 */

import { DeletionFailedError, Ok } from '../core/index.js';
import type {
  IObserver,
  IWebhookRegistry,
  ListFailedError,
  Result,
  TransientNetworkError,
} from '../core/index.js';

/**
 * True when the callback URL's host is one of `domains` or a subdomain of
 * one. Values that do not parse as URLs are compared as plain strings.
 */
export function matchesDomain(url: string, domains: readonly string[]): boolean {
  let host: string;
  try {
    host = new URL(url).hostname.toLowerCase();
  } catch {
    return domains.some((domain) => url.endsWith(domain));
  }

  return domains.some((domain) => {
    const suffix = domain.toLowerCase();
    return host === suffix || host.endsWith(`.${suffix}`);
  });
}

export interface CleanupOptions {
  registry: IWebhookRegistry;
  domains: readonly string[];
  observer: IObserver;
}

/**
 * Delete every webhook whose URL belongs to one of `domains`.
 * Resolves to the number of matching webhooks, whether or not each deletion
 * succeeded; only a failed listing is an error.
 */
export async function cleanupWebhooks(
  options: CleanupOptions,
): Promise<Result<number, ListFailedError | TransientNetworkError>> {
  const { registry, domains, observer } = options;

  const listed = await registry.list();
  if (!listed.ok) return listed;

  const matches = [...listed.value].filter(([, url]) => matchesDomain(url, domains));

  for (const [id, url] of matches) {
    const deleted = await registry.delete(id);
    if (deleted.ok) {
      observer.onWebhookEvent({ type: 'removed', webhookId: id, url, timestamp: new Date() });
    } else {
      observer.onWebhookEvent({
        type: 'remove_failed',
        webhookId: id,
        url,
        status: deleted.error instanceof DeletionFailedError ? deleted.error.status : undefined,
        timestamp: new Date(),
      });
    }
  }

  return Ok(matches.length);
}

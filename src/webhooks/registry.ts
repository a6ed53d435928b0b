/**
 * LemonSqueezyWebhookRegistry: webhook CRUD against the billing API.
 *
 * Speaks JSON:API over fetch with a bearer token. Every request goes through
 * the 3-attempt / 250ms retry policy; responses are validated with zod before
 * anything is read from them.
 */

import { z } from 'zod';
import {
  DeletionFailedError,
  Err,
  ListFailedError,
  Ok,
  RegistrationFailedError,
  TransientNetworkError,
} from '../core/index.js';
import type {
  CreateWebhookDocument,
  IWebhookRegistry,
  Result,
  WebhookId,
  WebhookMap,
  WebhookPage,
} from '../core/index.js';
import { WEBHOOK_EVENTS } from './events.js';
import { REGISTRY_RETRY, fetchWithRetry, type RetryPolicy } from './http.js';
import { generateSecret } from './secret.js';

export const LEMON_SQUEEZY_API = 'https://api.lemonsqueezy.com/v1';

const JSON_API = 'application/vnd.api+json';

// ---------------------------------------------------------------------------
// Response schemas
// ---------------------------------------------------------------------------

const resourceId = z.union([z.string(), z.number()]).transform((id) => String(id));

const createdWebhookSchema = z.object({
  data: z.object({ id: resourceId }),
});

const webhookPageSchema = z.object({
  data: z.array(
    z.object({
      id: resourceId,
      attributes: z.object({ url: z.string() }),
    }),
  ),
  meta: z.object({
    page: z.object({
      currentPage: z.number().int(),
      lastPage: z.number().int(),
    }),
  }),
});

// ---------------------------------------------------------------------------
// Configuration
// ---------------------------------------------------------------------------

export interface WebhookRegistryConfig {
  apiKey: string;
  storeId: string;
  /** Path segment the local app serves webhooks under. */
  path: string;
  /** Signing secret; a random one is generated per webhook when absent. */
  signingSecret?: string;
  /** Default: https://api.lemonsqueezy.com/v1 */
  baseUrl?: string;
  retry?: RetryPolicy;
}

// ---------------------------------------------------------------------------
// LemonSqueezyWebhookRegistry
// ---------------------------------------------------------------------------

export class LemonSqueezyWebhookRegistry implements IWebhookRegistry {
  private readonly baseUrl: string;
  private readonly path: string;
  private readonly retry: RetryPolicy;

  constructor(private readonly config: WebhookRegistryConfig) {
    this.baseUrl = (config.baseUrl ?? LEMON_SQUEEZY_API).replace(/\/+$/, '');
    this.path = config.path.replace(/^\/+|\/+$/g, '');
    this.retry = config.retry ?? REGISTRY_RETRY;
  }

  callbackUrl(tunnelUrl: string): string {
    return `${tunnelUrl}/${this.path}/webhook`;
  }

  buildPayload(tunnelUrl: string): CreateWebhookDocument {
    return {
      data: {
        type: 'webhooks',
        attributes: {
          url: this.callbackUrl(tunnelUrl),
          events: [...WEBHOOK_EVENTS],
          secret: this.config.signingSecret || generateSecret(),
        },
        relationships: {
          store: {
            data: { type: 'stores', id: this.config.storeId },
          },
        },
      },
    };
  }

  async create(
    tunnelUrl: string,
  ): Promise<Result<WebhookId, RegistrationFailedError | TransientNetworkError>> {
    const payload = this.buildPayload(tunnelUrl);
    const sent = await this.send(`${this.baseUrl}/webhooks`, {
      method: 'POST',
      headers: this.headers(true),
      body: JSON.stringify(payload),
    });
    if (!sent.ok) return sent;

    const response = sent.value;
    const context = { url: payload.data.attributes.url };
    if (response.status !== 201) {
      return Err(new RegistrationFailedError(response.status, context));
    }

    const parsed = createdWebhookSchema.safeParse(await readJson(response));
    if (!parsed.success) {
      return Err(
        new RegistrationFailedError(response.status, { ...context, reason: 'response had no webhook id' }),
      );
    }

    return Ok(parsed.data.data.id);
  }

  /** Fetch one page of the store's webhooks. */
  async fetchPage(
    page: number,
  ): Promise<Result<WebhookPage, ListFailedError | TransientNetworkError>> {
    const url =
      `${this.baseUrl}/webhooks?filter[store_id]=${encodeURIComponent(this.config.storeId)}` +
      `&page[number]=${page}`;

    const sent = await this.send(url, { method: 'GET', headers: this.headers(false) });
    if (!sent.ok) return sent;

    const response = sent.value;
    if (!response.ok) {
      return Err(new ListFailedError(`Failed to list webhooks (HTTP ${response.status}).`, response.status, { page }));
    }

    const parsed = webhookPageSchema.safeParse(await readJson(response));
    if (!parsed.success) {
      return Err(new ListFailedError('Webhook listing had an unexpected shape.', response.status, { page }));
    }

    const webhooks: WebhookMap = new Map();
    for (const item of parsed.data.data) {
      webhooks.set(item.id, item.attributes.url);
    }

    return Ok({
      webhooks,
      currentPage: parsed.data.meta.page.currentPage,
      lastPage: parsed.data.meta.page.lastPage,
    });
  }

  /**
   * Walk every page, starting at page 1 and following `currentPage + 1`
   * until the API reports the last page.
   */
  async list(): Promise<Result<WebhookMap, ListFailedError | TransientNetworkError>> {
    const webhooks: WebhookMap = new Map();
    let page = 1;
    let previousPage = 0;

    for (;;) {
      const result = await this.fetchPage(page);
      if (!result.ok) return result;

      const { currentPage, lastPage } = result.value;
      if (currentPage <= previousPage) {
        return Err(
          new ListFailedError(`Webhook pagination did not advance past page ${previousPage}.`, null, {
            currentPage,
            lastPage,
          }),
        );
      }

      for (const [id, url] of result.value.webhooks) {
        webhooks.set(id, url);
      }

      if (currentPage >= lastPage) break;

      previousPage = currentPage;
      page = currentPage + 1;
    }

    return Ok(webhooks);
  }

  async delete(id: WebhookId): Promise<Result<void, DeletionFailedError | TransientNetworkError>> {
    const sent = await this.send(`${this.baseUrl}/webhooks/${encodeURIComponent(id)}`, {
      method: 'DELETE',
      headers: this.headers(false),
    });
    if (!sent.ok) return sent;

    if (sent.value.status !== 204) {
      return Err(new DeletionFailedError(id, sent.value.status));
    }

    return Ok(undefined);
  }

  // -----------------------------------------------------------------------
  // Private helpers
  // -----------------------------------------------------------------------

  private headers(withBody: boolean): Record<string, string> {
    return {
      Authorization: `Bearer ${this.config.apiKey}`,
      Accept: JSON_API,
      ...(withBody ? { 'Content-Type': JSON_API } : {}),
    };
  }

  private async send(
    url: string,
    init: RequestInit,
  ): Promise<Result<Response, TransientNetworkError>> {
    try {
      return Ok(await fetchWithRetry(url, init, this.retry));
    } catch (err) {
      if (err instanceof TransientNetworkError) return Err(err);
      throw err;
    }
  }
}

async function readJson(response: Response): Promise<unknown> {
  try {
    return await response.json();
  } catch {
    return null;
  }
}

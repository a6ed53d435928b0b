/**
 * IWebhookRegistry: remote webhook contract
 *
 * Create, list and delete webhooks on the billing API. Operations return a
 * Result rather than throwing so callers decide which failures are fatal.
 */

import type {
  DeletionFailedError,
  ListFailedError,
  RegistrationFailedError,
  TransientNetworkError,
} from '../errors/index.js';
import type { Result } from '../result.js';

export type WebhookId = string;

/** Webhook id → callback url. */
export type WebhookMap = Map<WebhookId, string>;

export interface WebhookPage {
  webhooks: WebhookMap;
  currentPage: number;
  lastPage: number;
}

export interface WebhookAttributes {
  url: string;
  events: string[];
  secret: string;
}

/** JSON:API document sent to `POST /webhooks`. */
export interface CreateWebhookDocument {
  data: {
    type: 'webhooks';
    attributes: WebhookAttributes;
    relationships: {
      store: {
        data: { type: 'stores'; id: string };
      };
    };
  };
}

export interface IWebhookRegistry {
  /** Callback URL a webhook for `tunnelUrl` points at. */
  callbackUrl(tunnelUrl: string): string;
  create(tunnelUrl: string): Promise<Result<WebhookId, RegistrationFailedError | TransientNetworkError>>;
  list(): Promise<Result<WebhookMap, ListFailedError | TransientNetworkError>>;
  delete(id: WebhookId): Promise<Result<void, DeletionFailedError | TransientNetworkError>>;
}

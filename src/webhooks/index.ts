/**
 * Webhook registration against the Lemon Squeezy API, plus bulk cleanup.
 */

export { LemonSqueezyWebhookRegistry, LEMON_SQUEEZY_API } from './registry.js';
export type { WebhookRegistryConfig } from './registry.js';

export { cleanupWebhooks, matchesDomain } from './cleanup.js';
export type { CleanupOptions } from './cleanup.js';

export { WEBHOOK_EVENTS } from './events.js';
export type { WebhookEventName } from './events.js';

export { generateSecret, SECRET_LENGTH } from './secret.js';

export {
  fetchWithRetry,
  isRetryableStatus,
  sleep,
  REGISTRY_RETRY,
  LOCAL_API_RETRY,
} from './http.js';
export type { RetryPolicy } from './http.js';

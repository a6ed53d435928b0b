/** Event types every registered webhook subscribes to. */
export const WEBHOOK_EVENTS = [
  'order_created',
  'order_refunded',
  'subscription_created',
  'subscription_updated',
  'subscription_cancelled',
  'subscription_resumed',
  'subscription_expired',
  'subscription_paused',
  'subscription_unpaused',
  'subscription_payment_success',
  'subscription_payment_failed',
  'subscription_payment_recovered',
  'subscription_payment_refunded',
  'subscription_plan_changed',
  'license_key_created',
  'license_key_updated',
] as const;

export type WebhookEventName = (typeof WEBHOOK_EVENTS)[number];

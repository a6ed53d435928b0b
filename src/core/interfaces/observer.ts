/**
 * IObserver — observability contract
 *
 * Everything the lifecycle reports to the developer goes through here:
 * progress notes, state transitions, webhook lifecycle, forwarded requests
 * and raw tunnel output.
 */

import type { OutputStream, RequestLogEntry, ServiceName } from './tunnel.js';

export type LifecycleState =
  | 'idle'
  | 'environment_checked'
  | 'cleaning'
  | 'service_selected'
  | 'tunnel_starting'
  | 'tunnel_url_discovered'
  | 'webhook_registered'
  | 'listening'
  | 'teardown'
  | 'done';

export interface StateChangeEvent {
  service: ServiceName;
  from: LifecycleState;
  to: LifecycleState;
  timestamp: Date;
}

export interface WebhookEvent {
  type: 'registered' | 'register_failed' | 'removed' | 'remove_failed';
  webhookId?: string;
  url?: string;
  status?: number;
  /** Why the call failed when no HTTP status is available. */
  reason?: string;
  /** Follow-up the developer can take, shown after failures. */
  hint?: string;
  timestamp: Date;
}

export interface RequestLoggedEvent {
  entry: RequestLogEntry;
  line: string;
}

export interface ProcessOutputEvent {
  chunk: string;
  stream: OutputStream;
}

export interface IObserver {
  onNote(message: string): void;
  onSuccess(message: string): void;
  onWarning(message: string, context?: Record<string, unknown>): void;
  onError(error: Error, context: Record<string, unknown>): void;
  onStateChange(event: StateChangeEvent): void;
  onWebhookEvent(event: WebhookEvent): void;
  onRequestLogged(event: RequestLoggedEvent): void;
  onProcessOutput(event: ProcessOutputEvent): void;
  flush?(): Promise<void>;
}

/**
 * NoopObserver — silent observer that discards all events.
 *
 * Used by tests and whenever output is switched off.
 */

import type {
  IObserver,
  ProcessOutputEvent,
  RequestLoggedEvent,
  StateChangeEvent,
  WebhookEvent,
} from '../core/index.js';

export class NoopObserver implements IObserver {
  onNote(_message: string): void {
    // intentionally empty
  }

  onSuccess(_message: string): void {
    // intentionally empty
  }

  onWarning(_message: string, _context?: Record<string, unknown>): void {
    // intentionally empty
  }

  onError(_error: Error, _context: Record<string, unknown>): void {
    // intentionally empty
  }

  onStateChange(_event: StateChangeEvent): void {
    // intentionally empty
  }

  onWebhookEvent(_event: WebhookEvent): void {
    // intentionally empty
  }

  onRequestLogged(_event: RequestLoggedEvent): void {
    // intentionally empty
  }

  onProcessOutput(_event: ProcessOutputEvent): void {
    // intentionally empty
  }

  async flush(): Promise<void> {
    // intentionally empty
  }
}

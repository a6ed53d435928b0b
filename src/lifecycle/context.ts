/**
 * RunContext holds all per-invocation state of `hookline listen`.
 *
 * One context is created per run and shared by the controller and the
 * provider strategy. Cancellation is an AbortController owned here: the
 * interrupt handler only aborts it, and the controller runs teardown once
 * the strategy loop has returned.
 */

import { DeletionFailedError, RegistrationFailedError } from '../core/index.js';
import type {
  IObserver,
  IWebhookRegistry,
  LifecycleState,
  OutputStream,
  ServiceName,
  SpawnTunnel,
  TunnelProcessHandle,
  WebhookId,
} from '../core/index.js';
import { sleep, type RetryPolicy } from '../webhooks/http.js';

export type ExitStatus = 0 | 1;

/** How a run ended, kept on the context for callers and tests. */
export type RunOutcome =
  | 'test'
  | 'cleaned'
  | 'list_failed'
  | 'environment_restricted'
  | 'locked'
  | 'interrupted'
  | 'tunnel_exited'
  | 'tunnel_failed'
  | 'registration_failed';

export interface TunnelState {
  /** Null until discovered. */
  publicUrl: string | null;
  /** Null for providers without a subprocess. */
  process: TunnelProcessHandle | null;
  /** Cleared by cancellation. */
  running: boolean;
}

export interface RunTiming {
  /** Pause between two ticks of the listening loop. */
  tickMs: number;
  /** How long a process-backed provider may take to report its URL. */
  discoveryTimeoutMs: number;
  /** Retry policy for the local inspection API. */
  localApiRetry: RetryPolicy;
}

export interface RunContextInit {
  service: ServiceName;
  verbose: boolean;
  appUrl: string;
  ngrokApiUrl: string;
  observer: IObserver;
  registry: IWebhookRegistry;
  spawnTunnel: SpawnTunnel;
  timing: RunTiming;
  now?: () => number;
}

export class RunContext {
  readonly service: ServiceName;
  readonly verbose: boolean;
  readonly appUrl: string;
  readonly ngrokApiUrl: string;
  readonly observer: IObserver;
  readonly registry: IWebhookRegistry;
  readonly spawnTunnel: SpawnTunnel;
  readonly timing: RunTiming;
  readonly now: () => number;

  readonly tunnel: TunnelState = { publicUrl: null, process: null, running: true };
  /** Ids of request-log entries already printed. */
  readonly seen = new Set<string>();

  state: LifecycleState = 'idle';
  activeWebhookId: WebhookId | null = null;
  outcome: RunOutcome | null = null;

  private readonly abort = new AbortController();
  private tornDown = false;

  constructor(init: RunContextInit) {
    this.service = init.service;
    this.verbose = init.verbose;
    this.appUrl = init.appUrl;
    this.ngrokApiUrl = init.ngrokApiUrl;
    this.observer = init.observer;
    this.registry = init.registry;
    this.spawnTunnel = init.spawnTunnel;
    this.timing = init.timing;
    this.now = init.now ?? Date.now;
  }

  // ── Cancellation ─────────────────────────────────────────────────────

  get signal(): AbortSignal {
    return this.abort.signal;
  }

  get cancelled(): boolean {
    return this.abort.signal.aborted;
  }

  /** Called from the interrupt handler. Teardown happens later, in the controller. */
  interrupt(): void {
    this.tunnel.running = false;
    this.abort.abort();
  }

  /** Sleep until the next tick, waking early on interrupt. */
  tick(): Promise<void> {
    return sleep(this.timing.tickMs, this.abort.signal);
  }

  // ── State ────────────────────────────────────────────────────────────

  transition(to: LifecycleState): void {
    if (this.state === to) return;
    const from = this.state;
    this.state = to;
    this.observer.onStateChange({ service: this.service, from, to, timestamp: new Date(this.now()) });
  }

  /** Tunnel output is shown with --verbose, or for everyone once a webhook is live. */
  forwardOutput(chunk: string, stream: OutputStream): void {
    if (this.verbose || this.activeWebhookId !== null) {
      this.observer.onProcessOutput({ chunk, stream });
    }
  }

  // ── Webhook lifecycle ────────────────────────────────────────────────

  /**
   * Register the webhook for a discovered public URL. Resolves to false
   * when registration failed; the run should then end with exit status 1.
   */
  async registerWebhook(tunnelUrl: string): Promise<boolean> {
    const callbackUrl = this.registry.callbackUrl(tunnelUrl);
    this.observer.onNote(`Found webhook endpoint: ${tunnelUrl}`);
    this.observer.onNote('Sending webhook to Lemon Squeezy...');

    const created = await this.registry.create(tunnelUrl);
    if (!created.ok) {
      const error = created.error;
      const status = error instanceof RegistrationFailedError ? error.status : undefined;
      this.observer.onWebhookEvent({
        type: 'register_failed',
        url: callbackUrl,
        status,
        reason: status === undefined ? error.message : undefined,
        timestamp: new Date(this.now()),
      });
      this.outcome = 'registration_failed';
      return false;
    }

    this.activeWebhookId = created.value;
    this.transition('webhook_registered');
    this.observer.onWebhookEvent({
      type: 'registered',
      webhookId: created.value,
      url: callbackUrl,
      timestamp: new Date(this.now()),
    });
    this.observer.onNote('Listening for webhooks...');
    this.transition('listening');
    return true;
  }

  /**
   * Delete the active webhook, if any. Runs at most once per context; the
   * active id is cleared only when the API confirms the deletion.
   */
  async teardown(): Promise<void> {
    if (this.tornDown) return;
    this.tornDown = true;

    const id = this.activeWebhookId;
    if (id === null) return;

    this.observer.onNote('Cleaning up webhook on Lemon Squeezy...');
    const deleted = await this.registry.delete(id);

    if (!deleted.ok) {
      const error = deleted.error;
      this.observer.onWebhookEvent({
        type: 'remove_failed',
        webhookId: id,
        status: error instanceof DeletionFailedError ? error.status : undefined,
        hint: this.cleanupHint(),
        timestamp: new Date(this.now()),
      });
      return;
    }

    this.activeWebhookId = null;
    this.observer.onWebhookEvent({ type: 'removed', webhookId: id, timestamp: new Date(this.now()) });
  }

  /** Stop the tunnel subprocess if one was started. */
  async stopTunnel(): Promise<void> {
    this.tunnel.running = false;
    await this.tunnel.process?.stop();
  }

  cleanupHint(): string {
    return `Use "hookline listen ${this.service} --cleanup" to remove leftover ${this.service} webhooks.`;
  }
}

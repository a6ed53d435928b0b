/**
 * One strategy class per tunnel service.
 *
 * The set of services is closed: `createStrategy` maps each ServiceName to
 * exactly one strategy and the TunnelStrategy union lets callers switch on
 * `kind` exhaustively.
 */

import { TunnelError, toError } from '../core/index.js';
import type {
  ITunnelUrlResolver,
  ServiceName,
  TunnelProcessHandle,
  TunnelProcessSpec,
} from '../core/index.js';
import {
  EXPOSE_DOMAINS,
  LocalApiResolver,
  NGROK_DOMAINS,
  OutputScrapeResolver,
  RequestLogTail,
  customDomains,
  exposeCommand,
  formatRequestLine,
  ngrokCommand,
} from '../tunnels/index.js';
import type { ExitStatus, RunContext } from './context.js';

export interface ITunnelStrategy {
  readonly kind: ServiceName;
  /** Domains this provider's public URLs live under, for cleanup. */
  readonly domains: readonly string[];
  run(ctx: RunContext): Promise<ExitStatus>;
}

// ---------------------------------------------------------------------------
// Process-backed providers
// ---------------------------------------------------------------------------

/**
 * Shared tick loop for providers that run a tunnel binary: start it, poll
 * the resolver until a URL shows up, register the webhook, then keep
 * ticking until interrupted or until the binary stops on its own.
 */
export abstract class ProcessTunnelStrategy {
  abstract readonly kind: 'expose' | 'ngrok';
  abstract readonly domains: readonly string[];

  protected abstract command(ctx: RunContext): TunnelProcessSpec;

  protected abstract resolver(ctx: RunContext, handle: TunnelProcessHandle): ITunnelUrlResolver;

  /** Extra work done on every tick once the webhook is registered. */
  protected async onListeningTick(_ctx: RunContext): Promise<void> {
    // nothing by default
  }

  async run(ctx: RunContext): Promise<ExitStatus> {
    ctx.transition('tunnel_starting');

    let handle: TunnelProcessHandle;
    try {
      handle = await ctx.spawnTunnel(this.command(ctx), (chunk, stream) => ctx.forwardOutput(chunk, stream));
    } catch (err) {
      ctx.observer.onError(toError(err), { service: this.kind });
      ctx.outcome = 'tunnel_failed';
      return 1;
    }
    ctx.tunnel.process = handle;

    const resolver = this.resolver(ctx, handle);
    const startedAt = ctx.now();

    while (handle.isRunning() && !ctx.cancelled) {
      if (ctx.tunnel.publicUrl === null) {
        const url = await resolver.resolve();
        if (ctx.cancelled) break;

        if (url !== null) {
          ctx.tunnel.publicUrl = url;
          ctx.transition('tunnel_url_discovered');
          if (!(await ctx.registerWebhook(url))) return 1;
        } else if (ctx.now() - startedAt >= ctx.timing.discoveryTimeoutMs) {
          return this.fail(
            ctx,
            new TunnelError(
              `${this.kind} did not report a public URL within ${ctx.timing.discoveryTimeoutMs}ms.`,
              this.kind,
            ),
          );
        }
      }

      if (ctx.activeWebhookId !== null && !ctx.cancelled) {
        await this.onListeningTick(ctx);
      }

      await ctx.tick();
    }

    if (ctx.cancelled) return 0;

    if (ctx.tunnel.publicUrl === null) {
      return this.fail(ctx, new TunnelError(`${this.kind} exited before reporting a public URL.`, this.kind));
    }

    // Stopped on its own: the webhook stays registered until --cleanup.
    ctx.outcome = 'tunnel_exited';
    ctx.observer.onWarning(`The ${this.kind} tunnel stopped.`, {
      webhookId: ctx.activeWebhookId,
      hint: ctx.cleanupHint(),
    });
    return 0;
  }

  private fail(ctx: RunContext, error: TunnelError): ExitStatus {
    ctx.observer.onError(error, { service: this.kind, output: ctx.tunnel.process?.output() ?? '' });
    ctx.outcome = 'tunnel_failed';
    return 1;
  }
}

export class ExposeStrategy extends ProcessTunnelStrategy implements ITunnelStrategy {
  readonly kind = 'expose' as const;
  readonly domains = EXPOSE_DOMAINS;

  protected command(ctx: RunContext): TunnelProcessSpec {
    return exposeCommand(ctx.appUrl, ctx.now());
  }

  protected resolver(_ctx: RunContext, handle: TunnelProcessHandle): ITunnelUrlResolver {
    return new OutputScrapeResolver(handle);
  }
}

export class NgrokStrategy extends ProcessTunnelStrategy implements ITunnelStrategy {
  readonly kind = 'ngrok' as const;
  readonly domains = NGROK_DOMAINS;

  private tail: RequestLogTail | null = null;

  protected command(ctx: RunContext): TunnelProcessSpec {
    return ngrokCommand(ctx.appUrl);
  }

  protected resolver(ctx: RunContext): ITunnelUrlResolver {
    return new LocalApiResolver({
      apiUrl: ctx.ngrokApiUrl,
      retry: ctx.timing.localApiRetry,
      observer: ctx.observer,
    });
  }

  protected override async onListeningTick(ctx: RunContext): Promise<void> {
    this.tail ??= new RequestLogTail({ apiUrl: ctx.ngrokApiUrl, seen: ctx.seen });

    const polled = await this.tail.poll();
    if (!polled.ok) {
      ctx.observer.onWarning('Could not read the ngrok request log.', { reason: polled.error.message });
      return;
    }

    for (const entry of polled.value) {
      ctx.observer.onRequestLogged({ entry, line: formatRequestLine(entry) });
    }
  }
}

// ---------------------------------------------------------------------------
// Providers without a subprocess
// ---------------------------------------------------------------------------

/** A URL the developer already exposes; registered as given and held until interrupted. */
export class CustomStrategy implements ITunnelStrategy {
  readonly kind = 'custom' as const;
  readonly domains: readonly string[];
  readonly baseUrl: string;

  constructor(url: string) {
    this.baseUrl = normalizeBaseUrl(url);
    this.domains = customDomains(this.baseUrl);
  }

  async run(ctx: RunContext): Promise<ExitStatus> {
    ctx.tunnel.publicUrl = this.baseUrl;
    ctx.transition('tunnel_url_discovered');
    if (!(await ctx.registerWebhook(this.baseUrl))) return 1;

    while (!ctx.cancelled) {
      await ctx.tick();
    }

    return 0;
  }
}

/** Dry run: touches neither the network nor any process. */
export class TestStrategy implements ITunnelStrategy {
  readonly kind = 'test' as const;
  readonly domains: readonly string[] = [];

  async run(ctx: RunContext): Promise<ExitStatus> {
    ctx.observer.onNote('hookline listen is using the test service.');
    ctx.outcome = 'test';
    return 0;
  }
}

export type TunnelStrategy = ExposeStrategy | NgrokStrategy | CustomStrategy | TestStrategy;

export function createStrategy(service: ServiceName, url?: string): TunnelStrategy {
  switch (service) {
    case 'expose':
      return new ExposeStrategy();
    case 'ngrok':
      return new NgrokStrategy();
    case 'custom':
      return new CustomStrategy(url ?? '');
    case 'test':
      return new TestStrategy();
  }
}

/** Trim whitespace and trailing slashes: `https://example.com/ ` → `https://example.com`. */
export function normalizeBaseUrl(url: string): string {
  return url.trim().replace(/\/+$/, '');
}

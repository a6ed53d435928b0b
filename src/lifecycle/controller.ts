/**
 * LifecycleController — drives one `hookline listen` invocation.
 *
 *   idle → environment_checked → (cleaning → done)
 *        → service_selected → tunnel_starting → tunnel_url_discovered
 *        → webhook_registered → listening → teardown → done
 *
 * Validation, the environment check and the single-run lock happen before
 * any network or process activity. The provider strategy owns the tick loop; the
 * controller owns the interrupt subscription and everything that must
 * happen after the loop returns.
 */

import {
  ConfigValidationError,
  EnvironmentRestrictionError,
  Err,
  Ok,
  isServiceName,
  SERVICE_NAMES,
} from '../core/index.js';
import type {
  HooklineConfig,
  IObserver,
  IWebhookRegistry,
  Result,
  ServiceName,
  SpawnTunnel,
} from '../core/index.js';
import { RunLock, spawnTunnelProcess } from '../supervisor/index.js';
import type { IRunLock } from '../supervisor/index.js';
import { LOCAL_API_RETRY, LemonSqueezyWebhookRegistry, cleanupWebhooks } from '../webhooks/index.js';
import { RunContext } from './context.js';
import type { ExitStatus, RunTiming } from './context.js';
import { createStrategy } from './strategies.js';
import type { TunnelStrategy } from './strategies.js';

/** Environments `listen` may run in. */
export const LOCAL_ENVIRONMENTS: readonly string[] = ['local', 'development'];

export const DEFAULT_TIMING: RunTiming = {
  tickMs: 1_000,
  discoveryTimeoutMs: 120_000,
  localApiRetry: LOCAL_API_RETRY,
};

// ---------------------------------------------------------------------------
// Inputs
// ---------------------------------------------------------------------------

export interface ListenOptions {
  /** Raw service argument; validated before use. */
  service?: string;
  url?: string;
  cleanup?: boolean;
  verbose?: boolean;
}

export interface ValidatedListen {
  service: ServiceName;
  url?: string;
  apiKey: string;
  storeId: string;
}

/** Source of interrupt notifications. Returns an unsubscribe function. */
export interface SignalSource {
  onInterrupt(handler: () => void): () => void;
}

export const processSignals: SignalSource = {
  onInterrupt(handler) {
    process.on('SIGINT', handler);
    return () => {
      process.off('SIGINT', handler);
    };
  },
};

export interface LifecycleControllerDeps {
  observer: IObserver;
  /** Default: LemonSqueezyWebhookRegistry built from the config. */
  registry?: IWebhookRegistry;
  /** Default: spawn the real binary. */
  spawnTunnel?: SpawnTunnel;
  /** Default: SIGINT on the current process. */
  signals?: SignalSource;
  /** Default: lock file in the OS temp directory. */
  lock?: IRunLock;
  timing?: Partial<RunTiming>;
  now?: () => number;
}

// ---------------------------------------------------------------------------
// Validation
// ---------------------------------------------------------------------------

/** Collects every problem with the configuration and arguments, in a fixed order. */
export function validateListen(
  config: HooklineConfig,
  options: ListenOptions,
): Result<ValidatedListen, ConfigValidationError> {
  const issues: string[] = [];

  if (!config.apiKey) {
    issues.push('The LEMON_SQUEEZY_API_KEY environment variable is required.');
  }

  const service = options.service?.trim();
  if (!service) {
    issues.push('The service field is required.');
  } else if (!isServiceName(service)) {
    issues.push(`The selected service is invalid. Choose one of: ${SERVICE_NAMES.join(', ')}.`);
  }

  const url = options.url?.trim() || undefined;
  if (service === 'custom' && !url) {
    issues.push('The url field is required when service is custom.');
  } else if (url && !isHttpUrl(url)) {
    issues.push('The url field must be a valid URL.');
  }

  if (!config.storeId) {
    issues.push('The LEMON_SQUEEZY_STORE environment variable is required.');
  }

  if (issues.length > 0 || !config.apiKey || !config.storeId || !isServiceName(service)) {
    return Err(new ConfigValidationError(issues));
  }

  return Ok({ service, url, apiKey: config.apiKey, storeId: config.storeId });
}

function isHttpUrl(value: string): boolean {
  try {
    const parsed = new URL(value);
    return parsed.protocol === 'http:' || parsed.protocol === 'https:';
  } catch {
    return false;
  }
}

// ---------------------------------------------------------------------------
// LifecycleController
// ---------------------------------------------------------------------------

export class LifecycleController {
  private lastContext: RunContext | null = null;

  constructor(
    private readonly config: HooklineConfig,
    private readonly deps: LifecycleControllerDeps,
  ) {}

  /** Context of the most recent run that got past validation. */
  get context(): RunContext | null {
    return this.lastContext;
  }

  async run(options: ListenOptions): Promise<ExitStatus> {
    const { observer } = this.deps;

    const validated = validateListen(this.config, options);
    if (!validated.ok) {
      observer.onError(validated.error, {});
      return 1;
    }

    const { service, url, apiKey, storeId } = validated.value;
    const ctx = new RunContext({
      service,
      verbose: options.verbose ?? false,
      appUrl: this.config.appUrl,
      ngrokApiUrl: this.config.ngrokApiUrl,
      observer,
      registry:
        this.deps.registry ??
        new LemonSqueezyWebhookRegistry({
          apiKey,
          storeId,
          path: this.config.path,
          signingSecret: this.config.signingSecret,
          baseUrl: this.config.apiBaseUrl,
        }),
      spawnTunnel: this.deps.spawnTunnel ?? spawnTunnelProcess,
      timing: { ...DEFAULT_TIMING, ...this.deps.timing },
      now: this.deps.now,
    });
    this.lastContext = ctx;

    const strategy = createStrategy(service, url);

    if (strategy.kind === 'test') {
      const status = await strategy.run(ctx);
      ctx.transition('done');
      return status;
    }

    if (!LOCAL_ENVIRONMENTS.includes(this.config.environment)) {
      observer.onError(new EnvironmentRestrictionError(this.config.environment), {});
      ctx.outcome = 'environment_restricted';
      return 1;
    }
    ctx.transition('environment_checked');

    const lock = this.deps.lock ?? new RunLock();
    const locked = lock.acquire();
    if (!locked.ok) {
      observer.onError(locked.error, {});
      ctx.outcome = 'locked';
      return 1;
    }

    try {
      if (options.cleanup) {
        return await this.cleanup(ctx, strategy);
      }
      return await this.listen(ctx, strategy);
    } finally {
      lock.release();
    }
  }

  // ── Modes ────────────────────────────────────────────────────────────

  private async cleanup(ctx: RunContext, strategy: TunnelStrategy): Promise<ExitStatus> {
    const { observer } = ctx;
    ctx.transition('cleaning');
    observer.onNote(`Cleaning up webhooks for '${ctx.service}' service...`);

    const cleaned = await cleanupWebhooks({ registry: ctx.registry, domains: strategy.domains, observer });
    if (!cleaned.ok) {
      observer.onError(cleaned.error, { service: ctx.service });
      ctx.outcome = 'list_failed';
      return 1;
    }

    if (cleaned.value === 0) {
      observer.onSuccess('No webhooks found to clean.');
    }

    ctx.outcome = 'cleaned';
    ctx.transition('done');
    return 0;
  }

  private async listen(ctx: RunContext, strategy: TunnelStrategy): Promise<ExitStatus> {
    const { observer } = ctx;
    const signals = this.deps.signals ?? processSignals;

    ctx.transition('service_selected');
    observer.onNote(`Setting up webhooks domain with ${ctx.service}...`);

    const unsubscribe = signals.onInterrupt(() => ctx.interrupt());
    try {
      return await strategy.run(ctx);
    } finally {
      unsubscribe();
      ctx.transition('teardown');
      if (ctx.cancelled) {
        ctx.outcome ??= 'interrupted';
        await ctx.teardown();
      }
      await ctx.stopTunnel();
      ctx.transition('done');
      await observer.flush?.();
    }
  }
}

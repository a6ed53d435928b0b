/**
 * Error hierarchy for hookline.
 *
 * Every error carries a stable `code` so the CLI can map failures to exit
 * statuses and messages without string matching.
 */

export class HooklineError extends Error {
  readonly code: string;
  readonly context?: Record<string, unknown>;

  constructor(message: string, code: string, context?: Record<string, unknown>) {
    super(message);
    this.name = 'HooklineError';
    this.code = code;
    this.context = context;
  }
}

// ---------------------------------------------------------------------------
// Pre-flight
// ---------------------------------------------------------------------------

export class ConfigValidationError extends HooklineError {
  readonly issues: string[];

  constructor(issues: string[], context?: Record<string, unknown>) {
    super(issues.join(' '), 'CONFIG_VALIDATION', context);
    this.name = 'ConfigValidationError';
    this.issues = issues;
  }
}

export class EnvironmentRestrictionError extends HooklineError {
  readonly environment: string;

  constructor(environment: string) {
    super(
      'hookline listen can only be used in a local environment.',
      'ENVIRONMENT_RESTRICTED',
      { environment },
    );
    this.name = 'EnvironmentRestrictionError';
    this.environment = environment;
  }
}

// ---------------------------------------------------------------------------
// Remote webhook API
// ---------------------------------------------------------------------------

export class RegistrationFailedError extends HooklineError {
  readonly status: number;

  constructor(status: number, context?: Record<string, unknown>) {
    super(`Failed to setup webhook (HTTP ${status}).`, 'REGISTRATION_FAILED', {
      ...context,
      status,
    });
    this.name = 'RegistrationFailedError';
    this.status = status;
  }
}

export class DeletionFailedError extends HooklineError {
  readonly webhookId: string;
  readonly status: number;

  constructor(webhookId: string, status: number) {
    super(`Failed to remove webhook ${webhookId} (HTTP ${status}).`, 'DELETION_FAILED', {
      webhookId,
      status,
    });
    this.name = 'DeletionFailedError';
    this.webhookId = webhookId;
    this.status = status;
  }
}

export class ListFailedError extends HooklineError {
  readonly status: number | null;

  constructor(message: string, status: number | null, context?: Record<string, unknown>) {
    super(message, 'LIST_FAILED', { ...context, status });
    this.name = 'ListFailedError';
    this.status = status;
  }
}

export class TransientNetworkError extends HooklineError {
  readonly attempts: number;
  override readonly cause?: Error;

  constructor(url: string, attempts: number, cause?: Error) {
    super(
      `Request to ${url} failed after ${attempts} attempt${attempts === 1 ? '' : 's'}` +
        (cause ? `: ${cause.message}` : ''),
      'TRANSIENT_NETWORK',
      { url, attempts },
    );
    this.name = 'TransientNetworkError';
    this.attempts = attempts;
    this.cause = cause;
  }
}

// ---------------------------------------------------------------------------
// Run lock
// ---------------------------------------------------------------------------

/** Another `hookline listen` run holds the lock file. */
export class RunLockedError extends HooklineError {
  readonly lockPath: string;
  readonly holderPid: number | null;

  constructor(lockPath: string, holderPid: number | null) {
    super(
      holderPid === null
        ? 'Another hookline listen run is already active.'
        : `Another hookline listen run is already active (pid ${holderPid}).`,
      'RUN_LOCKED',
      { lockPath, holderPid },
    );
    this.name = 'RunLockedError';
    this.lockPath = lockPath;
    this.holderPid = holderPid;
  }
}

// ---------------------------------------------------------------------------
// Tunnels
// ---------------------------------------------------------------------------

export class TunnelError extends HooklineError {
  readonly provider: string;

  constructor(message: string, provider: string, context?: Record<string, unknown>) {
    super(message, 'TUNNEL_ERROR', { ...context, provider });
    this.name = 'TunnelError';
    this.provider = provider;
  }
}

/** Coerce an unknown thrown value into an Error instance. */
export function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}

/**
 * ConsoleObserver — human-readable console output with ANSI colour tags.
 *
 * Renders lifecycle events for the developer running `hookline listen`,
 * respecting the configured log level. Forwarded requests are printed as
 * fixed-width rows; raw tunnel output is passed through untouched.
 */

import type {
  IObserver,
  ProcessOutputEvent,
  RequestLoggedEvent,
  StateChangeEvent,
  WebhookEvent,
} from '../core/index.js';

// ---------------------------------------------------------------------------
// ANSI escape codes
// ---------------------------------------------------------------------------

const RESET = '\x1b[0m';
const BOLD = '\x1b[1m';
const DIM = '\x1b[2m';

const FG = {
  red: '\x1b[31m',
  green: '\x1b[32m',
  yellow: '\x1b[33m',
  blue: '\x1b[34m',
  magenta: '\x1b[35m',
  cyan: '\x1b[36m',
  gray: '\x1b[90m',
} as const;

// ---------------------------------------------------------------------------
// Log-level gate
// ---------------------------------------------------------------------------

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error'] as const satisfies readonly LogLevel[];

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

// ---------------------------------------------------------------------------
// ConsoleObserver
// ---------------------------------------------------------------------------

export class ConsoleObserver implements IObserver {
  private readonly minLevel: number;

  constructor(logLevel: LogLevel = 'info') {
    this.minLevel = LEVEL_RANK[logLevel];
  }

  // ---- helpers ------------------------------------------------------------

  private shouldLog(level: LogLevel): boolean {
    return LEVEL_RANK[level] >= this.minLevel;
  }

  private tag(label: string, color: string): string {
    return `${color}${BOLD}[${label}]${RESET}`;
  }

  private formatContext(context: Record<string, unknown> | undefined): string {
    if (!context || Object.keys(context).length === 0) return '';
    return ` ${DIM}ctx=${RESET}${JSON.stringify(context)}`;
  }

  private statusColor(status: number): string {
    if (status >= 500) return FG.red;
    if (status >= 400) return FG.yellow;
    return FG.green;
  }

  // ---- IObserver ----------------------------------------------------------

  onNote(message: string): void {
    if (!this.shouldLog('info')) return;
    console.log(`${this.tag('INFO', FG.blue)} ${message}`);
  }

  onSuccess(message: string): void {
    if (!this.shouldLog('info')) return;
    console.log(`${FG.green}${message}${RESET}`);
  }

  onWarning(message: string, context?: Record<string, unknown>): void {
    if (!this.shouldLog('warn')) return;
    console.warn(`${this.tag('WARN', FG.yellow)} ${message}${this.formatContext(context)}`);
  }

  onError(error: Error, context: Record<string, unknown>): void {
    if (!this.shouldLog('error')) return;
    console.error(
      `${this.tag('ERROR', FG.red)} ${BOLD}${error.name}${RESET}: ${error.message}${this.formatContext(context)}`,
    );
  }

  onStateChange(event: StateChangeEvent): void {
    if (!this.shouldLog('debug')) return;
    console.log(
      `${DIM}${event.timestamp.toISOString()}${RESET} ${this.tag('STATE', FG.cyan)}` +
        ` ${DIM}service=${RESET}${event.service}` +
        ` ${event.from} ${DIM}->${RESET} ${BOLD}${event.to}${RESET}`,
    );
  }

  onWebhookEvent(event: WebhookEvent): void {
    switch (event.type) {
      case 'registered':
        if (!this.shouldLog('info')) return;
        console.log(
          `${FG.green}✅ Webhook setup successfully.${RESET}` +
            (event.url ? ` ${DIM}url=${RESET}${event.url}` : ''),
        );
        if (event.webhookId && this.shouldLog('debug')) {
          console.log(`${this.tag('WEBHOOK', FG.magenta)} ${DIM}id=${RESET}${event.webhookId}`);
        }
        return;

      case 'removed':
        if (!this.shouldLog('info')) return;
        console.log(
          `${FG.green}✅ Webhook removed successfully.${RESET}` +
            (event.webhookId ? ` ${DIM}id=${RESET}${event.webhookId}` : ''),
        );
        return;

      case 'register_failed':
      case 'remove_failed': {
        if (!this.shouldLog('error')) return;
        const what = event.type === 'register_failed' ? 'setup' : 'remove';
        console.error(
          `${FG.red}❌ Failed to ${what} webhook.${RESET}` +
            (event.webhookId ? ` ${DIM}id=${RESET}${event.webhookId}` : '') +
            (event.status !== undefined ? ` ${DIM}status=${RESET}${event.status}` : '') +
            (event.reason ? ` ${DIM}reason=${RESET}${event.reason}` : ''),
        );
        if (event.hint) console.error(`   ${event.hint}`);
        return;
      }
    }
  }

  onRequestLogged(event: RequestLoggedEvent): void {
    if (!this.shouldLog('info')) return;
    const color = this.statusColor(event.entry.statusCode);
    console.log(`${color}${event.line}${RESET}`);
  }

  onProcessOutput(event: ProcessOutputEvent): void {
    const stream = event.stream === 'stderr' ? process.stderr : process.stdout;
    stream.write(event.chunk);
  }

  async flush(): Promise<void> {
    // Console output is unbuffered; nothing to flush.
  }
}

/**
 * Finds the public URL in the tunnel's own output.
 *
 * Used for providers that print their endpoint (expose prints a
 * "Public HTTPS: https://…" row). Only complete lines are scanned so a URL
 * split across two output chunks is never taken half-read. The first match
 * wins and is kept for the rest of the run. Best effort: the provider's
 * output format is not a contract.
 */

import type { ITunnelUrlResolver } from '../core/index.js';

export const PUBLIC_HTTPS_PATTERN = /Public HTTPS:\s+(https?:\/\/\S+)/;

const ANSI_PATTERN = /\x1b\[[0-9;]*[A-Za-z]/g;

export interface OutputSource {
  latestOutput(): string;
}

export class OutputScrapeResolver implements ITunnelUrlResolver {
  readonly id = 'output-scrape';

  private pending = '';
  private found: string | null = null;

  constructor(
    private readonly source: OutputSource,
    private readonly pattern: RegExp = PUBLIC_HTTPS_PATTERN,
  ) {}

  async resolve(): Promise<string | null> {
    if (this.found) return this.found;

    this.pending += this.source.latestOutput();

    const lastNewline = this.pending.lastIndexOf('\n');
    if (lastNewline === -1) return null;

    const complete = this.pending.slice(0, lastNewline);
    this.pending = this.pending.slice(lastNewline + 1);

    for (const line of complete.split('\n')) {
      const match = this.pattern.exec(line.replace(ANSI_PATTERN, ''));
      if (match?.[1]) {
        this.found = match[1];
        return this.found;
      }
    }

    return null;
  }
}

/**
 * RunLock: keeps a single `hookline listen` run active per machine.
 *
 * The lock is a file created with the exclusive `wx` flag and holding the
 * owner's pid. A file whose pid no longer names a live process is stale and
 * gets replaced.
 */

import { readFileSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { Err, Ok, RunLockedError } from '../core/index.js';
import type { Result } from '../core/index.js';

export const LOCK_FILE_NAME = 'hookline-listen.lock';

export interface IRunLock {
  acquire(): Result<void, RunLockedError>;
  /** No-op unless this instance holds the lock. */
  release(): void;
}

export class RunLock implements IRunLock {
  private held = false;

  constructor(
    readonly path: string = join(tmpdir(), LOCK_FILE_NAME),
    private readonly pid: number = process.pid,
  ) {}

  acquire(): Result<void, RunLockedError> {
    if (this.held) return Ok(undefined);

    // Second pass only after removing a stale file.
    for (let attempt = 0; attempt < 2; attempt++) {
      if (this.tryCreate()) {
        this.held = true;
        return Ok(undefined);
      }

      const holder = readHolder(this.path);
      if (holder !== null && isAlive(holder)) {
        return Err(new RunLockedError(this.path, holder));
      }
      rmSync(this.path, { force: true });
    }

    return Err(new RunLockedError(this.path, readHolder(this.path)));
  }

  release(): void {
    if (!this.held) return;
    this.held = false;
    if (readHolder(this.path) === this.pid) {
      rmSync(this.path, { force: true });
    }
  }

  private tryCreate(): boolean {
    try {
      writeFileSync(this.path, String(this.pid), { flag: 'wx', mode: 0o600 });
      return true;
    } catch (err) {
      if (errnoCode(err) === 'EEXIST') return false;
      throw err;
    }
  }
}

// ── Helpers ──────────────────────────────────────────────────────────

/** Pid recorded in the lock file, or null when missing or unreadable. */
export function readHolder(path: string): number | null {
  let raw: string;
  try {
    raw = readFileSync(path, 'utf8');
  } catch (err) {
    if (errnoCode(err) === 'ENOENT') return null;
    throw err;
  }

  const pid = Number.parseInt(raw.trim(), 10);
  return Number.isInteger(pid) && pid > 0 ? pid : null;
}

/** Signal 0 probes for existence; EPERM means alive but owned by someone else. */
export function isAlive(pid: number): boolean {
  try {
    process.kill(pid, 0);
    return true;
  } catch (err) {
    return errnoCode(err) === 'EPERM';
  }
}

function errnoCode(err: unknown): unknown {
  return err instanceof Error && 'code' in err ? err.code : undefined;
}

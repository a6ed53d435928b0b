/**
 * TunnelProcess: supervises the external tunnelling binary.
 *
 * Spawns an OS process via child_process.spawn and exposes its liveness and
 * captured output without blocking the caller. Stdout and stderr are decoded
 * as UTF-8 streams and forwarded chunk by chunk to a single output handler so
 * strategies can scan them from their own poll loop. At most
 * MAX_CAPTURED_LENGTH characters of output are retained.
 *
 * There is no restart logic: a crash simply flips isRunning() to false and
 * callers treat that as the end of their loop.
 */

import { spawn, type ChildProcess } from 'node:child_process';
import { TunnelError } from '../core/index.js';
import type {
  OutputHandler,
  OutputStream,
  TunnelProcessHandle,
  TunnelProcessSpec,
} from '../core/index.js';

const DEFAULT_STARTUP_TIMEOUT_MS = 10_000;
const DEFAULT_KILL_TIMEOUT_MS = 5_000;

/** Only the tail of the tunnel's output is kept for error reports. */
export const MAX_CAPTURED_LENGTH = 64 * 1024;

export class TunnelProcess implements TunnelProcessHandle {
  private exited = false;
  private captured = '';
  private readOffset = 0;

  private constructor(
    private readonly proc: ChildProcess,
    private readonly spec: TunnelProcessSpec,
  ) {}

  /**
   * Spawn the binary and resolve once the OS reports it started.
   * Rejects with a TunnelError when the binary cannot be spawned in time.
   */
  static async start(spec: TunnelProcessSpec, onOutput?: OutputHandler): Promise<TunnelProcess> {
    const proc = spawn(spec.command, spec.args, {
      env: { ...process.env },
      stdio: ['ignore', 'pipe', 'pipe'],
    });

    const tunnel = new TunnelProcess(proc, spec);
    tunnel.attach(onOutput);

    await new Promise<void>((resolve, reject) => {
      const timeout = setTimeout(() => {
        cleanup();
        proc.kill('SIGKILL');
        reject(
          new TunnelError(
            `"${spec.command}" did not start within ${spec.startupTimeoutMs ?? DEFAULT_STARTUP_TIMEOUT_MS}ms`,
            spec.command,
          ),
        );
      }, spec.startupTimeoutMs ?? DEFAULT_STARTUP_TIMEOUT_MS);

      const onSpawn = () => {
        cleanup();
        resolve();
      };
      const onError = (err: Error) => {
        cleanup();
        reject(
          new TunnelError(`Failed to start "${spec.command}": ${err.message}`, spec.command, {
            args: spec.args,
          }),
        );
      };
      const cleanup = () => {
        clearTimeout(timeout);
        proc.off('spawn', onSpawn);
        proc.off('error', onError);
      };
      proc.once('spawn', onSpawn);
      proc.once('error', onError);
    });

    return tunnel;
  }

  get pid(): number | undefined {
    return this.proc.pid;
  }

  isRunning(): boolean {
    return !this.exited && this.proc.exitCode === null && this.proc.signalCode === null;
  }

  latestOutput(): string {
    const latest = this.captured.slice(this.readOffset);
    this.readOffset = this.captured.length;
    return latest;
  }

  /** The last MAX_CAPTURED_LENGTH characters the tunnel printed. */
  output(): string {
    return this.captured;
  }

  /** SIGTERM first, SIGKILL once the grace period runs out. */
  async stop(): Promise<void> {
    if (!this.isRunning()) return;

    const proc = this.proc;
    await new Promise<void>((resolve) => {
      const forceKill = setTimeout(() => {
        if (proc.exitCode === null && proc.signalCode === null) {
          proc.kill('SIGKILL');
        }
      }, this.spec.killTimeoutMs ?? DEFAULT_KILL_TIMEOUT_MS);
      forceKill.unref();

      proc.once('exit', () => {
        clearTimeout(forceKill);
        resolve();
      });

      proc.kill('SIGTERM');
    });
  }

  // ── Internal ─────────────────────────────────────────────────────────

  private attach(onOutput?: OutputHandler): void {
    const forward = (stream: OutputStream) => (chunk: string) => {
      this.capture(chunk);
      onOutput?.(chunk, stream);
    };

    // Stream decoding keeps multi-byte characters split across chunks intact.
    this.proc.stdout?.setEncoding('utf8');
    this.proc.stderr?.setEncoding('utf8');
    this.proc.stdout?.on('data', forward('stdout'));
    this.proc.stderr?.on('data', forward('stderr'));

    this.proc.on('exit', () => {
      this.exited = true;
    });
    this.proc.on('error', () => {
      this.exited = true;
    });
  }

  private capture(chunk: string): void {
    this.captured += chunk;
    const overflow = this.captured.length - MAX_CAPTURED_LENGTH;
    if (overflow > 0) {
      this.captured = this.captured.slice(overflow);
      this.readOffset = Math.max(0, this.readOffset - overflow);
    }
  }
}

/** Default SpawnTunnel used outside tests. */
export function spawnTunnelProcess(
  spec: TunnelProcessSpec,
  onOutput: OutputHandler,
): Promise<TunnelProcessHandle> {
  return TunnelProcess.start(spec, onOutput);
}

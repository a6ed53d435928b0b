/**
 * Contracts for the subprocess that exposes the local app, and for the
 * resolvers that find out which public URL it was given.
 */

/** Every value the `service` argument accepts. */
export const SERVICE_NAMES = ['expose', 'ngrok', 'custom', 'test'] as const;

export type ServiceName = (typeof SERVICE_NAMES)[number];

export function isServiceName(value: unknown): value is ServiceName {
  return typeof value === 'string' && (SERVICE_NAMES as readonly string[]).includes(value);
}

export type OutputStream = 'stdout' | 'stderr';

export type OutputHandler = (chunk: string, stream: OutputStream) => void;

export interface TunnelProcessSpec {
  /** Binary to execute (e.g. 'expose', 'ngrok'). */
  command: string;
  args: string[];
  /** Max time to wait for the OS to spawn the binary. */
  startupTimeoutMs?: number;
  /** Grace period between SIGTERM and SIGKILL on stop. */
  killTimeoutMs?: number;
}

/** A running tunnel subprocess, observed without blocking the caller. */
export interface TunnelProcessHandle {
  readonly pid: number | undefined;
  isRunning(): boolean;
  /** Output captured since the previous call. */
  latestOutput(): string;
  /** Everything captured so far. */
  output(): string;
  stop(): Promise<void>;
}

export type SpawnTunnel = (
  spec: TunnelProcessSpec,
  onOutput: OutputHandler,
) => Promise<TunnelProcessHandle>;

/** Discovers the public endpoint assigned to a running tunnel. */
export interface ITunnelUrlResolver {
  readonly id: string;
  /** Returns the public URL, or null while it is not known yet. */
  resolve(): Promise<string | null>;
}

export interface RequestLogEntry {
  id: string;
  statusCode: number;
  method: string;
  uri: string;
  timestamp: Date | null;
}

import { mkdtempSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { vi } from 'vitest';
import { ConfigValidationError, Ok } from '../core/index.js';
import type { IWebhookRegistry } from '../core/index.js';
import { NoopObserver } from '../observability/noop-observer.js';
import { RunLock } from '../supervisor/run-lock.js';
import type { CliRuntime } from './commands/listen.js';
import { VERSION, run } from './index.js';

let dir: string;

beforeEach(() => {
  dir = mkdtempSync(join(tmpdir(), 'hookline-cli-'));
});

afterEach(() => {
  rmSync(dir, { recursive: true, force: true });
  vi.restoreAllMocks();
});

function makeRuntime(overrides: Partial<CliRuntime> = {}) {
  const stdout: string[] = [];
  const stderr: string[] = [];
  const observer = new NoopObserver();
  const prompter = { question: vi.fn(async (_query: string) => 'ngrok') };

  const runtime: CliRuntime = {
    env: { LEMON_SQUEEZY_API_KEY: 'test-api-key', LEMON_SQUEEZY_STORE: '1234' },
    cwd: dir,
    stdout: { write: (chunk: string) => stdout.push(chunk) },
    stderr: { write: (chunk: string) => stderr.push(chunk) },
    interactive: false,
    prompter,
    observer,
    ...overrides,
    lifecycle: { lock: new RunLock(join(dir, 'listen.lock')), ...overrides.lifecycle },
  };

  return { runtime, stdout, stderr, observer, prompter };
}

function makeRegistry() {
  return {
    callbackUrl: (tunnelUrl: string) => `${tunnelUrl}/lemon-squeezy/webhook`,
    create: vi.fn<IWebhookRegistry['create']>(async () => Ok('wh_1')),
    list: vi.fn<IWebhookRegistry['list']>(async () => Ok(new Map())),
    delete: vi.fn<IWebhookRegistry['delete']>(async () => Ok(undefined)),
  };
}

const argv = (...args: string[]) => ['node', 'hookline', ...args];

describe('run', () => {
  it('exits 0 for the test service', async () => {
    const { runtime } = makeRuntime();

    expect(await run(argv('listen', 'test'), runtime)).toBe(0);
  });

  it('exits 1 and reports missing credentials', async () => {
    const { runtime, observer } = makeRuntime({ env: {} });
    const onError = vi.spyOn(observer, 'onError');

    const code = await run(argv('listen', 'test'), runtime);

    expect(code).toBe(1);
    const error = onError.mock.calls[0]?.[0];
    expect(error).toBeInstanceOf(ConfigValidationError);
    expect(error instanceof ConfigValidationError && error.issues).toEqual([
      'The LEMON_SQUEEZY_API_KEY environment variable is required.',
      'The LEMON_SQUEEZY_STORE environment variable is required.',
    ]);
  });

  it('exits 1 when the configuration is invalid', async () => {
    const { runtime, observer } = makeRuntime({
      env: { LEMON_SQUEEZY_API_KEY: 'test-api-key', LEMON_SQUEEZY_STORE: '1234', APP_URL: 'not a url' },
    });
    const onError = vi.spyOn(observer, 'onError');

    expect(await run(argv('listen', 'test'), runtime)).toBe(1);
    expect(onError.mock.calls[0]?.[0]).toBeInstanceOf(ConfigValidationError);
  });

  it('requires a service when it cannot prompt', async () => {
    const { runtime, observer, prompter } = makeRuntime();
    const onError = vi.spyOn(observer, 'onError');

    expect(await run(argv('listen'), runtime)).toBe(1);
    expect(prompter.question).not.toHaveBeenCalled();
    const error = onError.mock.calls[0]?.[0];
    expect(error instanceof ConfigValidationError && error.issues).toEqual(['The service field is required.']);
  });

  it('prompts for the service when interactive', async () => {
    const registry = makeRegistry();
    const { runtime, prompter } = makeRuntime({ interactive: true, lifecycle: { registry } });

    const code = await run(argv('listen', '--cleanup'), runtime);

    expect(code).toBe(0);
    expect(prompter.question).toHaveBeenCalledTimes(1);
    expect(registry.list).toHaveBeenCalledTimes(1);
  });

  it('passes --url through to the custom cleanup', async () => {
    const registry = makeRegistry();
    registry.list.mockResolvedValue(
      Ok(
        new Map([
          ['1', 'https://hooks.example.test/lemon-squeezy/webhook'],
          ['2', 'https://abc.ngrok-free.app/lemon-squeezy/webhook'],
        ]),
      ),
    );
    const { runtime } = makeRuntime({ lifecycle: { registry } });

    const code = await run(argv('listen', 'custom', '--url', 'https://hooks.example.test', '--cleanup'), runtime);

    expect(code).toBe(0);
    expect(registry.delete).toHaveBeenCalledTimes(1);
    expect(registry.delete).toHaveBeenCalledWith('1');
  });

  it('prints help and exits 0', async () => {
    const { runtime, stdout } = makeRuntime();

    expect(await run(argv('--help'), runtime)).toBe(0);
    expect(stdout.join('')).toContain('Usage: hookline');
  });

  it('prints the version', async () => {
    const { runtime, stdout } = makeRuntime();

    expect(await run(argv('--version'), runtime)).toBe(0);
    expect(stdout.join('')).toBe(`${VERSION}\n`);
  });

  it('exits 1 for an unknown option', async () => {
    const { runtime, stderr } = makeRuntime();

    expect(await run(argv('listen', 'test', '--bogus'), runtime)).toBe(1);
    expect(stderr.join('')).toContain("unknown option '--bogus'");
  });
});

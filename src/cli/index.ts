#!/usr/bin/env node
/**
 * hookline CLI entry point.
 *
 *   hookline listen <service> [--url <url>] [--cleanup] [--verbose]
 */

import { realpathSync } from 'node:fs';
import path from 'node:path';
import { fileURLToPath } from 'node:url';
import { Command, CommanderError } from 'commander';
import { listen } from './commands/listen.js';
import type { CliRuntime, ListenCommandOptions } from './commands/listen.js';
import { terminalPrompter } from './prompt.js';

export const VERSION = '0.1.0';

export function defaultCliRuntime(): CliRuntime {
  return {
    env: process.env,
    cwd: process.cwd(),
    stdout: process.stdout,
    stderr: process.stderr,
    interactive: Boolean(process.stdin.isTTY),
    prompter: terminalPrompter,
  };
}

export function buildProgram(runtime: CliRuntime, onExit: (code: number) => void): Command {
  const program = new Command();

  program
    .name('hookline')
    .description('Expose a local app through a tunnel and keep a Lemon Squeezy webhook pointed at it')
    .version(VERSION)
    .exitOverride();

  program.configureOutput({
    writeOut: (message) => {
      runtime.stdout.write(message);
    },
    writeErr: (message) => {
      runtime.stderr.write(message);
    },
  });

  program
    .command('listen')
    .description('Listen for Lemon Squeezy webhooks via expose, ngrok or a custom URL')
    .argument('[service]', 'expose, ngrok, custom or test')
    .option('--url <url>', 'public URL to register when using the custom service')
    .option('--cleanup', 'remove every webhook that belongs to the service')
    .option('--verbose', 'print the tunnel output from the start')
    .action(async (service: string | undefined, options: ListenCommandOptions) => {
      onExit(await listen(service, options, runtime));
    });

  return program;
}

export async function run(argv: string[] = process.argv, runtime: CliRuntime = defaultCliRuntime()): Promise<number> {
  let exitCode = 0;
  const program = buildProgram(runtime, (code) => {
    exitCode = code;
  });

  try {
    await program.parseAsync(argv);
    return exitCode;
  } catch (error: unknown) {
    if (error instanceof CommanderError) {
      return error.exitCode;
    }

    const message = error instanceof Error ? error.message : 'Unknown error';
    runtime.stderr.write(`${message}\n`);
    return 1;
  }
}

function isMainModule(): boolean {
  const entry = process.argv[1];
  if (!entry) {
    return false;
  }

  try {
    return realpathSync(path.resolve(entry)) === fileURLToPath(import.meta.url);
  } catch {
    return false;
  }
}

if (isMainModule()) {
  void run().then((code) => {
    process.exitCode = code;
  });
}

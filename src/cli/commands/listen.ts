/**
 * `hookline listen [service]`: load config, resolve the service, then hand
 * over to the LifecycleController.
 */

import { ConfigValidationError } from '../../core/index.js';
import type { HooklineConfig, IObserver } from '../../core/index.js';
import { LifecycleController } from '../../lifecycle/index.js';
import type { ExitStatus, LifecycleControllerDeps } from '../../lifecycle/index.js';
import { ConsoleObserver } from '../../observability/index.js';
import { ConfigLoadError, loadConfig } from '../config.js';
import { promptForService } from '../prompt.js';
import type { Prompter } from '../prompt.js';

export interface ListenCommandOptions {
  url?: string;
  cleanup?: boolean;
  verbose?: boolean;
}

export interface OutputWriter {
  write(chunk: string): unknown;
}

/** Everything the CLI takes from its surroundings. */
export interface CliRuntime {
  env: NodeJS.ProcessEnv;
  cwd: string;
  stdout: OutputWriter;
  stderr: OutputWriter;
  /** Whether the service may be asked for interactively. */
  interactive: boolean;
  prompter: Prompter;
  /** Replaces the console observer built from config. */
  observer?: IObserver;
  /** Overrides for the controller's collaborators. */
  lifecycle?: Omit<LifecycleControllerDeps, 'observer'>;
}

export async function listen(
  service: string | undefined,
  options: ListenCommandOptions,
  runtime: CliRuntime,
): Promise<ExitStatus> {
  let config: HooklineConfig;
  try {
    config = loadConfig(runtime.env, runtime.cwd);
  } catch (err) {
    if (err instanceof ConfigLoadError || err instanceof ConfigValidationError) {
      (runtime.observer ?? new ConsoleObserver()).onError(err, {});
      return 1;
    }
    throw err;
  }

  const observer = runtime.observer ?? new ConsoleObserver(config.logLevel);

  let selected = service;
  if (!selected && runtime.interactive) {
    selected = await promptForService(runtime.prompter, (message) => runtime.stderr.write(message));
  }

  const controller = new LifecycleController(config, { ...runtime.lifecycle, observer });
  return controller.run({
    service: selected,
    url: options.url,
    cleanup: options.cleanup ?? false,
    verbose: options.verbose ?? false,
  });
}

export {
  LifecycleController,
  validateListen,
  processSignals,
  DEFAULT_TIMING,
  LOCAL_ENVIRONMENTS,
} from './controller.js';
export type { ListenOptions, ValidatedListen, SignalSource, LifecycleControllerDeps } from './controller.js';

export { RunContext } from './context.js';
export type { ExitStatus, RunOutcome, RunTiming, TunnelState, RunContextInit } from './context.js';

export {
  ExposeStrategy,
  NgrokStrategy,
  CustomStrategy,
  TestStrategy,
  createStrategy,
  normalizeBaseUrl,
} from './strategies.js';
export type { ITunnelStrategy, TunnelStrategy } from './strategies.js';

/**
 * Everything hookline prints goes through an IObserver defined here.
 */

export { ConsoleObserver, LOG_LEVELS } from './console-observer.js';
export type { LogLevel } from './console-observer.js';

export { NoopObserver } from './noop-observer.js';

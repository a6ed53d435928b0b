/**
 * Public API of hookline, the tunnel-and-webhook lifecycle manager for Lemon Squeezy.
 */

export * from './core/index.js';
export * from './supervisor/index.js';
export * from './tunnels/index.js';
export * from './webhooks/index.js';
export * from './observability/index.js';
export * from './lifecycle/index.js';
export { loadConfig, getDefaultConfig, ConfigLoadError, CONFIG_FILE_NAME } from './cli/config.js';
export { run } from './cli/index.js';

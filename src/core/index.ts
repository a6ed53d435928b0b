export * from './errors/index.js';
export * from './result.js';
export * from './interfaces/tunnel.js';
export type * from './interfaces/webhook.js';
export type * from './interfaces/observer.js';
export type * from './interfaces/config.js';

/**
 * Tunnel providers: the commands that expose the local app, the resolvers
 * that discover its public URL, and ngrok's request log.
 */

export { OutputScrapeResolver, PUBLIC_HTTPS_PATTERN } from './output-scrape.js';
export type { OutputSource } from './output-scrape.js';

export { LocalApiResolver } from './local-api.js';
export type { LocalApiResolverOptions } from './local-api.js';

export { RequestLogTail, formatRequestLine, formatClock } from './request-log.js';
export type { RequestLogTailOptions } from './request-log.js';

export {
  EXPOSE_DOMAINS,
  NGROK_DOMAINS,
  NGROK_API_URL,
  exposeCommand,
  ngrokCommand,
  customDomains,
} from './services.js';

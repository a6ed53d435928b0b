/**
 * Resolved configuration for one invocation.
 */

export interface HooklineConfig {
  /** Billing API key. Checked before a run, so absent here means "not set". */
  apiKey?: string;
  /** Store the webhooks belong to. */
  storeId?: string;
  /** Signing secret given to new webhooks; random per webhook when absent. */
  signingSecret?: string;
  /** Path segment the local app serves webhooks under. */
  path: string;
  /** Base URL of the local app the tunnel forwards to. */
  appUrl: string;
  /** Name of the current environment; listening is limited to local ones. */
  environment: string;
  /** Billing API base URL. */
  apiBaseUrl: string;
  /** ngrok inspection API base URL. */
  ngrokApiUrl: string;
  logLevel: 'debug' | 'info' | 'warn' | 'error';
}

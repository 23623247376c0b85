/**
 * Portal Runtime Types
 */

import type { GatewayConfig } from '../gateway/types.js';

export interface PortalConfig {
  /** Port for the HTTP server to listen on */
  port: number;

  /** Absolute URL of the site, used in redirects */
  baseUrl: string;

  /**
   * Gateway connection. When absent the active connection key in
   * `privateDir` is used.
   */
  gateway?: GatewayConfig;

  /** Directory holding connection keys */
  privateDir: string;

  /** Root API key for the management API (generated when absent) */
  rootKey?: string;
}

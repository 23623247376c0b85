/**
 * Portal Server
 *
 * Wires the gateway client, the developer cache and storage, the local
 * accounts and the management API behind one HTTP server.
 */

import http from 'node:http';
import type { AddressInfo } from 'node:net';
import { v4 as uuidv4 } from 'uuid';
import { InMemoryAccountStore } from '../accounts/store.js';
import { DeveloperStorage } from '../entity/developer-storage.js';
import { DeveloperAppController } from '../gateway/app-controller.js';
import { GatewayClient } from '../gateway/client.js';
import { DeveloperController, createDeveloperCache } from '../gateway/developer-controller.js';
import type { GatewayConfig } from '../gateway/types.js';
import { createLogger, decodeException } from '../logging/logger.js';
import type { Logger } from '../logging/logger.js';
import { PortalApi } from '../management/api.js';
import { ApiKeyStore } from '../management/store.js';
import { AuthKeyStore, toGatewayConfig } from '../settings/auth-key.js';
import type { PortalConfig } from './types.js';

export interface PortalServerOptions {
  /** Fetch implementation for gateway calls (defaults to global fetch) */
  fetch?: typeof fetch;
  accounts?: InMemoryAccountStore;
  logger?: Logger;
}

/**
 * Gateway settings from the config, or from the active connection key.
 */
export function resolveGatewayConfig(config: PortalConfig): GatewayConfig {
  if (config.gateway) {
    return config.gateway;
  }
  const key = new AuthKeyStore(config.privateDir).ensureActiveKey();
  return toGatewayConfig(key.value);
}

export class PortalServer {
  private config: PortalConfig;
  private httpServer: http.Server;
  private logger: Logger;
  private started = false;

  readonly keys: ApiKeyStore;
  readonly accounts: InMemoryAccountStore;
  readonly developerController: DeveloperController;
  readonly developers: DeveloperStorage;
  readonly api: PortalApi;

  constructor(config: PortalConfig, options: PortalServerOptions = {}) {
    this.config = config;
    this.logger = options.logger ?? createLogger('portal');

    const client = new GatewayClient({ ...resolveGatewayConfig(config), fetch: options.fetch });

    this.keys = new ApiKeyStore();
    this.accounts = options.accounts ?? new InMemoryAccountStore();
    this.developerController = new DeveloperController(client, createDeveloperCache());
    this.developers = new DeveloperStorage({
      controller: this.developerController,
      accounts: this.accounts,
      logger: this.logger,
    });
    this.api = new PortalApi({
      keys: this.keys,
      developers: this.developers,
      apps: new DeveloperAppController(client),
      accounts: this.accounts,
      baseUrl: config.baseUrl,
      logger: this.logger,
    });

    this.httpServer = http.createServer((req, res) => {
      this.handleRequest(req, res).catch((error: unknown) => {
        this.logger.error('Request error. %type: @message', decodeException(error));
        if (!res.headersSent) {
          res.writeHead(500, { 'Content-Type': 'application/json' });
        }
        res.end(JSON.stringify({ error: 'Internal error' }));
      });
    });
  }

  /**
   * Start the server. Returns the root API key.
   */
  async start(): Promise<string> {
    if (this.started) {
      throw new Error('Server already started');
    }

    const rootKey = this.keys.initialize(this.config.rootKey);

    await new Promise<void>((resolve, reject) => {
      this.httpServer.once('error', reject);
      this.httpServer.listen(this.config.port, () => {
        this.httpServer.off('error', reject);
        resolve();
      });
    });

    this.started = true;
    this.logger.info('Developer portal listening on port %port', { '%port': this.getPort() });
    return rootKey;
  }

  async stop(): Promise<void> {
    if (!this.started) {
      return;
    }
    await new Promise<void>((resolve) => this.httpServer.close(() => resolve()));
    this.started = false;
    this.logger.info('Developer portal stopped');
  }

  /**
   * Get the port the HTTP server is listening on.
   */
  getPort(): number {
    const address = this.httpServer.address();
    if (address === null || typeof address === 'string') {
      return this.config.port;
    }
    const info: AddressInfo = address;
    return info.port;
  }

  private async handleRequest(req: http.IncomingMessage, res: http.ServerResponse): Promise<void> {
    res.setHeader('X-Request-Id', uuidv4());

    const url = new URL(req.url || '/', `http://${req.headers.host}`);
    if (req.method === 'GET' && url.pathname === '/health') {
      res.writeHead(200, { 'Content-Type': 'application/json' });
      res.end(JSON.stringify({ status: 'ok' }));
      return;
    }

    if (await this.api.handle(req, res)) {
      return;
    }

    res.writeHead(404, { 'Content-Type': 'application/json' });
    res.end(JSON.stringify({ error: 'Not found' }));
  }
}

/**
 * Create and start a portal server.
 */
export async function createServer(
  config: PortalConfig,
  options: PortalServerOptions = {}
): Promise<{ server: PortalServer; rootKey: string }> {
  const server = new PortalServer(config, options);
  const rootKey = await server.start();
  return { server, rootKey };
}

#!/usr/bin/env node
/**
 * Developer portal CLI
 *
 * Reads configuration from a JSON file or from environment variables and
 * starts the server.
 */

import fs from 'node:fs';
import { createServer } from './server.js';
import type { PortalConfig } from './types.js';
import type { GatewayConfig } from '../gateway/types.js';

async function main() {
  console.log('Developer portal v0.1.0');
  console.log('=======================');

  const config = loadConfig();
  const { server, rootKey } = await createServer(config);

  const shutdown = async () => {
    console.log('\nShutting down...');
    await server.stop();
    process.exit(0);
  };

  const onSignal = () => {
    shutdown().catch((error: unknown) => {
      console.error('Shutdown failed:', error);
      process.exit(1);
    });
  };
  process.on('SIGINT', onSignal);
  process.on('SIGTERM', onSignal);

  if (!config.rootKey) {
    console.log('');
    console.log('========================================');
    console.log('ROOT API KEY (save this, shown only once):');
    console.log(rootKey);
    console.log('========================================');
    console.log('');
  }
}

function loadGatewayFromEnv(): GatewayConfig | undefined {
  const organization = process.env.GATEWAY_ORGANIZATION;
  const endpoint = process.env.GATEWAY_ENDPOINT;
  if (!organization || !endpoint) {
    return undefined;
  }

  if (process.env.GATEWAY_ACCESS_TOKEN) {
    return {
      endpoint,
      organization,
      auth: { type: 'oauth', accessToken: process.env.GATEWAY_ACCESS_TOKEN },
    };
  }
  return {
    endpoint,
    organization,
    auth: {
      type: 'basic',
      username: process.env.GATEWAY_USERNAME || '',
      password: process.env.GATEWAY_PASSWORD || '',
    },
  };
}

function loadConfig(): PortalConfig {
  const port = parseInt(process.env.PORTAL_PORT || '3000', 10);
  const baseUrl = process.env.PORTAL_BASE_URL || `http://localhost:${port}`;
  const privateDir = process.env.PORTAL_PRIVATE_DIR || './private';
  const configPath = process.env.PORTAL_CONFIG_PATH || './portal.config.json';

  if (fs.existsSync(configPath)) {
    console.log(`Loading config from ${configPath}`);
    const configFile: Partial<PortalConfig> = JSON.parse(fs.readFileSync(configPath, 'utf-8'));
    return {
      port: configFile.port || port,
      baseUrl: configFile.baseUrl || baseUrl,
      gateway: configFile.gateway || loadGatewayFromEnv(),
      privateDir: configFile.privateDir || privateDir,
      rootKey: configFile.rootKey || process.env.PORTAL_ROOT_KEY,
    };
  }

  return {
    port,
    baseUrl,
    gateway: loadGatewayFromEnv(),
    privateDir,
    rootKey: process.env.PORTAL_ROOT_KEY,
  };
}

main().catch((error) => {
  console.error('Fatal error:', error);
  process.exit(1);
});

export { PortalServer, createServer, resolveGatewayConfig } from './server.js';
export type { PortalServerOptions } from './server.js';
export type { PortalConfig } from './types.js';

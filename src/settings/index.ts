export {
  AuthKeyStore,
  AUTH_TYPE_BASIC,
  AUTH_TYPE_OAUTH,
  emptyKeyValue,
  toGatewayConfig,
} from './auth-key.js';
export type { AuthKey, AuthKeyValue, AuthType } from './auth-key.js';

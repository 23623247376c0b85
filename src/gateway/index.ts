/**
 * Gateway Module - client for the API gateway's management API
 */

export { GatewayClient } from './client.js';
export { GatewayDeveloper } from './developer.js';
export { GatewayApp } from './app.js';
export {
  DeveloperController,
  createDeveloperCache,
  isEntityCacheAware,
} from './developer-controller.js';
export { DeveloperAppController } from './app-controller.js';
export {
  ApiException,
  ClientErrorException,
  DeveloperAlreadyExistsException,
  DeveloperDoesNotExistException,
  ERROR_CODE_DEVELOPER_ALREADY_EXISTS,
  ERROR_CODE_DEVELOPER_DOES_NOT_EXIST,
} from './errors.js';
export { DEVELOPER_STATUS_ACTIVE, DEVELOPER_STATUS_INACTIVE } from './types.js';
export type { GatewayClientOptions, HttpMethod, RequestOptions } from './client.js';
export type { RemoteDeveloperResource } from './developer.js';
export type { DeveloperLookup, EntityCacheAwareController } from './developer-controller.js';
export type {
  Attribute,
  AppCredential,
  AppData,
  AppStatus,
  CredentialProduct,
  DeveloperData,
  DeveloperStatus,
  GatewayAuth,
  GatewayConfig,
} from './types.js';

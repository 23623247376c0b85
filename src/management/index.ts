/**
 * Management Module - API for developers, their apps and API keys
 */

export { PortalApi, CURRENT_USER_HEADER, statusForError } from './api.js';
export { ApiKeyStore } from './store.js';
export { API_KEY_PERMISSIONS } from './types.js';
export type { PortalApiOptions } from './api.js';
export type {
  ApiKey,
  ApiKeyPermission,
  CreateApiKeyRequest,
  CreateApiKeyResponse,
  CreateDeveloperRequest,
  UpdateDeveloperRequest,
} from './types.js';

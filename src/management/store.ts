/**
 * API Key Store - in-memory API keys for the management API
 */

import { createHash, randomBytes } from 'node:crypto';
import type {
  ApiKey,
  ApiKeyPermission,
  CreateApiKeyRequest,
  CreateApiKeyResponse,
} from './types.js';

const KEY_PREFIX = 'portal_';

export class ApiKeyStore {
  private apiKeys: Map<string, ApiKey> = new Map();
  private rootApiKey: string | null = null;

  /**
   * Register the root key, generating one if none is given
   */
  initialize(rootKey?: string): string {
    const key = rootKey || `${KEY_PREFIX}${randomBytes(32).toString('hex')}`;
    this.rootApiKey = key;
    this.apiKeys.set('root', {
      id: 'root',
      name: 'Root API Key',
      keyHash: this.hashKey(key),
      createdAt: new Date().toISOString(),
      permissions: ['admin'],
    });
    return key;
  }

  /**
   * Get the root API key (only available at startup)
   */
  getRootApiKey(): string | null {
    return this.rootApiKey;
  }

  private hashKey(key: string): string {
    return createHash('sha256').update(key).digest('hex');
  }

  validateApiKey(key: string): ApiKey | null {
    const keyHash = this.hashKey(key);
    for (const apiKey of this.apiKeys.values()) {
      if (apiKey.keyHash === keyHash) {
        apiKey.lastUsedAt = new Date().toISOString();
        return apiKey;
      }
    }
    return null;
  }

  hasPermission(apiKey: ApiKey, permission: ApiKeyPermission): boolean {
    return apiKey.permissions.includes('admin') || apiKey.permissions.includes(permission);
  }

  createApiKey(request: CreateApiKeyRequest): CreateApiKeyResponse {
    const id = randomBytes(8).toString('hex');
    const key = `${KEY_PREFIX}${randomBytes(32).toString('hex')}`;

    this.apiKeys.set(id, {
      id,
      name: request.name,
      keyHash: this.hashKey(key),
      createdAt: new Date().toISOString(),
      permissions: request.permissions,
    });

    return {
      id,
      name: request.name,
      key, // Only returned once
      permissions: request.permissions,
    };
  }

  listApiKeys(): Omit<ApiKey, 'keyHash'>[] {
    return Array.from(this.apiKeys.values()).map(({ keyHash: _keyHash, ...rest }) => rest);
  }

  deleteApiKey(id: string): boolean {
    if (id === 'root') {
      return false; // Cannot delete root key
    }
    return this.apiKeys.delete(id);
  }
}

/**
 * Management API Types
 */

import type { DeveloperStatus } from '../gateway/types.js';

export interface ApiKey {
  id: string;
  name: string;
  keyHash: string; // SHA-256 hash of the actual key
  createdAt: string;
  lastUsedAt?: string;
  permissions: ApiKeyPermission[];
}

export type ApiKeyPermission =
  | 'developers:read'
  | 'developers:write'
  | 'apps:read'
  | 'admin';

export const API_KEY_PERMISSIONS: readonly ApiKeyPermission[] = [
  'developers:read',
  'developers:write',
  'apps:read',
  'admin',
];

export interface CreateApiKeyRequest {
  name: string;
  permissions: ApiKeyPermission[];
}

export interface CreateApiKeyResponse {
  id: string;
  name: string;
  key: string; // Only returned once at creation
  permissions: ApiKeyPermission[];
}

export interface CreateDeveloperRequest {
  email: string;
  firstName: string;
  lastName: string;
  userName: string;
  status?: DeveloperStatus;
  attributes?: { name: string; value: string }[];
  /** Local account that owns the developer */
  ownerId?: number;
}

export interface UpdateDeveloperRequest {
  email?: string;
  firstName?: string;
  lastName?: string;
  userName?: string;
  status?: DeveloperStatus;
}

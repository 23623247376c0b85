/**
 * Gateway Types
 *
 * Wire shapes of the management API. Every field is optional on the wire:
 * list endpoints without `expand=true` return partial records.
 */

export type DeveloperStatus = 'active' | 'inactive';

export const DEVELOPER_STATUS_ACTIVE: DeveloperStatus = 'active';
export const DEVELOPER_STATUS_INACTIVE: DeveloperStatus = 'inactive';

export interface Attribute {
  name: string;
  value: string;
}

export interface DeveloperData {
  /** Remote UUID, assigned by the gateway */
  developerId?: string;
  email?: string;
  firstName?: string;
  lastName?: string;
  userName?: string;
  status?: DeveloperStatus;
  organizationName?: string;
  /** Names of the developer's apps */
  apps?: string[];
  /** Names of the companies the developer belongs to */
  companies?: string[];
  attributes?: Attribute[];
  /** Epoch milliseconds */
  createdAt?: number;
  createdBy?: string;
  /** Epoch milliseconds */
  lastModifiedAt?: number;
  lastModifiedBy?: string;
}

export type AppStatus = 'approved' | 'revoked' | 'pending';

export interface CredentialProduct {
  apiproduct: string;
  status: AppStatus;
}

export interface AppCredential {
  consumerKey: string;
  consumerSecret?: string;
  status: AppStatus;
  apiProducts: CredentialProduct[];
  expiresAt?: number;
  issuedAt?: number;
}

export interface AppData {
  appId?: string;
  name?: string;
  displayName?: string;
  status?: AppStatus;
  developerId?: string;
  callbackUrl?: string;
  description?: string;
  apiProducts?: string[];
  credentials?: AppCredential[];
  attributes?: Attribute[];
  createdAt?: number;
  lastModifiedAt?: number;
}

export type GatewayAuth =
  | { type: 'basic'; username: string; password: string }
  | { type: 'oauth'; accessToken: string };

export interface GatewayConfig {
  /** Management API base URL, e.g. https://gateway.example.com/v1 */
  endpoint: string;
  organization: string;
  auth: GatewayAuth;
}

/**
 * Error body returned by the management API.
 */
export interface GatewayErrorBody {
  code?: string;
  message?: string;
}

/**
 * Connection settings key store
 *
 * The gateway credentials live in a JSON "key" file inside the private
 * directory, one file per key, with the active key recorded in
 * settings.json next to them:
 *
 *   {privateDir}/.portal/settings.json   { "active_key": "<id>" }
 *   {privateDir}/.portal/<id>.json       { "auth_type": "basic", ... }
 */

import fs from 'node:fs';
import path from 'node:path';
import { v4 as uuidv4 } from 'uuid';
import type { GatewayConfig } from '../gateway/types.js';

export const AUTH_TYPE_BASIC = 'basic';
export const AUTH_TYPE_OAUTH = 'oauth';

export type AuthType = typeof AUTH_TYPE_BASIC | typeof AUTH_TYPE_OAUTH;

export interface AuthKeyValue {
  auth_type: AuthType;
  endpoint: string;
  organization: string;
  username: string;
  password: string;
  /** Only for oauth keys */
  access_token?: string;
}

export interface AuthKey {
  id: string;
  value: AuthKeyValue;
}

interface Settings {
  active_key?: string;
}

const KEY_DIRECTORY = '.portal';
const SETTINGS_FILE = 'settings.json';

export function emptyKeyValue(): AuthKeyValue {
  return {
    auth_type: AUTH_TYPE_BASIC,
    endpoint: '',
    organization: '',
    username: '',
    password: '',
  };
}

function isAuthKeyValue(value: unknown): value is AuthKeyValue {
  if (typeof value !== 'object' || value === null) {
    return false;
  }
  const record: Record<string, unknown> = { ...value };
  return (
    (record.auth_type === AUTH_TYPE_BASIC || record.auth_type === AUTH_TYPE_OAUTH) &&
    typeof record.endpoint === 'string' &&
    typeof record.organization === 'string' &&
    typeof record.username === 'string' &&
    typeof record.password === 'string'
  );
}

export class AuthKeyStore {
  private directory: string;

  constructor(privateDir: string) {
    this.directory = path.join(privateDir, KEY_DIRECTORY);
  }

  keyPath(id: string): string {
    return path.join(this.directory, `${id}.json`);
  }

  /**
   * The active key, creating an empty basic-auth one when there is none.
   */
  ensureActiveKey(): AuthKey {
    const active = this.getActiveKey();
    if (active) {
      return active;
    }

    const key: AuthKey = { id: uuidv4(), value: emptyKeyValue() };
    this.saveKeyValue(key.id, key.value);
    this.writeSettings({ ...this.readSettings(), active_key: key.id });
    return key;
  }

  getActiveKeyId(): string | null {
    return this.readSettings().active_key ?? null;
  }

  getActiveKey(): AuthKey | null {
    const id = this.getActiveKeyId();
    if (id === null) {
      return null;
    }
    const value = this.readKeyValue(id);
    return value ? { id, value } : null;
  }

  /**
   * Raw JSON of a key file, as stored.
   */
  readRawKeyValue(id: string): string | null {
    const file = this.keyPath(id);
    if (!fs.existsSync(file)) {
      return null;
    }
    return fs.readFileSync(file, 'utf-8');
  }

  readKeyValue(id: string): AuthKeyValue | null {
    const raw = this.readRawKeyValue(id);
    if (raw === null) {
      return null;
    }
    const parsed: unknown = JSON.parse(raw);
    if (!isAuthKeyValue(parsed)) {
      throw new Error(`Connection key ${id} is malformed`);
    }
    return parsed;
  }

  saveKeyValue(id: string, value: AuthKeyValue): void {
    fs.mkdirSync(this.directory, { recursive: true, mode: 0o700 });
    fs.writeFileSync(this.keyPath(id), JSON.stringify(value), { mode: 0o600 });
  }

  setActiveKey(id: string): void {
    if (this.readRawKeyValue(id) === null) {
      throw new Error(`Connection key ${id} does not exist`);
    }
    this.writeSettings({ ...this.readSettings(), active_key: id });
  }

  private readSettings(): Settings {
    const file = path.join(this.directory, SETTINGS_FILE);
    if (!fs.existsSync(file)) {
      return {};
    }
    const parsed: unknown = JSON.parse(fs.readFileSync(file, 'utf-8'));
    if (typeof parsed !== 'object' || parsed === null) {
      return {};
    }
    const record: Record<string, unknown> = { ...parsed };
    return typeof record.active_key === 'string' ? { active_key: record.active_key } : {};
  }

  private writeSettings(settings: Settings): void {
    fs.mkdirSync(this.directory, { recursive: true, mode: 0o700 });
    fs.writeFileSync(path.join(this.directory, SETTINGS_FILE), JSON.stringify(settings, null, 2));
  }
}

/**
 * Gateway client settings from a key value.
 */
export function toGatewayConfig(value: AuthKeyValue): GatewayConfig {
  const missing: string[] = [];
  if (!value.endpoint) missing.push('endpoint');
  if (!value.organization) missing.push('organization');

  if (value.auth_type === AUTH_TYPE_OAUTH) {
    if (!value.access_token) missing.push('access_token');
  } else {
    if (!value.username) missing.push('username');
    if (!value.password) missing.push('password');
  }

  if (missing.length > 0) {
    throw new Error(`Connection key is incomplete: missing ${missing.join(', ')}`);
  }

  return {
    endpoint: value.endpoint,
    organization: value.organization,
    auth:
      value.auth_type === AUTH_TYPE_OAUTH
        ? { type: 'oauth', accessToken: value.access_token ?? '' }
        : { type: 'basic', username: value.username, password: value.password },
  };
}

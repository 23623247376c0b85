import type { AppCredential, AppData, AppStatus } from './types.js';

/**
 * Developer app record as returned by the management API.
 */
export class GatewayApp {
  private data: AppData;

  constructor(data: AppData = {}) {
    this.data = {
      ...data,
      apiProducts: [...(data.apiProducts ?? [])],
      credentials: (data.credentials ?? []).map((c) => ({
        ...c,
        apiProducts: c.apiProducts.map((p) => ({ ...p })),
      })),
      attributes: (data.attributes ?? []).map((a) => ({ ...a })),
    };
  }

  id(): string | null {
    return this.data.appId ?? null;
  }

  getName(): string | null {
    return this.data.name ?? null;
  }

  getDisplayName(): string | null {
    return this.data.displayName ?? this.getAttributeValue('DisplayName');
  }

  getStatus(): AppStatus | null {
    return this.data.status ?? null;
  }

  getDeveloperId(): string | null {
    return this.data.developerId ?? null;
  }

  getCallbackUrl(): string | null {
    return this.data.callbackUrl ?? null;
  }

  getDescription(): string | null {
    return this.data.description ?? this.getAttributeValue('Notes');
  }

  getCredentials(): AppCredential[] {
    return this.data.credentials ?? [];
  }

  getAttributeValue(name: string): string | null {
    const attribute = (this.data.attributes ?? []).find((a) => a.name === name);
    return attribute ? attribute.value : null;
  }

  getCreatedAt(): Date | null {
    return this.data.createdAt === undefined ? null : new Date(this.data.createdAt);
  }

  toJSON(): AppData {
    return { ...this.data };
  }
}

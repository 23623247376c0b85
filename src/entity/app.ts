import type { Account } from '../accounts/types.js';
import type { GatewayApp } from '../gateway/app.js';
import type { AppCredential, AppData, AppStatus } from '../gateway/types.js';
import type { AppOperation, LinkParams } from './types.js';

export const ADMINISTER_APPS_PERMISSION = 'administer developer_app';

const LINK_TEMPLATES: Record<string, string> = {
  canonical: '/developer-apps/{app_id}',
  'edit-form': '/developer-apps/{app_id}/edit',
  'delete-form': '/developer-apps/{app_id}/delete',
  'canonical-by-developer': '/user/{user}/apps/{app}',
  'edit-form-for-developer': '/user/{user}/apps/{app}/edit',
  'delete-form-for-developer': '/user/{user}/apps/{app}/delete',
};

/**
 * Developer app entity.
 */
export class DeveloperApp {
  static readonly ENTITY_TYPE = 'developer_app';

  constructor(private readonly decorated: GatewayApp) {}

  id(): string | null {
    return this.decorated.id();
  }

  getName(): string {
    return this.decorated.getName() ?? '';
  }

  getAppId(): string | null {
    return this.decorated.id();
  }

  getDeveloperId(): string | null {
    return this.decorated.getDeveloperId();
  }

  getStatus(): AppStatus | null {
    return this.decorated.getStatus();
  }

  getCallbackUrl(): string | null {
    return this.decorated.getCallbackUrl();
  }

  getDescription(): string | null {
    return this.decorated.getDescription();
  }

  getCredentials(): AppCredential[] {
    return this.decorated.getCredentials();
  }

  label(): string {
    return this.decorated.getDisplayName() || this.getName();
  }

  hasLinkTemplate(rel: string): boolean {
    return rel in LINK_TEMPLATES;
  }

  /**
   * Path of a link template. `{app}` and `{app_id}` are filled from the
   * app itself.
   */
  toUrl(rel: string, params: LinkParams = {}): string {
    const template = LINK_TEMPLATES[rel];
    if (template === undefined) {
      throw new Error(`No "${rel}" link template for developer apps`);
    }

    const values: LinkParams = {
      app: this.getName(),
      app_id: this.getAppId() ?? '',
      ...params,
    };
    return template.replace(/\{(\w+)\}/g, (_placeholder: string, name: string) => {
      const value = values[name];
      if (value === undefined) {
        throw new Error(`Missing "${name}" parameter for the "${rel}" link`);
      }
      return encodeURIComponent(String(value));
    });
  }

  /**
   * Apps are visible to their own developer and to app administrators.
   */
  access(_operation: AppOperation, account: Account): boolean {
    if (account.permissions.includes(ADMINISTER_APPS_PERMISSION)) {
      return true;
    }
    const developerId = this.getDeveloperId();
    return developerId !== null && account.developerId === developerId;
  }

  toJSON(): AppData {
    return this.decorated.toJSON();
  }
}

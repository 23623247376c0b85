import type { GatewayClient } from './client.js';
import { GatewayApp } from './app.js';
import type { AppData } from './types.js';

interface AppListResponse {
  app?: AppData[];
}

/**
 * Developer apps on the management API.
 */
export class DeveloperAppController {
  constructor(private readonly client: GatewayClient) {}

  /**
   * Apps of a developer, by developer UUID or email.
   */
  async listByDeveloper(developerId: string): Promise<GatewayApp[]> {
    const response = await this.client.requestJson<AppListResponse>(
      'GET',
      `/developers/${encodeURIComponent(developerId)}/apps`,
      { query: { expand: 'true' } }
    );
    return (response.app ?? []).map((data) => new GatewayApp(data));
  }

  async load(developerId: string, appName: string): Promise<GatewayApp> {
    const data = await this.client.requestJson<AppData>(
      'GET',
      `/developers/${encodeURIComponent(developerId)}/apps/${encodeURIComponent(appName)}`
    );
    return new GatewayApp(data);
  }
}

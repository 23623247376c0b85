/**
 * Developer Controller - developer CRUD on the management API, fronted by
 * the process-wide entity cache.
 */

import { EntityCache } from '../cache/entity-cache.js';
import type { GatewayClient } from './client.js';
import { GatewayDeveloper } from './developer.js';
import type { RemoteDeveloperResource } from './developer.js';
import {
  ClientErrorException,
  DeveloperAlreadyExistsException,
  ERROR_CODE_DEVELOPER_ALREADY_EXISTS,
} from './errors.js';
import type { DeveloperData, DeveloperStatus } from './types.js';

/**
 * Loads a developer by email or UUID.
 */
export interface DeveloperLookup {
  load(idOrEmail: string): Promise<RemoteDeveloperResource>;
}

/**
 * A controller that keeps loaded developers in a shared cache.
 */
export interface EntityCacheAwareController {
  entityCache(): EntityCache<RemoteDeveloperResource>;
}

export function isEntityCacheAware(
  controller: object
): controller is EntityCacheAwareController {
  return 'entityCache' in controller && typeof controller.entityCache === 'function';
}

/**
 * Cache of developers keyed by UUID, with the email as alias.
 */
export function createDeveloperCache(): EntityCache<RemoteDeveloperResource> {
  return new EntityCache<RemoteDeveloperResource>((developer) => [developer.getEmail()]);
}

/**
 * Callers edit the records they get; the cache keeps its own copy.
 */
function copyOf(developer: RemoteDeveloperResource): RemoteDeveloperResource {
  return new GatewayDeveloper(developer.toJSON());
}

interface DeveloperListResponse {
  developer?: DeveloperData[];
}

export class DeveloperController implements DeveloperLookup, EntityCacheAwareController {
  private client: GatewayClient;
  private cache: EntityCache<RemoteDeveloperResource>;

  constructor(client: GatewayClient, cache: EntityCache<RemoteDeveloperResource> = createDeveloperCache()) {
    this.client = client;
    this.cache = cache;
  }

  entityCache(): EntityCache<RemoteDeveloperResource> {
    return this.cache;
  }

  async load(idOrEmail: string): Promise<RemoteDeveloperResource> {
    const cached = this.cache.getEntity(idOrEmail);
    if (cached) {
      return copyOf(cached);
    }

    const data = await this.client.requestJson<DeveloperData>(
      'GET',
      `/developers/${encodeURIComponent(idOrEmail)}`
    );
    const developer = new GatewayDeveloper(data);
    this.cache.saveEntities([copyOf(developer)]);
    return developer;
  }

  /**
   * Load every developer of the organization.
   */
  async loadAll(): Promise<RemoteDeveloperResource[]> {
    const response = await this.client.requestJson<DeveloperListResponse>('GET', '/developers', {
      query: { expand: 'true' },
    });
    const developers = (response.developer ?? []).map((data) => new GatewayDeveloper(data));
    this.cache.saveEntities(developers.map(copyOf));
    return developers;
  }

  async create(data: DeveloperData): Promise<RemoteDeveloperResource> {
    let created: DeveloperData;
    try {
      created = await this.client.requestJson<DeveloperData>('POST', '/developers', { body: data });
    } catch (error) {
      if (error instanceof ClientErrorException && error.code === ERROR_CODE_DEVELOPER_ALREADY_EXISTS) {
        throw new DeveloperAlreadyExistsException(data.email ?? '', {
          status: error.status,
          body: error.body,
          cause: error,
        });
      }
      throw error;
    }
    const developer = new GatewayDeveloper(created);
    this.cache.saveEntities([copyOf(developer)]);
    return developer;
  }

  /**
   * Update a developer. The email in the path is the one the developer
   * currently has on the gateway; the body may carry a new one.
   */
  async update(idOrEmail: string, data: DeveloperData): Promise<RemoteDeveloperResource> {
    const updated = await this.client.requestJson<DeveloperData>(
      'PUT',
      `/developers/${encodeURIComponent(idOrEmail)}`,
      { body: data }
    );
    this.cache.removeEntities([idOrEmail]);
    const developer = new GatewayDeveloper(updated);
    this.cache.saveEntities([copyOf(developer)]);
    return developer;
  }

  async delete(idOrEmail: string): Promise<RemoteDeveloperResource> {
    const deleted = await this.client.requestJson<DeveloperData>(
      'DELETE',
      `/developers/${encodeURIComponent(idOrEmail)}`
    );
    const developer = new GatewayDeveloper(deleted);
    this.cache.removeEntities([idOrEmail]);
    const id = developer.id();
    if (id !== null) {
      this.cache.removeEntities([id]);
    }
    return developer;
  }

  /**
   * Status changes go through a separate action endpoint; PUT ignores the
   * status field.
   */
  async setStatus(idOrEmail: string, status: DeveloperStatus): Promise<void> {
    await this.client.request('POST', `/developers/${encodeURIComponent(idOrEmail)}`, {
      query: { action: status },
      body: '',
      contentType: 'application/octet-stream',
    });
    this.cache.removeEntities([idOrEmail]);
  }
}

/**
 * Developer Storage
 *
 * Loads, saves and deletes developer entities through the developer
 * controller and keeps the loaded records in a per-key memory cache. An
 * entity can be cached under its email and its UUID at once, depending
 * on how it was asked for, so invalidation has to cover both.
 *
 * Every load builds a new entity from a snapshot, so edits on one
 * instance never show through another.
 */

import type { AccountStore } from '../accounts/types.js';
import type { DeveloperController } from '../gateway/developer-controller.js';
import { ClientErrorException } from '../gateway/errors.js';
import type { DeveloperData } from '../gateway/types.js';
import { decodeException } from '../logging/logger.js';
import type { Logger } from '../logging/logger.js';
import { GatewayDeveloper } from '../gateway/developer.js';
import { Developer } from './developer.js';
import type { DeveloperContext } from './types.js';

export interface DeveloperStorageOptions {
  controller: DeveloperController;
  accounts: AccountStore;
  logger: Logger;
}

export class DeveloperStorage {
  private controller: DeveloperController;
  private logger: Logger;
  private context: DeveloperContext;
  private entities: Map<string, DeveloperData> = new Map();

  constructor(options: DeveloperStorageOptions) {
    this.controller = options.controller;
    this.logger = options.logger;
    this.context = {
      controller: options.controller,
      accounts: options.accounts,
      logger: options.logger,
    };
  }

  /**
   * Build an unsaved developer.
   */
  create(values: DeveloperData): Developer {
    return Developer.create(values, this.context);
  }

  /**
   * Load a developer by email or UUID. Returns null when the gateway does
   * not know it.
   */
  async load(id: string): Promise<Developer | null> {
    const cached = this.entities.get(id);
    if (cached) {
      return this.build(cached);
    }

    try {
      const remote = await this.controller.load(id);
      this.entities.set(id, remote.toJSON());
      return new Developer(remote, this.context);
    } catch (error) {
      if (error instanceof ClientErrorException && error.status === 404) {
        return null;
      }
      throw error;
    }
  }

  /**
   * Load several developers, or all of them when no ids are given.
   */
  async loadMultiple(ids?: string[]): Promise<Developer[]> {
    if (ids === undefined) {
      const remotes = await this.controller.loadAll();
      return remotes.map((remote) => {
        const email = remote.getEmail();
        if (email !== null) {
          this.entities.set(email, remote.toJSON());
        }
        return new Developer(remote, this.context);
      });
    }

    const developers: Developer[] = [];
    for (const id of ids) {
      const developer = await this.load(id);
      if (developer) {
        developers.push(developer);
      }
    }
    return developers;
  }

  /**
   * Create or update a developer on the gateway and return the saved
   * entity.
   */
  async save(developer: Developer): Promise<Developer> {
    if (developer.isNew()) {
      const created = await this.controller.create(developer.toData());
      const saved = new Developer(created, this.context);
      const ownerId = developer.getOwnerId();
      if (ownerId !== null) {
        saved.setOwnerId(ownerId);
      }
      return saved;
    }

    // The remote record is still addressed by the email it had when loaded
    const originalEmail = developer.getOriginalEmail() ?? developer.getEmail();
    if (originalEmail === null) {
      throw new Error('Developer has neither an original nor a current email');
    }

    const keys = [originalEmail, ...this.uuids([developer])];
    try {
      const previous = await this.controller.load(originalEmail);
      const updated = await this.controller.update(originalEmail, developer.toData());

      const status = developer.getStatus();
      if (status !== null && status !== previous.getStatus()) {
        await this.controller.setStatus(developer.getEmail() ?? originalEmail, status);
        updated.setStatus(status);
      }

      developer.resetOriginalEmail();
      return new Developer(updated, this.context);
    } finally {
      // Whatever got through, the cached record may no longer match
      this.resetCache(keys);
    }
  }

  /**
   * Delete developers on the gateway, then drop every cache entry that
   * refers to them.
   */
  async delete(developers: Developer[]): Promise<void> {
    if (developers.length === 0) {
      return;
    }

    const ids: string[] = [];
    const deleted: Developer[] = [];
    try {
      for (const developer of developers) {
        const id = developer.id() ?? developer.getEmail();
        if (id === null) {
          continue;
        }
        await this.controller.delete(id);
        ids.push(id);
        deleted.push(developer);
      }
    } finally {
      // Developers deleted before a failure are gone remotely all the same
      if (deleted.length > 0) {
        this.resetCache(ids);
        this.postDelete(deleted);
      }
    }
  }

  /**
   * The delete call may have used emails while entries are also cached
   * by UUID; drop those too. Failing here leaves stale entries behind but
   * the developers are gone either way.
   */
  protected postDelete(developers: Developer[]): void {
    const uuids = this.uuids(developers);
    try {
      this.resetCache(uuids);
    } catch (error) {
      this.logger.warning('Unable to invalidate cached developers @ids. %type: @message', {
        '@ids': uuids.join(', '),
        ...decodeException(error),
      });
    }
  }

  /**
   * Drop cached entries for the given emails or UUIDs, or everything.
   */
  resetCache(ids?: string[]): void {
    const entityCache = this.controller.entityCache();
    if (ids === undefined) {
      this.entities.clear();
      entityCache.clear();
      return;
    }
    for (const id of ids) {
      this.entities.delete(id);
    }
    entityCache.removeEntities(ids);
  }

  /**
   * Whether the storage holds an entity under the key.
   */
  isCached(id: string): boolean {
    return this.entities.has(id);
  }

  private build(data: DeveloperData): Developer {
    return new Developer(new GatewayDeveloper(data), this.context);
  }

  private uuids(developers: Developer[]): string[] {
    return developers
      .map((developer) => developer.getDeveloperId())
      .filter((uuid): uuid is string => uuid !== null);
  }
}

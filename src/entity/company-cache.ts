/**
 * Company Membership Cache
 *
 * Per-instance cache of the companies a developer belongs to. List
 * endpoints do not return company memberships, so an entity built from a
 * list response starts unresolved and the first read resolves it:
 *
 * 1. a cached remote copy with a non-empty list is adopted;
 * 2. otherwise the cached copy is evicted, since it would only serve the
 *    same empty list again;
 * 3. the developer is fetched by email and its list, even an empty one,
 *    becomes authoritative.
 *
 * A failed fetch returns an empty list for that call only.
 */

import { isEntityCacheAware } from '../gateway/developer-controller.js';
import type { DeveloperLookup } from '../gateway/developer-controller.js';
import { ApiException } from '../gateway/errors.js';
import { decodeException } from '../logging/logger.js';
import type { Logger } from '../logging/logger.js';
import { UNRESOLVED, resolved } from './types.js';
import type { CompanyState } from './types.js';

export interface CompanyMembershipSubject {
  getDeveloperId(): string | null;
  getEmail(): string | null;
}

export interface CompanyMembershipCacheOptions {
  controller: DeveloperLookup;
  logger: Logger;
  initial?: CompanyState;
}

const LOAD_FAILED_MESSAGE =
  'Unable to load companies of %developer developer from the gateway. %type: @message in %function (line %line of %file).\n@backtrace_string';

export class CompanyMembershipCache {
  private controller: DeveloperLookup;
  private logger: Logger;
  private current: CompanyState;
  private pending: Promise<string[]> | null = null;

  constructor(options: CompanyMembershipCacheOptions) {
    this.controller = options.controller;
    this.logger = options.logger;
    this.current = options.initial ?? UNRESOLVED;
  }

  getState(): CompanyState {
    return this.current.state === 'resolved' ? resolved(this.current.companies) : UNRESOLVED;
  }

  /**
   * Companies of the subject. Concurrent calls share one fetch.
   */
  async get(subject: CompanyMembershipSubject): Promise<string[]> {
    if (this.current.state === 'resolved') {
      return [...this.current.companies];
    }

    if (!this.pending) {
      this.pending = this.resolve(subject).finally(() => {
        this.pending = null;
      });
    }
    return this.pending;
  }

  private async resolve(subject: CompanyMembershipSubject): Promise<string[]> {
    const email = subject.getEmail();
    const cacheKey = subject.getDeveloperId() ?? email;

    if (cacheKey !== null && isEntityCacheAware(this.controller)) {
      const cache = this.controller.entityCache();
      const cached = cache.getEntity(cacheKey);
      if (cached && cached.getCompanies().length > 0) {
        this.current = resolved(cached.getCompanies());
        return cached.getCompanies();
      }
      cache.removeEntities([cacheKey]);
    }

    if (email === null) {
      // Not saved yet; there is nothing to look up
      return [];
    }

    try {
      const developer = await this.controller.load(email);
      this.current = resolved(developer.getCompanies());
      return developer.getCompanies();
    } catch (error) {
      if (!(error instanceof ApiException)) {
        throw error;
      }
      this.logger.error(LOAD_FAILED_MESSAGE, {
        '%developer': email,
        ...decodeException(error),
      });
      return [];
    }
  }
}

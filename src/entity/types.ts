/**
 * Entity Types
 */

import type { AccountStore } from '../accounts/types.js';
import type { DeveloperLookup } from '../gateway/developer-controller.js';
import type { Logger } from '../logging/logger.js';

/**
 * Collaborators a developer entity needs. Handed in by whoever builds the
 * entity, usually DeveloperStorage.
 */
export interface DeveloperContext {
  /** Remote lookups; cache-aware controllers also expose their cache */
  controller: DeveloperLookup;
  accounts: AccountStore;
  logger: Logger;
}

/**
 * Company memberships of one developer instance.
 *
 * `unresolved` means the list must still be fetched; `resolved` is
 * authoritative for the instance's lifetime, even when empty.
 */
export type CompanyState =
  | { state: 'unresolved' }
  | { state: 'resolved'; companies: string[] };

export const UNRESOLVED: CompanyState = { state: 'unresolved' };

export function resolved(companies: string[]): CompanyState {
  return { state: 'resolved', companies: [...companies] };
}

export type AppOperation = 'view' | 'update' | 'delete';

export interface LinkParams {
  [name: string]: string | number;
}

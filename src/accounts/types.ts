/**
 * Local account types
 */

export interface Account {
  id: number;
  email: string;
  /** Display name */
  name: string;
  /** UUID of the matching gateway developer, once known */
  developerId: string | null;
  permissions: string[];
}

export interface CreateAccountRequest {
  email: string;
  name: string;
  developerId?: string | null;
  permissions?: string[];
}

/**
 * Local account lookups used by developer entities.
 */
export interface AccountStore {
  loadByEmail(email: string): Account | null;
  loadById(id: number): Account | null;
}

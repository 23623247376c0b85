/**
 * In-memory account store
 *
 * Emails are matched case-insensitively, the way the gateway matches
 * developer emails.
 */

import type { Account, AccountStore, CreateAccountRequest } from './types.js';

export class InMemoryAccountStore implements AccountStore {
  private accounts: Map<number, Account> = new Map();
  private nextId = 1;

  create(request: CreateAccountRequest): Account {
    const account: Account = {
      id: this.nextId++,
      email: request.email,
      name: request.name,
      developerId: request.developerId ?? null,
      permissions: request.permissions ?? [],
    };
    this.accounts.set(account.id, account);
    return { ...account };
  }

  loadById(id: number): Account | null {
    const account = this.accounts.get(id);
    return account ? { ...account } : null;
  }

  loadByEmail(email: string): Account | null {
    const needle = email.toLowerCase();
    for (const account of this.accounts.values()) {
      if (account.email.toLowerCase() === needle) {
        return { ...account };
      }
    }
    return null;
  }

  update(id: number, updates: Partial<Omit<Account, 'id'>>): Account | null {
    const account = this.accounts.get(id);
    if (!account) return null;

    const updated: Account = { ...account, ...updates };
    this.accounts.set(id, updated);
    return { ...updated };
  }

  list(): Account[] {
    return Array.from(this.accounts.values()).map((account) => ({ ...account }));
  }

  delete(id: number): boolean {
    return this.accounts.delete(id);
  }
}

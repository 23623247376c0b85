export { InMemoryAccountStore } from './store.js';
export type { Account, AccountStore, CreateAccountRequest } from './types.js';

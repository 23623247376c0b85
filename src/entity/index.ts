/**
 * Entity Module - local entities over gateway records
 */

export { Developer } from './developer.js';
export { DeveloperApp, ADMINISTER_APPS_PERMISSION } from './app.js';
export { DeveloperStorage } from './developer-storage.js';
export { CompanyMembershipCache } from './company-cache.js';
export { UNRESOLVED, resolved } from './types.js';
export type { DeveloperJson } from './developer.js';
export type { DeveloperStorageOptions } from './developer-storage.js';
export type { CompanyMembershipSubject, CompanyMembershipCacheOptions } from './company-cache.js';
export type { AppOperation, CompanyState, DeveloperContext, LinkParams } from './types.js';

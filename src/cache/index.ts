export { EntityCache } from './entity-cache.js';
export type { CacheableEntity, AliasFn } from './entity-cache.js';

/**
 * Entity Cache - process-wide cache of remote representations
 *
 * Entries are keyed by the remote id. Alias keys (a developer's email, an
 * app's name) resolve to the same entry, and removing an entry by any of
 * its keys drops all of them.
 */

export interface CacheableEntity {
  id(): string | null;
}

export type AliasFn<T> = (entity: T) => Array<string | null>;

export class EntityCache<T extends CacheableEntity> {
  private entities: Map<string, T> = new Map();
  private aliases: Map<string, string> = new Map();
  private aliasFn: AliasFn<T>;

  constructor(aliasFn: AliasFn<T> = () => []) {
    this.aliasFn = aliasFn;
  }

  /**
   * Resolve a remote id or alias to the remote id.
   */
  private resolve(key: string): string | null {
    if (this.entities.has(key)) {
      return key;
    }
    return this.aliases.get(key) ?? null;
  }

  getEntity(key: string): T | null {
    const id = this.resolve(key);
    return id === null ? null : this.entities.get(id) ?? null;
  }

  /**
   * Cached entities for the given keys, or every cached entity.
   * Keys without an entry are skipped.
   */
  getEntities(keys?: string[]): T[] {
    if (keys === undefined) {
      return Array.from(this.entities.values());
    }
    const found: T[] = [];
    for (const key of keys) {
      const entity = this.getEntity(key);
      if (entity && !found.includes(entity)) {
        found.push(entity);
      }
    }
    return found;
  }

  saveEntities(entities: T[]): void {
    for (const entity of entities) {
      const id = entity.id();
      if (id === null) {
        continue; // Not yet created remotely
      }
      this.removeEntities([id]);
      this.entities.set(id, entity);
      for (const alias of this.aliasFn(entity)) {
        if (alias !== null && alias !== id) {
          this.aliases.set(alias, id);
        }
      }
    }
  }

  removeEntities(keys: string[]): void {
    for (const key of keys) {
      const id = this.resolve(key);
      if (id === null) {
        // A dangling alias is dropped even without an entry behind it
        this.aliases.delete(key);
        continue;
      }
      this.entities.delete(id);
      for (const [alias, target] of this.aliases) {
        if (target === id) {
          this.aliases.delete(alias);
        }
      }
    }
  }

  has(key: string): boolean {
    return this.resolve(key) !== null;
  }

  clear(): void {
    this.entities.clear();
    this.aliases.clear();
  }

  get size(): number {
    return this.entities.size;
  }
}

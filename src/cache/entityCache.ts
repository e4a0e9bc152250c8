import { metrics } from "../lib/metrics";

export interface Identified {
  id: string;
}

export type EntityCacheOptions<T> = {
  name: string;
  /** Secondary index key, e.g. a program's name. Several ids may share one key. */
  naturalKey?: (entity: T) => string | null;
};

/**
 * Id-keyed map with a secondary natural-key index. Each mutation completes synchronously, so no reader
 * sees the two indexes out of step. Entities are copied in and out.
 *
 * Never consulted as the source of truth: absence here says nothing about the remote store.
 */
export class EntityCache<T extends Identified> {
  readonly name: string;
  private readonly naturalKey?: (entity: T) => string | null;
  private readonly byId = new Map<string, T>();
  private readonly byKey = new Map<string, Set<string>>();
  private readonly keyOfId = new Map<string, string>();

  constructor(options: EntityCacheOptions<T>) {
    this.name = options.name;
    this.naturalKey = options.naturalKey;
  }

  get(id: string): T | undefined {
    const hit = this.byId.get(id);
    metrics.cacheLookupsTotal.inc({ cache: this.name, result: hit ? "hit" : "miss" });
    return hit ? structuredClone(hit) : undefined;
  }

  put(entity: T): void {
    this.unindex(entity.id);
    this.byId.set(entity.id, structuredClone(entity));
    const key = this.naturalKey?.(entity);
    if (key) {
      let ids = this.byKey.get(key);
      if (!ids) {
        ids = new Set();
        this.byKey.set(key, ids);
      }
      ids.add(entity.id);
      this.keyOfId.set(entity.id, key);
    }
  }

  remove(id: string): boolean {
    this.unindex(id);
    return this.byId.delete(id);
  }

  findBy(predicate: (entity: T) => boolean): T[] {
    const out: T[] = [];
    for (const entity of this.byId.values()) {
      if (predicate(entity)) out.push(structuredClone(entity));
    }
    return out;
  }

  getByKey(key: string): T[] {
    const ids = this.byKey.get(key);
    if (!ids) return [];
    const out: T[] = [];
    for (const id of ids) {
      const entity = this.byId.get(id);
      if (entity) out.push(structuredClone(entity));
    }
    return out;
  }

  values(): T[] {
    return [...this.byId.values()].map(e => structuredClone(e));
  }

  get size(): number {
    return this.byId.size;
  }

  clear(): void {
    this.byId.clear();
    this.byKey.clear();
    this.keyOfId.clear();
  }

  private unindex(id: string): void {
    const key = this.keyOfId.get(id);
    if (key === undefined) return;
    this.keyOfId.delete(id);
    const ids = this.byKey.get(key);
    ids?.delete(id);
    if (ids && ids.size === 0) this.byKey.delete(key);
  }
}

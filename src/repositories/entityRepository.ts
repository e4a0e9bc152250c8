import { randomUUID } from "node:crypto";
import { EntityCache } from "../cache/entityCache";
import {
  EngineError,
  NetworkError,
  NotFoundError,
  PermissionDeniedError,
  UnknownError,
  DuplicateError,
  ValidationError,
} from "../lib/errors";
import type { Logger } from "../lib/log";
import { decodeDocument, encodeEntity, parseValue, type Entity, type EntitySchema } from "../models/entity";
import type { ChangeNotifier, ChangeType } from "../notify/changeNotifier";
import {
  StoreError,
  type DocumentFields,
  type OrderBy,
  type Predicate,
  type RemoteStoreClient,
  type StoredDocument,
} from "../store/types";

export type RepositoryDeps<T> = {
  store: RemoteStoreClient;
  notifier: ChangeNotifier<T>;
  logger: Logger;
  clock?: () => number;
  newId?: () => string;
  pageSize?: number;
};

export type EntityDefinition<T extends Entity> = {
  kind: string;
  collection: string;
  schema: EntitySchema<T>;
  /** Secondary cache key; also the key duplicate checks run against. */
  naturalKey?: (entity: T) => string | null;
  /** Lowercased text the `text` list filter matches against. */
  searchText?: (entity: T) => string;
};

export type ListFilter<T> = {
  predicates?: Predicate[];
  orderBy?: OrderBy;
  limit?: number;
  // Case-insensitive substring match, applied locally after the remote query.
  text?: string;
  where?: (entity: T) => boolean;
};

export function toEngineError(err: unknown, context: { kind: string; op: string; id?: string }): EngineError {
  if (err instanceof EngineError) return err;
  if (err instanceof StoreError) {
    switch (err.code) {
      case "Unavailable":
        return new NetworkError(err);
      case "PermissionDenied":
        return new PermissionDeniedError(`${context.op} ${context.kind}`, err);
      case "NotFound":
        return new NotFoundError(context.kind, context.id ?? "unknown");
      case "Unknown":
        return new UnknownError(err);
    }
  }
  return new UnknownError(err);
}

/**
 * Cache-fronted access to one collection. Reads are served from the cache when possible; every mutation
 * re-checks the remote store first and only then touches the cache and publishes.
 */
export abstract class EntityRepository<T extends Entity, D extends object> {
  protected readonly cache: EntityCache<T>;
  protected readonly store: RemoteStoreClient;
  protected readonly notifier: ChangeNotifier<T>;
  protected readonly logger: Logger;
  protected readonly clock: () => number;
  protected readonly newId: () => string;
  protected readonly pageSize: number;

  constructor(protected readonly definition: EntityDefinition<T>, deps: RepositoryDeps<T>) {
    this.store = deps.store;
    this.notifier = deps.notifier;
    this.clock = deps.clock ?? Date.now;
    this.newId = deps.newId ?? randomUUID;
    this.pageSize = deps.pageSize ?? 50;
    this.logger = deps.logger.child({ repo: definition.kind });
    this.cache = new EntityCache<T>({ name: definition.kind, naturalKey: definition.naturalKey });
  }

  get kind(): string {
    return this.definition.kind;
  }

  get collection(): string {
    return this.definition.collection;
  }

  async getById(id: string): Promise<T | null> {
    const cached = this.cache.get(id);
    if (cached) return cached;
    const entity = await this.fetchRemote(id);
    if (entity) this.cache.put(entity);
    return entity;
  }

  async create(draft: D & { id?: string }): Promise<T> {
    const now = this.clock();
    const candidate = parseValue(this.definition.schema, { ...draft, id: draft.id ?? this.newId(), createdAt: now, updatedAt: now });
    const existing = await this.findDuplicate(candidate);
    if (existing) {
      throw new DuplicateError(this.kind, this.definition.naturalKey?.(candidate) ?? candidate.id);
    }
    await this.beforeCreate(candidate);
    await this.write(candidate);
    this.cache.put(candidate);
    this.publish("created", candidate);
    return candidate;
  }

  async update(entity: T): Promise<T> {
    const existing = await this.fetchRemote(entity.id);
    if (!existing) {
      this.cache.remove(entity.id);
      throw new NotFoundError(this.kind, entity.id);
    }
    const next = parseValue(this.definition.schema, { ...entity, createdAt: existing.createdAt, updatedAt: this.clock() });
    await this.beforeUpdate(next, existing);
    await this.write(next);
    this.cache.put(next);
    this.publish("updated", next);
    return next;
  }

  async delete(id: string): Promise<void> {
    const existing = await this.fetchRemote(id);
    if (!existing) {
      this.cache.remove(id);
      throw new NotFoundError(this.kind, id);
    }
    await this.beforeDelete(existing);
    await this.run("delete", id, () => this.store.deleteDocument(this.collection, id));
    this.cache.remove(id);
    this.publish("deleted", existing);
    await this.afterDelete(existing);
  }

  /**
   * Pages through the remote query until `limit` matches are collected or the results run out.
   * Every decoded entity is cached, matching or not; nothing is evicted for being absent.
   */
  async list(filter: ListFilter<T> = {}): Promise<T[]> {
    const { predicates = [], orderBy, limit, text, where } = filter;
    const needle = text?.trim().toLowerCase() || "";
    const localFilter = needle !== "" || where !== undefined;
    const pageSize = !localFilter && limit ? Math.min(limit, this.pageSize) : this.pageSize;
    const out: T[] = [];
    let cursor: string | undefined;

    do {
      const page = await this.run("query", undefined, () =>
        this.store.query(this.collection, predicates, { orderBy, limit: pageSize, startAfter: cursor }),
      );
      for (const doc of page.documents) {
        const entity = this.decodeListed(doc);
        if (!entity) continue;
        this.cache.put(entity);
        if (needle && !this.searchTextOf(entity).includes(needle)) continue;
        if (where && !where(entity)) continue;
        out.push(entity);
      }
      cursor = page.nextCursor ?? undefined;
    } while (cursor && (!limit || out.length < limit));

    return limit ? out.slice(0, limit) : out;
  }

  /** Drops a range of records belonging to one parent; used by cascading deletes. Returns the number removed. */
  protected async purgeWhere(predicates: Predicate[]): Promise<number> {
    const victims = await this.list({ predicates });
    for (const victim of victims) {
      await this.run("delete", victim.id, () => this.store.deleteDocument(this.collection, victim.id));
      this.cache.remove(victim.id);
      this.publish("deleted", victim);
    }
    return victims.length;
  }

  clearCache(): void {
    this.cache.clear();
  }

  protected publish(type: ChangeType, entity: T): void {
    this.notifier.publish(type, entity);
  }

  protected async findDuplicate(candidate: T): Promise<T | null> {
    const key = this.definition.naturalKey?.(candidate);
    if (!key || !this.occupiesKey(candidate)) return null;
    const cached = this.cache.getByKey(key).find(e => e.id !== candidate.id && this.occupiesKey(e));
    if (cached) return cached;
    return this.findRemoteByNaturalKey(candidate);
  }

  /** Whether a record holds its natural key, e.g. only enrolled enrollments block a new one. */
  protected occupiesKey(_entity: T): boolean {
    return true;
  }

  protected async findRemoteByNaturalKey(_candidate: T): Promise<T | null> {
    return null;
  }

  protected async beforeCreate(_candidate: T): Promise<void> {}

  protected async beforeUpdate(_next: T, _existing: T): Promise<void> {}

  protected async beforeDelete(_existing: T): Promise<void> {}

  protected async afterDelete(_deleted: T): Promise<void> {}

  protected async fetchRemote(id: string): Promise<T | null> {
    const doc = await this.run("get", id, () => this.store.getDocument(this.collection, id));
    return doc ? decodeDocument(this.definition.schema, doc) : null;
  }

  protected async queryFirst(predicates: Predicate[], orderBy?: OrderBy): Promise<T | null> {
    const page = await this.run("query", undefined, () => this.store.query(this.collection, predicates, { orderBy, limit: 1 }));
    const doc = page.documents[0];
    if (!doc) return null;
    const entity = decodeDocument(this.definition.schema, doc);
    this.cache.put(entity);
    return entity;
  }

  protected async write(entity: T): Promise<void> {
    await this.run("set", entity.id, () => this.store.setDocument(this.collection, entity.id, encodeEntity(entity)));
  }

  protected async writeMerge(id: string, fields: DocumentFields): Promise<void> {
    await this.run("set", id, () => this.store.setDocument(this.collection, id, fields, { merge: true }));
  }

  protected async run<R>(op: string, id: string | undefined, call: () => Promise<R>): Promise<R> {
    try {
      return await call();
    } catch (err) {
      throw toEngineError(err, { kind: this.kind, op, id });
    }
  }

  private decodeListed(doc: StoredDocument): T | null {
    try {
      return decodeDocument(this.definition.schema, doc);
    } catch (err) {
      if (!(err instanceof ValidationError)) throw err;
      this.logger.warn("skipping_malformed_document", { collection: this.collection, id: doc.id, field: err.field, reason: err.reason });
      return null;
    }
  }

  private searchTextOf(entity: T): string {
    return (this.definition.searchText?.(entity) ?? "").toLowerCase();
  }
}

/* In-memory RemoteStoreClient. Backs both stores when MOCK_CONVEX=1 and stands in for the remote
 * deployments in tests, with scripted failures via `inject`.
 */
import {
  StoreError,
  type DocumentFields,
  type DocumentValue,
  type Predicate,
  type QueryOptions,
  type QueryPage,
  type RemoteStoreClient,
  type StoreErrorCode,
  type StoreOp,
  type StoredDocument,
  type WriteOptions,
} from "./types";

export type FaultSpec = {
  op?: StoreOp;
  collection?: string;
  code: StoreErrorCode;
  // Number of calls to fail before the fault clears. Unbounded when omitted.
  times?: number;
};

export type StoreCall = { op: StoreOp; collection: string; id?: string };

type Fault = { op?: StoreOp; collection?: string; code: StoreErrorCode; remaining: number };

export class InMemoryStore implements RemoteStoreClient {
  readonly calls: StoreCall[] = [];
  private readonly collections = new Map<string, Map<string, DocumentFields>>();
  private faults: Fault[] = [];

  constructor(readonly name: string, private readonly latencyMs = 0) {}

  async getDocument(collection: string, id: string): Promise<StoredDocument | null> {
    await this.enter({ op: "get", collection, id });
    const fields = this.collection(collection).get(id);
    return fields ? { id, fields: structuredClone(fields) } : null;
  }

  async query(collection: string, predicates: Predicate[], options: QueryOptions = {}): Promise<QueryPage> {
    await this.enter({ op: "query", collection });
    const rows = [...this.collection(collection).entries()]
      .filter(([, fields]) => predicates.every(p => matches(p, fields)))
      .map(([id, fields]) => ({ id, fields: structuredClone(fields) }));

    const order = options.orderBy;
    rows.sort((a, b) => {
      if (order) {
        const c = compareValues(readPath(a.fields, order.field), readPath(b.fields, order.field));
        if (c !== 0) return order.direction === "desc" ? -c : c;
      }
      return a.id < b.id ? -1 : a.id > b.id ? 1 : 0;
    });

    const start = options.startAfter ? rows.findIndex(r => r.id === options.startAfter) + 1 : 0;
    const end = options.limit && options.limit > 0 ? start + options.limit : rows.length;
    const documents = rows.slice(start, end);
    const nextCursor = end < rows.length && documents.length > 0 ? documents[documents.length - 1].id : null;
    return { documents, nextCursor };
  }

  async setDocument(collection: string, id: string, fields: DocumentFields, options: WriteOptions = {}): Promise<void> {
    await this.enter({ op: "set", collection, id });
    const docs = this.collection(collection);
    const existing = docs.get(id);
    const next = options.merge && existing ? mergeFields(existing, fields) : fields;
    docs.set(id, structuredClone(next));
  }

  async deleteDocument(collection: string, id: string): Promise<void> {
    await this.enter({ op: "delete", collection, id });
    this.collection(collection).delete(id);
  }

  inject(fault: FaultSpec): void {
    this.faults.push({ op: fault.op, collection: fault.collection, code: fault.code, remaining: fault.times ?? Infinity });
  }

  clearFaults(): void {
    this.faults = [];
  }

  seed(collection: string, id: string, fields: DocumentFields): void {
    this.collection(collection).set(id, structuredClone(fields));
  }

  peek(collection: string, id: string): DocumentFields | undefined {
    const fields = this.collection(collection).get(id);
    return fields ? structuredClone(fields) : undefined;
  }

  count(collection: string): number {
    return this.collection(collection).size;
  }

  writesTo(collection: string): StoreCall[] {
    return this.calls.filter(c => c.op === "set" && c.collection === collection);
  }

  reset(): void {
    this.collections.clear();
    this.faults = [];
    this.calls.length = 0;
  }

  private collection(name: string): Map<string, DocumentFields> {
    let docs = this.collections.get(name);
    if (!docs) {
      docs = new Map();
      this.collections.set(name, docs);
    }
    return docs;
  }

  private async enter(call: StoreCall): Promise<void> {
    this.calls.push(call);
    if (this.latencyMs > 0) {
      await new Promise(resolve => setTimeout(resolve, this.latencyMs));
    } else {
      await Promise.resolve();
    }
    const fault = this.faults.find(
      f => f.remaining > 0 && (!f.op || f.op === call.op) && (!f.collection || f.collection === call.collection),
    );
    if (fault) {
      fault.remaining -= 1;
      throw new StoreError(fault.code, `${this.name}: injected ${fault.code} on ${call.op} ${call.collection}`);
    }
  }
}

export function mergeFields(target: DocumentFields, patch: DocumentFields): DocumentFields {
  const out: DocumentFields = { ...target };
  for (const [key, value] of Object.entries(patch)) {
    const current = out[key];
    out[key] = isFields(current) && isFields(value) ? mergeFields(current, value) : value;
  }
  return out;
}

function isFields(value: DocumentValue | undefined): value is DocumentFields {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function readPath(fields: DocumentFields, path: string): DocumentValue | undefined {
  let current: DocumentValue | undefined = fields;
  for (const part of path.split(".")) {
    if (!isFields(current)) return undefined;
    current = current[part];
  }
  return current;
}

function valuesEqual(a: DocumentValue | undefined, b: DocumentValue | undefined): boolean {
  if (a === b) return true;
  if (typeof a !== "object" || typeof b !== "object" || a === null || b === null) return false;
  return JSON.stringify(a) === JSON.stringify(b);
}

function compareValues(a: DocumentValue | undefined, b: DocumentValue | undefined): number {
  if (valuesEqual(a, b)) return 0;
  if (a === undefined || a === null) return -1;
  if (b === undefined || b === null) return 1;
  if (typeof a === "number" && typeof b === "number") return a - b;
  const left = typeof a === "string" ? a : JSON.stringify(a);
  const right = typeof b === "string" ? b : JSON.stringify(b);
  return left < right ? -1 : left > right ? 1 : 0;
}

function matches(predicate: Predicate, fields: DocumentFields): boolean {
  const value = readPath(fields, predicate.field);
  switch (predicate.op) {
    case "==":
      return valuesEqual(value, predicate.value);
    case "!=":
      return value !== undefined && !valuesEqual(value, predicate.value);
    case "<":
      return value !== undefined && compareValues(value, predicate.value) < 0;
    case "<=":
      return value !== undefined && compareValues(value, predicate.value) <= 0;
    case ">":
      return value !== undefined && compareValues(value, predicate.value) > 0;
    case ">=":
      return value !== undefined && compareValues(value, predicate.value) >= 0;
    case "in":
      return Array.isArray(predicate.value) && predicate.value.some(v => valuesEqual(value, v));
    case "array-contains":
      return Array.isArray(value) && value.some(v => valuesEqual(v, predicate.value));
  }
}

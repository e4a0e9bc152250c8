/* The contract both backing stores are reached through. The primary (user-private) and secondary (shared)
 * stores differ only in which collections are read, never in protocol shape.
 */

export type DocumentValue = string | number | boolean | null | DocumentValue[] | { [key: string]: DocumentValue };

export type DocumentFields = { [key: string]: DocumentValue };

export type StoredDocument = { id: string; fields: DocumentFields };

export type PredicateOp = "==" | "!=" | "<" | "<=" | ">" | ">=" | "in" | "array-contains";

export type Predicate = { field: string; op: PredicateOp; value: DocumentValue };

export type OrderBy = { field: string; direction?: "asc" | "desc" };

export type QueryOptions = {
  orderBy?: OrderBy;
  limit?: number;
  // Id of the last document of the previous page.
  startAfter?: string;
};

export type QueryPage = { documents: StoredDocument[]; nextCursor: string | null };

export type WriteOptions = { merge?: boolean };

export type StoreOp = "get" | "query" | "set" | "delete";

export type StoreErrorCode = "NotFound" | "PermissionDenied" | "Unavailable" | "Unknown";

export class StoreError extends Error {
  constructor(readonly code: StoreErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "StoreError";
  }
}

export interface RemoteStoreClient {
  readonly name: string;
  /** Resolves null when the document does not exist. */
  getDocument(collection: string, id: string): Promise<StoredDocument | null>;
  query(collection: string, predicates: Predicate[], options?: QueryOptions): Promise<QueryPage>;
  /** With `merge`, nested objects are merged by key and untouched fields are kept. */
  setDocument(collection: string, id: string, fields: DocumentFields, options?: WriteOptions): Promise<void>;
  deleteDocument(collection: string, id: string): Promise<void>;
}

export const where = (field: string, op: PredicateOp, value: DocumentValue): Predicate => ({ field, op, value });

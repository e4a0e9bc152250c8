import { makeFunctionReference } from "convex/server";
import { ConvexError } from "convex/values";
import { z } from "zod";
import type { ConvexCaller } from "../lib/convex";
import { isNetworkError } from "../lib/retry";
import {
  StoreError,
  type DocumentFields,
  type DocumentValue,
  type Predicate,
  type QueryOptions,
  type QueryPage,
  type RemoteStoreClient,
  type StoredDocument,
  type WriteOptions,
} from "./types";

// Public functions exposed by each document-store deployment.
export const documentFunctions = {
  get: makeFunctionReference<"query", { collection: string; id: string }, unknown>("documents:get"),
  query: makeFunctionReference<
    "query",
    {
      collection: string;
      predicates: Predicate[];
      orderBy?: { field: string; direction: "asc" | "desc" };
      limit?: number;
      startAfter?: string;
    },
    unknown
  >("documents:query"),
  set: makeFunctionReference<
    "mutation",
    { collection: string; id: string; fields: DocumentFields; merge: boolean },
    unknown
  >("documents:set"),
  remove: makeFunctionReference<"mutation", { collection: string; id: string }, unknown>("documents:remove"),
};

const documentValue: z.ZodType<DocumentValue> = z.lazy(() =>
  z.union([z.string(), z.number(), z.boolean(), z.null(), z.array(documentValue), z.record(documentValue)]),
);

const storedDocument = z.object({ id: z.string(), fields: z.record(documentValue) });

const queryPage = z.object({
  documents: z.array(storedDocument),
  nextCursor: z.string().nullable().optional(),
});

const errorData = z.object({ code: z.string(), message: z.string().optional() });

export class ConvexStore implements RemoteStoreClient {
  constructor(readonly name: string, private readonly client: ConvexCaller) {}

  async getDocument(collection: string, id: string): Promise<StoredDocument | null> {
    try {
      const raw = await this.client.query(documentFunctions.get, { collection, id });
      if (raw === null || raw === undefined) return null;
      return decode(storedDocument, raw, `${collection}/${id}`);
    } catch (err) {
      const normalized = toStoreError(err);
      if (normalized.code === "NotFound") return null;
      throw normalized;
    }
  }

  async query(collection: string, predicates: Predicate[], options: QueryOptions = {}): Promise<QueryPage> {
    try {
      const raw = await this.client.query(documentFunctions.query, {
        collection,
        predicates,
        ...(options.orderBy ? { orderBy: { field: options.orderBy.field, direction: options.orderBy.direction ?? "asc" } } : {}),
        ...(options.limit !== undefined ? { limit: options.limit } : {}),
        ...(options.startAfter ? { startAfter: options.startAfter } : {}),
      });
      const page = decode(queryPage, raw, collection);
      return { documents: page.documents, nextCursor: page.nextCursor ?? null };
    } catch (err) {
      throw toStoreError(err);
    }
  }

  async setDocument(collection: string, id: string, fields: DocumentFields, options: WriteOptions = {}): Promise<void> {
    try {
      await this.client.mutation(documentFunctions.set, { collection, id, fields, merge: options.merge === true });
    } catch (err) {
      throw toStoreError(err);
    }
  }

  async deleteDocument(collection: string, id: string): Promise<void> {
    try {
      await this.client.mutation(documentFunctions.remove, { collection, id });
    } catch (err) {
      const normalized = toStoreError(err);
      // Deleting an absent document is a no-op.
      if (normalized.code !== "NotFound") throw normalized;
    }
  }
}

function decode<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, raw: unknown, where: string): T {
  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    throw new StoreError("Unknown", `malformed store response for ${where}: ${parsed.error.issues[0]?.message ?? "invalid"}`);
  }
  return parsed.data;
}

export function toStoreError(err: unknown): StoreError {
  if (err instanceof StoreError) return err;
  if (err instanceof ConvexError) {
    const data = errorData.safeParse(err.data);
    const code = data.success ? data.data.code : typeof err.data === "string" ? err.data : "";
    switch (code) {
      case "NotFound":
      case "NOT_FOUND":
        return new StoreError("NotFound", err.message, { cause: err });
      case "PermissionDenied":
      case "PERMISSION_DENIED":
      case "Unauthorized":
        return new StoreError("PermissionDenied", err.message, { cause: err });
      case "Unavailable":
        return new StoreError("Unavailable", err.message, { cause: err });
      default:
        return new StoreError("Unknown", err.message, { cause: err });
    }
  }
  if (isNetworkError(err)) {
    return new StoreError("Unavailable", err instanceof Error ? err.message : String(err), { cause: err });
  }
  return new StoreError("Unknown", err instanceof Error ? err.message : String(err), { cause: err });
}

import { z } from "zod";
import { ValidationError } from "../lib/errors";
import type { DocumentFields, StoredDocument } from "../store/types";

export type Entity = DocumentFields & { id: string; createdAt: number; updatedAt: number };

export type EntitySchema<T extends Entity> = z.ZodType<T, z.ZodTypeDef, unknown>;

export const idField = z.string().trim().min(1);
export const timestamp = z.number().int().nonnegative();

/** Everything a caller supplies when creating an entity; id is optional and timestamps are server-assigned. */
export type Draft<S extends z.ZodTypeAny> = Omit<z.input<S>, "id" | "createdAt" | "updatedAt"> & { id?: string };

export function parseValue<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, raw: unknown): T {
  const parsed = schema.safeParse(raw);
  if (parsed.success) return parsed.data;
  const issue = parsed.error.issues[0];
  const field = issue && issue.path.length > 0 ? issue.path.join(".") : "document";
  throw new ValidationError(field, issue?.message ?? "invalid value");
}

export function decodeDocument<T extends Entity>(schema: EntitySchema<T>, doc: StoredDocument): T {
  return parseValue(schema, { ...doc.fields, id: doc.id });
}

export function encodeEntity<T extends Entity>(entity: T): DocumentFields {
  const fields: DocumentFields = { ...entity };
  delete fields.id;
  return fields;
}

import { z } from "zod";
import type { CredentialCollection, CredentialRecord } from "./types.js";

const RESERVED_KEYS = new Set(["password", "updatedAt", "category", "fields"]);

const legacyValueSchema = z.union([z.string(), z.number(), z.boolean()]);

const structuredValueSchema = z.looseObject({
  password: z.string(),
  updatedAt: z.string().optional(),
  category: z.string().optional(),
});

/**
 * A collection entry as found in a decrypted vault. Older clients stored the
 * bare password; current clients store a record.
 */
export type StoredEntry =
  | { kind: "legacy"; value: string }
  | { kind: "structured"; record: Omit<CredentialRecord, "updatedAt"> & { updatedAt?: string } };

export class CollectionFormatError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "CollectionFormatError";
  }
}

export const formatTimestamp = (at: number): string => new Date(at).toISOString();

const isObjectRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

// Reads own keys of the parsed JSON; the null prototype keeps "__proto__" an ordinary key.
const collectFields = (title: string, raw: Record<string, unknown>): Record<string, string> => {
  const fields: Record<string, string> = Object.create(null);

  const nested = Object.hasOwn(raw, "fields") ? raw.fields : undefined;
  if (nested !== undefined) {
    if (!isObjectRecord(nested)) {
      throw new CollectionFormatError(`Entry "${title}" has malformed fields`);
    }
    for (const [key, value] of Object.entries(nested)) {
      if (typeof value !== "string") {
        throw new CollectionFormatError(`Entry "${title}" has malformed fields`);
      }
      fields[key] = value;
    }
  }

  // Extra string keys written flat by older clients become auxiliary fields.
  for (const [key, extra] of Object.entries(raw)) {
    if (!RESERVED_KEYS.has(key) && typeof extra === "string") {
      fields[key] = extra;
    }
  }
  return fields;
};

export const classifyEntry = (title: string, value: unknown): StoredEntry => {
  const legacy = legacyValueSchema.safeParse(value);
  if (legacy.success) {
    return { kind: "legacy", value: String(legacy.data) };
  }

  // Null and arrays were never written as records; keep their text as the password.
  if (!isObjectRecord(value)) {
    return { kind: "legacy", value: String(value) };
  }

  const structured = structuredValueSchema.safeParse(value);
  if (!structured.success) {
    throw new CollectionFormatError(`Entry "${title}" has an unrecognized shape`);
  }

  const { password, updatedAt, category } = structured.data;
  const fields = collectFields(title, value);

  return {
    kind: "structured",
    record: {
      password,
      ...(updatedAt !== undefined ? { updatedAt } : {}),
      ...(category !== undefined ? { category } : {}),
      ...(Object.keys(fields).length > 0 ? { fields } : {}),
    },
  };
};

export const migrateEntry = (entry: StoredEntry, timestamp: string): CredentialRecord => {
  switch (entry.kind) {
    case "legacy":
      return { password: entry.value, updatedAt: timestamp };
    case "structured":
      return { ...entry.record, updatedAt: entry.record.updatedAt ?? timestamp };
  }
};

/**
 * Parses decrypted vault JSON into a collection, migrating legacy entries once.
 */
export const decodeCollection = (input: unknown, now: () => number): CredentialCollection => {
  if (!isObjectRecord(input)) {
    throw new CollectionFormatError("Vault payload must be an object");
  }

  const timestamp = formatTimestamp(now());
  const collection: CredentialCollection = new Map();
  for (const [title, value] of Object.entries(input)) {
    collection.set(title, migrateEntry(classifyEntry(title, value), timestamp));
  }
  return collection;
};

const compareKeys = (left: string, right: string) => (left < right ? -1 : left > right ? 1 : 0);

const sortRecord = (record: CredentialRecord): Record<string, unknown> => {
  const output: Record<string, unknown> = {};
  if (record.category !== undefined) output.category = record.category;
  if (record.fields && Object.keys(record.fields).length > 0) {
    const fields: Record<string, string> = Object.create(null);
    for (const key of Object.keys(record.fields).sort(compareKeys)) {
      const value = record.fields[key];
      if (value !== undefined) fields[key] = value;
    }
    output.fields = fields;
  }
  output.password = record.password;
  output.updatedAt = record.updatedAt;
  return output;
};

/**
 * Stable JSON form: titles and record keys in code-unit order.
 */
export const serializeCollection = (collection: CredentialCollection): string => {
  // Null prototype so a "__proto__" title stays an ordinary key.
  const output: Record<string, unknown> = Object.create(null);
  for (const title of Array.from(collection.keys()).sort(compareKeys)) {
    const record = collection.get(title);
    if (record) {
      output[title] = sortRecord(record);
    }
  }
  return JSON.stringify(output);
};

export const cloneCollection = (collection: CredentialCollection): CredentialCollection =>
  new Map(
    Array.from(collection, ([title, record]) => [
      title,
      { ...record, ...(record.fields ? { fields: { ...record.fields } } : {}) },
    ]),
  );

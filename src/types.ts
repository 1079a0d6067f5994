// src/types.ts

export type JsonPrimitive = string | number | boolean | null;
export type JsonValue = JsonPrimitive | JsonValue[] | JsonObject;
export interface JsonObject {
  [key: string]: JsonValue;
}

/** A schema as the cache holds it. Opaque to the store. */
export type SchemaDocument = JsonValue;

/** One stored schema. Exactly one row exists per sourceKey. */
export interface CacheRow {
  sourceKey: string;
  idKey: string | undefined;
  /** Milliseconds since epoch; 0 means "never stale" */
  mtime: number;
  document: SchemaDocument;
}

export type ParseFn = (raw: Buffer) => SchemaDocument;
export type ValidateFn = (document: SchemaDocument) => boolean;

/** A document waiting for batch admission */
export type SchemaCandidate =
  | { sourceKey: string; mtime: number; document: SchemaDocument }
  | { sourceKey: string; mtime: number; parseError: Error }
  | { sourceKey: string; mtime: number; readError: Error };

export type FailureReason = 'parse_error' | 'io_error' | 'validation_rejected';

export interface StoreFailure {
  sourceKey: string;
  mtime: number;
  reason: FailureReason;
  message: string;
}

export type StoreResult =
  | { ok: true }
  | { ok: false; failures: StoreFailure[] };

/** Raw bytes fetched for a source key */
export interface FetchedSource {
  sourceKey: string;
  mtime: number;
  body: Buffer;
}

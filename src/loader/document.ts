// src/loader/document.ts
import { z } from 'zod';
import type { JsonObject, JsonValue, SchemaDocument } from '../types.js';

export const DEFAULT_ID_FIELDS: readonly string[] = ['id', '$id'];

const jsonObjectSchema = z.record(z.string(), z.unknown());

/** Container check used when admitting documents fetched by URI. */
export function isJsonObject(document: SchemaDocument): document is JsonObject {
  return jsonObjectSchema.safeParse(document).success;
}

/** Default parser: UTF-8 JSON. Throws on malformed input. */
export function parseJson(raw: Buffer): SchemaDocument {
  const value: JsonValue = JSON.parse(raw.toString('utf-8'));
  return value;
}

/**
 * Read the declared identifier of a schema.
 * Fields are tried in order; the first string value wins.
 */
export function getSchemaId(
  document: SchemaDocument,
  idFields: readonly string[] = DEFAULT_ID_FIELDS,
): string | undefined {
  if (!isJsonObject(document)) return undefined;
  for (const field of idFields) {
    const value = document[field];
    if (typeof value === 'string') return value;
  }
  return undefined;
}

/**
 * Give an anonymous object schema an identifier so it can still be found by id.
 * Non-objects and documents that already declare one are returned as-is.
 */
export function withSchemaId(
  document: SchemaDocument,
  sourceKey: string,
  idFields: readonly string[] = DEFAULT_ID_FIELDS,
): SchemaDocument {
  if (!isJsonObject(document) || getSchemaId(document, idFields) !== undefined) {
    return document;
  }
  const field = idFields[0] ?? 'id';
  return { [field]: sourceKey, ...document };
}

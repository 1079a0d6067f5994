// src/index.ts
import { getDefaultDatabase } from './database.js';
import type { CacheRow, ParseFn, SchemaDocument, StoreResult, ValidateFn } from './types.js';

export { SchemaDatabase, getDefaultDatabase, type SchemaDatabaseOptions } from './database.js';
export { SchemaStore } from './store/table.js';
export { admit } from './store/admission.js';
export { isOutdated, listOutdated } from './store/freshness.js';
export { listFiles } from './store/scan.js';
export { canonicalKey } from './loader/canonical.js';
export { fetchSource, loadCandidate } from './loader/uri.js';
export { parseJson, isJsonObject, getSchemaId, withSchemaId } from './loader/document.js';
export { loadConfig, type DepotConfig } from './config.js';
export { createLogger, silentLogger, type Logger } from './log.js';
export {
  SchemaDepotError,
  SchemaNotFoundError,
  UnknownUriSchemeError,
  SchemaIoError,
  SchemaParseError,
  SchemaNetworkError,
  isSchemaDepotError,
  type SchemaDepotErrorCode,
} from './errors.js';
export type {
  CacheRow,
  SchemaDocument,
  SchemaCandidate,
  StoreResult,
  StoreFailure,
  FailureReason,
  ParseFn,
  ValidateFn,
  JsonValue,
  JsonObject,
} from './types.js';

// Shortcuts bound to the process-wide database

export function add(key: string, document: SchemaDocument, validate: ValidateFn): StoreResult {
  return getDefaultDatabase().add(key, document, validate);
}

export function addUri(key: string): Promise<StoreResult> {
  return getDefaultDatabase().addUri(key);
}

export function addPath(path: string, parse?: ParseFn, validate?: ValidateFn): Promise<StoreResult> {
  return getDefaultDatabase().addPath(path, parse, validate);
}

export function load(key: string): SchemaDocument {
  return getDefaultDatabase().load(key);
}

export function loadUri(key: string): Promise<SchemaDocument> {
  return getDefaultDatabase().loadUri(key);
}

export function loadAll(): CacheRow[] {
  return getDefaultDatabase().loadAll();
}

export function remove(key: string): void {
  getDefaultDatabase().delete(key);
}

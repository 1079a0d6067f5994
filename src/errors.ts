// src/errors.ts

export type SchemaDepotErrorCode =
  | 'schema_not_found'
  | 'unknown_uri_scheme'
  | 'io_error'
  | 'parse_error'
  | 'network_error';

/** Base class for every error the cache throws. */
export class SchemaDepotError extends Error {
  readonly key: string;
  readonly code: SchemaDepotErrorCode;

  constructor(code: SchemaDepotErrorCode, key: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
    this.key = key;
  }
}

export class SchemaNotFoundError extends SchemaDepotError {
  constructor(key: string) {
    super('schema_not_found', key, `Schema not found: ${key}`);
  }
}

export class UnknownUriSchemeError extends SchemaDepotError {
  constructor(key: string) {
    super('unknown_uri_scheme', key, `Unknown URI scheme: ${key}`);
  }
}

export class SchemaIoError extends SchemaDepotError {
  constructor(key: string, cause: unknown) {
    super('io_error', key, `Cannot read ${key}: ${errorMessage(cause)}`, { cause });
  }
}

export class SchemaParseError extends SchemaDepotError {
  constructor(key: string, cause: unknown) {
    super('parse_error', key, `Cannot parse ${key}: ${errorMessage(cause)}`, { cause });
  }
}

export class SchemaNetworkError extends SchemaDepotError {
  /** HTTP status when the server answered with something other than 200 */
  readonly status?: number;

  constructor(key: string, detail: { status: number } | { cause: unknown }) {
    const message = 'status' in detail
      ? `GET ${key} returned HTTP ${detail.status}`
      : `GET ${key} failed: ${errorMessage(detail.cause)}`;
    super('network_error', key, message, 'cause' in detail ? { cause: detail.cause } : undefined);
    if ('status' in detail) this.status = detail.status;
  }
}

export function isSchemaDepotError(err: unknown, code?: SchemaDepotErrorCode): err is SchemaDepotError {
  return err instanceof SchemaDepotError && (code === undefined || err.code === code);
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

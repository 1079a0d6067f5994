// src/database.ts
import { SchemaNotFoundError, SchemaParseError, UnknownUriSchemeError, isSchemaDepotError } from './errors.js';
import { canonicalKey, filePathOf, FILE_PREFIX } from './loader/canonical.js';
import { DEFAULT_ID_FIELDS, isJsonObject, parseJson } from './loader/document.js';
import { DEFAULT_TIMEOUT } from './loader/fetch.js';
import { fetchSource, loadCandidate, toCandidate } from './loader/uri.js';
import { admit } from './store/admission.js';
import { listOutdated } from './store/freshness.js';
import { SchemaStore } from './store/table.js';
import { loadConfig } from './config.js';
import { createLogger, silentLogger, type Logger } from './log.js';
import type {
  CacheRow,
  ParseFn,
  SchemaCandidate,
  SchemaDocument,
  StoreResult,
  ValidateFn,
} from './types.js';

export interface SchemaDatabaseOptions {
  /** HTTP timeout in milliseconds */
  fetchTimeout?: number;
  /** Identifier fields in lookup order; the first is the one injected into anonymous schemas */
  idFields?: readonly string[];
  /** Parser for documents fetched by `addUri` and the default for `addPath` */
  parse?: ParseFn;
  logger?: Logger;
}

/**
 * Schema cache keyed by source key and by declared identifier.
 *
 * File-backed rows remember the file's mtime so `addPath` only re-reads
 * files that changed since they were admitted.
 */
export class SchemaDatabase {
  private readonly store = new SchemaStore();
  private readonly fetchTimeout: number;
  private readonly idFields: readonly string[];
  private readonly parse: ParseFn;
  private readonly logger: Logger;

  constructor(options: SchemaDatabaseOptions = {}) {
    this.fetchTimeout = options.fetchTimeout ?? DEFAULT_TIMEOUT;
    this.idFields = options.idFields ?? DEFAULT_ID_FIELDS;
    this.parse = options.parse ?? parseJson;
    this.logger = options.logger ?? silentLogger;
  }

  /**
   * Store `document` under `key`, replacing any row with that source key.
   * Rows added this way have mtime 0 and are never refreshed by `addPath`.
   */
  add(key: string, document: SchemaDocument, validate: ValidateFn): StoreResult {
    const sourceKey = canonicalKey(key);
    return this.admitBatch([{ sourceKey, mtime: 0, document }], validate);
  }

  /**
   * Fetch and store the schema at a file:, http: or https: URI.
   * Always re-fetches. Fetch and parse errors are thrown and leave the store
   * untouched; a rejected document is reported in the result.
   */
  async addUri(key: string): Promise<StoreResult> {
    const sourceKey = canonicalKey(key);
    const candidate = await loadCandidate(sourceKey, this.parse, {
      timeout: this.fetchTimeout,
      idFields: this.idFields,
    });
    if ('parseError' in candidate) throw new SchemaParseError(sourceKey, candidate.parseError);
    return this.admitBatch([candidate], isJsonObject);
  }

  /**
   * Load every new or modified file under `path`.
   * Unreadable, unparseable and rejected files are reported per file.
   */
  async addPath(
    path: string,
    parse: ParseFn = this.parse,
    validate: ValidateFn = isJsonObject,
  ): Promise<StoreResult> {
    const canonical = canonicalKey(path, 'file');
    const root = filePathOf(canonical);
    if (root === null) throw new UnknownUriSchemeError(canonical);
    const files = await listOutdated(this.store, root);
    this.logger.debug(`${files.length} outdated file(s) under ${root}`);

    const candidates: SchemaCandidate[] = [];
    for (const file of files) {
      candidates.push(await this.readCandidate(file, parse));
    }
    return this.admitBatch(candidates, validate);
  }

  /** Look up by source key, then by declared identifier. */
  load(key: string): SchemaDocument {
    const canonical = canonicalKey(key);
    const row = this.store.lookupBySource(canonical) ?? this.store.lookupById(canonical);
    if (!row) throw new SchemaNotFoundError(canonical);
    return row.document;
  }

  /** `load`, fetching the schema once via `addUri` if it is not cached yet. */
  async loadUri(key: string): Promise<SchemaDocument> {
    try {
      return this.load(key);
    } catch (err) {
      if (!isSchemaDepotError(err, 'schema_not_found')) throw err;
    }

    const result = await this.addUri(key);
    if (!result.ok) {
      this.logger.debug(`could not admit ${key}: ${result.failures.map(f => f.message).join('; ')}`);
    }
    return this.load(key);
  }

  loadAll(): CacheRow[] {
    return this.store.listAll();
  }

  /** Remove rows sourced from, or declaring the identifier, `key`. No-op on miss. */
  delete(key: string): void {
    const canonical = canonicalKey(key);
    this.store.deleteBySource(canonical);
    this.store.deleteById(canonical);
  }

  private async readCandidate(file: string, parse: ParseFn): Promise<SchemaCandidate> {
    const sourceKey = FILE_PREFIX + file;
    try {
      return toCandidate(await fetchSource(sourceKey), parse, this.idFields);
    } catch (err) {
      if (!isSchemaDepotError(err, 'io_error')) throw err;
      return { sourceKey, mtime: 0, readError: err };
    }
  }

  private admitBatch(candidates: SchemaCandidate[], validate: ValidateFn): StoreResult {
    const result = admit(this.store, candidates, validate, this.idFields);
    if (result.ok) {
      this.logger.debug(`admitted ${candidates.length} schema(s)`);
    } else {
      for (const failure of result.failures) {
        this.logger.warn(`${failure.reason} for ${failure.sourceKey}: ${failure.message}`);
      }
    }
    return result;
  }
}

let defaultDatabase: SchemaDatabase | null = null;

/** Process-wide database, configured from the environment on first use. */
export function getDefaultDatabase(): SchemaDatabase {
  if (!defaultDatabase) {
    const config = loadConfig();
    defaultDatabase = new SchemaDatabase({
      fetchTimeout: config.fetchTimeout,
      idFields: config.idFields,
      logger: createLogger({ debug: config.debug }),
    });
  }
  return defaultDatabase;
}

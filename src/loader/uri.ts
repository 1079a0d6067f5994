// src/loader/uri.ts
import { readFile, stat } from 'node:fs/promises';
import { SchemaIoError, SchemaNetworkError, UnknownUriSchemeError } from '../errors.js';
import { httpGet, parseHttpDate, type HttpResult } from './fetch.js';
import { filePathOf } from './canonical.js';
import { withSchemaId } from './document.js';
import type { FetchedSource, ParseFn, SchemaCandidate } from '../types.js';

export interface LoaderOptions {
  timeout?: number;
  idFields?: readonly string[];
}

/**
 * Fetch raw bytes and a modification time for a canonical source key.
 * Dispatches on scheme: file://, http://, https://.
 */
export async function fetchSource(sourceKey: string, options: LoaderOptions = {}): Promise<FetchedSource> {
  const filePath = filePathOf(sourceKey);
  if (filePath !== null) {
    return readFileSource(sourceKey, filePath);
  }
  if (sourceKey.startsWith('http://') || sourceKey.startsWith('https://')) {
    return fetchHttpSource(sourceKey, options);
  }
  throw new UnknownUriSchemeError(sourceKey);
}

async function readFileSource(sourceKey: string, filePath: string): Promise<FetchedSource> {
  try {
    const [body, info] = await Promise.all([readFile(filePath), stat(filePath)]);
    return { sourceKey, mtime: info.mtimeMs, body };
  } catch (err) {
    throw new SchemaIoError(sourceKey, err);
  }
}

async function fetchHttpSource(sourceKey: string, options: LoaderOptions): Promise<FetchedSource> {
  let result: HttpResult;
  try {
    result = await httpGet(sourceKey, { timeout: options.timeout });
  } catch (err) {
    throw new SchemaNetworkError(sourceKey, { cause: err });
  }

  if (result.status !== 200) {
    throw new SchemaNetworkError(sourceKey, { status: result.status });
  }

  return {
    sourceKey,
    mtime: parseHttpDate(result.headers['last-modified']),
    body: result.body,
  };
}

/**
 * Turn fetched bytes into an admission candidate.
 * A parser failure is captured on the candidate, not thrown.
 */
export function toCandidate(
  source: FetchedSource,
  parse: ParseFn,
  idFields?: readonly string[],
): SchemaCandidate {
  const { sourceKey, mtime } = source;
  try {
    const document = withSchemaId(parse(source.body), sourceKey, idFields);
    return { sourceKey, mtime, document };
  } catch (err) {
    return { sourceKey, mtime, parseError: err instanceof Error ? err : new Error(String(err)) };
  }
}

/** Fetch and parse one source key. Fetch errors propagate. */
export async function loadCandidate(
  sourceKey: string,
  parse: ParseFn,
  options: LoaderOptions = {},
): Promise<SchemaCandidate> {
  const source = await fetchSource(sourceKey, options);
  return toCandidate(source, parse, options.idFields);
}

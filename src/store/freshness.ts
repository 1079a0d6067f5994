// src/store/freshness.ts
import { stat } from 'node:fs/promises';
import { FILE_PREFIX } from '../loader/canonical.js';
import { listFiles } from './scan.js';
import type { SchemaStore } from './table.js';

/**
 * Whether the cached row for `filePath` is missing or older than the file.
 * Equal timestamps count as fresh, and rows with mtime 0 are never stale.
 * A file that cannot be stat'ed is outdated, so the read that follows
 * reports it as that file's failure.
 */
export async function isOutdated(store: SchemaStore, filePath: string): Promise<boolean> {
  const sourceKey = FILE_PREFIX + filePath;
  const row = store.lookupBySource(sourceKey);
  if (!row) return true;
  if (row.mtime === 0) return false;

  try {
    return (await stat(filePath)).mtimeMs > row.mtime;
  } catch {
    return true;
  }
}

/** Files under `root` whose cache rows need (re)loading. */
export async function listOutdated(store: SchemaStore, root: string): Promise<string[]> {
  const files = await listFiles(root);
  if (files.length === 0 || !store.tableExists()) return files;

  const outdated: string[] = [];
  for (const file of files) {
    if (await isOutdated(store, file)) outdated.push(file);
  }
  return outdated;
}

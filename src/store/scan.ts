// src/store/scan.ts
import { readdir } from 'node:fs/promises';
import { join, resolve } from 'node:path';
import type { Dirent } from 'node:fs';

/**
 * Recursively list every regular file under `root` as absolute paths.
 * Entries are visited in name order; symlinks are not followed.
 * A missing root, or one that is not a directory, yields an empty list.
 */
export async function listFiles(root: string): Promise<string[]> {
  const files: string[] = [];
  await walk(resolve(root), files);
  return files;
}

async function walk(dir: string, files: string[]): Promise<void> {
  let entries: Dirent[];
  try {
    entries = await readdir(dir, { withFileTypes: true });
  } catch (e: unknown) {
    const code = (e as NodeJS.ErrnoException).code;
    if (code === 'ENOENT' || code === 'ENOTDIR') return;
    throw e;
  }

  entries.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));
  for (const entry of entries) {
    const path = join(dir, entry.name);
    if (entry.isDirectory()) {
      await walk(path, files);
    } else if (entry.isFile()) {
      files.push(path);
    }
  }
}

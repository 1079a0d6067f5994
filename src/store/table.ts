// src/store/table.ts
import type { CacheRow } from '../types.js';

/**
 * In-memory table of cache rows keyed by source key.
 *
 * The backing map is created lazily on first insert. Whether it exists is
 * observable (`tableExists`) because a directory refresh treats a store that
 * has never been populated as a full load.
 *
 * Map iteration order doubles as admission order: a re-admitted row is moved
 * to the end, so lookup by identifier can prefer the newest row.
 *
 * Rows are deep-copied on the way in and on the way out; a stored document
 * only changes by re-admission.
 */
export class SchemaStore {
  private table: Map<string, CacheRow> | null = null;

  ensureTable(): Map<string, CacheRow> {
    if (!this.table) this.table = new Map();
    return this.table;
  }

  tableExists(): boolean {
    return this.table !== null;
  }

  get size(): number {
    return this.table?.size ?? 0;
  }

  lookupBySource(sourceKey: string): CacheRow | null {
    const row = this.table?.get(sourceKey);
    return row ? copyRow(row) : null;
  }

  /** Newest row declaring this identifier, if any. */
  lookupById(idKey: string): CacheRow | null {
    if (!this.table) return null;
    let match: CacheRow | null = null;
    for (const row of this.table.values()) {
      if (row.idKey === idKey) match = row;
    }
    return match ? copyRow(match) : null;
  }

  insert(row: CacheRow): void {
    const table = this.ensureTable();
    table.delete(row.sourceKey);
    table.set(row.sourceKey, copyRow(row));
  }

  deleteBySource(sourceKey: string): void {
    this.table?.delete(sourceKey);
  }

  deleteById(idKey: string): void {
    if (!this.table) return;
    for (const [sourceKey, row] of this.table) {
      if (row.idKey === idKey) this.table.delete(sourceKey);
    }
  }

  listAll(): CacheRow[] {
    return this.table ? [...this.table.values()].map(copyRow) : [];
  }
}

function copyRow(row: CacheRow): CacheRow {
  return { ...row, document: structuredClone(row.document) };
}

// test/store/freshness.test.ts
import { describe, it, beforeEach, afterEach } from 'node:test';
import assert from 'node:assert/strict';
import { mkdtemp, rm, writeFile, utimes } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { SchemaStore } from '../../src/store/table.js';
import { isOutdated, listOutdated } from '../../src/store/freshness.js';

const T1 = 1_700_000_000;
const T2 = T1 + 60;

describe('freshness', () => {
  let testDir: string;
  let store: SchemaStore;

  async function writeSchema(name: string, seconds: number): Promise<string> {
    const file = join(testDir, name);
    await writeFile(file, '{}');
    await utimes(file, seconds, seconds);
    return file;
  }

  function cache(file: string, mtime: number): void {
    store.insert({ sourceKey: `file://${file}`, idKey: undefined, mtime, document: {} });
  }

  beforeEach(async () => {
    testDir = await mkdtemp(join(tmpdir(), 'schema-depot-fresh-'));
    store = new SchemaStore();
  });

  afterEach(async () => {
    await rm(testDir, { recursive: true, force: true });
  });

  describe('isOutdated', () => {
    it('is true when the file was never loaded', async () => {
      const file = await writeSchema('a.json', T1);
      assert.equal(await isOutdated(store, file), true);
    });

    it('is false when mtimes are equal', async () => {
      const file = await writeSchema('a.json', T1);
      cache(file, T1 * 1000);
      assert.equal(await isOutdated(store, file), false);
    });

    it('is true when the file is newer', async () => {
      const file = await writeSchema('a.json', T2);
      cache(file, T1 * 1000);
      assert.equal(await isOutdated(store, file), true);
    });

    it('is false when the file is older than the row', async () => {
      const file = await writeSchema('a.json', T1);
      cache(file, T2 * 1000);
      assert.equal(await isOutdated(store, file), false);
    });

    it('never treats an mtime 0 row as stale', async () => {
      const file = await writeSchema('a.json', T2);
      cache(file, 0);
      assert.equal(await isOutdated(store, file), false);
    });

    it('treats a cached file that disappeared as outdated', async () => {
      const file = join(testDir, 'gone.json');
      cache(file, T1 * 1000);
      assert.equal(await isOutdated(store, file), true);
    });
  });

  describe('listOutdated', () => {
    it('returns every file while the table does not exist', async () => {
      const a = await writeSchema('a.json', T1);
      const b = await writeSchema('b.json', T1);
      assert.equal(store.tableExists(), false);
      assert.deepEqual(await listOutdated(store, testDir), [a, b]);
    });

    it('filters out fresh files once the table exists', async () => {
      const a = await writeSchema('a.json', T1);
      const b = await writeSchema('b.json', T2);
      const c = await writeSchema('c.json', T1);
      cache(a, T1 * 1000);
      cache(b, T1 * 1000);
      assert.deepEqual(await listOutdated(store, testDir), [b, c]);
    });

    it('returns an empty list for an empty directory', async () => {
      cache(join(testDir, 'elsewhere.json'), T1 * 1000);
      assert.deepEqual(await listOutdated(store, testDir), []);
    });
  });
});

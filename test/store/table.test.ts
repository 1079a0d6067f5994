// test/store/table.test.ts
import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { SchemaStore } from '../../src/store/table.js';
import type { CacheRow } from '../../src/types.js';

function row(sourceKey: string, idKey: string | undefined, title: string, mtime = 0): CacheRow {
  return { sourceKey, idKey, mtime, document: { title } };
}

describe('SchemaStore', () => {
  it('starts without a table', () => {
    const store = new SchemaStore();
    assert.equal(store.tableExists(), false);
    assert.equal(store.size, 0);
    assert.equal(store.lookupBySource('a'), null);
    assert.equal(store.lookupById('a'), null);
    assert.deepEqual(store.listAll(), []);
  });

  it('lookups and deletes do not create the table', () => {
    const store = new SchemaStore();
    store.lookupBySource('a');
    store.lookupById('a');
    store.deleteBySource('a');
    store.deleteById('a');
    assert.equal(store.tableExists(), false);
  });

  it('ensureTable is idempotent', () => {
    const store = new SchemaStore();
    const first = store.ensureTable();
    const second = store.ensureTable();
    assert.equal(first, second);
    assert.equal(store.tableExists(), true);
  });

  it('insert creates the table and stores the row', () => {
    const store = new SchemaStore();
    store.insert(row('file:///a.json', 'urn:a', 'A', 10));
    assert.equal(store.tableExists(), true);
    assert.deepEqual(store.lookupBySource('file:///a.json'), row('file:///a.json', 'urn:a', 'A', 10));
    assert.deepEqual(store.lookupById('urn:a'), row('file:///a.json', 'urn:a', 'A', 10));
  });

  it('insert overwrites by source key', () => {
    const store = new SchemaStore();
    store.insert(row('k', 'urn:old', 'first'));
    store.insert(row('k', 'urn:new', 'second'));
    assert.equal(store.size, 1);
    assert.deepEqual(store.lookupBySource('k')?.document, { title: 'second' });
    assert.equal(store.lookupById('urn:old'), null);
  });

  it('lookupById prefers the most recently admitted row', () => {
    const store = new SchemaStore();
    store.insert(row('a', 'urn:shared', 'A'));
    store.insert(row('b', 'urn:shared', 'B'));
    assert.equal(store.lookupById('urn:shared')?.sourceKey, 'b');

    store.insert(row('a', 'urn:shared', 'A2'));
    assert.equal(store.lookupById('urn:shared')?.sourceKey, 'a');
  });

  it('deleteById removes every row with that id', () => {
    const store = new SchemaStore();
    store.insert(row('a', 'urn:shared', 'A'));
    store.insert(row('b', 'urn:shared', 'B'));
    store.insert(row('c', 'urn:other', 'C'));
    store.deleteById('urn:shared');
    assert.deepEqual(store.listAll().map(r => r.sourceKey), ['c']);
  });

  it('deleteBySource removes only that row', () => {
    const store = new SchemaStore();
    store.insert(row('a', undefined, 'A'));
    store.insert(row('b', undefined, 'B'));
    store.deleteBySource('a');
    store.deleteBySource('missing');
    assert.deepEqual(store.listAll().map(r => r.sourceKey), ['b']);
  });

  it('rows without an id are never matched by id', () => {
    const store = new SchemaStore();
    store.insert(row('a', undefined, 'A'));
    assert.equal(store.lookupById('a'), null);
  });

  it('returns copies of rows', () => {
    const store = new SchemaStore();
    store.insert(row('a', undefined, 'A', 5));
    const found = store.lookupBySource('a');
    assert.ok(found);
    found.mtime = 99;
    const [listed] = store.listAll();
    listed.sourceKey = 'changed';
    assert.deepEqual(store.lookupBySource('a'), row('a', undefined, 'A', 5));
  });

  it('does not share documents with callers', () => {
    const store = new SchemaStore();
    const document = { id: 'urn:a', title: 'original' };
    store.insert({ sourceKey: 'k', idKey: 'urn:a', mtime: 0, document });
    document.id = 'urn:b';
    document.title = 'changed';

    const found = store.lookupBySource('k');
    assert.ok(found);
    assert.deepEqual(found.document, { id: 'urn:a', title: 'original' });
    assert.ok(found.document !== null && typeof found.document === 'object' && !Array.isArray(found.document));
    found.document.title = 'edited';

    const [listed] = store.listAll();
    assert.deepEqual(listed, { sourceKey: 'k', idKey: 'urn:a', mtime: 0, document: { id: 'urn:a', title: 'original' } });
    assert.deepEqual(store.lookupById('urn:a')?.document, { id: 'urn:a', title: 'original' });
    assert.equal(store.lookupById('urn:b'), null);
  });
});

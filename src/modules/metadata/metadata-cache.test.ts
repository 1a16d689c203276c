import test from 'node:test';
import assert from 'node:assert/strict';
import { mkdtemp, readdir, readFile, writeFile } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { CACHE_TTL_MS, MetadataCache } from './metadata-cache.js';
import type { Snapshot } from './types/metadata.types.js';

const cachedAt = new Date('2024-05-01T10:00:00.000Z');

function sampleSnapshot(): Snapshot {
  return {
    databaseName: 'shop',
    extractedAt: '2024-05-01T09:59:58.000Z',
    totalTables: 1,
    totalViews: 0,
    tables: {
      users: {
        tableType: 'BASE TABLE',
        comment: null,
        rowCount: 4,
        tableSize: '64 kB',
        columns: [
          {
            name: 'id',
            dataType: 'integer',
            maxLength: null,
            numericPrecision: 32,
            numericScale: 0,
            isNullable: false,
            defaultValue: null,
            comment: null,
            ordinal: 1
          }
        ],
        primaryKeys: ['id'],
        foreignKeys: [],
        indexes: [],
        columnStatistics: { id: { nullCount: 0, nullPercentage: 0, distinctCount: 4, distinctPercentage: 100 } },
        sampleData: [{ id: 1, tags: ['a', 'b'], meta: { nested: null } }]
      }
    },
    views: {},
    relationships: {},
    warnings: [{ relation: 'users', step: 'indexes', message: 'permission denied' }]
  };
}

async function tempFile(): Promise<string> {
  const dir = await mkdtemp(path.join(os.tmpdir(), 'metadata-cache-'));
  return path.join(dir, 'nested', 'metadata.json');
}

test('a missing file is a miss', async () => {
  const cache = new MetadataCache(await tempFile());
  assert.equal(await cache.get(), null);
});

test('put then get returns the same snapshot and timestamp', async () => {
  const cache = new MetadataCache(await tempFile(), { now: () => cachedAt });
  const snapshot = sampleSnapshot();

  await cache.put(snapshot);
  const entry = await cache.get();

  assert.ok(entry);
  assert.deepEqual(entry.snapshot, snapshot);
  assert.equal(entry.cachedAt.toISOString(), '2024-05-01T10:00:00.000Z');
  assert.equal('connectionError' in entry.snapshot, false);
});

test('the file holds a versioned envelope and no temp files are left behind', async () => {
  const filePath = await tempFile();
  await new MetadataCache(filePath, { now: () => cachedAt }).put(sampleSnapshot());

  const envelope: unknown = JSON.parse(await readFile(filePath, 'utf8'));
  assert.ok(typeof envelope === 'object' && envelope !== null);
  assert.equal('version' in envelope && envelope.version, 1);
  assert.equal('cachedAt' in envelope && envelope.cachedAt, '2024-05-01T10:00:00.000Z');
  assert.deepEqual(await readdir(path.dirname(filePath)), ['metadata.json']);
});

test('entries older than the TTL are misses; exactly the TTL is still a hit', async () => {
  const filePath = await tempFile();
  await new MetadataCache(filePath, { now: () => cachedAt }).put(sampleSnapshot());

  const at = (offsetMs: number) => new MetadataCache(filePath, { now: () => new Date(cachedAt.getTime() + offsetMs) });
  assert.ok(await at(CACHE_TTL_MS).get());
  assert.equal(await at(CACHE_TTL_MS + 1).get(), null);
});

test('corrupt, mis-shaped and other-version files are misses', async () => {
  const filePath = await tempFile();
  const cache = new MetadataCache(filePath, { now: () => cachedAt });
  await cache.put(sampleSnapshot());

  const valid: unknown = JSON.parse(await readFile(filePath, 'utf8'));

  await writeFile(filePath, '{"version": 1, "cachedAt": ', 'utf8');
  assert.equal(await cache.get(), null);

  await writeFile(filePath, JSON.stringify({ version: 1, cachedAt: cachedAt.toISOString(), snapshot: { tables: [] } }), 'utf8');
  assert.equal(await cache.get(), null);

  assert.ok(typeof valid === 'object' && valid !== null);
  await writeFile(filePath, JSON.stringify({ ...valid, version: 2 }), 'utf8');
  assert.equal(await cache.get(), null);
});

test('clear removes the entry and tolerates a missing file', async () => {
  const cache = new MetadataCache(await tempFile(), { now: () => cachedAt });
  await cache.put(sampleSnapshot());

  await cache.clear();
  assert.equal(await cache.get(), null);
  await cache.clear();
});

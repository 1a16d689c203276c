import test from 'node:test';
import assert from 'node:assert/strict';
import { mkdtemp, readFile } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { ConnectionStore, connectionImportSchema, connectionInputSchema } from './workspace.service.js';

const key = '0f'.repeat(32);

const input = connectionInputSchema.parse({
  host: 'db.local',
  database: 'shop',
  user: 'reader',
  password: 'test-password'
});

function clock(start: string) {
  let current = new Date(start);
  return {
    now: () => current,
    set: (iso: string) => {
      current = new Date(iso);
    }
  };
}

async function storePath(): Promise<string> {
  const dir = await mkdtemp(path.join(os.tmpdir(), 'workspace-store-'));
  return path.join(dir, 'connections.enc');
}

test('input schema applies the default port and description', () => {
  assert.deepEqual(input, {
    host: 'db.local',
    database: 'shop',
    user: 'reader',
    password: 'test-password',
    port: 5432,
    description: ''
  });
  assert.equal(connectionInputSchema.safeParse({ ...input, port: '70000' }).success, false);
  assert.equal(connectionInputSchema.parse({ ...input, port: '6543' }).port, 6543);
});

test('listing never includes passwords', async () => {
  const time = clock('2024-05-01T10:00:00.000Z');
  const store = new ConnectionStore(await storePath(), key, time.now);

  await store.addConnection('shop', input);

  assert.deepEqual(await store.listConnections(), [
    {
      name: 'shop',
      host: 'db.local',
      database: 'shop',
      user: 'reader',
      port: 5432,
      description: '',
      createdAt: '2024-05-01T10:00:00.000Z',
      lastUsed: null
    }
  ]);
});

test('reading a profile records lastUsed; updating keeps createdAt', async () => {
  const time = clock('2024-05-01T10:00:00.000Z');
  const store = new ConnectionStore(await storePath(), key, time.now);
  await store.addConnection('shop', input);

  time.set('2024-05-02T08:30:00.000Z');
  const profile = await store.getConnection('shop');
  assert.equal(profile?.lastUsed, '2024-05-02T08:30:00.000Z');
  assert.equal(profile?.password, 'test-password');

  time.set('2024-05-03T00:00:00.000Z');
  const updated = await store.addConnection('shop', { ...input, host: 'replica.local' });
  assert.equal(updated.createdAt, '2024-05-01T10:00:00.000Z');
  assert.equal(updated.lastUsed, '2024-05-02T08:30:00.000Z');
  assert.equal(updated.host, 'replica.local');
});

test('profiles persist encrypted and reload in a new store', async () => {
  const filePath = await storePath();
  await new ConnectionStore(filePath, key).addConnection('shop', input);

  const raw = await readFile(filePath, 'utf8');
  assert.equal(raw.includes('test-password'), false);
  assert.equal(raw.includes('db.local'), false);

  const reloaded = new ConnectionStore(filePath, key);
  assert.deepEqual(await reloaded.getConnectionConfig('shop'), {
    host: 'db.local',
    database: 'shop',
    user: 'reader',
    password: 'test-password',
    port: 5432
  });
});

test('a store written under another key loads as empty', async () => {
  const filePath = await storePath();
  await new ConnectionStore(filePath, key).addConnection('shop', input);

  const other = new ConnectionStore(filePath, 'ab'.repeat(32));
  assert.deepEqual(await other.listConnections(), []);
});

test('unknown names read as null or false', async () => {
  const store = new ConnectionStore(await storePath(), key);

  assert.equal(await store.getConnection('ghost'), null);
  assert.equal(await store.getConnectionConfig('ghost'), null);
  assert.equal(await store.exportConnection('ghost'), null);
  assert.equal(await store.deleteConnection('ghost'), false);
  assert.equal(await store.hasConnection('ghost'), false);
});

test('delete removes the profile', async () => {
  const store = new ConnectionStore(await storePath(), key);
  await store.addConnection('shop', input);

  assert.equal(await store.deleteConnection('shop'), true);
  assert.equal(await store.hasConnection('shop'), false);
});

test('export leaves the password out unless asked', async () => {
  const store = new ConnectionStore(await storePath(), key);
  await store.addConnection('shop', { ...input, description: 'Primary' });

  assert.deepEqual(await store.exportConnection('shop'), {
    name: 'shop',
    host: 'db.local',
    database: 'shop',
    user: 'reader',
    port: 5432,
    description: 'Primary'
  });
  assert.equal((await store.exportConnection('shop', true))?.password, 'test-password');
});

test('import names unnamed profiles after the current UTC time', async () => {
  const time = clock('2024-05-01T10:04:09.000Z');
  const store = new ConnectionStore(await storePath(), key, time.now);

  const generated = await store.importConnection(
    connectionImportSchema.parse({ host: 'db.local', database: 'shop', user: 'reader' })
  );
  const named = await store.importConnection(
    connectionImportSchema.parse({ name: 'copy', host: 'db.local', database: 'shop', user: 'reader', password: 'p' })
  );

  assert.equal(generated, 'imported_20240501_100409');
  assert.equal(named, 'copy');
  const imported = await store.getConnection(generated);
  assert.equal(imported?.password, '');
  assert.equal(imported?.description, 'Imported connection');
});

test('concurrent writes are serialized and all persist', async () => {
  const filePath = await storePath();
  const store = new ConnectionStore(filePath, key);

  await Promise.all(['a', 'b', 'c', 'd', 'e'].map((name) => store.addConnection(name, input)));

  const names = (await new ConnectionStore(filePath, key).listConnections()).map((summary) => summary.name);
  assert.deepEqual(names.sort(), ['a', 'b', 'c', 'd', 'e']);
});

test('names shared with Object.prototype members behave like any other name', async () => {
  const filePath = await storePath();
  const store = new ConnectionStore(filePath, key);

  assert.equal(await store.hasConnection('constructor'), false);
  assert.equal(await store.deleteConnection('toString'), false);
  assert.equal(await store.getConnectionConfig('constructor'), null);
  assert.equal('lastUsed' in Object, false);

  await store.addConnection('__proto__', input);
  await store.addConnection('constructor', { ...input, host: 'ctor.local' });

  const reloaded = new ConnectionStore(filePath, key);
  assert.deepEqual((await reloaded.listConnections()).map((summary) => summary.name), ['__proto__', 'constructor']);
  assert.equal((await reloaded.getConnectionConfig('__proto__'))?.host, 'db.local');
  assert.equal((await reloaded.getConnectionConfig('constructor'))?.host, 'ctor.local');
  assert.equal(await reloaded.deleteConnection('__proto__'), true);
  assert.equal(await reloaded.hasConnection('__proto__'), false);
});

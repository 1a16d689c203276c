import test from 'node:test';
import assert from 'node:assert/strict';
import { createSchemaClient } from './pool-manager.js';

const config = { host: 'db.local', database: 'shop', user: 'reader', password: 'test-password', port: 5432 };

test('schema clients absorb errors emitted by a dropped backend', () => {
  const client = createSchemaClient(config);

  assert.equal(client.listenerCount('error'), 1);
  assert.doesNotThrow(() => client.emit('error', new Error('terminating connection due to administrator command')));
});

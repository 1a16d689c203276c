import test from 'node:test';
import assert from 'node:assert/strict';
import { QueryValidator } from './query-validator.js';
import type { SchemaReference } from './types/ai.types.js';

const schema: SchemaReference = { tables: ['users', 'orders'], views: ['active_users'] };

test('accepts a plain read with a LIMIT', () => {
  const result = new QueryValidator().validateQuery('SELECT id, email FROM users LIMIT 10', schema);
  assert.deepEqual(result, { isValid: true, errors: [], warnings: [] });
});

test('rejects data-modifying statements', () => {
  const result = new QueryValidator().validateQuery('DELETE FROM users');
  assert.equal(result.isValid, false);
  assert.deepEqual(result.errors, ['Only SELECT statements are allowed', 'Query contains forbidden operations: DELETE']);
});

test('rejects stacked statements but allows one trailing semicolon', () => {
  const validator = new QueryValidator();

  const stacked = validator.validateQuery('SELECT id FROM users; DROP TABLE users');
  assert.deepEqual(stacked.errors, ['Multiple statements are not allowed', 'Query contains forbidden operations: DROP']);

  const trailing = validator.validateQuery('SELECT id FROM users LIMIT 5;');
  assert.equal(trailing.isValid, true);
});

test('ignores keywords inside string literals and longer identifiers', () => {
  const validator = new QueryValidator();
  assert.equal(validator.validateQuery("SELECT id FROM users WHERE note = 'please delete me' LIMIT 5").isValid, true);
  assert.equal(validator.validateQuery('SELECT updated_at FROM users LIMIT 1').isValid, true);
});

test('rejects empty input and unbalanced parentheses', () => {
  const validator = new QueryValidator();
  assert.deepEqual(validator.validateQuery('   ').errors, ['Query cannot be empty']);
  assert.deepEqual(validator.validateQuery('SELECT COUNT(id FROM users').errors, ['Mismatched parentheses: 1 open, 0 close']);
});

test('warns about unknown tables, SELECT * and a missing LIMIT', () => {
  const result = new QueryValidator().validateQuery('SELECT * FROM ghost_table', schema);
  assert.equal(result.isValid, true);
  assert.deepEqual(result.warnings, [
    "Table 'ghost_table' was not found in the schema",
    'SELECT * detected; prefer explicit columns for better performance',
    'No LIMIT clause; large result sets may be returned'
  ]);
});

test('treats CTE names and views as known relations', () => {
  const validator = new QueryValidator();
  const cte = validator.validateQuery('WITH recent AS (SELECT id FROM orders LIMIT 10) SELECT id FROM recent', schema);
  assert.deepEqual(cte, { isValid: true, errors: [], warnings: [] });

  const view = validator.validateQuery('SELECT id FROM public.active_users LIMIT 3', schema);
  assert.deepEqual(view.warnings, []);
});

test('aggregates do not need a LIMIT', () => {
  assert.deepEqual(new QueryValidator().validateQuery('SELECT COUNT(*) FROM orders').warnings, []);
});

test('flags injection patterns and comments', () => {
  const validator = new QueryValidator();
  assert.deepEqual(validator.validateQuery("SELECT id FROM users WHERE name = '' OR 1=1 LIMIT 5").warnings, [
    'Potential SQL injection pattern detected'
  ]);
  assert.deepEqual(validator.validateQuery('SELECT id FROM users -- note\nLIMIT 5').warnings, [
    'Query contains comments; review for hidden logic'
  ]);
});

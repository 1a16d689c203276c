import test from 'node:test';
import assert from 'node:assert/strict';
import { formatColumnType, formatForAi, indexRole, stableStringify } from './ai-formatter.js';
import { createEmptySnapshot } from './metadata-extractor.js';
import type { ColumnMeta, Snapshot, TableMeta } from './types/metadata.types.js';

const RULE = '='.repeat(80);
const THIN_RULE = '-'.repeat(80);

function column(name: string, dataType: string, extra: Partial<ColumnMeta> = {}): ColumnMeta {
  return {
    name,
    dataType,
    maxLength: null,
    numericPrecision: null,
    numericScale: null,
    isNullable: true,
    defaultValue: null,
    comment: null,
    ordinal: 1,
    ...extra
  };
}

function shopSnapshot(): Snapshot {
  const users: TableMeta = {
    tableType: 'BASE TABLE',
    comment: 'Registered customers',
    rowCount: 1234,
    tableSize: '64 kB',
    columns: [
      column('id', 'integer', { numericPrecision: 32, numericScale: 0, isNullable: false, defaultValue: "nextval('users_id_seq'::regclass)" }),
      column('email', 'character varying', { maxLength: 255, isNullable: false, comment: 'Login name' })
    ],
    primaryKeys: ['id'],
    foreignKeys: [],
    indexes: [
      { indexName: 'users_pkey', columns: ['id'], isUnique: true, isPrimary: true, indexType: 'btree' },
      { indexName: 'users_email_key', columns: ['email'], isUnique: true, isPrimary: false, indexType: 'btree' }
    ],
    columnStatistics: {
      id: { nullCount: 0, nullPercentage: 0, distinctCount: 4, distinctPercentage: 100 },
      email: { error: 'permission denied' }
    },
    sampleData: [{ id: 1, email: 'a@example.com' }]
  };

  const orders: TableMeta = {
    tableType: 'BASE TABLE',
    comment: null,
    rowCount: 2,
    tableSize: '16 kB',
    columns: [
      column('id', 'integer', { numericPrecision: 32, numericScale: 0, isNullable: false }),
      column('user_id', 'integer', { numericPrecision: 32, numericScale: 0, isNullable: false })
    ],
    primaryKeys: ['id'],
    foreignKeys: [
      {
        column: 'user_id',
        foreignTable: 'users',
        foreignColumn: 'id',
        constraintName: 'orders_user_id_fkey',
        onUpdate: 'NO ACTION',
        onDelete: 'CASCADE'
      }
    ],
    indexes: []
  };

  return {
    databaseName: 'shop',
    extractedAt: '2024-05-01T10:00:00.000Z',
    totalTables: 2,
    totalViews: 1,
    tables: { users, orders },
    views: {
      big_spenders: {
        viewType: 'MATERIALIZED VIEW',
        comment: null,
        definition: '\n SELECT user_id FROM orders WHERE total > 10;\n',
        columns: [column('user_id', 'integer')]
      }
    },
    relationships: { orders: [{ fromColumn: 'user_id', toTable: 'users', toColumn: 'id' }] },
    warnings: []
  };
}

test('renders the full schema description', () => {
  const expected = [
    'DATABASE: shop',
    'Extracted: 2024-05-01T10:00:00.000Z',
    'Total Tables: 2',
    'Total Views: 1',
    '',
    RULE,
    'DATABASE RELATIONSHIP DIAGRAM',
    RULE,
    '',
    '[orders]',
    '  └─→ user_id references users.id',
    '',
    RULE,
    '',
    RULE,
    'DETAILED SCHEMA INFORMATION',
    RULE,
    '',
    RULE,
    'TABLE: orders',
    RULE,
    'Type: BASE TABLE',
    'Row Count: ~2',
    'Size: 16 kB',
    '',
    'Primary Key(s): id',
    '',
    'COLUMNS (2):',
    '  • id: integer(32) NOT NULL',
    '  • user_id: integer(32) NOT NULL',
    '',
    'FOREIGN KEYS:',
    '  • user_id → users.id',
    '    ON UPDATE: NO ACTION, ON DELETE: CASCADE',
    '',
    RULE,
    'TABLE: users',
    RULE,
    'Type: BASE TABLE',
    'Row Count: ~1,234',
    'Size: 64 kB',
    'Description: Registered customers',
    '',
    'Primary Key(s): id',
    '',
    'COLUMNS (2):',
    "  • id: integer(32) NOT NULL DEFAULT nextval('users_id_seq'::regclass) [Nulls: 0%, Distinct: 4]",
    '  • email: character varying(255) NOT NULL',
    '    Comment: Login name',
    '',
    'INDEXES:',
    '  • users_pkey (PRIMARY KEY, btree) on [id]',
    '  • users_email_key (UNIQUE, btree) on [email]',
    '',
    'SAMPLE DATA (first 1 rows):',
    '  Row 1: {"email": "a@example.com", "id": 1}',
    '',
    '',
    RULE,
    'VIEWS AND MATERIALIZED VIEWS',
    RULE,
    '',
    THIN_RULE,
    'VIEW: big_spenders',
    THIN_RULE,
    'Type: MATERIALIZED VIEW',
    '',
    'Definition:',
    'SELECT user_id FROM orders WHERE total > 10;',
    '',
    'COLUMNS (1):',
    '  • user_id: integer'
  ].join('\n');

  assert.equal(formatForAi(shopSnapshot()), expected);
});

test('output does not depend on the order relations were probed in', () => {
  const snapshot = shopSnapshot();
  const reversed: Snapshot = {
    ...snapshot,
    tables: Object.fromEntries(Object.entries(snapshot.tables).reverse())
  };

  assert.equal(formatForAi(reversed), formatForAi(snapshot));
});

test('an empty snapshot states that there are no relationships and shows the connection error', () => {
  const text = formatForAi(createEmptySnapshot('shop', '2024-05-01T10:00:00.000Z', 'connection refused'));

  assert.equal(
    text,
    [
      'DATABASE: shop',
      'Extracted: 2024-05-01T10:00:00.000Z',
      'Total Tables: 0',
      'Total Views: 0',
      'Connection Error: connection refused',
      '',
      RULE,
      'DATABASE RELATIONSHIP DIAGRAM',
      RULE,
      '',
      'No foreign key relationships found in the database.',
      '',
      RULE,
      'DETAILED SCHEMA INFORMATION',
      RULE
    ].join('\n')
  );
});

test('stableStringify sorts keys at every level', () => {
  assert.equal(stableStringify({ b: [{ d: 1, c: null }], a: 'x' }), '{"a": "x", "b": [{"c": null, "d": 1}]}');
});

test('column types carry length or precision and scale', () => {
  assert.equal(formatColumnType(column('price', 'numeric', { numericPrecision: 10, numericScale: 2 })), 'numeric(10,2)');
  assert.equal(formatColumnType(column('code', 'character', { maxLength: 3 })), 'character(3)');
  assert.equal(formatColumnType(column('body', 'text')), 'text');
});

test('primary beats unique in the index role', () => {
  const index = { indexName: 'i', columns: ['a'], isUnique: true, isPrimary: true, indexType: 'btree' };
  assert.equal(indexRole(index), 'PRIMARY KEY');
  assert.equal(indexRole({ ...index, isPrimary: false }), 'UNIQUE');
  assert.equal(indexRole({ ...index, isPrimary: false, isUnique: false }), 'INDEX');
});

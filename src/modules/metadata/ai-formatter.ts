import type { ColumnMeta, ColumnStats, IndexMeta, JsonValue, SampleRow, Snapshot, TableMeta, ViewMeta } from './types/metadata.types.js';

const RULE = '='.repeat(80);
const THIN_RULE = '-'.repeat(80);
const rowCountFormat = new Intl.NumberFormat('en-US');

function byName(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

/**
 * JSON with object keys sorted at every level, so a row always renders the same way.
 */
export function stableStringify(value: JsonValue): string {
  if (value === null || typeof value !== 'object') {
    return JSON.stringify(value);
  }
  if (Array.isArray(value)) {
    return `[${value.map((item) => stableStringify(item)).join(', ')}]`;
  }
  const entries = Object.keys(value)
    .sort(byName)
    .map((key) => `${JSON.stringify(key)}: ${stableStringify(value[key] ?? null)}`);
  return `{${entries.join(', ')}}`;
}

export function formatColumnType(column: ColumnMeta): string {
  if (column.maxLength) {
    return `${column.dataType}(${column.maxLength})`;
  }
  if (column.numericPrecision) {
    const scale = column.numericScale ? `,${column.numericScale}` : '';
    return `${column.dataType}(${column.numericPrecision}${scale})`;
  }
  return column.dataType;
}

/**
 * Role label for an index; primary wins over unique, unique over plain.
 */
export function indexRole(index: IndexMeta): 'PRIMARY KEY' | 'UNIQUE' | 'INDEX' {
  if (index.isPrimary) return 'PRIMARY KEY';
  if (index.isUnique) return 'UNIQUE';
  return 'INDEX';
}

function formatColumnLine(column: ColumnMeta, stats: ColumnStats | undefined): string {
  let line = `  • ${column.name}: ${formatColumnType(column)} ${column.isNullable ? 'NULL' : 'NOT NULL'}`;

  if (column.defaultValue) {
    line += ` DEFAULT ${column.defaultValue}`;
  }
  if (stats && 'nullPercentage' in stats) {
    line += ` [Nulls: ${stats.nullPercentage}%, Distinct: ${stats.distinctCount}]`;
  }
  if (column.comment) {
    line += `\n    Comment: ${column.comment}`;
  }
  return line;
}

function formatSampleRows(rows: SampleRow[]): string[] {
  return rows.map((row, index) => `  Row ${index + 1}: ${stableStringify(row)}`);
}

function formatRelationshipDiagram(snapshot: Snapshot): string[] {
  const lines = [RULE, 'DATABASE RELATIONSHIP DIAGRAM', RULE, ''];
  const sources = Object.keys(snapshot.relationships).sort(byName);

  if (sources.length === 0) {
    lines.push('No foreign key relationships found in the database.');
    return lines;
  }

  for (const source of sources) {
    lines.push(`[${source}]`);
    for (const edge of snapshot.relationships[source] ?? []) {
      lines.push(`  └─→ ${edge.fromColumn} references ${edge.toTable}.${edge.toColumn}`);
    }
    lines.push('');
  }
  lines.push(RULE);
  return lines;
}

function formatTable(name: string, table: TableMeta): string[] {
  const lines = ['', RULE, `TABLE: ${name}`, RULE];
  lines.push(`Type: ${table.tableType}`);
  lines.push(`Row Count: ~${rowCountFormat.format(table.rowCount)}`);
  lines.push(`Size: ${table.tableSize}`);
  if (table.comment) {
    lines.push(`Description: ${table.comment}`);
  }

  if (table.primaryKeys.length > 0) {
    lines.push('', `Primary Key(s): ${table.primaryKeys.join(', ')}`);
  }

  lines.push('', `COLUMNS (${table.columns.length}):`);
  for (const column of table.columns) {
    lines.push(formatColumnLine(column, table.columnStatistics?.[column.name]));
  }

  if (table.foreignKeys.length > 0) {
    lines.push('', 'FOREIGN KEYS:');
    for (const fk of table.foreignKeys) {
      lines.push(`  • ${fk.column} → ${fk.foreignTable}.${fk.foreignColumn}`);
      lines.push(`    ON UPDATE: ${fk.onUpdate}, ON DELETE: ${fk.onDelete}`);
    }
  }

  if (table.indexes.length > 0) {
    lines.push('', 'INDEXES:');
    for (const index of table.indexes) {
      lines.push(`  • ${index.indexName} (${indexRole(index)}, ${index.indexType}) on [${index.columns.join(', ')}]`);
    }
  }

  if (table.sampleData && table.sampleData.length > 0) {
    lines.push('', `SAMPLE DATA (first ${table.sampleData.length} rows):`);
    lines.push(...formatSampleRows(table.sampleData));
  }

  return lines;
}

function formatView(name: string, view: ViewMeta): string[] {
  const lines = ['', THIN_RULE, `VIEW: ${name}`, THIN_RULE];
  lines.push(`Type: ${view.viewType}`);
  if (view.comment) {
    lines.push(`Description: ${view.comment}`);
  }

  lines.push('', 'Definition:', view.definition.trim());

  lines.push('', `COLUMNS (${view.columns.length}):`);
  for (const column of view.columns) {
    lines.push(`  • ${column.name}: ${column.dataType}`);
  }

  if (view.sampleData && view.sampleData.length > 0) {
    lines.push('', 'SAMPLE DATA:');
    lines.push(...formatSampleRows(view.sampleData));
  }

  return lines;
}

/**
 * Render a snapshot as the plain-text schema description handed to the language model.
 * Tables, views and relationship sources are emitted in name order.
 */
export function formatForAi(snapshot: Snapshot): string {
  const lines = [
    `DATABASE: ${snapshot.databaseName}`,
    `Extracted: ${snapshot.extractedAt}`,
    `Total Tables: ${snapshot.totalTables}`,
    `Total Views: ${snapshot.totalViews}`
  ];
  if (snapshot.connectionError) {
    lines.push(`Connection Error: ${snapshot.connectionError}`);
  }
  lines.push('');

  lines.push(...formatRelationshipDiagram(snapshot));
  lines.push('', RULE, 'DETAILED SCHEMA INFORMATION', RULE);

  for (const name of Object.keys(snapshot.tables).sort(byName)) {
    const table = snapshot.tables[name];
    if (table) lines.push(...formatTable(name, table));
  }

  const viewNames = Object.keys(snapshot.views).sort(byName);
  if (viewNames.length > 0) {
    lines.push('', '', RULE, 'VIEWS AND MATERIALIZED VIEWS', RULE);
    for (const name of viewNames) {
      const view = snapshot.views[name];
      if (view) lines.push(...formatView(name, view));
    }
  }

  return lines.join('\n');
}

import { QueryError } from '../errors/errors.js';
import type { TableSchema } from '../ir/types.js';
import type { QueryExecutor } from '../query/execution-mode.js';
import { LogicalType } from '../types/logical-type.js';

// Declared type name to logical type. Checked in order; first match wins.
const DECLARED_TYPES: ReadonlyArray<readonly [RegExp, LogicalType]> = [
  [/^BIGINT/, LogicalType.BIGINT],
  [/^BOOL/, LogicalType.BOOLEAN],
  [/INT/, LogicalType.INTEGER],
  [/^(DATETIME|TIMESTAMP)/, LogicalType.TIMESTAMP],
  [/^DATE/, LogicalType.DATE],
  [/^TIME/, LogicalType.TIME],
  [/^UUID/, LogicalType.UUID],
  [/^JSON/, LogicalType.JSON],
  [/CHAR|CLOB|TEXT/, LogicalType.TEXT],
  [/BLOB|^$/, LogicalType.BLOB],
  [/REAL|FLOA|DOUB/, LogicalType.REAL],
  [/NUMERIC|DECIMAL/, LogicalType.DECIMAL],
];

/** SQLite affinity rules, extended with the names other dialects write. */
export function logicalTypeFor(declared: string): LogicalType {
  const name = declared.trim().toUpperCase();
  for (const [pattern, type] of DECLARED_TYPES) {
    if (pattern.test(name)) return type;
  }
  return LogicalType.DECIMAL;
}

export function listTables(executor: QueryExecutor<'sync'>): string[] {
  const result = executor.execute(
    `SELECT name FROM sqlite_master WHERE type = 'table' AND name NOT LIKE 'sqlite_%' ORDER BY name`,
    [],
    { statementType: 'select' },
  );
  return result.rows.map((row) => String(row.name));
}

/** Table shape read back through `pragma_table_info`. */
export function describeTable(executor: QueryExecutor<'sync'>, table: string): TableSchema {
  const result = executor.execute('SELECT name, type, pk FROM pragma_table_info(?) ORDER BY cid', [table], {
    statementType: 'select',
  });
  if (result.rows.length === 0) {
    throw new QueryError(`no such table: ${table}`, { dialect: executor.dialect.name });
  }
  const columns: Record<string, LogicalType> = {};
  const keyed: { name: string; position: number }[] = [];
  for (const row of result.rows) {
    const name = String(row.name);
    columns[name] = logicalTypeFor(typeof row.type === 'string' ? row.type : '');
    const position = Number(row.pk);
    if (position > 0) keyed.push({ name, position });
  }
  const primaryKey = keyed.sort((a, b) => a.position - b.position).map((k) => k.name);
  return primaryKey.length ? { name: table, columns, primaryKey } : { name: table, columns };
}

import { ConstructionError } from '../errors/errors.js';
import { excluded, isExpression, lit } from '../ir/builders.js';
import type {
  Assignment,
  ColumnDefinition,
  ConflictClause,
  CreateTableStatement,
  DeleteStatement,
  DropTableStatement,
  Expression,
  InsertStatement,
  TableSchema,
  UpdateStatement,
} from '../ir/types.js';
import type { AppValue, ColumnTypes } from '../types/logical-type.js';

/** Column values for one row; `undefined` leaves the column out. */
export type Values = Readonly<Record<string, AppValue | Expression | undefined>>;

export interface ReturningOptions {
  returning?: readonly string[];
}

export interface OnConflict {
  /** Columns of the unique key the rows may collide on. */
  target: readonly string[];
  /**
   * Column names take the incoming row's value; a record sets explicit values.
   * Absent means DO NOTHING.
   */
  update?: readonly string[] | Values;
}

export interface InsertOptions extends ReturningOptions {
  onConflict?: OnConflict;
}

function typesOf(target: string | TableSchema): { table: string; types: ColumnTypes } {
  return typeof target === 'string' ? { table: target, types: {} } : { table: target.name, types: target.columns };
}

function valueNode(value: AppValue | Expression, column: string, types: ColumnTypes): Expression {
  return isExpression(value) ? value : lit(value, types[column]);
}

function assignmentsOf(values: Values, types: ColumnTypes): Assignment[] {
  return Object.entries(values)
    .filter((entry): entry is [string, AppValue | Expression] => entry[1] !== undefined)
    .map(([column, value]) => ({ column, value: valueNode(value, column, types) }));
}

function isColumnList(update: readonly string[] | Values): update is readonly string[] {
  return Array.isArray(update);
}

function conflictClause(conflict: OnConflict, types: ColumnTypes): ConflictClause {
  const target = [...conflict.target];
  if (conflict.update === undefined) return { target, action: { kind: 'nothing' } };
  const assignments = isColumnList(conflict.update)
    ? conflict.update.map((column) => ({ column, value: excluded(column) }))
    : assignmentsOf(conflict.update, types);
  if (assignments.length === 0) {
    throw new ConstructionError('ON CONFLICT update needs at least one column', { clause: 'ON CONFLICT' });
  }
  return { target, action: { kind: 'update', assignments } };
}

/**
 * Multi-row INSERT. The column list is the union of the rows' keys in first
 * appearance order; a row missing a column inserts NULL for it.
 */
export function insertStatement(
  target: string | TableSchema,
  rows: Values | readonly Values[],
  options: InsertOptions = {},
): InsertStatement {
  const { table, types } = typesOf(target);
  const list: readonly Values[] = isValuesList(rows) ? rows : [rows];
  if (list.length === 0) throw new ConstructionError('INSERT needs at least one row', { clause: 'VALUES' });

  const columns: string[] = [];
  for (const row of list) {
    for (const [column, value] of Object.entries(row)) {
      if (value !== undefined && !columns.includes(column)) columns.push(column);
    }
  }
  if (columns.length === 0 && list.length > 1) {
    throw new ConstructionError('multi-row INSERT needs at least one column', { clause: 'VALUES' });
  }

  return {
    kind: 'insert',
    table,
    columns,
    rows: list.map((row) => columns.map((column) => valueNode(row[column] ?? null, column, types))),
    ...(options.onConflict ? { onConflict: conflictClause(options.onConflict, types) } : {}),
    returning: [...(options.returning ?? [])],
  };
}

export function updateStatement(
  target: string | TableSchema,
  values: Values,
  where?: Expression,
  options: ReturningOptions = {},
): UpdateStatement {
  const { table, types } = typesOf(target);
  const assignments = assignmentsOf(values, types);
  if (assignments.length === 0) throw new ConstructionError('UPDATE needs at least one assignment', { clause: 'SET' });
  return {
    kind: 'update',
    table,
    assignments,
    ...(where ? { where } : {}),
    returning: [...(options.returning ?? [])],
  };
}

export function deleteStatement(
  target: string | TableSchema,
  where?: Expression,
  options: ReturningOptions = {},
): DeleteStatement {
  const { table } = typesOf(target);
  return { kind: 'delete', table, ...(where ? { where } : {}), returning: [...(options.returning ?? [])] };
}

export interface CreateTableOptions {
  ifNotExists?: boolean;
  /** Column constraints beyond the type, keyed by column name. */
  columns?: Readonly<Record<string, Omit<ColumnDefinition, 'name' | 'type'>>>;
}

/** CREATE TABLE from a schema; primary key columns come from `schema.primaryKey`. */
export function createTableStatement(schema: TableSchema, options: CreateTableOptions = {}): CreateTableStatement {
  const primaryKey = [...(schema.primaryKey ?? [])];
  for (const column of primaryKey) {
    if (!(column in schema.columns)) {
      throw new ConstructionError(`primary key column "${column}" is not declared`, { clause: 'CREATE TABLE' });
    }
  }
  return {
    kind: 'createTable',
    table: schema.name,
    columns: Object.entries(schema.columns).map(([name, type]) => ({ name, type, ...options.columns?.[name] })),
    primaryKey,
    ifNotExists: options.ifNotExists ?? false,
  };
}

export function dropTableStatement(table: string, ifExists = false): DropTableStatement {
  return { kind: 'dropTable', table, ifExists };
}

function isValuesList(rows: Values | readonly Values[]): rows is readonly Values[] {
  return Array.isArray(rows);
}

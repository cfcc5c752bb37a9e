import { describe, it, expect } from 'vitest';
import { compileExpression } from '../src/generator/sql.js';
import {
  add,
  allOf,
  and,
  anyOf,
  as,
  between,
  caseWhen,
  cast,
  col,
  count,
  eq,
  excluded,
  exists,
  fn,
  gt,
  inList,
  isExpression,
  isNull,
  lit,
  notExists,
  mul,
  not,
  or,
  over,
  rowNumber,
  star,
  sum,
} from '../src/ir/builders.js';
import { SqliteDialect } from '../src/dialect/sqlite-dialect.js';
import { PostgresDialect } from '../src/dialect/postgres-dialect.js';
import { MysqlDialect } from '../src/dialect/mysql-dialect.js';
import { SelectQuery } from '../src/query/select-query.js';
import { CapabilityError, ConstructionError } from '../src/errors/errors.js';
import { LogicalType } from '../src/types/logical-type.js';

const sqlite = new SqliteDialect();

describe('expression rendering', () => {
  it('binds literal operands as parameters', () => {
    expect(compileExpression(eq('name', 'Ann'), sqlite)).toEqual({ sql: '"name" = ?', params: ['Ann'] });
  });

  it('qualifies dotted column names and escapes quotes', () => {
    expect(compileExpression(col('users.name'), sqlite).sql).toBe('"users"."name"');
    expect(compileExpression(col('we"ird'), sqlite).sql).toBe('"we""ird"');
  });

  it('parenthesizes nested logical groups with a different operator', () => {
    const compiled = compileExpression(and(eq('a', 1), or(eq('b', 2), eq('c', 3))), sqlite);
    expect(compiled.sql).toBe('"a" = ? AND ("b" = ? OR "c" = ?)');
    expect(compiled.params).toEqual([1, 2, 3]);
  });

  it('flattens nested conjunctions', () => {
    const compiled = compileExpression(and(and(eq('a', 1), eq('b', 2)), eq('c', 3)), sqlite);
    expect(compiled.sql).toBe('"a" = ? AND "b" = ? AND "c" = ?');
  });

  it('renders NOT, IS NULL, IN and BETWEEN', () => {
    expect(compileExpression(not(isNull('deleted_at')), sqlite).sql).toBe('NOT ("deleted_at" IS NULL)');
    expect(compileExpression(inList('id', [1, 2, 3]), sqlite)).toEqual({ sql: '"id" IN (?, ?, ?)', params: [1, 2, 3] });
    expect(compileExpression(between('age', 18, 65), sqlite)).toEqual({
      sql: '"age" BETWEEN ? AND ?',
      params: [18, 65],
    });
  });

  it('rejects an empty IN list', () => {
    expect(() => compileExpression(inList('id', []), sqlite)).toThrow(ConstructionError);
  });

  it('rejects AND without conditions', () => {
    expect(() => and()).toThrow(ConstructionError);
  });

  it('parenthesizes nested arithmetic', () => {
    expect(compileExpression(add('price', mul('qty', 2)), sqlite)).toEqual({
      sql: '"price" + ("qty" * ?)',
      params: [2],
    });
  });

  it('renders aggregates', () => {
    expect(compileExpression(count(), sqlite).sql).toBe('COUNT(*)');
    expect(compileExpression(count('id', { distinct: true }), sqlite).sql).toBe('COUNT(DISTINCT "id")');
  });

  it('gates aggregate FILTER on the dialect version', () => {
    const filtered = count(undefined, { filter: eq('status', 'paid') });
    expect(compileExpression(filtered, sqlite)).toEqual({
      sql: 'COUNT(*) FILTER (WHERE "status" = ?)',
      params: ['paid'],
    });
    expect(() => compileExpression(filtered, new SqliteDialect({ version: [3, 28, 0] }))).toThrow(CapabilityError);
  });

  it('renders window functions and frames', () => {
    expect(compileExpression(rowNumber({ partitionBy: ['dept'], orderBy: ['-salary'] }), sqlite).sql).toBe(
      'ROW_NUMBER() OVER (PARTITION BY "dept" ORDER BY "salary" DESC)',
    );
    const running = over(sum('amount'), {
      orderBy: ['day'],
      frame: { unit: 'ROWS', start: { kind: 'preceding', offset: 2 }, end: { kind: 'currentRow' } },
    });
    expect(compileExpression(running, sqlite).sql).toBe(
      'SUM("amount") OVER (ORDER BY "day" ROWS BETWEEN 2 PRECEDING AND CURRENT ROW)',
    );
  });

  it('raises a capability error for window functions before SQLite 3.25', () => {
    const old = new SqliteDialect({ version: [3, 24, 0] });
    expect(() => compileExpression(rowNumber(), old)).toThrow(CapabilityError);
    expect(() => compileExpression(rowNumber(), old)).toThrow(
      'capability error (sqlite) in OVER: window functions: not supported by sqlite 3.24.0',
    );
  });

  it('renders CASE with bound branch values', () => {
    expect(compileExpression(caseWhen([[gt('score', 90), 'A']], 'B'), sqlite)).toEqual({
      sql: 'CASE WHEN "score" > ? THEN ? ELSE ? END',
      params: [90, 'A', 'B'],
    });
  });

  it('validates function names', () => {
    expect(compileExpression(fn('lower', col('email')), sqlite).sql).toBe('LOWER("email")');
    expect(() => fn('drop table')).toThrow(ConstructionError);
  });

  it('converts literals through the dialect type mapping', () => {
    expect(compileExpression(eq('active', true), sqlite).params).toEqual([1]);
    expect(compileExpression(eq('active', true), new PostgresDialect()).params).toEqual([true]);
    expect(compileExpression(eq('created_at', new Date('2024-01-02T03:04:05.000Z')), sqlite).params).toEqual([
      '2024-01-02T03:04:05.000Z',
    ]);
  });

  it('numbers placeholders for PostgreSQL', () => {
    expect(compileExpression(and(eq('a', 1), eq('b', 2)), new PostgresDialect()).sql).toBe('"a" = $1 AND "b" = $2');
  });

  it('quotes with backticks and honours the format style for MySQL', () => {
    expect(compileExpression(eq('a', 1), new MysqlDialect()).sql).toBe('`a` = ?');
    expect(compileExpression(eq('a', 1), new MysqlDialect({ paramStyle: 'format' })).sql).toBe('`a` = %s');
  });

  it('projects aliased predicates through CASE', () => {
    const compiled = new SelectQuery('t').select(as(eq('a', 1), 'flag')).toSql(sqlite);
    expect(compiled.sql).toBe('SELECT CASE WHEN "a" = ? THEN ? ELSE ? END AS "flag" FROM "t"');
    expect(compiled.params).toEqual([1, 1, 0]);
  });

  it('refuses to alias *', () => {
    expect(() => as(star(), 'x')).toThrow(ConstructionError);
  });
});

describe('subquery predicates and casts', () => {
  const spenders = new SelectQuery('orders').select(lit(1)).where(eq('orders.user_id', col('users.id')));

  it('renders EXISTS and NOT EXISTS around a correlated subquery', () => {
    expect(compileExpression(exists(spenders), sqlite)).toEqual({
      sql: 'EXISTS (SELECT ? FROM "orders" WHERE "orders"."user_id" = "users"."id")',
      params: [1],
    });
    expect(compileExpression(notExists(spenders), sqlite).sql).toBe(
      'NOT EXISTS (SELECT ? FROM "orders" WHERE "orders"."user_id" = "users"."id")',
    );
  });

  it('renders ANY and ALL comparisons where supported', () => {
    const amounts = new SelectQuery('prices').select('amount');
    expect(compileExpression(anyOf('price', '>', amounts), new PostgresDialect()).sql).toBe(
      '"price" > ANY (SELECT "amount" FROM "prices")',
    );
    expect(compileExpression(allOf('price', '>=', amounts), new MysqlDialect()).sql).toBe(
      '`price` >= ALL (SELECT `amount` FROM `prices`)',
    );
    expect(() => compileExpression(anyOf('price', '>', amounts), sqlite)).toThrow(
      'capability error (sqlite) in ANY: ANY subqueries: not supported by sqlite 3.45.0',
    );
  });

  it('parenthesizes a quantified comparison inside another operator', () => {
    const amounts = new SelectQuery('prices').select('amount');
    expect(compileExpression(eq(anyOf('price', '=', amounts), false), new PostgresDialect())).toEqual({
      sql: '("price" = ANY (SELECT "amount" FROM "prices")) = $1',
      params: [false],
    });
  });

  it('casts to the native type of each dialect', () => {
    expect(compileExpression(cast('price', LogicalType.INTEGER), sqlite).sql).toBe('CAST("price" AS INTEGER)');
    expect(compileExpression(cast('price', LogicalType.DECIMAL), new PostgresDialect()).sql).toBe(
      'CAST("price" AS NUMERIC)',
    );
    expect(compileExpression(cast('price', LogicalType.TEXT), new MysqlDialect()).sql).toBe('CAST(`price` AS CHAR)');
    expect(compileExpression(cast('n', LogicalType.BIGINT), new MysqlDialect()).sql).toBe('CAST(`n` AS SIGNED)');
  });

  it('projects an aliased cast', () => {
    const compiled = new SelectQuery('t').select(as(cast('n', LogicalType.TEXT), 'label')).toSql(sqlite);
    expect(compiled.sql).toBe('SELECT CAST("n" AS TEXT) AS "label" FROM "t"');
  });

  it('keeps upsert values out of projections', () => {
    expect(() => as(excluded('name'), 'name')).toThrow(ConstructionError);
  });
});

describe('node identity', () => {
  it('treats only built nodes as expressions', () => {
    expect(isExpression(col('a'))).toBe(true);
    expect(isExpression({ kind: 'column', name: 'a' })).toBe(false);
    expect(isExpression(JSON.parse('{"kind":"subquery","query":"x"}'))).toBe(false);
  });

  it('binds a node-shaped object as a literal value', () => {
    const doc = { kind: 'column', name: 'id' };
    expect(compileExpression(eq('doc', doc), sqlite)).toEqual({ sql: '"doc" = ?', params: ['{"kind":"column","name":"id"}'] });
  });
});

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { SqliteBackend } from '../src/sqlite/db.js';
import { cteRef, eq, gte, inList } from '../src/ir/builders.js';
import { SelectQuery } from '../src/query/select-query.js';
import { PostgresDialect } from '../src/dialect/postgres-dialect.js';
import { SqliteDialect } from '../src/dialect/sqlite-dialect.js';
import { CapabilityError, ConstructionError, RecursionLimitError } from '../src/errors/errors.js';

const schema = `
CREATE TABLE employees (
  id INTEGER PRIMARY KEY,
  name TEXT,
  manager_id INTEGER
);
`;

// 1 manages 2 and 3, 2 manages 4, 4 manages 5; 6 and 7 manage each other.
const employees = [
  { id: 1, name: 'Ada', manager_id: null },
  { id: 2, name: 'Bo', manager_id: 1 },
  { id: 3, name: 'Cal', manager_id: 1 },
  { id: 4, name: 'Dot', manager_id: 2 },
  { id: 5, name: 'Eve', manager_id: 4 },
  { id: 6, name: 'Fay', manager_id: 7 },
  { id: 7, name: 'Gus', manager_id: 6 },
];

function reports(managerId: number) {
  return {
    anchor: new SelectQuery('employees').select('id', 'manager_id').where(eq('manager_id', managerId)),
    recursive: new SelectQuery('employees')
      .select('employees.id', 'employees.manager_id')
      .innerJoin('subordinates', ['employees.manager_id', 'subordinates.id']),
  };
}

describe('CTEQuery', () => {
  let db: SqliteBackend;

  beforeEach(async () => {
    db = await SqliteBackend.open({ maxRecursionDepth: 100 });
    db.executeScript(schema);
    db.insert('employees', employees);
  });

  afterEach(() => {
    db.disconnect();
  });

  it('reads a plain CTE by name', () => {
    const query = db
      .cte()
      .with('seniors', new SelectQuery('employees').select('id', 'name').where(gte('id', 5)))
      .from('seniors')
      .select('name')
      .orderBy('name');
    expect(query.toSql()).toEqual({
      sql: 'WITH "seniors" AS (SELECT "id", "name" FROM "employees" WHERE "id" >= ?) SELECT "name" FROM "seniors" ORDER BY "name"',
      params: [5],
    });
    expect(query.all()).toEqual([{ name: 'Eve' }, { name: 'Fay' }, { name: 'Gus' }]);
  });

  it('passes a materialization hint through to SQLite', () => {
    const query = db
      .cte()
      .with('pairs', new SelectQuery('employees').select('id').where(gte('id', 6)), { materialized: true })
      .from('pairs')
      .orderBy('id');
    expect(query.toSql().sql).toBe(
      'WITH "pairs" AS MATERIALIZED (SELECT "id" FROM "employees" WHERE "id" >= ?) SELECT * FROM "pairs" ORDER BY "id"',
    );
    expect(query.all()).toEqual([{ id: 6 }, { id: 7 }]);
  });

  it('lets a later CTE read an earlier one', () => {
    const rows = db
      .cte()
      .with('managed', new SelectQuery('employees').select('id', 'manager_id').where(gte('manager_id', 1)))
      .with('under_ada', new SelectQuery('managed').select('id').where(eq('manager_id', 1)))
      .from('under_ada')
      .orderBy('id')
      .all();
    expect(rows).toEqual([{ id: 2 }, { id: 3 }]);
  });

  it('walks a hierarchy with a bounded recursive CTE', () => {
    const query = db.cte().withRecursive('subordinates', reports(1)).from('subordinates').select('id').orderBy('id');
    expect(query.toSql()).toEqual({
      sql:
        'WITH RECURSIVE "subordinates" AS (' +
        'SELECT "id", "manager_id", ? AS "__depth" FROM "employees" WHERE "manager_id" = ? ' +
        'UNION ALL ' +
        'SELECT "employees"."id", "employees"."manager_id", "subordinates"."__depth" + ? AS "__depth" ' +
        'FROM "employees" INNER JOIN "subordinates" ON "employees"."manager_id" = "subordinates"."id" ' +
        'WHERE "subordinates"."__depth" <= ?' +
        ') SELECT "id" FROM "subordinates" ORDER BY "id"',
      params: [1, 1, 1, 100],
    });
    expect(query.all()).toEqual([{ id: 2 }, { id: 3 }, { id: 4 }, { id: 5 }]);
  });

  it('counts the rows of a recursive CTE', () => {
    expect(db.cte().withRecursive('subordinates', reports(1)).from('subordinates').count()).toBe(4);
  });

  it('hides the depth column from returned rows', () => {
    const rows = db.cte().withRecursive('subordinates', reports(2)).from('subordinates').orderBy('id').all();
    expect(rows).toEqual([
      { id: 4, manager_id: 2 },
      { id: 5, manager_id: 4 },
    ]);
  });

  it('truncates a cycle at the depth bound', () => {
    const rows = db
      .cte()
      .withRecursive('subordinates', { ...reports(6), maxDepth: 5, onDepthExceeded: 'truncate' })
      .from('subordinates')
      .select('id')
      .orderBy('__depth')
      .all();
    expect(rows).toEqual([{ id: 7 }, { id: 6 }, { id: 7 }, { id: 6 }, { id: 7 }]);
  });

  it('raises RecursionLimitError for a cycle in error mode', () => {
    const query = db.cte().withRecursive('subordinates', { ...reports(6), maxDepth: 10 }).from('subordinates');
    expect(() => query.all()).toThrow(RecursionLimitError);
  });

  it('checks the bound of a recursive CTE used as a set operand', () => {
    const cyclic = db.cte().withRecursive('subordinates', { ...reports(6), maxDepth: 5 }).from('subordinates');
    const combined = cyclic.unionAll(new SelectQuery('employees').select('id', 'manager_id', 'id'));
    expect(() => combined.all()).toThrow(RecursionLimitError);
  });

  it('strips the depth column from set-operation rows', () => {
    const rows = db
      .cte()
      .withRecursive('subordinates', { ...reports(6), maxDepth: 3, onDepthExceeded: 'truncate' })
      .from('subordinates')
      .unionAll(new SelectQuery('employees').select('id', 'manager_id', 'id').where(eq('id', 1)))
      .orderBy('id')
      .all();
    expect(rows).toEqual([
      { id: 1, manager_id: null },
      { id: 6, manager_id: 7 },
      { id: 7, manager_id: 6 },
      { id: 7, manager_id: 6 },
    ]);
  });

  it('checks the bound of a recursive CTE used as a subquery', () => {
    const cyclic = db.cte().withRecursive('subordinates', { ...reports(6), maxDepth: 5 }).from('subordinates').select('id');
    const query = db.query('employees').where(inList('id', cyclic));
    expect(() => query.all()).toThrow(RecursionLimitError);
  });

  it('defaults the bound to the backend setting', async () => {
    const shallow = await SqliteBackend.open({ maxRecursionDepth: 2 });
    try {
      shallow.executeScript(schema);
      shallow.insert('employees', employees);
      let caught: unknown;
      try {
        shallow.cte().withRecursive('subordinates', reports(1)).from('subordinates').all();
      } catch (error) {
        caught = error;
      }
      expect(caught).toBeInstanceOf(RecursionLimitError);
      expect(caught).toMatchObject({ cte: 'subordinates', maxDepth: 2, clause: 'WITH RECURSIVE', dialect: 'sqlite' });
    } finally {
      shallow.disconnect();
    }
  });

  it('accepts a hierarchy exactly as deep as the bound', () => {
    const rows = db
      .cte()
      .withRecursive('subordinates', { ...reports(1), maxDepth: 3 })
      .from('subordinates')
      .select('id')
      .orderBy('id')
      .all();
    expect(rows).toEqual([{ id: 2 }, { id: 3 }, { id: 4 }, { id: 5 }]);
  });

  it('numbers recursive CTE parameters for PostgreSQL', () => {
    const query = db.cte().withRecursive('subordinates', { ...reports(1), maxDepth: 7 }).from('subordinates').select('id');
    const { sql, params } = query.toSql(new PostgresDialect());
    expect(sql.endsWith('WHERE "subordinates"."__depth" <= $4) SELECT "id" FROM "subordinates"')).toBe(true);
    expect(params).toEqual([1, 1, 1, 7]);
  });

  it('rejects recursive CTEs on dialects without them', () => {
    const query = db.cte().withRecursive('subordinates', reports(1)).from('subordinates');
    expect(() => query.toSql(new SqliteDialect({ version: [3, 8, 0] }))).toThrow(CapabilityError);
  });

  it('rejects a duplicate name', () => {
    const query = db.cte().with('a', new SelectQuery('employees'));
    expect(() => query.with('a', new SelectQuery('employees'))).toThrow('CTE "a" is already defined');
  });

  it('rejects a recursive member that does not read the CTE', () => {
    const query = db.cte();
    expect(() =>
      query.withRecursive('subordinates', {
        anchor: new SelectQuery('employees').select('id'),
        recursive: new SelectQuery('employees').select('id'),
      }),
    ).toThrow(ConstructionError);
  });

  it('rejects an anchor that reads the CTE', () => {
    expect(() =>
      db.cte().withRecursive('subordinates', {
        anchor: new SelectQuery('subordinates').select('id'),
        recursive: reports(1).recursive,
      }),
    ).toThrow(ConstructionError);
  });

  it('requires the recursive member to list its columns', () => {
    expect(() =>
      db.cte().withRecursive('subordinates', {
        anchor: reports(1).anchor,
        recursive: new SelectQuery('employees').innerJoin('subordinates', ['employees.manager_id', 'subordinates.id']),
      }),
    ).toThrow(ConstructionError);
  });

  it('rejects a non-positive depth bound', () => {
    expect(() => db.cte().withRecursive('subordinates', { ...reports(1), maxDepth: 0 })).toThrow(ConstructionError);
  });

  it('rejects a reference to an undefined CTE', () => {
    const query = db.cte().with('a', new SelectQuery('employees')).from(cteRef('missing'));
    expect(() => query.toStatement()).toThrow('CTE "missing" is referenced before it is defined');
  });
});

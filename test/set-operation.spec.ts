import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { SqliteBackend } from '../src/sqlite/db.js';
import { eq, gt, lt } from '../src/ir/builders.js';
import { SelectQuery } from '../src/query/select-query.js';
import { SetOperationQuery } from '../src/query/set-operation-query.js';
import { MysqlDialect } from '../src/dialect/mysql-dialect.js';
import { CapabilityError, ConstructionError } from '../src/errors/errors.js';
import { LogicalType } from '../src/types/logical-type.js';

describe('SetOperationQuery', () => {
  let db: SqliteBackend;

  beforeEach(async () => {
    db = await SqliteBackend.open();
    db.executeScript(`
      CREATE TABLE users (id INTEGER PRIMARY KEY, name TEXT, age INTEGER, verified INTEGER);
      CREATE TABLE admins (id INTEGER PRIMARY KEY, name TEXT);
    `);
    db.insert('users', [
      { id: 1, name: 'Ann', age: 34, verified: 1 },
      { id: 2, name: 'Ben', age: 17, verified: 0 },
      { id: 3, name: 'Cy', age: 42, verified: 1 },
      { id: 4, name: 'Dee', age: 25, verified: 0 },
    ]);
    db.insert('admins', [
      { id: 1, name: 'Ann' },
      { id: 2, name: 'Zoe' },
    ]);
  });

  afterEach(() => {
    db.disconnect();
  });

  it('combines two selects with UNION', () => {
    const query = db
      .query('users')
      .select('name')
      .where(lt('age', 20))
      .union(new SelectQuery('users').select('name').where(gt('age', 40)))
      .orderBy('name');
    expect(query.toSql()).toEqual({
      sql: 'SELECT "name" FROM "users" WHERE "age" < ? UNION SELECT "name" FROM "users" WHERE "age" > ? ORDER BY "name"',
      params: [20, 40],
    });
    expect(query.all()).toEqual([{ name: 'Ben' }, { name: 'Cy' }]);
  });

  it('keeps duplicates with UNION ALL', () => {
    const count = db
      .query('users')
      .select('name')
      .unionAll(new SelectQuery('admins').select('name'))
      .count();
    expect(count).toBe(6);
  });

  it('intersects and subtracts', () => {
    const both = db.query('users').select('name').intersect(new SelectQuery('admins').select('name')).all();
    expect(both).toEqual([{ name: 'Ann' }]);
    const usersOnly = db
      .query('users')
      .select('name')
      .except(new SelectQuery('admins').select('name'))
      .orderBy('name')
      .all();
    expect(usersOnly).toEqual([{ name: 'Ben' }, { name: 'Cy' }, { name: 'Dee' }]);
  });

  it('chains more than two operands and pages the result', () => {
    const rows = db
      .query('users')
      .select('id')
      .where(eq('id', 1))
      .union(new SelectQuery('users').select('id').where(eq('id', 2)))
      .union(new SelectQuery('users').select('id').where(eq('id', 3)))
      .orderBy('-id')
      .limit(2)
      .all();
    expect(rows).toEqual([{ id: 3 }, { id: 2 }]);
  });

  it('converts result columns through declared types', () => {
    const rows = db
      .query('users')
      .select('verified')
      .where(eq('id', 1))
      .union(new SelectQuery('users').select('verified').where(eq('id', 2)))
      .orderBy('verified')
      .withTypes({ verified: LogicalType.BOOLEAN })
      .all();
    expect(rows).toEqual([{ verified: false }, { verified: true }]);
  });

  it('rejects operands with a different number of columns', () => {
    const query = db.query('users').select('id', 'name');
    expect(() => query.union(new SelectQuery('admins').select('id'))).toThrow(ConstructionError);
    expect(() => query.union(new SelectQuery('admins').select('id'))).toThrow(
      'construction error in UNION: operand 2 projects 1 columns but the first projects 2',
    );
  });

  it('needs at least two operands', () => {
    const single = new SetOperationQuery(db, new SelectQuery('users').select('id'));
    expect(() => single.toStatement()).toThrow(ConstructionError);
  });

  it('checks INTERSECT support for the target dialect', () => {
    const query = db.query('users').select('id').intersect(new SelectQuery('admins').select('id'));
    expect(() => query.toSql(new MysqlDialect({ version: [8, 0, 30] }))).toThrow(CapabilityError);
    expect(query.toSql(new MysqlDialect()).sql).toBe('(SELECT `id` FROM `users`) INTERSECT (SELECT `id` FROM `admins`)');
  });

  it('executes once', () => {
    const query = db.query('users').select('id').union(new SelectQuery('admins').select('id'));
    expect(query.exists()).toBe(true);
    expect(() => query.all()).toThrow(ConstructionError);
    expect(() => query.orderBy('id')).toThrow(ConstructionError);
  });
});

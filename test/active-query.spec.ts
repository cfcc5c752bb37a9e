import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { SqliteBackend } from '../src/sqlite/db.js';
import { add, as, cast, col, count, eq, exists, gt, gte, inList, lit, lt, notExists } from '../src/ir/builders.js';
import type { TableSchema } from '../src/ir/types.js';
import { SelectQuery } from '../src/query/select-query.js';
import { LogicalType } from '../src/types/logical-type.js';
import { CapabilityError, ConstructionError, RecordNotFoundError } from '../src/errors/errors.js';

const users: TableSchema = {
  name: 'users',
  columns: {
    id: LogicalType.INTEGER,
    name: LogicalType.TEXT,
    age: LogicalType.INTEGER,
    status: LogicalType.TEXT,
    active: LogicalType.BOOLEAN,
    joined: LogicalType.DATE,
  },
  primaryKey: ['id'],
};

const orders: TableSchema = {
  name: 'orders',
  columns: { id: LogicalType.INTEGER, user_id: LogicalType.INTEGER, total: LogicalType.REAL },
  primaryKey: ['id'],
};

describe('ActiveQuery', () => {
  let db: SqliteBackend;

  beforeEach(async () => {
    db = await SqliteBackend.open();
    db.createTable(users);
    db.createTable(orders);
    db.insert(users, [
      { id: 1, name: 'Ann', age: 34, status: 'active', active: true, joined: '2023-01-15' },
      { id: 2, name: 'Ben', age: 17, status: 'active', active: false, joined: '2023-03-01' },
      { id: 3, name: 'Cy', age: 42, status: 'banned', active: true, joined: '2022-11-30' },
      { id: 4, name: 'Dee', age: 25, status: 'active', active: true, joined: '2024-02-10' },
    ]);
    db.insert(orders, [
      { id: 10, user_id: 1, total: 12.5 },
      { id: 11, user_id: 1, total: 7.5 },
      { id: 12, user_id: 3, total: 40 },
    ]);
  });

  afterEach(() => {
    db.disconnect();
  });

  it('renders chained filters in call order', () => {
    const query = db.query('users').where(gte('age', 18)).where(eq('status', 'active')).orderBy('name').limit(10);
    expect(query.toSql()).toEqual({
      sql: 'SELECT * FROM "users" WHERE "age" >= ? AND "status" = ? ORDER BY "name" LIMIT ?',
      params: [18, 'active', 10],
    });
  });

  it('converts rows through the table schema', () => {
    const rows = db.query(users).where(gte('age', 18)).filterBy({ status: 'active' }).orderBy('name').all();
    expect(rows).toEqual([
      { id: 1, name: 'Ann', age: 34, status: 'active', active: true, joined: new Date('2023-01-15T00:00:00.000Z') },
      { id: 4, name: 'Dee', age: 25, status: 'active', active: true, joined: new Date('2024-02-10T00:00:00.000Z') },
    ]);
  });

  it('returns driver values for undeclared columns', () => {
    expect(db.query('users').select('active').where(eq('id', 2)).all()).toEqual([{ active: 0 }]);
  });

  it('filters by null and by lists', () => {
    expect(db.query(users).filterBy({ status: null }).count()).toBe(0);
    const ids = db.query(users).select('id').filterBy({ id: [2, 4] }).orderBy('id').all();
    expect(ids).toEqual([{ id: 2 }, { id: 4 }]);
  });

  it('counts and checks existence', () => {
    expect(db.query('users').where(eq('status', 'active')).count()).toBe(3);
    expect(db.query('users').where(eq('name', 'Zed')).exists()).toBe(false);
    expect(db.query('users').where(eq('name', 'Cy')).exists()).toBe(true);
  });

  it('counts grouped queries through a derived table', () => {
    const query = db.query('users').select('status').groupBy('status');
    expect(query.count()).toBe(2);
  });

  it('returns the first row or null', () => {
    expect(db.query(users).select('name').orderBy('-age').one()).toEqual({ name: 'Cy' });
    expect(db.query(users).where(gt('age', 100)).one()).toBeNull();
    expect(() => db.query(users).where(gt('age', 100)).oneOrFail()).toThrow(RecordNotFoundError);
  });

  it('computes aggregates with the declared column type', () => {
    expect(db.query(users).sum('age')).toBe(118);
    expect(db.query(users).max('age')).toBe(42);
    expect(db.query(users).min('joined')).toEqual(new Date('2022-11-30T00:00:00.000Z'));
    const average = db.query(users).filterBy({ status: 'active' }).avg('age');
    expect(typeof average === 'number' ? average : Number.NaN).toBeCloseTo(76 / 3);
  });

  it('groups with HAVING', () => {
    const rows = db
      .query('users')
      .select('status', as(count(), 'n'))
      .groupBy('status')
      .having(gt(count(), 1))
      .all();
    expect(rows).toEqual([{ status: 'active', n: 3 }]);
  });

  it('joins and types computed columns', () => {
    const rows = db
      .query('users')
      .select('users.name', as(add('orders.total', 1), 'bumped'))
      .innerJoin('orders', ['orders.user_id', 'users.id'])
      .orderBy('orders.id')
      .withTypes({ bumped: LogicalType.TEXT })
      .all();
    expect(rows).toEqual([
      { name: 'Ann', bumped: '13.5' },
      { name: 'Ann', bumped: '8.5' },
      { name: 'Cy', bumped: '41' },
    ]);
  });

  it('keeps unmatched rows in a LEFT JOIN', () => {
    const rows = db
      .query('users')
      .select('users.name', as(col('orders.id'), 'order_id'))
      .leftJoin('orders', ['orders.user_id', 'users.id'])
      .where(lt('users.id', 3))
      .orderBy('users.id', 'orders.id')
      .all();
    expect(rows).toEqual([
      { name: 'Ann', order_id: 10 },
      { name: 'Ann', order_id: 11 },
      { name: 'Ben', order_id: null },
    ]);
  });

  it('filters through a subquery', () => {
    const buyers = new SelectQuery('orders').select('user_id');
    const rows = db.query('users').select('name').where(inList('id', buyers)).orderBy('name').all();
    expect(rows).toEqual([{ name: 'Ann' }, { name: 'Cy' }]);
  });

  it('filters with EXISTS over a correlated subquery', () => {
    const placed = new SelectQuery('orders').select(lit(1)).where(eq('orders.user_id', col('users.id')));
    expect(db.query('users').select('name').where(exists(placed)).orderBy('name').all()).toEqual([
      { name: 'Ann' },
      { name: 'Cy' },
    ]);
    expect(db.query('users').select('name').where(notExists(placed)).orderBy('name').all()).toEqual([
      { name: 'Ben' },
      { name: 'Dee' },
    ]);
  });

  it('reads an aliased cast back as its target type', () => {
    const rows = db.query(users).select('id', as(cast('age', LogicalType.TEXT), 'age_text')).where(eq('id', 1)).all();
    expect(rows).toEqual([{ id: 1, age_text: '34' }]);
  });

  it('upserts on the primary key', () => {
    db.insert(users, { id: 2, name: 'Benji', age: 18 }, { onConflict: { target: ['id'], update: ['name', 'age'] } });
    db.insert(users, { id: 3, name: 'Cyril' }, { onConflict: { target: ['id'] } });
    db.insert(users, { id: 5, name: 'Eli', age: 30 }, { onConflict: { target: ['id'], update: ['name'] } });
    const rows = db.query(users).select('id', 'name', 'age', 'status').where(gte('id', 2)).orderBy('id').all();
    expect(rows).toEqual([
      { id: 2, name: 'Benji', age: 18, status: 'active' },
      { id: 3, name: 'Cy', age: 42, status: 'banned' },
      { id: 4, name: 'Dee', age: 25, status: 'active' },
      { id: 5, name: 'Eli', age: 30, status: null },
    ]);
  });

  it('stores node-shaped JSON documents as data', () => {
    const documents: TableSchema = {
      name: 'documents',
      columns: { id: LogicalType.INTEGER, body: LogicalType.JSON },
      primaryKey: ['id'],
    };
    db.createTable(documents);
    const body = { kind: 'subquery', query: 'x' };
    db.insert(documents, [
      { id: 1, body },
      { id: 2, body: { kind: 'column', name: 'id' } },
    ]);
    expect(db.query(documents).where(eq('id', 1)).all()).toEqual([{ id: 1, body }]);
    expect(db.query(documents).select('id').where(eq('body', { kind: 'column', name: 'id' })).all()).toEqual([{ id: 2 }]);
    expect(db.execute('SELECT body FROM documents WHERE id = 2').rows).toEqual([{ body: '{"kind":"column","name":"id"}' }]);
  });

  it('pages with LIMIT and OFFSET', () => {
    const rows = db.query('users').select('id').orderBy('id').limit(2).offset(1).all();
    expect(rows).toEqual([{ id: 2 }, { id: 3 }]);
  });

  it('rejects OFFSET without LIMIT before executing', () => {
    expect(() => db.query('users').offset(1).all()).toThrow(ConstructionError);
  });

  it('rejects row locks on SQLite before executing', () => {
    const query = db.query('users').where(eq('id', 1)).lockForUpdate();
    expect(() => query.all()).toThrow(CapabilityError);
  });

  it('renders without consuming and executes once', () => {
    const query = db.query('users').select('id').where(eq('id', 1));
    expect(query.toSql()).toEqual(query.toSql());
    expect(query.consumed).toBe(false);
    expect(query.all()).toEqual([{ id: 1 }]);
    expect(query.consumed).toBe(true);
    expect(() => query.all()).toThrow(ConstructionError);
    expect(() => query.where(eq('id', 2))).toThrow(ConstructionError);
  });

  it('explains a query', () => {
    const plan = db.query('users').where(eq('id', 1)).explain();
    expect(plan.sql).toBe('SELECT * FROM "users" WHERE "id" = ?');
    expect(plan.nodes).toHaveLength(1);
    expect(plan.text.startsWith('- SEARCH users')).toBe(true);
  });
});

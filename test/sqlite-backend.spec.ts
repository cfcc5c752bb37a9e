import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'fs-extra';
import * as os from 'os';
import * as path from 'path';
import { SqliteBackend } from '../src/sqlite/db.js';
import { classifyStatement } from '../src/adapters/base-adapter.js';
import { IsolationLevel } from '../src/dialect/base-dialect.js';
import { eq, gt } from '../src/ir/builders.js';
import type { TableSchema } from '../src/ir/types.js';
import { LogicalType } from '../src/types/logical-type.js';
import {
  CapabilityError,
  ConfigurationError,
  ConnectionError,
  IntegrityError,
  IsolationLevelError,
  QueryError,
  StatementTimeoutError,
  TransactionError,
} from '../src/errors/errors.js';

const items: TableSchema = {
  name: 'items',
  columns: { id: LogicalType.INTEGER, label: LogicalType.TEXT, qty: LogicalType.INTEGER },
  primaryKey: ['id'],
};

function countItems(db: SqliteBackend): number {
  return db.query('items').count();
}

describe('classifyStatement', () => {
  it('classifies by the leading keyword', () => {
    expect(classifyStatement('  select 1')).toBe('select');
    expect(classifyStatement('WITH x AS (SELECT 1) SELECT * FROM x')).toBe('select');
    expect(classifyStatement('-- note\nINSERT INTO t VALUES (1)')).toBe('dml');
    expect(classifyStatement('/* ddl */ CREATE TABLE t (id INTEGER)')).toBe('ddl');
    expect(classifyStatement('SAVEPOINT a')).toBe('transaction');
    expect(classifyStatement('PRAGMA foreign_keys')).toBe('other');
  });
});

describe('SqliteBackend', () => {
  let db: SqliteBackend;

  beforeEach(async () => {
    db = await SqliteBackend.open();
    db.createTable(items, { columns: { label: { nullable: false, unique: true } } });
  });

  afterEach(() => {
    db.disconnect();
  });

  it('detects the server version on connect', () => {
    expect(db.dialect.version[0]).toBe(3);
    expect(db.getServerVersion()).toMatch(/^3\.\d+\.\d+$/);
    expect(db.connectionState).toBe('connected');
  });

  it('applies the configured pragmas', () => {
    expect(db.execute('PRAGMA foreign_keys').rows).toEqual([{ foreign_keys: 1 }]);
  });

  it('executes raw SQL with parameters', () => {
    const result = db.execute('SELECT ? + ? AS total', [2, 3]);
    expect(result.rows).toEqual([{ total: 5 }]);
    expect(result.columns).toEqual(['total']);
    expect(result.statementType).toBe('select');
    expect(result.affectedRows).toBe(0);
  });

  it('reports affected rows and the last insert id', () => {
    expect(db.insert(items, { label: 'bolt', qty: 5 }).lastInsertId).toBe(1);
    const second = db.insert(items, [{ label: 'nut', qty: 2 }, { label: 'gear' }]);
    expect(second.affectedRows).toBe(2);
    expect(second.lastInsertId).toBe(3);
    expect(db.update(items, { qty: 9 }, gt('qty', 1)).affectedRows).toBe(2);
    expect(db.delete(items, eq('label', 'gear')).affectedRows).toBe(1);
    expect(db.query(items).select('label', 'qty').orderBy('id').all()).toEqual([
      { label: 'bolt', qty: 9 },
      { label: 'nut', qty: 9 },
    ]);
  });

  it('returns rows from RETURNING', () => {
    const result = db.insert(items, { label: 'washer', qty: 1 }, { returning: ['id', 'label'] });
    expect(result.rows).toEqual([{ id: 1, label: 'washer' }]);
  });

  it('runs a batch atomically', () => {
    const batch = db.executeMany('INSERT INTO items (label, qty) VALUES (?, ?)', [
      ['a', 1],
      ['b', 2],
      ['c', 3],
    ]);
    expect(batch.results).toHaveLength(3);
    expect(batch.totalRows).toBe(3);

    expect(() =>
      db.executeMany('INSERT INTO items (label, qty) VALUES (?, ?)', [
        ['d', 4],
        ['a', 5],
      ]),
    ).toThrow(IntegrityError);
    expect(countItems(db)).toBe(3);
    expect(db.inTransaction).toBe(false);
  });

  it('translates constraint failures', () => {
    db.insert(items, { label: 'bolt' });
    let caught: unknown;
    try {
      db.insert(items, { label: 'bolt' });
    } catch (error) {
      caught = error;
    }
    expect(caught).toBeInstanceOf(IntegrityError);
    expect(caught).toMatchObject({ constraint: 'UNIQUE', columns: ['label'], dialect: 'sqlite' });
    expect(() => db.insert(items, { qty: 1 })).toThrow(IntegrityError);
  });

  it('enforces foreign keys', () => {
    db.executeScript('CREATE TABLE notes (id INTEGER PRIMARY KEY, item_id INTEGER REFERENCES items (id))');
    let caught: unknown;
    try {
      db.insert('notes', { item_id: 99 });
    } catch (error) {
      caught = error;
    }
    expect(caught).toMatchObject({ kind: 'integrity', constraint: 'FOREIGN KEY' });
  });

  it('wraps other driver failures in QueryError with the SQL', () => {
    let caught: unknown;
    try {
      db.execute('SELECT * FROM missing_table');
    } catch (error) {
      caught = error;
    }
    expect(caught).toBeInstanceOf(QueryError);
    expect(caught).toMatchObject({ sql: 'SELECT * FROM missing_table' });
  });

  it('rejects transaction control through execute', () => {
    expect(() => db.execute('BEGIN')).toThrow(TransactionError);
  });

  it('commits and rolls back', () => {
    db.beginTransaction();
    db.insert(items, { label: 'kept' });
    db.commit();
    db.beginTransaction();
    db.insert(items, { label: 'dropped' });
    db.rollback();
    expect(db.query('items').select('label').all()).toEqual([{ label: 'kept' }]);
  });

  it('nests transactions through savepoints', () => {
    db.beginTransaction();
    db.insert(items, { label: 'outer' });
    db.beginTransaction();
    expect(db.transactionDepth).toBe(2);
    db.insert(items, { label: 'inner' });
    db.rollback();
    expect(db.transactionDepth).toBe(1);
    db.commit();
    expect(db.query('items').select('label').all()).toEqual([{ label: 'outer' }]);
  });

  it('rolls back when the transaction callback throws', () => {
    expect(() =>
      db.transaction((tx) => {
        tx.insert(items, { label: 'lost' });
        throw new Error('abort');
      }),
    ).toThrow('abort');
    expect(countItems(db)).toBe(0);
    expect(db.inTransaction).toBe(false);
  });

  it('returns the callback result on commit', () => {
    const id = db.transaction((tx) => tx.insert(items, { label: 'saved' }).lastInsertId);
    expect(id).toBe(1);
    expect(countItems(db)).toBe(1);
  });

  it('rejects isolation changes inside a transaction', () => {
    db.beginTransaction();
    expect(() => db.setIsolationLevel(IsolationLevel.SERIALIZABLE)).toThrow(IsolationLevelError);
    expect(() => db.beginTransaction({ isolationLevel: IsolationLevel.SERIALIZABLE })).toThrow(IsolationLevelError);
    db.rollback();
  });

  it('rejects isolation levels SQLite cannot provide', () => {
    expect(() => db.beginTransaction({ isolationLevel: IsolationLevel.READ_COMMITTED })).toThrow(CapabilityError);
    expect(db.inTransaction).toBe(false);
  });

  it('resets read_uncommitted for the next transaction', () => {
    db.transaction(() => undefined, { isolationLevel: IsolationLevel.READ_UNCOMMITTED });
    db.beginTransaction();
    expect(db.execute('PRAGMA read_uncommitted').rows).toEqual([{ read_uncommitted: 0 }]);
    db.rollback();
  });

  it('uses the default isolation level for later transactions', () => {
    db.setIsolationLevel(IsolationLevel.SERIALIZABLE);
    db.transaction((tx) => tx.insert(items, { label: 'locked' }));
    expect(countItems(db)).toBe(1);
  });

  it('guards DDL inside a transaction', () => {
    db.beginTransaction();
    expect(() => db.execute('CREATE TABLE extra (id INTEGER)')).toThrow(TransactionError);
    expect(() => db.dropTable('items')).toThrow(TransactionError);
    db.execute('CREATE TABLE extra (id INTEGER)', [], { allowDdlInTransaction: true });
    db.rollback();
    expect(db.listTables()).toEqual(['items']);
  });

  it('rejects scripts inside a transaction', () => {
    db.beginTransaction();
    expect(() => db.executeScript('SELECT 1;')).toThrow(TransactionError);
    db.rollback();
  });

  it('describes tables from declared types', () => {
    db.executeScript(`
      CREATE TABLE gadgets (
        id INTEGER PRIMARY KEY,
        label VARCHAR(40) NOT NULL,
        price NUMERIC,
        weight REAL,
        enabled BOOLEAN,
        made DATETIME,
        data BLOB
      );
    `);
    expect(db.describeTable('gadgets')).toEqual({
      name: 'gadgets',
      columns: {
        id: LogicalType.INTEGER,
        label: LogicalType.TEXT,
        price: LogicalType.DECIMAL,
        weight: LogicalType.REAL,
        enabled: LogicalType.BOOLEAN,
        made: LogicalType.TIMESTAMP,
        data: LogicalType.BLOB,
      },
      primaryKey: ['id'],
    });
    expect(db.listTables()).toEqual(['gadgets', 'items']);
    expect(() => db.describeTable('nope')).toThrow(QueryError);
  });

  it('explains raw SQL', () => {
    const plan = db.explain('SELECT * FROM items WHERE id = ?', [1]);
    expect(plan.sql).toBe('SELECT * FROM items WHERE id = ?');
    expect(plan.text).toMatch(/^- SEARCH items USING INTEGER PRIMARY KEY/);
  });

  it('pings and refuses work once disconnected', () => {
    expect(db.ping()).toBe(true);
    db.disconnect();
    expect(db.ping()).toBe(false);
    expect(() => db.execute('SELECT 1')).toThrow(ConnectionError);
    db.connect();
  });

  it('rolls back an open transaction on disconnect', () => {
    db.beginTransaction();
    db.insert(items, { label: 'pending' });
    db.disconnect();
    expect(db.inTransaction).toBe(false);
    db.connect();
  });
});

describe('SqliteBackend timeouts', () => {
  it('rolls back the open transaction when a statement overruns', async () => {
    let now = 0;
    const db = await SqliteBackend.open({}, { clock: () => (now += 50) });
    try {
      db.createTable(items);
      db.beginTransaction();
      db.insert(items, { label: 'pending' });
      expect(() => db.execute('SELECT * FROM items', [], { timeoutMs: 10 })).toThrow(StatementTimeoutError);
      expect(db.inTransaction).toBe(false);
      expect(countItems(db)).toBe(0);
    } finally {
      db.disconnect();
    }
  });

  it('applies the configured statement timeout', async () => {
    let now = 0;
    const db = await SqliteBackend.open({ statementTimeoutMs: 20 }, { clock: () => (now += 50) });
    try {
      expect(() => db.execute('SELECT 1')).toThrow('statement exceeded 20ms; open transaction rolled back');
    } finally {
      db.disconnect();
    }
  });
});

describe('SqliteBackend files', () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'sqlweave-'));
  });

  afterEach(() => {
    fs.removeSync(dir);
  });

  it('writes the database back on disconnect', async () => {
    const database = path.join(dir, 'app.db');
    const writer = await SqliteBackend.open({ database });
    writer.createTable(items);
    writer.insert(items, { label: 'stored' });
    writer.disconnect();

    const reader = await SqliteBackend.open({ database, readonly: true });
    expect(reader.query(items).select('label').all()).toEqual([{ label: 'stored' }]);
    reader.insert(items, { label: 'discarded' });
    reader.disconnect();

    const again = await SqliteBackend.open({ database });
    expect(countItems(again)).toBe(1);
    again.disconnect();
  });

  it('refuses a missing file in read-only mode', async () => {
    await expect(SqliteBackend.open({ database: path.join(dir, 'absent.db'), readonly: true })).rejects.toBeInstanceOf(
      ConnectionError,
    );
  });

  it('validates its configuration', async () => {
    await expect(SqliteBackend.open({ maxRecursionDepth: 0 })).rejects.toBeInstanceOf(ConfigurationError);
  });
});

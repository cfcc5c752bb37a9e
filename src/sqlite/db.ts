import sqlJs from 'sql.js';
import type { Database, SqlJsStatic, SqlValue } from 'sql.js';
import { createRequire } from 'module';
import fs from 'fs-extra';
import { BaseBackend, type RawResult } from '../adapters/base-adapter.js';
import { type BackendConfig, type BackendConfigInput, configuredVersion, parseBackendConfig } from '../config/config.js';
import { parseVersion } from '../dialect/capabilities.js';
import { SqliteDialect } from '../dialect/sqlite-dialect.js';
import {
  ConnectionError,
  type DatabaseError,
  IntegrityError,
  LockTimeoutError,
  QueryError,
  errorMessage,
} from '../errors/errors.js';
import type { TableSchema } from '../ir/types.js';
import { describeTable, listTables } from '../schema/introspect.js';
import type { NativeValue } from '../types/logical-type.js';
import type { TypeMapping } from '../types/type-mapping.js';
import { databaseLogger } from '../utils/logger.js';

const require = createRequire(import.meta.url);

let loading: Promise<SqlJsStatic> | undefined;

/** The wasm module is loaded once per process. */
export function loadSqlJs(): Promise<SqlJsStatic> {
  loading ??= sqlJs.default({
    locateFile: () => require.resolve('sql.js/dist/sql-wasm.wasm'),
  });
  return loading;
}

export interface SqliteBackendOptions {
  typeMapping?: TypeMapping;
  clock?: () => number;
}

const CONSTRAINTS = ['UNIQUE', 'NOT NULL', 'CHECK', 'FOREIGN KEY', 'PRIMARY KEY'] as const;

function toSqlValue(value: NativeValue): SqlValue {
  if (typeof value === 'boolean') return value ? 1 : 0;
  if (typeof value === 'bigint') {
    return value >= BigInt(Number.MIN_SAFE_INTEGER) && value <= BigInt(Number.MAX_SAFE_INTEGER)
      ? Number(value)
      : value.toString();
  }
  return value;
}

// sql.js reads int64 exactly only as bigint; its typings predate the `useBigInt` option.
interface ExactRowReader {
  get(params: null, config: { useBigInt: boolean }): unknown[];
}

function fromSqlValue(value: unknown): NativeValue {
  if (typeof value === 'bigint') {
    return value >= BigInt(Number.MIN_SAFE_INTEGER) && value <= BigInt(Number.MAX_SAFE_INTEGER) ? Number(value) : value;
  }
  if (typeof value === 'number' || typeof value === 'string' || value instanceof Uint8Array || value === null) return value;
  throw new QueryError(`unexpected value from sql.js: ${typeof value}`, { dialect: 'sqlite' });
}

function pragmaLiteral(value: boolean | number | string): string {
  if (typeof value === 'boolean') return value ? 'ON' : 'OFF';
  return String(value);
}

/** SQLite through sql.js: the database lives in memory and is written back to its file on disconnect. */
export class SqliteBackend extends BaseBackend {
  private db?: Database;
  readonly config: BackendConfig;

  constructor(private readonly SQL: SqlJsStatic, config: BackendConfigInput = {}, options: SqliteBackendOptions = {}) {
    const parsed = parseBackendConfig(config);
    super({
      dialect: new SqliteDialect({ version: configuredVersion(parsed), typeMapping: options.typeMapping }),
      statementTimeoutMs: parsed.statementTimeoutMs,
      maxRecursionDepth: parsed.maxRecursionDepth,
      clock: options.clock,
    });
    this.config = parsed;
  }

  /** Load sql.js and connect. */
  static async open(config: BackendConfigInput = {}, options: SqliteBackendOptions = {}): Promise<SqliteBackend> {
    const backend = new SqliteBackend(await loadSqlJs(), config, options);
    backend.connect();
    return backend;
  }

  get inMemory(): boolean {
    return this.config.database === ':memory:';
  }

  describeTable(name: string): TableSchema {
    this.assertConnected();
    return describeTable(this, name);
  }

  listTables(): string[] {
    this.assertConnected();
    return listTables(this);
  }

  protected openConnection(): void {
    const { database } = this.config;
    let data: Uint8Array | undefined;
    if (!this.inMemory && fs.pathExistsSync(database)) {
      try {
        data = fs.readFileSync(database);
      } catch (error) {
        throw new ConnectionError(`cannot read ${database}: ${errorMessage(error)}`, { dialect: 'sqlite', cause: error });
      }
    } else if (!this.inMemory && this.config.readonly) {
      throw new ConnectionError(`${database} does not exist and the backend is read-only`, { dialect: 'sqlite' });
    }

    try {
      this.db = new this.SQL.Database(data);
    } catch (error) {
      throw new ConnectionError(`${database} is not a SQLite database: ${errorMessage(error)}`, {
        dialect: 'sqlite',
        cause: error,
      });
    }
    for (const [name, value] of Object.entries(this.config.pragmas)) {
      this.connection().run(`PRAGMA ${name} = ${pragmaLiteral(value)}`);
    }
    if (this.config.version === undefined) {
      this.currentDialect = new SqliteDialect({ typeMapping: this.dialect.typeMapping }).withVersion(
        parseVersion(this.serverVersion()),
      );
    }
    databaseLogger.debug('Opened SQLite database', { database, pragmas: this.config.pragmas });
  }

  protected closeConnection(): void {
    const db = this.connection();
    try {
      if (!this.inMemory && !this.config.readonly) {
        fs.outputFileSync(this.config.database, db.export());
      }
    } finally {
      db.close();
      this.db = undefined;
    }
  }

  protected runStatement(sql: string, params: readonly NativeValue[]): RawResult {
    const db = this.connection();
    const statement = db.prepare(sql);
    try {
      if (params.length) statement.bind(params.map(toSqlValue));
      const reader: ExactRowReader = statement;
      const rows: NativeValue[][] = [];
      while (statement.step()) rows.push(reader.get(null, { useBigInt: true }).map(fromSqlValue));
      return { columns: statement.getColumnNames(), rows, changes: db.getRowsModified() };
    } finally {
      statement.free();
    }
  }

  protected runScript(sql: string): void {
    this.connection().exec(sql);
  }

  protected lastInsertRowId(): number | undefined {
    const value = this.connection().exec('SELECT last_insert_rowid()')[0]?.values[0]?.[0];
    return typeof value === 'number' ? value : undefined;
  }

  protected serverVersion(): string {
    const value = this.connection().exec('SELECT sqlite_version()')[0]?.values[0]?.[0];
    return typeof value === 'string' ? value : '0.0.0';
  }

  protected translateError(error: unknown, sql?: string): DatabaseError {
    const message = errorMessage(error);
    const context = { dialect: 'sqlite', cause: error };
    const constraint = CONSTRAINTS.find((name) => message.includes(`${name} constraint failed`));
    if (constraint) {
      return new IntegrityError(message, { ...context, constraint, columns: constraintColumns(message) });
    }
    if (/database (table )?is locked|SQLITE_BUSY/i.test(message)) {
      return new LockTimeoutError(message, context);
    }
    if (/file is not a database|unable to open/i.test(message)) {
      return new ConnectionError(message, context);
    }
    return new QueryError(message, { ...context, sql });
  }

  private connection(): Database {
    if (!this.db) throw new ConnectionError('backend is not connected', { dialect: 'sqlite' });
    return this.db;
  }
}

// "UNIQUE constraint failed: users.email, users.org" -> ['email', 'org']
function constraintColumns(message: string): string[] {
  const match = /constraint failed: (.+)$/.exec(message);
  if (!match?.[1]) return [];
  return match[1].split(',').map((part) => {
    const name = part.trim();
    const dot = name.lastIndexOf('.');
    return dot >= 0 ? name.slice(dot + 1) : name;
  });
}

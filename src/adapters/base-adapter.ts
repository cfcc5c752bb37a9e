/**
 * Base storage backend.
 * Owns the connection state machine, transaction nesting, statement
 * classification, timing and row conversion. Driver subclasses supply the
 * raw calls and the translation of their errors.
 */

import {
  CancellationError,
  CapabilityError,
  ConnectionError,
  DatabaseError,
  IsolationLevelError,
  StatementTimeoutError,
  TransactionError,
  errorMessage,
} from '../errors/errors.js';
import type { Dialect, IsolationLevel, TransactionOptions } from '../dialect/base-dialect.js';
import { explainResult } from '../explain/explainer.js';
import { compile } from '../generator/sql.js';
import type { Expression, Statement, TableSchema } from '../ir/types.js';
import { ActiveQuery } from '../query/active-query.js';
import { CTEQuery } from '../query/cte-query.js';
import {
  type CreateTableOptions,
  type InsertOptions,
  type ReturningOptions,
  type Values,
  createTableStatement,
  deleteStatement,
  dropTableStatement,
  insertStatement,
  updateStatement,
} from '../query/dml.js';
import { syncMode, type QueryExecutor } from '../query/execution-mode.js';
import type { SourceInput } from '../query/select-query.js';
import type { ColumnTypes, NativeValue, Row } from '../types/logical-type.js';
import { databaseLogger, queryLogger } from '../utils/logger.js';
import type { BatchResult, ExecuteOptions, QueryPlan, QueryResult, StatementType } from './result.js';

export type BackendState = 'disconnected' | 'connected' | 'inTransaction';

/** What a driver hands back for one statement. */
export interface RawResult {
  columns: string[];
  rows: NativeValue[][];
  /** Rows changed by DML; ignored for other statements. */
  changes: number;
}

export interface BackendOptions {
  dialect: Dialect;
  /** Applies to every `execute` that does not pass its own `timeoutMs`. */
  statementTimeoutMs?: number;
  maxRecursionDepth?: number;
  /** Milliseconds; injectable for tests. */
  clock?: () => number;
}

export const DEFAULT_MAX_RECURSION_DEPTH = 100;

const STATEMENT_KEYWORDS: ReadonlyArray<readonly [RegExp, StatementType]> = [
  [/^(SELECT|WITH|VALUES)\b/i, 'select'],
  [/^(INSERT|UPDATE|DELETE|REPLACE|MERGE)\b/i, 'dml'],
  [/^(CREATE|DROP|ALTER|TRUNCATE|RENAME)\b/i, 'ddl'],
  [/^(BEGIN|START\s+TRANSACTION|COMMIT|END|ROLLBACK|SAVEPOINT|RELEASE|SET\s+TRANSACTION)\b/i, 'transaction'],
];

/** Statement type from its leading keyword, after comments and whitespace. */
export function classifyStatement(sql: string): StatementType {
  const text = sql.replace(/^(\s+|--[^\n]*\n?|\/\*[\s\S]*?\*\/)*/, '');
  for (const [pattern, type] of STATEMENT_KEYWORDS) {
    if (pattern.test(text)) return type;
  }
  return 'other';
}

export abstract class BaseBackend implements QueryExecutor<'sync'> {
  readonly mode = syncMode;
  readonly maxRecursionDepth: number;
  protected currentDialect: Dialect;
  protected readonly statementTimeoutMs?: number;
  private readonly clock: () => number;
  private state: BackendState = 'disconnected';
  private depth = 0;
  private isolationLevel?: IsolationLevel;

  constructor(options: BackendOptions) {
    this.currentDialect = options.dialect;
    this.statementTimeoutMs = options.statementTimeoutMs;
    this.maxRecursionDepth = options.maxRecursionDepth ?? DEFAULT_MAX_RECURSION_DEPTH;
    this.clock = options.clock ?? (() => performance.now());
  }

  // Driver hooks
  protected abstract openConnection(): void;
  protected abstract closeConnection(): void;
  protected abstract runStatement(sql: string, params: readonly NativeValue[]): RawResult;
  protected abstract runScript(sql: string): void;
  protected abstract lastInsertRowId(): number | bigint | undefined;
  protected abstract translateError(error: unknown, sql?: string): DatabaseError;
  protected abstract serverVersion(): string;

  get dialect(): Dialect {
    return this.currentDialect;
  }

  get connectionState(): BackendState {
    return this.state;
  }

  get isConnected(): boolean {
    return this.state !== 'disconnected';
  }

  get inTransaction(): boolean {
    return this.depth > 0;
  }

  /** 0 outside a transaction, 1 for the outer transaction, +1 per savepoint. */
  get transactionDepth(): number {
    return this.depth;
  }

  connect(): void {
    if (this.isConnected) return;
    try {
      this.openConnection();
    } catch (error) {
      throw this.asDatabaseError(error);
    }
    this.state = 'connected';
    databaseLogger.info('Connected', { dialect: this.dialect.name, version: this.getServerVersion() });
  }

  disconnect(): void {
    if (!this.isConnected) return;
    if (this.inTransaction) {
      databaseLogger.warn('Disconnecting with an open transaction; rolling back', { depth: this.depth });
      this.abortTransaction();
    }
    try {
      this.closeConnection();
    } catch (error) {
      throw this.asDatabaseError(error);
    } finally {
      this.state = 'disconnected';
    }
    databaseLogger.info('Disconnected', { dialect: this.dialect.name });
  }

  execute(sql: string, params: readonly NativeValue[] = [], options: ExecuteOptions = {}): QueryResult {
    this.assertConnected();
    if (options.signal?.aborted) throw new CancellationError(undefined, { dialect: this.dialect.name });

    const statementType = options.statementType ?? classifyStatement(sql);
    if (statementType === 'transaction') {
      throw new TransactionError('transaction control goes through beginTransaction, commit and rollback', {
        dialect: this.dialect.name,
      });
    }
    if (statementType === 'ddl' && this.inTransaction && !options.allowDdlInTransaction) {
      throw new TransactionError('DDL inside an open transaction needs allowDdlInTransaction', {
        dialect: this.dialect.name,
      });
    }

    const started = this.clock();
    const raw = this.run(sql, params);
    const duration = this.clock() - started;

    const timeoutMs = options.timeoutMs ?? this.statementTimeoutMs;
    if (timeoutMs !== undefined && duration > timeoutMs) {
      queryLogger.warn('Statement timed out', { sql, duration, timeoutMs });
      if (this.inTransaction) this.abortTransaction();
      throw new StatementTimeoutError(timeoutMs, { dialect: this.dialect.name });
    }

    const result: QueryResult = {
      rows: this.convertRows(raw, options.columnTypes ?? {}),
      columns: raw.columns,
      affectedRows: statementType === 'dml' ? raw.changes : 0,
      duration,
      statementType,
    };
    if (statementType === 'dml' && /^\s*INSERT\b/i.test(sql)) {
      const id = this.lastInsertRowId();
      if (id !== undefined) result.lastInsertId = id;
    }

    queryLogger.debug('Executed', {
      sql,
      params: params.length,
      rows: result.rows.length,
      affectedRows: result.affectedRows,
      duration: Math.round(duration * 1000) / 1000,
    });
    return result;
  }

  /** Same statement for each parameter set, atomically when no transaction is open. */
  executeMany(sql: string, paramSets: readonly (readonly NativeValue[])[], options: ExecuteOptions = {}): BatchResult {
    const runAll = (): BatchResult => {
      const results = paramSets.map((params) => this.execute(sql, params, options));
      return {
        results,
        totalRows: results.reduce((sum, r) => sum + (r.statementType === 'dml' ? r.affectedRows : r.rows.length), 0),
        totalTime: results.reduce((sum, r) => sum + r.duration, 0),
      };
    };
    return this.inTransaction ? runAll() : this.transaction(runAll);
  }

  /** Several semicolon-separated statements without parameters or results. */
  executeScript(sql: string): void {
    this.assertConnected();
    if (this.inTransaction) {
      throw new TransactionError('scripts cannot run inside a transaction', { dialect: this.dialect.name });
    }
    try {
      this.runScript(sql);
    } catch (error) {
      throw this.asDatabaseError(error, sql);
    }
    queryLogger.debug('Script executed', { length: sql.length });
  }

  // Transactions

  beginTransaction(options: TransactionOptions = {}): void {
    this.assertConnected();
    if (this.inTransaction) {
      if (options.isolationLevel !== undefined || options.readOnly) {
        throw new IsolationLevelError('nested transactions inherit the outer isolation level', {
          dialect: this.dialect.name,
          clause: 'SAVEPOINT',
        });
      }
      if (!this.dialect.supports('savepoints')) {
        throw new CapabilityError('nested transactions need savepoints', {
          dialect: this.dialect.name,
          clause: 'SAVEPOINT',
        });
      }
      this.control(this.dialect.formatSavepoint(savepointName(this.depth)));
      this.depth += 1;
      return;
    }
    const statements = this.dialect.formatBeginTransaction({
      ...options,
      isolationLevel: options.isolationLevel ?? this.isolationLevel,
    });
    for (const statement of statements) this.control(statement);
    this.depth = 1;
    this.state = 'inTransaction';
    databaseLogger.debug('Transaction started', { isolationLevel: options.isolationLevel ?? this.isolationLevel });
  }

  commit(): void {
    this.assertInTransaction('commit');
    if (this.depth > 1) {
      this.control(this.dialect.formatReleaseSavepoint(savepointName(this.depth - 1)));
      this.depth -= 1;
      return;
    }
    this.control(this.dialect.formatCommit());
    this.endTransaction();
  }

  rollback(): void {
    this.assertInTransaction('rollback');
    if (this.depth > 1) {
      const name = savepointName(this.depth - 1);
      this.control(this.dialect.formatRollbackToSavepoint(name));
      this.control(this.dialect.formatReleaseSavepoint(name));
      this.depth -= 1;
      return;
    }
    this.control(this.dialect.formatRollback());
    this.endTransaction();
  }

  /** Commits when `fn` returns, rolls back its level when it throws. */
  transaction<T>(fn: (backend: this) => T, options: TransactionOptions = {}): T {
    this.beginTransaction(options);
    const level = this.depth;
    let result: T;
    try {
      result = fn(this);
    } catch (error) {
      if (this.depth === level) this.rollback();
      throw error;
    }
    this.commit();
    return result;
  }

  /** Default level for transactions started later. */
  setIsolationLevel(level: IsolationLevel): void {
    if (this.inTransaction) {
      throw new IsolationLevelError('cannot change the isolation level inside a transaction', {
        dialect: this.dialect.name,
      });
    }
    this.isolationLevel = level;
  }

  // Statement helpers

  insert(target: string | TableSchema, rows: Values | readonly Values[], options: InsertOptions = {}): QueryResult {
    return this.executeStatement(insertStatement(target, rows, options), 'dml', target);
  }

  update(target: string | TableSchema, values: Values, where?: Expression, options: ReturningOptions = {}): QueryResult {
    return this.executeStatement(updateStatement(target, values, where, options), 'dml', target);
  }

  delete(target: string | TableSchema, where?: Expression, options: ReturningOptions = {}): QueryResult {
    return this.executeStatement(deleteStatement(target, where, options), 'dml', target);
  }

  createTable(schema: TableSchema, options: CreateTableOptions = {}): QueryResult {
    return this.executeStatement(createTableStatement(schema, options), 'ddl');
  }

  dropTable(table: string, ifExists = false): QueryResult {
    return this.executeStatement(dropTableStatement(table, ifExists), 'ddl');
  }

  query(source?: SourceInput | TableSchema): ActiveQuery<'sync'> {
    if (source !== undefined && isTableSchema(source)) return new ActiveQuery(this, undefined, source);
    return new ActiveQuery(this, source);
  }

  cte(): CTEQuery<'sync'> {
    return new CTEQuery(this);
  }

  explain(sql: string, params: readonly NativeValue[] = []): QueryPlan {
    const result = this.execute(this.dialect.formatExplain(sql), params, { statementType: 'select' });
    return explainResult(sql, result);
  }

  ping(): boolean {
    if (!this.isConnected) return false;
    try {
      this.execute('SELECT 1', [], { statementType: 'select' });
      return true;
    } catch (error) {
      databaseLogger.warn('Ping failed', { error: errorMessage(error) });
      return false;
    }
  }

  getServerVersion(): string {
    this.assertConnected();
    return this.serverVersion();
  }

  protected assertConnected(): void {
    if (!this.isConnected) {
      throw new ConnectionError('backend is not connected', { dialect: this.dialect.name });
    }
  }

  /** Rolls back every open level at once; used on disconnect, timeout and cancellation. */
  protected abortTransaction(): void {
    if (!this.inTransaction) return;
    try {
      this.control(this.dialect.formatRollback());
    } finally {
      this.endTransaction();
    }
  }

  private executeStatement(statement: Statement, type: StatementType, target?: string | TableSchema): QueryResult {
    const { sql, params } = compile(statement, this.dialect);
    const columnTypes: ColumnTypes = target !== undefined && typeof target !== 'string' ? target.columns : {};
    return this.execute(sql, params, { statementType: type, columnTypes });
  }

  private control(sql: string): void {
    this.run(sql, []);
    queryLogger.debug('Transaction control', { sql });
  }

  private run(sql: string, params: readonly NativeValue[]): RawResult {
    try {
      return this.runStatement(sql, params);
    } catch (error) {
      throw this.asDatabaseError(error, sql);
    }
  }

  private endTransaction(): void {
    this.depth = 0;
    if (this.state === 'inTransaction') this.state = 'connected';
  }

  private assertInTransaction(action: string): void {
    this.assertConnected();
    if (!this.inTransaction) {
      throw new TransactionError(`no active transaction to ${action}`, { dialect: this.dialect.name });
    }
  }

  private asDatabaseError(error: unknown, sql?: string): DatabaseError {
    if (error instanceof DatabaseError) return error;
    const translated = this.translateError(error, sql);
    queryLogger.warn('Driver error', { kind: translated.kind, error: errorMessage(error), sql });
    return translated;
  }

  private convertRows(raw: RawResult, columnTypes: ColumnTypes): Row[] {
    const mapping = this.dialect.typeMapping;
    return raw.rows.map((values) => {
      const row: Row = {};
      raw.columns.forEach((column, index) => {
        const value = values[index] ?? null;
        const type = columnTypes[column];
        row[column] = type === undefined ? value : mapping.fromDatabase(value, type, column);
      });
      return row;
    });
  }
}

function savepointName(level: number): string {
  return `sp_${level}`;
}

export function isTableSchema(source: SourceInput | TableSchema): source is TableSchema {
  return typeof source === 'object' && 'columns' in source && !('kind' in source) && !('toStatement' in source);
}

import { setImmediate } from 'timers/promises';
import type { BackendConfigInput } from '../config/config.js';
import type { Dialect, IsolationLevel, TransactionOptions } from '../dialect/base-dialect.js';
import { CancellationError } from '../errors/errors.js';
import type { Expression, TableSchema } from '../ir/types.js';
import { ActiveQuery } from '../query/active-query.js';
import { CTEQuery } from '../query/cte-query.js';
import type { CreateTableOptions, InsertOptions, ReturningOptions, Values } from '../query/dml.js';
import { asyncMode, type QueryExecutor } from '../query/execution-mode.js';
import type { SourceInput } from '../query/select-query.js';
import { SqliteBackend, type SqliteBackendOptions } from '../sqlite/db.js';
import type { NativeValue } from '../types/logical-type.js';
import { databaseLogger } from '../utils/logger.js';
import { type BaseBackend, isTableSchema } from './base-adapter.js';
import type { BatchResult, ExecuteOptions, QueryPlan, QueryResult } from './result.js';

export interface AsyncBackendOptions {
  /** Aborting it cancels the backend: queued work is rejected and the connection closed. */
  signal?: AbortSignal;
}

/**
 * Promise surface over a synchronous backend. Every call yields to the
 * event loop before touching the driver and runs in call order; the query
 * assemblers see the same behavior as on the blocking backend.
 */
export class AsyncBackend implements QueryExecutor<'async'> {
  readonly mode = asyncMode;
  private tail: Promise<void> = Promise.resolve();
  private epoch = 0;

  constructor(private readonly backend: BaseBackend, options: AsyncBackendOptions = {}) {
    options.signal?.addEventListener('abort', () => this.cancel(), { once: true });
  }

  static async sqlite(config: BackendConfigInput = {}, options: SqliteBackendOptions & AsyncBackendOptions = {}): Promise<AsyncBackend> {
    return new AsyncBackend(await SqliteBackend.open(config, options), options);
  }

  get dialect(): Dialect {
    return this.backend.dialect;
  }

  get maxRecursionDepth(): number {
    return this.backend.maxRecursionDepth;
  }

  get inTransaction(): boolean {
    return this.backend.inTransaction;
  }

  get isConnected(): boolean {
    return this.backend.isConnected;
  }

  /** Operations waiting on the queue fail with CancellationError; the open transaction is rolled back. */
  cancel(): void {
    this.epoch += 1;
    databaseLogger.warn('Backend cancelled', { dialect: this.dialect.name, inTransaction: this.inTransaction });
    this.backend.disconnect();
  }

  connect(): Promise<void> {
    return this.enqueue(() => this.backend.connect());
  }

  disconnect(): Promise<void> {
    return this.enqueue(() => this.backend.disconnect());
  }

  execute(sql: string, params: readonly NativeValue[] = [], options: ExecuteOptions = {}): Promise<QueryResult> {
    return this.enqueue(() => this.backend.execute(sql, params, options), options.signal);
  }

  executeMany(sql: string, paramSets: readonly (readonly NativeValue[])[], options: ExecuteOptions = {}): Promise<BatchResult> {
    return this.enqueue(() => this.backend.executeMany(sql, paramSets, options), options.signal);
  }

  executeScript(sql: string): Promise<void> {
    return this.enqueue(() => this.backend.executeScript(sql));
  }

  beginTransaction(options: TransactionOptions = {}): Promise<void> {
    return this.enqueue(() => this.backend.beginTransaction(options));
  }

  commit(): Promise<void> {
    return this.enqueue(() => this.backend.commit());
  }

  rollback(): Promise<void> {
    return this.enqueue(() => this.backend.rollback());
  }

  async transaction<T>(fn: (backend: this) => Promise<T>, options: TransactionOptions = {}): Promise<T> {
    await this.beginTransaction(options);
    const level = this.backend.transactionDepth;
    let result: T;
    try {
      result = await fn(this);
    } catch (error) {
      if (this.backend.transactionDepth === level) await this.rollback();
      throw error;
    }
    await this.commit();
    return result;
  }

  setIsolationLevel(level: IsolationLevel): Promise<void> {
    return this.enqueue(() => this.backend.setIsolationLevel(level));
  }

  insert(target: string | TableSchema, rows: Values | readonly Values[], options: InsertOptions = {}): Promise<QueryResult> {
    return this.enqueue(() => this.backend.insert(target, rows, options));
  }

  update(target: string | TableSchema, values: Values, where?: Expression, options: ReturningOptions = {}): Promise<QueryResult> {
    return this.enqueue(() => this.backend.update(target, values, where, options));
  }

  delete(target: string | TableSchema, where?: Expression, options: ReturningOptions = {}): Promise<QueryResult> {
    return this.enqueue(() => this.backend.delete(target, where, options));
  }

  createTable(schema: TableSchema, options: CreateTableOptions = {}): Promise<QueryResult> {
    return this.enqueue(() => this.backend.createTable(schema, options));
  }

  dropTable(table: string, ifExists = false): Promise<QueryResult> {
    return this.enqueue(() => this.backend.dropTable(table, ifExists));
  }

  query(source?: SourceInput | TableSchema): ActiveQuery<'async'> {
    if (source !== undefined && isTableSchema(source)) return new ActiveQuery(this, undefined, source);
    return new ActiveQuery(this, source);
  }

  cte(): CTEQuery<'async'> {
    return new CTEQuery(this);
  }

  explain(sql: string, params: readonly NativeValue[] = []): Promise<QueryPlan> {
    return this.enqueue(() => this.backend.explain(sql, params));
  }

  ping(): Promise<boolean> {
    return this.enqueue(() => this.backend.ping());
  }

  getServerVersion(): Promise<string> {
    return this.enqueue(() => this.backend.getServerVersion());
  }

  private enqueue<T>(operation: () => T, signal?: AbortSignal): Promise<T> {
    const epoch = this.epoch;
    const result = this.tail.then(async () => {
      await setImmediate();
      if (epoch !== this.epoch || signal?.aborted) {
        throw new CancellationError(undefined, { dialect: this.dialect.name });
      }
      return operation();
    });
    // The queue only orders work; each caller observes its own outcome through `result`.
    this.tail = result.then(
      () => undefined,
      () => undefined,
    );
    return result;
  }
}

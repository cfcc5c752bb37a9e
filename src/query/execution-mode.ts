import type { Dialect } from '../dialect/base-dialect.js';
import type { NativeValue } from '../types/logical-type.js';
import type { ExecuteOptions, QueryResult } from '../adapters/result.js';

export type ModeKind = 'sync' | 'async';

/** A value produced directly in sync mode, or eventually in async mode. */
export type Deferred<M extends ModeKind, T> = M extends 'async' ? Promise<T> : T;

/**
 * Sequencing primitives for one execution mode. Query code written against
 * these runs unchanged over a blocking or a suspending backend.
 */
export interface ExecutionMode<M extends ModeKind> {
  readonly kind: M;
  /** Run `fn`; in async mode a throw becomes a rejection. */
  run<T>(fn: () => T): Deferred<M, T>;
  map<T, U>(value: Deferred<M, T>, fn: (value: T) => U): Deferred<M, U>;
  chain<T, U>(value: Deferred<M, T>, fn: (value: T) => Deferred<M, U>): Deferred<M, U>;
}

export const syncMode: ExecutionMode<'sync'> = {
  kind: 'sync',
  run: (fn) => fn(),
  map: (value, fn) => fn(value),
  chain: (value, fn) => fn(value),
};

export const asyncMode: ExecutionMode<'async'> = {
  kind: 'async',
  run: (fn) => Promise.resolve().then(fn),
  map: (value, fn) => value.then(fn),
  chain: (value, fn) => value.then(fn),
};

/** What a query assembler needs from a backend. */
export interface QueryExecutor<M extends ModeKind> {
  readonly dialect: Dialect;
  readonly mode: ExecutionMode<M>;
  /** Default bound for recursive CTEs that set none. */
  readonly maxRecursionDepth: number;
  execute(sql: string, params?: readonly NativeValue[], options?: ExecuteOptions): Deferred<M, QueryResult>;
}

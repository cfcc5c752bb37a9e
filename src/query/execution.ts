import type { ExecuteOptions, QueryPlan, QueryResult } from '../adapters/result.js';
import { ConstructionError, RecordNotFoundError, RecursionLimitError } from '../errors/errors.js';
import { explainResult } from '../explain/explainer.js';
import { compile } from '../generator/sql.js';
import { type GuardedCte, collectDepthGuards } from '../ir/walk.js';
import type { AggregateNode, CompiledSql, QueryStatement } from '../ir/types.js';
import { type AppValue, type ColumnTypes, LogicalType, type Row } from '../types/logical-type.js';
import type { Deferred, ModeKind, QueryExecutor } from './execution-mode.js';
import {
  DEPTH_COLUMN,
  aggregateStatement,
  countStatement,
  depthProbeStatement,
  existsStatement,
  firstRowStatement,
  validateStatement,
} from './shapes.js';

/** Everything a terminal call needs from an assembler. */
export interface ExecutionPlan {
  readonly statement: QueryStatement;
  readonly columnTypes: ColumnTypes;
}

interface Prepared {
  readonly main: CompiledSql;
  readonly probes: readonly { readonly site: GuardedCte; readonly compiled: CompiledSql }[];
  /** Engine-added columns stripped from returned rows. */
  readonly hidden: readonly string[];
}

/**
 * Terminal calls shared by every assembler, written once over the
 * execution mode so that sync and async surfaces cannot drift apart.
 * A query executes once; a second terminal call is a construction error.
 */
export class QueryExecution<M extends ModeKind> {
  private consumed = false;

  constructor(private readonly executor: QueryExecutor<M>) {}

  get isConsumed(): boolean {
    return this.consumed;
  }

  assertFresh(): void {
    if (this.consumed) {
      throw new ConstructionError('query has already been executed; build a new query', { clause: 'terminal' });
    }
  }

  all(plan: ExecutionPlan): Deferred<M, Row[]> {
    return this.rows(plan, plan.statement, plan.columnTypes);
  }

  one(plan: ExecutionPlan): Deferred<M, Row | null> {
    return this.executor.mode.map(
      this.rows(plan, firstRowStatement(plan.statement), plan.columnTypes),
      (rows) => rows[0] ?? null,
    );
  }

  oneOrFail(plan: ExecutionPlan): Deferred<M, Row> {
    return this.executor.mode.map(this.one(plan), (row) => {
      if (row === null) throw new RecordNotFoundError(undefined, { dialect: this.executor.dialect.name });
      return row;
    });
  }

  count(plan: ExecutionPlan): Deferred<M, number> {
    return this.executor.mode.map(
      this.rows(plan, countStatement(plan.statement), { count: LogicalType.INTEGER }),
      (rows) => Number(rows[0]?.count ?? 0),
    );
  }

  exists(plan: ExecutionPlan): Deferred<M, boolean> {
    return this.executor.mode.map(this.rows(plan, existsStatement(plan.statement), {}), (rows) => rows.length > 0);
  }

  /** Single aggregate over the query's rows; `type` converts the result. */
  aggregate(plan: ExecutionPlan, node: AggregateNode, type?: LogicalType): Deferred<M, AppValue> {
    const types: ColumnTypes = type ? { value: type } : {};
    return this.executor.mode.map(
      this.rows(plan, aggregateStatement(plan.statement, node), types),
      (rows) => rows[0]?.value ?? null,
    );
  }

  explain(plan: ExecutionPlan): Deferred<M, QueryPlan> {
    const { mode, dialect } = this.executor;
    const prepared = mode.run(() => this.prepare(plan, plan.statement));
    return mode.chain(prepared, ({ main }) =>
      mode.map(
        this.executor.execute(dialect.formatExplain(main.sql), main.params, { statementType: 'select' }),
        (result) => explainResult(main.sql, result),
      ),
    );
  }

  private rows(plan: ExecutionPlan, statement: QueryStatement, columnTypes: ColumnTypes): Deferred<M, Row[]> {
    const { mode } = this.executor;
    const prepared = mode.run(() => this.prepare(plan, statement));
    return mode.chain(prepared, (ready) =>
      mode.map(this.run(ready, { statementType: 'select', columnTypes }), (result) =>
        ready.hidden.length ? result.rows.map((row) => stripColumns(row, ready.hidden)) : result.rows,
      ),
    );
  }

  private run(ready: Prepared, options: ExecuteOptions): Deferred<M, QueryResult> {
    return this.executor.mode.chain(this.runProbes(ready), () =>
      this.executor.execute(ready.main.sql, ready.main.params, options),
    );
  }

  // Compiles everything up front so construction and capability errors surface before any I/O.
  private prepare(plan: ExecutionPlan, statement: QueryStatement): Prepared {
    this.assertFresh();
    this.consumed = true;
    const { dialect } = this.executor;
    validateStatement(statement, dialect);
    const main = compile(statement, dialect);
    // Guards are found anywhere in the tree: set-operation operands, subqueries and nested WITH clauses included.
    const sites = collectDepthGuards(plan.statement);
    const probes = sites
      .filter((site) => site.guard.onDepthExceeded === 'error')
      .map((site) => ({
        site,
        compiled: compile(depthProbeStatement(site.clause, site.cte, site.guard.maxDepth), dialect),
      }));
    return { main, probes, hidden: sites.length ? [DEPTH_COLUMN] : [] };
  }

  private runProbes(ready: Prepared): Deferred<M, void> {
    const { mode, dialect } = this.executor;
    let done: Deferred<M, void> = mode.run<void>(() => undefined);
    for (const { site, compiled } of ready.probes) {
      done = mode.chain(done, () =>
        mode.map(this.executor.execute(compiled.sql, compiled.params, { statementType: 'select' }), (result) => {
          if (result.rows.length > 0) {
            throw new RecursionLimitError(site.cte, site.guard.maxDepth, { dialect: dialect.name });
          }
        }),
      );
    }
    return done;
  }
}

function stripColumns(row: Row, hidden: readonly string[]): Row {
  const copy: Row = {};
  for (const [key, value] of Object.entries(row)) {
    if (!hidden.includes(key)) copy[key] = value;
  }
  return copy;
}

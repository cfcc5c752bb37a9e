import type { QueryPlan } from '../adapters/result.js';
import type { Dialect } from '../dialect/base-dialect.js';
import { type Operand, toOperand } from '../ir/builders.js';
import type { AggregateFunc, AggregateNode, CompiledSql, TableSchema } from '../ir/types.js';
import { type AppValue, LogicalType, type Row } from '../types/logical-type.js';
import type { Deferred, ModeKind, QueryExecutor } from './execution-mode.js';
import { type ExecutionPlan, QueryExecution } from './execution.js';
import { SelectQuery, type SourceInput } from './select-query.js';
import { type SetOperand, SetOperationQuery } from './set-operation-query.js';

/**
 * SELECT builder bound to a backend. Terminal calls render, execute and
 * convert rows through the declared column types. The sync or async
 * surface comes from the executor's mode.
 */
export class ActiveQuery<M extends ModeKind> extends SelectQuery {
  protected readonly execution: QueryExecution<M>;

  constructor(protected readonly executor: QueryExecutor<M>, source?: SourceInput, schema?: TableSchema) {
    super(source, schema);
    this.execution = new QueryExecution(executor);
  }

  protected override touch(): void {
    this.execution.assertFresh();
  }

  get consumed(): boolean {
    return this.execution.isConsumed;
  }

  override toSql(dialect: Dialect = this.executor.dialect): CompiledSql {
    return super.toSql(dialect);
  }

  protected plan(): ExecutionPlan {
    return { statement: this.toStatement(), columnTypes: this.columnTypes() };
  }

  all(): Deferred<M, Row[]> {
    return this.execution.all(this.plan());
  }

  one(): Deferred<M, Row | null> {
    return this.execution.one(this.plan());
  }

  oneOrFail(): Deferred<M, Row> {
    return this.execution.oneOrFail(this.plan());
  }

  count(): Deferred<M, number> {
    return this.execution.count(this.plan());
  }

  exists(): Deferred<M, boolean> {
    return this.execution.exists(this.plan());
  }

  sum(column: Operand): Deferred<M, AppValue> {
    return this.aggregate('SUM', column, this.declaredType(column));
  }

  avg(column: Operand): Deferred<M, AppValue> {
    return this.aggregate('AVG', column, LogicalType.REAL);
  }

  min(column: Operand): Deferred<M, AppValue> {
    return this.aggregate('MIN', column, this.declaredType(column));
  }

  max(column: Operand): Deferred<M, AppValue> {
    return this.aggregate('MAX', column, this.declaredType(column));
  }

  explain(): Deferred<M, QueryPlan> {
    return this.execution.explain(this.plan());
  }

  union(other: SetOperand): SetOperationQuery<M> {
    return new SetOperationQuery(this.executor, this).union(other);
  }

  unionAll(other: SetOperand): SetOperationQuery<M> {
    return new SetOperationQuery(this.executor, this).unionAll(other);
  }

  intersect(other: SetOperand): SetOperationQuery<M> {
    return new SetOperationQuery(this.executor, this).intersect(other);
  }

  except(other: SetOperand): SetOperationQuery<M> {
    return new SetOperationQuery(this.executor, this).except(other);
  }

  private aggregate(func: AggregateFunc, column: Operand, type?: LogicalType): Deferred<M, AppValue> {
    const node: AggregateNode = { kind: 'aggregate', func, arg: toOperand(column), distinct: false };
    return this.execution.aggregate(this.plan(), node, type);
  }

  private declaredType(column: Operand): LogicalType | undefined {
    return typeof column === 'string' ? this.columnTypes()[column] : undefined;
  }
}

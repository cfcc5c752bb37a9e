import type { QueryPlan } from '../adapters/result.js';
import type { Dialect } from '../dialect/base-dialect.js';
import { ConstructionError } from '../errors/errors.js';
import { compile } from '../generator/sql.js';
import { type Operand, isStatementSource, toOrderTerm } from '../ir/builders.js';
import type {
  CompiledSql,
  OrderTerm,
  QueryStatement,
  SetOperationStatement,
  SetOperator,
  StatementSource,
} from '../ir/types.js';
import type { ColumnTypes, LogicalType, Row } from '../types/logical-type.js';
import type { Deferred, ModeKind, QueryExecutor } from './execution-mode.js';
import { type ExecutionPlan, QueryExecution } from './execution.js';
import { SelectQuery } from './select-query.js';
import { checkPageValue, selectWidth, validateStatement } from './shapes.js';

export type SetOperand = StatementSource | QueryStatement;

function snapshot(operand: SetOperand): QueryStatement {
  return isStatementSource(operand) ? operand.toStatement() : operand;
}

/**
 * Two or more queries combined with UNION, UNION ALL, INTERSECT or EXCEPT.
 * Operands are captured when added; the first operand names the result
 * columns.
 */
export class SetOperationQuery<M extends ModeKind> implements StatementSource {
  private readonly first: QueryStatement;
  private readonly rest: { op: SetOperator; query: QueryStatement }[] = [];
  private ordering: OrderTerm[] = [];
  private limitValue?: number;
  private offsetValue?: number;
  private readonly resultTypes: Record<string, LogicalType> = {};
  private readonly execution: QueryExecution<M>;

  constructor(private readonly executor: QueryExecutor<M>, first: SetOperand) {
    this.first = snapshot(first);
    if (first instanceof SelectQuery) Object.assign(this.resultTypes, first.columnTypes());
    this.execution = new QueryExecution(executor);
  }

  union(other: SetOperand): this {
    return this.add('UNION', other);
  }

  unionAll(other: SetOperand): this {
    return this.add('UNION ALL', other);
  }

  intersect(other: SetOperand): this {
    return this.add('INTERSECT', other);
  }

  except(other: SetOperand): this {
    return this.add('EXCEPT', other);
  }

  private add(op: SetOperator, other: SetOperand): this {
    this.execution.assertFresh();
    const query = snapshot(other);
    const expected = selectWidth(this.first);
    const actual = selectWidth(query);
    if (expected !== undefined && actual !== undefined && expected !== actual) {
      throw new ConstructionError(
        `operand ${this.rest.length + 2} projects ${actual} columns but the first projects ${expected}`,
        { clause: op },
      );
    }
    this.rest.push({ op, query });
    return this;
  }

  orderBy(...terms: (OrderTerm | Operand)[]): this {
    this.execution.assertFresh();
    this.ordering.push(...terms.map(toOrderTerm));
    return this;
  }

  limit(count: number): this {
    this.execution.assertFresh();
    this.limitValue = checkPageValue(count, 'LIMIT');
    return this;
  }

  offset(count: number): this {
    this.execution.assertFresh();
    this.offsetValue = checkPageValue(count, 'OFFSET');
    return this;
  }

  withTypes(types: ColumnTypes): this {
    this.execution.assertFresh();
    Object.assign(this.resultTypes, types);
    return this;
  }

  toStatement(): SetOperationStatement {
    if (this.rest.length === 0) {
      throw new ConstructionError('a set operation needs at least two operands', { clause: 'UNION' });
    }
    return {
      kind: 'setOperation',
      first: this.first,
      rest: this.rest.map((part) => ({ ...part })),
      orderBy: [...this.ordering],
      limit: this.limitValue,
      offset: this.offsetValue,
    };
  }

  toSql(dialect: Dialect = this.executor.dialect): CompiledSql {
    const statement = this.toStatement();
    validateStatement(statement, dialect);
    return compile(statement, dialect);
  }

  private plan(): ExecutionPlan {
    return { statement: this.toStatement(), columnTypes: { ...this.resultTypes } };
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

  explain(): Deferred<M, QueryPlan> {
    return this.execution.explain(this.plan());
  }
}

import type { Dialect } from '../dialect/base-dialect.js';
import { ConstructionError } from '../errors/errors.js';
import { as, col, count, gt, lit } from '../ir/builders.js';
import type { AggregateNode, Expression, QueryStatement, SelectStatement, WithClause } from '../ir/types.js';

// Derived statements for the terminal calls. Each takes the assembled
// statement and returns a new one; nothing is mutated.

export const DEPTH_COLUMN = '__depth';

export function emptySelect(): SelectStatement {
  return { kind: 'select', distinct: false, columns: [], joins: [], groupBy: [], orderBy: [] };
}

/** Whether the statement can have its select list swapped without changing which rows it counts. */
function isPlainSelect(statement: QueryStatement): statement is SelectStatement {
  return statement.kind === 'select'
    && !statement.distinct
    && statement.groupBy.length === 0
    && statement.having === undefined
    && statement.limit === undefined
    && statement.offset === undefined;
}

function derived(statement: QueryStatement, alias: string, columns: Expression[]): SelectStatement {
  return {
    ...emptySelect(),
    with: statement.with,
    columns,
    from: { kind: 'subquery', query: { ...statement, with: undefined }, alias },
  };
}

function project(statement: QueryStatement, alias: string, column: Expression): SelectStatement {
  if (isPlainSelect(statement)) {
    return { ...statement, columns: [column], orderBy: [], lock: undefined };
  }
  return derived(statement, alias, [column]);
}

export function countStatement(statement: QueryStatement): SelectStatement {
  return project(statement, 'counted', as(count(), 'count'));
}

export function aggregateStatement(statement: QueryStatement, node: AggregateNode): SelectStatement {
  return project(statement, 'aggregated', as(node, 'value'));
}

/** `SELECT 1 ... LIMIT 1`: stops at the first matching row. */
export function existsStatement(statement: QueryStatement): SelectStatement {
  const probe = as(lit(1), 'present');
  if (isPlainSelect(statement)) {
    return { ...statement, columns: [probe], orderBy: [], limit: 1, lock: undefined };
  }
  return { ...derived(statement, 'probe', [probe]), limit: 1 };
}

export function firstRowStatement(statement: QueryStatement): QueryStatement {
  return { ...statement, limit: 1 };
}

/** Rows of `cte` deeper than the bound; any row means the recursion did not terminate in time. */
export function depthProbeStatement(clause: WithClause, cte: string, maxDepth: number): SelectStatement {
  return {
    ...emptySelect(),
    with: clause,
    columns: [as(lit(1), 'present')],
    from: { kind: 'cteRef', name: cte },
    where: gt(col(DEPTH_COLUMN), maxDepth),
    limit: 1,
  };
}

/** Number of projected columns when it is known without asking the database. */
export function selectWidth(statement: QueryStatement): number | undefined {
  if (statement.kind === 'setOperation') return selectWidth(statement.first);
  if (statement.columns.length === 0) return undefined;
  if (statement.columns.some((c) => c.kind === 'star')) return undefined;
  return statement.columns.length;
}

export function checkPageValue(value: number, clause: 'LIMIT' | 'OFFSET'): number {
  if (!Number.isSafeInteger(value) || value < 0) {
    throw new ConstructionError(`${clause} must be a non-negative integer, got ${value}`, { clause });
  }
  return value;
}

/** Assembler-level checks that do not depend on rendering. */
export function validateStatement(statement: QueryStatement, dialect: Dialect): void {
  if (statement.offset !== undefined && statement.limit === undefined && !dialect.supports('offsetWithoutLimit')) {
    throw new ConstructionError(`OFFSET without LIMIT is not valid on ${dialect.name}`, {
      dialect: dialect.name,
      clause: 'OFFSET',
    });
  }
  if (statement.kind === 'setOperation') {
    validateStatement(statement.first, dialect);
    for (const part of statement.rest) validateStatement(part.query, dialect);
  }
}

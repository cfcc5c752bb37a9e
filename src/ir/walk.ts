import {
  type DepthGuard,
  type Expression,
  type FromSource,
  type GroupItem,
  type QueryStatement,
  type WithClause,
  isSubqueryList,
} from './types.js';

interface Visitor {
  statement?(statement: QueryStatement): void;
  cteRef?(name: string): void;
}

/**
 * Names of every CTE referenced by a statement, through FROM, JOIN,
 * subqueries and set-operation operands. Names defined by a nested WITH are
 * still reported; callers decide which ones are bound.
 */
export function collectCteRefs(statement: QueryStatement): Set<string> {
  const found = new Set<string>();
  visitStatement(statement, { cteRef: (name) => found.add(name) });
  return found;
}

export interface GuardedCte {
  readonly cte: string;
  /** The WITH clause that defines the CTE. */
  readonly clause: WithClause;
  readonly guard: DepthGuard;
}

/** Every depth-guarded recursive CTE in the statement, however deeply nested. */
export function collectDepthGuards(statement: QueryStatement): GuardedCte[] {
  const found: GuardedCte[] = [];
  visitStatement(statement, {
    statement(visited) {
      const clause = visited.with;
      if (!clause) return;
      for (const cte of clause.ctes) {
        if (cte.body.kind === 'recursive' && cte.body.guard) found.push({ cte: cte.name, clause, guard: cte.body.guard });
      }
    },
  });
  return found;
}

function visitStatement(statement: QueryStatement, visitor: Visitor): void {
  visitor.statement?.(statement);
  if (statement.with) visitWith(statement.with, visitor);
  if (statement.kind === 'setOperation') {
    visitStatement(statement.first, visitor);
    for (const part of statement.rest) visitStatement(part.query, visitor);
    for (const term of statement.orderBy) visitExpression(term.expr, visitor);
    return;
  }
  for (const column of statement.columns) visitExpression(column, visitor);
  if (statement.from) visitSource(statement.from, visitor);
  for (const join of statement.joins) {
    visitSource(join.source, visitor);
    if (join.on) visitExpression(join.on, visitor);
  }
  if (statement.where) visitExpression(statement.where, visitor);
  for (const group of statement.groupBy) visitGroupItem(group, visitor);
  if (statement.having) visitExpression(statement.having, visitor);
  for (const term of statement.orderBy) visitExpression(term.expr, visitor);
}

function visitWith(clause: WithClause, visitor: Visitor): void {
  for (const cte of clause.ctes) {
    if (cte.body.kind === 'plain') {
      visitStatement(cte.body.query, visitor);
    } else {
      visitStatement(cte.body.anchor, visitor);
      visitStatement(cte.body.recursive, visitor);
    }
  }
}

function visitSource(source: FromSource, visitor: Visitor): void {
  if (source.kind === 'cteRef') visitor.cteRef?.(source.name);
  else if (source.kind === 'subquery') visitStatement(source.query, visitor);
}

function visitGroupItem(item: GroupItem, visitor: Visitor): void {
  if (item.kind !== 'grouping') {
    visitExpression(item, visitor);
    return;
  }
  for (const set of item.sets) for (const expr of set) visitExpression(expr, visitor);
}

function visitExpression(expr: Expression, visitor: Visitor): void {
  switch (expr.kind) {
    case 'column':
    case 'star':
    case 'literal':
    case 'excluded':
      return;
    case 'cast':
      visitExpression(expr.operand, visitor);
      return;
    case 'exists':
      visitStatement(expr.query, visitor);
      return;
    case 'quantified':
      visitExpression(expr.operand, visitor);
      visitStatement(expr.query, visitor);
      return;
    case 'cteRef':
      visitor.cteRef?.(expr.name);
      return;
    case 'subquery':
      visitStatement(expr.query, visitor);
      return;
    case 'comparison':
    case 'arithmetic':
      visitExpression(expr.left, visitor);
      visitExpression(expr.right, visitor);
      return;
    case 'logical':
      for (const child of expr.children) visitExpression(child, visitor);
      return;
    case 'in':
      visitExpression(expr.operand, visitor);
      if (isSubqueryList(expr.values)) visitStatement(expr.values.query, visitor);
      else for (const value of expr.values) visitExpression(value, visitor);
      return;
    case 'between':
      visitExpression(expr.operand, visitor);
      visitExpression(expr.low, visitor);
      visitExpression(expr.high, visitor);
      return;
    case 'nullCheck':
      visitExpression(expr.operand, visitor);
      return;
    case 'function':
      for (const arg of expr.args) visitExpression(arg, visitor);
      return;
    case 'aggregate':
      if (expr.arg) visitExpression(expr.arg, visitor);
      if (expr.filter) visitExpression(expr.filter, visitor);
      return;
    case 'window':
      visitExpression(expr.func, visitor);
      for (const part of expr.partitionBy) visitExpression(part, visitor);
      for (const term of expr.orderBy) visitExpression(term.expr, visitor);
      return;
    case 'case':
      for (const branch of expr.whens) {
        visitExpression(branch.when, visitor);
        visitExpression(branch.then, visitor);
      }
      if (expr.otherwise) visitExpression(expr.otherwise, visitor);
      return;
  }
}

/**
 * Turn table references that name one of `names` into CTE references,
 * through FROM, JOIN, derived tables and set-operation operands.
 */
export function bindCteNames<S extends QueryStatement>(statement: S, names: ReadonlySet<string>): S;
export function bindCteNames(statement: QueryStatement, names: ReadonlySet<string>): QueryStatement {
  if (names.size === 0) return statement;
  if (statement.kind === 'setOperation') {
    return {
      ...statement,
      first: bindCteNames(statement.first, names),
      rest: statement.rest.map((part) => ({ op: part.op, query: bindCteNames(part.query, names) })),
    };
  }
  return {
    ...statement,
    from: statement.from && bindSource(statement.from, names),
    joins: statement.joins.map((join) => ({ ...join, source: bindSource(join.source, names) })),
  };
}

function bindSource(source: FromSource, names: ReadonlySet<string>): FromSource {
  if (source.kind === 'table' && names.has(source.name)) {
    return source.alias === undefined
      ? { kind: 'cteRef', name: source.name }
      : { kind: 'cteRef', name: source.name, alias: source.alias };
  }
  if (source.kind === 'subquery') return { ...source, query: bindCteNames(source.query, names) };
  return source;
}

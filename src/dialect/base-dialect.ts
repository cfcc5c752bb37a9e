/**
 * Dialect abstraction.
 * One format method per node variant; subclasses override quoting,
 * placeholder style, capability flags and the clauses whose syntax differs.
 */

import { CapabilityError, ConstructionError } from '../errors/errors.js';
import type { RenderContext } from '../generator/sql.js';
import type {
  AggregateNode,
  ArithmeticNode,
  Assignment,
  BetweenNode,
  CaseNode,
  CastNode,
  ColumnNode,
  ComparisonNode,
  ConflictClause,
  CreateTableStatement,
  CteDefinition,
  CteRefNode,
  DeleteStatement,
  DropTableStatement,
  ExcludedNode,
  ExistsNode,
  Expression,
  FrameBound,
  FromSource,
  FunctionNode,
  GroupItem,
  GroupingMode,
  GroupingNode,
  InNode,
  InsertStatement,
  JoinClause,
  LiteralNode,
  LockMode,
  LogicalNode,
  NullCheckNode,
  OrderTerm,
  QuantifiedNode,
  QueryStatement,
  SelectStatement,
  SetOperationStatement,
  SetOperator,
  StarNode,
  Statement,
  SubqueryNode,
  UpdateStatement,
  WindowFrame,
  WindowNode,
  WithClause,
} from '../ir/types.js';
import { isSubqueryList } from '../ir/types.js';
import { LogicalType } from '../types/logical-type.js';
import type { TypeMapping } from '../types/type-mapping.js';
import { type Capability, type DialectCapabilities, type Version, formatVersion } from './capabilities.js';

export type ParamStyle = 'qmark' | 'format' | 'numeric';

export enum IsolationLevel {
  READ_UNCOMMITTED = 'READ UNCOMMITTED',
  READ_COMMITTED = 'READ COMMITTED',
  REPEATABLE_READ = 'REPEATABLE READ',
  SERIALIZABLE = 'SERIALIZABLE'
}

export interface TransactionOptions {
  isolationLevel?: IsolationLevel;
  readOnly?: boolean;
}

export interface Dialect {
  readonly name: string;
  readonly version: Version;
  readonly paramStyle: ParamStyle;
  readonly typeMapping: TypeMapping;
  readonly capabilities: Readonly<DialectCapabilities>;

  supports(feature: Capability): boolean;
  formatIdentifier(name: string): string;
  formatLiteralPlaceholder(position: number): string;
  formatColumnReference(table: string | undefined, name: string): string;
  formatExpression(node: Expression, ctx: RenderContext): string;
  formatStatement(statement: Statement, ctx: RenderContext): string;
  formatLimitOffset(limit: number | undefined, offset: number | undefined, ctx: RenderContext): string;
  formatReturningClause(columns: readonly string[]): string;
  formatCte(cte: CteDefinition, recursive: boolean, ctx: RenderContext): string;
  formatWindow(node: WindowNode, ctx: RenderContext): string;
  formatSetOperator(op: SetOperator): string;
  formatLockClause(mode: LockMode): string;
  formatBeginTransaction(options: TransactionOptions): string[];
  formatCommit(): string;
  formatRollback(): string;
  formatSavepoint(name: string): string;
  formatReleaseSavepoint(name: string): string;
  formatRollbackToSavepoint(name: string): string;
  formatExplain(sql: string): string;
}

export interface DialectInit {
  name: string;
  version: Version;
  paramStyle: ParamStyle;
  typeMapping: TypeMapping;
  capabilities: DialectCapabilities;
}

const GROUPING_CAPABILITY: Readonly<Record<GroupingMode, Capability>> = {
  ROLLUP: 'rollup',
  CUBE: 'cube',
  'GROUPING SETS': 'groupingSets',
};

function assertNever(value: never): never {
  throw new ConstructionError(`unknown node ${JSON.stringify(value)}`);
}

export abstract class BaseDialect implements Dialect {
  readonly name: string;
  readonly version: Version;
  readonly paramStyle: ParamStyle;
  readonly typeMapping: TypeMapping;
  readonly capabilities: Readonly<DialectCapabilities>;

  protected constructor(init: DialectInit) {
    this.name = init.name;
    this.version = init.version;
    this.paramStyle = init.paramStyle;
    this.typeMapping = init.typeMapping;
    this.capabilities = Object.freeze({ ...init.capabilities });
  }

  supports(feature: Capability): boolean {
    return this.capabilities[feature];
  }

  protected require(feature: Capability, clause: string, what: string): void {
    if (!this.capabilities[feature]) this.unsupported(what, clause);
  }

  protected unsupported(what: string, clause: string): never {
    throw new CapabilityError(`${what}: not supported by ${this.name} ${formatVersion(this.version)}`, {
      dialect: this.name,
      clause,
    });
  }

  protected fail(detail: string, clause: string): never {
    throw new ConstructionError(detail, { dialect: this.name, clause });
  }

  // Identifiers and placeholders

  formatIdentifier(name: string): string {
    return `"${name.replace(/"/g, '""')}"`;
  }

  formatLiteralPlaceholder(position: number): string {
    switch (this.paramStyle) {
      case 'qmark':
        return '?';
      case 'format':
        return '%s';
      case 'numeric':
        return `$${position}`;
    }
  }

  formatColumnReference(table: string | undefined, name: string): string {
    const column = name === '*' ? '*' : this.formatIdentifier(name);
    return table ? `${this.formatIdentifier(table)}.${column}` : column;
  }

  // Expressions

  formatExpression(node: Expression, ctx: RenderContext): string {
    switch (node.kind) {
      case 'column':
        return this.formatColumn(node);
      case 'star':
        return this.formatStar(node);
      case 'literal':
        return this.formatLiteral(node, ctx);
      case 'comparison':
        return this.formatComparison(node, ctx);
      case 'logical':
        return this.formatLogical(node, ctx);
      case 'in':
        return this.formatIn(node, ctx);
      case 'between':
        return this.formatBetween(node, ctx);
      case 'nullCheck':
        return this.formatNullCheck(node, ctx);
      case 'arithmetic':
        return this.formatArithmetic(node, ctx);
      case 'function':
        return this.formatFunction(node, ctx);
      case 'aggregate':
        return this.formatAggregate(node, ctx);
      case 'window':
        return this.formatWindow(node, ctx);
      case 'case':
        return this.formatCase(node, ctx);
      case 'cteRef':
        return this.formatCteRef(node);
      case 'subquery':
        return this.formatSubquery(node, ctx);
      case 'cast':
        return this.formatCast(node, ctx);
      case 'exists':
        return this.formatExists(node, ctx);
      case 'quantified':
        return this.formatQuantified(node, ctx);
      case 'excluded':
        return this.formatExcluded(node);
      default:
        return assertNever(node);
    }
  }

  formatColumn(node: ColumnNode): string {
    return this.formatColumnReference(node.table, node.name);
  }

  formatStar(node: StarNode): string {
    return node.table ? `${this.formatIdentifier(node.table)}.*` : '*';
  }

  formatLiteral(node: LiteralNode, ctx: RenderContext): string {
    return ctx.bind(node.value, node.type);
  }

  formatComparison(node: ComparisonNode, ctx: RenderContext): string {
    return `${this.operand(node.left, ctx)} ${node.op} ${this.operand(node.right, ctx)}`;
  }

  /** Children are parenthesized only when they combine with a different operator. */
  formatLogical(node: LogicalNode, ctx: RenderContext): string {
    if (node.op === 'NOT') {
      if (node.children.length !== 1) this.fail('NOT takes exactly one operand', 'WHERE');
      return `NOT (${ctx.expr(node.children[0])})`;
    }
    if (node.children.length === 0) this.fail(`${node.op} needs at least one condition`, 'WHERE');
    return node.children
      .map((child) => {
        const sql = ctx.expr(child);
        return child.kind === 'logical' && child.op !== node.op && child.op !== 'NOT' ? `(${sql})` : sql;
      })
      .join(` ${node.op} `);
  }

  formatIn(node: InNode, ctx: RenderContext): string {
    const operand = this.operand(node.operand, ctx);
    const keyword = node.negated ? 'NOT IN' : 'IN';
    if (isSubqueryList(node.values)) {
      return `${operand} ${keyword} (${ctx.statement(node.values.query)})`;
    }
    if (node.values.length === 0) this.fail('IN list is empty', 'WHERE');
    return `${operand} ${keyword} (${node.values.map((v) => ctx.expr(v)).join(', ')})`;
  }

  formatBetween(node: BetweenNode, ctx: RenderContext): string {
    const keyword = node.negated ? 'NOT BETWEEN' : 'BETWEEN';
    return `${this.operand(node.operand, ctx)} ${keyword} ${this.operand(node.low, ctx)} AND ${this.operand(node.high, ctx)}`;
  }

  formatNullCheck(node: NullCheckNode, ctx: RenderContext): string {
    return `${this.operand(node.operand, ctx)} ${node.negated ? 'IS NOT NULL' : 'IS NULL'}`;
  }

  formatArithmetic(node: ArithmeticNode, ctx: RenderContext): string {
    return `${this.operand(node.left, ctx)} ${node.op} ${this.operand(node.right, ctx)}`;
  }

  formatFunction(node: FunctionNode, ctx: RenderContext): string {
    return `${node.name}(${node.args.map((arg) => ctx.expr(arg)).join(', ')})`;
  }

  formatAggregate(node: AggregateNode, ctx: RenderContext): string {
    let arg: string;
    if (node.arg === undefined) {
      if (node.func !== 'COUNT') this.fail(`${node.func} needs an argument`, 'SELECT');
      if (node.distinct) this.fail('COUNT(DISTINCT *) is not valid', 'SELECT');
      arg = '*';
    } else {
      arg = (node.distinct ? 'DISTINCT ' : '') + ctx.expr(node.arg);
    }
    let sql = `${node.func}(${arg})`;
    if (node.filter) {
      this.require('filterClause', 'FILTER', 'aggregate FILTER');
      sql += ` FILTER (WHERE ${ctx.expr(node.filter)})`;
    }
    return sql;
  }

  formatWindow(node: WindowNode, ctx: RenderContext): string {
    this.require('windowFunctions', 'OVER', 'window functions');
    const func = ctx.expr(node.func);
    const spec: string[] = [];
    if (node.partitionBy.length) {
      spec.push(`PARTITION BY ${node.partitionBy.map((p) => ctx.expr(p)).join(', ')}`);
    }
    if (node.orderBy.length) spec.push(`ORDER BY ${this.formatOrderTerms(node.orderBy, ctx)}`);
    if (node.frame) spec.push(this.formatFrame(node.frame));
    return `${func} OVER (${spec.join(' ')})`;
  }

  protected formatFrame(frame: WindowFrame): string {
    if (!frame.end) return `${frame.unit} ${this.formatFrameBound(frame.start)}`;
    return `${frame.unit} BETWEEN ${this.formatFrameBound(frame.start)} AND ${this.formatFrameBound(frame.end)}`;
  }

  // Frame offsets are structural and validated, so they render inline.
  protected formatFrameBound(bound: FrameBound): string {
    switch (bound.kind) {
      case 'unboundedPreceding':
        return 'UNBOUNDED PRECEDING';
      case 'unboundedFollowing':
        return 'UNBOUNDED FOLLOWING';
      case 'currentRow':
        return 'CURRENT ROW';
      case 'preceding':
      case 'following': {
        const offset = bound.offset ?? 0;
        if (!Number.isInteger(offset) || offset < 0) this.fail('frame offset must be a non-negative integer', 'OVER');
        return `${offset} ${bound.kind === 'preceding' ? 'PRECEDING' : 'FOLLOWING'}`;
      }
    }
  }

  formatCase(node: CaseNode, ctx: RenderContext): string {
    const parts = ['CASE'];
    for (const branch of node.whens) {
      parts.push(`WHEN ${ctx.expr(branch.when)} THEN ${ctx.expr(branch.then)}`);
    }
    if (node.otherwise) parts.push(`ELSE ${ctx.expr(node.otherwise)}`);
    parts.push('END');
    return parts.join(' ');
  }

  formatCteRef(node: CteRefNode): string {
    return this.formatIdentifier(node.name);
  }

  formatSubquery(node: SubqueryNode, ctx: RenderContext): string {
    return `(${ctx.statement(node.query)})`;
  }

  formatCast(node: CastNode, ctx: RenderContext): string {
    return `CAST(${ctx.expr(node.operand)} AS ${this.formatCastType(node.type)})`;
  }

  protected formatCastType(type: LogicalType): string {
    return this.typeMapping.nativeType(type);
  }

  formatExists(node: ExistsNode, ctx: RenderContext): string {
    return `${node.negated ? 'NOT EXISTS' : 'EXISTS'} (${ctx.statement(node.query)})`;
  }

  formatQuantified(node: QuantifiedNode, ctx: RenderContext): string {
    this.require('quantifiedSubquery', node.quantifier, `${node.quantifier} subqueries`);
    return `${this.operand(node.operand, ctx)} ${node.op} ${node.quantifier} (${ctx.statement(node.query)})`;
  }

  formatExcluded(node: ExcludedNode): string {
    return `excluded.${this.formatIdentifier(node.name)}`;
  }

  /** Operands of binary operators: nested operators get parentheses. */
  protected operand(node: Expression, ctx: RenderContext): string {
    const sql = ctx.expr(node);
    switch (node.kind) {
      case 'comparison':
      case 'logical':
      case 'arithmetic':
      case 'in':
      case 'between':
      case 'nullCheck':
      case 'quantified':
        return `(${sql})`;
      default:
        return sql;
    }
  }

  protected formatProjection(node: Expression, ctx: RenderContext): string {
    const sql = ctx.expr(node);
    const alias = 'alias' in node ? node.alias : undefined;
    return alias ? `${sql} AS ${this.formatIdentifier(alias)}` : sql;
  }

  protected formatOrderTerms(terms: readonly OrderTerm[], ctx: RenderContext): string {
    return terms
      .map((term) => {
        let sql = ctx.expr(term.expr);
        if (term.direction) sql += ` ${term.direction}`;
        if (term.nulls) {
          this.require('nullsOrdering', 'ORDER BY', 'NULLS FIRST/LAST');
          sql += ` NULLS ${term.nulls}`;
        }
        return sql;
      })
      .join(', ');
  }

  // Statements

  formatStatement(statement: Statement, ctx: RenderContext): string {
    switch (statement.kind) {
      case 'select':
        return this.formatSelect(statement, ctx);
      case 'setOperation':
        return this.formatSetOperation(statement, ctx);
      case 'insert':
        return this.formatInsert(statement, ctx);
      case 'update':
        return this.formatUpdate(statement, ctx);
      case 'delete':
        return this.formatDelete(statement, ctx);
      case 'createTable':
        return this.formatCreateTable(statement);
      case 'dropTable':
        return this.formatDropTable(statement);
      default:
        return assertNever(statement);
    }
  }

  formatSelect(statement: SelectStatement, ctx: RenderContext): string {
    const parts: string[] = [];
    if (statement.with) parts.push(this.formatWithClause(statement.with, ctx));
    const columns = statement.columns.length
      ? statement.columns.map((c) => this.formatProjection(c, ctx)).join(', ')
      : '*';
    parts.push(`SELECT ${statement.distinct ? 'DISTINCT ' : ''}${columns}`);
    if (statement.from) parts.push(`FROM ${this.formatSource(statement.from, ctx)}`);
    for (const join of statement.joins) parts.push(this.formatJoin(join, ctx));
    if (statement.where) parts.push(`WHERE ${ctx.expr(statement.where)}`);
    if (statement.groupBy.length) parts.push(`GROUP BY ${this.formatGroupBy(statement.groupBy, ctx)}`);
    if (statement.having) parts.push(`HAVING ${ctx.expr(statement.having)}`);
    if (statement.orderBy.length) parts.push(`ORDER BY ${this.formatOrderTerms(statement.orderBy, ctx)}`);
    const page = this.formatLimitOffset(statement.limit, statement.offset, ctx);
    if (page) parts.push(page);
    if (statement.lock) parts.push(this.formatLockClause(statement.lock));
    return parts.join(' ');
  }

  protected formatGroupBy(items: readonly GroupItem[], ctx: RenderContext): string {
    return items.map((item) => (item.kind === 'grouping' ? this.formatGrouping(item, ctx) : ctx.expr(item))).join(', ');
  }

  protected requireGrouping(mode: GroupingMode): void {
    this.require(GROUPING_CAPABILITY[mode], 'GROUP BY', mode);
  }

  /** ROLLUP and CUBE elements are bare unless composite; every grouping set is parenthesized. */
  protected formatGrouping(node: GroupingNode, ctx: RenderContext): string {
    this.requireGrouping(node.mode);
    const sets = node.sets.map((set) =>
      node.mode !== 'GROUPING SETS' && set.length === 1
        ? ctx.expr(set[0])
        : `(${set.map((e) => ctx.expr(e)).join(', ')})`,
    );
    return `${node.mode} (${sets.join(', ')})`;
  }

  formatSource(source: FromSource, ctx: RenderContext): string {
    switch (source.kind) {
      case 'table':
      case 'cteRef': {
        const name = this.formatIdentifier(source.name);
        return source.alias ? `${name} AS ${this.formatIdentifier(source.alias)}` : name;
      }
      case 'subquery':
        if (!source.alias) this.fail('a subquery in FROM needs an alias', 'FROM');
        return `(${ctx.statement(source.query)}) AS ${this.formatIdentifier(source.alias)}`;
    }
  }

  formatJoin(join: JoinClause, ctx: RenderContext): string {
    switch (join.type) {
      case 'RIGHT':
        this.require('rightJoin', 'JOIN', 'RIGHT JOIN');
        break;
      case 'FULL':
        this.require('fullJoin', 'JOIN', 'FULL OUTER JOIN');
        break;
      default:
        break;
    }
    const keyword = join.type === 'FULL' ? 'FULL OUTER JOIN' : `${join.type} JOIN`;
    const source = this.formatSource(join.source, ctx);
    if (join.type === 'CROSS') {
      if (join.on) this.fail('CROSS JOIN takes no ON condition', 'JOIN');
      return `${keyword} ${source}`;
    }
    if (!join.on) this.fail(`${join.type} JOIN needs an ON condition`, 'JOIN');
    return `${keyword} ${source} ON ${ctx.expr(join.on)}`;
  }

  formatLimitOffset(limit: number | undefined, offset: number | undefined, ctx: RenderContext): string {
    const parts: string[] = [];
    if (offset !== undefined && limit === undefined && !this.capabilities.offsetWithoutLimit) {
      this.fail(`OFFSET requires LIMIT on ${this.name}`, 'OFFSET');
    }
    if (limit !== undefined) parts.push(`LIMIT ${ctx.bind(limit, LogicalType.INTEGER)}`);
    if (offset !== undefined) parts.push(`OFFSET ${ctx.bind(offset, LogicalType.INTEGER)}`);
    return parts.join(' ');
  }

  formatLockClause(mode: LockMode): string {
    this.require('rowLocking', `FOR ${mode}`, 'row locking');
    return `FOR ${mode}`;
  }

  formatWithClause(clause: WithClause, ctx: RenderContext): string {
    this.require('cte', 'WITH', 'common table expressions');
    if (clause.recursive) this.require('recursiveCte', 'WITH RECURSIVE', 'recursive common table expressions');
    if (clause.ctes.length === 0) this.fail('WITH needs at least one CTE', 'WITH');
    const ctes = clause.ctes.map((cte) => this.formatCte(cte, clause.recursive, ctx)).join(', ');
    return `WITH ${clause.recursive ? 'RECURSIVE ' : ''}${ctes}`;
  }

  formatCte(cte: CteDefinition, recursive: boolean, ctx: RenderContext): string {
    const columns = cte.columns?.length
      ? `(${cte.columns.map((c) => this.formatIdentifier(c)).join(', ')})`
      : '';
    let body: string;
    if (cte.body.kind === 'recursive') {
      if (!recursive) this.fail(`CTE "${cte.name}" is recursive but WITH is not`, 'WITH');
      body = `${ctx.statement(cte.body.anchor)} UNION ALL ${ctx.statement(cte.body.recursive)}`;
    } else {
      body = ctx.statement(cte.body.query);
    }
    let hint = '';
    if (cte.materialized !== undefined) {
      this.require('materializedCte', 'WITH', 'MATERIALIZED hints');
      hint = cte.materialized ? 'MATERIALIZED ' : 'NOT MATERIALIZED ';
    }
    return `${this.formatIdentifier(cte.name)}${columns} AS ${hint}(${body})`;
  }

  formatSetOperator(op: SetOperator): string {
    if (op === 'INTERSECT') this.require('intersect', op, 'INTERSECT');
    if (op === 'EXCEPT') this.require('except', op, 'EXCEPT');
    return op;
  }

  formatSetOperation(statement: SetOperationStatement, ctx: RenderContext): string {
    const parts: string[] = [];
    if (statement.with) parts.push(this.formatWithClause(statement.with, ctx));
    parts.push(this.formatSetOperand(statement.first, ctx));
    for (const part of statement.rest) {
      parts.push(this.formatSetOperator(part.op));
      parts.push(this.formatSetOperand(part.query, ctx));
    }
    if (statement.orderBy.length) parts.push(`ORDER BY ${this.formatOrderTerms(statement.orderBy, ctx)}`);
    const page = this.formatLimitOffset(statement.limit, statement.offset, ctx);
    if (page) parts.push(page);
    return parts.join(' ');
  }

  protected formatSetOperand(query: QueryStatement, ctx: RenderContext): string {
    const sql = ctx.statement(query);
    if (this.capabilities.parenthesizedSetOperands) return `(${sql})`;
    return needsDerivedTable(query) ? `SELECT * FROM (${sql})` : sql;
  }

  formatReturningClause(columns: readonly string[]): string {
    this.require('returning', 'RETURNING', 'RETURNING');
    const list = columns.map((c) => (c === '*' ? '*' : this.formatIdentifier(c))).join(', ');
    return `RETURNING ${list}`;
  }

  formatInsert(statement: InsertStatement, ctx: RenderContext): string {
    const table = this.formatIdentifier(statement.table);
    let sql: string;
    if (statement.columns.length === 0) {
      sql = `INSERT INTO ${table} DEFAULT VALUES`;
    } else {
      if (statement.rows.length === 0) this.fail('INSERT needs at least one row', 'VALUES');
      const columns = statement.columns.map((c) => this.formatIdentifier(c)).join(', ');
      const rows = statement.rows.map((row) => {
        if (row.length !== statement.columns.length) {
          this.fail(`row has ${row.length} values for ${statement.columns.length} columns`, 'VALUES');
        }
        return `(${row.map((v) => ctx.expr(v)).join(', ')})`;
      });
      sql = `INSERT INTO ${table} (${columns}) VALUES ${rows.join(', ')}`;
    }
    if (statement.onConflict) {
      if (statement.columns.length === 0) this.fail('an upsert needs at least one column', 'VALUES');
      sql += ` ${this.formatConflict(statement.onConflict, ctx)}`;
    }
    if (statement.returning.length) sql += ` ${this.formatReturningClause(statement.returning)}`;
    return sql;
  }

  protected formatConflict(clause: ConflictClause, ctx: RenderContext): string {
    this.require('upsert', 'ON CONFLICT', 'upsert');
    const target = clause.target.length ? ` (${clause.target.map((c) => this.formatIdentifier(c)).join(', ')})` : '';
    if (clause.action.kind === 'nothing') return `ON CONFLICT${target} DO NOTHING`;
    if (!target) this.fail('ON CONFLICT DO UPDATE needs a conflict target', 'ON CONFLICT');
    return `ON CONFLICT${target} DO UPDATE SET ${this.formatAssignments(clause.action.assignments, ctx)}`;
  }

  protected formatAssignments(assignments: readonly Assignment[], ctx: RenderContext): string {
    return assignments.map((a) => `${this.formatIdentifier(a.column)} = ${ctx.expr(a.value)}`).join(', ');
  }

  formatUpdate(statement: UpdateStatement, ctx: RenderContext): string {
    if (statement.assignments.length === 0) this.fail('UPDATE needs at least one assignment', 'SET');
    let sql = `UPDATE ${this.formatIdentifier(statement.table)} SET ${this.formatAssignments(statement.assignments, ctx)}`;
    if (statement.where) sql += ` WHERE ${ctx.expr(statement.where)}`;
    if (statement.returning.length) sql += ` ${this.formatReturningClause(statement.returning)}`;
    return sql;
  }

  formatDelete(statement: DeleteStatement, ctx: RenderContext): string {
    let sql = `DELETE FROM ${this.formatIdentifier(statement.table)}`;
    if (statement.where) sql += ` WHERE ${ctx.expr(statement.where)}`;
    if (statement.returning.length) sql += ` ${this.formatReturningClause(statement.returning)}`;
    return sql;
  }

  formatCreateTable(statement: CreateTableStatement): string {
    if (statement.columns.length === 0) this.fail('CREATE TABLE needs at least one column', 'CREATE TABLE');
    const defs = statement.columns.map((column) => {
      let def = `${this.formatIdentifier(column.name)} ${this.typeMapping.nativeType(column.type)}`;
      if (column.nullable === false) def += ' NOT NULL';
      if (column.unique) def += ' UNIQUE';
      if (column.references) {
        def += ` REFERENCES ${this.formatIdentifier(column.references.table)} (${this.formatIdentifier(column.references.column)})`;
      }
      return def;
    });
    if (statement.primaryKey.length) {
      defs.push(`PRIMARY KEY (${statement.primaryKey.map((c) => this.formatIdentifier(c)).join(', ')})`);
    }
    const exists = statement.ifNotExists ? 'IF NOT EXISTS ' : '';
    return `CREATE TABLE ${exists}${this.formatIdentifier(statement.table)} (${defs.join(', ')})`;
  }

  formatDropTable(statement: DropTableStatement): string {
    return `DROP TABLE ${statement.ifExists ? 'IF EXISTS ' : ''}${this.formatIdentifier(statement.table)}`;
  }

  // Transactions

  formatBeginTransaction(options: TransactionOptions): string[] {
    const modes: string[] = [];
    if (options.isolationLevel) modes.push(`ISOLATION LEVEL ${options.isolationLevel}`);
    if (options.readOnly) {
      this.require('readOnlyTransactions', 'BEGIN', 'read-only transactions');
      modes.push('READ ONLY');
    }
    return [modes.length ? `BEGIN ${modes.join(', ')}` : 'BEGIN'];
  }

  formatCommit(): string {
    return 'COMMIT';
  }

  formatRollback(): string {
    return 'ROLLBACK';
  }

  formatSavepoint(name: string): string {
    return `SAVEPOINT ${this.formatIdentifier(name)}`;
  }

  formatReleaseSavepoint(name: string): string {
    return `RELEASE SAVEPOINT ${this.formatIdentifier(name)}`;
  }

  formatRollbackToSavepoint(name: string): string {
    return `ROLLBACK TO SAVEPOINT ${this.formatIdentifier(name)}`;
  }

  formatExplain(sql: string): string {
    return `EXPLAIN ${sql}`;
  }
}

/** Operands that cannot stand bare between set operators. */
export function needsDerivedTable(query: QueryStatement): boolean {
  if (query.kind === 'setOperation') return true;
  return Boolean(query.with) || query.orderBy.length > 0 || query.limit !== undefined || query.offset !== undefined;
}

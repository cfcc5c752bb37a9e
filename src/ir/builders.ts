import { ConstructionError } from '../errors/errors.js';
import { type AppValue, type LogicalType, inferLogicalType } from '../types/logical-type.js';
import type {
  AggregateFunc,
  AggregateNode,
  ArithmeticOp,
  CastNode,
  ComparisonOp,
  CteRefNode,
  Expression,
  FunctionNode,
  GroupingMode,
  GroupingNode,
  LiteralNode,
  NullsOrder,
  OrderTerm,
  QuantifiedOp,
  QueryStatement,
  StatementSource,
  SubqueryNode,
  TableRef,
  WindowFrame,
  WindowNode,
} from './types.js';

/** A column name on the left, a value on the right. */
export type Operand = Expression | string;
export type ValueOperand = Expression | AppValue;

const IDENTIFIER = /^[A-Za-z_][A-Za-z0-9_]*$/;

// Nodes made by these builders. Plain objects shaped like a node are data (a JSON value), never SQL.
const built = new WeakSet<object>();

function node<T extends Expression | TableRef | GroupingNode>(value: T): T {
  built.add(value);
  return value;
}

export function isExpression(value: unknown): value is Expression {
  return typeof value === 'object' && value !== null && built.has(value);
}

function isSubqueryNode(value: object): value is SubqueryNode {
  return isExpression(value) && value.kind === 'subquery';
}

export function isStatementSource(value: object): value is StatementSource {
  return 'toStatement' in value && typeof value.toStatement === 'function';
}

/** `col('users.name')` qualifies, `col('name')` does not. */
export function col(name: string, table?: string): Expression {
  if (table === undefined) {
    const dot = name.indexOf('.');
    if (dot > 0) return node({ kind: 'column', table: name.slice(0, dot), name: name.slice(dot + 1) });
  }
  return node(table === undefined ? { kind: 'column', name } : { kind: 'column', table, name });
}

export function star(table?: string): Expression {
  return node(table === undefined ? { kind: 'star' } : { kind: 'star', table });
}

export function lit(value: AppValue, type?: LogicalType): LiteralNode {
  return node({ kind: 'literal', value, type: type ?? inferLogicalType(value) });
}

export function table(name: string, alias?: string): TableRef {
  return node(alias === undefined ? { kind: 'table', name } : { kind: 'table', name, alias });
}

export function toOperand(value: Operand): Expression {
  return typeof value === 'string' ? col(value) : value;
}

export function toValue(value: ValueOperand): Expression {
  return isExpression(value) ? value : lit(value);
}

function compare(op: ComparisonOp) {
  return (left: Operand, right: ValueOperand): Expression =>
    node({ kind: 'comparison', left: toOperand(left), op, right: toValue(right) });
}

export const eq = compare('=');
export const ne = compare('!=');
export const lt = compare('<');
export const lte = compare('<=');
export const gt = compare('>');
export const gte = compare('>=');
export const like = compare('LIKE');
export const notLike = compare('NOT LIKE');
export const glob = compare('GLOB');

function combine(op: 'AND' | 'OR', parts: readonly Expression[]): Expression {
  if (parts.length === 0) {
    throw new ConstructionError(`${op} needs at least one condition`, { clause: 'WHERE' });
  }
  const children = parts.flatMap((part) => (part.kind === 'logical' && part.op === op ? part.children : [part]));
  if (children.length === 1) return children[0];
  return node({ kind: 'logical', op, children });
}

export function and(...parts: Expression[]): Expression {
  return combine('AND', parts);
}

export function or(...parts: Expression[]): Expression {
  return combine('OR', parts);
}

export function not(child: Expression): Expression {
  return node({ kind: 'logical', op: 'NOT', children: [child] });
}

function membership(negated: boolean) {
  return (operand: Operand, values: readonly ValueOperand[] | SubqueryNode | StatementSource): Expression => {
    let list: readonly Expression[] | SubqueryNode;
    if (isSubqueryNode(values)) list = values;
    else if (isStatementSource(values)) list = subquery(values);
    else list = values.map(toValue);
    return node({ kind: 'in', operand: toOperand(operand), values: list, negated });
  };
}

export const inList = membership(false);
export const notIn = membership(true);

export function between(operand: Operand, low: ValueOperand, high: ValueOperand): Expression {
  return node({ kind: 'between', operand: toOperand(operand), low: toValue(low), high: toValue(high), negated: false });
}

export function notBetween(operand: Operand, low: ValueOperand, high: ValueOperand): Expression {
  return node({ kind: 'between', operand: toOperand(operand), low: toValue(low), high: toValue(high), negated: true });
}

export function isNull(operand: Operand): Expression {
  return node({ kind: 'nullCheck', operand: toOperand(operand), negated: false });
}

export function isNotNull(operand: Operand): Expression {
  return node({ kind: 'nullCheck', operand: toOperand(operand), negated: true });
}

function arithmetic(op: ArithmeticOp) {
  return (left: Operand, right: ValueOperand): Expression =>
    node({ kind: 'arithmetic', left: toOperand(left), op, right: toValue(right) });
}

export const add = arithmetic('+');
export const sub = arithmetic('-');
export const mul = arithmetic('*');
export const div = arithmetic('/');
export const mod = arithmetic('%');
export const concat = arithmetic('||');

/** Scalar function call. The name is an identifier, never free text. */
export function fn(name: string, ...args: ValueOperand[]): FunctionNode {
  if (!IDENTIFIER.test(name)) {
    throw new ConstructionError(`invalid function name ${JSON.stringify(name)}`, { clause: 'SELECT' });
  }
  return node({ kind: 'function', name: name.toUpperCase(), args: args.map(toValue) });
}

interface AggregateOptions {
  distinct?: boolean;
  filter?: Expression;
}

function aggregate(func: AggregateFunc) {
  return (arg?: Operand, options: AggregateOptions = {}): AggregateNode => {
    const base: AggregateNode = { kind: 'aggregate', func, distinct: options.distinct ?? false };
    return node({
      ...base,
      ...(arg === undefined ? {} : { arg: toOperand(arg) }),
      ...(options.filter === undefined ? {} : { filter: options.filter }),
    });
  };
}

/** `count()` is COUNT(*). */
export const count = aggregate('COUNT');
export const sum = aggregate('SUM');
export const avg = aggregate('AVG');
export const min = aggregate('MIN');
export const max = aggregate('MAX');

export interface WindowSpec {
  partitionBy?: readonly Operand[];
  orderBy?: readonly (OrderTerm | Operand)[];
  frame?: WindowFrame;
}

export function toOrderTerm(term: OrderTerm | Operand): OrderTerm {
  if (typeof term === 'string') {
    return term.startsWith('-') ? { expr: col(term.slice(1)), direction: 'DESC' } : { expr: col(term) };
  }
  return 'expr' in term ? term : { expr: term };
}

export function over(func: AggregateNode | FunctionNode, spec: WindowSpec = {}): WindowNode {
  return node({
    kind: 'window',
    func,
    partitionBy: (spec.partitionBy ?? []).map(toOperand),
    orderBy: (spec.orderBy ?? []).map(toOrderTerm),
    ...(spec.frame === undefined ? {} : { frame: spec.frame }),
  });
}

export function rowNumber(spec: WindowSpec = {}): WindowNode {
  return over({ kind: 'function', name: 'ROW_NUMBER', args: [] }, spec);
}

export function rank(spec: WindowSpec = {}): WindowNode {
  return over({ kind: 'function', name: 'RANK', args: [] }, spec);
}

export function denseRank(spec: WindowSpec = {}): WindowNode {
  return over({ kind: 'function', name: 'DENSE_RANK', args: [] }, spec);
}

export function caseWhen(
  whens: readonly (readonly [Expression, ValueOperand])[],
  otherwise?: ValueOperand,
): Expression {
  if (whens.length === 0) throw new ConstructionError('CASE needs at least one WHEN branch', { clause: 'CASE' });
  return node({
    kind: 'case',
    whens: whens.map(([when, then]) => ({ when, then: toValue(then) })),
    ...(otherwise === undefined ? {} : { otherwise: toValue(otherwise) }),
  });
}

export function cteRef(name: string, alias?: string): CteRefNode {
  return node(alias === undefined ? { kind: 'cteRef', name } : { kind: 'cteRef', name, alias });
}

function queryOf(source: StatementSource | QueryStatement): QueryStatement {
  return 'toStatement' in source ? source.toStatement() : source;
}

export function subquery(source: StatementSource | QueryStatement, alias?: string): SubqueryNode {
  const query = queryOf(source);
  return node(alias === undefined ? { kind: 'subquery', query } : { kind: 'subquery', query, alias });
}

/** `CAST(operand AS <native type of type>)`; results read back as `type`. */
export function cast(operand: Operand, type: LogicalType): CastNode {
  return node({ kind: 'cast', operand: toOperand(operand), type });
}

export function exists(source: StatementSource | QueryStatement): Expression {
  return node({ kind: 'exists', query: queryOf(source), negated: false });
}

export function notExists(source: StatementSource | QueryStatement): Expression {
  return node({ kind: 'exists', query: queryOf(source), negated: true });
}

/** `operand op ANY (subquery)`: true when the comparison holds for some row. */
export function anyOf(operand: Operand, op: QuantifiedOp, source: StatementSource | QueryStatement): Expression {
  return node({ kind: 'quantified', operand: toOperand(operand), op, quantifier: 'ANY', query: queryOf(source) });
}

/** `operand op ALL (subquery)`: true when the comparison holds for every row. */
export function allOf(operand: Operand, op: QuantifiedOp, source: StatementSource | QueryStatement): Expression {
  return node({ kind: 'quantified', operand: toOperand(operand), op, quantifier: 'ALL', query: queryOf(source) });
}

/** The incoming value of `column` inside an upsert's update. */
export function excluded(column: string): Expression {
  return node({ kind: 'excluded', name: column });
}

// GROUP BY elements: a single operand, or an array for a composite `(a, b)`.
export type GroupingElement = Operand | readonly Operand[];

function isComposite(element: GroupingElement): element is readonly Operand[] {
  return Array.isArray(element);
}

function toGroupingSet(element: GroupingElement): readonly Expression[] {
  return isComposite(element) ? element.map(toOperand) : [toOperand(element)];
}

function grouping(mode: GroupingMode, sets: readonly (readonly Expression[])[]): GroupingNode {
  if (sets.length === 0) throw new ConstructionError(`${mode} needs at least one element`, { clause: 'GROUP BY' });
  if (mode !== 'GROUPING SETS' && sets.some((set) => set.length === 0)) {
    throw new ConstructionError(`${mode} elements cannot be empty`, { clause: 'GROUP BY' });
  }
  return node({ kind: 'grouping', mode, sets });
}

export function rollup(...elements: GroupingElement[]): GroupingNode {
  return grouping('ROLLUP', elements.map(toGroupingSet));
}

export function cube(...elements: GroupingElement[]): GroupingNode {
  return grouping('CUBE', elements.map(toGroupingSet));
}

/** `groupingSets(['region', 'year'], ['region'], [])`; `[]` is the grand total. */
export function groupingSets(...sets: (readonly Operand[])[]): GroupingNode {
  return grouping('GROUPING SETS', sets.map((set) => set.map(toOperand)));
}

export function asc(operand: Operand, nulls?: NullsOrder): OrderTerm {
  return { expr: toOperand(operand), direction: 'ASC', ...(nulls ? { nulls } : {}) };
}

export function desc(operand: Operand, nulls?: NullsOrder): OrderTerm {
  return { expr: toOperand(operand), direction: 'DESC', ...(nulls ? { nulls } : {}) };
}

/** Attach a result alias. Only projected expressions render it. */
export function as(expr: Expression, alias: string): Expression {
  switch (expr.kind) {
    case 'column':
    case 'literal':
    case 'arithmetic':
    case 'function':
    case 'aggregate':
    case 'window':
    case 'case':
    case 'cteRef':
    case 'subquery':
    case 'cast':
      return node({ ...expr, alias });
    default:
      return as(predicateAsValue(expr), alias);
  }
}

// Predicates and `*` have no alias slot; projecting them goes through CASE.
function predicateAsValue(expr: Expression): Expression {
  if (expr.kind === 'star') throw new ConstructionError('cannot alias *', { clause: 'SELECT' });
  if (expr.kind === 'excluded') throw new ConstructionError('excluded values belong in an upsert update', { clause: 'SELECT' });
  return node({ kind: 'case', whens: [{ when: expr, then: lit(true) }], otherwise: lit(false) });
}

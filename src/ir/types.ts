import type { AppValue, LogicalType, NativeValue } from '../types/logical-type.js';

// Query structure. Nodes are plain immutable records; no node ever holds SQL text.

export type ComparisonOp = '=' | '!=' | '<' | '<=' | '>' | '>=' | 'LIKE' | 'NOT LIKE' | 'GLOB';
export type LogicalOp = 'AND' | 'OR' | 'NOT';
export type ArithmeticOp = '+' | '-' | '*' | '/' | '%' | '||';
export type AggregateFunc = 'COUNT' | 'SUM' | 'AVG' | 'MIN' | 'MAX';
export type SortDirection = 'ASC' | 'DESC';
export type NullsOrder = 'FIRST' | 'LAST';

export interface ColumnNode {
  readonly kind: 'column';
  readonly table?: string;
  readonly name: string;
  readonly alias?: string;
}

export interface StarNode {
  readonly kind: 'star';
  readonly table?: string;
}

export interface LiteralNode {
  readonly kind: 'literal';
  readonly value: AppValue;
  readonly type: LogicalType;
  readonly alias?: string;
}

export interface ComparisonNode {
  readonly kind: 'comparison';
  readonly left: Expression;
  readonly op: ComparisonOp;
  readonly right: Expression;
}

export interface LogicalNode {
  readonly kind: 'logical';
  readonly op: LogicalOp;
  readonly children: readonly Expression[];
}

export interface InNode {
  readonly kind: 'in';
  readonly operand: Expression;
  readonly values: readonly Expression[] | SubqueryNode;
  readonly negated: boolean;
}

export interface BetweenNode {
  readonly kind: 'between';
  readonly operand: Expression;
  readonly low: Expression;
  readonly high: Expression;
  readonly negated: boolean;
}

export interface NullCheckNode {
  readonly kind: 'nullCheck';
  readonly operand: Expression;
  readonly negated: boolean;
}

export interface ArithmeticNode {
  readonly kind: 'arithmetic';
  readonly left: Expression;
  readonly op: ArithmeticOp;
  readonly right: Expression;
  readonly alias?: string;
}

export interface FunctionNode {
  readonly kind: 'function';
  readonly name: string;
  readonly args: readonly Expression[];
  readonly alias?: string;
}

export interface AggregateNode {
  readonly kind: 'aggregate';
  readonly func: AggregateFunc;
  /** Omitted for COUNT(*). */
  readonly arg?: Expression;
  readonly distinct: boolean;
  readonly filter?: Expression;
  readonly alias?: string;
}

export interface FrameBound {
  readonly kind: 'unboundedPreceding' | 'preceding' | 'currentRow' | 'following' | 'unboundedFollowing';
  readonly offset?: number;
}

export interface WindowFrame {
  readonly unit: 'ROWS' | 'RANGE';
  readonly start: FrameBound;
  readonly end?: FrameBound;
}

export interface WindowNode {
  readonly kind: 'window';
  readonly func: AggregateNode | FunctionNode;
  readonly partitionBy: readonly Expression[];
  readonly orderBy: readonly OrderTerm[];
  readonly frame?: WindowFrame;
  readonly alias?: string;
}

export interface CaseNode {
  readonly kind: 'case';
  readonly whens: readonly { readonly when: Expression; readonly then: Expression }[];
  readonly otherwise?: Expression;
  readonly alias?: string;
}

export interface CteRefNode {
  readonly kind: 'cteRef';
  readonly name: string;
  readonly alias?: string;
}

export interface SubqueryNode {
  readonly kind: 'subquery';
  readonly query: QueryStatement;
  readonly alias?: string;
}

export interface CastNode {
  readonly kind: 'cast';
  readonly operand: Expression;
  readonly type: LogicalType;
  readonly alias?: string;
}

export interface ExistsNode {
  readonly kind: 'exists';
  readonly query: QueryStatement;
  readonly negated: boolean;
}

export type QuantifiedOp = '=' | '!=' | '<' | '<=' | '>' | '>=';

/** `operand op ANY (subquery)` / `operand op ALL (subquery)`. */
export interface QuantifiedNode {
  readonly kind: 'quantified';
  readonly operand: Expression;
  readonly op: QuantifiedOp;
  readonly quantifier: 'ANY' | 'ALL';
  readonly query: QueryStatement;
}

/** The value an upsert tried to insert into `name`. Only meaningful in an ON CONFLICT update. */
export interface ExcludedNode {
  readonly kind: 'excluded';
  readonly name: string;
}

export type Expression =
  | ColumnNode
  | StarNode
  | LiteralNode
  | ComparisonNode
  | LogicalNode
  | InNode
  | BetweenNode
  | NullCheckNode
  | ArithmeticNode
  | FunctionNode
  | AggregateNode
  | WindowNode
  | CaseNode
  | CteRefNode
  | SubqueryNode
  | CastNode
  | ExistsNode
  | QuantifiedNode
  | ExcludedNode;

export type ExpressionKind = Expression['kind'];

export interface OrderTerm {
  readonly expr: Expression;
  readonly direction?: SortDirection;
  readonly nulls?: NullsOrder;
}

export type GroupingMode = 'ROLLUP' | 'CUBE' | 'GROUPING SETS';

/**
 * Multi-level grouping. Each set is one element: a single expression, or a
 * parenthesized composite. An empty set is the grand total `()`.
 */
export interface GroupingNode {
  readonly kind: 'grouping';
  readonly mode: GroupingMode;
  readonly sets: readonly (readonly Expression[])[];
}

export type GroupItem = Expression | GroupingNode;

export interface TableRef {
  readonly kind: 'table';
  readonly name: string;
  readonly alias?: string;
}

export type FromSource = TableRef | CteRefNode | SubqueryNode;

export type JoinType = 'INNER' | 'LEFT' | 'RIGHT' | 'FULL' | 'CROSS';

export interface JoinClause {
  readonly type: JoinType;
  readonly source: FromSource;
  readonly on?: Expression;
}

export type LockMode = 'UPDATE' | 'SHARE';

export type DepthExceededPolicy = 'error' | 'truncate';

/** Bound on a recursive CTE, enforced through the engine-managed depth column. */
export interface DepthGuard {
  readonly maxDepth: number;
  readonly onDepthExceeded: DepthExceededPolicy;
}

export type CteBody =
  | { readonly kind: 'plain'; readonly query: QueryStatement }
  | {
      readonly kind: 'recursive';
      readonly anchor: SelectStatement;
      readonly recursive: SelectStatement;
      readonly guard?: DepthGuard;
    };

export interface CteDefinition {
  readonly name: string;
  readonly columns?: readonly string[];
  readonly body: CteBody;
  /** `true` renders MATERIALIZED, `false` NOT MATERIALIZED; absent leaves the choice to the planner. */
  readonly materialized?: boolean;
}

export interface WithClause {
  readonly recursive: boolean;
  readonly ctes: readonly CteDefinition[];
}

export interface SelectStatement {
  readonly kind: 'select';
  readonly with?: WithClause;
  readonly distinct: boolean;
  /** Empty means `*`. */
  readonly columns: readonly Expression[];
  readonly from?: FromSource;
  readonly joins: readonly JoinClause[];
  readonly where?: Expression;
  readonly groupBy: readonly GroupItem[];
  readonly having?: Expression;
  readonly orderBy: readonly OrderTerm[];
  readonly limit?: number;
  readonly offset?: number;
  readonly lock?: LockMode;
}

export type SetOperator = 'UNION' | 'UNION ALL' | 'INTERSECT' | 'EXCEPT';

export interface SetOperationStatement {
  readonly kind: 'setOperation';
  readonly with?: WithClause;
  readonly first: QueryStatement;
  readonly rest: readonly { readonly op: SetOperator; readonly query: QueryStatement }[];
  readonly orderBy: readonly OrderTerm[];
  readonly limit?: number;
  readonly offset?: number;
}

export type QueryStatement = SelectStatement | SetOperationStatement;

export interface Assignment {
  readonly column: string;
  readonly value: Expression;
}

export type ConflictAction =
  | { readonly kind: 'nothing' }
  | { readonly kind: 'update'; readonly assignments: readonly Assignment[] };

/** Upsert: what to do when a row collides with `target`, a unique key. */
export interface ConflictClause {
  readonly target: readonly string[];
  readonly action: ConflictAction;
}

export interface InsertStatement {
  readonly kind: 'insert';
  readonly table: string;
  readonly columns: readonly string[];
  readonly rows: readonly (readonly Expression[])[];
  readonly onConflict?: ConflictClause;
  readonly returning: readonly string[];
}

export interface UpdateStatement {
  readonly kind: 'update';
  readonly table: string;
  readonly assignments: readonly Assignment[];
  readonly where?: Expression;
  readonly returning: readonly string[];
}

export interface DeleteStatement {
  readonly kind: 'delete';
  readonly table: string;
  readonly where?: Expression;
  readonly returning: readonly string[];
}

export interface ColumnDefinition {
  readonly name: string;
  readonly type: LogicalType;
  readonly nullable?: boolean;
  readonly unique?: boolean;
  readonly references?: { readonly table: string; readonly column: string };
}

export interface CreateTableStatement {
  readonly kind: 'createTable';
  readonly table: string;
  readonly columns: readonly ColumnDefinition[];
  readonly primaryKey: readonly string[];
  readonly ifNotExists: boolean;
}

export interface DropTableStatement {
  readonly kind: 'dropTable';
  readonly table: string;
  readonly ifExists: boolean;
}

export type Statement =
  | SelectStatement
  | SetOperationStatement
  | InsertStatement
  | UpdateStatement
  | DeleteStatement
  | CreateTableStatement
  | DropTableStatement;

/** Table shape supplied by the model layer. */
export interface TableSchema {
  readonly name: string;
  readonly columns: Readonly<Record<string, LogicalType>>;
  readonly primaryKey?: readonly string[];
}

export interface CompiledSql {
  readonly sql: string;
  readonly params: readonly NativeValue[];
}

/** Anything that can be turned into a query statement: builders and raw statements alike. */
export interface StatementSource {
  toStatement(): QueryStatement;
}

export function isSubqueryList(values: InNode['values']): values is SubqueryNode {
  return !Array.isArray(values);
}

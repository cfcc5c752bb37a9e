import type { Dialect } from '../dialect/base-dialect.js';
import { compile } from '../generator/sql.js';
import {
  type Operand,
  and,
  col,
  eq,
  inList,
  isNull,
  isStatementSource,
  lit,
  or,
  star,
  subquery,
  table,
  toOperand,
  toOrderTerm,
} from '../ir/builders.js';
import type {
  CompiledSql,
  Expression,
  FromSource,
  GroupItem,
  GroupingNode,
  JoinClause,
  JoinType,
  LockMode,
  OrderTerm,
  SelectStatement,
  StatementSource,
  TableSchema,
} from '../ir/types.js';
import type { AppValue, ColumnTypes, LogicalType } from '../types/logical-type.js';
import { optimizeStatement } from '../optimizer/optimizer.js';
import { checkPageValue, validateStatement } from './shapes.js';

/** Equality filters: `null` means IS NULL, an array means IN. */
export type Conditions = Readonly<Record<string, AppValue | undefined>>;

export type SourceInput = string | FromSource | StatementSource;

export type JoinCondition = Expression | readonly [string, string];

export function toSource(input: SourceInput, alias?: string): FromSource {
  if (typeof input === 'string') return table(input, alias);
  if (isStatementSource(input)) return subquery(input, alias ?? 'subquery');
  if (alias === undefined) return input;
  return { ...input, alias };
}

function toGroupItem(item: Operand | GroupingNode): GroupItem {
  return typeof item !== 'string' && item.kind === 'grouping' ? item : toOperand(item);
}

function toSelectItem(item: Operand): Expression {
  if (item === '*') return star();
  if (typeof item === 'string' && item.endsWith('.*')) return star(item.slice(0, -2));
  return toOperand(item);
}

/**
 * Backend-free SELECT builder. Clause lists keep call order; `where`
 * conjoins onto the existing condition.
 */
export class SelectQuery implements StatementSource {
  protected source?: FromSource;
  protected projection: Expression[] = [];
  protected isDistinct = false;
  protected condition?: Expression;
  protected joinClauses: JoinClause[] = [];
  protected grouping: GroupItem[] = [];
  protected havingCondition?: Expression;
  protected ordering: OrderTerm[] = [];
  protected limitValue?: number;
  protected offsetValue?: number;
  protected lockMode?: LockMode;
  protected resultTypes: Record<string, LogicalType> = {};
  protected readonly schema?: TableSchema;

  constructor(source?: SourceInput, schema?: TableSchema) {
    if (source !== undefined) this.source = toSource(source);
    else if (schema) this.source = table(schema.name);
    this.schema = schema;
  }

  /** Called before every change; subclasses reject changes after execution. */
  protected touch(): void {}

  from(source: SourceInput, alias?: string): this {
    this.touch();
    this.source = toSource(source, alias);
    return this;
  }

  select(...items: Operand[]): this {
    this.touch();
    this.projection.push(...items.map(toSelectItem));
    return this;
  }

  distinct(enabled = true): this {
    this.touch();
    this.isDistinct = enabled;
    return this;
  }

  where(condition: Expression): this {
    this.touch();
    this.condition = this.condition ? and(this.condition, condition) : condition;
    return this;
  }

  orWhere(condition: Expression): this {
    this.touch();
    this.condition = this.condition ? or(this.condition, condition) : condition;
    return this;
  }

  /** `filterBy({ status: 'active', deleted_at: null, id: [1, 2] })`; values typed from the table schema. */
  filterBy(conditions: Conditions): this {
    const parts = Object.entries(conditions)
      .filter((entry): entry is [string, AppValue] => entry[1] !== undefined)
      .map(([column, value]) => this.conditionFor(column, value));
    if (parts.length === 0) return this;
    return this.where(and(...parts));
  }

  private conditionFor(column: string, value: AppValue): Expression {
    const type = this.schema?.columns[column];
    if (value === null) return isNull(column);
    if (Array.isArray(value)) return inList(column, value.map((v) => lit(v, type)));
    return eq(column, lit(value, type));
  }

  join(type: JoinType, target: SourceInput, on?: JoinCondition, alias?: string): this {
    this.touch();
    const source = toSource(target, alias);
    const clause: JoinClause = on === undefined
      ? { type, source }
      : { type, source, on: isPair(on) ? eq(on[0], col(on[1])) : on };
    this.joinClauses.push(clause);
    return this;
  }

  innerJoin(target: SourceInput, on: JoinCondition, alias?: string): this {
    return this.join('INNER', target, on, alias);
  }

  leftJoin(target: SourceInput, on: JoinCondition, alias?: string): this {
    return this.join('LEFT', target, on, alias);
  }

  rightJoin(target: SourceInput, on: JoinCondition, alias?: string): this {
    return this.join('RIGHT', target, on, alias);
  }

  fullJoin(target: SourceInput, on: JoinCondition, alias?: string): this {
    return this.join('FULL', target, on, alias);
  }

  crossJoin(target: SourceInput, alias?: string): this {
    return this.join('CROSS', target, undefined, alias);
  }

  /** Columns, expressions, or one of `rollup` / `cube` / `groupingSets`. */
  groupBy(...items: (Operand | GroupingNode)[]): this {
    this.touch();
    this.grouping.push(...items.map(toGroupItem));
    return this;
  }

  having(condition: Expression): this {
    this.touch();
    this.havingCondition = this.havingCondition ? and(this.havingCondition, condition) : condition;
    return this;
  }

  /** Strings name columns; a leading `-` sorts descending. */
  orderBy(...terms: (OrderTerm | Operand)[]): this {
    this.touch();
    this.ordering.push(...terms.map(toOrderTerm));
    return this;
  }

  limit(count: number): this {
    this.touch();
    this.limitValue = checkPageValue(count, 'LIMIT');
    return this;
  }

  offset(count: number): this {
    this.touch();
    this.offsetValue = checkPageValue(count, 'OFFSET');
    return this;
  }

  lockForUpdate(): this {
    this.touch();
    this.lockMode = 'UPDATE';
    return this;
  }

  lockForShare(): this {
    this.touch();
    this.lockMode = 'SHARE';
    return this;
  }

  /** Declare logical types for result columns, e.g. aliases of computed values. */
  withTypes(types: ColumnTypes): this {
    this.touch();
    Object.assign(this.resultTypes, types);
    return this;
  }

  /** Schema types, then aliased casts, then declared types. */
  columnTypes(): ColumnTypes {
    const casts: Record<string, LogicalType> = {};
    for (const item of this.projection) {
      if (item.kind === 'cast' && item.alias) casts[item.alias] = item.type;
    }
    return { ...this.schema?.columns, ...casts, ...this.resultTypes };
  }

  toStatement(): SelectStatement {
    return optimizeStatement({
      kind: 'select',
      distinct: this.isDistinct,
      columns: [...this.projection],
      from: this.source,
      joins: [...this.joinClauses],
      where: this.condition,
      groupBy: [...this.grouping],
      having: this.havingCondition,
      orderBy: [...this.ordering],
      limit: this.limitValue,
      offset: this.offsetValue,
      lock: this.lockMode,
    });
  }

  /** Pure render; safe to call any number of times. */
  toSql(dialect: Dialect): CompiledSql {
    const statement = this.toStatement();
    validateStatement(statement, dialect);
    return compile(statement, dialect);
  }
}

function isPair(on: JoinCondition): on is readonly [string, string] {
  return Array.isArray(on);
}

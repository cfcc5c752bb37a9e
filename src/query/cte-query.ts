import { ConstructionError } from '../errors/errors.js';
import { add, and, as, col, lit, lt, lte, star } from '../ir/builders.js';
import type {
  CteDefinition,
  CteRefNode,
  DepthExceededPolicy,
  Expression,
  FromSource,
  QueryStatement,
  SelectStatement,
  StatementSource,
} from '../ir/types.js';
import { bindCteNames, collectCteRefs } from '../ir/walk.js';
import { LogicalType } from '../types/logical-type.js';
import { ActiveQuery } from './active-query.js';
import type { ModeKind, QueryExecutor } from './execution-mode.js';
import { DEPTH_COLUMN } from './shapes.js';
import type { SourceInput } from './select-query.js';

export type CteInput = StatementSource | QueryStatement;

export interface CteOptions {
  columns?: readonly string[];
  /** MATERIALIZED (`true`) or NOT MATERIALIZED (`false`); planner's choice when absent. */
  materialized?: boolean;
}

export interface RecursiveCteOptions {
  /** Non-recursive seed rows. Must not reference the CTE. */
  anchor: StatementSource | SelectStatement;
  /** Member joined back onto the CTE by its own name. */
  recursive: StatementSource | SelectStatement;
  columns?: readonly string[];
  /** Deepest level produced; defaults to the backend's `maxRecursionDepth`. */
  maxDepth?: number;
  onDepthExceeded?: DepthExceededPolicy;
  materialized?: boolean;
}

function isColumnList(options: readonly string[] | CteOptions): options is readonly string[] {
  return Array.isArray(options);
}

function hintOf(materialized: boolean | undefined): Pick<CteDefinition, 'materialized'> {
  return materialized === undefined ? {} : { materialized };
}

function statementOf(input: CteInput): QueryStatement {
  return 'toStatement' in input ? input.toStatement() : input;
}

function toSelect(input: StatementSource | SelectStatement, part: string): SelectStatement {
  const statement = statementOf(input);
  if (statement.kind !== 'select') {
    throw new ConstructionError(`the ${part} of a recursive CTE must be a single SELECT`, { clause: 'WITH RECURSIVE' });
  }
  return statement;
}

function selfQualifier(statement: SelectStatement, name: string): string | undefined {
  const sources: FromSource[] = [];
  if (statement.from) sources.push(statement.from);
  for (const join of statement.joins) sources.push(join.source);
  const self = sources.find((source): source is CteRefNode => source.kind === 'cteRef' && source.name === name);
  return self && (self.alias ?? self.name);
}

/**
 * SELECT with a WITH clause. CTEs are named with `with` / `withRecursive`
 * and then read by name through `from` and the join methods.
 *
 * Recursive CTEs carry an engine-managed depth column. The recursive member
 * stops at `maxDepth`; in `error` mode a probe runs first and raises
 * RecursionLimitError when rows deeper than the bound would exist.
 */
export class CTEQuery<M extends ModeKind> extends ActiveQuery<M> {
  private readonly definitions = new Map<string, CteDefinition>();

  constructor(executor: QueryExecutor<M>, source?: SourceInput) {
    super(executor, source);
  }

  get cteNames(): string[] {
    return [...this.definitions.keys()];
  }

  /** The third argument is the column list, or options carrying it and a materialization hint. */
  with(name: string, query: CteInput, options: readonly string[] | CteOptions = {}): this {
    this.touch();
    this.assertNewName(name, 'WITH');
    const { columns, materialized }: CteOptions = isColumnList(options) ? { columns: options } : options;
    const body = bindCteNames(statementOf(query), this.names());
    this.assertBound(body, 'WITH');
    this.definitions.set(name, {
      name,
      ...(columns ? { columns: [...columns] } : {}),
      body: { kind: 'plain', query: body },
      ...hintOf(materialized),
    });
    return this;
  }

  withRecursive(name: string, options: RecursiveCteOptions): this {
    this.touch();
    this.assertNewName(name, 'WITH RECURSIVE');
    const maxDepth = checkDepth(options.maxDepth ?? this.executor.maxRecursionDepth);
    const policy = options.onDepthExceeded ?? 'error';

    const known = this.names();
    const withSelf = new Set([...known, name]);
    const anchor = bindCteNames(toSelect(options.anchor, 'anchor'), withSelf);
    if (collectCteRefs(anchor).has(name)) {
      throw new ConstructionError(`the anchor of "${name}" must not reference "${name}"`, { clause: 'WITH RECURSIVE' });
    }
    this.assertBound(anchor, 'WITH RECURSIVE');

    const recursive = bindCteNames(toSelect(options.recursive, 'recursive member'), withSelf);
    const qualifier = selfQualifier(recursive, name);
    if (qualifier === undefined) {
      throw new ConstructionError(`the recursive member of "${name}" must read from "${name}" in FROM or JOIN`, {
        clause: 'WITH RECURSIVE',
      });
    }
    if (recursive.columns.length === 0) {
      throw new ConstructionError(`the recursive member of "${name}" must list its columns`, { clause: 'WITH RECURSIVE' });
    }
    this.assertBound(recursive, 'WITH RECURSIVE', name);

    const depth = col(DEPTH_COLUMN, qualifier);
    const bound: Expression = policy === 'truncate' ? lt(depth, maxDepth) : lte(depth, maxDepth);
    const seeded: SelectStatement = {
      ...anchor,
      columns: [...(anchor.columns.length ? anchor.columns : [star()]), as(lit(1, LogicalType.INTEGER), DEPTH_COLUMN)],
    };
    const stepped: SelectStatement = {
      ...recursive,
      columns: [...recursive.columns, as(add(depth, lit(1, LogicalType.INTEGER)), DEPTH_COLUMN)],
      where: recursive.where ? and(recursive.where, bound) : bound,
    };

    this.definitions.set(name, {
      name,
      ...(options.columns ? { columns: [...options.columns, DEPTH_COLUMN] } : {}),
      body: { kind: 'recursive', anchor: seeded, recursive: stepped, guard: { maxDepth, onDepthExceeded: policy } },
      ...hintOf(options.materialized),
    });
    return this;
  }

  override toStatement(): SelectStatement {
    if (this.definitions.size === 0) return super.toStatement();
    const outer = bindCteNames(super.toStatement(), this.names());
    this.assertBound(outer, 'FROM');
    const ctes = [...this.definitions.values()];
    return {
      ...outer,
      with: { recursive: ctes.some((cte) => cte.body.kind === 'recursive'), ctes },
    };
  }

  private names(): Set<string> {
    return new Set(this.definitions.keys());
  }

  private assertNewName(name: string, clause: string): void {
    if (this.definitions.has(name)) {
      throw new ConstructionError(`CTE "${name}" is already defined`, { clause });
    }
  }

  /** Every CTE a statement reads must be defined before it. */
  private assertBound(statement: QueryStatement, clause: string, self?: string): void {
    for (const ref of collectCteRefs(statement)) {
      if (ref !== self && !this.definitions.has(ref) && !definedInside(statement, ref)) {
        throw new ConstructionError(`CTE "${ref}" is referenced before it is defined`, { clause });
      }
    }
  }
}

function definedInside(statement: QueryStatement, name: string): boolean {
  return statement.with?.ctes.some((cte) => cte.name === name) ?? false;
}

function checkDepth(value: number): number {
  if (!Number.isSafeInteger(value) || value < 1) {
    throw new ConstructionError(`maxDepth must be a positive integer, got ${value}`, { clause: 'WITH RECURSIVE' });
  }
  return value;
}

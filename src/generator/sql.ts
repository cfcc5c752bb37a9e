import type { Dialect } from '../dialect/base-dialect.js';
import type { CompiledSql, Expression, Statement } from '../ir/types.js';
import type { AppValue, LogicalType, NativeValue } from '../types/logical-type.js';

/**
 * Mutable state of one rendering pass. Holds the parameter list so that
 * placeholders are numbered in the order they appear in the final text.
 */
export class RenderContext {
  private readonly values: NativeValue[] = [];

  constructor(readonly dialect: Dialect) {}

  get params(): readonly NativeValue[] {
    return this.values;
  }

  /** Convert, record and return the placeholder for the next parameter. */
  bind(value: AppValue, type: LogicalType): string {
    this.values.push(this.dialect.typeMapping.toDatabase(value, type));
    return this.dialect.formatLiteralPlaceholder(this.values.length);
  }

  expr(node: Expression): string {
    return this.dialect.formatExpression(node, this);
  }

  statement(statement: Statement): string {
    return this.dialect.formatStatement(statement, this);
  }

  ident(name: string): string {
    return this.dialect.formatIdentifier(name);
  }
}

export function compile(statement: Statement, dialect: Dialect): CompiledSql {
  const ctx = new RenderContext(dialect);
  const sql = ctx.statement(statement);
  return { sql, params: [...ctx.params] };
}

export function compileExpression(node: Expression, dialect: Dialect): CompiledSql {
  const ctx = new RenderContext(dialect);
  const sql = ctx.expr(node);
  return { sql, params: [...ctx.params] };
}

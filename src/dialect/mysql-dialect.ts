import type { RenderContext } from '../generator/sql.js';
import type { ConflictClause, ExcludedNode, GroupItem, GroupingNode } from '../ir/types.js';
import { LogicalType } from '../types/logical-type.js';
import { mysqlTypeMapping } from '../types/mappings.js';
import type { TypeMapping } from '../types/type-mapping.js';
import { BaseDialect, type TransactionOptions } from './base-dialect.js';
import { type DialectCapabilities, type Version, versionAtLeast } from './capabilities.js';

export const DEFAULT_MYSQL_VERSION: Version = [8, 0, 36];

export function mysqlCapabilities(version: Version): DialectCapabilities {
  const eight = versionAtLeast(version, [8, 0, 0]);
  const setOps = versionAtLeast(version, [8, 0, 31]);
  return {
    cte: eight,
    recursiveCte: eight,
    windowFunctions: eight,
    returning: false,
    savepoints: true,
    rowLocking: true,
    filterClause: false,
    intersect: setOps,
    except: setOps,
    rightJoin: true,
    fullJoin: false,
    nullsOrdering: false,
    offsetWithoutLimit: false,
    parenthesizedSetOperands: true,
    readOnlyTransactions: true,
    upsert: true,
    quantifiedSubquery: true,
    // Only the trailing `WITH ROLLUP` form
    rollup: true,
    cube: false,
    groupingSets: false,
    materializedCte: false,
  };
}

export interface MysqlDialectOptions {
  version?: Version;
  /** `format` renders `%s` placeholders for drivers that expect them. */
  paramStyle?: 'qmark' | 'format';
  typeMapping?: TypeMapping;
}

export class MysqlDialect extends BaseDialect {
  constructor(options: MysqlDialectOptions = {}) {
    const version = options.version ?? DEFAULT_MYSQL_VERSION;
    super({
      name: 'mysql',
      version,
      paramStyle: options.paramStyle ?? 'qmark',
      typeMapping: options.typeMapping ?? mysqlTypeMapping(),
      capabilities: mysqlCapabilities(version),
    });
  }

  override formatIdentifier(name: string): string {
    return `\`${name.replace(/`/g, '``')}\``;
  }

  // CAST targets are a closed set on MySQL, not column types.
  protected override formatCastType(type: LogicalType): string {
    switch (type) {
      case LogicalType.INTEGER:
      case LogicalType.BIGINT:
      case LogicalType.BOOLEAN:
        return 'SIGNED';
      case LogicalType.TEXT:
      case LogicalType.UUID:
        return 'CHAR';
      case LogicalType.BLOB:
        return 'BINARY';
      default:
        return this.typeMapping.nativeType(type);
    }
  }

  override formatExcluded(node: ExcludedNode): string {
    return `VALUES(${this.formatIdentifier(node.name)})`;
  }

  protected override formatConflict(clause: ConflictClause, ctx: RenderContext): string {
    this.require('upsert', 'ON DUPLICATE KEY UPDATE', 'upsert');
    if (clause.action.kind === 'update') {
      return `ON DUPLICATE KEY UPDATE ${this.formatAssignments(clause.action.assignments, ctx)}`;
    }
    // DO NOTHING: a key column assigned to itself leaves the row as it was.
    if (clause.target.length === 0) this.fail('skipping duplicates needs a key column', 'ON DUPLICATE KEY UPDATE');
    const key = this.formatIdentifier(clause.target[0]);
    return `ON DUPLICATE KEY UPDATE ${key} = ${key}`;
  }

  // ROLLUP only as `GROUP BY a, b WITH ROLLUP`, which rolls up every listed column.
  protected override formatGroupBy(items: readonly GroupItem[], ctx: RenderContext): string {
    const [first] = items;
    if (items.length !== 1 || first.kind !== 'grouping') return super.formatGroupBy(items, ctx);
    this.requireGrouping(first.mode);
    if (first.sets.some((set) => set.length !== 1)) this.unsupported('composite ROLLUP elements', 'GROUP BY');
    return `${first.sets.map((set) => ctx.expr(set[0])).join(', ')} WITH ROLLUP`;
  }

  protected override formatGrouping(node: GroupingNode): string {
    this.requireGrouping(node.mode);
    return this.unsupported('ROLLUP combined with other GROUP BY terms', 'GROUP BY');
  }

  // Isolation is set for the next transaction, then the transaction starts.
  override formatBeginTransaction(options: TransactionOptions): string[] {
    const statements: string[] = [];
    if (options.isolationLevel) statements.push(`SET TRANSACTION ISOLATION LEVEL ${options.isolationLevel}`);
    statements.push(options.readOnly ? 'START TRANSACTION READ ONLY' : 'START TRANSACTION');
    return statements;
  }
}

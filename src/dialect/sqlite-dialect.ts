import { CapabilityError } from '../errors/errors.js';
import { sqliteTypeMapping } from '../types/mappings.js';
import type { TypeMapping } from '../types/type-mapping.js';
import { BaseDialect, IsolationLevel, type TransactionOptions } from './base-dialect.js';
import { type DialectCapabilities, type Version, versionAtLeast } from './capabilities.js';

export const DEFAULT_SQLITE_VERSION: Version = [3, 45, 0];

export function sqliteCapabilities(version: Version): DialectCapabilities {
  const cte = versionAtLeast(version, [3, 8, 3]);
  const modernJoins = versionAtLeast(version, [3, 39, 0]);
  return {
    cte,
    recursiveCte: cte,
    windowFunctions: versionAtLeast(version, [3, 25, 0]),
    returning: versionAtLeast(version, [3, 35, 0]),
    savepoints: true,
    rowLocking: false,
    filterClause: versionAtLeast(version, [3, 30, 0]),
    intersect: true,
    except: true,
    rightJoin: modernJoins,
    fullJoin: modernJoins,
    nullsOrdering: versionAtLeast(version, [3, 30, 0]),
    offsetWithoutLimit: false,
    parenthesizedSetOperands: false,
    readOnlyTransactions: false,
    upsert: versionAtLeast(version, [3, 24, 0]),
    quantifiedSubquery: false,
    rollup: false,
    cube: false,
    groupingSets: false,
    materializedCte: versionAtLeast(version, [3, 35, 0]),
  };
}

export interface SqliteDialectOptions {
  version?: Version;
  typeMapping?: TypeMapping;
}

export class SqliteDialect extends BaseDialect {
  constructor(options: SqliteDialectOptions = {}) {
    const version = options.version ?? DEFAULT_SQLITE_VERSION;
    super({
      name: 'sqlite',
      version,
      paramStyle: 'qmark',
      typeMapping: options.typeMapping ?? sqliteTypeMapping(),
      capabilities: sqliteCapabilities(version),
    });
  }

  /** Same dialect, capabilities recomputed for the version the server reports. */
  withVersion(version: Version): SqliteDialect {
    return new SqliteDialect({ version, typeMapping: this.typeMapping });
  }

  // SQLite has no isolation levels; SERIALIZABLE takes the write lock up front.
  // read_uncommitted is a connection setting, so every begin states it.
  override formatBeginTransaction(options: TransactionOptions): string[] {
    if (options.readOnly) {
      this.require('readOnlyTransactions', 'BEGIN', 'read-only transactions');
    }
    switch (options.isolationLevel) {
      case undefined:
        return ['PRAGMA read_uncommitted = 0', 'BEGIN'];
      case IsolationLevel.SERIALIZABLE:
        return ['PRAGMA read_uncommitted = 0', 'BEGIN IMMEDIATE'];
      case IsolationLevel.READ_UNCOMMITTED:
        return ['PRAGMA read_uncommitted = 1', 'BEGIN DEFERRED'];
      default:
        throw new CapabilityError(`isolation level ${options.isolationLevel} is not supported`, {
          dialect: this.name,
          clause: 'BEGIN',
        });
    }
  }

  override formatExplain(sql: string): string {
    return `EXPLAIN QUERY PLAN ${sql}`;
  }
}

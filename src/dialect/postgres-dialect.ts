import { postgresTypeMapping } from '../types/mappings.js';
import type { TypeMapping } from '../types/type-mapping.js';
import { BaseDialect } from './base-dialect.js';
import { type DialectCapabilities, type Version, versionAtLeast } from './capabilities.js';

export const DEFAULT_POSTGRES_VERSION: Version = [16, 0, 0];

export function postgresCapabilities(version: Version): DialectCapabilities {
  const since95 = versionAtLeast(version, [9, 5, 0]);
  return {
    cte: true,
    recursiveCte: true,
    windowFunctions: true,
    returning: true,
    savepoints: true,
    rowLocking: true,
    filterClause: versionAtLeast(version, [9, 4, 0]),
    intersect: true,
    except: true,
    rightJoin: true,
    fullJoin: true,
    nullsOrdering: true,
    offsetWithoutLimit: true,
    parenthesizedSetOperands: true,
    readOnlyTransactions: true,
    upsert: since95,
    quantifiedSubquery: true,
    rollup: since95,
    cube: since95,
    groupingSets: since95,
    materializedCte: versionAtLeast(version, [12, 0, 0]),
  };
}

export interface PostgresDialectOptions {
  version?: Version;
  typeMapping?: TypeMapping;
}

export class PostgresDialect extends BaseDialect {
  constructor(options: PostgresDialectOptions = {}) {
    const version = options.version ?? DEFAULT_POSTGRES_VERSION;
    super({
      name: 'postgresql',
      version,
      paramStyle: 'numeric',
      typeMapping: options.typeMapping ?? postgresTypeMapping(),
      capabilities: postgresCapabilities(version),
    });
  }
}

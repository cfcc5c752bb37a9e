import { ConfigurationError } from '../errors/errors.js';
import type { TypeMapping } from '../types/type-mapping.js';
import type { Dialect } from './base-dialect.js';
import type { Version } from './capabilities.js';
import { MysqlDialect } from './mysql-dialect.js';
import { PostgresDialect } from './postgres-dialect.js';
import { SqliteDialect } from './sqlite-dialect.js';

export interface DialectFactoryOptions {
  version?: Version;
  typeMapping?: TypeMapping;
}

export type DialectFactory = (options: DialectFactoryOptions) => Dialect;

/**
 * Name to dialect factory lookup. Constructed explicitly and handed to
 * whatever needs it; there is no process-wide instance.
 */
export class DialectRegistry {
  private readonly factories = new Map<string, DialectFactory>();

  register(name: string, factory: DialectFactory): this {
    this.factories.set(name.toLowerCase(), factory);
    return this;
  }

  has(name: string): boolean {
    return this.factories.has(name.toLowerCase());
  }

  names(): string[] {
    return [...this.factories.keys()];
  }

  create(name: string, options: DialectFactoryOptions = {}): Dialect {
    const factory = this.factories.get(name.toLowerCase());
    if (!factory) {
      throw new ConfigurationError(`unknown dialect "${name}"; known: ${this.names().join(', ')}`);
    }
    return factory(options);
  }
}

export function createDefaultRegistry(): DialectRegistry {
  return new DialectRegistry()
    .register('sqlite', (options) => new SqliteDialect(options))
    .register('postgresql', (options) => new PostgresDialect(options))
    .register('postgres', (options) => new PostgresDialect(options))
    .register('mysql', (options) => new MysqlDialect(options));
}

import { z } from 'zod';
import { type BackendConfig, loadConfigFromEnv } from '../config/config.js';
import { ConfigurationError } from '../errors/errors.js';
import { SqliteBackend } from '../sqlite/db.js';
import type { NativeValue, Row } from '../types/logical-type.js';
import { cliLogger } from '../utils/logger.js';

const ParamsSchema = z.array(z.union([z.string(), z.number(), z.boolean(), z.null()]));

export interface ExecCommandOptions {
  sql: string;
  db?: string;
  /** JSON array of positional parameters. */
  params?: string;
  explain?: boolean;
  env?: NodeJS.ProcessEnv;
}

export interface DescribeCommandOptions {
  table: string;
  db?: string;
  env?: NodeJS.ProcessEnv;
}

export function parseParams(text: string | undefined): NativeValue[] {
  if (text === undefined) return [];
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (error) {
    throw new ConfigurationError('--params must be a JSON array', { cause: error });
  }
  const result = ParamsSchema.safeParse(parsed);
  if (!result.success) {
    throw new ConfigurationError('--params must be a JSON array of strings, numbers, booleans or nulls');
  }
  return result.data;
}

/** JSON text for result rows; bigint as a decimal string, bytes as base64. */
export function formatRows(rows: Row[]): string {
  return JSON.stringify(
    rows,
    (_key, value: unknown) => {
      if (typeof value === 'bigint') return value.toString();
      if (value instanceof Uint8Array) return Buffer.from(value).toString('base64');
      return value;
    },
    2,
  );
}

function backendConfig(db: string | undefined, env: NodeJS.ProcessEnv | undefined): BackendConfig {
  const config = loadConfigFromEnv(env);
  return db === undefined ? config : { ...config, database: db };
}

async function withBackend<T>(config: BackendConfig, fn: (backend: SqliteBackend) => T): Promise<T> {
  const backend = await SqliteBackend.open(config);
  try {
    return fn(backend);
  } finally {
    backend.disconnect();
  }
}

/** Runs one statement and returns what the CLI prints. */
export async function execCommand(options: ExecCommandOptions): Promise<string> {
  const config = backendConfig(options.db, options.env);
  const params = parseParams(options.params);
  cliLogger.debug('exec', { database: config.database, explain: options.explain ?? false });
  return withBackend(config, (backend) => {
    if (options.explain) return backend.explain(options.sql, params).text;
    const result = backend.execute(options.sql, params);
    if (result.statementType === 'select' || result.rows.length > 0) return formatRows(result.rows);
    const summary: Row = { affectedRows: result.affectedRows };
    if (result.lastInsertId !== undefined) summary.lastInsertId = result.lastInsertId;
    return formatRows([summary]);
  });
}

export async function describeCommand(options: DescribeCommandOptions): Promise<string> {
  const config = backendConfig(options.db, options.env);
  return withBackend(config, (backend) => JSON.stringify(backend.describeTable(options.table), null, 2));
}

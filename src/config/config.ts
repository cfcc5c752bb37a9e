import { z } from 'zod';
import { ConfigurationError } from '../errors/errors.js';
import { type Version, parseVersion } from '../dialect/capabilities.js';

const PRAGMA_NAME = /^[a-z_]+$/;

const pragmaValue = z.union([z.boolean(), z.number(), z.string().regex(/^[A-Za-z0-9_]+$/)]);

export const BackendConfigSchema = z.object({
  /** File path, or `:memory:`. */
  database: z.string().min(1).default(':memory:'),
  /** Overrides the detected server version, e.g. `3.30.0`. */
  version: z.string().regex(/^\d+(\.\d+){0,2}$/).optional(),
  pragmas: z
    .record(z.string().regex(PRAGMA_NAME, 'pragma names are lowercase words'), pragmaValue)
    .default({ foreign_keys: true }),
  readonly: z.boolean().default(false),
  statementTimeoutMs: z.number().int().positive().optional(),
  maxRecursionDepth: z.number().int().positive().default(100),
});

export type BackendConfigInput = z.input<typeof BackendConfigSchema>;
export type BackendConfig = z.output<typeof BackendConfigSchema>;
export type PragmaValue = z.infer<typeof pragmaValue>;

export function parseBackendConfig(input: BackendConfigInput = {}): BackendConfig {
  const result = BackendConfigSchema.safeParse(input);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join('.') || 'config'}: ${issue.message}`);
    throw new ConfigurationError(issues.join('; '), { cause: result.error });
  }
  return result.data;
}

function integerVariable(env: NodeJS.ProcessEnv, name: string): number | undefined {
  const raw = env[name];
  if (raw === undefined || raw === '') return undefined;
  if (!/^\d+$/.test(raw.trim())) {
    throw new ConfigurationError(`${name} must be a whole number, got ${JSON.stringify(raw)}`);
  }
  return Number(raw);
}

/**
 * Backend config from `SQLWEAVE_*` variables: DATABASE, VERSION, READONLY,
 * STATEMENT_TIMEOUT_MS, MAX_RECURSION_DEPTH.
 */
export function loadConfigFromEnv(env: NodeJS.ProcessEnv = process.env): BackendConfig {
  const input: BackendConfigInput = {};
  if (env.SQLWEAVE_DATABASE) input.database = env.SQLWEAVE_DATABASE;
  if (env.SQLWEAVE_VERSION) input.version = env.SQLWEAVE_VERSION;
  if (env.SQLWEAVE_READONLY) input.readonly = ['1', 'true', 'yes'].includes(env.SQLWEAVE_READONLY.toLowerCase());
  const timeout = integerVariable(env, 'SQLWEAVE_STATEMENT_TIMEOUT_MS');
  if (timeout !== undefined) input.statementTimeoutMs = timeout;
  const depth = integerVariable(env, 'SQLWEAVE_MAX_RECURSION_DEPTH');
  if (depth !== undefined) input.maxRecursionDepth = depth;
  return parseBackendConfig(input);
}

export function configuredVersion(config: BackendConfig): Version | undefined {
  return config.version === undefined ? undefined : parseVersion(config.version);
}

/**
 * Database-neutral error taxonomy.
 *
 * Every failure raised by the engine is a DatabaseError carrying its kind,
 * the dialect involved and, for construction and capability failures, the
 * clause that could not be built. Driver errors are translated into one of
 * these at the backend boundary.
 */

export type ErrorKind =
  | 'construction'
  | 'capability'
  | 'connection'
  | 'integrity'
  | 'concurrency'
  | 'typeConversion'
  | 'query'
  | 'transaction'
  | 'timeout'
  | 'cancellation'
  | 'configuration'
  | 'notFound';

export interface ErrorContext {
  dialect?: string;
  clause?: string;
  cause?: unknown;
}

export class DatabaseError extends Error {
  readonly kind: ErrorKind;
  readonly dialect?: string;
  readonly clause?: string;
  readonly detail: string;

  constructor(kind: ErrorKind, detail: string, context: ErrorContext = {}) {
    super(formatMessage(kind, detail, context), context.cause === undefined ? undefined : { cause: context.cause });
    this.name = new.target.name;
    this.kind = kind;
    this.detail = detail;
    this.dialect = context.dialect;
    this.clause = context.clause;
  }

  /** Whether retrying the same operation may succeed. */
  get retryable(): boolean {
    return false;
  }
}

function formatMessage(kind: ErrorKind, detail: string, context: ErrorContext): string {
  let prefix = `${kind} error`;
  if (context.dialect) prefix += ` (${context.dialect})`;
  if (context.clause) prefix += ` in ${context.clause}`;
  return `${prefix}: ${detail}`;
}

/** Malformed query structure, raised before any I/O. */
export class ConstructionError extends DatabaseError {
  constructor(detail: string, context: ErrorContext = {}) {
    super('construction', detail, context);
  }
}

/** Construct the active dialect cannot express. Never retryable. */
export class CapabilityError extends DatabaseError {
  constructor(detail: string, context: ErrorContext = {}) {
    super('capability', detail, context);
  }
}

export class ConnectionError extends DatabaseError {
  constructor(detail: string, context: ErrorContext = {}) {
    super('connection', detail, context);
  }

  override get retryable(): boolean {
    return true;
  }
}

export interface IntegrityContext extends ErrorContext {
  constraint?: string;
  columns?: string[];
}

export class IntegrityError extends DatabaseError {
  /** UNIQUE, FOREIGN KEY, NOT NULL, CHECK or PRIMARY KEY when the backend reports it. */
  readonly constraint?: string;
  readonly columns: string[];

  constructor(detail: string, context: IntegrityContext = {}) {
    super('integrity', detail, context);
    this.constraint = context.constraint;
    this.columns = context.columns ?? [];
  }
}

export class ConcurrencyError extends DatabaseError {
  constructor(detail: string, context: ErrorContext = {}) {
    super('concurrency', detail, context);
  }
}

export class DeadlockError extends ConcurrencyError {
  override get retryable(): boolean {
    return true;
  }
}

export class LockTimeoutError extends ConcurrencyError {}

export interface TypeConversionContext extends ErrorContext {
  logicalType?: string;
  column?: string;
}

export class TypeConversionError extends DatabaseError {
  readonly logicalType?: string;
  readonly column?: string;

  constructor(detail: string, context: TypeConversionContext = {}) {
    super('typeConversion', context.column ? `column "${context.column}": ${detail}` : detail, context);
    this.logicalType = context.logicalType;
    this.column = context.column;
  }
}

export class QueryError extends DatabaseError {
  readonly sql?: string;

  constructor(detail: string, context: ErrorContext & { sql?: string } = {}) {
    super('query', detail, context);
    this.sql = context.sql;
  }
}

/** A recursive CTE produced rows beyond its configured depth bound. */
export class RecursionLimitError extends QueryError {
  readonly cte: string;
  readonly maxDepth: number;

  constructor(cte: string, maxDepth: number, context: ErrorContext = {}) {
    super(`recursive CTE "${cte}" exceeded maximum depth ${maxDepth}; the data may contain a cycle`, {
      ...context,
      clause: context.clause ?? 'WITH RECURSIVE',
    });
    this.cte = cte;
    this.maxDepth = maxDepth;
  }
}

export class TransactionError extends DatabaseError {
  constructor(detail: string, context: ErrorContext = {}) {
    super('transaction', detail, context);
  }
}

export class IsolationLevelError extends TransactionError {}

export class StatementTimeoutError extends DatabaseError {
  readonly timeoutMs: number;

  constructor(timeoutMs: number, context: ErrorContext = {}) {
    super('timeout', `statement exceeded ${timeoutMs}ms; open transaction rolled back`, context);
    this.timeoutMs = timeoutMs;
  }
}

export class CancellationError extends DatabaseError {
  constructor(detail = 'operation cancelled', context: ErrorContext = {}) {
    super('cancellation', detail, context);
  }
}

export class ConfigurationError extends DatabaseError {
  constructor(detail: string, context: ErrorContext = {}) {
    super('configuration', detail, context);
  }
}

export class RecordNotFoundError extends DatabaseError {
  constructor(detail = 'no row matched the query', context: ErrorContext = {}) {
    super('notFound', detail, context);
  }
}

export function isDatabaseError(error: unknown): error is DatabaseError {
  return error instanceof DatabaseError;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

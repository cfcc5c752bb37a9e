/** Backend-neutral type tags. Every dialect maps each of them. */
export enum LogicalType {
  INTEGER = 'INTEGER',
  BIGINT = 'BIGINT',
  REAL = 'REAL',
  DECIMAL = 'DECIMAL',
  TEXT = 'TEXT',
  BLOB = 'BLOB',
  BOOLEAN = 'BOOLEAN',
  DATE = 'DATE',
  TIME = 'TIME',
  TIMESTAMP = 'TIMESTAMP',
  UUID = 'UUID',
  JSON = 'JSON',
}

export const LOGICAL_TYPES: readonly LogicalType[] = Object.values(LogicalType);

export type JsonValue = string | number | boolean | null | JsonValue[] | { [key: string]: JsonValue };

/** Values the application hands in and gets back. */
export type AppValue = JsonValue | bigint | Date | Uint8Array;

/** Values a driver binds or returns. */
export type NativeValue = string | number | bigint | boolean | Uint8Array | null;

export type Row = Record<string, AppValue>;

/** Column name to logical type, as declared by the model layer. */
export type ColumnTypes = Readonly<Record<string, LogicalType>>;

export function isLogicalType(value: string): value is LogicalType {
  return LOGICAL_TYPES.some((t) => t === value);
}

export function inferLogicalType(value: AppValue | undefined): LogicalType {
  if (value === null || value === undefined) return LogicalType.TEXT;
  if (typeof value === 'boolean') return LogicalType.BOOLEAN;
  if (typeof value === 'bigint') return LogicalType.BIGINT;
  if (typeof value === 'number') return Number.isInteger(value) ? LogicalType.INTEGER : LogicalType.REAL;
  if (typeof value === 'string') return LogicalType.TEXT;
  if (value instanceof Date) return LogicalType.TIMESTAMP;
  if (value instanceof Uint8Array) return LogicalType.BLOB;
  return LogicalType.JSON;
}

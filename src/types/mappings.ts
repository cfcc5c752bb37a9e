import { stringify as uuidStringify, validate as uuidValidate } from 'uuid';
import { type AppValue, type JsonValue, LogicalType, type NativeValue } from './logical-type.js';
import { type TypeCodec, type TypeCodecs, TypeMapping } from './type-mapping.js';

const DECIMAL_PATTERN = /^-?\d+(\.\d+)?$/;
const INTEGER_PATTERN = /^-?\d+$/;
const DATE_PATTERN = /^\d{4}-\d{2}-\d{2}$/;
const TIME_PATTERN = /^\d{2}:\d{2}(:\d{2}(\.\d{1,6})?)?$/;

function preview(value: AppValue | NativeValue): string {
  if (value instanceof Uint8Array) return `<${value.length} bytes>`;
  if (value instanceof Date) return value.toISOString();
  if (typeof value === 'bigint') return `${value}n`;
  return JSON.stringify(value) ?? String(value);
}

function reject(value: AppValue | NativeValue, target: string): never {
  throw new TypeError(`cannot convert ${preview(value)} to ${target}`);
}

function toSafeInteger(value: AppValue | NativeValue): number {
  if (typeof value === 'number' && Number.isSafeInteger(value)) return value;
  if (typeof value === 'bigint' && value >= BigInt(Number.MIN_SAFE_INTEGER) && value <= BigInt(Number.MAX_SAFE_INTEGER)) {
    return Number(value);
  }
  if (typeof value === 'string' && INTEGER_PATTERN.test(value) && Number.isSafeInteger(Number(value))) {
    return Number(value);
  }
  return reject(value, 'INTEGER');
}

function toBigInt(value: AppValue | NativeValue): bigint {
  if (typeof value === 'bigint') return value;
  if (typeof value === 'number' && Number.isInteger(value)) return BigInt(value);
  if (typeof value === 'string' && INTEGER_PATTERN.test(value)) return BigInt(value);
  return reject(value, 'BIGINT');
}

function validDate(date: Date, source: AppValue | NativeValue): Date {
  if (Number.isNaN(date.getTime())) reject(source, 'a valid date');
  return date;
}

function isJsonValue(value: unknown): value is JsonValue {
  if (value === null) return true;
  switch (typeof value) {
    case 'string':
    case 'boolean':
      return true;
    case 'number':
      return Number.isFinite(value);
    case 'object':
      if (Array.isArray(value)) return value.every(isJsonValue);
      return Object.values(value).every(isJsonValue);
    default:
      return false;
  }
}

function parseJson(text: string): JsonValue {
  const parsed: unknown = JSON.parse(text);
  if (!isJsonValue(parsed)) reject(text, 'JSON');
  return parsed;
}

const integer: TypeCodec = {
  nativeType: 'INTEGER',
  toDatabase: toSafeInteger,
  fromDatabase: toSafeInteger,
};

const real: TypeCodec = {
  nativeType: 'REAL',
  toDatabase(value) {
    if (typeof value === 'number' && Number.isFinite(value)) return value;
    return reject(value, 'REAL');
  },
  fromDatabase(value) {
    if (typeof value === 'number') return value;
    if (typeof value === 'string' && value.trim() !== '' && Number.isFinite(Number(value))) return Number(value);
    return reject(value, 'REAL');
  },
};

// Numbers whose shortest form uses an exponent (1e21, 1e-7) have no plain decimal text; pass those as strings.
function plainDecimal(value: number): string | undefined {
  const text = String(value);
  return DECIMAL_PATTERN.test(text) ? text : undefined;
}

const decimal: TypeCodec = {
  nativeType: 'TEXT',
  toDatabase(value) {
    if (typeof value === 'string' && DECIMAL_PATTERN.test(value)) return value;
    if (typeof value === 'bigint') return value.toString();
    if (typeof value === 'number') return plainDecimal(value) ?? reject(value, 'DECIMAL');
    return reject(value, 'DECIMAL');
  },
  fromDatabase(value) {
    if (typeof value === 'string' && DECIMAL_PATTERN.test(value)) return value;
    if (typeof value === 'number') return plainDecimal(value) ?? reject(value, 'DECIMAL');
    if (typeof value === 'bigint') return value.toString();
    return reject(value, 'DECIMAL');
  },
};

const text: TypeCodec = {
  nativeType: 'TEXT',
  toDatabase(value) {
    if (typeof value === 'string') return value;
    if (typeof value === 'number' || typeof value === 'bigint' || typeof value === 'boolean') return String(value);
    return reject(value, 'TEXT');
  },
  fromDatabase(value) {
    if (typeof value === 'string') return value;
    if (value instanceof Uint8Array) return new TextDecoder().decode(value);
    return String(value);
  },
};

const blob: TypeCodec = {
  nativeType: 'BLOB',
  toDatabase(value) {
    if (value instanceof Uint8Array) return value;
    return reject(value, 'BLOB');
  },
  fromDatabase(value) {
    if (value instanceof Uint8Array) return value;
    return reject(value, 'BLOB');
  },
};

/** Booleans stored as 0/1 where the backend has no boolean column. */
const integerBoolean: TypeCodec = {
  nativeType: 'INTEGER',
  toDatabase(value) {
    if (typeof value === 'boolean') return value ? 1 : 0;
    if (value === 0 || value === 1) return value;
    return reject(value, 'BOOLEAN');
  },
  fromDatabase(value) {
    if (typeof value === 'boolean') return value;
    if (value === 1 || value === BigInt(1) || value === '1') return true;
    if (value === 0 || value === BigInt(0) || value === '0') return false;
    return reject(value, 'BOOLEAN');
  },
};

const nativeBoolean: TypeCodec = {
  nativeType: 'BOOLEAN',
  toDatabase(value) {
    if (typeof value === 'boolean') return value;
    return reject(value, 'BOOLEAN');
  },
  fromDatabase(value) {
    if (typeof value === 'boolean') return value;
    if (value === 't' || value === 'true') return true;
    if (value === 'f' || value === 'false') return false;
    return reject(value, 'BOOLEAN');
  },
};

/** Dates are UTC calendar days. */
const date: TypeCodec = {
  nativeType: 'TEXT',
  toDatabase(value) {
    if (value instanceof Date) return validDate(value, value).toISOString().slice(0, 10);
    if (typeof value === 'string' && DATE_PATTERN.test(value)) return value;
    return reject(value, 'DATE');
  },
  fromDatabase(value) {
    if (typeof value === 'string' && DATE_PATTERN.test(value)) {
      return validDate(new Date(`${value}T00:00:00.000Z`), value);
    }
    return reject(value, 'DATE');
  },
};

const time: TypeCodec = {
  nativeType: 'TEXT',
  toDatabase(value) {
    if (typeof value === 'string' && TIME_PATTERN.test(value)) return value;
    return reject(value, 'TIME');
  },
  fromDatabase(value) {
    if (typeof value === 'string' && TIME_PATTERN.test(value)) return value;
    return reject(value, 'TIME');
  },
};

function parseTimestamp(value: AppValue | NativeValue): Date {
  if (value instanceof Date) return validDate(value, value);
  if (typeof value === 'number') return validDate(new Date(value), value);
  if (typeof value === 'string') {
    // Naive "YYYY-MM-DD HH:MM:SS" values are stored in UTC
    const iso = /[zZ]|[+-]\d{2}:?\d{2}$/.test(value) ? value : `${value.replace(' ', 'T')}Z`;
    return validDate(new Date(iso), value);
  }
  return reject(value, 'TIMESTAMP');
}

const isoTimestamp: TypeCodec = {
  nativeType: 'TEXT',
  toDatabase: (value) => parseTimestamp(value).toISOString(),
  fromDatabase: parseTimestamp,
};

const uuid: TypeCodec = {
  nativeType: 'TEXT',
  toDatabase(value) {
    if (typeof value === 'string' && uuidValidate(value)) return value.toLowerCase();
    return reject(value, 'UUID');
  },
  fromDatabase(value) {
    if (typeof value === 'string' && uuidValidate(value)) return value.toLowerCase();
    if (value instanceof Uint8Array && value.length === 16) return uuidStringify(value);
    return reject(value, 'UUID');
  },
};

const jsonText: TypeCodec = {
  nativeType: 'TEXT',
  toDatabase(value) {
    if (!isJsonValue(value)) return reject(value, 'JSON');
    return JSON.stringify(value);
  },
  fromDatabase(value) {
    if (typeof value === 'string') return parseJson(value);
    return reject(value, 'JSON');
  },
};

function native(codec: TypeCodec, nativeType: string): TypeCodec {
  return { ...codec, nativeType };
}

export function sqliteCodecs(): TypeCodecs {
  return {
    [LogicalType.INTEGER]: integer,
    [LogicalType.BIGINT]: {
      nativeType: 'INTEGER',
      toDatabase(value) {
        const big = toBigInt(value);
        const asNumber = Number(big);
        return Number.isSafeInteger(asNumber) ? asNumber : big.toString();
      },
      fromDatabase: toBigInt,
    },
    [LogicalType.REAL]: real,
    [LogicalType.DECIMAL]: decimal,
    [LogicalType.TEXT]: text,
    [LogicalType.BLOB]: blob,
    [LogicalType.BOOLEAN]: integerBoolean,
    [LogicalType.DATE]: date,
    [LogicalType.TIME]: time,
    [LogicalType.TIMESTAMP]: isoTimestamp,
    [LogicalType.UUID]: uuid,
    [LogicalType.JSON]: jsonText,
  };
}

export function postgresCodecs(): TypeCodecs {
  return {
    [LogicalType.INTEGER]: integer,
    [LogicalType.BIGINT]: {
      nativeType: 'BIGINT',
      toDatabase: (value) => toBigInt(value).toString(),
      fromDatabase: toBigInt,
    },
    [LogicalType.REAL]: native(real, 'DOUBLE PRECISION'),
    [LogicalType.DECIMAL]: native(decimal, 'NUMERIC'),
    [LogicalType.TEXT]: text,
    [LogicalType.BLOB]: native(blob, 'BYTEA'),
    [LogicalType.BOOLEAN]: nativeBoolean,
    [LogicalType.DATE]: native(date, 'DATE'),
    [LogicalType.TIME]: native(time, 'TIME'),
    [LogicalType.TIMESTAMP]: native(isoTimestamp, 'TIMESTAMPTZ'),
    [LogicalType.UUID]: native(uuid, 'UUID'),
    [LogicalType.JSON]: native(jsonText, 'JSONB'),
  };
}

export function mysqlCodecs(): TypeCodecs {
  return {
    [LogicalType.INTEGER]: native(integer, 'INT'),
    [LogicalType.BIGINT]: {
      nativeType: 'BIGINT',
      toDatabase: (value) => toBigInt(value).toString(),
      fromDatabase: toBigInt,
    },
    [LogicalType.REAL]: native(real, 'DOUBLE'),
    [LogicalType.DECIMAL]: native(decimal, 'DECIMAL(38,10)'),
    [LogicalType.TEXT]: text,
    [LogicalType.BLOB]: native(blob, 'LONGBLOB'),
    [LogicalType.BOOLEAN]: native(integerBoolean, 'TINYINT(1)'),
    [LogicalType.DATE]: native(date, 'DATE'),
    [LogicalType.TIME]: native(time, 'TIME'),
    [LogicalType.TIMESTAMP]: {
      nativeType: 'DATETIME(3)',
      // DATETIME carries no zone; values are written in UTC
      toDatabase: (value) => parseTimestamp(value).toISOString().replace('T', ' ').replace('Z', ''),
      fromDatabase: parseTimestamp,
    },
    [LogicalType.UUID]: native(uuid, 'CHAR(36)'),
    [LogicalType.JSON]: native(jsonText, 'JSON'),
  };
}

export function sqliteTypeMapping(): TypeMapping {
  return new TypeMapping('sqlite', sqliteCodecs());
}

export function postgresTypeMapping(): TypeMapping {
  return new TypeMapping('postgresql', postgresCodecs());
}

export function mysqlTypeMapping(): TypeMapping {
  return new TypeMapping('mysql', mysqlCodecs());
}

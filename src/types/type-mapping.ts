import { ConstructionError, TypeConversionError, errorMessage } from '../errors/errors.js';
import {
  type AppValue,
  LOGICAL_TYPES,
  type LogicalType,
  type NativeValue,
  inferLogicalType,
} from './logical-type.js';

/**
 * Conversion pair for one logical type. Codecs never see null; the mapping
 * passes null through untouched.
 */
export interface TypeCodec {
  nativeType: string;
  toDatabase(value: AppValue): NativeValue;
  fromDatabase(value: NativeValue): AppValue;
}

export type TypeCodecs = Readonly<Record<LogicalType, TypeCodec>>;

/**
 * Per-dialect table from logical type to native column type and value
 * encoding. Instances are immutable; `with` derives a new mapping.
 */
export class TypeMapping {
  private readonly codecs: ReadonlyMap<LogicalType, TypeCodec>;

  constructor(readonly dialect: string, codecs: Partial<Record<LogicalType, TypeCodec>>) {
    const table = new Map<LogicalType, TypeCodec>();
    const missing: LogicalType[] = [];
    for (const type of LOGICAL_TYPES) {
      const codec = codecs[type];
      if (codec) table.set(type, codec);
      else missing.push(type);
    }
    if (missing.length) {
      throw new ConstructionError(`no type mapping for ${missing.join(', ')}`, { dialect });
    }
    this.codecs = table;
  }

  nativeType(type: LogicalType): string {
    return this.codec(type).nativeType;
  }

  toDatabase(value: AppValue | undefined, type: LogicalType): NativeValue {
    if (value === null || value === undefined) return null;
    try {
      return this.codec(type).toDatabase(value);
    } catch (error) {
      throw this.conversionError(error, type);
    }
  }

  fromDatabase(value: NativeValue | undefined, type: LogicalType, column?: string): AppValue {
    if (value === null || value === undefined) return null;
    try {
      return this.codec(type).fromDatabase(value);
    } catch (error) {
      throw this.conversionError(error, type, column);
    }
  }

  inferType(value: AppValue | undefined): LogicalType {
    return inferLogicalType(value);
  }

  with(overrides: Partial<Record<LogicalType, TypeCodec>>): TypeMapping {
    const merged: Partial<Record<LogicalType, TypeCodec>> = {};
    for (const [type, codec] of this.codecs) merged[type] = codec;
    return new TypeMapping(this.dialect, { ...merged, ...overrides });
  }

  private codec(type: LogicalType): TypeCodec {
    const codec = this.codecs.get(type);
    if (!codec) throw new ConstructionError(`no type mapping for ${type}`, { dialect: this.dialect });
    return codec;
  }

  private conversionError(error: unknown, type: LogicalType, column?: string): TypeConversionError {
    if (error instanceof TypeConversionError) return error;
    return new TypeConversionError(errorMessage(error), {
      dialect: this.dialect,
      logicalType: type,
      column,
      cause: error,
    });
  }
}

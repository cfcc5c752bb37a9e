import type { ColumnTypes, Row } from '../types/logical-type.js';

export type StatementType = 'select' | 'dml' | 'ddl' | 'transaction' | 'other';

export interface ExecuteOptions {
  /** Declared logical types of result columns; undeclared columns come back as the driver returns them. */
  columnTypes?: ColumnTypes;
  /** Skip classification when the caller already knows. */
  statementType?: StatementType;
  allowDdlInTransaction?: boolean;
  timeoutMs?: number;
  signal?: AbortSignal;
}

export interface QueryResult {
  /** Filled only for row-returning statements. */
  rows: Row[];
  columns: string[];
  affectedRows: number;
  lastInsertId?: number | bigint;
  /** Milliseconds. */
  duration: number;
  statementType: StatementType;
}

export interface BatchResult {
  results: QueryResult[];
  totalRows: number;
  totalTime: number;
}

export interface QueryPlanNode {
  id: number;
  parent: number;
  detail: string;
  children: QueryPlanNode[];
}

export interface QueryPlan {
  sql: string;
  nodes: QueryPlanNode[];
  text: string;
}

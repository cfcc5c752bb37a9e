export * from './errors/errors.js';
export * from './types/logical-type.js';
export * from './types/type-mapping.js';
export * from './types/mappings.js';
export * from './ir/types.js';
export * from './ir/builders.js';
export { collectCteRefs, collectDepthGuards, bindCteNames, type GuardedCte } from './ir/walk.js';
export { RenderContext, compile, compileExpression } from './generator/sql.js';
export * from './dialect/capabilities.js';
export * from './dialect/base-dialect.js';
export * from './dialect/sqlite-dialect.js';
export * from './dialect/postgres-dialect.js';
export * from './dialect/mysql-dialect.js';
export * from './dialect/registry.js';
export * from './query/execution-mode.js';
export type { ExecutionPlan } from './query/execution.js';
export { SelectQuery, type Conditions, type SourceInput, type JoinCondition } from './query/select-query.js';
export { ActiveQuery } from './query/active-query.js';
export { CTEQuery, type CteInput, type CteOptions, type RecursiveCteOptions } from './query/cte-query.js';
export { SetOperationQuery, type SetOperand } from './query/set-operation-query.js';
export * from './query/dml.js';
export { optimizeStatement } from './optimizer/optimizer.js';
export type * from './adapters/result.js';
export * from './adapters/base-adapter.js';
export * from './adapters/async-adapter.js';
export { SqliteBackend, loadSqlJs, type SqliteBackendOptions } from './sqlite/db.js';
export { describeTable, listTables, logicalTypeFor } from './schema/introspect.js';
export { buildPlanTree, formatPlan, explainResult } from './explain/explainer.js';
export * from './config/config.js';
export { logger, setLogLevel } from './utils/logger.js';

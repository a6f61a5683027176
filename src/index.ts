/**
 * schema-ledger
 * Linear schema-migration ledger for the game bot database
 */

export * from './ledger/types.js';
export * from './ledger/errors.js';
export {
  addColumn,
  addConstraint,
  check,
  checkReversible,
  column,
  constraintName,
  createIndex,
  createTable,
  describeOperation,
  dropColumn,
  dropConstraint,
  dropIndex,
  dropTable,
  invertOperation,
  invertOperations,
  operationsEqual,
  varchar,
} from './ledger/operations.js';
export type { ReversibilityIssue } from './ledger/operations.js';
export { RevisionChain } from './ledger/RevisionChain.js';
export { MigrationLedger } from './ledger/MigrationLedger.js';
export type {
  HistoryEntry,
  LedgerOptions,
  MigrationPlan,
  MigrationResult,
  RunOptions,
} from './ledger/MigrationLedger.js';
export { SqliteSchemaDriver, REVISION_TABLE, REVISION_LOG_TABLE } from './storage/SqliteSchemaDriver.js';
export type { SqliteDriverConfig, SchemaSnapshot, ColumnSnapshot } from './storage/SqliteSchemaDriver.js';
export { renderOperation, renderCreateTable } from './storage/sqliteDialect.js';
export { allRevisions, JOB_TYPES_V1, JOB_TYPES_V2, QUEST_TYPES_V1, QUEST_TYPES_V2 } from './revisions/index.js';
export { loadConfig, DEFAULT_DATABASE_PATH } from './config.js';
export type { LedgerConfig } from './config.js';
export { createLogger, silentLogger } from './logger.js';
export type { Logger, LogLevel, LogSink } from './logger.js';
export { runCli } from './cli/commands.js';

/**
 * Ledger types: revisions, schema operations and the driver contract
 */

// ============================================================================
// Columns and constraints
// ============================================================================

export type ScalarColumnType = 'integer' | 'bigint' | 'boolean' | 'datetime';

export interface StringColumnType {
  kind: 'string';
  length: number;
}

export type ColumnType = ScalarColumnType | StringColumnType;

/** Server-side expression defaults */
export interface SqlDefault {
  sql: 'now';
}

export type ColumnDefault = string | number | boolean | SqlDefault;

export type OnDeleteAction = 'cascade' | 'set null' | 'restrict' | 'no action';

export interface ColumnReference {
  table: string;
  column: string;
  onDelete?: OnDeleteAction;
}

export interface ColumnDefinition {
  name: string;
  type: ColumnType;
  /** Defaults to true */
  nullable?: boolean;
  serverDefault?: ColumnDefault;
  /** Inline foreign key */
  references?: ColumnReference;
}

export interface CheckConstraint {
  type: 'check';
  name: string;
  /** SQL predicate over the table's columns */
  predicate: string;
}

export interface UniqueConstraint {
  type: 'unique';
  /** Derived as `<table>_<columns>_key` when omitted */
  name?: string;
  columns: string[];
}

export interface ForeignKeyConstraint {
  type: 'foreign_key';
  name?: string;
  columns: string[];
  referencedTable: string;
  referencedColumns: string[];
  onDelete?: OnDeleteAction;
}

export type TableConstraint = CheckConstraint | UniqueConstraint | ForeignKeyConstraint;

// ============================================================================
// Operations
// ============================================================================

export interface TableDefinition {
  table: string;
  columns: ColumnDefinition[];
  primaryKey?: string[];
  constraints?: TableConstraint[];
}

export interface CreateTableOperation extends TableDefinition {
  kind: 'create_table';
}

/** Carries the full definition so the drop can be reversed */
export interface DropTableOperation extends TableDefinition {
  kind: 'drop_table';
}

export interface AddColumnOperation {
  kind: 'add_column';
  table: string;
  column: ColumnDefinition;
}

export interface DropColumnOperation {
  kind: 'drop_column';
  table: string;
  column: ColumnDefinition;
}

export interface IndexDefinition {
  name: string;
  table: string;
  columns: string[];
  unique?: boolean;
}

export interface CreateIndexOperation extends IndexDefinition {
  kind: 'create_index';
}

export interface DropIndexOperation extends IndexDefinition {
  kind: 'drop_index';
}

export interface AddConstraintOperation {
  kind: 'add_constraint';
  table: string;
  constraint: TableConstraint;
}

export interface DropConstraintOperation {
  kind: 'drop_constraint';
  table: string;
  constraint: TableConstraint;
}

export type SchemaOperation =
  | CreateTableOperation
  | DropTableOperation
  | AddColumnOperation
  | DropColumnOperation
  | CreateIndexOperation
  | DropIndexOperation
  | AddConstraintOperation
  | DropConstraintOperation;

export type SchemaOperationKind = SchemaOperation['kind'];

// ============================================================================
// Revisions
// ============================================================================

export interface Revision {
  /** Opaque unique token (e.g. '013') */
  id: string;
  /** Revision this one directly follows; null for the root */
  parentId: string | null;
  /** Human-readable summary */
  message: string;
  createdAt?: string;
  upgrade: SchemaOperation[];
  /** Structural inverse of `upgrade`, in reverse order */
  downgrade: SchemaOperation[];
}

export enum Direction {
  Up = 'up',
  Down = 'down',
}

/** Symbolic targets accepted wherever a revision id is */
export const HEAD = 'head';
export const BASE = 'base';

// ============================================================================
// Applied state and driver contract
// ============================================================================

export interface ExecutedStep {
  revisionId: string;
  direction: Direction;
  appliedAt: number;
}

export interface SchemaTransaction {
  apply(operation: SchemaOperation): Promise<void>;
  writeCurrent(revisionId: string | null): Promise<void>;
  appendLog(step: ExecutedStep): Promise<void>;
}

/**
 * Access to the target store. The applied revision lives here, not in the ledger.
 */
export interface SchemaDriver {
  readCurrent(): Promise<string | null>;
  readLog(): Promise<ExecutedStep[]>;
  /** Commits when `work` resolves, rolls back and rethrows when it rejects */
  transaction<T>(work: (tx: SchemaTransaction) => Promise<T>): Promise<T>;
  close(): Promise<void>;
}

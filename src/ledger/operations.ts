/**
 * Schema operation builders, inversion and comparison
 */

import type {
  AddColumnOperation,
  AddConstraintOperation,
  CheckConstraint,
  ColumnDefinition,
  ColumnType,
  CreateIndexOperation,
  CreateTableOperation,
  DropColumnOperation,
  DropConstraintOperation,
  DropIndexOperation,
  DropTableOperation,
  IndexDefinition,
  Revision,
  SchemaOperation,
  StringColumnType,
  TableConstraint,
  TableDefinition,
} from './types.js';

// ============================================================================
// Builders
// ============================================================================

export function varchar(length: number): StringColumnType {
  return { kind: 'string', length };
}

export function column(
  name: string,
  type: ColumnType,
  options: Omit<ColumnDefinition, 'name' | 'type'> = {}
): ColumnDefinition {
  return { name, type, ...options };
}

export function createTable(definition: TableDefinition): CreateTableOperation {
  return { kind: 'create_table', ...definition };
}

export function dropTable(definition: TableDefinition): DropTableOperation {
  return { kind: 'drop_table', ...definition };
}

export function addColumn(table: string, definition: ColumnDefinition): AddColumnOperation {
  return { kind: 'add_column', table, column: definition };
}

export function dropColumn(table: string, definition: ColumnDefinition): DropColumnOperation {
  return { kind: 'drop_column', table, column: definition };
}

export function createIndex(definition: IndexDefinition): CreateIndexOperation {
  return { kind: 'create_index', ...definition };
}

export function dropIndex(definition: IndexDefinition): DropIndexOperation {
  return { kind: 'drop_index', ...definition };
}

export function check(name: string, predicate: string): CheckConstraint {
  return { type: 'check', name, predicate };
}

export function addConstraint(table: string, constraint: TableConstraint): AddConstraintOperation {
  return { kind: 'add_constraint', table, constraint };
}

export function dropConstraint(table: string, constraint: TableConstraint): DropConstraintOperation {
  return { kind: 'drop_constraint', table, constraint };
}

// ============================================================================
// Naming and description
// ============================================================================

/**
 * Constraint name, falling back to PostgreSQL's default naming
 */
export function constraintName(table: string, constraint: TableConstraint): string {
  switch (constraint.type) {
    case 'check':
      return constraint.name;
    case 'unique':
      return constraint.name ?? `${table}_${constraint.columns.join('_')}_key`;
    case 'foreign_key':
      return constraint.name ?? `${table}_${constraint.columns.join('_')}_fkey`;
  }
}

export function describeOperation(operation: SchemaOperation): string {
  switch (operation.kind) {
    case 'create_table':
    case 'drop_table':
      return `${operation.kind} ${operation.table}`;
    case 'add_column':
    case 'drop_column':
      return `${operation.kind} ${operation.table}.${operation.column.name}`;
    case 'create_index':
    case 'drop_index':
      return `${operation.kind} ${operation.name} on ${operation.table}`;
    case 'add_constraint':
    case 'drop_constraint':
      return `${operation.kind} ${constraintName(operation.table, operation.constraint)} on ${operation.table}`;
  }
}

// ============================================================================
// Inversion
// ============================================================================

export function invertOperation(operation: SchemaOperation): SchemaOperation {
  switch (operation.kind) {
    case 'create_table': {
      const { kind: _kind, ...definition } = operation;
      return dropTable(definition);
    }
    case 'drop_table': {
      const { kind: _kind, ...definition } = operation;
      return createTable(definition);
    }
    case 'add_column':
      return dropColumn(operation.table, operation.column);
    case 'drop_column':
      return addColumn(operation.table, operation.column);
    case 'create_index': {
      const { kind: _kind, ...definition } = operation;
      return dropIndex(definition);
    }
    case 'drop_index': {
      const { kind: _kind, ...definition } = operation;
      return createIndex(definition);
    }
    case 'add_constraint':
      return dropConstraint(operation.table, operation.constraint);
    case 'drop_constraint':
      return addConstraint(operation.table, operation.constraint);
  }
}

/**
 * Inverse of a whole batch: each operation inverted, order reversed
 */
export function invertOperations(operations: SchemaOperation[]): SchemaOperation[] {
  return operations.map(invertOperation).reverse();
}

function canonicalize(value: unknown): unknown {
  if (Array.isArray(value)) {
    return value.map(canonicalize);
  }
  if (value !== null && typeof value === 'object') {
    const entries = Object.entries(value)
      .filter(([, v]) => v !== undefined)
      .sort(([a], [b]) => a.localeCompare(b))
      .map(([k, v]) => [k, canonicalize(v)] as const);
    return Object.fromEntries(entries);
  }
  return value;
}

/**
 * Structural equality, independent of key order
 */
export function operationsEqual(a: SchemaOperation, b: SchemaOperation): boolean {
  return JSON.stringify(canonicalize(a)) === JSON.stringify(canonicalize(b));
}

export interface ReversibilityIssue {
  revisionId: string;
  reason: string;
}

/**
 * Report where a revision's downgrade is not the exact inverse of its upgrade
 */
export function checkReversible(revision: Revision): ReversibilityIssue | null {
  const expected = invertOperations(revision.upgrade);
  const actual = revision.downgrade;

  if (expected.length !== actual.length) {
    return {
      revisionId: revision.id,
      reason: `downgrade has ${actual.length} operations, expected ${expected.length}`,
    };
  }

  for (let i = 0; i < expected.length; i++) {
    if (!operationsEqual(expected[i], actual[i])) {
      const want = describeOperation(expected[i]);
      const found = describeOperation(actual[i]);
      return {
        revisionId: revision.id,
        reason: want === found
          ? `operation #${i + 1}: ${found} does not restore the original definition`
          : `operation #${i + 1}: expected ${want}, found ${found}`,
      };
    }
  }

  return null;
}

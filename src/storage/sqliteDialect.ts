/**
 * SQLite dialect - renders schema operations to DDL statements
 *
 * SQLite cannot add or drop constraints on an existing table, so named CHECK
 * constraints are emitted as a pair of BEFORE INSERT / BEFORE UPDATE triggers
 * and UNIQUE constraints as unique indexes. Both can then be dropped by name.
 * Triggers only guard new writes; the driver checks existing rows with
 * renderCheckViolationQuery before adding a check to a table.
 *
 * Operations SQLite rejects on an existing table:
 * - add_constraint / drop_constraint of a foreign key
 * - add_column with a { sql: 'now' } default (non-constant)
 * - add_column that is NOT NULL without a server default
 * - drop_column of a column an index or check trigger refers to
 */

import { constraintName } from '../ledger/operations.js';
import type {
  CheckConstraint,
  ColumnDefault,
  ColumnDefinition,
  ColumnType,
  ForeignKeyConstraint,
  IndexDefinition,
  OnDeleteAction,
  SchemaOperation,
  TableConstraint,
  TableDefinition,
} from '../ledger/types.js';

export interface DialectContext {
  /** Column names of an existing table */
  columnsOf(table: string): string[];
}

export const CHECK_TRIGGER_EVENTS = ['insert', 'update'] as const;

export function quoteIdent(name: string): string {
  return `"${name.replace(/"/g, '""')}"`;
}

function quoteLiteral(value: string): string {
  return `'${value.replace(/'/g, "''")}'`;
}

function identList(names: string[]): string {
  return names.map(quoteIdent).join(', ');
}

export function renderType(type: ColumnType): string {
  if (typeof type === 'object') {
    return `VARCHAR(${type.length})`;
  }
  switch (type) {
    case 'integer':
      return 'INTEGER';
    case 'bigint':
      return 'BIGINT';
    case 'boolean':
      return 'BOOLEAN';
    case 'datetime':
      return 'DATETIME';
  }
}

export function renderDefault(value: ColumnDefault): string {
  if (typeof value === 'boolean') return value ? '1' : '0';
  if (typeof value === 'number') return String(value);
  if (typeof value === 'string') return quoteLiteral(value);
  return 'CURRENT_TIMESTAMP';
}

function renderOnDelete(action: OnDeleteAction | undefined): string {
  return action ? ` ON DELETE ${action.toUpperCase()}` : '';
}

export function renderColumn(column: ColumnDefinition): string {
  let sql = `${quoteIdent(column.name)} ${renderType(column.type)}`;
  if (column.nullable === false) {
    sql += ' NOT NULL';
  }
  if (column.serverDefault !== undefined) {
    sql += ` DEFAULT ${renderDefault(column.serverDefault)}`;
  }
  if (column.references) {
    const { table, column: target, onDelete } = column.references;
    sql += ` REFERENCES ${quoteIdent(table)} (${quoteIdent(target)})${renderOnDelete(onDelete)}`;
  }
  return sql;
}

function renderForeignKey(table: string, constraint: ForeignKeyConstraint): string {
  return (
    `CONSTRAINT ${quoteIdent(constraintName(table, constraint))} ` +
    `FOREIGN KEY (${identList(constraint.columns)}) ` +
    `REFERENCES ${quoteIdent(constraint.referencedTable)} (${identList(constraint.referencedColumns)})` +
    renderOnDelete(constraint.onDelete)
  );
}

/**
 * Prefix bare column references in a predicate with NEW. so it can run inside a trigger
 */
export function qualifyPredicate(predicate: string, columns: string[]): string {
  const known = new Set(columns.map(c => c.toLowerCase()));
  let out = '';
  let i = 0;

  while (i < predicate.length) {
    const ch = predicate[i];

    if (ch === "'") {
      let j = i + 1;
      while (j < predicate.length) {
        if (predicate[j] === "'" && predicate[j + 1] === "'") {
          j += 2;
        } else if (predicate[j] === "'") {
          break;
        } else {
          j++;
        }
      }
      out += predicate.slice(i, j + 1);
      i = j + 1;
      continue;
    }

    if (ch === '"') {
      const end = predicate.indexOf('"', i + 1);
      const close = end === -1 ? predicate.length : end;
      const name = predicate.slice(i + 1, close);
      out += known.has(name.toLowerCase()) ? `NEW.${quoteIdent(name)}` : predicate.slice(i, close + 1);
      i = close + 1;
      continue;
    }

    if (/[0-9]/.test(ch)) {
      const match = /^[0-9][A-Za-z0-9_.]*/.exec(predicate.slice(i));
      const literal = match ? match[0] : ch;
      out += literal;
      i += literal.length;
      continue;
    }

    if (/[A-Za-z_]/.test(ch)) {
      const match = /^[A-Za-z_][A-Za-z0-9_]*/.exec(predicate.slice(i));
      const word = match ? match[0] : ch;
      const qualified = out.trimEnd().endsWith('.');
      out += known.has(word.toLowerCase()) && !qualified ? `NEW.${quoteIdent(word)}` : word;
      i += word.length;
      continue;
    }

    out += ch;
    i++;
  }

  return out;
}

export function checkTriggerName(constraint: string, event: (typeof CHECK_TRIGGER_EVENTS)[number]): string {
  return `${constraint}__${event}`;
}

function renderCheckTriggers(table: string, constraint: CheckConstraint, columns: string[]): string[] {
  const condition = qualifyPredicate(constraint.predicate, columns);
  const message = quoteLiteral(`CHECK constraint failed: ${constraint.name}`);
  return CHECK_TRIGGER_EVENTS.map(event =>
    `CREATE TRIGGER ${quoteIdent(checkTriggerName(constraint.name, event))} ` +
    `BEFORE ${event.toUpperCase()} ON ${quoteIdent(table)} FOR EACH ROW ` +
    `WHEN NOT (${condition}) ` +
    `BEGIN SELECT RAISE(ABORT, ${message}); END`
  );
}

/**
 * Query returning a row when an existing row violates the check
 */
export function renderCheckViolationQuery(table: string, constraint: CheckConstraint): string {
  return `SELECT 1 FROM ${quoteIdent(table)} WHERE NOT (${constraint.predicate}) LIMIT 1`;
}

function renderIndex(index: IndexDefinition): string {
  const unique = index.unique ? 'UNIQUE ' : '';
  return `CREATE ${unique}INDEX ${quoteIdent(index.name)} ON ${quoteIdent(index.table)} (${identList(index.columns)})`;
}

function renderAddConstraint(table: string, constraint: TableConstraint, columns: string[]): string[] {
  switch (constraint.type) {
    case 'check':
      return renderCheckTriggers(table, constraint, columns);
    case 'unique':
      return [renderIndex({
        name: constraintName(table, constraint),
        table,
        columns: constraint.columns,
        unique: true,
      })];
    case 'foreign_key':
      throw new Error(
        `SQLite cannot add foreign key ${constraintName(table, constraint)} to existing table ${table}`
      );
  }
}

function renderDropConstraint(table: string, constraint: TableConstraint): string[] {
  switch (constraint.type) {
    case 'check':
      return CHECK_TRIGGER_EVENTS.map(event =>
        `DROP TRIGGER ${quoteIdent(checkTriggerName(constraint.name, event))}`
      );
    case 'unique':
      return [`DROP INDEX ${quoteIdent(constraintName(table, constraint))}`];
    case 'foreign_key':
      throw new Error(
        `SQLite cannot drop foreign key ${constraintName(table, constraint)} from existing table ${table}`
      );
  }
}

export function renderCreateTable(definition: TableDefinition): string[] {
  const { table, columns, primaryKey, constraints = [] } = definition;
  const body = columns.map(renderColumn);

  if (primaryKey && primaryKey.length > 0) {
    body.push(`PRIMARY KEY (${identList(primaryKey)})`);
  }
  for (const constraint of constraints) {
    if (constraint.type === 'foreign_key') {
      body.push(renderForeignKey(table, constraint));
    }
  }

  const statements = [`CREATE TABLE ${quoteIdent(table)} (\n  ${body.join(',\n  ')}\n)`];
  const columnNames = columns.map(c => c.name);
  for (const constraint of constraints) {
    if (constraint.type !== 'foreign_key') {
      statements.push(...renderAddConstraint(table, constraint, columnNames));
    }
  }
  return statements;
}

/**
 * Render one operation to the statements that perform it, in execution order
 */
export function renderOperation(operation: SchemaOperation, context: DialectContext): string[] {
  switch (operation.kind) {
    case 'create_table':
      return renderCreateTable(operation);
    case 'drop_table':
      return [`DROP TABLE ${quoteIdent(operation.table)}`];
    case 'add_column':
      return [`ALTER TABLE ${quoteIdent(operation.table)} ADD COLUMN ${renderColumn(operation.column)}`];
    case 'drop_column':
      return [`ALTER TABLE ${quoteIdent(operation.table)} DROP COLUMN ${quoteIdent(operation.column.name)}`];
    case 'create_index':
      return [renderIndex(operation)];
    case 'drop_index':
      return [`DROP INDEX ${quoteIdent(operation.name)}`];
    case 'add_constraint':
      return renderAddConstraint(operation.table, operation.constraint, context.columnsOf(operation.table));
    case 'drop_constraint':
      return renderDropConstraint(operation.table, operation.constraint);
  }
}

/**
 * Column and constraint shorthands shared by the game schema revisions
 */

import { column } from '../ledger/operations.js';
import type {
  ColumnDefinition,
  ColumnType,
  ForeignKeyConstraint,
  OnDeleteAction,
  SqlDefault,
  UniqueConstraint,
} from '../ledger/types.js';

export const NOW: SqlDefault = { sql: 'now' };

/** Integer surrogate key */
export function id(name = 'id'): ColumnDefinition {
  return column(name, 'integer', { nullable: false });
}

export function required(
  name: string,
  type: ColumnType,
  serverDefault?: ColumnDefinition['serverDefault']
): ColumnDefinition {
  return column(name, type, { nullable: false, serverDefault });
}

export function optional(name: string, type: ColumnType): ColumnDefinition {
  return column(name, type, { nullable: true });
}

/** NOT NULL timestamp defaulting to the current time */
export function stamped(name: string): ColumnDefinition {
  return required(name, 'datetime', NOW);
}

/** Column referencing users.telegram_id inline */
export function userColumn(
  name: string,
  options: { nullable?: boolean; onDelete?: OnDeleteAction } = {}
): ColumnDefinition {
  return column(name, 'bigint', {
    nullable: options.nullable ?? false,
    references: { table: 'users', column: 'telegram_id', onDelete: options.onDelete },
  });
}

export function foreignKey(
  columns: string[],
  referencedTable: string,
  referencedColumns: string[],
  onDelete?: OnDeleteAction
): ForeignKeyConstraint {
  return { type: 'foreign_key', columns, referencedTable, referencedColumns, onDelete };
}

export function userForeignKey(columnName: string, onDelete?: OnDeleteAction): ForeignKeyConstraint {
  return foreignKey([columnName], 'users', ['telegram_id'], onDelete);
}

export function unique(columns: string[], name?: string): UniqueConstraint {
  return { type: 'unique', name, columns };
}

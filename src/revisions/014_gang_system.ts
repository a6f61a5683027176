/**
 * Revision 014: Gangs and their members
 */

import { column, createTable, dropTable, varchar } from '../ledger/operations.js';
import type { Revision, TableDefinition } from '../ledger/types.js';
import { id, required, stamped, unique, userColumn } from './columns.js';

const gangs: TableDefinition = {
  table: 'gangs',
  columns: [
    id(),
    required('name', varchar(30)),
    userColumn('leader_id', { onDelete: 'cascade' }),
    required('bank', 'bigint', 0),
    required('level', 'integer', 1),
    stamped('created_at'),
  ],
  primaryKey: ['id'],
  constraints: [unique(['name'])],
};

const gangMembers: TableDefinition = {
  table: 'gang_members',
  columns: [
    id(),
    column('gang_id', 'integer', {
      nullable: false,
      references: { table: 'gangs', column: 'id', onDelete: 'cascade' },
    }),
    userColumn('user_id', { onDelete: 'cascade' }),
    required('role', varchar(20), 'member'),
    stamped('joined_at'),
  ],
  primaryKey: ['id'],
  constraints: [unique(['user_id'])],
};

export const revision014: Revision = {
  id: '014',
  parentId: '013',
  message: 'gang system',
  upgrade: [createTable(gangs), createTable(gangMembers)],
  downgrade: [dropTable(gangMembers), dropTable(gangs)],
};

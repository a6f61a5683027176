/**
 * Revision 013: Bounty system
 */

import { createIndex, createTable, dropIndex, dropTable } from '../ledger/operations.js';
import type { IndexDefinition, Revision, TableDefinition } from '../ledger/types.js';
import { id, optional, required, stamped, userColumn } from './columns.js';

const bounties: TableDefinition = {
  table: 'bounties',
  columns: [
    id(),
    userColumn('placer_id', { onDelete: 'cascade' }),
    userColumn('target_id', { onDelete: 'cascade' }),
    required('amount', 'bigint'),
    // The game sets is_active itself; there is no server default
    required('is_active', 'boolean'),
    stamped('created_at'),
    userColumn('collected_by_id', { nullable: true }),
    optional('collected_at', 'datetime'),
  ],
  primaryKey: ['id'],
};

const targetActive: IndexDefinition = {
  name: 'ix_bounties_target_active',
  table: 'bounties',
  columns: ['target_id', 'is_active'],
};

export const revision013: Revision = {
  id: '013',
  parentId: '012',
  message: 'bounty system',
  upgrade: [createTable(bounties), createIndex(targetActive)],
  downgrade: [dropIndex(targetActive), dropTable(bounties)],
};

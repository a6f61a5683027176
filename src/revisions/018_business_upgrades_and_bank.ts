/**
 * Revision 018: Business upgrade levels and bank deposits
 */

import {
  addColumn,
  createIndex,
  createTable,
  dropColumn,
  dropIndex,
  dropTable,
} from '../ledger/operations.js';
import type { IndexDefinition, Revision, TableDefinition } from '../ledger/types.js';
import { id, optional, required, stamped, userColumn } from './columns.js';

// Levels 1-3, enforced by the game
const upgradeLevel = required('upgrade_level', 'integer', 1);

const bankDeposits: TableDefinition = {
  table: 'bank_deposits',
  columns: [
    id(),
    userColumn('user_id', { onDelete: 'cascade' }),
    required('amount', 'bigint'),
    stamped('deposited_at'),
    stamped('last_interest_at'),
    required('is_active', 'boolean', true),
    optional('withdrawn_at', 'datetime'),
  ],
  primaryKey: ['id'],
};

const userActive: IndexDefinition = {
  name: 'ix_bank_deposits_user_active',
  table: 'bank_deposits',
  columns: ['user_id', 'is_active'],
};

export const revision018: Revision = {
  id: '018',
  parentId: '017',
  message: 'business upgrades and bank',
  upgrade: [
    addColumn('businesses', upgradeLevel),
    createTable(bankDeposits),
    createIndex(userActive),
  ],
  downgrade: [
    dropIndex(userActive),
    dropTable(bankDeposits),
    dropColumn('businesses', upgradeLevel),
  ],
};

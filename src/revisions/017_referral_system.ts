/**
 * Revision 017: Referral system
 */

import { createIndex, createTable, dropIndex, dropTable, varchar } from '../ledger/operations.js';
import type { IndexDefinition, Revision, TableDefinition } from '../ledger/types.js';
import { id, optional, required, stamped, unique, userColumn } from './columns.js';

const referrals: TableDefinition = {
  table: 'referrals',
  columns: [
    id(),
    userColumn('referrer_id', { onDelete: 'cascade' }),
    userColumn('referred_id', { onDelete: 'cascade' }),
    stamped('referred_at'),
    required('active_days', 'integer', 0),
    optional('last_active_date', varchar(10)),
    required('reward_given', 'boolean', false),
    optional('reward_given_at', 'datetime'),
  ],
  primaryKey: ['id'],
  constraints: [unique(['referred_id'])],
};

const byReferrer: IndexDefinition = {
  name: 'ix_referrals_referrer_id',
  table: 'referrals',
  columns: ['referrer_id'],
};

export const revision017: Revision = {
  id: '017',
  parentId: '016',
  message: 'referral system',
  upgrade: [createTable(referrals), createIndex(byReferrer)],
  downgrade: [dropIndex(byReferrer), dropTable(referrals)],
};

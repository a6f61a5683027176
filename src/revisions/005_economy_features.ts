/**
 * Revision 005: Economy features
 *
 * Daily rewards on users, plus loans and lotteries.
 */

import {
  addColumn,
  createTable,
  dropColumn,
  dropTable,
} from '../ledger/operations.js';
import type { ColumnDefinition, Revision, TableDefinition } from '../ledger/types.js';
import { foreignKey, id, optional, required, stamped, userForeignKey } from './columns.js';

const dailyStreak: ColumnDefinition = required('daily_streak', 'integer', 0);
const lastDailyAt: ColumnDefinition = optional('last_daily_at', 'datetime');

const loans: TableDefinition = {
  table: 'loans',
  columns: [
    id(),
    required('user_id', 'bigint'),
    required('amount', 'bigint'),
    required('interest_rate', 'integer', 20),
    stamped('created_at'),
    required('due_at', 'datetime'),
    required('penalty_charged', 'boolean', false),
    required('is_active', 'boolean', true),
  ],
  primaryKey: ['id'],
  constraints: [userForeignKey('user_id', 'cascade')],
};

const lotteries: TableDefinition = {
  table: 'lotteries',
  columns: [
    id(),
    required('jackpot', 'bigint', 0),
    required('is_active', 'boolean', true),
    stamped('started_at'),
    optional('ended_at', 'datetime'),
    optional('winner_id', 'bigint'),
  ],
  primaryKey: ['id'],
  constraints: [userForeignKey('winner_id')],
};

const lotteryTickets: TableDefinition = {
  table: 'lottery_tickets',
  columns: [
    id(),
    required('lottery_id', 'integer'),
    required('user_id', 'bigint'),
    stamped('purchased_at'),
  ],
  primaryKey: ['id'],
  constraints: [
    foreignKey(['lottery_id'], 'lotteries', ['id'], 'cascade'),
    userForeignKey('user_id', 'cascade'),
  ],
};

export const revision005: Revision = {
  id: '005',
  parentId: '004',
  message: 'economy features',
  createdAt: '2025-01-21',
  upgrade: [
    addColumn('users', dailyStreak),
    addColumn('users', lastDailyAt),
    createTable(loans),
    createTable(lotteries),
    createTable(lotteryTickets),
  ],
  downgrade: [
    dropTable(lotteryTickets),
    dropTable(lotteries),
    dropTable(loans),
    dropColumn('users', lastDailyAt),
    dropColumn('users', dailyStreak),
  ],
};

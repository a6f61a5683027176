/**
 * Revision 008: Advanced economy
 *
 * Investments, stocks, auctions, taxes and insurance.
 */

import { check, createTable, dropTable, varchar } from '../ledger/operations.js';
import type { Revision, TableDefinition } from '../ledger/types.js';
import { foreignKey, id, optional, required, stamped, unique, userForeignKey } from './columns.js';

const investments: TableDefinition = {
  table: 'investments',
  columns: [
    id(),
    required('user_id', 'bigint'),
    required('amount', 'bigint'),
    required('return_percentage', 'integer'),
    required('is_completed', 'boolean', false),
    stamped('created_at'),
    required('completes_at', 'datetime'),
  ],
  primaryKey: ['id'],
  constraints: [userForeignKey('user_id', 'cascade')],
};

const stocks: TableDefinition = {
  table: 'stocks',
  columns: [
    id(),
    required('company', varchar(50)),
    required('price', 'integer'),
    stamped('last_updated'),
  ],
  primaryKey: ['id'],
  constraints: [unique(['company'])],
};

const userStocks: TableDefinition = {
  table: 'user_stocks',
  columns: [
    id(),
    required('user_id', 'bigint'),
    required('company', varchar(50)),
    required('quantity', 'integer'),
  ],
  primaryKey: ['id'],
  constraints: [
    userForeignKey('user_id', 'cascade'),
    unique(['user_id', 'company'], 'uq_user_company'),
  ],
};

const auctions: TableDefinition = {
  table: 'auctions',
  columns: [
    id(),
    required('creator_id', 'bigint'),
    required('item', varchar(50)),
    required('start_price', 'bigint'),
    required('current_price', 'bigint'),
    optional('current_winner_id', 'bigint'),
    required('is_active', 'boolean', true),
    stamped('created_at'),
    required('ends_at', 'datetime'),
  ],
  primaryKey: ['id'],
  constraints: [
    check('auctions_item_check', "item IN ('vip_status', 'double_salary', 'lucky_charm')"),
    userForeignKey('creator_id', 'cascade'),
    userForeignKey('current_winner_id'),
  ],
};

const auctionBids: TableDefinition = {
  table: 'auction_bids',
  columns: [
    id(),
    required('auction_id', 'integer'),
    required('user_id', 'bigint'),
    required('amount', 'bigint'),
    stamped('created_at'),
  ],
  primaryKey: ['id'],
  constraints: [
    foreignKey(['auction_id'], 'auctions', ['id'], 'cascade'),
    userForeignKey('user_id', 'cascade'),
  ],
};

const taxPayments: TableDefinition = {
  table: 'tax_payments',
  columns: [
    id(),
    required('user_id', 'bigint'),
    required('amount', 'bigint'),
    required('balance_at_time', 'bigint'),
    stamped('created_at'),
  ],
  primaryKey: ['id'],
  constraints: [userForeignKey('user_id', 'cascade')],
};

const insurances: TableDefinition = {
  table: 'insurances',
  columns: [
    id(),
    required('user_id', 'bigint'),
    required('is_active', 'boolean', true),
    stamped('purchased_at'),
    required('expires_at', 'datetime'),
  ],
  primaryKey: ['id'],
  constraints: [
    userForeignKey('user_id', 'cascade'),
    unique(['user_id']),
  ],
};

const tables = [investments, stocks, userStocks, auctions, auctionBids, taxPayments, insurances];

export const revision008: Revision = {
  id: '008',
  parentId: '007',
  message: 'advanced economy',
  createdAt: '2025-01-21',
  upgrade: tables.map(createTable),
  downgrade: [...tables].reverse().map(dropTable),
};

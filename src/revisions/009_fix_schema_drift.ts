/**
 * Revision 009: Fix schema drift
 *
 * Creates the tables the game models use but no earlier revision created
 * (businesses, houses, children, kidnappings, casino games), adds the family
 * bank columns to marriages and indexes the hot lookup columns.
 */

import {
  addColumn,
  check,
  createIndex,
  createTable,
  invertOperations,
  varchar,
} from '../ledger/operations.js';
import type {
  ColumnDefinition,
  IndexDefinition,
  Revision,
  SchemaOperation,
  TableDefinition,
} from '../ledger/types.js';
import { foreignKey, id, optional, required, stamped, unique, userForeignKey } from './columns.js';

function index(table: string, columnName: string): IndexDefinition {
  return { name: `ix_${table}_${columnName}`, table, columns: [columnName] };
}

const businesses: TableDefinition = {
  table: 'businesses',
  columns: [
    id(),
    required('user_id', 'bigint'),
    required('business_type', 'integer'),
    required('purchase_price', 'bigint'),
    stamped('purchased_at'),
    stamped('last_payout_at'),
  ],
  primaryKey: ['id'],
  constraints: [
    check('businesses_business_type_check', 'business_type BETWEEN 1 AND 12'),
    userForeignKey('user_id', 'cascade'),
  ],
};

const houses: TableDefinition = {
  table: 'houses',
  columns: [
    id(),
    required('marriage_id', 'integer'),
    required('house_type', 'integer'),
    required('purchase_price', 'bigint'),
    stamped('purchased_at'),
  ],
  primaryKey: ['id'],
  constraints: [
    check('houses_house_type_check', 'house_type BETWEEN 1 AND 6'),
    foreignKey(['marriage_id'], 'marriages', ['id'], 'cascade'),
    unique(['marriage_id'], 'houses_marriage_id_key'),
  ],
};

const children: TableDefinition = {
  table: 'children',
  columns: [
    id(),
    required('marriage_id', 'integer'),
    required('parent1_id', 'bigint'),
    required('parent2_id', 'bigint'),
    optional('name', varchar(255)),
    required('gender', varchar(10)),
    required('age_stage', varchar(20), 'infant'),
    stamped('last_fed_at'),
    required('is_in_school', 'boolean', false),
    optional('school_expires_at', 'datetime'),
    optional('last_work_time', 'datetime'),
    required('is_working', 'boolean', false),
    required('is_alive', 'boolean', true),
    stamped('created_at'),
  ],
  primaryKey: ['id'],
  constraints: [
    check('children_gender_check', "gender IN ('male', 'female')"),
    check('children_age_stage_check', "age_stage IN ('infant', 'child', 'teen')"),
    foreignKey(['marriage_id'], 'marriages', ['id'], 'cascade'),
    userForeignKey('parent1_id'),
    userForeignKey('parent2_id'),
  ],
};

const kidnappings: TableDefinition = {
  table: 'kidnappings',
  columns: [
    id(),
    required('child_id', 'integer'),
    required('kidnapper_id', 'bigint'),
    required('victim_id', 'bigint'),
    optional('ransom_amount', 'bigint'),
    required('is_active', 'boolean', true),
    stamped('created_at'),
  ],
  primaryKey: ['id'],
  constraints: [
    foreignKey(['child_id'], 'children', ['id'], 'cascade'),
    userForeignKey('kidnapper_id'),
    userForeignKey('victim_id'),
  ],
};

const casinoGames: TableDefinition = {
  table: 'casino_games',
  columns: [
    id(),
    required('user_id', 'bigint'),
    required('bet_amount', 'bigint'),
    required('result', varchar(10)),
    required('payout', 'bigint'),
    stamped('played_at'),
  ],
  primaryKey: ['id'],
  constraints: [
    check('casino_games_result_check', "result IN ('win', 'loss')"),
    userForeignKey('user_id'),
  ],
};

const newTables: Array<[TableDefinition, IndexDefinition[]]> = [
  [businesses, [index('businesses', 'user_id')]],
  [houses, [index('houses', 'marriage_id')]],
  [children, [
    index('children', 'marriage_id'),
    index('children', 'parent1_id'),
    index('children', 'parent2_id'),
  ]],
  [kidnappings, [
    index('kidnappings', 'child_id'),
    index('kidnappings', 'kidnapper_id'),
    index('kidnappings', 'is_active'),
  ]],
  [casinoGames, [index('casino_games', 'user_id')]],
];

const familyBankBalance: ColumnDefinition = required('family_bank_balance', 'bigint', 0);
const lastAnniversaryAt: ColumnDefinition = optional('last_anniversary_at', 'datetime');

const driftIndexes: IndexDefinition[] = [
  index('loans', 'user_id'),
  index('loans', 'is_active'),
  index('lotteries', 'is_active'),
  index('lottery_tickets', 'lottery_id'),
  index('lottery_tickets', 'user_id'),
  index('friendships', 'user1_id'),
  index('friendships', 'user2_id'),
  index('reputation_logs', 'from_user_id'),
  index('reputation_logs', 'to_user_id'),
  index('user_achievements', 'user_id'),
  index('user_achievements', 'achievement_id'),
  index('user_quests', 'user_id'),
  index('user_quests', 'quest_id'),
  index('duels', 'challenger_id'),
  index('duels', 'opponent_id'),
  index('duels', 'is_active'),
  index('investments', 'user_id'),
  index('investments', 'is_completed'),
  index('user_stocks', 'user_id'),
  index('auctions', 'creator_id'),
  index('auctions', 'is_active'),
  index('auction_bids', 'auction_id'),
  index('auction_bids', 'user_id'),
  index('tax_payments', 'user_id'),
  index('insurances', 'expires_at'),
  index('cooldowns', 'expires_at'),
  index('users', 'is_banned'),
];

const upgrade: SchemaOperation[] = [
  ...newTables.flatMap(([table, indexes]) => [createTable(table), ...indexes.map(createIndex)]),
  addColumn('marriages', familyBankBalance),
  addColumn('marriages', lastAnniversaryAt),
  ...driftIndexes.map(createIndex),
];

export const revision009: Revision = {
  id: '009',
  parentId: '008',
  message: 'fix schema drift',
  createdAt: '2026-02-09',
  upgrade,
  downgrade: invertOperations(upgrade),
};

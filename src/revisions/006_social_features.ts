/**
 * Revision 006: Social features
 *
 * Reputation on users, friendships, reputation logs and achievements.
 */

import {
  addColumn,
  check,
  createTable,
  dropColumn,
  dropTable,
  varchar,
} from '../ledger/operations.js';
import type { ColumnDefinition, Revision, TableDefinition } from '../ledger/types.js';
import { foreignKey, id, required, stamped, unique, userForeignKey } from './columns.js';

const reputation: ColumnDefinition = required('reputation', 'integer', 0);

const friendships: TableDefinition = {
  table: 'friendships',
  columns: [
    id(),
    required('user1_id', 'bigint'),
    required('user2_id', 'bigint'),
    required('status', varchar(20), 'pending'),
    stamped('created_at'),
  ],
  primaryKey: ['id'],
  constraints: [
    check('friendships_status_check', "status IN ('pending', 'accepted')"),
    userForeignKey('user1_id', 'cascade'),
    userForeignKey('user2_id', 'cascade'),
    unique(['user1_id', 'user2_id'], 'uq_friendship'),
  ],
};

const reputationLogs: TableDefinition = {
  table: 'reputation_logs',
  columns: [
    id(),
    required('from_user_id', 'bigint'),
    required('to_user_id', 'bigint'),
    required('value', 'integer'),
    stamped('created_at'),
  ],
  primaryKey: ['id'],
  constraints: [
    check('reputation_logs_value_check', 'value IN (-1, 1)'),
    userForeignKey('from_user_id', 'cascade'),
    userForeignKey('to_user_id', 'cascade'),
  ],
};

const achievements: TableDefinition = {
  table: 'achievements',
  columns: [
    id(),
    required('code', varchar(50)),
    required('name', varchar(255)),
    required('description', varchar(500)),
    required('emoji', varchar(10)),
    stamped('created_at'),
  ],
  primaryKey: ['id'],
  constraints: [unique(['code'], 'achievements_code_key')],
};

const userAchievements: TableDefinition = {
  table: 'user_achievements',
  columns: [
    id(),
    required('user_id', 'bigint'),
    required('achievement_id', 'integer'),
    stamped('earned_at'),
  ],
  primaryKey: ['id'],
  constraints: [
    userForeignKey('user_id', 'cascade'),
    foreignKey(['achievement_id'], 'achievements', ['id'], 'cascade'),
    unique(['user_id', 'achievement_id'], 'uq_user_achievement'),
  ],
};

export const revision006: Revision = {
  id: '006',
  parentId: '005',
  message: 'social features',
  createdAt: '2025-01-21',
  upgrade: [
    addColumn('users', reputation),
    createTable(friendships),
    createTable(reputationLogs),
    createTable(achievements),
    createTable(userAchievements),
  ],
  downgrade: [
    dropTable(userAchievements),
    dropTable(achievements),
    dropTable(reputationLogs),
    dropTable(friendships),
    dropColumn('users', reputation),
  ],
};

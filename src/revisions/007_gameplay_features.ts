/**
 * Revision 007: Gameplay features
 *
 * Quests, pets and duels.
 */

import { check, createTable, dropTable, varchar } from '../ledger/operations.js';
import type { Revision, TableDefinition } from '../ledger/types.js';
import { foreignKey, id, optional, required, stamped, unique, userForeignKey } from './columns.js';

export const QUEST_TYPES_V1 = ['work', 'casino', 'transfer', 'marriage', 'pet'];

export function questTypeCheck(questTypes: string[]) {
  return check(
    'quests_type_check',
    `quest_type IN (${questTypes.map(t => `'${t}'`).join(', ')})`
  );
}

const quests: TableDefinition = {
  table: 'quests',
  columns: [
    id(),
    required('quest_type', varchar(50)),
    required('description', varchar(255)),
    required('target_count', 'integer'),
    required('reward', 'integer'),
  ],
  primaryKey: ['id'],
  constraints: [questTypeCheck(QUEST_TYPES_V1)],
};

const userQuests: TableDefinition = {
  table: 'user_quests',
  columns: [
    id(),
    required('user_id', 'bigint'),
    required('quest_id', 'integer'),
    required('progress', 'integer', 0),
    required('is_completed', 'boolean', false),
    stamped('assigned_at'),
    optional('completed_at', 'datetime'),
  ],
  primaryKey: ['id'],
  constraints: [
    userForeignKey('user_id', 'cascade'),
    foreignKey(['quest_id'], 'quests', ['id'], 'cascade'),
    unique(['user_id', 'quest_id'], 'uq_user_quest'),
  ],
};

const pets: TableDefinition = {
  table: 'pets',
  columns: [
    id(),
    required('user_id', 'bigint'),
    required('pet_type', varchar(20)),
    required('name', varchar(100)),
    required('hunger', 'integer', 50),
    required('happiness', 'integer', 50),
    stamped('last_fed_at'),
    optional('last_played_at', 'datetime'),
    required('is_alive', 'boolean', true),
    stamped('created_at'),
  ],
  primaryKey: ['id'],
  constraints: [
    check('pets_type_check', "pet_type IN ('cat', 'dog', 'dragon')"),
    check('pets_hunger_check', 'hunger BETWEEN 0 AND 100'),
    check('pets_happiness_check', 'happiness BETWEEN 0 AND 100'),
    userForeignKey('user_id', 'cascade'),
    unique(['user_id'], 'pets_user_id_key'),
  ],
};

const duels: TableDefinition = {
  table: 'duels',
  columns: [
    id(),
    required('challenger_id', 'bigint'),
    required('opponent_id', 'bigint'),
    required('bet_amount', 'bigint'),
    optional('winner_id', 'bigint'),
    required('is_active', 'boolean', true),
    required('is_accepted', 'boolean', false),
    stamped('created_at'),
    optional('completed_at', 'datetime'),
  ],
  primaryKey: ['id'],
  constraints: [
    userForeignKey('challenger_id', 'cascade'),
    userForeignKey('opponent_id', 'cascade'),
    userForeignKey('winner_id'),
  ],
};

export const revision007: Revision = {
  id: '007',
  parentId: '006',
  message: 'gameplay features',
  createdAt: '2025-01-21',
  upgrade: [
    createTable(quests),
    createTable(userQuests),
    createTable(pets),
    createTable(duels),
  ],
  downgrade: [
    dropTable(duels),
    dropTable(pets),
    dropTable(userQuests),
    dropTable(quests),
  ],
};

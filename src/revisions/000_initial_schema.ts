/**
 * Revision 000: Initial schema
 *
 * Users, jobs (selfmade and levels 1-10 included), interpol fines and cooldowns.
 */

import {
  check,
  createIndex,
  createTable,
  dropIndex,
  dropTable,
  varchar,
} from '../ledger/operations.js';
import type { IndexDefinition, Revision, TableDefinition } from '../ledger/types.js';
import { id, optional, required, stamped, unique, userForeignKey } from './columns.js';

export const JOB_TYPES_V1 = ['interpol', 'banker', 'infrastructure', 'court', 'culture', 'selfmade'];

export function jobTypeCheck(jobTypes: string[]) {
  return check(
    'jobs_job_type_check',
    `job_type IN (${jobTypes.map(t => `'${t}'`).join(', ')})`
  );
}

export function jobLevelCheck(maxLevel: number) {
  return check('jobs_job_level_check', `job_level BETWEEN 1 AND ${maxLevel}`);
}

const users: TableDefinition = {
  table: 'users',
  columns: [
    id(),
    required('telegram_id', 'bigint'),
    optional('username', varchar(255)),
    optional('gender', varchar(10)),
    required('balance', 'bigint', 0),
    required('is_banned', 'boolean', false),
    stamped('created_at'),
    stamped('updated_at'),
  ],
  primaryKey: ['id'],
  constraints: [unique(['telegram_id'])],
};

const jobs: TableDefinition = {
  table: 'jobs',
  columns: [
    id(),
    required('user_id', 'bigint'),
    required('job_type', varchar(50)),
    required('job_level', 'integer', 1),
    required('times_worked', 'integer', 0),
    optional('last_work_time', 'datetime'),
    stamped('created_at'),
    stamped('updated_at'),
  ],
  primaryKey: ['id'],
  constraints: [
    userForeignKey('user_id', 'cascade'),
    unique(['user_id']),
    jobTypeCheck(JOB_TYPES_V1),
    jobLevelCheck(10),
  ],
};

const interpolFines: TableDefinition = {
  table: 'interpol_fines',
  columns: [
    id(),
    required('interpol_id', 'bigint'),
    required('victim_id', 'bigint'),
    required('fine_amount', 'integer'),
    required('bonus_amount', 'integer', 0),
    stamped('created_at'),
  ],
  primaryKey: ['id'],
  constraints: [
    userForeignKey('interpol_id', 'cascade'),
    userForeignKey('victim_id', 'cascade'),
  ],
};

const cooldowns: TableDefinition = {
  table: 'cooldowns',
  columns: [
    id(),
    required('user_id', 'bigint'),
    required('action', varchar(50)),
    required('expires_at', 'datetime'),
    stamped('created_at'),
  ],
  primaryKey: ['id'],
  constraints: [
    userForeignKey('user_id', 'cascade'),
    unique(['user_id', 'action'], 'uq_user_action'),
  ],
};

const indexes: Record<string, IndexDefinition> = {
  users: { name: 'ix_users_telegram_id', table: 'users', columns: ['telegram_id'] },
  jobs: { name: 'ix_jobs_user_id', table: 'jobs', columns: ['user_id'] },
  interpolFines: {
    name: 'ix_interpol_fines_lookup',
    table: 'interpol_fines',
    columns: ['interpol_id', 'victim_id', 'created_at'],
  },
  cooldowns: { name: 'ix_cooldowns_user_id', table: 'cooldowns', columns: ['user_id'] },
};

export const revision000: Revision = {
  id: '000',
  parentId: null,
  message: 'initial schema',
  createdAt: '2025-10-11',
  upgrade: [
    createTable(users),
    createIndex(indexes.users),
    createTable(jobs),
    createIndex(indexes.jobs),
    createTable(interpolFines),
    createIndex(indexes.interpolFines),
    createTable(cooldowns),
    createIndex(indexes.cooldowns),
  ],
  downgrade: [
    dropIndex(indexes.cooldowns),
    dropTable(cooldowns),
    dropIndex(indexes.interpolFines),
    dropTable(interpolFines),
    dropIndex(indexes.jobs),
    dropTable(jobs),
    dropIndex(indexes.users),
    dropTable(users),
  ],
};

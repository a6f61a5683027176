/**
 * Revision 003: Marriage system
 */

import { createIndex, createTable, dropIndex, dropTable, varchar } from '../ledger/operations.js';
import type { IndexDefinition, Revision, TableDefinition } from '../ledger/types.js';
import { foreignKey, id, optional, required, stamped, unique, userForeignKey } from './columns.js';

const marriages: TableDefinition = {
  table: 'marriages',
  columns: [
    id(),
    required('partner1_id', 'bigint'),
    required('partner2_id', 'bigint'),
    optional('family_name', varchar(255)),
    required('is_active', 'boolean', true),
    required('love_count', 'integer', 0),
    optional('last_love_at', 'datetime'),
    optional('last_date_at', 'datetime'),
    stamped('created_at'),
    optional('ended_at', 'datetime'),
  ],
  primaryKey: ['id'],
  constraints: [
    userForeignKey('partner1_id', 'cascade'),
    userForeignKey('partner2_id', 'cascade'),
    unique(['partner1_id', 'partner2_id'], 'uq_partners'),
  ],
};

const familyMembers: TableDefinition = {
  table: 'family_members',
  columns: [
    id(),
    required('marriage_id', 'integer'),
    required('user_id', 'bigint'),
    stamped('joined_at'),
  ],
  primaryKey: ['id'],
  constraints: [
    foreignKey(['marriage_id'], 'marriages', ['id'], 'cascade'),
    userForeignKey('user_id', 'cascade'),
    unique(['marriage_id', 'user_id'], 'uq_marriage_user'),
  ],
};

const marriageIndexes: IndexDefinition[] = [
  { name: 'ix_marriages_partner1_id', table: 'marriages', columns: ['partner1_id'] },
  { name: 'ix_marriages_partner2_id', table: 'marriages', columns: ['partner2_id'] },
  { name: 'ix_marriages_is_active', table: 'marriages', columns: ['is_active'] },
];

const familyIndexes: IndexDefinition[] = [
  { name: 'ix_family_members_marriage_id', table: 'family_members', columns: ['marriage_id'] },
  { name: 'ix_family_members_user_id', table: 'family_members', columns: ['user_id'] },
];

export const revision003: Revision = {
  id: '003',
  parentId: '002',
  message: 'marriage system',
  createdAt: '2025-10-11',
  upgrade: [
    createTable(marriages),
    ...marriageIndexes.map(createIndex),
    createTable(familyMembers),
    ...familyIndexes.map(createIndex),
  ],
  downgrade: [
    ...[...familyIndexes].reverse().map(dropIndex),
    dropTable(familyMembers),
    ...[...marriageIndexes].reverse().map(dropIndex),
    dropTable(marriages),
  ],
};

/**
 * Revision 016: Per-chat bot usage
 */

import { createTable, dropTable, varchar } from '../ledger/operations.js';
import type { Revision, TableDefinition } from '../ledger/types.js';
import { optional, required, stamped } from './columns.js';

const chatActivity: TableDefinition = {
  table: 'chat_activity',
  columns: [
    required('chat_id', 'bigint'),
    optional('title', varchar(255)),
    required('chat_type', varchar(20), 'group'),
    required('command_count', 'bigint', 0),
    required('user_count', 'integer', 0),
    stamped('last_active_at'),
    stamped('first_seen_at'),
  ],
  primaryKey: ['chat_id'],
};

export const revision016: Revision = {
  id: '016',
  parentId: '015',
  message: 'chat activity',
  upgrade: [createTable(chatActivity)],
  downgrade: [dropTable(chatActivity)],
};

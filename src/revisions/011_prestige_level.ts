import { addColumn, dropColumn } from '../ledger/operations.js';
import type { Revision } from '../ledger/types.js';
import { required } from './columns.js';

const prestigeLevel = required('prestige_level', 'integer', 0);

export const revision011: Revision = {
  id: '011',
  parentId: '010',
  message: 'prestige level',
  upgrade: [addColumn('users', prestigeLevel)],
  downgrade: [dropColumn('users', prestigeLevel)],
};

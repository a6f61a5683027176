import { addColumn, dropColumn, varchar } from '../ledger/operations.js';
import type { Revision } from '../ledger/types.js';
import { required } from './columns.js';

const accessories = required('accessories', varchar(500), '');

export const revision012: Revision = {
  id: '012',
  parentId: '011',
  message: 'pet accessories',
  upgrade: [addColumn('pets', accessories)],
  downgrade: [dropColumn('pets', accessories)],
};

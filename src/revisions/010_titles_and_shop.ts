/**
 * Revision 010: Titles and shop columns on users
 */

import { addColumn, dropColumn, varchar } from '../ledger/operations.js';
import type { Revision } from '../ledger/types.js';
import { optional, required } from './columns.js';

const activeTitle = optional('active_title', varchar(100));
const purchasedTitles = required('purchased_titles', varchar(1000), '');

export const revision010: Revision = {
  id: '010',
  parentId: '009',
  message: 'titles and shop',
  upgrade: [
    addColumn('users', activeTitle),
    addColumn('users', purchasedTitles),
  ],
  downgrade: [
    dropColumn('users', purchasedTitles),
    dropColumn('users', activeTitle),
  ],
};

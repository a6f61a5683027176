/**
 * Revision 002: Interpol fines
 *
 * Empty: revision 000 already creates interpol_fines. Kept so databases
 * stamped at 002 still resolve.
 */

import type { Revision } from '../ledger/types.js';

export const revision002: Revision = {
  id: '002',
  parentId: '001',
  message: 'add interpol_fines table',
  createdAt: '2025-10-11',
  upgrade: [],
  downgrade: [],
};

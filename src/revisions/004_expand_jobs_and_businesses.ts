/**
 * Revision 004: Expand jobs
 *
 * Adds twelve job types. The business type range (1-12) ships with the
 * businesses table in revision 009, which is where that table is created.
 */

import { addConstraint, dropConstraint } from '../ledger/operations.js';
import type { Revision } from '../ledger/types.js';
import { JOB_TYPES_V1, jobTypeCheck } from './000_initial_schema.js';

export const JOB_TYPES_V2 = [
  ...JOB_TYPES_V1,
  'medic', 'teacher', 'journalist', 'transport', 'security', 'chef',
  'artist', 'scientist', 'programmer', 'lawyer', 'athlete', 'streamer',
];

const previous = jobTypeCheck(JOB_TYPES_V1);
const expanded = jobTypeCheck(JOB_TYPES_V2);

export const revision004: Revision = {
  id: '004',
  parentId: '003',
  message: 'expand jobs and businesses',
  createdAt: '2025-10-15',
  upgrade: [
    dropConstraint('jobs', previous),
    addConstraint('jobs', expanded),
  ],
  downgrade: [
    dropConstraint('jobs', expanded),
    addConstraint('jobs', previous),
  ],
};

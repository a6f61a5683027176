/**
 * Revision 001: Expand job levels and add selfmade
 *
 * Replaces the legacy job constraints (five job types, levels 1-6) with the
 * current ones. The downgrade restores the legacy pair, not the constraints
 * revision 000 creates; see DESIGN.md.
 */

import { addConstraint, dropConstraint } from '../ledger/operations.js';
import type { Revision } from '../ledger/types.js';
import { JOB_TYPES_V1, jobLevelCheck, jobTypeCheck } from './000_initial_schema.js';

const LEGACY_JOB_TYPES = ['interpol', 'banker', 'infrastructure', 'court', 'culture'];

const legacyType = jobTypeCheck(LEGACY_JOB_TYPES);
const legacyLevel = jobLevelCheck(6);
const currentType = jobTypeCheck(JOB_TYPES_V1);
const currentLevel = jobLevelCheck(10);

export const revision001: Revision = {
  id: '001',
  parentId: '000',
  message: 'expand job levels and add selfmade',
  createdAt: '2025-10-11',
  upgrade: [
    dropConstraint('jobs', legacyType),
    dropConstraint('jobs', legacyLevel),
    addConstraint('jobs', currentType),
    addConstraint('jobs', currentLevel),
  ],
  downgrade: [
    dropConstraint('jobs', currentLevel),
    dropConstraint('jobs', currentType),
    addConstraint('jobs', legacyLevel),
    addConstraint('jobs', legacyType),
  ],
};

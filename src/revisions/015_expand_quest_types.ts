/**
 * Revision 015: Expand quest types
 *
 * Replaces quests_type_check (from 007) with quests_quest_type_check, which
 * adds fish, duel, rob, bounty, gang and daily quests.
 */

import { addConstraint, check, dropConstraint } from '../ledger/operations.js';
import type { Revision } from '../ledger/types.js';
import { QUEST_TYPES_V1, questTypeCheck } from './007_gameplay_features.js';

export const QUEST_TYPES_V2 = [...QUEST_TYPES_V1, 'fish', 'duel', 'rob', 'bounty', 'gang', 'daily'];

const previous = questTypeCheck(QUEST_TYPES_V1);
const expanded = check(
  'quests_quest_type_check',
  `quest_type IN (${QUEST_TYPES_V2.map(t => `'${t}'`).join(', ')})`
);

export const revision015: Revision = {
  id: '015',
  parentId: '014',
  message: 'expand quest types',
  upgrade: [
    dropConstraint('quests', previous),
    addConstraint('quests', expanded),
  ],
  downgrade: [
    dropConstraint('quests', expanded),
    addConstraint('quests', previous),
  ],
};

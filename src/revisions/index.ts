/**
 * The game database revision chain, root first
 */

import type { Revision } from '../ledger/types.js';
import { revision000 } from './000_initial_schema.js';
import { revision001 } from './001_expand_job_levels.js';
import { revision002 } from './002_interpol_fines.js';
import { revision003 } from './003_marriage_system.js';
import { revision004 } from './004_expand_jobs_and_businesses.js';
import { revision005 } from './005_economy_features.js';
import { revision006 } from './006_social_features.js';
import { revision007 } from './007_gameplay_features.js';
import { revision008 } from './008_advanced_economy.js';
import { revision009 } from './009_fix_schema_drift.js';
import { revision010 } from './010_titles_and_shop.js';
import { revision011 } from './011_prestige_level.js';
import { revision012 } from './012_pet_accessories.js';
import { revision013 } from './013_bounty_system.js';
import { revision014 } from './014_gang_system.js';
import { revision015 } from './015_expand_quest_types.js';
import { revision016 } from './016_chat_activity.js';
import { revision017 } from './017_referral_system.js';
import { revision018 } from './018_business_upgrades_and_bank.js';

export const allRevisions: Revision[] = [
  revision000,
  revision001,
  revision002,
  revision003,
  revision004,
  revision005,
  revision006,
  revision007,
  revision008,
  revision009,
  revision010,
  revision011,
  revision012,
  revision013,
  revision014,
  revision015,
  revision016,
  revision017,
  revision018,
];

export { JOB_TYPES_V1 } from './000_initial_schema.js';
export { JOB_TYPES_V2 } from './004_expand_jobs_and_businesses.js';
export { QUEST_TYPES_V1 } from './007_gameplay_features.js';
export { QUEST_TYPES_V2 } from './015_expand_quest_types.js';

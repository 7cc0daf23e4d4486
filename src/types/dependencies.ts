/**
 * dependencies.ts - Collaborators handed to controllers and socket handlers.
 */

import type { RandomSource } from '../services/randomSource';
import type { RecordStore } from '../store/recordStore';

export interface AppDependencies {
  store: RecordStore;
  random: RandomSource;
  now: () => Date;
}

import type { ProgressMap } from '../achievements/types.js';
import { INITIAL_EXPERIENCE, type ExperienceState } from '../engine/leveling.js';

export { ProgressionStateError } from './errors.js';

// Most recent match ids kept per profile for duplicate detection.
export const PROCESSED_MATCH_LIMIT = 500;

export interface ProfileState {
  profileId: string;
  progress: ProgressMap;
  achievementPoints: number;
  experience: ExperienceState;
  processedMatchIds: readonly string[];
  updatedAt: Date | null;
}

export interface ProgressionStore {
  /** Returns the stored state, or a fresh one when the profile has none. */
  loadProfile(profileId: string): Promise<ProfileState>;
  saveProfile(state: ProfileState): Promise<void>;
  /** Deletes every stored record for the profile. */
  resetProfile(profileId: string): Promise<void>;
}

export const emptyProfile = (profileId: string): ProfileState => ({
  profileId,
  progress: {},
  achievementPoints: 0,
  experience: { ...INITIAL_EXPERIENCE },
  processedMatchIds: [],
  updatedAt: null,
});

export const rememberMatch = (processed: readonly string[], matchId: string): string[] =>
  [...processed.filter((id) => id !== matchId), matchId].slice(-PROCESSED_MATCH_LIMIT);

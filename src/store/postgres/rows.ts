import { z } from 'zod';
import type { achievementProgress, profileProgression } from '../../db/schema.js';
import { ACHIEVEMENT_IDS, ACHIEVEMENT_TIERS } from '../../achievements/types.js';
import type { AchievementId, AchievementProgress, ProgressMap } from '../../achievements/types.js';
import { ProgressionStateError } from '../errors.js';
import { emptyProfile, type ProfileState } from '../types.js';

export type ProfileProgressionRow = typeof profileProgression.$inferSelect;
export type AchievementProgressRow = typeof achievementProgress.$inferSelect;
export type AchievementProgressInsert = typeof achievementProgress.$inferInsert;

const AchievementIdSchema = z.enum(ACHIEVEMENT_IDS);
const TierSchema = z.enum(ACHIEVEMENT_TIERS).nullable();

export const toProgressRecord = (row: AchievementProgressRow): AchievementProgress => {
  const id = AchievementIdSchema.safeParse(row.achievementId);
  if (!id.success) {
    throw new ProgressionStateError(`Stored progress references unknown achievement ${row.achievementId}`, {
      profileId: row.profileId,
      achievementId: row.achievementId,
    });
  }
  const tier = TierSchema.safeParse(row.highestTier);
  if (!tier.success) {
    throw new ProgressionStateError(`Stored progress for ${row.achievementId} has unknown tier`, {
      profileId: row.profileId,
      achievementId: row.achievementId,
      value: row.highestTier,
    });
  }
  return {
    id: id.data,
    currentValue: row.currentValue,
    highestTierAchieved: tier.data,
    dateLastUpdated: row.updatedAt,
  };
};

export const toProgressMap = (rows: readonly AchievementProgressRow[]): ProgressMap => {
  const progress: Partial<Record<AchievementId, AchievementProgress>> = {};
  for (const row of rows) {
    const record = toProgressRecord(row);
    progress[record.id] = record;
  }
  return progress;
};

export const toProgressRows = (profileId: string, progress: ProgressMap): AchievementProgressInsert[] =>
  Object.values(progress)
    .filter((record): record is AchievementProgress => record !== undefined)
    .map((record) => ({
      profileId,
      achievementId: record.id,
      currentValue: record.currentValue,
      highestTier: record.highestTierAchieved,
      updatedAt: record.dateLastUpdated,
    }));

export const toProfileState = (
  profileId: string,
  profile: ProfileProgressionRow | null,
  rows: readonly AchievementProgressRow[]
): ProfileState => {
  const base = emptyProfile(profileId);
  if (!profile) {
    return rows.length ? { ...base, progress: toProgressMap(rows) } : base;
  }
  return {
    profileId,
    progress: toProgressMap(rows),
    achievementPoints: profile.achievementPoints,
    experience: { totalExperience: profile.totalExperience, level: profile.level },
    processedMatchIds: profile.processedMatchIds,
    updatedAt: profile.updatedAt,
  };
};

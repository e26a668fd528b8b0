import { eq, sql } from 'drizzle-orm';
import { getDb, type Database } from '../db/client.js';
import { achievementProgress, profileProgression } from '../db/schema.js';
import { toProfileState, toProgressRows } from './postgres/rows.js';
import type { ProfileState, ProgressionStore } from './types.js';

export class PostgresStore implements ProgressionStore {
  constructor(private readonly db: Database = getDb()) {}

  async loadProfile(profileId: string): Promise<ProfileState> {
    const [profile] = await this.db
      .select()
      .from(profileProgression)
      .where(eq(profileProgression.profileId, profileId))
      .limit(1);
    const rows = await this.db
      .select()
      .from(achievementProgress)
      .where(eq(achievementProgress.profileId, profileId));
    return toProfileState(profileId, profile ?? null, rows);
  }

  async saveProfile(state: ProfileState): Promise<void> {
    const updatedAt = state.updatedAt ?? new Date();
    const progressRows = toProgressRows(state.profileId, state.progress);
    const profileValues = {
      totalExperience: state.experience.totalExperience,
      level: state.experience.level,
      achievementPoints: state.achievementPoints,
      processedMatchIds: [...state.processedMatchIds],
      updatedAt,
    };

    await this.db.transaction(async (tx) => {
      await tx
        .insert(profileProgression)
        .values({ profileId: state.profileId, ...profileValues })
        .onConflictDoUpdate({
          target: profileProgression.profileId,
          set: profileValues,
        });

      if (!progressRows.length) return;

      // current_value only ratchets upwards.
      await tx
        .insert(achievementProgress)
        .values(progressRows)
        .onConflictDoUpdate({
          target: [achievementProgress.profileId, achievementProgress.achievementId],
          set: {
            currentValue: sql`GREATEST(${achievementProgress.currentValue}, excluded.current_value)`,
            highestTier: sql`excluded.highest_tier`,
            updatedAt: sql`excluded.updated_at`,
          },
        });
    });
  }

  async resetProfile(profileId: string): Promise<void> {
    await this.db.transaction(async (tx) => {
      await tx.delete(achievementProgress).where(eq(achievementProgress.profileId, profileId));
      await tx.delete(profileProgression).where(eq(profileProgression.profileId, profileId));
    });
  }
}

import { pgTable, text, timestamp, integer, jsonb, primaryKey } from 'drizzle-orm/pg-core';

export const profileProgression = pgTable('profile_progression', {
  profileId: text('profile_id').primaryKey(),
  totalExperience: integer('total_experience').notNull().default(0),
  level: integer('level').notNull().default(1),
  achievementPoints: integer('achievement_points').notNull().default(0),
  processedMatchIds: jsonb('processed_match_ids').$type<string[]>().notNull().default([]),
  createdAt: timestamp('created_at', { withTimezone: true }).defaultNow().notNull(),
  updatedAt: timestamp('updated_at', { withTimezone: true }).defaultNow().notNull(),
});

export const achievementProgress = pgTable(
  'achievement_progress',
  {
    profileId: text('profile_id')
      .references(() => profileProgression.profileId, { onDelete: 'cascade' })
      .notNull(),
    achievementId: text('achievement_id').notNull(),
    currentValue: integer('current_value').notNull().default(0),
    highestTier: text('highest_tier'),
    updatedAt: timestamp('updated_at', { withTimezone: true }).notNull(),
  },
  (table) => ({
    pk: primaryKey({ columns: [table.profileId, table.achievementId] }),
  })
);

export const ACHIEVEMENT_TIERS = ['REGULAR', 'BRONZE', 'SILVER', 'GOLD', 'PLATINUM'] as const;
export type AchievementTier = (typeof ACHIEVEMENT_TIERS)[number];

export const ACHIEVEMENT_CATEGORIES = [
  'UNIVERSAL',
  'TIME_BASED',
  'PERFORMANCE',
  'ACTIVITY',
  'MILESTONES',
  'PICKLEBALL',
  'TENNIS',
  'PADEL',
] as const;
export type AchievementCategory = (typeof ACHIEVEMENT_CATEGORIES)[number];

export const ACHIEVEMENT_IDS = [
  'games_played',
  'daily_streak',
  'victories',
  'comebacks',
  'early_bird',
  'night_owl',
  'weekend_warrior',
  'anniversary_win',
  'holiday_hustle',
  'new_year_champion',
  'perfect_start',
  'clean_sweep',
  'marathon_match',
  'speed_demon',
  'deuce_master',
  'tournament_ready',
  'cross_sport',
  'century_club',
  'one_year_strong',
  'rating_climber',
  'diamond_hands',
  'pb_victories',
  'pickler',
  'pickled',
  'tennis_victories',
  'bagel_baron',
  'tiebreak_titan',
  'padel_victories',
  'rosco_royalty',
] as const;
export type AchievementId = (typeof ACHIEVEMENT_IDS)[number];

export interface AchievementRequirement {
  value: number;
  description: string;
}

export interface AchievementDefinition {
  id: AchievementId;
  category: AchievementCategory;
  name: string;
  // Ordered by increasing tier rank; may cover only a subset of the five tiers.
  tiers: ReadonlyArray<{ tier: AchievementTier; requirement: AchievementRequirement }>;
}

export interface AchievementProgress {
  id: AchievementId;
  currentValue: number;
  highestTierAchieved: AchievementTier | null;
  dateLastUpdated: Date;
}

export type ProgressMap = Readonly<Partial<Record<AchievementId, AchievementProgress>>>;

export interface TierCrossing {
  id: AchievementId;
  tier: AchievementTier;
  points: number;
}

import { defaultCatalog, tierRank, type AchievementCatalog } from './catalog.js';
import type {
  AchievementDefinition,
  AchievementId,
  AchievementProgress,
  AchievementTier,
  ProgressMap,
  TierCrossing,
} from './types.js';

export interface ApplyProgressResult {
  progress: ProgressMap;
  record: AchievementProgress;
  tierJustReached?: TierCrossing;
}

const highestTierFor = (definition: AchievementDefinition, value: number): AchievementTier | null => {
  let reached: AchievementTier | null = null;
  for (const entry of definition.tiers) {
    if (entry.requirement.value <= value) reached = entry.tier;
  }
  return reached;
};

/**
 * Folds a cumulative counter into the progress for `id`. Values only ratchet
 * upwards: a lower `newValue` than already recorded leaves the record as-is.
 * A tier crossing is reported once, with the points it adds to the profile's
 * running total.
 */
export function applyProgress(
  id: AchievementId,
  newValue: number,
  progress: ProgressMap,
  catalog: AchievementCatalog = defaultCatalog,
  now: Date = new Date()
): ApplyProgressResult {
  const definition = catalog.definitionFor(id);
  const existing = progress[id];
  const previousValue = existing?.currentValue ?? 0;
  const previousTier = existing?.highestTierAchieved ?? null;
  const currentValue = Math.max(previousValue, newValue);

  const candidate = highestTierFor(definition, currentValue);
  const advanced = candidate !== null && (previousTier === null || tierRank(candidate) > tierRank(previousTier));
  const highestTierAchieved = advanced ? candidate : previousTier;

  const record: AchievementProgress = {
    id,
    currentValue,
    highestTierAchieved,
    dateLastUpdated: !existing || currentValue !== previousValue ? now : existing.dateLastUpdated,
  };

  let tierJustReached: TierCrossing | undefined;
  if (advanced && candidate) {
    const before = previousTier ? catalog.pointsFor(id, previousTier) : 0;
    tierJustReached = { id, tier: candidate, points: catalog.pointsFor(id, candidate) - before };
  }

  const next: Partial<Record<AchievementId, AchievementProgress>> = { ...progress };
  next[id] = record;

  return {
    progress: next,
    record,
    ...(tierJustReached ? { tierJustReached } : {}),
  };
}

// Only for an explicit, user-initiated wipe of all profile data.
export const resetProgress = (): ProgressMap => ({});

const progressRecords = (progress: ProgressMap) =>
  Object.values(progress).filter((record): record is AchievementProgress => record !== undefined);

export function totalAchievementPoints(progress: ProgressMap, catalog: AchievementCatalog = defaultCatalog) {
  return progressRecords(progress).reduce(
    (total, record) =>
      record.highestTierAchieved ? total + catalog.pointsFor(record.id, record.highestTierAchieved) : total,
    0
  );
}

export interface RankedAchievement {
  definition: AchievementDefinition;
  progress: AchievementProgress;
  points: number;
}

export function topAchievements(
  progress: ProgressMap,
  count = 5,
  catalog: AchievementCatalog = defaultCatalog
): RankedAchievement[] {
  const ranked: RankedAchievement[] = [];
  for (const record of progressRecords(progress)) {
    if (!record.highestTierAchieved) continue;
    ranked.push({
      definition: catalog.definitionFor(record.id),
      progress: record,
      points: catalog.pointsFor(record.id, record.highestTierAchieved),
    });
  }

  const rankOf = (entry: RankedAchievement) =>
    entry.progress.highestTierAchieved ? tierRank(entry.progress.highestTierAchieved) : 0;

  return ranked
    .sort((a, b) => rankOf(b) - rankOf(a) || b.points - a.points || a.definition.id.localeCompare(b.definition.id))
    .slice(0, count);
}

export * from './engine/types.js';
export { getSportProfile, isRallyScoring } from './engine/profiles.js';
export type { ScoringModel, SportProfile } from './engine/profiles.js';
export * from './engine/leveling.js';
export * from './engine/experience.js';

export * from './insights/types.js';
export { computeInsights } from './insights/calculator.js';
export { computeServeInsights } from './insights/serve.js';
export { computeMomentumInsights, describeMomentum, scanMomentum } from './insights/momentum.js';
export { computeClutchInsights } from './insights/clutch.js';
export { extractHighlights } from './insights/highlights.js';
export { computeShotBreakdown } from './insights/shots.js';
export { composeStory } from './insights/story.js';

export * from './achievements/types.js';
export * from './achievements/errors.js';
export {
  TIER_POINTS,
  createCatalog,
  defaultCatalog,
  definitionFor,
  loadCatalog,
  tierRank,
} from './achievements/catalog.js';
export type { AchievementCatalog, CatalogFile } from './achievements/catalog.js';
export * from './achievements/tracker.js';
export {
  collectAchievementValues,
  currentDailyStreak,
  evaluateAchievements,
} from './achievements/evaluate.js';
export type { EvaluationOptions, EvaluationResult } from './achievements/evaluate.js';

export * from './formats/index.js';
export * from './services/progression.js';
export { getStore, MemoryStore, PostgresStore, emptyProfile, ProgressionStateError } from './store/index.js';
export type { ProfileState, ProgressionStore } from './store/index.js';
export { loadConfig, ConfigError } from './config.js';
export type { ProgressionConfig } from './config.js';

import { z } from 'zod';

import { defaultCatalog, type AchievementCatalog } from '../achievements/catalog.js';
import { InvalidProgressValueError } from '../achievements/errors.js';
import { evaluateAchievements, type EvaluationResult } from '../achievements/evaluate.js';
import { applyProgress, topAchievements, totalAchievementPoints, type RankedAchievement } from '../achievements/tracker.js';
import type { AchievementId, TierCrossing } from '../achievements/types.js';
import { awardExperience, type ExperienceReward } from '../engine/experience.js';
import { describeExperience, type ExperienceProgress } from '../engine/leveling.js';
import type { MatchRecord } from '../engine/types.js';
import { computeInsights } from '../insights/calculator.js';
import type { InsightsResult } from '../insights/types.js';
import { rememberMatch, type ProfileState, type ProgressionStore } from '../store/types.js';

export const ProgressValueSchema = z.number().int().min(0);

export type ProgressionChange =
  | { type: 'achievements'; profileId: string; unlocked: TierCrossing[]; totalPoints: number }
  | { type: 'experience'; profileId: string; experience: ExperienceProgress; reward: ExperienceReward }
  | { type: 'reset'; profileId: string };

export type ProgressionListener = (change: ProgressionChange) => void;

export interface ProgressionServiceOptions {
  catalog?: AchievementCatalog;
  utcOffsetMinutes?: number;
  clock?: () => Date;
}

export interface RecordMatchInput {
  profileId: string;
  match: MatchRecord;
  // Full history for the profile, including `match`.
  history: readonly MatchRecord[];
  profileStartedAt?: Date | null;
}

export interface RecordMatchResult {
  duplicate: boolean;
  insights: InsightsResult | null;
  achievements: EvaluationResult;
  experience: ExperienceProgress;
  reward: ExperienceReward | null;
}

export interface ProfileSummary {
  profileId: string;
  experience: ExperienceProgress;
  achievementPoints: number;
  topAchievements: RankedAchievement[];
  updatedAt: Date | null;
}

export class ProgressionService {
  private readonly catalog: AchievementCatalog;
  private readonly utcOffsetMinutes: number;
  private readonly clock: () => Date;
  private readonly queues = new Map<string, Promise<void>>();
  private readonly listeners = new Set<ProgressionListener>();

  constructor(
    private readonly store: ProgressionStore,
    options: ProgressionServiceOptions = {}
  ) {
    this.catalog = options.catalog ?? defaultCatalog;
    this.utcOffsetMinutes = options.utcOffsetMinutes ?? 0;
    this.clock = options.clock ?? (() => new Date());
  }

  subscribe(listener: ProgressionListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  async getProfile(profileId: string): Promise<ProfileSummary> {
    const state = await this.store.loadProfile(profileId);
    return this.summarize(state);
  }

  /**
   * Evaluates achievements against `history` and awards experience for
   * `match`. Updates for one profile run one at a time; a match id that was
   * already recorded leaves the stored state untouched.
   */
  recordMatch(input: RecordMatchInput): Promise<RecordMatchResult> {
    return this.serialize(input.profileId, async () => {
      const { profileId, match } = input;
      const now = this.clock();
      const insights = computeInsights(match);
      const state = await this.store.loadProfile(profileId);

      if (state.processedMatchIds.includes(match.id)) {
        console.info('progression_match_duplicate', { profileId, matchId: match.id });
        return {
          duplicate: true,
          insights,
          achievements: { progress: state.progress, unlocked: [], totalPoints: state.achievementPoints },
          experience: describeExperience(state.experience),
          reward: null,
        };
      }

      const history = input.history.some((entry) => entry.id === match.id)
        ? input.history
        : [...input.history, match];

      const achievements = evaluateAchievements(history, state.progress, {
        now,
        utcOffsetMinutes: this.utcOffsetMinutes,
        profileStartedAt: input.profileStartedAt ?? null,
        catalog: this.catalog,
      });
      const { state: experienceState, reward } = awardExperience(match, state.experience);

      await this.store.saveProfile({
        profileId,
        progress: achievements.progress,
        achievementPoints: achievements.totalPoints,
        experience: experienceState,
        processedMatchIds: rememberMatch(state.processedMatchIds, match.id),
        updatedAt: now,
      });

      const experience = describeExperience(experienceState);
      console.info('progression_match_recorded', {
        profileId,
        matchId: match.id,
        experienceAwarded: reward.totalAwarded,
        level: experience.level,
        unlocked: achievements.unlocked.length,
        achievementPoints: achievements.totalPoints,
      });
      if (reward.leveledUp) {
        console.info('progression_level_up', { profileId, from: reward.previousLevel, to: reward.level });
      }

      if (achievements.unlocked.length) {
        this.notify({
          type: 'achievements',
          profileId,
          unlocked: achievements.unlocked,
          totalPoints: achievements.totalPoints,
        });
      }
      this.notify({ type: 'experience', profileId, experience, reward });

      return { duplicate: false, insights, achievements, experience, reward };
    });
  }

  /**
   * Records a counter the host tracks itself, such as `rating_climber`, which
   * no match history can derive. Rejects with `InvalidProgressValueError`
   * unless `value` is a non-negative integer.
   */
  reportProgress(profileId: string, id: AchievementId, value: number): Promise<TierCrossing | null> {
    const parsed = ProgressValueSchema.safeParse(value);
    if (!parsed.success) {
      console.warn('progression_progress_rejected', { profileId, achievementId: id, value: String(value) });
      return Promise.reject(new InvalidProgressValueError(id, value, parsed.error.flatten()));
    }
    return this.serialize(profileId, async () => {
      const state = await this.store.loadProfile(profileId);
      const now = this.clock();
      const result = applyProgress(id, parsed.data, state.progress, this.catalog, now);
      const totalPoints = totalAchievementPoints(result.progress, this.catalog);

      await this.store.saveProfile({
        ...state,
        progress: result.progress,
        achievementPoints: totalPoints,
        updatedAt: now,
      });

      const crossing = result.tierJustReached ?? null;
      if (crossing) {
        console.info('progression_tier_reached', { profileId, achievementId: id, tier: crossing.tier });
        this.notify({ type: 'achievements', profileId, unlocked: [crossing], totalPoints });
      }
      return crossing;
    });
  }

  resetProfile(profileId: string): Promise<void> {
    return this.serialize(profileId, async () => {
      await this.store.resetProfile(profileId);
      console.info('progression_profile_reset', { profileId });
      this.notify({ type: 'reset', profileId });
    });
  }

  private summarize(state: ProfileState): ProfileSummary {
    return {
      profileId: state.profileId,
      experience: describeExperience(state.experience),
      achievementPoints: state.achievementPoints,
      topAchievements: topAchievements(state.progress, 5, this.catalog),
      updatedAt: state.updatedAt,
    };
  }

  private serialize<T>(profileId: string, task: () => Promise<T>): Promise<T> {
    const previous = this.queues.get(profileId) ?? Promise.resolve();
    const run = previous.then(task);
    const tail: Promise<void> = run.then(
      () => undefined,
      () => undefined
    ).then(() => {
      if (this.queues.get(profileId) === tail) this.queues.delete(profileId);
    });
    this.queues.set(profileId, tail);
    return run;
  }

  private notify(change: ProgressionChange) {
    for (const listener of this.listeners) {
      try {
        listener(change);
      } catch (err) {
        console.error('progression_listener_failed', {
          type: change.type,
          profileId: change.profileId,
          message: err instanceof Error ? err.message : String(err),
        });
      }
    }
  }
}

import type { MatchRecord, PointEvent } from './types.js';
import { P } from './params.js';
import { getSportProfile } from './profiles.js';
import { levelForExperience, type ExperienceState } from './leveling.js';

export type ExperienceAwardLabel =
  | 'Game Completed'
  | 'Victory Bonus'
  | 'Comeback'
  | 'Long Rallies'
  | 'Dominant Win'
  | 'Endurance';

export interface ExperienceAwardEntry {
  label: ExperienceAwardLabel;
  amount: number;
}

export interface ExperienceAward {
  totalAwarded: number;
  breakdown: ExperienceAwardEntry[];
}

export interface ExperienceReward extends ExperienceAward {
  leveledUp: boolean;
  previousLevel: number;
  level: number;
}

export interface AwardExperienceResult {
  state: ExperienceState;
  reward: ExperienceReward;
}

const X = P.experience;

// Serve points landing on an even combined score, in runs of three or more.
export const rallyBonus = (events: readonly PointEvent[]) => {
  let streak = 0;
  let bonus = 0;
  for (const event of events) {
    if (event.isServePoint && (event.player1Score + event.player2Score) % 2 === 0) {
      streak += 1;
      if (streak >= X.rallyMinStreak) bonus += X.rallyIncrement;
    } else {
      streak = 0;
    }
  }
  return Math.min(bonus, X.rallyCap);
};

export function computeExperienceAward(match: MatchRecord): ExperienceAward {
  const breakdown: ExperienceAwardEntry[] = [{ label: 'Game Completed', amount: X.base }];
  const won = match.outcome === 'WIN';

  if (won) breakdown.push({ label: 'Victory Bonus', amount: X.victory });

  if (won && match.events.some((event) => event.player2Score - event.player1Score >= X.comebackDeficit)) {
    breakdown.push({ label: 'Comeback', amount: X.comeback });
  }

  const rallies = rallyBonus(match.events);
  if (rallies > 0) breakdown.push({ label: 'Long Rallies', amount: rallies });

  const regulation = getSportProfile(match.sport).regulationScore;
  if (match.player1Score >= regulation && match.player1Score - match.player2Score >= X.dominantMargin) {
    breakdown.push({ label: 'Dominant Win', amount: X.dominant });
  }

  if (match.elapsedSeconds > X.enduranceSeconds) {
    breakdown.push({ label: 'Endurance', amount: X.endurance });
  }

  return {
    totalAwarded: breakdown.reduce((sum, entry) => sum + entry.amount, 0),
    breakdown,
  };
}

/**
 * Applies the award for `match` to `state` and returns the new state. The
 * level is re-derived from total experience, so a large award may cross more
 * than one level boundary at once.
 */
export function awardExperience(match: MatchRecord, state: ExperienceState): AwardExperienceResult {
  const award = computeExperienceAward(match);
  const previousLevel = state.level;

  if (award.totalAwarded <= 0) {
    return { state, reward: { ...award, leveledUp: false, previousLevel, level: previousLevel } };
  }

  const totalExperience = state.totalExperience + award.totalAwarded;
  const level = levelForExperience(totalExperience);

  return {
    state: { totalExperience, level },
    reward: { ...award, leveledUp: level > previousLevel, previousLevel, level },
  };
}

import { P } from './params.js';

export interface ExperienceState {
  totalExperience: number;
  level: number;
}

export interface ExperienceProgress extends ExperienceState {
  experienceIntoLevel: number;
  experienceForNextLevel: number;
}

export const INITIAL_EXPERIENCE: ExperienceState = Object.freeze({ totalExperience: 0, level: 1 });

/**
 * Total experience needed to stand on `level`; level 1 needs none. Each step
 * costs 1.5x the previous one (floored), starting at 100: 100, 150, 225, 337...
 */
export function cumulativeExperienceForLevel(level: number): number {
  let total = 0;
  let cost: number = P.levels.baseCost;
  for (let current = 1; current < level; current += 1) {
    total += cost;
    cost = Math.floor(cost * P.levels.growth);
  }
  return total;
}

export function levelForExperience(totalExperience: number): number {
  let level = 1;
  let nextThreshold: number = P.levels.baseCost;
  let cost: number = P.levels.baseCost;
  while (totalExperience >= nextThreshold) {
    level += 1;
    cost = Math.floor(cost * P.levels.growth);
    nextThreshold += cost;
  }
  return level;
}

export function describeExperience(state: ExperienceState): ExperienceProgress {
  const level = levelForExperience(state.totalExperience);
  const floor = cumulativeExperienceForLevel(level);
  const ceiling = cumulativeExperienceForLevel(level + 1);
  return {
    totalExperience: state.totalExperience,
    level,
    experienceIntoLevel: state.totalExperience - floor,
    experienceForNextLevel: ceiling - floor,
  };
}

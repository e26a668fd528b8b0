import type { MatchOutcome, PointEvent } from '../engine/types.js';
import { differentialOf } from './helpers.js';
import type { MatchStory } from './types.js';

const STORY_THRESHOLDS = {
  comeback: 5,
  dominantLead: 7,
  dominantShareInLead: 0.8,
  closeLead: 3,
  backAndForth: 5,
};

export function composeStory(
  events: readonly PointEvent[],
  outcome: MatchOutcome,
  leadChanges: number
): MatchStory {
  const won = outcome === 'WIN';
  const diffs = events.map(differentialOf);
  const maxLead = diffs.reduce((max, diff) => Math.max(max, Math.abs(diff)), 0);
  // Winner's perspective: positive means the eventual winner was ahead.
  const winnerDiffs = diffs.map((diff) => (won ? diff : -diff));
  const shareInLead = events.length
    ? winnerDiffs.filter((diff) => diff > 0).length / events.length
    : 0;
  const deepestWinnerDeficit = winnerDiffs.reduce((max, diff) => Math.max(max, -diff), 0);
  const neverTrailed = won && winnerDiffs.every((diff) => diff >= 0);

  if (neverTrailed) {
    return {
      headline: 'Wire-to-Wire Victory',
      description: 'You led from start to finish and never let your opponent in front.',
    };
  }
  if (deepestWinnerDeficit >= STORY_THRESHOLDS.comeback) {
    return won
      ? {
          headline: 'Epic Comeback',
          description: `You were down ${deepestWinnerDeficit} points but fought back to claim victory.`,
        }
      : {
          headline: "Couldn't Hold On",
          description: `You had a ${deepestWinnerDeficit}-point lead but your opponent mounted a comeback.`,
        };
  }
  if (won && maxLead >= STORY_THRESHOLDS.dominantLead && shareInLead >= STORY_THRESHOLDS.dominantShareInLead) {
    return {
      headline: 'Dominant Performance',
      description: `You controlled the game with a commanding ${maxLead}-point lead.`,
    };
  }
  if (maxLead <= STORY_THRESHOLDS.closeLead) {
    return won
      ? { headline: 'Nail-Biter Victory', description: 'Every point mattered in this close match.' }
      : { headline: 'So Close', description: 'A hard-fought battle that could have gone either way.' };
  }
  if (leadChanges >= STORY_THRESHOLDS.backAndForth) {
    return won
      ? { headline: 'Battle of Wills', description: `The lead changed ${leadChanges} times, but you had the final say.` }
      : { headline: 'Tough Battle', description: `The lead changed ${leadChanges} times in this intense match.` };
  }
  return won
    ? { headline: 'Nice Win', description: 'A solid performance to secure the victory.' }
    : { headline: 'Better Luck Next Time', description: 'Keep practicing and you will get them next time.' };
}

import type { MatchOutcome, PlayerSide, PointEvent } from '../engine/types.js';
import { P } from '../engine/params.js';
import { differentialOf, leaderOf } from './helpers.js';
import type { MomentumInsights } from './types.js';

type MomentumCounts = Omit<MomentumInsights, 'summary'>;

export function scanMomentum(events: readonly PointEvent[]): MomentumCounts {
  let selfRun = 0;
  let opponentRun = 0;
  let selfLongestRun = 0;
  let opponentLongestRun = 0;
  let leadChanges = 0;
  let previousLeader: PlayerSide | null = null;
  let selfBiggestLead = 0;
  let opponentBiggestLead = 0;

  for (const event of events) {
    if (event.scoringPlayer === 'player1') {
      selfRun += 1;
      opponentRun = 0;
      selfLongestRun = Math.max(selfLongestRun, selfRun);
    } else {
      opponentRun += 1;
      selfRun = 0;
      opponentLongestRun = Math.max(opponentLongestRun, opponentRun);
    }

    // Only a direct flip between consecutive events counts; a tie clears the previous leader.
    const leader = leaderOf(event);
    if (leader && previousLeader && leader !== previousLeader) {
      leadChanges += 1;
    }
    previousLeader = leader;

    const lead = differentialOf(event);
    if (lead > 0) selfBiggestLead = Math.max(selfBiggestLead, lead);
    else if (lead < 0) opponentBiggestLead = Math.max(opponentBiggestLead, -lead);
  }

  return { selfLongestRun, opponentLongestRun, leadChanges, selfBiggestLead, opponentBiggestLead };
}

export const describeMomentum = (counts: MomentumCounts, outcome: MatchOutcome) => {
  const gap = P.momentum.dominantRunGap;
  if (counts.selfLongestRun > counts.opponentLongestRun + gap) {
    return `You dominated momentum with a ${counts.selfLongestRun}-point run${outcome === 'WIN' ? ' and carried it to victory' : ''}.`;
  }
  if (counts.opponentLongestRun > counts.selfLongestRun + gap) {
    return `Your opponent had momentum with a ${counts.opponentLongestRun}-point run${outcome === 'WIN' ? ', but you recovered to win' : ''}.`;
  }
  if (counts.leadChanges > P.momentum.backAndForthLeadChanges) {
    return `Back-and-forth battle with ${counts.leadChanges} lead changes.`;
  }
  return 'Evenly contested match.';
};

export function computeMomentumInsights(
  events: readonly PointEvent[],
  outcome: MatchOutcome
): MomentumInsights {
  const counts = scanMomentum(events);
  return { ...counts, summary: describeMomentum(counts, outcome) };
}

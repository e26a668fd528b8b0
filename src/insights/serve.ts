import type { GameType, PointEvent, Sport } from '../engine/types.js';
import { isRallyScoring } from '../engine/profiles.js';
import { ratio } from './helpers.js';
import type { ServeInsights } from './types.js';

export function computeServeInsights(
  events: readonly PointEvent[],
  sport: Sport,
  gameType: GameType
): ServeInsights {
  const isDoubles = gameType === 'DOUBLES';
  let selfServed = 0;
  let selfWon = 0;
  let partnerServed = 0;
  let partnerWon = 0;
  let opponentServed = 0;
  let opponentWon = 0;

  for (const event of events) {
    if (!event.servingPlayer) continue;
    const trackedScored = event.scoringPlayer === 'player1';

    if (event.servingPlayer === 'player2') {
      opponentServed += 1;
      if (trackedScored) opponentWon += 1;
      continue;
    }

    if (!isDoubles || event.doublesServerRole === 'SELF') {
      selfServed += 1;
      if (trackedScored) selfWon += 1;
    } else if (event.doublesServerRole === 'PARTNER') {
      partnerServed += 1;
      if (trackedScored) partnerWon += 1;
    }
  }

  return {
    selfServedPoints: selfServed,
    selfServedPointsWon: selfWon,
    partnerServedPoints: partnerServed,
    partnerServedPointsWon: partnerWon,
    opponentServedPoints: opponentServed,
    opponentServedPointsWon: opponentWon,
    opponentServeLabel: isRallyScoring(sport) ? 'SIDE_OUTS_DEFENDED' : 'BREAK_POINTS_WON',
    selfServeWinRate: ratio(selfWon, selfServed),
    partnerServeWinRate: ratio(partnerWon, partnerServed),
    returnWinRate: ratio(opponentWon, opponentServed),
  };
}

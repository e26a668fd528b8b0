import type { PointEvent, Sport } from '../engine/types.js';
import { getSportProfile } from '../engine/profiles.js';
import { ratio } from './helpers.js';
import type { ClutchInsights } from './types.js';

export function computeClutchInsights(events: readonly PointEvent[], sport: Sport): ClutchInsights {
  const profile = getSportProfile(sport);
  const rally = profile.scoringModel === 'RALLY';
  let gamePointsPlayed = 0;
  let gamePointsWon = 0;
  let breakPointsPlayed = 0;
  let breakPointsConverted = 0;

  for (const event of events) {
    const p1 = event.player1Score;
    const p2 = event.player2Score;
    const trackedScored = event.scoringPlayer === 'player1';
    const bothAtFloor = p1 >= profile.gamePointFloor && p2 >= profile.gamePointFloor;

    const isGamePoint = rally ? bothAtFloor && Math.abs(p1 - p2) <= 1 : bothAtFloor && p1 === p2;
    if (isGamePoint) {
      gamePointsPlayed += 1;
      if (trackedScored) gamePointsWon += 1;
    }

    // Rally scoring has no break points: side-outs are reported by the serve insights.
    if (!rally && event.servingPlayer === 'player2' && p1 >= profile.breakPointScore && p1 > p2) {
      breakPointsPlayed += 1;
      if (trackedScored) breakPointsConverted += 1;
    }
  }

  return {
    gamePointsPlayed,
    gamePointsWon,
    breakPointsPlayed,
    breakPointsConverted,
    gamePointConversionRate: ratio(gamePointsWon, gamePointsPlayed),
    breakPointConversionRate: ratio(breakPointsConverted, breakPointsPlayed),
  };
}

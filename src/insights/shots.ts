import type { PointEvent, ShotType } from '../engine/types.js';
import { ratio } from './helpers.js';
import type { ShotBreakdownEntry } from './types.js';

// Tracked-side points grouped by the shot that ended them, most frequent first.
export function computeShotBreakdown(events: readonly PointEvent[]): ShotBreakdownEntry[] {
  const counts = new Map<ShotType, number>();
  let total = 0;
  for (const event of events) {
    if (event.scoringPlayer !== 'player1' || !event.shotType) continue;
    counts.set(event.shotType, (counts.get(event.shotType) ?? 0) + 1);
    total += 1;
  }

  return [...counts.entries()]
    .map(([shotType, pointsWon]) => ({ shotType, pointsWon, share: ratio(pointsWon, total) }))
    .sort((a, b) => b.pointsWon - a.pointsWon || a.shotType.localeCompare(b.shotType));
}

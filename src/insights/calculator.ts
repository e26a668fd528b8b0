import type { MatchRecord } from '../engine/types.js';
import { computeServeInsights } from './serve.js';
import { computeMomentumInsights } from './momentum.js';
import { computeClutchInsights } from './clutch.js';
import { extractHighlights } from './highlights.js';
import { computeShotBreakdown } from './shots.js';
import { composeStory } from './story.js';
import type { InsightsResult } from './types.js';

const MIN_EVENTS = 2;

/**
 * Derives per-match insights from the point log. Returns `null` rather than a
 * zero-valued result when fewer than two events were recorded.
 */
export function computeInsights(match: MatchRecord): InsightsResult | null {
  const { events } = match;
  if (events.length < MIN_EVENTS) return null;

  const momentum = computeMomentumInsights(events, match.outcome);

  return {
    sport: match.sport,
    gameType: match.gameType,
    isDoubles: match.gameType === 'DOUBLES',
    serve: computeServeInsights(events, match.sport, match.gameType),
    momentum,
    clutch: computeClutchInsights(events, match.sport),
    highlights: extractHighlights(match),
    shots: computeShotBreakdown(events),
    story: composeStory(events, match.outcome, momentum.leadChanges),
  };
}

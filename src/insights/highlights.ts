import type { MatchRecord, PlayerSide, PointEvent } from '../engine/types.js';
import { snapshotOf } from '../engine/types.js';
import { getSportProfile } from '../engine/profiles.js';
import { P } from '../engine/params.js';
import type { Highlight } from './types.js';

interface RunMarker {
  length: number;
  end: PointEvent;
}

// Earliest run of maximal length for `side`; `end` is the event closing it.
const longestRun = (events: readonly PointEvent[], side: PlayerSide): RunMarker | null => {
  let current = 0;
  let best: RunMarker | null = null;
  for (const event of events) {
    if (event.scoringPlayer !== side) {
      current = 0;
      continue;
    }
    current += 1;
    if (!best || current > best.length) {
      best = { length: current, end: event };
    }
  }
  return best;
};

const findComeback = (events: readonly PointEvent[]) => {
  let deepestDeficit = 0;
  let comeback: { deficit: number; event: PointEvent } | null = null;
  for (const event of events) {
    deepestDeficit = Math.max(deepestDeficit, event.player2Score - event.player1Score);
    const leading = event.player1Score > event.player2Score;
    if (leading && deepestDeficit >= P.highlights.minDeficit && deepestDeficit > (comeback?.deficit ?? 0)) {
      comeback = { deficit: deepestDeficit, event };
    }
  }
  return comeback;
};

const findClutchPoint = (events: readonly PointEvent[], floor: number) => {
  for (let idx = events.length - 1; idx >= 0; idx -= 1) {
    const event = events[idx];
    if (event.scoringPlayer === 'player1' && event.player1Score >= floor && event.player2Score >= floor) {
      return event;
    }
  }
  return undefined;
};

const findServiceWinner = (events: readonly PointEvent[]) =>
  events.find(
    (event) =>
      event.servingPlayer === 'player1' && event.scoringPlayer === 'player1' && event.shotType === 'SERVE'
  );

export function extractHighlights(match: Pick<MatchRecord, 'events' | 'outcome' | 'sport'>): Highlight[] {
  const { events } = match;
  const highlights: Highlight[] = [];
  const minRun = P.highlights.minRun;

  const run = longestRun(events, 'player1');
  if (run && run.length >= minRun) {
    highlights.push({
      kind: 'SCORING_RUN',
      title: `${run.length}-Point Run`,
      description: `Scored ${run.length} consecutive points`,
      score: snapshotOf(run.end),
      isPositive: true,
    });
  }

  const comeback = findComeback(events);
  if (comeback) {
    highlights.push({
      kind: 'COMEBACK',
      title: 'Comeback',
      description: `Overcame a ${comeback.deficit}-point deficit`,
      score: snapshotOf(comeback.event),
      isPositive: true,
    });
  }

  const clutch = findClutchPoint(events, getSportProfile(match.sport).clutchHighlightFloor);
  if (clutch) {
    highlights.push({
      kind: 'CLUTCH_POINT',
      title: 'Clutch Point',
      description: `Scored under pressure at ${clutch.player1Score - 1}-${clutch.player2Score}`,
      score: snapshotOf(clutch),
      isPositive: true,
    });
  }

  const ace = findServiceWinner(events);
  if (ace) {
    highlights.push({
      kind: 'SERVICE_WINNER',
      title: 'Service Winner',
      description: 'Won point directly on serve',
      score: snapshotOf(ace),
      isPositive: true,
    });
  }

  if (match.outcome === 'LOSS') {
    const opponentRun = longestRun(events, 'player2');
    if (opponentRun && opponentRun.length >= minRun) {
      highlights.push({
        kind: 'OPPONENT_RUN',
        title: "Opponent's Run",
        description: `They scored ${opponentRun.length} in a row`,
        score: snapshotOf(opponentRun.end),
        isPositive: false,
      });
    }
  }

  return highlights;
}

import { describe, it } from 'node:test';
import assert from 'node:assert/strict';

import {
  applyProgress,
  resetProgress,
  topAchievements,
  totalAchievementPoints,
} from '../../src/achievements/tracker.js';
import type { ProgressMap } from '../../src/achievements/types.js';

const first = new Date('2026-03-01T10:00:00Z');
const later = new Date('2026-03-02T10:00:00Z');

describe('applyProgress', () => {
  it('reports a tier once and never regresses the counter', () => {
    const reached = applyProgress('games_played', 5, {}, undefined, first);
    assert.deepEqual(reached.tierJustReached, { id: 'games_played', tier: 'REGULAR', points: 10 });
    assert.deepEqual(reached.record, {
      id: 'games_played',
      currentValue: 5,
      highestTierAchieved: 'REGULAR',
      dateLastUpdated: first,
    });

    const lower = applyProgress('games_played', 3, reached.progress, undefined, later);
    assert.equal(lower.tierJustReached, undefined);
    assert.equal(lower.record.currentValue, 5);
    assert.equal(lower.record.highestTierAchieved, 'REGULAR');
    assert.equal(lower.record.dateLastUpdated, first);
  });

  it('leaves the record unchanged when the same value is applied again', () => {
    const once = applyProgress('victories', 12, {}, undefined, first);
    const twice = applyProgress('victories', 12, once.progress, undefined, later);
    assert.equal(twice.tierJustReached, undefined);
    assert.deepEqual(twice.record, once.record);
    assert.equal(twice.record.dateLastUpdated, first);
  });

  it('reports the points a new tier adds to the running total', () => {
    const regular = applyProgress('games_played', 5, {}, undefined, first);
    const bronze = applyProgress('games_played', 30, regular.progress, undefined, later);
    assert.deepEqual(bronze.tierJustReached, { id: 'games_played', tier: 'BRONZE', points: 25 });
    assert.equal(bronze.record.dateLastUpdated, later);
  });

  it('jumps straight to the highest tier a value satisfies', () => {
    const result = applyProgress('victories', 60, {}, undefined, first);
    assert.deepEqual(result.tierJustReached, { id: 'victories', tier: 'SILVER', points: 85 });
  });

  it('creates an in-progress record below the first threshold', () => {
    const result = applyProgress('century_club', 40, {}, undefined, first);
    assert.equal(result.tierJustReached, undefined);
    assert.equal(result.record.highestTierAchieved, null);
    assert.equal(result.progress.century_club?.currentValue, 40);
  });

  it('uses the special points for an override achievement', () => {
    const result = applyProgress('diamond_hands', 100, {}, undefined, first);
    assert.deepEqual(result.tierJustReached, { id: 'diamond_hands', tier: 'PLATINUM', points: 500 });
  });

  it('leaves the input map untouched', () => {
    const progress: ProgressMap = {};
    applyProgress('victories', 5, progress, undefined, first);
    assert.deepEqual(progress, {});
  });
});

describe('totals and ranking', () => {
  const progress: ProgressMap = {
    games_played: { id: 'games_played', currentValue: 60, highestTierAchieved: 'SILVER', dateLastUpdated: first },
    early_bird: { id: 'early_bird', currentValue: 1, highestTierAchieved: 'SILVER', dateLastUpdated: first },
    pickler: { id: 'pickler', currentValue: 1, highestTierAchieved: 'REGULAR', dateLastUpdated: first },
    century_club: { id: 'century_club', currentValue: 20, highestTierAchieved: null, dateLastUpdated: first },
  };

  it('sums points for every reached tier', () => {
    assert.equal(totalAchievementPoints(progress), 145);
  });

  it('ranks by tier, then points', () => {
    assert.deepEqual(
      topAchievements(progress).map((entry) => [entry.definition.id, entry.points]),
      [
        ['games_played', 85],
        ['early_bird', 50],
        ['pickler', 10],
      ]
    );
    assert.equal(topAchievements(progress, 1).length, 1);
  });

  it('resets to an empty map', () => {
    assert.deepEqual(resetProgress(), {});
  });
});

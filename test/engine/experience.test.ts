import { describe, it } from 'node:test';
import assert from 'node:assert/strict';

import { awardExperience, computeExperienceAward, rallyBonus } from '../../src/engine/experience.js';
import { INITIAL_EXPERIENCE } from '../../src/engine/leveling.js';
import { buildMatch, point, rally } from '../helpers/matches.js';

const serveRun = (length: number) =>
  Array.from({ length }, (_, idx) => point('player1', idx + 1, idx + 1, { isServePoint: true }));

describe('computeExperienceAward', () => {
  it('awards the base and victory bonus for a plain win', () => {
    const award = computeExperienceAward(
      buildMatch({ events: [], player1Score: 11, player2Score: 8, outcome: 'WIN', elapsedSeconds: 600 })
    );
    assert.deepEqual(award, {
      totalAwarded: 75,
      breakdown: [
        { label: 'Game Completed', amount: 50 },
        { label: 'Victory Bonus', amount: 25 },
      ],
    });
  });

  it('awards only the base for a loss', () => {
    const award = computeExperienceAward(buildMatch({ player1Score: 5, player2Score: 11, outcome: 'LOSS' }));
    assert.equal(award.totalAwarded, 50);
    assert.equal(award.breakdown.length, 1);
  });

  it('adds a comeback bonus after trailing by four', () => {
    const award = computeExperienceAward(
      buildMatch({ events: rally('BBBBAAAAAA'), player1Score: 11, player2Score: 9, outcome: 'WIN' })
    );
    assert.deepEqual(
      award.breakdown.map((entry) => entry.label),
      ['Game Completed', 'Victory Bonus', 'Comeback']
    );
    assert.equal(award.totalAwarded, 95);
  });

  it('adds dominant and endurance bonuses at their thresholds', () => {
    const dominant = computeExperienceAward(
      buildMatch({ sport: 'TENNIS', player1Score: 6, player2Score: 0, outcome: 'WIN', elapsedSeconds: 901 })
    );
    assert.deepEqual(dominant.breakdown.slice(2), [
      { label: 'Dominant Win', amount: 20 },
      { label: 'Endurance', amount: 10 },
    ]);

    const short = computeExperienceAward(
      buildMatch({ player1Score: 11, player2Score: 7, outcome: 'WIN', elapsedSeconds: 900 })
    );
    assert.equal(short.totalAwarded, 75);
  });
});

describe('rallyBonus', () => {
  it('pays for each serve point at an even total once three are chained', () => {
    assert.equal(rallyBonus(serveRun(5)), 15);
    assert.equal(rallyBonus(serveRun(2)), 0);
  });

  it('restarts the chain on an odd total', () => {
    const events = [...serveRun(3), point('player1', 4, 3, { isServePoint: true }), ...serveRun(3)];
    assert.equal(rallyBonus(events), 10);
  });

  it('is capped', () => {
    assert.equal(rallyBonus(serveRun(20)), 40);
  });
});

describe('awardExperience', () => {
  it('accumulates experience without levelling below the threshold', () => {
    const match = buildMatch({ player1Score: 11, player2Score: 8, outcome: 'WIN' });
    const { state, reward } = awardExperience(match, INITIAL_EXPERIENCE);
    assert.deepEqual(state, { totalExperience: 75, level: 1 });
    assert.equal(reward.leveledUp, false);
    assert.equal(reward.previousLevel, 1);
  });

  it('can cross more than one level at once', () => {
    const match = buildMatch({
      events: [point('player2', 0, 4), ...serveRun(20)],
      player1Score: 11,
      player2Score: 5,
      outcome: 'WIN',
      elapsedSeconds: 1000,
    });
    const { state, reward } = awardExperience(match, { totalExperience: 90, level: 1 });

    assert.equal(reward.totalAwarded, 165);
    assert.deepEqual(state, { totalExperience: 255, level: 3 });
    assert.equal(reward.leveledUp, true);
    assert.equal(reward.previousLevel, 1);
    assert.equal(reward.level, 3);
  });
});

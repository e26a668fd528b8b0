import { test } from 'node:test';
import assert from 'node:assert/strict';

import {
  cumulativeExperienceForLevel,
  describeExperience,
  levelForExperience,
} from '../../src/engine/leveling.js';

test('each level costs half again as much as the previous one', () => {
  assert.deepEqual(
    [1, 2, 3, 4, 5, 6].map(cumulativeExperienceForLevel),
    [0, 100, 250, 475, 812, 1317]
  );
});

test('derives the level from total experience at the thresholds', () => {
  assert.equal(levelForExperience(0), 1);
  assert.equal(levelForExperience(99), 1);
  assert.equal(levelForExperience(100), 2);
  assert.equal(levelForExperience(249), 2);
  assert.equal(levelForExperience(250), 3);
  assert.equal(levelForExperience(811), 4);
  assert.equal(levelForExperience(812), 5);
});

test('describes progress within the current level', () => {
  assert.deepEqual(describeExperience({ totalExperience: 300, level: 3 }), {
    totalExperience: 300,
    level: 3,
    experienceIntoLevel: 50,
    experienceForNextLevel: 225,
  });
});

test('re-derives a stale stored level from total experience', () => {
  assert.equal(describeExperience({ totalExperience: 300, level: 1 }).level, 3);
});

import assert from 'node:assert/strict';
import { test } from 'node:test';

import {
  toProfileState,
  toProgressRecord,
  toProgressRows,
  type AchievementProgressRow,
} from '../../src/store/postgres/rows.js';
import { ProgressionStateError } from '../../src/store/errors.js';
import { emptyProfile } from '../../src/store/types.js';

const updatedAt = new Date('2026-03-08T12:00:00Z');

const row = (overrides: Partial<AchievementProgressRow> = {}): AchievementProgressRow => ({
  profileId: 'profile-1',
  achievementId: 'victories',
  currentValue: 7,
  highestTier: 'REGULAR',
  updatedAt,
  ...overrides,
});

test('maps a stored row to a progress record', () => {
  assert.deepEqual(toProgressRecord(row()), {
    id: 'victories',
    currentValue: 7,
    highestTierAchieved: 'REGULAR',
    dateLastUpdated: updatedAt,
  });
  assert.equal(toProgressRecord(row({ highestTier: null })).highestTierAchieved, null);
});

test('rejects rows naming an unknown achievement or tier', () => {
  assert.throws(
    () => toProgressRecord(row({ achievementId: 'retired_award' })),
    (err: unknown) => err instanceof ProgressionStateError && err.context.achievementId === 'retired_award'
  );
  assert.throws(
    () => toProgressRecord(row({ highestTier: 'DIAMOND' })),
    (err: unknown) => err instanceof ProgressionStateError && err.context.value === 'DIAMOND'
  );
});

test('builds a profile state from its rows', () => {
  assert.deepEqual(toProfileState('profile-1', null, []), emptyProfile('profile-1'));

  const state = toProfileState(
    'profile-1',
    {
      profileId: 'profile-1',
      totalExperience: 260,
      level: 3,
      achievementPoints: 10,
      processedMatchIds: ['match-1', 'match-2'],
      createdAt: updatedAt,
      updatedAt,
    },
    [row()]
  );

  assert.deepEqual(state.experience, { totalExperience: 260, level: 3 });
  assert.deepEqual(state.processedMatchIds, ['match-1', 'match-2']);
  assert.equal(state.progress.victories?.currentValue, 7);
});

test('flattens progress into insertable rows', () => {
  assert.deepEqual(
    toProgressRows('profile-1', {
      pickler: { id: 'pickler', currentValue: 2, highestTierAchieved: 'REGULAR', dateLastUpdated: updatedAt },
    }),
    [
      {
        profileId: 'profile-1',
        achievementId: 'pickler',
        currentValue: 2,
        highestTier: 'REGULAR',
        updatedAt,
      },
    ]
  );
});

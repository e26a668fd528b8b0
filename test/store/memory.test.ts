import assert from 'node:assert/strict';
import { test } from 'node:test';

import { MemoryStore } from '../../src/store/memory.js';
import { emptyProfile, rememberMatch, PROCESSED_MATCH_LIMIT, type ProfileState } from '../../src/store/index.js';

const savedAt = new Date('2026-03-08T12:00:00Z');

const sampleState = (): ProfileState => ({
  profileId: 'profile-1',
  progress: {
    victories: { id: 'victories', currentValue: 5, highestTierAchieved: 'REGULAR', dateLastUpdated: savedAt },
  },
  achievementPoints: 10,
  experience: { totalExperience: 120, level: 2 },
  processedMatchIds: ['match-1'],
  updatedAt: savedAt,
});

test('returns a fresh profile when nothing is stored', async () => {
  const store = new MemoryStore();
  assert.deepEqual(await store.loadProfile('profile-1'), emptyProfile('profile-1'));
});

test('round-trips saved state without sharing references', async () => {
  const store = new MemoryStore();
  const state = sampleState();
  await store.saveProfile(state);

  const loaded = await store.loadProfile('profile-1');
  assert.deepEqual(loaded, state);
  assert.notEqual(loaded.progress, state.progress);
  assert.ok(loaded.progress.victories?.dateLastUpdated instanceof Date);
});

test('reset removes every stored record for the profile', async () => {
  const store = new MemoryStore();
  await store.saveProfile(sampleState());
  await store.saveProfile({ ...sampleState(), profileId: 'profile-2' });

  await store.resetProfile('profile-1');

  assert.deepEqual(await store.loadProfile('profile-1'), emptyProfile('profile-1'));
  assert.equal((await store.loadProfile('profile-2')).achievementPoints, 10);
});

test('remembers a bounded list of processed match ids', () => {
  assert.deepEqual(rememberMatch(['a', 'b'], 'a'), ['b', 'a']);

  const full = Array.from({ length: PROCESSED_MATCH_LIMIT }, (_, idx) => `m-${idx}`);
  const next = rememberMatch(full, 'latest');
  assert.equal(next.length, PROCESSED_MATCH_LIMIT);
  assert.equal(next[0], 'm-1');
  assert.equal(next[next.length - 1], 'latest');
});

import { test } from 'node:test';
import assert from 'node:assert/strict';

import { parseMatchHistory, parseMatchRecord, serializeMatchRecord } from '../../src/formats/index.js';

const base = {
  id: 'match-1',
  sport: 'TENNIS',
  gameType: 'DOUBLES',
  playedAt: '2026-03-04T15:00:00.000Z',
  player1Score: 6,
  player2Score: 4,
  elapsedSeconds: 3600,
  outcome: 'WIN',
  events: [
    { servingPlayer: 'player1', scoringPlayer: 'player1', player1Score: 1, player2Score: 0, doublesServerRole: 'SELF', timestamp: 5 },
    { servingPlayer: 'player1', scoringPlayer: 'player2', player1Score: 1, player2Score: 1, isServePoint: true, timestamp: 40 },
  ],
  sets: [{ player1Games: 6, player2Games: 4 }],
};

const submission = (overrides: Record<string, unknown> = {}) => ({ ...base, ...overrides });

test('parses a well-formed match record', () => {
  const result = parseMatchRecord(submission());
  assert.equal(result.ok, true);
  if (!result.ok) return;

  assert.deepEqual(result.match.playedAt, new Date('2026-03-04T15:00:00.000Z'));
  assert.equal(result.match.events.length, 2);
  assert.equal(result.match.events[0].isServePoint, false);
  assert.equal(result.match.events[1].isServePoint, true);
  assert.equal(result.match.events[0].doublesServerRole, 'SELF');
});

test('defaults a missing point log to empty', () => {
  const { events: _events, ...withoutEvents } = base;
  const result = parseMatchRecord(withoutEvents);
  assert.equal(result.ok, true);
  if (result.ok) assert.deepEqual(result.match.events, []);
});

test('rejects values outside the known enumerations', () => {
  const result = parseMatchRecord(submission({ sport: 'SQUASH' }));
  assert.equal(result.ok, false);
  if (!result.ok) {
    assert.equal(result.error, 'validation_failed');
    assert.equal(result.message, 'invalid match record');
  }

  const negative = parseMatchRecord(submission({ player2Score: -1 }));
  assert.equal(negative.ok, false);
});

test('rejects an outcome that contradicts the final score', () => {
  const result = parseMatchRecord(submission({ outcome: 'LOSS' }));
  assert.deepEqual(result, {
    ok: false,
    error: 'inconsistent_record',
    message: 'match match-1: outcome LOSS does not match final score 6-4',
  });
});

test('rejects point events out of chronological order', () => {
  const events = [...base.events].reverse();
  const result = parseMatchRecord(submission({ events }));
  assert.equal(result.ok, false);
  if (!result.ok) assert.equal(result.message, 'match match-1: point events must be in chronological order');
});

test('parses a history sorted by play time', () => {
  const result = parseMatchHistory([
    submission({ id: 'later', playedAt: '2026-03-05T10:00:00.000Z' }),
    submission({ id: 'earlier', playedAt: '2026-03-01T10:00:00.000Z' }),
  ]);
  assert.equal(result.ok, true);
  if (result.ok) assert.deepEqual(result.matches.map((match) => match.id), ['earlier', 'later']);
});

test('rejects duplicate ids and bad entries with their position', () => {
  const duplicate = parseMatchHistory([submission(), submission()]);
  assert.deepEqual(duplicate, {
    ok: false,
    error: 'inconsistent_record',
    message: 'entry 1: duplicate match id match-1',
  });

  const invalid = parseMatchHistory([submission(), submission({ id: '' })]);
  assert.equal(invalid.ok, false);
  if (!invalid.ok) assert.equal(invalid.message, 'entry 1: invalid match record');

  assert.equal(parseMatchHistory({}).ok, false);
});

test('serializes play time as an ISO string', () => {
  const result = parseMatchRecord(submission());
  assert.ok(result.ok);
  const serialized = serializeMatchRecord(result.match);
  assert.equal(serialized.playedAt, '2026-03-04T15:00:00.000Z');
  const reparsed = parseMatchRecord(serialized);
  assert.ok(reparsed.ok);
  assert.deepEqual(reparsed.match, result.match);
});

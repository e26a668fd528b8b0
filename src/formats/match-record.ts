import { z } from 'zod';
import {
  DOUBLES_SERVER_ROLES,
  GAME_TYPES,
  MATCH_OUTCOMES,
  PLAYER_SIDES,
  SHOT_TYPES,
  SPORTS,
  type MatchRecord,
} from '../engine/types.js';
import type { MatchHistoryParseResult, MatchRecordParseResult, ParseFailure } from './types.js';

const score = z.number().int().min(0);

const PointEventSchema = z.object({
  servingPlayer: z.enum(PLAYER_SIDES).nullish(),
  scoringPlayer: z.enum(PLAYER_SIDES),
  player1Score: score,
  player2Score: score,
  shotType: z.enum(SHOT_TYPES).nullish(),
  doublesServerRole: z.enum(DOUBLES_SERVER_ROLES).nullish(),
  isServePoint: z.boolean().default(false),
  timestamp: z.number().min(0).nullish(),
});

const SetScoreSchema = z.object({
  player1Games: score,
  player2Games: score,
  tiebreak: z.object({ player1: score, player2: score }).nullish(),
});

export const MatchRecordSchema = z.object({
  id: z.string().min(1),
  sport: z.enum(SPORTS),
  gameType: z.enum(GAME_TYPES),
  playedAt: z.coerce.date(),
  player1Score: score,
  player2Score: score,
  elapsedSeconds: z.number().min(0),
  outcome: z.enum(MATCH_OUTCOMES),
  events: z.array(PointEventSchema).default([]),
  sets: z.array(SetScoreSchema).nullish(),
});

export type MatchRecordInput = z.input<typeof MatchRecordSchema>;

const failure = (message: string, issues?: unknown): ParseFailure => ({
  ok: false,
  error: 'validation_failed',
  message,
  issues,
});

const inconsistent = (message: string): ParseFailure => ({
  ok: false,
  error: 'inconsistent_record',
  message,
});

// Returns a message describing the first inconsistency, if any.
const checkConsistency = (match: MatchRecord): string | null => {
  if (match.player1Score !== match.player2Score) {
    const expected = match.player1Score > match.player2Score ? 'WIN' : 'LOSS';
    if (match.outcome !== expected) {
      return `outcome ${match.outcome} does not match final score ${match.player1Score}-${match.player2Score}`;
    }
  }
  const timestamps = match.events.map((event) => event.timestamp).filter((value): value is number => value != null);
  for (let idx = 1; idx < timestamps.length; idx += 1) {
    if (timestamps[idx] < timestamps[idx - 1]) {
      return 'point events must be in chronological order';
    }
  }
  return null;
};

export const parseMatchRecord = (input: unknown): MatchRecordParseResult => {
  const parsed = MatchRecordSchema.safeParse(input);
  if (!parsed.success) {
    return failure('invalid match record', parsed.error.flatten());
  }
  const match: MatchRecord = parsed.data;
  const problem = checkConsistency(match);
  if (problem) return inconsistent(`match ${match.id}: ${problem}`);
  return { ok: true, match };
};

export const parseMatchHistory = (input: unknown): MatchHistoryParseResult => {
  if (!Array.isArray(input)) {
    return failure('match history must be an array');
  }
  const matches: MatchRecord[] = [];
  const seen = new Set<string>();
  for (const [index, entry] of input.entries()) {
    const result = parseMatchRecord(entry);
    if (!result.ok) {
      return { ...result, message: `entry ${index}: ${result.message}` };
    }
    if (seen.has(result.match.id)) {
      return inconsistent(`entry ${index}: duplicate match id ${result.match.id}`);
    }
    seen.add(result.match.id);
    matches.push(result.match);
  }
  matches.sort((a, b) => a.playedAt.getTime() - b.playedAt.getTime());
  return { ok: true, matches };
};

export const serializeMatchRecord = (match: MatchRecord) => ({
  ...match,
  playedAt: match.playedAt.toISOString(),
  events: [...match.events],
  sets: match.sets ? [...match.sets] : null,
});

import type { MatchRecord } from '../engine/types.js';

export type ParseErrorCode = 'validation_failed' | 'inconsistent_record';

export interface ParseFailure {
  ok: false;
  error: ParseErrorCode;
  message: string;
  issues?: unknown;
}

export interface MatchRecordParseSuccess {
  ok: true;
  match: MatchRecord;
}

export type MatchRecordParseResult = MatchRecordParseSuccess | ParseFailure;

export interface MatchHistoryParseSuccess {
  ok: true;
  matches: MatchRecord[];
}

export type MatchHistoryParseResult = MatchHistoryParseSuccess | ParseFailure;

export * from './types.js';
export { MatchRecordSchema, parseMatchHistory, parseMatchRecord, serializeMatchRecord } from './match-record.js';
export type { MatchRecordInput } from './match-record.js';

import type { GameType, ScoreSnapshot, ShotType, Sport } from '../engine/types.js';

export type OpponentServeLabel = 'SIDE_OUTS_DEFENDED' | 'BREAK_POINTS_WON';

export interface ServeInsights {
  selfServedPoints: number;
  selfServedPointsWon: number;
  partnerServedPoints: number;
  partnerServedPointsWon: number;
  opponentServedPoints: number;
  // Tracked-side points won on the opponent's serve, reported under `opponentServeLabel`.
  opponentServedPointsWon: number;
  opponentServeLabel: OpponentServeLabel;
  selfServeWinRate: number;
  partnerServeWinRate: number;
  returnWinRate: number;
}

export interface MomentumInsights {
  selfLongestRun: number;
  opponentLongestRun: number;
  leadChanges: number;
  selfBiggestLead: number;
  opponentBiggestLead: number;
  summary: string;
}

export interface ClutchInsights {
  gamePointsPlayed: number;
  gamePointsWon: number;
  breakPointsPlayed: number;
  breakPointsConverted: number;
  gamePointConversionRate: number;
  breakPointConversionRate: number;
}

export type HighlightKind = 'SCORING_RUN' | 'COMEBACK' | 'CLUTCH_POINT' | 'SERVICE_WINNER' | 'OPPONENT_RUN';

export interface Highlight {
  kind: HighlightKind;
  title: string;
  description: string;
  score: ScoreSnapshot;
  isPositive: boolean;
}

export interface ShotBreakdownEntry {
  shotType: ShotType;
  pointsWon: number;
  share: number;
}

export interface MatchStory {
  headline: string;
  description: string;
}

export interface InsightsResult {
  sport: Sport;
  gameType: GameType;
  isDoubles: boolean;
  serve: ServeInsights;
  momentum: MomentumInsights;
  clutch: ClutchInsights;
  highlights: Highlight[];
  shots: ShotBreakdownEntry[];
  story: MatchStory;
}

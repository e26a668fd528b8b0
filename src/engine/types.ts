export const SPORTS = ['PICKLEBALL', 'TENNIS', 'PADEL'] as const;
export type Sport = (typeof SPORTS)[number];

export const GAME_TYPES = ['SINGLES', 'DOUBLES'] as const;
export type GameType = (typeof GAME_TYPES)[number];

export const MATCH_OUTCOMES = ['WIN', 'LOSS'] as const;
export type MatchOutcome = (typeof MATCH_OUTCOMES)[number];

// player1 is always the tracked side (the profile owner and, in doubles, their partner).
export const PLAYER_SIDES = ['player1', 'player2'] as const;
export type PlayerSide = (typeof PLAYER_SIDES)[number];

export const SHOT_TYPES = ['SERVE', 'OVERHEAD', 'POWER_SHOT', 'TOUCH_SHOT', 'VOLLEY', 'UNKNOWN'] as const;
export type ShotType = (typeof SHOT_TYPES)[number];

export const DOUBLES_SERVER_ROLES = ['SELF', 'PARTNER'] as const;
export type DoublesServerRole = (typeof DOUBLES_SERVER_ROLES)[number];

export interface PointEvent {
  servingPlayer?: PlayerSide | null;
  scoringPlayer: PlayerSide;
  player1Score: number;
  player2Score: number;
  shotType?: ShotType | null;
  doublesServerRole?: DoublesServerRole | null;
  isServePoint: boolean;
  timestamp?: number | null;
}

export interface SetScore {
  player1Games: number;
  player2Games: number;
  tiebreak?: { player1: number; player2: number } | null;
}

export interface MatchRecord {
  id: string;
  sport: Sport;
  gameType: GameType;
  playedAt: Date;
  player1Score: number;
  player2Score: number;
  elapsedSeconds: number;
  outcome: MatchOutcome;
  events: readonly PointEvent[];
  sets?: readonly SetScore[] | null;
}

export interface ScoreSnapshot {
  player1: number;
  player2: number;
}

export const snapshotOf = (event: Pick<PointEvent, 'player1Score' | 'player2Score'>): ScoreSnapshot => ({
  player1: event.player1Score,
  player2: event.player2Score,
});

import type { Sport } from './types.js';

export type ScoringModel = 'RALLY' | 'SERVER_ADVANTAGE';

export type SportProfile = {
  scoringModel: ScoringModel;
  // Final score a winner normally reaches; gates the dominant-win bonus.
  regulationScore: number;
  // Both sides at or above this score count as a game-point situation.
  gamePointFloor: number;
  // Tracked-side score on the opponent's serve that opens a break-point chance.
  breakPointScore: number;
  clutchHighlightFloor: number;
};

const SPORT_PROFILES: Record<Sport, SportProfile> = {
  PICKLEBALL: {
    scoringModel: 'RALLY',
    regulationScore: 11,
    gamePointFloor: 10,
    breakPointScore: 3,
    clutchHighlightFloor: 9,
  },
  TENNIS: {
    scoringModel: 'SERVER_ADVANTAGE',
    regulationScore: 6,
    gamePointFloor: 3,
    breakPointScore: 3,
    clutchHighlightFloor: 9,
  },
  PADEL: {
    scoringModel: 'SERVER_ADVANTAGE',
    regulationScore: 6,
    gamePointFloor: 3,
    breakPointScore: 3,
    clutchHighlightFloor: 9,
  },
};

export const getSportProfile = (sport: Sport): SportProfile => SPORT_PROFILES[sport];

export const isRallyScoring = (sport: Sport) => getSportProfile(sport).scoringModel === 'RALLY';

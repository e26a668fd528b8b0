import type { PlayerSide, PointEvent } from '../engine/types.js';

export const ratio = (numerator: number, denominator: number) =>
  denominator > 0 ? numerator / denominator : 0;

export const leaderOf = (event: Pick<PointEvent, 'player1Score' | 'player2Score'>): PlayerSide | null => {
  if (event.player1Score > event.player2Score) return 'player1';
  if (event.player2Score > event.player1Score) return 'player2';
  return null;
};

export const differentialOf = (event: Pick<PointEvent, 'player1Score' | 'player2Score'>) =>
  event.player1Score - event.player2Score;

import { NUM_PLAYERS, PLAYER_IDS, PlayerId } from '../types/game';
import type { GameOutcome, GameState, Returns } from './types';

export const WIN_RETURN = 1;
export const LOSS_RETURN = -1;
export const DRAW_RETURN = 0;

/** Sum of {@link computeReturns} for an outcome. */
export function returnsSum(outcome: GameOutcome): number {
  return computeReturns(outcome).reduce((sum, value) => sum + value, 0);
}

export function isAllFinished(state: GameState): boolean {
  return state.finishedCount >= NUM_PLAYERS;
}

/**
 * Canonical, side-effect-free outcome evaluator.
 *
 * While any player is still active the outcome is `pending`. Once all four
 * have finished, the player with the strictly lowest score wins; if the
 * minimum is shared by two, three or four players the game is a draw. There
 * is no tie-break.
 */
export function evaluateOutcome(state: GameState): GameOutcome {
  if (!isAllFinished(state)) {
    return { kind: 'pending' };
  }

  const lowest = Math.min(...PLAYER_IDS.map((id) => state.players[id].score));
  const leaders: PlayerId[] = PLAYER_IDS.filter((id) => state.players[id].score === lowest);

  if (leaders.length === 1) {
    return { kind: 'winner', player: leaders[0] };
  }
  return { kind: 'draw' };
}

/**
 * Per-player returns for an outcome: winner +1 and everyone else −1, or all
 * zero for a draw or an unfinished game. A win therefore sums to −2, a draw
 * to 0.
 */
export function computeReturns(outcome: GameOutcome): Returns {
  switch (outcome.kind) {
    case 'pending':
    case 'draw':
      return [DRAW_RETURN, DRAW_RETURN, DRAW_RETURN, DRAW_RETURN];
    case 'winner': {
      const returns: Returns = [LOSS_RETURN, LOSS_RETURN, LOSS_RETURN, LOSS_RETURN];
      returns[outcome.player] = WIN_RETURN;
      return returns;
    }
  }
}

import type { PlayerId } from '../../types/game';
import { getPlayerState, nextPlayer, withPlayer } from '../playerStateHelpers';
import type { GameState, PlayerState } from '../types';
import { evaluateOutcome } from '../victoryLogic';

/**
 * Mark `player` finished and bump the finished count. A player who is
 * already finished is left alone and the state is returned unchanged.
 */
export function mutateFinish(state: GameState, player: PlayerId): GameState {
  const record = getPlayerState(state, player);
  if (record.isFinished) {
    return state;
  }
  const updated: PlayerState = { ...record, isFinished: true };
  const next: GameState = {
    ...state,
    players: withPlayer(state.players, updated),
    finishedCount: state.finishedCount + 1,
  };
  return { ...next, outcome: evaluateOutcome(next) };
}

/** Inverse of {@link mutateFinish}; the outcome drops back to pending. */
export function revertFinish(state: GameState, player: PlayerId): GameState {
  const record = getPlayerState(state, player);
  if (!record.isFinished) {
    return state;
  }
  const updated: PlayerState = { ...record, isFinished: false };
  return {
    ...state,
    players: withPlayer(state.players, updated),
    finishedCount: state.finishedCount - 1,
    outcome: { kind: 'pending' },
  };
}

/**
 * Pass the turn to the next seat. Finished players still receive turns; they
 * will only ever be offered the pass action.
 */
export function mutateTurnChange(state: GameState): GameState {
  return { ...state, currentPlayer: nextPlayer(state.currentPlayer) };
}

export function mutateTurnRewind(state: GameState, player: PlayerId): GameState {
  return { ...state, currentPlayer: player };
}

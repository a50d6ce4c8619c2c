import { PLAYER_IDS, PlayerId, isPlayerId } from '../types/game';
import { EngineErrorCode, InvalidState, PreconditionViolation } from './errors';
import type { GameState, PlayerState } from './types';

/**
 * Validate a raw seat number coming from outside the engine. Every public
 * entry point that takes a player goes through here before touching a
 * player record.
 */
export function assertPlayerId(value: number, domain: string = 'GameEngine'): PlayerId {
  if (!isPlayerId(value)) {
    throw new PreconditionViolation(
      EngineErrorCode.PRECONDITION_INVALID_PLAYER,
      `Player ${value} is not a seat of this game (expected 0..${PLAYER_IDS.length - 1})`,
      { player: value },
      domain
    );
  }
  return value;
}

export function createInitialPlayerState(
  id: PlayerId,
  pieceCount: number,
  totalCells: number
): PlayerState {
  return {
    id,
    availablePieces: new Array<boolean>(pieceCount).fill(true),
    piecesRemaining: pieceCount,
    isFirstMove: true,
    isFinished: false,
    score: totalCells,
  };
}

export function getPlayerState(state: GameState, player: PlayerId): PlayerState {
  const record = state.players[player];
  if (!record) {
    throw new InvalidState(
      EngineErrorCode.STATE_PLAYER_NOT_FOUND,
      `Player ${player} not found in game state`,
      { player }
    );
  }
  return record;
}

/** Return a players map with one record replaced; the input is untouched. */
export function withPlayer(
  players: GameState['players'],
  updated: PlayerState
): Record<PlayerId, PlayerState> {
  return { ...players, [updated.id]: updated };
}

export function isPieceAvailable(player: PlayerState, pieceIndex: number): boolean {
  return player.availablePieces[pieceIndex] === true;
}

export function nextPlayer(player: PlayerId): PlayerId {
  return PLAYER_IDS[(PLAYER_IDS.indexOf(player) + 1) % PLAYER_IDS.length];
}

import type { BoardCell, PlayerId } from '../../types/game';
import { EngineErrorCode, InvalidState } from '../errors';
import { getPlayerState, isPieceAvailable, withPlayer } from '../playerStateHelpers';
import type { GameState, Move, Piece, PlayerState } from '../types';

/**
 * Canonical board-level placement mutator. Writes `player`'s colour into
 * every cell of `move` and returns a new board; the input is untouched.
 */
export function applyPlacementOnBoard(
  board: ReadonlyArray<BoardCell>,
  move: Move,
  player: PlayerId
): BoardCell[] {
  const next = board.slice();
  for (const id of move.cellIds) {
    next[id] = player;
  }
  return next;
}

/** Inverse of {@link applyPlacementOnBoard}: clears every cell of `move`. */
export function clearPlacementOnBoard(board: ReadonlyArray<BoardCell>, move: Move): BoardCell[] {
  const next = board.slice();
  for (const id of move.cellIds) {
    next[id] = null;
  }
  return next;
}

/**
 * Apply a validated placement to the board and the acting player's record:
 * piece marked unavailable, one fewer piece remaining, first-move flag
 * cleared, score reduced by the piece's size.
 *
 * Validation is the caller's job; this only refuses to double-spend a piece
 * so a bad caller cannot drive the score below its floor.
 */
export function mutatePlacement(
  state: GameState,
  move: Move,
  piece: Piece,
  player: PlayerId
): GameState {
  const record = getPlayerState(state, player);
  if (!isPieceAvailable(record, move.pieceIndex)) {
    throw new InvalidState(
      EngineErrorCode.STATE_PIECE_UNAVAILABLE,
      `Player ${player} has already placed ${piece.name}`,
      { player, pieceIndex: move.pieceIndex }
    );
  }

  const availablePieces = record.availablePieces.slice();
  availablePieces[move.pieceIndex] = false;

  const updated: PlayerState = {
    ...record,
    availablePieces,
    piecesRemaining: record.piecesRemaining - 1,
    isFirstMove: false,
    score: record.score - piece.size,
  };

  return {
    ...state,
    board: applyPlacementOnBoard(state.board, move, player),
    players: withPlayer(state.players, updated),
  };
}

/**
 * Undo a placement made by `player`: cells cleared, piece back in hand,
 * score and pieces-remaining restored. The first-move flag is raised again
 * when the player is left with every piece in hand.
 */
export function revertPlacement(
  state: GameState,
  move: Move,
  piece: Piece,
  player: PlayerId
): GameState {
  const record = getPlayerState(state, player);
  if (isPieceAvailable(record, move.pieceIndex)) {
    throw new InvalidState(
      EngineErrorCode.STATE_PIECE_UNAVAILABLE,
      `Player ${player} still holds ${piece.name}; nothing to revert`,
      { player, pieceIndex: move.pieceIndex }
    );
  }

  const availablePieces = record.availablePieces.slice();
  availablePieces[move.pieceIndex] = true;
  const piecesRemaining = record.piecesRemaining + 1;

  const updated: PlayerState = {
    ...record,
    availablePieces,
    piecesRemaining,
    isFirstMove: piecesRemaining === availablePieces.length,
    score: record.score + piece.size,
  };

  return {
    ...state,
    board: clearPlacementOnBoard(state.board, move),
    players: withPlayer(state.players, updated),
  };
}

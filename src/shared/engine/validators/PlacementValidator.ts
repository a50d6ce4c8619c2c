import type { BoardCell, BoardGeometry, PlayerId } from '../../types/game';
import { cellId } from '../../types/game';
import { isPieceAvailable } from '../playerStateHelpers';
import { getStartCorner } from '../rulesConfig';
import type { GameState, Move, ValidationResult } from '../types';

/**
 * Context required to validate a placement independently of any particular
 * GameState host.
 */
export interface PlacementContext {
  player: PlayerId;
  /** True until the player's first placement lands. */
  isFirstMove: boolean;
  /** True once the player has passed or placed every piece. */
  isFinished: boolean;
  /** Whether the move's piece is still in the player's hand. */
  pieceAvailable: boolean;
  /** Cell id of the player's start corner. */
  startCornerId: number;
}

export function coversCell(move: Move, id: number): boolean {
  return move.cellIds.includes(id);
}

export function isSpaceTaken(board: ReadonlyArray<BoardCell>, move: Move): boolean {
  return move.cellIds.some((id) => board[id] !== null);
}

/** True when any edge neighbor of the move already carries `player`'s colour. */
export function hasOwnEdgeContact(
  board: ReadonlyArray<BoardCell>,
  move: Move,
  player: PlayerId
): boolean {
  return move.neighbors.some((id) => board[id] === player);
}

/** True when any corner cell of the move already carries `player`'s colour. */
export function hasOwnCornerContact(
  board: ReadonlyArray<BoardCell>,
  move: Move,
  player: PlayerId
): boolean {
  return move.corners.some((id) => board[id] === player);
}

/**
 * Canonical, host-agnostic placement check on a concrete board.
 *
 * - A finished player may not place anything.
 * - First placement: legal iff it covers the start corner and overlaps
 *   nothing. Edge and corner contact are not checked; on the standard board
 *   no first placement can reach another player's cells.
 * - Later placements, in order: piece still held, no overlap, no edge
 *   contact with the player's own colour, at least one corner contact with
 *   the player's own colour.
 */
export function validatePlacementOnBoard(
  board: ReadonlyArray<BoardCell>,
  move: Move,
  ctx: PlacementContext
): ValidationResult {
  if (ctx.isFinished) {
    return {
      valid: false,
      reason: 'Player has finished and may only pass',
      code: 'PLAYER_FINISHED',
    };
  }

  if (ctx.isFirstMove) {
    if (!coversCell(move, ctx.startCornerId)) {
      return {
        valid: false,
        reason: 'First placement must cover the start corner',
        code: 'FIRST_MOVE_CORNER',
      };
    }
    return isSpaceTaken(board, move)
      ? { valid: false, reason: 'Placement overlaps an occupied cell', code: 'SPACE_TAKEN' }
      : { valid: true };
  }

  if (!ctx.pieceAvailable) {
    return { valid: false, reason: 'Piece already placed', code: 'PIECE_UNAVAILABLE' };
  }

  if (isSpaceTaken(board, move)) {
    return { valid: false, reason: 'Placement overlaps an occupied cell', code: 'SPACE_TAKEN' };
  }

  if (hasOwnEdgeContact(board, move, ctx.player)) {
    return {
      valid: false,
      reason: 'Placement shares an edge with an own piece',
      code: 'OWN_EDGE_CONTACT',
    };
  }

  if (!hasOwnCornerContact(board, move, ctx.player)) {
    return {
      valid: false,
      reason: 'Placement must touch an own piece at a corner',
      code: 'NO_CORNER_CONTACT',
    };
  }

  return { valid: true };
}

export function buildPlacementContext(
  state: GameState,
  player: PlayerId,
  move: Move,
  geometry: BoardGeometry = state.geometry
): PlacementContext {
  const record = state.players[player];
  return {
    player,
    isFirstMove: record.isFirstMove,
    isFinished: record.isFinished,
    pieceAvailable: isPieceAvailable(record, move.pieceIndex),
    startCornerId: cellId(getStartCorner(player, geometry), geometry),
  };
}

/**
 * GameEngine-facing placement validator: derives the context from the
 * player's record and delegates to {@link validatePlacementOnBoard}.
 */
export function validatePlacement(
  state: GameState,
  player: PlayerId,
  move: Move
): ValidationResult {
  return validatePlacementOnBoard(state.board, move, buildPlacementContext(state, player, move));
}

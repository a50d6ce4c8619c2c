import { PlayerId, cellId } from '../types/game';
import { EngineErrorCode, IllegalMoveAttempt, PreconditionViolation } from './errors';
import type { MoveCatalog } from './moveCatalog';
import { mutatePlacement, revertPlacement } from './mutators/PlacementMutator';
import {
  mutateFinish,
  mutateTurnChange,
  mutateTurnRewind,
  revertFinish,
} from './mutators/TurnMutator';
import type { PieceCatalog } from './pieceCatalog';
import { getPlayerState, isPieceAvailable } from './playerStateHelpers';
import { getStartCorner } from './rulesConfig';
import type { GameState, HistoryEntry, Move, Piece } from './types';
import { validatePlacement } from './validators/PlacementValidator';
import { isAllFinished } from './victoryLogic';

/**
 * The shared, read-only catalogs a game definition hands to every state it
 * spawns.
 */
export interface RulesContext {
  readonly pieces: PieceCatalog;
  readonly moves: MoveCatalog;
}

export function isPassAction(ctx: RulesContext, action: number): boolean {
  return action === ctx.moves.passAction;
}

/** Reject anything that is not an integer in `[0, passAction]`. */
export function assertActionInRange(ctx: RulesContext, action: number): void {
  if (!Number.isInteger(action) || action < 0 || action > ctx.moves.passAction) {
    throw new PreconditionViolation(
      EngineErrorCode.PRECONDITION_ACTION_OUT_OF_RANGE,
      `Action ${action} is outside [0, ${ctx.moves.passAction}]`,
      { action, passAction: ctx.moves.passAction },
      'GameEngine'
    );
  }
}

/** Range check plus: no action at all once the game is over. */
export function assertActionApplicable(state: GameState, ctx: RulesContext, action: number): void {
  assertActionInRange(ctx, action);
  if (isAllFinished(state)) {
    throw new PreconditionViolation(
      EngineErrorCode.PRECONDITION_GAME_TERMINAL,
      `Cannot apply action ${action}: the game is over`,
      { action },
      'GameEngine'
    );
  }
}

function requireMove(ctx: RulesContext, action: number): { move: Move; piece: Piece } {
  const move = ctx.moves.get(action);
  const piece = move ? ctx.pieces.get(move.pieceIndex) : undefined;
  if (!move || !piece) {
    throw new PreconditionViolation(
      EngineErrorCode.PRECONDITION_ACTION_OUT_OF_RANGE,
      `Action ${action} is not a placement`,
      { action, passAction: ctx.moves.passAction },
      'GameEngine'
    );
  }
  return { move, piece };
}

/**
 * Candidate moves worth validating for `player`: on a first move only those
 * covering the start corner, afterwards every move of a piece still in hand.
 */
function candidateMoves(state: GameState, ctx: RulesContext, player: PlayerId): ReadonlyArray<Move> {
  const record = getPlayerState(state, player);
  if (record.isFirstMove) {
    const corner = cellId(getStartCorner(player, state.geometry), state.geometry);
    return ctx.moves.movesCovering(corner);
  }
  return ctx.moves.moves.filter((move) => isPieceAvailable(record, move.pieceIndex));
}

/**
 * Ascending indices of every placement `player` may make right now. Empty
 * when the player has nothing to place; the pass fallback is added by
 * {@link enumerateLegalActions}.
 */
export function enumerateLegalPlacements(
  state: GameState,
  ctx: RulesContext,
  player: PlayerId
): number[] {
  const record = getPlayerState(state, player);
  if (record.isFinished) {
    return [];
  }
  const legal: number[] = [];
  for (const move of candidateMoves(state, ctx, player)) {
    if (validatePlacement(state, player, move).valid) {
      legal.push(move.index);
    }
  }
  return legal;
}

/**
 * Legal actions for the player to act: the legal placements, or the single
 * pass action when there are none. A finished game has no legal actions.
 */
export function enumerateLegalActions(state: GameState, ctx: RulesContext): number[] {
  if (isAllFinished(state)) {
    return [];
  }
  const placements = enumerateLegalPlacements(state, ctx, state.currentPlayer);
  return placements.length > 0 ? placements : [ctx.moves.passAction];
}

/**
 * Apply `action` for the player to act and return the next state.
 *
 * Placements are re-validated and rejected with {@link IllegalMoveAttempt}.
 * A pass, or a placement that empties the player's hand, finishes the
 * player; once all four have finished the outcome is settled. The turn
 * always moves on to the next seat.
 */
export function applyActionToState(state: GameState, ctx: RulesContext, action: number): GameState {
  assertActionApplicable(state, ctx, action);
  const player = state.currentPlayer;

  let next = state;
  let pieceIndex: number | null = null;
  if (!isPassAction(ctx, action)) {
    const { move, piece } = requireMove(ctx, action);
    const verdict = validatePlacement(state, player, move);
    if (!verdict.valid) {
      throw new IllegalMoveAttempt(
        `Player ${player} cannot play action ${action}: ${verdict.reason ?? 'rejected'}`,
        { action, player, piece: piece.name, reason: verdict.code },
        'GameEngine'
      );
    }
    next = mutatePlacement(next, move, piece, player);
    pieceIndex = move.pieceIndex;
  }

  const record = getPlayerState(next, player);
  const finishedByAction =
    !record.isFinished && (pieceIndex === null || record.piecesRemaining === 0);
  if (finishedByAction) {
    next = mutateFinish(next, player);
  }

  const entry: HistoryEntry = { player, action, pieceIndex, finishedByAction };
  next = { ...next, history: [...next.history, entry] };
  return mutateTurnChange(next);
}

/**
 * Exact inverse of {@link applyActionToState} for the most recent action.
 * `player` and `action` must match the last history entry.
 */
export function undoActionOnState(
  state: GameState,
  ctx: RulesContext,
  player: PlayerId,
  action: number
): GameState {
  const last = state.history[state.history.length - 1];
  if (!last || last.player !== player || last.action !== action) {
    throw new PreconditionViolation(
      EngineErrorCode.PRECONDITION_UNDO_MISMATCH,
      last
        ? `Cannot undo action ${action} by player ${player}: last action was ${last.action} by player ${last.player}`
        : `Cannot undo action ${action} by player ${player}: no actions have been applied`,
      { player, action, last },
      'GameEngine'
    );
  }

  let previous: GameState = { ...state, history: state.history.slice(0, -1) };
  if (last.finishedByAction) {
    previous = revertFinish(previous, player);
  }
  if (last.pieceIndex !== null) {
    const { move, piece } = requireMove(ctx, action);
    previous = revertPlacement(previous, move, piece, player);
  }
  return mutateTurnRewind(previous, player);
}

import { Cell, PLAYER_IDS, PlayerId } from '../types/game';
import { idToCell } from './core';
import { EngineError, EngineErrorCode } from './errors';
import type { RulesContext } from './turnLogic';
import type { GameState } from './types';
import { computeReturns } from './victoryLogic';

export interface SelfAdjacencyViolation {
  player: PlayerId;
  /** History positions of the two placements that touch. */
  placements: [number, number];
  cells: [Cell, Cell];
}

/**
 * Scan the board for two different placements of the same owner that share
 * an edge. Placement identity comes from replaying the history, so cells of
 * one piece never count against each other.
 */
export function findSelfAdjacencyViolations(
  state: GameState,
  ctx: RulesContext
): SelfAdjacencyViolation[] {
  const { geometry } = state;
  const placementAt = new Map<number, number>();
  state.history.forEach((entry, position) => {
    if (entry.pieceIndex === null) return;
    const move = ctx.moves.get(entry.action);
    if (!move) return;
    for (const id of move.cellIds) {
      placementAt.set(id, position);
    }
  });

  const violations: SelfAdjacencyViolation[] = [];
  for (let id = 0; id < state.board.length; id += 1) {
    const owner = state.board[id];
    if (owner === null) continue;
    const cell = idToCell(id, geometry);
    const right = cell.col + 1 < geometry.cols ? id + 1 : null;
    const below = cell.row + 1 < geometry.rows ? id + geometry.cols : null;
    for (const other of [right, below]) {
      if (other === null || state.board[other] !== owner) continue;
      const first = placementAt.get(id);
      const second = placementAt.get(other);
      if (first === undefined || second === undefined || first !== second) {
        violations.push({
          player: owner,
          placements: [first ?? -1, second ?? -1],
          cells: [cell, idToCell(other, geometry)],
        });
      }
    }
  }
  return violations;
}

/**
 * Bookkeeping checks: each player's score equals the cells left in hand,
 * pieces remaining matches the availability flags, the board carries exactly
 * the cells each player has shed, and the finished count matches the flags.
 * Returns human-readable problems; empty means consistent.
 */
export function findBookkeepingProblems(state: GameState, ctx: RulesContext): string[] {
  const problems: string[] = [];
  const onBoard: Record<PlayerId, number> = { 0: 0, 1: 0, 2: 0, 3: 0 };
  for (const owner of state.board) {
    if (owner !== null) onBoard[owner] += 1;
  }

  for (const id of PLAYER_IDS) {
    const record = state.players[id];
    const inHand = ctx.pieces.pieces
      .filter((piece) => record.availablePieces[piece.index] === true)
      .reduce((sum, piece) => sum + piece.size, 0);
    const held = record.availablePieces.filter(Boolean).length;

    if (record.score !== inHand) {
      problems.push(`player ${id}: score ${record.score} but ${inHand} cells in hand`);
    }
    if (record.piecesRemaining !== held) {
      problems.push(`player ${id}: piecesRemaining ${record.piecesRemaining} but ${held} held`);
    }
    if (onBoard[id] !== ctx.pieces.totalCells - record.score) {
      problems.push(
        `player ${id}: ${onBoard[id]} cells on board but ${ctx.pieces.totalCells - record.score} placed`
      );
    }
  }

  const finished = PLAYER_IDS.filter((id) => state.players[id].isFinished).length;
  if (finished !== state.finishedCount) {
    problems.push(`finishedCount ${state.finishedCount} but ${finished} players finished`);
  }
  return problems;
}

/**
 * Terminal returns must be all zero for a draw, or exactly one +1 and three
 * −1 for a win; before the end they must be all zero.
 */
export function returnsMatchOutcome(state: GameState): boolean {
  const returns = computeReturns(state.outcome);
  const wins = returns.filter((value) => value === 1).length;
  const losses = returns.filter((value) => value === -1).length;
  switch (state.outcome.kind) {
    case 'winner':
      return wins === 1 && losses === 3;
    case 'pending':
    case 'draw':
      return returns.every((value) => value === 0);
  }
}

/** Throw when any invariant above fails. */
export function assertStateInvariants(state: GameState, ctx: RulesContext): void {
  const adjacency = findSelfAdjacencyViolations(state, ctx);
  const bookkeeping = findBookkeepingProblems(state, ctx);
  if (adjacency.length > 0 || bookkeeping.length > 0 || !returnsMatchOutcome(state)) {
    throw new EngineError(
      EngineErrorCode.INTERNAL_ASSERTION_FAILED,
      'Game state invariants violated',
      { adjacency, bookkeeping, outcome: state.outcome },
      'Invariants'
    );
  }
}

import { isInvalidState } from '../../src/shared/engine/errors';
import {
  applyPlacementOnBoard,
  mutatePlacement,
  revertPlacement,
} from '../../src/shared/engine/mutators/PlacementMutator';
import {
  mutateFinish,
  mutateTurnChange,
  revertFinish,
} from '../../src/shared/engine/mutators/TurnMutator';
import type { GameState, Move, Piece } from '../../src/shared/engine/types';
import { findMoveIndex, getDefinition, withPlayerRecord } from '../utils/fixtures';

describe('PlacementMutator', () => {
  const definition = getDefinition(20);
  const initial = definition.createInitialGameState();

  const lookup = (piece: string, cells: Array<[number, number]>): { move: Move; piece: Piece } => {
    const move = definition.moves.get(findMoveIndex(definition, piece, cells));
    const found = move ? definition.pieces.get(move.pieceIndex) : undefined;
    if (!move || !found) throw new Error('missing move');
    return { move, piece: found };
  };

  it('writes the owner into a copy of the board', () => {
    const { move } = lookup('I2', [[18, 19], [19, 19]]);
    const board = applyPlacementOnBoard(initial.board, move, 0);
    expect(board[379]).toBe(0);
    expect(board[399]).toBe(0);
    expect(board.filter((owner) => owner !== null)).toHaveLength(2);
    expect(initial.board[399]).toBeNull();
  });

  it('updates the acting player record only', () => {
    const { move, piece } = lookup('V3', [[18, 19], [19, 18], [19, 19]]);
    const next = mutatePlacement(initial, move, piece, 0);

    expect(next.players[0]).toEqual({
      ...initial.players[0],
      availablePieces: initial.players[0].availablePieces.map((held, index) => held && index !== 8),
      piecesRemaining: 20,
      isFirstMove: false,
      score: 86,
    });
    expect(next.players[1]).toBe(initial.players[1]);
    expect(next.currentPlayer).toBe(0);
    expect(next.history).toEqual([]);
    expect(initial.players[0].score).toBe(89);
  });

  it('refuses to place a piece twice', () => {
    const { move, piece } = lookup('I1', [[19, 19]]);
    const once = mutatePlacement(initial, move, piece, 0);
    let caught: unknown;
    try {
      mutatePlacement(once, move, piece, 0);
    } catch (error) {
      caught = error;
    }
    expect(isInvalidState(caught)).toBe(true);
  });

  it('reverts a placement back to the original state', () => {
    const { move, piece } = lookup('I1', [[19, 19]]);
    const placed = mutatePlacement(initial, move, piece, 0);
    expect(revertPlacement(placed, move, piece, 0)).toEqual(initial);
  });

  it('keeps the first-move flag cleared while other pieces are on the board', () => {
    const first = lookup('I1', [[19, 19]]);
    const second = lookup('I2', [[17, 18], [18, 18]]);
    let state: GameState = mutatePlacement(initial, first.move, first.piece, 0);
    state = mutatePlacement(state, second.move, second.piece, 0);
    const reverted = revertPlacement(state, second.move, second.piece, 0);
    expect(reverted.players[0].isFirstMove).toBe(false);
    expect(reverted.players[0].piecesRemaining).toBe(20);
    expect(reverted.players[0].score).toBe(88);
  });
});

describe('TurnMutator', () => {
  const definition = getDefinition(20);
  const initial = definition.createInitialGameState();

  it('advances the turn cyclically', () => {
    let state = initial;
    const seen: number[] = [];
    for (let i = 0; i < 5; i += 1) {
      state = mutateTurnChange(state);
      seen.push(state.currentPlayer);
    }
    expect(seen).toEqual([1, 2, 3, 0, 1]);
  });

  it('finishes a player once and counts it', () => {
    const once = mutateFinish(initial, 2);
    expect(once.players[2].isFinished).toBe(true);
    expect(once.finishedCount).toBe(1);
    expect(mutateFinish(once, 2)).toBe(once);
  });

  it('settles the outcome when the last player finishes', () => {
    let state = withPlayerRecord(initial, 3, { score: 80 });
    for (const player of [0, 1, 2] as const) {
      state = mutateFinish(state, player);
      expect(state.outcome).toEqual({ kind: 'pending' });
    }
    state = mutateFinish(state, 3);
    expect(state.outcome).toEqual({ kind: 'winner', player: 3 });

    const reopened = revertFinish(state, 3);
    expect(reopened.finishedCount).toBe(3);
    expect(reopened.players[3].isFinished).toBe(false);
    expect(reopened.outcome).toEqual({ kind: 'pending' });
  });
});

/**
 * Test Fixtures and Utilities
 * Shared definitions and helpers for engine tests.
 */

import { GameDefinition } from '../../src/shared/engine/GameDefinition';
import type { GameEngine } from '../../src/shared/engine/GameEngine';
import type { BoardCell, GameState, PlayerId, PlayerState } from '../../src/shared/engine/types';
import { Cell, compareCells } from '../../src/shared/types/game';

const definitions = new Map<string, GameDefinition>();

/**
 * Definitions are expensive to build on large boards; share one per size
 * across the whole test file.
 */
export function getDefinition(rows: number = 20, cols: number = rows): GameDefinition {
  const key = `${rows}x${cols}`;
  let definition = definitions.get(key);
  if (!definition) {
    definition = new GameDefinition({ rows, cols });
    definitions.set(key, definition);
  }
  return definition;
}

export function cell(row: number, col: number): Cell {
  return { row, col };
}

/**
 * Index of the catalog move placing `pieceName` on exactly `cells`.
 * Throws when the catalog has no such move.
 */
export function findMoveIndex(
  definition: GameDefinition,
  pieceName: string,
  cells: Array<[number, number]>
): number {
  const wanted = cells.map(([row, col]) => cell(row, col)).sort(compareCells);
  const move = definition.moves.moves.find((candidate) => {
    const piece = definition.pieces.get(candidate.pieceIndex);
    return (
      piece?.name === pieceName &&
      candidate.cells.length === wanted.length &&
      candidate.cells.every((c, i) => c.row === wanted[i].row && c.col === wanted[i].col)
    );
  });
  if (!move) {
    throw new Error(`No ${pieceName} move on ${JSON.stringify(cells)}`);
  }
  return move.index;
}

/** Apply each action in order. */
export function playActions(game: GameEngine, actions: ReadonlyArray<number>): GameEngine {
  for (const action of actions) {
    game.applyAction(action);
  }
  return game;
}

/**
 * Return a copy of `state` with `cells` painted in `owner`'s colour. Player
 * records are left alone; use {@link withPlayerRecord} to adjust them.
 */
export function paintCells(
  state: GameState,
  owner: PlayerId,
  cells: Array<[number, number]>
): GameState {
  const board: BoardCell[] = state.board.slice();
  for (const [row, col] of cells) {
    board[row * state.geometry.cols + col] = owner;
  }
  return { ...state, board };
}

export function withPlayerRecord(
  state: GameState,
  player: PlayerId,
  overrides: Partial<Omit<PlayerState, 'id'>>
): GameState {
  return {
    ...state,
    players: { ...state.players, [player]: { ...state.players[player], ...overrides } },
  };
}

/** A state whose players have all left their first move behind. */
export function createMidGameState(definition: GameDefinition): GameState {
  let state = definition.createInitialGameState();
  for (const player of [0, 1, 2, 3] as const) {
    state = withPlayerRecord(state, player, { isFirstMove: false });
  }
  return state;
}

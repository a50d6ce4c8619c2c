import { BoardGeometry, PLAYER_IDS, PlayerId } from '../types/game';
import { createInitialPlayerState } from './playerStateHelpers';
import type { BoardCell, GameState, PlayerState } from './types';

/**
 * Creates a pristine initial GameState: empty grid, every piece available to
 * every player, all first-move flags set, seat 0 to act.
 *
 * @param geometry - Board dimensions
 * @param pieceCount - Number of pieces each player holds
 * @param totalCells - Sum of piece sizes, used as every player's starting score
 */
export function createInitialGameState(
  geometry: BoardGeometry,
  pieceCount: number,
  totalCells: number
): GameState {
  const seat = (id: PlayerId): PlayerState => createInitialPlayerState(id, pieceCount, totalCells);
  const players: Record<PlayerId, PlayerState> = { 0: seat(0), 1: seat(1), 2: seat(2), 3: seat(3) };

  return freezeGameState({
    geometry,
    board: new Array<BoardCell>(geometry.rows * geometry.cols).fill(null),
    players,
    currentPlayer: 0,
    finishedCount: 0,
    outcome: { kind: 'pending' },
    history: [],
  });
}

/**
 * Deep-freezes a snapshot in place so engines and clones can share it.
 * Already frozen snapshots are returned as they are.
 */
export function freezeGameState(state: GameState): GameState {
  if (Object.isFrozen(state)) {
    return state;
  }
  for (const id of PLAYER_IDS) {
    const record = state.players[id];
    Object.freeze(record.availablePieces);
    Object.freeze(record);
  }
  Object.freeze(state.players);
  Object.freeze(state.board);
  state.history.forEach((entry) => Object.freeze(entry));
  Object.freeze(state.history);
  Object.freeze(state.outcome);
  return Object.freeze(state);
}

/**
 * Shared board-level types for the polyomino placement game.
 *
 * Coordinates are (row, col) with row 0 at the top and col 0 at the left.
 * Boards are stored row-major, so a cell's dense id is `row * cols + col`.
 */

export interface Cell {
  readonly row: number;
  readonly col: number;
}

/** Board dimensions for one game definition. */
export interface BoardGeometry {
  readonly rows: number;
  readonly cols: number;
}

/**
 * Seat identifiers. Seats are ordered clockwise from the bottom-right start
 * corner and act in ascending order.
 */
export type PlayerId = 0 | 1 | 2 | 3;

export const PLAYER_IDS: readonly PlayerId[] = [0, 1, 2, 3];

export const NUM_PLAYERS = PLAYER_IDS.length;

/** Empty cells are `null`; occupied cells carry the owner's seat. */
export type BoardCell = PlayerId | null;

export const DEFAULT_BOARD_ROWS = 20;
export const DEFAULT_BOARD_COLS = 20;

/** Orthogonal offsets, in the order neighbor sets are scanned. */
export const EDGE_OFFSETS: readonly Cell[] = [
  { row: 0, col: 1 },
  { row: 0, col: -1 },
  { row: -1, col: 0 },
  { row: 1, col: 0 },
];

/** Diagonal offsets, in the order corner sets are scanned. */
export const CORNER_OFFSETS: readonly Cell[] = [
  { row: -1, col: 1 },
  { row: -1, col: -1 },
  { row: 1, col: -1 },
  { row: 1, col: 1 },
];

export function isPlayerId(value: number): value is PlayerId {
  return value === 0 || value === 1 || value === 2 || value === 3;
}

export const cellToString = (cell: Cell): string => `(${cell.row}, ${cell.col})`;

export const cellKey = (cell: Cell): string => `${cell.row},${cell.col}`;

export const cellId = (cell: Cell, geometry: BoardGeometry): number =>
  cell.row * geometry.cols + cell.col;

/** Row-major ordering used by every sorted cell collection. */
export function compareCells(a: Cell, b: Cell): number {
  return a.row !== b.row ? a.row - b.row : a.col - b.col;
}

export function isInsideBoard(cell: Cell, geometry: BoardGeometry): boolean {
  return cell.row >= 0 && cell.row < geometry.rows && cell.col >= 0 && cell.col < geometry.cols;
}

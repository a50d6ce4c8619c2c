import {
  BoardGeometry,
  CORNER_OFFSETS,
  Cell,
  EDGE_OFFSETS,
  cellId,
  isInsideBoard,
} from '../types/game';
import { debugLog, isEngineDebugEnabled } from '../utils/envFlags';
import { fitsOnBoard, translateShape } from './core';
import type { PieceCatalog } from './pieceCatalog';
import type { Move, Shape } from './types';

/**
 * Derive the edge-neighbor and corner sets for a placement.
 *
 * Neighbors are in-bounds cells orthogonally adjacent to some placed cell and
 * not placed themselves. Corners are in-bounds cells diagonally adjacent to
 * some placed cell, not placed, and not orthogonally adjacent to any placed
 * cell, so no cell is ever both an edge contact and a corner contact.
 * Both come back as sorted cell ids.
 */
export function computeContactSets(
  cells: ReadonlyArray<Cell>,
  geometry: BoardGeometry
): { neighbors: number[]; corners: number[] } {
  const placed = new Set(cells.map((cell) => cellId(cell, geometry)));
  const neighbors = new Set<number>();
  const corners = new Set<number>();

  const touchesPlacedEdge = (candidate: Cell): boolean =>
    EDGE_OFFSETS.some((offset) => {
      const adjacent = { row: candidate.row + offset.row, col: candidate.col + offset.col };
      return isInsideBoard(adjacent, geometry) && placed.has(cellId(adjacent, geometry));
    });

  for (const cell of cells) {
    for (const offset of EDGE_OFFSETS) {
      const candidate = { row: cell.row + offset.row, col: cell.col + offset.col };
      if (!isInsideBoard(candidate, geometry)) continue;
      const id = cellId(candidate, geometry);
      if (!placed.has(id)) {
        neighbors.add(id);
      }
    }
    for (const offset of CORNER_OFFSETS) {
      const candidate = { row: cell.row + offset.row, col: cell.col + offset.col };
      if (!isInsideBoard(candidate, geometry)) continue;
      const id = cellId(candidate, geometry);
      if (!placed.has(id) && !touchesPlacedEdge(candidate)) {
        corners.add(id);
      }
    }
  }

  const ascending = (a: number, b: number): number => a - b;
  return {
    neighbors: [...neighbors].sort(ascending),
    corners: [...corners].sort(ascending),
  };
}

function createMove(
  index: number,
  pieceIndex: number,
  orientation: Shape,
  offset: Cell,
  geometry: BoardGeometry
): Move {
  const cells = translateShape(orientation, offset);
  const { neighbors, corners } = computeContactSets(cells, geometry);
  return Object.freeze({
    index,
    pieceIndex,
    cells: Object.freeze(cells),
    cellIds: Object.freeze(cells.map((cell) => cellId(cell, geometry))),
    neighbors: Object.freeze(neighbors),
    corners: Object.freeze(corners),
  });
}

/**
 * Every placement of every piece orientation that fits on an empty board,
 * with dense indices.
 *
 * Build order is piece index, then orientation discovery order, then
 * row-major board offset; the index of a move is its position in that scan.
 * The catalog is immutable once constructed and safe to share across any
 * number of game states.
 */
export class MoveCatalog {
  readonly geometry: BoardGeometry;
  readonly moves: ReadonlyArray<Move>;
  /** Move count per piece index. */
  readonly movesPerPiece: ReadonlyArray<number>;

  constructor(pieces: PieceCatalog, geometry: BoardGeometry) {
    this.geometry = Object.freeze({ rows: geometry.rows, cols: geometry.cols });

    const moves: Move[] = [];
    const perPiece: number[] = [];
    for (const piece of pieces.pieces) {
      const before = moves.length;
      for (const orientation of pieces.orientations(piece.index)) {
        for (let row = 0; row < geometry.rows; row += 1) {
          for (let col = 0; col < geometry.cols; col += 1) {
            const offset = { row, col };
            if (fitsOnBoard(orientation, offset, geometry)) {
              moves.push(createMove(moves.length, piece.index, orientation, offset, geometry));
            }
          }
        }
      }
      perPiece.push(moves.length - before);
    }

    this.moves = Object.freeze(moves);
    this.movesPerPiece = Object.freeze(perPiece);

    debugLog(isEngineDebugEnabled(), '[MoveCatalog] built', {
      rows: geometry.rows,
      cols: geometry.cols,
      totalMoves: moves.length,
      movesPerPiece: perPiece,
    });
  }

  /** Number of placements; also the index of the pass action. */
  get totalMoves(): number {
    return this.moves.length;
  }

  get passAction(): number {
    return this.moves.length;
  }

  get(index: number): Move | undefined {
    return this.moves[index];
  }

  /** All catalog moves whose cells include the given cell id. */
  movesCovering(id: number): Move[] {
    return this.moves.filter((move) => move.cellIds.includes(id));
  }
}

import {
  BoardGeometry,
  Cell,
  cellKey,
  cellToString,
  compareCells,
  isInsideBoard,
} from '../types/game';
import { BoardConstraintViolation, EngineErrorCode } from './errors';
import type { Shape } from './types';

/**
 * Geometry primitives shared by the piece catalog, the move catalog and the
 * validators. Everything here is pure and allocation-light; none of it knows
 * about players or turns.
 */

/**
 * Re-anchor a set of offsets so the minimum row and column are 0, drop
 * duplicates and sort row-major.
 */
export function canonicalizeShape(cells: ReadonlyArray<Cell>): Shape {
  if (cells.length === 0) {
    return [];
  }
  let minRow = Infinity;
  let minCol = Infinity;
  for (const cell of cells) {
    minRow = Math.min(minRow, cell.row);
    minCol = Math.min(minCol, cell.col);
  }

  const seen = new Set<string>();
  const anchored: Cell[] = [];
  for (const cell of cells) {
    const next = { row: cell.row - minRow, col: cell.col - minCol };
    const key = cellKey(next);
    if (!seen.has(key)) {
      seen.add(key);
      anchored.push(next);
    }
  }
  return anchored.sort(compareCells);
}

/** Quarter turn: (r, c) -> (-c, r), re-anchored. */
export function rotateShape(shape: Shape): Shape {
  return canonicalizeShape(shape.map((cell) => ({ row: -cell.col, col: cell.row })));
}

/** Mirror across the horizontal axis: (r, c) -> (-r, c), re-anchored. */
export function flipShape(shape: Shape): Shape {
  return canonicalizeShape(shape.map((cell) => ({ row: -cell.row, col: cell.col })));
}

/** Stable identity for a canonical shape; equal shapes give equal keys. */
export function shapeKey(shape: Shape): string {
  return shape.map(cellKey).join(';');
}

export function shapesEqual(a: Shape, b: Shape): boolean {
  return shapeKey(canonicalizeShape(a)) === shapeKey(canonicalizeShape(b));
}

export function translateShape(shape: Shape, offset: Cell): Cell[] {
  return shape.map((cell) => ({ row: cell.row + offset.row, col: cell.col + offset.col }));
}

export function fitsOnBoard(shape: Shape, offset: Cell, geometry: BoardGeometry): boolean {
  return shape.every((cell) =>
    isInsideBoard({ row: cell.row + offset.row, col: cell.col + offset.col }, geometry)
  );
}

export function idToCell(id: number, geometry: BoardGeometry): Cell {
  return { row: Math.floor(id / geometry.cols), col: id % geometry.cols };
}

/**
 * Dense id for a cell that must be on the board. Out-of-bounds coordinates
 * are a caller bug and raise a BoardConstraintViolation.
 */
export function requireCellId(cell: Cell, geometry: BoardGeometry): number {
  if (!Number.isInteger(cell.row) || !Number.isInteger(cell.col) || !isInsideBoard(cell, geometry)) {
    throw new BoardConstraintViolation(
      EngineErrorCode.BOARD_INVALID_POSITION,
      `Cell ${cellToString(cell)} is outside the ${geometry.rows}x${geometry.cols} board`,
      { row: cell.row, col: cell.col, rows: geometry.rows, cols: geometry.cols }
    );
  }
  return cell.row * geometry.cols + cell.col;
}

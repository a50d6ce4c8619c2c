import type { Cell } from '../types/game';
import { canonicalizeShape, flipShape, rotateShape, shapeKey } from './core';
import type { Piece, Shape } from './types';

export interface PieceDefinition {
  readonly name: string;
  /** Base shape as [row, col] offsets. */
  readonly cells: ReadonlyArray<readonly [number, number]>;
}

/**
 * The 21 standard pieces (one monomino, one domino, two trominoes, five
 * tetrominoes, twelve pentominoes) in catalog order. The order fixes piece
 * indices and therefore move-index numbering.
 */
export const STANDARD_PIECES: ReadonlyArray<PieceDefinition> = [
  { name: 'I1', cells: [[0, 0]] },
  { name: 'I2', cells: [[0, 0], [1, 0]] },
  { name: 'I3', cells: [[0, 0], [1, 0], [2, 0]] },
  { name: 'I4', cells: [[0, 0], [1, 0], [2, 0], [3, 0]] },
  { name: 'I5', cells: [[0, 0], [1, 0], [2, 0], [3, 0], [4, 0]] },
  { name: 'L5', cells: [[0, 0], [0, 1], [0, 2], [0, 3], [1, 3]] },
  { name: 'Y5', cells: [[0, 0], [0, 1], [0, 2], [0, 3], [1, 1]] },
  { name: 'N5', cells: [[0, 0], [0, 1], [0, 2], [1, 2], [1, 3]] },
  { name: 'V3', cells: [[0, 0], [1, 0], [1, 1]] },
  { name: 'U5', cells: [[0, 0], [0, 1], [1, 1], [2, 0], [2, 1]] },
  { name: 'V5', cells: [[0, 0], [1, 0], [2, 0], [2, 1], [2, 2]] },
  // True Z pentomino; orientations differ from W5's.
  { name: 'Z5', cells: [[0, 0], [0, 1], [1, 1], [2, 1], [2, 2]] },
  { name: 'X5', cells: [[0, 1], [1, 0], [1, 1], [1, 2], [2, 1]] },
  { name: 'T5', cells: [[0, 0], [0, 1], [0, 2], [1, 1], [2, 1]] },
  { name: 'W5', cells: [[0, 0], [1, 0], [1, 1], [2, 1], [2, 2]] },
  { name: 'P5', cells: [[0, 0], [0, 1], [1, 0], [1, 1], [2, 0]] },
  { name: 'F5', cells: [[0, 1], [0, 2], [1, 0], [1, 1], [2, 1]] },
  { name: 'O4', cells: [[0, 0], [0, 1], [1, 0], [1, 1]] },
  { name: 'L4', cells: [[0, 0], [0, 1], [0, 2], [1, 2]] },
  { name: 'T4', cells: [[0, 0], [0, 1], [0, 2], [1, 1]] },
  { name: 'Z4', cells: [[0, 0], [0, 1], [1, 1], [1, 2]] },
];

/**
 * Enumerate the distinct orientations of a piece.
 *
 * Discovery order is fixed: the base shape and its mirror, then each of three
 * successive quarter turns followed by its mirror. A shape is appended only if
 * no earlier entry has the same canonical cells, so the result has between 1
 * and 8 entries and depends on nothing but the piece itself.
 */
export function orientationsOf(piece: Piece): Shape[] {
  const found: Shape[] = [];
  const keys = new Set<string>();
  const add = (shape: Shape): void => {
    const key = shapeKey(shape);
    if (!keys.has(key)) {
      keys.add(key);
      found.push(shape);
    }
  };

  let rotated = canonicalizeShape(piece.cells);
  add(rotated);
  add(flipShape(rotated));
  for (let turn = 0; turn < 3; turn += 1) {
    rotated = rotateShape(rotated);
    add(rotated);
    add(flipShape(rotated));
  }
  return found;
}

function toPiece(definition: PieceDefinition, index: number): Piece {
  const cells = canonicalizeShape(
    definition.cells.map(([row, col]): Cell => ({ row, col }))
  );
  return Object.freeze({
    index,
    name: definition.name,
    size: cells.length,
    cells: Object.freeze(cells),
  });
}

/**
 * Immutable set of pieces plus their orientations, computed once. Shared by
 * reference between every game spawned from one definition.
 */
export class PieceCatalog {
  readonly pieces: ReadonlyArray<Piece>;
  /** Sum of all piece sizes: every player's starting score. */
  readonly totalCells: number;
  private readonly orientationTable: ReadonlyArray<ReadonlyArray<Shape>>;

  constructor(definitions: ReadonlyArray<PieceDefinition> = STANDARD_PIECES) {
    this.pieces = Object.freeze(definitions.map(toPiece));
    this.orientationTable = Object.freeze(
      this.pieces.map((piece) => Object.freeze(orientationsOf(piece)))
    );
    this.totalCells = this.pieces.reduce((sum, piece) => sum + piece.size, 0);
  }

  get size(): number {
    return this.pieces.length;
  }

  get(index: number): Piece | undefined {
    return this.pieces[index];
  }

  orientations(index: number): ReadonlyArray<Shape> {
    return this.orientationTable[index] ?? [];
  }
}

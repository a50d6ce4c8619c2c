import { MoveCatalog, computeContactSets } from '../../src/shared/engine/moveCatalog';
import { PieceCatalog } from '../../src/shared/engine/pieceCatalog';
import { cell, getDefinition } from '../utils/fixtures';

describe('MoveCatalog', () => {
  const pieces = new PieceCatalog();

  describe('on the standard 20x20 board', () => {
    const catalog = getDefinition(20).moves;

    it('enumerates 30433 placements and puts the pass action right after them', () => {
      expect(catalog.totalMoves).toBe(30433);
      expect(catalog.passAction).toBe(30433);
      expect(catalog.get(30433)).toBeUndefined();
    });

    it('counts placements per piece', () => {
      expect(catalog.movesPerPiece).toEqual([
        400, 760, 720, 680, 640, 2584, 2584, 2584, 1444, 1368, 1296, 1296, 324, 1296, 1296,
        2736, 2592, 361, 2736, 1368, 1368,
      ]);
    });

    it('assigns dense indices in piece, orientation, row-major order', () => {
      catalog.moves.forEach((move, index) => expect(move.index).toBe(index));
      expect(catalog.get(0)?.cells).toEqual([cell(0, 0)]);
      expect(catalog.get(399)?.cells).toEqual([cell(19, 19)]);
      expect(catalog.get(400)?.pieceIndex).toBe(1);
      expect(catalog.get(400)?.cells).toEqual([cell(0, 0), cell(1, 0)]);

      const pieceIndices = catalog.moves.map((move) => move.pieceIndex);
      expect(pieceIndices).toEqual([...pieceIndices].sort((a, b) => a - b));
    });

    it('precomputes sorted neighbor and corner sets', () => {
      const monomino = catalog.get(0);
      expect(monomino?.cellIds).toEqual([0]);
      expect(monomino?.neighbors).toEqual([1, 20]);
      expect(monomino?.corners).toEqual([21]);

      const v3 = catalog.get(10952);
      expect(v3?.pieceIndex).toBe(8);
      expect(v3?.cells).toEqual([cell(0, 0), cell(1, 0), cell(1, 1)]);
      // (0,1) (1,2) (2,0) (2,1)
      expect(v3?.neighbors).toEqual([1, 22, 40, 41]);
      // (0,2) (2,2)
      expect(v3?.corners).toEqual([2, 42]);
    });

    it('is deterministic across builds', () => {
      const again = new MoveCatalog(pieces, { rows: 20, cols: 20 });
      expect(again.totalMoves).toBe(catalog.totalMoves);
      expect(again.moves).toEqual(catalog.moves);
    });

    it('lists the moves covering a cell', () => {
      const covering = catalog.movesCovering(399);
      expect(covering).toHaveLength(58);
      expect(covering[0].index).toBe(399);
      expect(covering.every((move) => move.cellIds.includes(399))).toBe(true);
    });

    it('freezes moves', () => {
      expect(Object.isFrozen(catalog.moves)).toBe(true);
      expect(Object.isFrozen(catalog.get(5))).toBe(true);
    });
  });

  it.each([
    [3, 3, 128],
    [5, 5, 958],
    [6, 4, 867],
    [2, 2, 13],
  ])('enumerates the placements on a %ix%i board', (rows, cols, total) => {
    expect(new MoveCatalog(pieces, { rows, cols }).totalMoves).toBe(total);
  });
});

describe('computeContactSets', () => {
  const geometry = { rows: 20, cols: 20 };

  it('excludes placed cells and diagonal cells that also touch an edge', () => {
    // X pentomino centred on (1,1)
    const plus = [cell(0, 1), cell(1, 0), cell(1, 1), cell(1, 2), cell(2, 1)];
    const { neighbors, corners } = computeContactSets(plus, geometry);
    // (0,0) (0,2) (1,3) (2,0) (2,2) (3,1)
    expect(neighbors).toEqual([0, 2, 23, 40, 42, 61]);
    // (0,3) (2,3) (3,0) (3,2)
    expect(corners).toEqual([3, 43, 60, 62]);
  });

  it('drops out-of-bounds cells', () => {
    const { neighbors, corners } = computeContactSets([cell(19, 19)], geometry);
    expect(neighbors).toEqual([379, 398]);
    expect(corners).toEqual([378]);
  });
});

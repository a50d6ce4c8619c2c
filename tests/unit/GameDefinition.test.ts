import { GameDefinition } from '../../src/shared/engine/GameDefinition';
import { EngineErrorCode, isPreconditionViolation } from '../../src/shared/engine/errors';
import { PieceCatalog, STANDARD_PIECES } from '../../src/shared/engine/pieceCatalog';
import { getDefinition } from '../utils/fixtures';

describe('GameDefinition', () => {
  describe('standard board', () => {
    const definition = getDefinition(20);

    it('reports the game constants', () => {
      expect(definition.geometry).toEqual({ rows: 20, cols: 20 });
      expect(definition.numPlayers).toBe(4);
      expect(definition.numDistinctActions).toBe(30434);
      expect(definition.passAction).toBe(30433);
      expect(definition.maxGameLength).toBe(84);
      expect(definition.minUtility).toBe(-1);
      expect(definition.maxUtility).toBe(1);
      expect(definition.utilitySum).toBeNull();
      expect(definition.observationTensorShape).toEqual([20, 20]);
    });

    it('places the start corners clockwise from bottom-right', () => {
      expect([0, 1, 2, 3].map((player) => definition.startCorner(player))).toEqual([
        { row: 19, col: 19 },
        { row: 19, col: 0 },
        { row: 0, col: 0 },
        { row: 0, col: 19 },
      ]);
    });

    it('rejects a seat outside the game', () => {
      expect(() => definition.startCorner(4)).toThrow(
        'Player 4 is not a seat of this game (expected 0..3)'
      );
    });

    it('spawns independent games sharing its catalogs', () => {
      const first = definition.newInitialState();
      const second = definition.newInitialState();
      first.applyAction(399);
      expect(second.history()).toEqual([]);
      expect(first.definition).toBe(second.definition);
      expect(second.getGameState()).toEqual(definition.createInitialGameState());
    });

    it('restores a game from a saved snapshot', () => {
      const game = definition.newInitialState();
      game.applyAction(399);
      const restored = definition.restore(game.getGameState());
      expect(restored.currentPlayer()).toBe(1);
      expect(restored.history()).toEqual([399]);
    });

    it('refuses a snapshot taken on another board size', () => {
      const foreign = getDefinition(5).newInitialState().getGameState();
      let caught: unknown;
      try {
        definition.restore(foreign);
      } catch (error) {
        caught = error;
      }
      expect(isPreconditionViolation(caught)).toBe(true);
      if (isPreconditionViolation(caught)) {
        expect(caught.code).toBe(EngineErrorCode.PRECONDITION_FOREIGN_STATE);
        expect(caught.message).toBe(
          'State for a 5x5 board cannot be restored into a 20x20 game with 21 pieces'
        );
      }
    });

    it('refuses a snapshot taken with another piece set', () => {
      const trimmed = new GameDefinition(
        { rows: 20, cols: 20 },
        new PieceCatalog(STANDARD_PIECES.slice(0, 3))
      );
      expect(() => definition.restore(trimmed.createInitialGameState())).toThrow(
        'State for a 20x20 board cannot be restored into a 20x20 game with 21 pieces'
      );
    });
  });

  it('defaults to a 20x20 board', () => {
    expect(new GameDefinition().geometry).toEqual({ rows: 20, cols: 20 });
  });

  it('supports rectangular boards', () => {
    const definition = getDefinition(6, 4);
    expect(definition.observationTensorShape).toEqual([6, 4]);
    expect(definition.startCorner(0)).toEqual({ row: 5, col: 3 });
    expect(definition.startCorner(3)).toEqual({ row: 0, col: 3 });
    expect(definition.passAction).toBe(867);
  });

  it.each([
    [{ rows: 0 }],
    [{ cols: 65 }],
    [{ rows: 2.5 }],
  ])('rejects invalid options %j', (options) => {
    let caught: unknown;
    try {
      new GameDefinition(options);
    } catch (error) {
      caught = error;
    }
    expect(isPreconditionViolation(caught)).toBe(true);
    if (isPreconditionViolation(caught)) {
      expect(caught.code).toBe(EngineErrorCode.PRECONDITION_INVALID_OPTIONS);
      expect(caught.message).toMatch(/^Invalid game definition options: (rows|cols): /);
    }
  });
});

import { BoardGeometry, Cell, NUM_PLAYERS, PLAYER_IDS } from '../types/game';
import { EngineErrorCode, PreconditionViolation } from './errors';
import { GameEngine } from './GameEngine';
import { createInitialGameState } from './initialState';
import { MoveCatalog } from './moveCatalog';
import { PieceCatalog } from './pieceCatalog';
import { assertPlayerId } from './playerStateHelpers';
import { GameDefinitionOptions, getStartCorner, resolveGeometry } from './rulesConfig';
import type { RulesContext } from './turnLogic';
import type { GameState, SequentialGame } from './types';
import { LOSS_RETURN, WIN_RETURN } from './victoryLogic';

/**
 * Immutable description of one game variant: board geometry plus the piece
 * and move catalogs built for it. Construct it once and spawn as many
 * {@link GameEngine} play-throughs from it as needed; they all share the
 * catalogs by reference.
 *
 * @example
 * const definition = new GameDefinition();
 * const game = definition.newInitialState();
 * game.applyAction(game.legalActions()[0]);
 */
export class GameDefinition implements SequentialGame<GameEngine>, RulesContext {
  readonly geometry: BoardGeometry;
  readonly pieces: PieceCatalog;
  readonly moves: MoveCatalog;

  readonly numPlayers = NUM_PLAYERS;
  readonly minUtility = LOSS_RETURN;
  readonly maxUtility = WIN_RETURN;
  /** A win sums to −2 and a draw to 0, so there is no constant sum. */
  readonly utilitySum = null;

  constructor(options: GameDefinitionOptions = {}, pieces: PieceCatalog = new PieceCatalog()) {
    this.geometry = Object.freeze(resolveGeometry(options));
    this.pieces = pieces;
    this.moves = new MoveCatalog(pieces, this.geometry);
  }

  /** Every placement plus the pass action. */
  get numDistinctActions(): number {
    return this.moves.totalMoves + 1;
  }

  get passAction(): number {
    return this.moves.passAction;
  }

  /** Each player places every piece at most once. */
  get maxGameLength(): number {
    return this.pieces.size * this.numPlayers;
  }

  get observationTensorShape(): ReadonlyArray<number> {
    return [this.geometry.rows, this.geometry.cols];
  }

  startCorner(player: number): Cell {
    return getStartCorner(assertPlayerId(player, 'GameDefinition'), this.geometry);
  }

  createInitialGameState(): GameState {
    return createInitialGameState(this.geometry, this.pieces.size, this.pieces.totalCells);
  }

  newInitialState(): GameEngine {
    return new GameEngine(this, this.createInitialGameState());
  }

  /**
   * Rebuild an engine around a state previously taken from this definition.
   *
   * @throws PreconditionViolation when the state was built for another board
   *   size or piece set
   */
  restore(state: GameState): GameEngine {
    const { rows, cols } = this.geometry;
    const pieceCounts = PLAYER_IDS.map((id) => state.players[id].availablePieces.length);
    const matches =
      state.geometry.rows === rows &&
      state.geometry.cols === cols &&
      state.board.length === rows * cols &&
      pieceCounts.every((count) => count === this.pieces.size);
    if (!matches) {
      throw new PreconditionViolation(
        EngineErrorCode.PRECONDITION_FOREIGN_STATE,
        `State for a ${state.geometry.rows}x${state.geometry.cols} board cannot be restored into a ${rows}x${cols} game with ${this.pieces.size} pieces`,
        { geometry: state.geometry, boardCells: state.board.length, pieceCounts },
        'GameDefinition'
      );
    }
    return new GameEngine(this, state);
  }
}


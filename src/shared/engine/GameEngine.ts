import type { BoardCell, PlayerId } from '../types/game';
import { requireCellId } from './core';
import type { GameDefinition } from './GameDefinition';
import {
  BoardRenderOptions,
  boardToTensor,
  formatAction,
  formatBoard,
  formatHistory,
} from './notation';
import { freezeGameState } from './initialState';
import { assertPlayerId } from './playerStateHelpers';
import {
  applyActionToState,
  assertActionInRange,
  enumerateLegalActions,
  undoActionOnState,
} from './turnLogic';
import type { GameState, Returns, SequentialGameState } from './types';
import { computeReturns, isAllFinished } from './victoryLogic';

/**
 * One play-through of a {@link GameDefinition}.
 *
 * The engine owns a single immutable {@link GameState} snapshot and swaps it
 * for a fresh one on every applied or undone action; snapshots handed out by
 * {@link getGameState} are deep-frozen and never modified afterwards. Catalogs are reached
 * through the definition and never copied.
 */
export class GameEngine implements SequentialGameState {
  private state: GameState;

  constructor(
    readonly definition: GameDefinition,
    initialState: GameState
  ) {
    this.state = freezeGameState(initialState);
  }

  public getGameState(): GameState {
    return this.state;
  }

  /** The seat to act, or `null` once the game is over. */
  public currentPlayer(): PlayerId | null {
    return this.isTerminal() ? null : this.state.currentPlayer;
  }

  public isTerminal(): boolean {
    return isAllFinished(this.state);
  }

  /** Ascending action indices; `[pass]` when nothing fits, `[]` when terminal. */
  public legalActions(): number[] {
    return enumerateLegalActions(this.state, this.definition);
  }

  public isLegalAction(action: number): boolean {
    return this.legalActions().includes(action);
  }

  /**
   * Apply an action for the seat to act.
   *
   * @throws PreconditionViolation when the action is out of range or the game is over
   * @throws IllegalMoveAttempt when a placement breaks the placement rules
   */
  public applyAction(action: number): void {
    this.state = freezeGameState(applyActionToState(this.state, this.definition, action));
  }

  /**
   * Revert the most recent action. `player` and `action` must name it
   * exactly; anything else is a PreconditionViolation.
   */
  public undoAction(player: number, action: number): void {
    const seat = assertPlayerId(player);
    this.state = freezeGameState(undoActionOnState(this.state, this.definition, seat, action));
  }

  public returns(): Returns {
    return computeReturns(this.state.outcome);
  }

  /**
   * Independent play-through from the same position. Snapshots are never
   * mutated, so the copy can share the current one.
   */
  public clone(): GameEngine {
    return new GameEngine(this.definition, this.state);
  }

  public actionToString(player: number, action: number): string {
    assertPlayerId(player);
    assertActionInRange(this.definition, action);
    return formatAction(this.definition, action);
  }

  public toString(options: BoardRenderOptions = {}): string {
    return formatBoard(this.state.board, this.state.geometry, options);
  }

  public observationString(player: number): string {
    assertPlayerId(player);
    return this.toString();
  }

  public informationStateString(player: number): string {
    assertPlayerId(player);
    return formatHistory(this.state.history);
  }

  public observationTensor(player: number): number[] {
    assertPlayerId(player);
    return boardToTensor(this.state.board);
  }

  /** Owner of a cell, `null` when empty. Off-board coordinates throw. */
  public ownerAt(row: number, col: number): BoardCell {
    const id = requireCellId({ row, col }, this.state.geometry);
    return this.state.board[id] ?? null;
  }

  /** Applied action indices, oldest first. */
  public history(): number[] {
    return this.state.history.map((entry) => entry.action);
  }
}

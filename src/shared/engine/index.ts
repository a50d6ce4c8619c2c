// =============================================================================
// RULES ENGINE - PUBLIC API
// =============================================================================
// Hosts (self-play runner, scripts, search code) should only import from this
// file. Everything exported here is pure and synchronous.
// =============================================================================

// =============================================================================
// CORE TYPES
// =============================================================================

export type { BoardCell, BoardGeometry, Cell, PlayerId } from '../types/game';
export {
  DEFAULT_BOARD_COLS,
  DEFAULT_BOARD_ROWS,
  NUM_PLAYERS,
  PLAYER_IDS,
  cellToString,
  isPlayerId,
} from '../types/game';

export type {
  GameOutcome,
  GameState,
  HistoryEntry,
  Move,
  Piece,
  PlacementRejectionCode,
  PlayerState,
  Returns,
  SequentialGame,
  SequentialGameState,
  Shape,
  ValidationResult,
} from './types';

// =============================================================================
// GAME OBJECTS
// =============================================================================

export { GameDefinition } from './GameDefinition';
export { GameEngine } from './GameEngine';
export { PieceCatalog, STANDARD_PIECES, orientationsOf } from './pieceCatalog';
export type { PieceDefinition } from './pieceCatalog';
export { MoveCatalog, computeContactSets } from './moveCatalog';
export { GameDefinitionOptionsSchema, MAX_BOARD_DIMENSION, getStartCorner } from './rulesConfig';
export type { GameDefinitionOptions } from './rulesConfig';

// =============================================================================
// RULES
// =============================================================================

export { validatePlacement, validatePlacementOnBoard } from './validators/PlacementValidator';
export type { PlacementContext } from './validators/PlacementValidator';
export {
  applyActionToState,
  enumerateLegalActions,
  enumerateLegalPlacements,
  undoActionOnState,
} from './turnLogic';
export type { RulesContext } from './turnLogic';
export { computeReturns, evaluateOutcome, returnsSum } from './victoryLogic';
export {
  assertStateInvariants,
  findBookkeepingProblems,
  findSelfAdjacencyViolations,
  returnsMatchOutcome,
} from './invariants';
export type { SelfAdjacencyViolation } from './invariants';

// =============================================================================
// NOTATION
// =============================================================================

export { PASS_NOTATION, formatAction, formatBoard, formatHistory } from './notation';
export type { BoardRenderOptions } from './notation';

// =============================================================================
// ERRORS
// =============================================================================

export {
  BoardConstraintViolation,
  EngineError,
  EngineErrorCode,
  IllegalMoveAttempt,
  InvalidState,
  PreconditionViolation,
  isBoardConstraintViolation,
  isEngineError,
  isIllegalMoveAttempt,
  isInvalidState,
  isPreconditionViolation,
  wrapEngineError,
} from './errors';
export type { EngineErrorJSON } from './errors';

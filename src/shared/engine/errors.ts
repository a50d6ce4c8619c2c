/**
 * Engine Domain Errors - Structured error types for the rules engine layer
 *
 * Every failure the engine can raise is a caller-contract violation: nothing
 * here is retried or recovered internally. Hosts translate these into their
 * own surfaces (exit codes, log entries, HTTP responses) via `toJSON()` or
 * {@link wrapEngineError}.
 *
 * Error Categories:
 * - **PreconditionViolation**: out-of-range action, terminal game, bad player
 *   id, invalid definition options, undo that does not match the history
 * - **IllegalMoveAttempt**: a catalog move that fails the placement rules
 * - **BoardConstraintViolation**: coordinates outside the board
 * - **InvalidState**: corrupted or inconsistent game state
 *
 * Usage:
 * ```typescript
 * throw new PreconditionViolation(
 *   EngineErrorCode.PRECONDITION_ACTION_OUT_OF_RANGE,
 *   'Action 40000 is outside [0, 30433]',
 *   { action: 40000, passAction: 30433 }
 * );
 * ```
 * @module EngineErrors
 */

// =============================================================================
// ERROR CODES
// =============================================================================

/**
 * Enumeration of all engine domain error codes.
 *
 * Error codes are prefixed by category:
 * - PRECONDITION_*: caller broke an operation's precondition
 * - RULES_*: placement rule violations
 * - BOARD_*: board geometry issues
 * - STATE_*: game state corruption/inconsistency
 * - INTERNAL_*: engine bugs
 */
export enum EngineErrorCode {
  /** Action index outside [0, passAction] */
  PRECONDITION_ACTION_OUT_OF_RANGE = 'PRECONDITION_ACTION_OUT_OF_RANGE',
  /** Action requested on a terminal game */
  PRECONDITION_GAME_TERMINAL = 'PRECONDITION_GAME_TERMINAL',
  /** Raw player number is not a seat of this game */
  PRECONDITION_INVALID_PLAYER = 'PRECONDITION_INVALID_PLAYER',
  /** Game definition options failed validation */
  PRECONDITION_INVALID_OPTIONS = 'PRECONDITION_INVALID_OPTIONS',
  /** Undo requested for something other than the most recent action */
  PRECONDITION_UNDO_MISMATCH = 'PRECONDITION_UNDO_MISMATCH',
  /** Restored state was built for a different board or piece set */
  PRECONDITION_FOREIGN_STATE = 'PRECONDITION_FOREIGN_STATE',

  /** Move fails the first-move or subsequent-move placement rules */
  RULES_ILLEGAL_MOVE = 'RULES_ILLEGAL_MOVE',

  /** Coordinates outside the board */
  BOARD_INVALID_POSITION = 'BOARD_INVALID_POSITION',

  /** Expected player record missing from game state */
  STATE_PLAYER_NOT_FOUND = 'STATE_PLAYER_NOT_FOUND',
  /** Piece bookkeeping out of sync with the board */
  STATE_PIECE_UNAVAILABLE = 'STATE_PIECE_UNAVAILABLE',

  /** Assertion failed - indicates a bug */
  INTERNAL_ASSERTION_FAILED = 'INTERNAL_ASSERTION_FAILED',
}

/**
 * Maps error code prefixes to human-readable category descriptions.
 */
export const ERROR_CATEGORY_DESCRIPTIONS: Record<string, string> = {
  PRECONDITION_: 'Caller precondition violated',
  RULES_: 'Placement rule violation',
  BOARD_: 'Board geometry constraint violation',
  STATE_: 'Corrupted or unexpected game state',
  INTERNAL_: 'Internal engine error (bug)',
};

// =============================================================================
// BASE ERROR CLASS
// =============================================================================

/**
 * Base class for all engine domain errors.
 *
 * Provides:
 * - Structured error code for programmatic handling
 * - Context for debugging
 * - Domain indicator for error routing
 */
export class EngineError extends Error {
  /** Error code for programmatic handling */
  readonly code: EngineErrorCode;

  /** Additional context for debugging */
  readonly context: Record<string, unknown>;

  /** Domain that generated the error (e.g., 'GameEngine', 'MoveCatalog') */
  readonly domain: string;

  /** Timestamp when error occurred */
  readonly timestamp: Date;

  constructor(
    code: EngineErrorCode,
    message: string,
    context: Record<string, unknown> = {},
    domain: string = 'Engine'
  ) {
    super(message);
    this.name = 'EngineError';
    this.code = code;
    this.context = context;
    this.domain = domain;
    this.timestamp = new Date();

    // Maintain proper prototype chain
    Object.setPrototypeOf(this, EngineError.prototype);
  }

  /** Get error category from code prefix */
  get category(): string {
    const prefix = this.code.split('_')[0] + '_';
    return ERROR_CATEGORY_DESCRIPTIONS[prefix] ?? 'Unknown error category';
  }

  /** Serialize to a JSON-safe object for logging/debugging */
  toJSON(): EngineErrorJSON {
    return {
      error: true,
      type: this.name,
      code: this.code,
      message: this.message,
      domain: this.domain,
      context: this.context,
      category: this.category,
      timestamp: this.timestamp.toISOString(),
    };
  }
}

/**
 * JSON representation of an EngineError.
 */
export interface EngineErrorJSON {
  error: true;
  type: string;
  code: string;
  message: string;
  domain: string;
  context: Record<string, unknown>;
  category: string;
  timestamp: string;
}

// =============================================================================
// SPECIFIC ERROR CLASSES
// =============================================================================

/**
 * Thrown when a caller breaks an operation's precondition: an action index
 * outside the action space, any action on a terminal game, a raw player
 * number that is not a seat, or an undo that does not match the history.
 */
export class PreconditionViolation extends EngineError {
  constructor(
    code: EngineErrorCode,
    message: string,
    context: Record<string, unknown> = {},
    domain: string = 'Precondition'
  ) {
    super(code, message, context, domain);
    this.name = 'PreconditionViolation';
    Object.setPrototypeOf(this, PreconditionViolation.prototype);
  }
}

/**
 * Thrown when a catalog move is applied that the placement rules reject.
 * Callers are expected to pick actions from `legalActions()`, so this always
 * signals a caller bug rather than a recoverable condition.
 */
export class IllegalMoveAttempt extends EngineError {
  constructor(message: string, context: Record<string, unknown> = {}, domain: string = 'Rules') {
    super(EngineErrorCode.RULES_ILLEGAL_MOVE, message, context, domain);
    this.name = 'IllegalMoveAttempt';
    Object.setPrototypeOf(this, IllegalMoveAttempt.prototype);
  }
}

/**
 * Error for board geometry violations, e.g. a cell outside the board.
 */
export class BoardConstraintViolation extends EngineError {
  constructor(
    code: EngineErrorCode,
    message: string,
    context: Record<string, unknown> = {},
    domain: string = 'Board'
  ) {
    super(code, message, context, domain);
    this.name = 'BoardConstraintViolation';
    Object.setPrototypeOf(this, BoardConstraintViolation.prototype);
  }
}

/**
 * Error for corrupted or unexpected game state.
 *
 * This typically indicates either a bug in the engine or a GameState that
 * was assembled by hand outside the engine's constructors.
 */
export class InvalidState extends EngineError {
  constructor(
    code: EngineErrorCode,
    message: string,
    context: Record<string, unknown> = {},
    domain: string = 'State'
  ) {
    super(code, message, context, domain);
    this.name = 'InvalidState';
    Object.setPrototypeOf(this, InvalidState.prototype);
  }
}

// =============================================================================
// TYPE GUARDS
// =============================================================================

export function isEngineError(error: unknown): error is EngineError {
  return error instanceof EngineError;
}

export function isPreconditionViolation(error: unknown): error is PreconditionViolation {
  return error instanceof PreconditionViolation;
}

export function isIllegalMoveAttempt(error: unknown): error is IllegalMoveAttempt {
  return error instanceof IllegalMoveAttempt;
}

export function isBoardConstraintViolation(error: unknown): error is BoardConstraintViolation {
  return error instanceof BoardConstraintViolation;
}

export function isInvalidState(error: unknown): error is InvalidState {
  return error instanceof InvalidState;
}

// =============================================================================
// UTILITIES
// =============================================================================

/**
 * Wrap an unknown error in an EngineError.
 *
 * Useful for catching and normalizing errors at host boundaries.
 */
export function wrapEngineError(
  error: unknown,
  domain: string = 'Engine',
  context: Record<string, unknown> = {}
): EngineError {
  if (isEngineError(error)) {
    return error;
  }

  const message = error instanceof Error ? error.message : String(error);
  const stack = error instanceof Error ? error.stack : undefined;

  return new EngineError(
    EngineErrorCode.INTERNAL_ASSERTION_FAILED,
    message,
    {
      ...context,
      originalStack: stack,
    },
    domain
  );
}

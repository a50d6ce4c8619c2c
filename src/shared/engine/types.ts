import type { BoardCell, BoardGeometry, Cell, PlayerId } from '../types/game';

// Re-export types used in the engine interface
export type { BoardCell, BoardGeometry, Cell, PlayerId };

/**
 * A canonical shape: unique cell offsets anchored so the minimum row and
 * column are both 0, sorted row-major.
 */
export type Shape = ReadonlyArray<Cell>;

export interface Piece {
  /** Position in the fixed catalog order (0..20 for the standard set). */
  readonly index: number;
  readonly name: string;
  /** Number of cells; also the score a player sheds by placing it. */
  readonly size: number;
  readonly cells: Shape;
}

/**
 * A concrete placement: one orientation of one piece translated onto the
 * board. All cell collections are sorted row-major and never mutated.
 */
export interface Move {
  /** Dense action index, strictly increasing in catalog build order. */
  readonly index: number;
  readonly pieceIndex: number;
  readonly cells: ReadonlyArray<Cell>;
  /** Row-major cell ids of `cells`, for fast board lookups. */
  readonly cellIds: ReadonlyArray<number>;
  /** In-bounds cells edge-adjacent to the placement, excluding its own cells. */
  readonly neighbors: ReadonlyArray<number>;
  /**
   * In-bounds cells diagonally adjacent to the placement, excluding its own
   * cells and any cell that is also edge-adjacent to one of them.
   */
  readonly corners: ReadonlyArray<number>;
}

export interface PlayerState {
  readonly id: PlayerId;
  /** One flag per catalog piece; `true` while the piece is unplayed. */
  readonly availablePieces: ReadonlyArray<boolean>;
  readonly piecesRemaining: number;
  readonly isFirstMove: boolean;
  readonly isFinished: boolean;
  /** Cells still unplaced. Lower is better. */
  readonly score: number;
}

export type GameOutcome =
  | { readonly kind: 'pending' }
  | { readonly kind: 'winner'; readonly player: PlayerId }
  | { readonly kind: 'draw' };

/** One applied action, with what undo needs to invert it. */
export interface HistoryEntry {
  readonly player: PlayerId;
  readonly action: number;
  /** Piece placed by the action, or `null` for a pass. */
  readonly pieceIndex: number | null;
  /** True when this action moved the player from active to finished. */
  readonly finishedByAction: boolean;
}

/**
 * Per-play-through state. Treated as immutable: mutators return fresh
 * objects and never touch the input.
 */
export interface GameState {
  readonly geometry: BoardGeometry;
  /** Row-major grid, `rows * cols` entries. */
  readonly board: ReadonlyArray<BoardCell>;
  readonly players: Readonly<Record<PlayerId, PlayerState>>;
  readonly currentPlayer: PlayerId;
  readonly finishedCount: number;
  readonly outcome: GameOutcome;
  readonly history: ReadonlyArray<HistoryEntry>;
}

/**
 * Shared validation result shape used by validators. Validators never throw;
 * the engine converts invalid results into errors.
 */
export interface ValidationResult {
  valid: boolean;
  reason?: string;
  code?: PlacementRejectionCode;
}

export type PlacementRejectionCode =
  | 'PLAYER_FINISHED'
  | 'FIRST_MOVE_CORNER'
  | 'PIECE_UNAVAILABLE'
  | 'SPACE_TAKEN'
  | 'OWN_EDGE_CONTACT'
  | 'NO_CORNER_CONTACT';

export type Returns = [number, number, number, number];

/**
 * Game-level contract a generic sequential-game host consumes.
 */
export interface SequentialGame<TState extends SequentialGameState> {
  readonly numPlayers: number;
  readonly numDistinctActions: number;
  readonly minUtility: number;
  readonly maxUtility: number;
  /** Constant sum of returns, or `null` when returns are not constant-sum. */
  readonly utilitySum: number | null;
  readonly maxGameLength: number;
  readonly observationTensorShape: ReadonlyArray<number>;
  newInitialState(): TState;
}

/**
 * State-level contract a generic sequential-game host consumes.
 */
export interface SequentialGameState {
  currentPlayer(): PlayerId | null;
  legalActions(): number[];
  applyAction(action: number): void;
  undoAction(player: number, action: number): void;
  isTerminal(): boolean;
  returns(): Returns;
  clone(): SequentialGameState;
  actionToString(player: number, action: number): string;
  toString(): string;
  observationString(player: number): string;
  informationStateString(player: number): string;
  observationTensor(player: number): number[];
}

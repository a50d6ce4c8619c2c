import { z } from 'zod';
import {
  BoardGeometry,
  Cell,
  DEFAULT_BOARD_COLS,
  DEFAULT_BOARD_ROWS,
  PlayerId,
} from '../types/game';
import { EngineErrorCode, PreconditionViolation } from './errors';

export const MAX_BOARD_DIMENSION = 64;

/**
 * Options accepted by a game definition. Only the board size is
 * configurable; the piece set, player count and placement rules are fixed.
 */
export const GameDefinitionOptionsSchema = z.object({
  rows: z.number().int().min(1).max(MAX_BOARD_DIMENSION).default(DEFAULT_BOARD_ROWS),
  cols: z.number().int().min(1).max(MAX_BOARD_DIMENSION).default(DEFAULT_BOARD_COLS),
});

export type GameDefinitionOptions = z.input<typeof GameDefinitionOptionsSchema>;

/**
 * Validate definition options and resolve defaults. Invalid options are a
 * caller bug and raise a PreconditionViolation listing every issue.
 */
export function resolveGeometry(options: GameDefinitionOptions = {}): BoardGeometry {
  const result = GameDefinitionOptionsSchema.safeParse(options);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => ({
      path: issue.path.join('.'),
      message: issue.message,
    }));
    throw new PreconditionViolation(
      EngineErrorCode.PRECONDITION_INVALID_OPTIONS,
      `Invalid game definition options: ${issues
        .map((issue) => `${issue.path || 'root'}: ${issue.message}`)
        .join('; ')}`,
      { issues },
      'GameDefinition'
    );
  }
  return { rows: result.data.rows, cols: result.data.cols };
}

/**
 * The corner each seat must cover with its first placement: seat 0 starts
 * bottom-right, then bottom-left, top-left and top-right.
 */
export function getStartCorner(player: PlayerId, geometry: BoardGeometry): Cell {
  const lastRow = geometry.rows - 1;
  const lastCol = geometry.cols - 1;
  switch (player) {
    case 0:
      return { row: lastRow, col: lastCol };
    case 1:
      return { row: lastRow, col: 0 };
    case 2:
      return { row: 0, col: 0 };
    case 3:
      return { row: 0, col: lastCol };
  }
}

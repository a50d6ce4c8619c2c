import { BoardCell, BoardGeometry, Cell, PlayerId, cellToString } from '../types/game';
import type { RulesContext } from './turnLogic';
import type { HistoryEntry } from './types';

/**
 * Shared notation helpers.
 *
 * Lightweight, human-readable renderings of actions and boards for
 * debugging, logging and tests. None of this is a serialization format:
 * nothing parses these strings back.
 */

export const PASS_NOTATION = 'Pass';

export interface BoardRenderOptions {
  /** Wrap each player's marker in an ANSI colour sequence. */
  ansi?: boolean;
}

const ANSI_RESET = '\u001b[0m';

const ANSI_COLOURS: Record<PlayerId, string> = {
  0: '\u001b[1;33m',
  1: '\u001b[1;34m',
  2: '\u001b[1;35m',
  3: '\u001b[1;36m',
};

/** `0` for an empty cell, otherwise the owner's seat + 1. */
export function cellMarker(cell: BoardCell): number {
  return cell === null ? 0 : cell + 1;
}

export function formatCells(cells: ReadonlyArray<Cell>): string {
  return cells.map(cellToString).join(', ');
}

/**
 * `"Pass"` for the pass action, otherwise the piece name and the covered
 * cells, e.g. `"V3 at (18, 19), (19, 18), (19, 19)"`.
 */
export function formatAction(ctx: RulesContext, action: number): string {
  if (action === ctx.moves.passAction) {
    return PASS_NOTATION;
  }
  const move = ctx.moves.get(action);
  const piece = move ? ctx.pieces.get(move.pieceIndex) : undefined;
  if (!move || !piece) {
    return `Unknown action ${action}`;
  }
  return `${piece.name} at ${formatCells(move.cells)}`;
}

/**
 * One line per row, markers separated by single spaces; `0` is empty and
 * `1`..`4` are the seats.
 */
export function formatBoard(
  board: ReadonlyArray<BoardCell>,
  geometry: BoardGeometry,
  options: BoardRenderOptions = {}
): string {
  const lines: string[] = [];
  for (let row = 0; row < geometry.rows; row += 1) {
    const markers: string[] = [];
    for (let col = 0; col < geometry.cols; col += 1) {
      const cell = board[row * geometry.cols + col] ?? null;
      const marker = String(cellMarker(cell));
      markers.push(options.ansi && cell !== null ? `${ANSI_COLOURS[cell]}${marker}${ANSI_RESET}` : marker);
    }
    lines.push(markers.join(' '));
  }
  return `${lines.join('\n')}\n`;
}

/** Row-major marker values, one per cell. */
export function boardToTensor(board: ReadonlyArray<BoardCell>): number[] {
  return board.map(cellMarker);
}

/** Applied action indices joined with `", "`. */
export function formatHistory(history: ReadonlyArray<HistoryEntry>): string {
  return history.map((entry) => String(entry.action)).join(', ');
}

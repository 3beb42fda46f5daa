import { tileToString, type Board, type Move, type Tile } from '../types/puzzle';
import { getPieceTiles } from './piece';

/**
 * Shared move-notation helpers.
 *
 * These produce the plain-text lines used by the CLI report and by log
 * output. The move line format matches the historical solver output:
 *   Move (2,3) right by 1 steps
 */

export interface MoveNotationOptions {
  /**
   * When true, each line of a move list is prefixed with its 1-based index,
   * e.g. "3. Move (0,2) up by 1 steps".
   */
  numbered?: boolean;
}

export function formatTile(tile: Tile): string {
  return `(${tile.x},${tile.y})`;
}

export function formatMove(move: Move): string {
  return `Move ${formatTile(move.from)} ${move.type} by ${move.steps} steps`;
}

export function formatMoveList(moves: readonly Move[], options: MoveNotationOptions = {}): string[] {
  return moves.map((move, index) =>
    options.numbered ? `${index + 1}. ${formatMove(move)}` : formatMove(move)
  );
}

/**
 * Render a board as rows of characters.
 *
 * - `.` empty tile, `*` the goal tile when empty
 * - `A` the marked piece (every marked piece when there are several)
 * - `B`, `C`, ... other pieces in board order, wrapping after `Z`
 */
export function formatBoard(board: Board): string[] {
  const cells = new Map<string, string>();
  let nextLabel = 0;
  for (const piece of board.pieces) {
    let label = 'A';
    if (!piece.marked) {
      label = String.fromCharCode('B'.charCodeAt(0) + (nextLabel % 25));
      nextLabel += 1;
    }
    for (const tile of getPieceTiles(piece)) {
      cells.set(tileToString(tile), label);
    }
  }

  const goalKey = tileToString(board.goal);
  const rows: string[] = [];
  for (let y = 0; y < board.height; y++) {
    let row = '';
    for (let x = 0; x < board.width; x++) {
      const key = tileToString({ x, y });
      row += cells.get(key) ?? (key === goalKey ? '*' : '.');
    }
    rows.push(row);
  }
  return rows;
}

/**
 * Test Fixtures and Utilities
 * Board and piece builders shared by the solver tests
 */

import { createBoard } from '../../src/shared/engine/board';
import { createMarkedPiece, createPiece } from '../../src/shared/engine/piece';
import type { Board, Move, MoveType, Piece, Tile } from '../../src/shared/types/puzzle';

/**
 * Tile helper - creates a tile object
 */
export function tile(x: number, y: number): Tile {
  return { x, y };
}

export function horizontal(x: number, y: number, size: number = 2): Piece {
  return createPiece(tile(x, y), size, 'horizontal');
}

export function vertical(x: number, y: number, size: number = 2): Piece {
  return createPiece(tile(x, y), size, 'vertical');
}

/** The marked piece, horizontal unless stated otherwise. */
export function marked(
  x: number,
  y: number,
  size: number = 2,
  direction: 'horizontal' | 'vertical' = 'horizontal'
): Piece {
  return createMarkedPiece(tile(x, y), size, direction);
}

export function move(type: MoveType, x: number, y: number, steps: number = 1): Move {
  return { type, from: tile(x, y), steps };
}

export function board(width: number, height: number, goal: Tile, pieces: Piece[]): Board {
  return createBoard(width, height, goal, pieces);
}

/**
 * 3x1 row with a single marked square at the left end and the goal at the
 * right end. Solved by one two-step slide.
 */
export function createSlideRightBoard(): Board {
  return board(3, 1, tile(2, 0), [marked(0, 0, 1)]);
}

/**
 * 2x1 row filled by the marked piece, which already covers the goal.
 */
export function createAlreadyWonBoard(): Board {
  return board(2, 1, tile(1, 0), [marked(0, 0, 2)]);
}

/**
 * 4x1 row where a horizontal blocker sits directly right of the marked
 * square. The blocker can never leave the row, so the goal is unreachable.
 */
export function createBlockedRowBoard(): Board {
  return board(4, 1, tile(3, 0), [marked(0, 0, 1), horizontal(1, 0, 1)]);
}

/**
 * 4x3 board where a vertical blocker at (2,0) covers the marked piece's row.
 * The blocker must move down before the marked piece can reach (3,0):
 *
 *   AAB*      row 0: A = marked (0,0) size 2, B = vertical (2,0) size 2
 *   ..B.
 *   ....
 *
 * Shortest solution: B down 1, then A right 2. Two plies.
 */
export function createTwoPlyBoard(): Board {
  return board(4, 3, tile(3, 0), [marked(0, 0, 2), vertical(2, 0, 2)]);
}

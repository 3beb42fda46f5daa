import {
  tileToString,
  tilesEqual,
  type Board,
  type BoardTransition,
  type Move,
  type MoveType,
  type Piece,
  type Tile,
} from '../types/puzzle';
import { unknownMoveType } from './errors';
import { getPieceTiles, relocatePiece } from './piece';

/**
 * Board model for sliding-block puzzles.
 *
 * Boards are immutable snapshots. `occupiedTiles` and `isWon` are derived from
 * the piece list once, at construction, so two boards built from the same
 * ordered piece list are indistinguishable.
 */

export function createBoard(
  width: number,
  height: number,
  goal: Tile,
  pieces: readonly Piece[]
): Board {
  const occupiedTiles = new Set<string>();
  let isWon = false;
  for (const piece of pieces) {
    for (const tile of getPieceTiles(piece)) {
      occupiedTiles.add(tileToString(tile));
      if (piece.marked && tilesEqual(tile, goal)) {
        isWon = true;
      }
    }
  }

  return { width, height, goal, pieces, occupiedTiles, isWon };
}

export function tileExists(board: Board, tile: Tile): boolean {
  return tile.x >= 0 && tile.x < board.width && tile.y >= 0 && tile.y < board.height;
}

export function isEmptyTile(board: Board, tile: Tile): boolean {
  return tileExists(board, tile) && !board.occupiedTiles.has(tileToString(tile));
}

/** Unit offset applied per step for each move type. */
export function getMoveDelta(type: MoveType): Tile {
  switch (type) {
    case 'left':
      return { x: -1, y: 0 };
    case 'right':
      return { x: 1, y: 0 };
    case 'up':
      return { x: 0, y: -1 };
    case 'down':
      return { x: 0, y: 1 };
    default: {
      const exhaustive: never = type;
      throw unknownMoveType(exhaustive, 'Board');
    }
  }
}

/**
 * Collect `type` moves of 1, 2, ... steps for the piece at `from`, probing
 * from `edge` until the first off-board or occupied tile. The probe never
 * runs further than `limit` steps, the board dimension along that axis.
 */
function probeSlides(
  board: Board,
  from: Tile,
  edge: Tile,
  type: MoveType,
  limit: number,
  moves: Move[]
): void {
  const delta = getMoveDelta(type);
  for (let steps = 1; steps <= limit; steps++) {
    const target = { x: edge.x + delta.x * steps, y: edge.y + delta.y * steps };
    if (!isEmptyTile(board, target)) {
      break;
    }
    moves.push({ type, from, steps });
  }
}

/**
 * Every legal single-piece slide on the board.
 *
 * Pieces are visited in order. A horizontal piece yields its right slides
 * (1, 2, ... steps) followed by its left slides; a vertical piece yields up
 * slides then down slides. Each reachable step length is a separate move.
 */
export function enumerateMoves(board: Board): Move[] {
  const moves: Move[] = [];

  for (const piece of board.pieces) {
    const start = piece.location;
    if (piece.direction === 'horizontal') {
      const end = { x: start.x + piece.size - 1, y: start.y };
      probeSlides(board, start, end, 'right', board.width, moves);
      probeSlides(board, start, start, 'left', board.width, moves);
    } else {
      const end = { x: start.x, y: start.y + piece.size - 1 };
      probeSlides(board, start, start, 'up', board.height, moves);
      probeSlides(board, start, end, 'down', board.height, moves);
    }
  }

  return moves;
}

/**
 * Produce the board after `move`. Only the piece located at `move.from` is
 * relocated; the piece order is preserved. Legality is not checked: callers
 * pass moves obtained from {@link enumerateMoves} on the same board.
 */
export function applyMove(board: Board, move: Move): Board {
  const delta = getMoveDelta(move.type);
  const pieces = board.pieces.map((piece) =>
    tilesEqual(piece.location, move.from)
      ? relocatePiece(piece, {
          x: piece.location.x + delta.x * move.steps,
          y: piece.location.y + delta.y * move.steps,
        })
      : piece
  );

  return createBoard(board.width, board.height, board.goal, pieces);
}

/**
 * The move that takes a piece back to where `move` found it. The inverse
 * starts from the tile the piece occupies after `move`.
 */
export function invertMove(move: Move): Move {
  const { x, y } = move.from;
  const { steps } = move;
  switch (move.type) {
    case 'left':
      return { type: 'right', from: { x: x - steps, y }, steps };
    case 'right':
      return { type: 'left', from: { x: x + steps, y }, steps };
    case 'up':
      return { type: 'down', from: { x, y: y - steps }, steps };
    case 'down':
      return { type: 'up', from: { x, y: y + steps }, steps };
    default: {
      const exhaustive: never = move.type;
      throw unknownMoveType(exhaustive, 'Board');
    }
  }
}

export function undoMove(board: Board, move: Move): Board {
  return applyMove(board, invertMove(move));
}

/** All one-ply successors, in move generation order. */
export function enumerateFutureBoards(board: Board): BoardTransition[] {
  return enumerateMoves(board).map((move) => ({ board: applyMove(board, move), move }));
}

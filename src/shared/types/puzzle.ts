/**
 * Core value types for sliding-block puzzles.
 *
 * Every type here is a plain, read-only value. Engine helpers never mutate a
 * Piece or Board in place; a transition always produces a fresh value so the
 * search can keep references to every historical state.
 */

export interface Tile {
  readonly x: number;
  readonly y: number;
}

/** Axis along which a piece is allowed to slide. */
export type Direction = 'horizontal' | 'vertical';

export interface Piece {
  /** Number of tiles covered, always >= 1. */
  readonly size: number;
  /** Minimum-coordinate end of the piece. */
  readonly location: Tile;
  readonly direction: Direction;
  /** True for the piece that has to reach the goal tile. */
  readonly marked: boolean;
}

export type MoveType = 'left' | 'right' | 'up' | 'down';

/**
 * A single slide. `from` identifies the moved piece by its current location;
 * left/right are horizontal slides and up/down vertical ones. Axis agreement
 * with the piece is guaranteed by the move generator, not by this type.
 */
export interface Move {
  readonly type: MoveType;
  readonly from: Tile;
  readonly steps: number;
}

export interface Board {
  readonly width: number;
  readonly height: number;
  readonly goal: Tile;
  /** Ordered; the order is part of the state identity. */
  readonly pieces: readonly Piece[];
  /** Tile keys (see tileToString) covered by any piece. */
  readonly occupiedTiles: ReadonlySet<string>;
  readonly isWon: boolean;
}

/** One-ply successor of a board together with the move that produced it. */
export interface BoardTransition {
  readonly board: Board;
  readonly move: Move;
}

export const tileToString = (tile: Tile): string => `${tile.x},${tile.y}`;

export const stringToTile = (str: string): Tile => {
  const [x, y] = str.split(',').map(Number);
  return { x, y };
};

export const tilesEqual = (a: Tile, b: Tile): boolean => a.x === b.x && a.y === b.y;

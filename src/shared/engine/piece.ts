import type { Direction, Piece, Tile } from '../types/puzzle';

export function createPiece(location: Tile, size: number, direction: Direction): Piece {
  return { location, size, direction, marked: false };
}

/** Create the piece that has to reach the goal tile. */
export function createMarkedPiece(location: Tile, size: number, direction: Direction): Piece {
  return { location, size, direction, marked: true };
}

/**
 * Tiles covered by a piece: `size` consecutive tiles starting at its
 * location and advancing along its direction.
 */
export function getPieceTiles(piece: Piece): Tile[] {
  const { x, y } = piece.location;
  const tiles: Tile[] = [];
  for (let i = 0; i < piece.size; i++) {
    tiles.push(piece.direction === 'horizontal' ? { x: x + i, y } : { x, y: y + i });
  }
  return tiles;
}

export function relocatePiece(piece: Piece, location: Tile): Piece {
  return { ...piece, location };
}

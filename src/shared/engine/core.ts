import { tileToString, type Board, type Piece } from '../types/puzzle';

function fingerprintPiece(piece: Piece): string {
  const axis = piece.direction === 'horizontal' ? 'h' : 'v';
  return `${tileToString(piece.location)}:${piece.size}:${axis}:${piece.marked ? 'm' : '-'}`;
}

/**
 * Canonical fingerprint of a Board - a deterministic, human-readable string
 * that identifies a search state.
 *
 * Format: dims@goal#pieces#status
 * - dims: WIDTHxHEIGHT
 * - goal: x,y
 * - pieces: pipe-separated piece entries (x,y:size:h|v:m|-) in board order
 * - status: won | open
 *
 * Pieces are NOT sorted. The piece order is part of the state identity and
 * applyMove preserves it, so every path to the same physical layout yields
 * the same fingerprint. The occupied-tile set is a function of the pieces
 * and is therefore not repeated here.
 */
export function fingerprintBoard(board: Board): string {
  const dims = `${board.width}x${board.height}@${tileToString(board.goal)}`;
  const pieces = board.pieces.map(fingerprintPiece).join('|');
  return [dims, pieces, board.isWon ? 'won' : 'open'].join('#');
}

export function boardsEqual(a: Board, b: Board): boolean {
  return fingerprintBoard(a) === fingerprintBoard(b);
}

/**
 * Compact 16-hex-char hash of the board fingerprint, for log lines.
 *
 * Note: This is NOT collision-free; the transposition table keys on the full
 * fingerprint instead.
 */
export function hashBoard(board: Board): string {
  return simpleHash(fingerprintBoard(board));
}

function simpleHash(str: string): string {
  let h1 = 0xdeadbeef | 0;
  let h2 = 0x41c6ce57 | 0;

  for (let i = 0; i < str.length; i += 1) {
    const ch = str.charCodeAt(i);
    h1 = Math.imul(h1 ^ ch, 2654435761) | 0;
    h2 = Math.imul(h2 ^ ch, 1597334677) | 0;
  }

  h1 = (Math.imul(h1 ^ (h1 >>> 16), 2246822507) ^ Math.imul(h2 ^ (h2 >>> 13), 3266489909)) | 0;
  h2 = (Math.imul(h2 ^ (h2 >>> 16), 2246822507) ^ Math.imul(h1 ^ (h1 >>> 13), 3266489909)) | 0;

  const hi = h2 >>> 0;
  const lo = h1 >>> 0;
  const hiHex = hi.toString(16).padStart(8, '0');
  const loHex = lo.toString(16).padStart(8, '0');
  return (hiHex + loHex).slice(0, 16);
}

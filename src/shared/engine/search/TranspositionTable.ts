import type { Board, Move } from '../../types/puzzle';
import { fingerprintBoard } from '../core';

export interface TranspositionEntry {
  board: Board;
  /** Move that first produced the board, or null for the search root. */
  move: Move | null;
}

/**
 * Visited-state table for a single search.
 *
 * Keys are board fingerprints, so structurally identical boards share one
 * entry regardless of the path that produced them. Entries are only ever
 * added; the first recorded move for a board is kept.
 */
export class TranspositionTable {
  private readonly entries = new Map<string, TranspositionEntry>();

  get size(): number {
    return this.entries.size;
  }

  has(board: Board): boolean {
    return this.entries.has(fingerprintBoard(board));
  }

  get(board: Board): TranspositionEntry | undefined {
    return this.entries.get(fingerprintBoard(board));
  }

  /**
   * Record `board` if it has not been seen yet.
   *
   * @returns true when the board was new and has been inserted
   */
  record(board: Board, move: Move | null): boolean {
    const key = fingerprintBoard(board);
    if (this.entries.has(key)) {
      return false;
    }
    this.entries.set(key, { board, move });
    return true;
  }
}

import type { Board, BoardTransition, Move } from '../../types/puzzle';
import { enumerateFutureBoards, undoMove } from '../board';
import { fingerprintBoard } from '../core';
import { EngineErrorCode, InvalidState, SearchLimitExceeded } from '../errors';
import { TranspositionTable } from './TranspositionTable';

/**
 * Level-synchronised breadth-first search over sliding-block boards.
 *
 * Every board at ply k is admitted to the transposition table and checked
 * for a win before any board at ply k + 1 is looked at, so the first won
 * board found is at the minimum number of slides from the start.
 *
 * Known limitations, kept deliberately:
 * - the start board's own win flag is never tested, so an already-won start
 *   is not reported as a zero-ply solution;
 * - nothing detects an exhausted frontier. An unsolvable puzzle keeps the
 *   loop running with an ever-increasing ply counter unless `maxPlies` is
 *   set.
 */

export interface SearchProgress {
  /** Ply counter after this level was filtered. */
  plies: number;
  /** Boards from this level that were new to the table. */
  admitted: number;
  /** Boards generated for this level before filtering. */
  frontierSize: number;
  /** Total boards in the transposition table. */
  exploredStates: number;
}

export interface SolveOptions {
  /**
   * Ply ceiling. When the ply counter passes it, the search throws
   * SearchLimitExceeded instead of starting another level. Defaults to
   * Infinity, which keeps the unbounded loop.
   */
  maxPlies?: number;
  /** Called once per level, after filtering and before win checks. */
  onPly?: (progress: SearchProgress) => void;
}

export interface SolveResult {
  board: Board;
  plies: number;
  table: TranspositionTable;
}

export interface PuzzleSolution {
  /** The first won board reached. */
  board: Board;
  plies: number;
  /** Forward move sequence from the start board to `board`. */
  moves: Move[];
  exploredStates: number;
}

export function solve(start: Board, options: SolveOptions = {}): SolveResult {
  const maxPlies = options.maxPlies ?? Infinity;
  const table = new TranspositionTable();

  let frontier: BoardTransition[] = enumerateFutureBoards(start);
  table.record(start, null);
  let plies = 0;

  for (;;) {
    const admitted = frontier.filter(({ board, move }) => table.record(board, move));
    plies += 1;

    if (plies > maxPlies) {
      throw new SearchLimitExceeded(
        EngineErrorCode.SEARCH_PLY_LIMIT_EXCEEDED,
        `Search exceeded ${maxPlies} plies without reaching the goal`,
        { maxPlies, plies, exploredStates: table.size }
      );
    }

    options.onPly?.({
      plies,
      admitted: admitted.length,
      frontierSize: frontier.length,
      exploredStates: table.size,
    });

    const next: BoardTransition[] = [];
    for (const { board } of admitted) {
      if (board.isWon) {
        return { board, plies, table };
      }
      next.push(...enumerateFutureBoards(board));
    }

    frontier = next;
  }
}

/**
 * Walk back from `board` to the search root through the recorded moves and
 * return the moves in forward order.
 */
export function reconstructPath(table: TranspositionTable, board: Board): Move[] {
  const history: Move[] = [];
  let current = board;

  for (;;) {
    const entry = table.get(current);
    if (!entry) {
      throw new InvalidState(
        EngineErrorCode.STATE_BOARD_NOT_IN_TABLE,
        'Board reached during path reconstruction is not in the transposition table',
        { fingerprint: fingerprintBoard(current), stepsRecovered: history.length },
        'Search'
      );
    }
    if (entry.move === null) {
      break;
    }
    history.push(entry.move);
    current = undoMove(current, entry.move);
  }

  return history.reverse();
}

export function solvePuzzle(start: Board, options: SolveOptions = {}): PuzzleSolution {
  const { board, plies, table } = solve(start, options);
  return {
    board,
    plies,
    moves: reconstructPath(table, board),
    exploredStates: table.size,
  };
}

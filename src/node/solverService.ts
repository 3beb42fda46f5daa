import { performance } from 'perf_hooks';
import {
  formatMoveList,
  hashBoard,
  solvePuzzle,
  wrapEngineError,
  type Board,
  type Move,
} from '../shared/engine';
import { config } from './config';
import { logger } from './utils/logger';

export interface SolverRunOptions {
  /** Puzzle label for log lines. */
  name?: string;
  /** Defaults to the configured SOLVER_MAX_PLIES (unbounded when unset). */
  maxPlies?: number;
}

export interface SolverReport {
  name: string;
  plies: number;
  moves: Move[];
  board: Board;
  exploredStates: number;
  elapsedMs: number;
}

/**
 * Solve a board, logging progress and timing around the engine call.
 *
 * Engine errors (including a reached ply ceiling) are logged and rethrown
 * unchanged; anything else is normalised through wrapEngineError first.
 */
export function runSolver(board: Board, options: SolverRunOptions = {}): SolverReport {
  const name = options.name ?? 'puzzle';
  const maxPlies = options.maxPlies ?? config.solver.maxPlies;

  logger.info('Solving puzzle', {
    puzzle: name,
    width: board.width,
    height: board.height,
    pieces: board.pieces.length,
    maxPlies: Number.isFinite(maxPlies) ? maxPlies : 'unbounded',
  });

  const startedAt = performance.now();
  try {
    const solution = solvePuzzle(board, {
      maxPlies,
      onPly: (progress) => logger.debug('Search level expanded', { puzzle: name, ...progress }),
    });
    const elapsedMs = Math.round(performance.now() - startedAt);

    logger.info('Puzzle solved', {
      puzzle: name,
      plies: solution.plies,
      exploredStates: solution.exploredStates,
      elapsedMs,
      boardHash: hashBoard(solution.board),
    });

    return { name, elapsedMs, ...solution };
  } catch (error) {
    const engineError = wrapEngineError(error, 'SolverService', { puzzle: name });
    logger.error('Solver failed', { puzzle: name, error: engineError.toJSON() });
    throw engineError;
  }
}

/**
 * Plain-text report lines. Move lines are only included when `verbose`.
 */
export function formatSolverReport(report: SolverReport, verbose: boolean = false): string[] {
  const lines = [`Total steps: ${report.plies}`, `Total time: ${report.elapsedMs} ms`];
  if (verbose) {
    lines.push(...formatMoveList(report.moves));
  }
  return lines;
}

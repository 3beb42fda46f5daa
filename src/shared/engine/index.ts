// =============================================================================
// SLIDING-BLOCK ENGINE - PUBLIC API
// =============================================================================
// Hosts (the Node solver service, scripts, tests of the host layer) should
// only import from this file.
//
// Design principles:
// - NARROW: Only essential functions are exported
// - PURE: No side effects; boards are passed in and new boards returned
// =============================================================================

// =============================================================================
// CORE TYPES (from src/shared/types/puzzle.ts)
// =============================================================================

export type {
  Tile,
  Direction,
  Piece,
  Move,
  MoveType,
  Board,
  BoardTransition,
} from '../types/puzzle';

export { tileToString, stringToTile, tilesEqual } from '../types/puzzle';

// =============================================================================
// PIECES & BOARD
// =============================================================================

export { createPiece, createMarkedPiece, getPieceTiles, relocatePiece } from './piece';

export {
  createBoard,
  tileExists,
  isEmptyTile,
  getMoveDelta,
  enumerateMoves,
  applyMove,
  invertMove,
  undoMove,
  enumerateFutureBoards,
} from './board';

export { fingerprintBoard, boardsEqual, hashBoard } from './core';

// =============================================================================
// SEARCH
// =============================================================================

export { TranspositionTable } from './search/TranspositionTable';
export type { TranspositionEntry } from './search/TranspositionTable';

export { solve, reconstructPath, solvePuzzle } from './search/breadthFirstSolver';
export type {
  SearchProgress,
  SolveOptions,
  SolveResult,
  PuzzleSolution,
} from './search/breadthFirstSolver';

// =============================================================================
// NOTATION & ERRORS
// =============================================================================

export { formatTile, formatMove, formatMoveList, formatBoard } from './notation';
export type { MoveNotationOptions } from './notation';

export {
  EngineError,
  EngineErrorCode,
  SearchLimitExceeded,
  InvalidState,
  MoveRequirementError,
  PuzzleDefinitionError,
  isEngineError,
  isSearchLimitExceeded,
  isInvalidState,
  isMoveRequirementError,
  isPuzzleDefinitionError,
  wrapEngineError,
} from './errors';
export type { EngineErrorJSON } from './errors';

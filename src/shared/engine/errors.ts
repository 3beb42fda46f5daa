/**
 * Engine Domain Errors - Structured error types for the solver engine layer
 *
 * The board model itself is total over well-formed input, so the errors here
 * cover the edges around it: a bounded search giving up, an inconsistent
 * transposition table, malformed moves and unusable puzzle definitions.
 *
 * Error Categories:
 * - **SearchLimitExceeded**: the optional ply ceiling was reached
 * - **InvalidState**: transposition table or board bookkeeping is inconsistent
 * - **MoveRequirementError**: a move that the engine cannot interpret
 * - **PuzzleDefinitionError**: a puzzle file that cannot be turned into a Board
 *
 * Usage:
 * ```typescript
 * import { SearchLimitExceeded, EngineErrorCode } from './errors';
 *
 * throw new SearchLimitExceeded(
 *   EngineErrorCode.SEARCH_PLY_LIMIT_EXCEEDED,
 *   'Search exceeded 40 plies without reaching the goal',
 *   { maxPlies: 40, exploredStates: 1234 }
 * );
 * ```
 *
 * @module EngineErrors
 */

// =============================================================================
// ERROR CODES
// =============================================================================

/**
 * Enumeration of all engine domain error codes.
 *
 * Error codes are prefixed by category:
 * - SEARCH_*: Search-loop limits
 * - STATE_*: Board or table inconsistency
 * - MOVE_*: Move field/type issues
 * - PUZZLE_*: Puzzle definition loading
 * - INTERNAL_*: Bugs
 */
export enum EngineErrorCode {
  /** The ply counter passed the configured ceiling */
  SEARCH_PLY_LIMIT_EXCEEDED = 'SEARCH_PLY_LIMIT_EXCEEDED',

  /** A board reached during path reconstruction has no table entry */
  STATE_BOARD_NOT_IN_TABLE = 'STATE_BOARD_NOT_IN_TABLE',

  /** Move.type is not one of left/right/up/down */
  MOVE_UNKNOWN_TYPE = 'MOVE_UNKNOWN_TYPE',

  /** Puzzle file could not be read or is not JSON */
  PUZZLE_DEFINITION_UNREADABLE = 'PUZZLE_DEFINITION_UNREADABLE',
  /** Puzzle JSON does not match the definition schema */
  PUZZLE_DEFINITION_INVALID = 'PUZZLE_DEFINITION_INVALID',

  /** Assertion failed - indicates a bug */
  INTERNAL_ASSERTION_FAILED = 'INTERNAL_ASSERTION_FAILED',
}

/**
 * Maps error codes to human-readable category descriptions.
 */
export const ERROR_CATEGORY_DESCRIPTIONS: Record<string, string> = {
  SEARCH_: 'Search limit reached',
  STATE_: 'Corrupted or unexpected search state',
  MOVE_: 'Malformed move',
  PUZZLE_: 'Unusable puzzle definition',
  INTERNAL_: 'Internal engine error (bug)',
};

// =============================================================================
// BASE ERROR CLASS
// =============================================================================

/**
 * Base class for all engine domain errors.
 */
export class EngineError extends Error {
  /** Error code for programmatic handling */
  readonly code: EngineErrorCode;

  /** Additional context for debugging */
  readonly context: Record<string, unknown>;

  /** Domain that generated the error (e.g., 'Search', 'PuzzleLoader') */
  readonly domain: string;

  readonly timestamp: Date;

  constructor(
    code: EngineErrorCode,
    message: string,
    context: Record<string, unknown> = {},
    domain: string = 'Engine'
  ) {
    super(message);
    this.name = 'EngineError';
    this.code = code;
    this.context = context;
    this.domain = domain;
    this.timestamp = new Date();

    // Maintain proper prototype chain
    Object.setPrototypeOf(this, EngineError.prototype);
  }

  /** Get error category from code prefix */
  get category(): string {
    const prefix = this.code.split('_')[0] + '_';
    return ERROR_CATEGORY_DESCRIPTIONS[prefix] ?? 'Unknown error category';
  }

  /** Serialize to a JSON-safe object for logging/debugging */
  toJSON(): EngineErrorJSON {
    return {
      error: true,
      type: this.name,
      code: this.code,
      message: this.message,
      domain: this.domain,
      context: this.context,
      category: this.category,
      timestamp: this.timestamp.toISOString(),
    };
  }
}

/**
 * JSON representation of an EngineError.
 */
export interface EngineErrorJSON {
  error: true;
  type: string;
  code: string;
  message: string;
  domain: string;
  context: Record<string, unknown>;
  category: string;
  timestamp: string;
}

// =============================================================================
// SPECIFIC ERROR CLASSES
// =============================================================================

/**
 * Thrown when a bounded search passes its ply ceiling. The search never
 * returns a partial result in that case.
 */
export class SearchLimitExceeded extends EngineError {
  constructor(
    code: EngineErrorCode,
    message: string,
    context: Record<string, unknown> = {},
    domain: string = 'Search'
  ) {
    super(code, message, context, domain);
    this.name = 'SearchLimitExceeded';
    Object.setPrototypeOf(this, SearchLimitExceeded.prototype);
  }
}

/**
 * Error for inconsistent search bookkeeping.
 *
 * Only reachable through a bug or a table assembled by hand, e.g. a board
 * handed to path reconstruction that was never recorded.
 */
export class InvalidState extends EngineError {
  constructor(
    code: EngineErrorCode,
    message: string,
    context: Record<string, unknown> = {},
    domain: string = 'State'
  ) {
    super(code, message, context, domain);
    this.name = 'InvalidState';
    Object.setPrototypeOf(this, InvalidState.prototype);
  }
}

export class MoveRequirementError extends EngineError {
  constructor(
    code: EngineErrorCode,
    message: string,
    context: Record<string, unknown> = {},
    domain: string = 'Move'
  ) {
    super(code, message, context, domain);
    this.name = 'MoveRequirementError';
    Object.setPrototypeOf(this, MoveRequirementError.prototype);
  }
}

/**
 * Error for puzzle files that cannot be read or do not match the schema.
 * Overlapping or off-board pieces are not detected here.
 */
export class PuzzleDefinitionError extends EngineError {
  constructor(
    code: EngineErrorCode,
    message: string,
    context: Record<string, unknown> = {},
    domain: string = 'PuzzleLoader'
  ) {
    super(code, message, context, domain);
    this.name = 'PuzzleDefinitionError';
    Object.setPrototypeOf(this, PuzzleDefinitionError.prototype);
  }
}

// =============================================================================
// TYPE GUARDS
// =============================================================================

export function isEngineError(error: unknown): error is EngineError {
  return error instanceof EngineError;
}

export function isSearchLimitExceeded(error: unknown): error is SearchLimitExceeded {
  return error instanceof SearchLimitExceeded;
}

export function isInvalidState(error: unknown): error is InvalidState {
  return error instanceof InvalidState;
}

export function isMoveRequirementError(error: unknown): error is MoveRequirementError {
  return error instanceof MoveRequirementError;
}

export function isPuzzleDefinitionError(error: unknown): error is PuzzleDefinitionError {
  return error instanceof PuzzleDefinitionError;
}

// =============================================================================
// UTILITIES
// =============================================================================

/**
 * Wrap an unknown error in an EngineError.
 *
 * Useful for catching and normalizing errors at domain boundaries.
 */
export function wrapEngineError(
  error: unknown,
  domain: string = 'Engine',
  context: Record<string, unknown> = {}
): EngineError {
  if (isEngineError(error)) {
    return error;
  }

  const message = error instanceof Error ? error.message : String(error);
  const stack = error instanceof Error ? error.stack : undefined;

  return new EngineError(
    EngineErrorCode.INTERNAL_ASSERTION_FAILED,
    message,
    {
      ...context,
      originalStack: stack,
    },
    domain
  );
}

/**
 * Create the error raised when an exhaustive switch over MoveType falls
 * through, which only happens for values built outside the type system.
 */
export function unknownMoveType(type: unknown, domain: string = 'Move'): MoveRequirementError {
  return new MoveRequirementError(
    EngineErrorCode.MOVE_UNKNOWN_TYPE,
    `Unknown move type: ${String(type)}`,
    { type },
    domain
  );
}

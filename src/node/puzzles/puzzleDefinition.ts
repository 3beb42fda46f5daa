import fs from 'fs';
import { z } from 'zod';
import {
  EngineErrorCode,
  PuzzleDefinitionError,
  createBoard,
  type Board,
  type Piece,
} from '../../shared/engine';

/**
 * JSON puzzle definitions.
 *
 * The schema checks shape only: integer coordinates, positive sizes and a
 * known direction. Overlapping pieces or pieces hanging off the grid are
 * accepted as-is and produce whatever board they describe.
 */

const TileSchema = z.object({
  x: z.number().int().min(0),
  y: z.number().int().min(0),
});

export const PieceDefinitionSchema = TileSchema.extend({
  size: z.number().int().positive(),
  direction: z.enum(['horizontal', 'vertical']),
  marked: z.boolean().default(false),
});

export const PuzzleDefinitionSchema = z.object({
  name: z.string().optional(),
  width: z.number().int().positive(),
  height: z.number().int().positive(),
  goal: TileSchema,
  pieces: z.array(PieceDefinitionSchema).min(1),
});

export type PieceDefinition = z.infer<typeof PieceDefinitionSchema>;
export type PuzzleDefinition = z.infer<typeof PuzzleDefinitionSchema>;

export interface LoadedPuzzle {
  name: string;
  board: Board;
}

/** Build a board from a validated definition, keeping the piece order. */
export function boardFromDefinition(definition: PuzzleDefinition): Board {
  const pieces: Piece[] = definition.pieces.map((piece) => ({
    location: { x: piece.x, y: piece.y },
    size: piece.size,
    direction: piece.direction,
    marked: piece.marked,
  }));
  return createBoard(definition.width, definition.height, definition.goal, pieces);
}

/**
 * Validate an already-parsed JSON value and turn it into a board.
 *
 * @param source - Label used in error messages and as the fallback name
 */
export function parsePuzzleDefinition(raw: unknown, source: string = 'inline'): LoadedPuzzle {
  const result = PuzzleDefinitionSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => ({
      path: issue.path.join('.'),
      message: issue.message,
    }));
    throw new PuzzleDefinitionError(
      EngineErrorCode.PUZZLE_DEFINITION_INVALID,
      `Puzzle definition ${source} is invalid: ${issues
        .map((issue) => `${issue.path || 'root'}: ${issue.message}`)
        .join('; ')}`,
      { source, issues }
    );
  }

  return {
    name: result.data.name ?? source,
    board: boardFromDefinition(result.data),
  };
}

export function loadPuzzleFile(filePath: string): LoadedPuzzle {
  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(filePath, 'utf8'));
  } catch (error) {
    throw new PuzzleDefinitionError(
      EngineErrorCode.PUZZLE_DEFINITION_UNREADABLE,
      `Cannot read puzzle definition ${filePath}: ${
        error instanceof Error ? error.message : String(error)
      }`,
      { source: filePath }
    );
  }

  return parsePuzzleDefinition(raw, filePath);
}

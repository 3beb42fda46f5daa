import {
  applyMove,
  createBoard,
  enumerateFutureBoards,
  enumerateMoves,
  getMoveDelta,
  invertMove,
  isEmptyTile,
  tileExists,
  undoMove,
} from '../../../src/shared/engine/board';
import { boardsEqual } from '../../../src/shared/engine/core';
import { MoveRequirementError } from '../../../src/shared/engine/errors';
import type { MoveType } from '../../../src/shared/types/puzzle';
import {
  board,
  createTwoPlyBoard,
  horizontal,
  marked,
  move,
  tile,
  vertical,
} from '../../utils/puzzleFixtures';

describe('board', () => {
  describe('createBoard', () => {
    it('derives the occupied tiles from every piece', () => {
      const b = board(4, 3, tile(3, 0), [marked(0, 0, 2), vertical(2, 0, 2)]);

      expect([...b.occupiedTiles].sort()).toEqual(['0,0', '1,0', '2,0', '2,1']);
    });

    it('is won when any tile of a marked piece is on the goal', () => {
      // Goal under the trailing end of the marked piece, not its leading edge.
      const b = board(4, 1, tile(1, 0), [marked(0, 0, 2)]);
      expect(b.isWon).toBe(true);
    });

    it('is not won when an unmarked piece covers the goal', () => {
      const b = board(4, 2, tile(3, 0), [marked(0, 1, 1), horizontal(2, 0, 2)]);
      expect(b.isWon).toBe(false);
    });

    it('keeps the piece order it was given', () => {
      const pieces = [vertical(2, 0), marked(0, 0)];
      expect(createBoard(4, 3, tile(3, 0), pieces).pieces).toEqual(pieces);
    });
  });

  describe('tileExists / isEmptyTile', () => {
    const b = board(3, 2, tile(2, 0), [marked(0, 0, 1)]);

    it('accepts tiles inside [0,width) x [0,height)', () => {
      expect(tileExists(b, tile(0, 0))).toBe(true);
      expect(tileExists(b, tile(2, 1))).toBe(true);
    });

    it('rejects tiles past either edge', () => {
      expect(tileExists(b, tile(3, 0))).toBe(false);
      expect(tileExists(b, tile(0, 2))).toBe(false);
      expect(tileExists(b, tile(-1, 0))).toBe(false);
    });

    it('treats occupied and off-board tiles as not empty', () => {
      expect(isEmptyTile(b, tile(0, 0))).toBe(false);
      expect(isEmptyTile(b, tile(1, 0))).toBe(true);
      expect(isEmptyTile(b, tile(3, 0))).toBe(false);
    });
  });

  describe('getMoveDelta', () => {
    it.each<[MoveType, { x: number; y: number }]>([
      ['left', { x: -1, y: 0 }],
      ['right', { x: 1, y: 0 }],
      ['up', { x: 0, y: -1 }],
      ['down', { x: 0, y: 1 }],
    ])('maps %s to %j', (type, delta) => {
      expect(getMoveDelta(type)).toEqual(delta);
    });

    it('throws MoveRequirementError for values outside MoveType', () => {
      const bogus: unknown = 'sideways';
      expect(() => getMoveDelta(bogus as MoveType)).toThrow(MoveRequirementError);
    });
  });

  describe('enumerateMoves', () => {
    it('offers every step length up to the board edge, right before left', () => {
      const b = board(4, 1, tile(3, 0), [marked(1, 0, 1)]);

      expect(enumerateMoves(b)).toEqual([
        move('right', 1, 0, 1),
        move('right', 1, 0, 2),
        move('left', 1, 0, 1),
      ]);
    });

    it('stops probing at the first occupied tile', () => {
      const b = board(6, 1, tile(5, 0), [marked(0, 0, 1), horizontal(3, 0, 1)]);

      expect(enumerateMoves(b)).toEqual([
        move('right', 0, 0, 1),
        move('right', 0, 0, 2),
        // blocker: right 1..2, left 1..2
        move('right', 3, 0, 1),
        move('right', 3, 0, 2),
        move('left', 3, 0, 1),
        move('left', 3, 0, 2),
      ]);
    });

    it('probes from the far end of longer pieces', () => {
      const b = board(5, 1, tile(4, 0), [marked(1, 0, 2)]);

      expect(enumerateMoves(b)).toEqual([
        move('right', 1, 0, 1),
        move('right', 1, 0, 2),
        move('left', 1, 0, 1),
      ]);
    });

    it('emits up moves before down moves for vertical pieces', () => {
      const b = board(1, 5, tile(0, 4), [vertical(0, 1, 2)]);

      expect(enumerateMoves(b)).toEqual([
        move('up', 0, 1, 1),
        move('down', 0, 1, 1),
        move('down', 0, 1, 2),
      ]);
    });

    it('never moves a piece across its own axis', () => {
      const b = board(3, 3, tile(2, 2), [marked(0, 1, 1)]);
      const types = new Set(enumerateMoves(b).map((m) => m.type));

      expect(types).toEqual(new Set(['right']));
    });

    it('yields nothing when every piece is boxed in', () => {
      const b = board(2, 1, tile(1, 0), [marked(0, 0, 2)]);
      expect(enumerateMoves(b)).toEqual([]);
    });

    it('visits pieces in board order', () => {
      const b = createTwoPlyBoard();
      expect(enumerateMoves(b)).toEqual([move('down', 2, 0, 1)]);
    });
  });

  describe('applyMove', () => {
    it('relocates only the piece at the move origin', () => {
      const b = board(6, 3, tile(5, 0), [marked(0, 0, 2), vertical(4, 0, 2), horizontal(0, 2, 2)]);
      const next = applyMove(b, move('right', 0, 0, 2));

      expect(next.pieces).toEqual([marked(2, 0, 2), vertical(4, 0, 2), horizontal(0, 2, 2)]);
      expect([...next.occupiedTiles].sort()).toEqual(['0,2', '1,2', '2,0', '3,0', '4,0', '4,1']);
    });

    it('does not mutate the source board', () => {
      const b = board(3, 1, tile(2, 0), [marked(0, 0, 1)]);
      applyMove(b, move('right', 0, 0, 1));

      expect(b.pieces).toEqual([marked(0, 0, 1)]);
      expect(b.occupiedTiles.has('0,0')).toBe(true);
    });

    it('recomputes the win flag', () => {
      const b = board(3, 1, tile(2, 0), [marked(0, 0, 1)]);
      expect(applyMove(b, move('right', 0, 0, 2)).isWon).toBe(true);
    });

    it('applies vertical offsets', () => {
      const b = board(1, 4, tile(0, 0), [vertical(0, 2, 2)]);
      expect(applyMove(b, move('up', 0, 2, 2)).pieces).toEqual([vertical(0, 0, 2)]);
    });

    it('returns an equal board when no piece sits at the origin', () => {
      const b = board(3, 1, tile(2, 0), [marked(0, 0, 1)]);
      expect(boardsEqual(applyMove(b, move('right', 1, 0, 1)), b)).toBe(true);
    });
  });

  describe('invertMove / undoMove', () => {
    it.each([
      [move('left', 3, 0, 2), move('right', 1, 0, 2)],
      [move('right', 1, 0, 2), move('left', 3, 0, 2)],
      [move('up', 0, 3, 1), move('down', 0, 2, 1)],
      [move('down', 0, 2, 1), move('up', 0, 3, 1)],
    ])('inverts %j to %j', (m, inverse) => {
      expect(invertMove(m)).toEqual(inverse);
    });

    it('restores the board that a move was played on', () => {
      const b = createTwoPlyBoard();
      const m = move('down', 2, 0, 1);

      expect(boardsEqual(undoMove(applyMove(b, m), m), b)).toBe(true);
    });
  });

  describe('enumerateFutureBoards', () => {
    it('pairs each generated move with the board it produces', () => {
      const b = board(3, 1, tile(2, 0), [marked(0, 0, 1)]);
      const futures = enumerateFutureBoards(b);

      expect(futures.map((f) => f.move)).toEqual([move('right', 0, 0, 1), move('right', 0, 0, 2)]);
      expect(futures.map((f) => f.board.pieces[0].location)).toEqual([tile(1, 0), tile(2, 0)]);
      expect(futures.map((f) => f.board.isWon)).toEqual([false, true]);
    });
  });
});

import { describe, expect, it } from 'vitest';
import { Board } from '../domain/Board';
import { cellValue, clueCell, isBorder, playableCell } from '../domain/Cell';
import { OutOfBoundsError } from '../domain/errors';
import { Position } from '../domain/Position';
import { at, boardOf } from './helpers/boards';

describe('Board', () => {
  // 2 rows x 3 columns, so row and column bounds differ
  const board = boardOf([
    [{ r: 3 }, 1, 2],
    [{ r: 9 }, 4, 5],
  ]);

  it('reports its size', () => {
    expect(board.rowCount).toBe(2);
    expect(board.columnCount).toBe(3);
  });

  it('answers neighbour existence against the grid bounds', () => {
    const topLeft = board.getCell(at(0, 0));
    const bottomRight = board.getCell(at(1, 2));

    expect(board.hasCellTop(topLeft)).toBe(false);
    expect(board.hasCellLeft(topLeft)).toBe(false);
    expect(board.hasCellBottom(topLeft)).toBe(true);
    expect(board.hasCellRight(topLeft)).toBe(true);

    expect(board.hasCellTop(bottomRight)).toBe(true);
    expect(board.hasCellLeft(bottomRight)).toBe(true);
    expect(board.hasCellBottom(bottomRight)).toBe(false);
    expect(board.hasCellRight(bottomRight)).toBe(false);
  });

  it('returns neighbours in each direction', () => {
    const middle = board.getCell(at(0, 1));
    expect(board.getCellRight(middle)).toEqual(playableCell(at(0, 2), 2));
    expect(board.getCellLeft(middle).kind).toBe('clue');
    expect(board.getCellBottom(middle)).toEqual(playableCell(at(1, 1), 4));
    expect(board.getCellTop(board.getCell(at(1, 1)))).toEqual(playableCell(at(0, 1), 1));
  });

  it('throws OutOfBoundsError walking right off the last column', () => {
    const last = board.getCell(at(0, 2));
    expect(() => board.getCellRight(last)).toThrow(OutOfBoundsError);
    expect(() => board.getCellRight(last)).toThrow('Position (0, 3) is outside the board.');
  });

  it('throws OutOfBoundsError for lookups outside the grid', () => {
    expect(() => board.getCell(at(2, 0))).toThrow(OutOfBoundsError);
    expect(() => board.getCell(new Position(-1, 0))).toThrow(OutOfBoundsError);
    expect(board.contains(at(1, 2))).toBe(true);
    expect(board.contains(at(1, 3))).toBe(false);
  });

  it('rejects jagged rows', () => {
    expect(() => boardOf([[{ r: 1 }, 1], [{ r: 1 }]])).toThrow('row 1 has 1 cells, expected 2');
  });

  it('rejects cells whose position does not match their index', () => {
    expect(() => new Board([[playableCell(at(0, 1))]])).toThrow('cell at index (0, 0) declares position (0, 1)');
  });

  it('rejects an empty grid', () => {
    expect(() => new Board([])).toThrow('board must have at least one cell');
  });

  it('writes values into a new board', () => {
    const next = board.withValue(at(1, 2), 7);
    expect(next.getCell(at(1, 2))).toEqual(playableCell(at(1, 2), 7));
    expect(board.getCell(at(1, 2))).toEqual(playableCell(at(1, 2), 5));
  });

  it('refuses to write into a clue cell', () => {
    expect(() => board.withValue(at(0, 0), 1)).toThrow('cell (0, 0) is a clue cell');
  });

  it('lists playable cells in row order', () => {
    expect(board.playableCells().map(c => c.value)).toEqual([1, 2, 4, 5]);
  });
});

describe('Position and cells', () => {
  it('compares positions by value', () => {
    expect(at(1, 2).equals(new Position(1, 2))).toBe(true);
    expect(at(1, 2).equals(at(2, 1))).toBe(false);
    expect(new Set([at(1, 2).toKey(), new Position(1, 2).toKey()]).size).toBe(1);
  });

  it('reads clue cells as empty', () => {
    expect(cellValue(clueCell(at(0, 0), { rowTotal: 4 }))).toBe(0);
    expect(cellValue(playableCell(at(0, 1), 3))).toBe(3);
    expect(isBorder(clueCell(at(0, 0)))).toBe(true);
    expect(isBorder(playableCell(at(0, 1)))).toBe(false);
  });
});

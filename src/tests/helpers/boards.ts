import { Board } from '../../domain/Board';
import { clueCell, playableCell, type Cell } from '../../domain/Cell';
import { Position } from '../../domain/Position';

/** Clue cell: `r` anchors the run to its right, `c` the run below. */
export type ClueSpec = { r?: number; c?: number };

/**
 * Board from a compact grid: numbers are playable cells holding that value,
 * objects are clue cells.
 *
 *   boardOf([[{ r: 10 }, 4, 6]])
 */
export function boardOf(grid: Array<Array<number | ClueSpec>>): Board {
  return new Board(grid.map((row, r) => row.map((spec, c): Cell => {
    const position = new Position(r, c);
    return typeof spec === 'number'
      ? playableCell(position, spec)
      : clueCell(position, { rowTotal: spec.r, columnTotal: spec.c });
  })));
}

export function at(row: number, column: number): Position {
  return new Position(row, column);
}

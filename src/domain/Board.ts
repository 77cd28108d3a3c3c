import type { BoardIterator } from './BoardIterator';
import { playableCell, type Cell, type PlayableCell } from './Cell';
import { OutOfBoundsError } from './errors';
import { Position } from './Position';

export class Board implements BoardIterator {
  private readonly cells: Cell[][];

  /**
   * Takes ownership of `rows`. Throws when the grid is empty, jagged, or a
   * cell's position does not match its index.
   */
  constructor(rows: Cell[][]) {
    const width = rows[0]?.length ?? 0;
    if (rows.length === 0 || width === 0) throw new Error('board must have at least one cell');

    rows.forEach((row, r) => {
      if (row.length !== width) throw new Error(`row ${r} has ${row.length} cells, expected ${width}`);
      row.forEach((cell, c) => {
        if (cell.position.row !== r || cell.position.column !== c) {
          throw new Error(`cell at index (${r}, ${c}) declares position ${cell.position.toString()}`);
        }
      });
    });

    this.cells = rows;
  }

  get rowCount(): number {
    return this.cells.length;
  }

  get columnCount(): number {
    return this.cells[0]?.length ?? 0;
  }

  contains(position: Position): boolean {
    return position.row >= 0 && position.row < this.rowCount
      && position.column >= 0 && position.column < this.columnCount;
  }

  hasCellTop(cell: Cell): boolean {
    return cell.position.row > 0;
  }

  hasCellBottom(cell: Cell): boolean {
    return cell.position.row < this.rowCount - 1;
  }

  hasCellLeft(cell: Cell): boolean {
    return cell.position.column > 0;
  }

  hasCellRight(cell: Cell): boolean {
    return cell.position.column < this.columnCount - 1;
  }

  getCell(position: Position): Cell {
    const cell = this.cells[position.row]?.[position.column];
    if (!cell) throw new OutOfBoundsError(position);
    return cell;
  }

  getCellTop(cell: Cell): Cell {
    return this.getCell(new Position(cell.position.row - 1, cell.position.column));
  }

  getCellBottom(cell: Cell): Cell {
    return this.getCell(new Position(cell.position.row + 1, cell.position.column));
  }

  getCellLeft(cell: Cell): Cell {
    return this.getCell(new Position(cell.position.row, cell.position.column - 1));
  }

  getCellRight(cell: Cell): Cell {
    return this.getCell(new Position(cell.position.row, cell.position.column + 1));
  }

  /** Copy of the grid rows; cells themselves are immutable. */
  get rows(): Cell[][] {
    return this.cells.map(row => row.slice());
  }

  playableCells(): PlayableCell[] {
    return this.cells.flat().filter((c): c is PlayableCell => c.kind === 'playable');
  }

  /** New board with `value` written into the playable cell at `position`. */
  withValue(position: Position, value: number): Board {
    const target = this.getCell(position);
    if (target.kind !== 'playable') throw new Error(`cell ${position.toString()} is a clue cell`);
    const rows = this.rows;
    const row = rows[position.row];
    if (row) row[position.column] = playableCell(target.position, value);
    return new Board(rows);
  }
}

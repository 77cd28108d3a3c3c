import type { Cell } from './Cell';
import type { Position } from './Position';

/**
 * Read-only traversal over a grid of cells.
 *
 * Notes:
 * - `getCell*` throws OutOfBoundsError when the matching `hasCell*` is false;
 *   callers check first.
 * - Every method takes the cell it starts from, so an iterator carries no cursor.
 */
export interface BoardIterator {
  hasCellTop(cell: Cell): boolean;
  hasCellBottom(cell: Cell): boolean;
  hasCellLeft(cell: Cell): boolean;
  hasCellRight(cell: Cell): boolean;

  getCellTop(cell: Cell): Cell;
  getCellBottom(cell: Cell): Cell;
  getCellLeft(cell: Cell): Cell;
  getCellRight(cell: Cell): Cell;

  getCell(position: Position): Cell;
}

import type { BoardIterator } from '../domain/BoardIterator';
import { isBorder, type Cell, type ClueCell, type PlayableCell } from '../domain/Cell';
import type { Move } from '../domain/Move';

export type Axis = 'row' | 'column';

type AxisWalk = {
  previous(iterator: BoardIterator, cell: Cell): Cell;
  next(iterator: BoardIterator, cell: Cell): Cell;
  /** Next cell exists and still belongs to the run (runs end at the edge or at the next clue). */
  hasNext(iterator: BoardIterator, cell: Cell): boolean;
  expected(clue: ClueCell): number;
};

const WALKS: Record<Axis, AxisWalk> = {
  row: {
    previous: (it, cell) => it.getCellLeft(cell),
    next: (it, cell) => it.getCellRight(cell),
    hasNext: (it, cell) => it.hasCellRight(cell) && !isBorder(it.getCellRight(cell)),
    expected: clue => clue.rowTotal,
  },
  column: {
    previous: (it, cell) => it.getCellTop(cell),
    next: (it, cell) => it.getCellBottom(cell),
    hasNext: (it, cell) => it.hasCellBottom(cell) && !isBorder(it.getCellBottom(cell)),
    expected: clue => clue.columnTotal,
  },
};

/**
 * Walks backward from `start` to the clue cell anchoring its run.
 * A run with no clue walks off the grid and throws OutOfBoundsError.
 */
export function findAnchor(iterator: BoardIterator, start: Cell, axis: Axis): ClueCell {
  const walk = WALKS[axis];
  let cell = start;
  for (;;) {
    if (isBorder(cell)) return cell;
    cell = walk.previous(iterator, cell);
  }
}

/** Playable cells of the run anchored at `anchor`, in walk order. */
export function runOf(iterator: BoardIterator, anchor: ClueCell, axis: Axis): PlayableCell[] {
  const walk = WALKS[axis];
  const cells: PlayableCell[] = [];
  let cell: Cell = anchor;
  while (walk.hasNext(iterator, cell)) {
    cell = walk.next(iterator, cell);
    if (cell.kind === 'playable') cells.push(cell);
  }
  return cells;
}

export function expectedTotal(anchor: ClueCell, axis: Axis): number {
  return WALKS[axis].expected(anchor);
}

/** Cell value with the move's candidate value substituted at its position. */
export function valueAt(cell: PlayableCell, move: Move): number {
  return cell.position.equals(move.position) ? move.value : cell.value;
}

import type { Position } from './Position';

/**
 * Clue ("border") cell: anchors the run to its right with `rowTotal`
 * and the run below it with `columnTotal`. Never holds a played value.
 */
export type ClueCell = {
  readonly kind: 'clue';
  readonly position: Position;
  readonly rowTotal: number;
  readonly columnTotal: number;
};

/** Playable cell. value 0 = empty. */
export type PlayableCell = {
  readonly kind: 'playable';
  readonly position: Position;
  readonly value: number;
};

export type Cell = ClueCell | PlayableCell;

export function clueCell(position: Position, totals: { rowTotal?: number; columnTotal?: number } = {}): ClueCell {
  return { kind: 'clue', position, rowTotal: totals.rowTotal ?? 0, columnTotal: totals.columnTotal ?? 0 };
}

export function playableCell(position: Position, value = 0): PlayableCell {
  return { kind: 'playable', position, value };
}

export function isBorder(cell: Cell): cell is ClueCell {
  return cell.kind === 'clue';
}

export function cellValue(cell: Cell): number {
  return cell.kind === 'playable' ? cell.value : 0;
}

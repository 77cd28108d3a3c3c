import type { BoardIterator } from '../domain/BoardIterator';
import type { Move } from '../domain/Move';
import type { AxisRule } from './Rule';
import { findAnchor, runOf, valueAt, type Axis } from './axis';

/** No digit repeats within a run. Empty cells (0) never clash. */
export class DistinctRule implements AxisRule {
  readonly id: string;
  readonly name: string;

  constructor(readonly axis: Axis) {
    this.id = `${axis}Distinct`;
    this.name = `No repeated value in a ${axis} run`;
  }

  isRuleBroken(iterator: BoardIterator, move: Move): boolean {
    const anchor = findAnchor(iterator, iterator.getCell(move.position), this.axis);
    const seen = new Set<number>();
    for (const cell of runOf(iterator, anchor, this.axis)) {
      const v = valueAt(cell, move);
      if (v === 0) continue;
      if (seen.has(v)) return true;
      seen.add(v);
    }
    return false;
  }
}

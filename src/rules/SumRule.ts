import type { BoardIterator } from '../domain/BoardIterator';
import type { Move } from '../domain/Move';
import type { AxisRule } from './Rule';
import { expectedTotal, findAnchor, runOf, valueAt, type Axis } from './axis';

/**
 * The run through the move's cell must add up to its clue's total.
 *
 * Walks back to the clue, then sums the whole run forward from it once, so
 * the result does not depend on where in the run the move lands.
 */
export class SumRule implements AxisRule {
  readonly id: string;
  readonly name: string;

  constructor(readonly axis: Axis) {
    this.id = `${axis}Sum`;
    this.name = `Sum of each ${axis} run equals its clue`;
  }

  isRuleBroken(iterator: BoardIterator, move: Move): boolean {
    const anchor = findAnchor(iterator, iterator.getCell(move.position), this.axis);
    const sumExpected = expectedTotal(anchor, this.axis);

    let sum = 0;
    for (const cell of runOf(iterator, anchor, this.axis)) {
      sum += valueAt(cell, move);
    }

    return sum !== sumExpected;
  }
}

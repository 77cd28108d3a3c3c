import type { BoardIterator } from '../domain/BoardIterator';
import type { Move } from '../domain/Move';
import type { Axis } from './axis';

/**
 * Puzzle rule.
 *
 * Notes:
 * - `isRuleBroken` must be a pure read of the iterator: rules keep no state
 *   between calls and never write to the board.
 * - The move's value is what counts at its position, whatever the board holds
 *   there (see `valueAt`).
 */
export interface Rule {
  /** Stable id used in rules files. */
  readonly id: string;
  /** Display name (for UI / debugging). */
  readonly name: string;

  isRuleBroken(iterator: BoardIterator, move: Move): boolean;
}

/** Rule that walks runs along one axis; boards are checked for anchored runs on that axis at load time. */
export interface AxisRule extends Rule {
  readonly axis: Axis;
}

export function isAxisRule(rule: Rule): rule is AxisRule {
  return 'axis' in rule;
}

import type { Position } from './Position';

/** A lookup or neighbour walk left the grid. */
export class OutOfBoundsError extends Error {
  constructor(public readonly position: Position) {
    super(`Position ${position.toString()} is outside the board.`);
    this.name = 'OutOfBoundsError';
  }
}

import type { Board } from '../domain/Board';
import type { Move } from '../domain/Move';
import type { Position } from '../domain/Position';
import type { Rule } from '../rules/Rule';

export const MAX_VALUE = 9;

export type MoveResult = {
  ok: boolean;
  message: string;
  /** Ids of the rules the move breaks (empty when the move was rejected). */
  broken: string[];
};

/**
 * One puzzle being played.
 *
 * `play` writes the value first and then runs every rule against the new
 * board; `check` runs the same rules speculatively without writing.
 */
export class Game {
  private current: Board;
  private moves = 0;
  private solved = false;

  constructor(
    readonly gameName: string,
    board: Board,
    private readonly rules: readonly Rule[],
  ) {
    this.current = board;
  }

  get board(): Board {
    return this.current;
  }

  get moveCount(): number {
    return this.moves;
  }

  get ruleIds(): string[] {
    return this.rules.map(r => r.id);
  }

  get isSolved(): boolean {
    return this.solved;
  }

  check(position: Position, value: number): MoveResult {
    const invalid = this.validate(position, value);
    if (invalid) return { ok: false, message: invalid, broken: [] };

    const broken = this.brokenRules(this.current, { position, value });
    return { ok: true, message: describe({ position, value }, broken), broken };
  }

  play(position: Position, value: number): MoveResult {
    if (this.solved) return { ok: false, message: 'Puzzle is already solved.', broken: [] };
    const invalid = this.validate(position, value);
    if (invalid) return { ok: false, message: invalid, broken: [] };

    const move: Move = { position, value };
    this.current = this.current.withValue(position, value);
    this.moves += 1;

    const broken = this.brokenRules(this.current, move);
    this.solved = broken.length === 0 && this.everyCellSettled();
    if (this.solved) return { ok: true, message: `Solved in ${this.moves} moves.`, broken };
    return { ok: true, message: describe(move, broken), broken };
  }

  private brokenRules(board: Board, move: Move): string[] {
    return this.rules.filter(r => r.isRuleBroken(board, move)).map(r => r.id);
  }

  private everyCellSettled(): boolean {
    const cells = this.current.playableCells();
    if (cells.some(c => c.value === 0)) return false;
    return cells.every(c => this.brokenRules(this.current, { position: c.position, value: c.value }).length === 0);
  }

  private validate(position: Position, value: number): string | null {
    if (!Number.isInteger(value) || value < 0 || value > MAX_VALUE) {
      return `Value must be an integer from 0 to ${MAX_VALUE}.`;
    }
    if (!Number.isInteger(position.row) || !Number.isInteger(position.column) || !this.current.contains(position)) {
      return `Position ${position.toString()} is outside the board.`;
    }
    if (this.current.getCell(position).kind !== 'playable') {
      return `Cell ${position.toString()} is a clue cell.`;
    }
    return null;
  }
}

function describe(move: Move, broken: string[]): string {
  const what = move.value === 0 ? `Cleared ${move.position.toString()}` : `Placed ${move.value} at ${move.position.toString()}`;
  return broken.length > 0 ? `${what}; breaks ${broken.join(', ')}.` : `${what}.`;
}

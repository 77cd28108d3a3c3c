export class Position {
  constructor(
    public readonly row: number,
    public readonly column: number,
  ) {}

  equals(other: Position): boolean {
    return this.row === other.row && this.column === other.column;
  }

  /** Key for Maps/Sets. */
  toKey(): string {
    return `${this.row},${this.column}`;
  }

  toString(): string {
    return `(${this.row}, ${this.column})`;
  }
}

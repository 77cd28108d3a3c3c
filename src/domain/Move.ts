import type { Position } from './Position';

export type Move = {
  readonly position: Position;
  readonly value: number;
};

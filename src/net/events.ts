import type { MoveResult } from '../game/Game';
import type { PublicState } from './dto';

export interface ServerToClientEvents {
  state: (state: PublicState) => void;
  errorMsg: (err: { message: string }) => void;
  checkResult: (result: MoveResult) => void;
}

/** Payloads are validated in ./payload before use. */
export interface ClientToServerEvents {
  setName: (payload: unknown) => void;
  move: (payload: unknown) => void;
  check: (payload: unknown) => void;
}

export type InterServerEvents = Record<string, never>;

export interface SocketData {
  roomId: string;
}

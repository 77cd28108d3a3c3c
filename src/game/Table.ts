import { Player } from './Player';
import { Game, type MoveResult } from './Game';
import type { GameDefinition } from '../conf/ConfigurationReader';
import type { Position } from '../domain/Position';

export const MAX_PLAYERS = 8;

/** One room: a shared puzzle that every connected player writes into. */
export class Table {
  readonly game: Game;
  private readonly players = new Map<string, Player>();

  message = 'Waiting for players…';

  lastActiveMs: number = Date.now();

  constructor(def: GameDefinition) {
    this.game = new Game(def.gameName, def.board, def.rules);
  }

  touch() {
    this.lastActiveMs = Date.now();
  }

  get playerList(): Player[] {
    return [...this.players.values()];
  }

  joinOrReconnect(params: { clientId: string; socketId: string }): { ok: boolean; message?: string } {
    const { clientId, socketId } = params;

    // Existing clientId => reconnect
    const existing = this.players.get(clientId);
    if (existing) {
      existing.socketId = socketId;
      existing.online = true;
      existing.lastSeenMs = Date.now();
      this.touch();
      return { ok: true };
    }

    if (this.players.size >= MAX_PLAYERS) {
      return { ok: false, message: `Room is full (${MAX_PLAYERS} players).` };
    }

    const player = new Player(clientId, socketId, `Player ${this.players.size + 1}`);
    this.players.set(clientId, player);
    this.message = `${player.name} joined (${this.players.size}/${MAX_PLAYERS}).`;
    this.touch();
    return { ok: true };
  }

  setName(socketId: string, name: string) {
    const p = this.findPlayer(socketId);
    if (p) {
      p.name = name;
      p.lastSeenMs = Date.now();
      this.touch();
    }
  }

  markOffline(socketId: string) {
    const p = this.findPlayer(socketId);
    if (!p) return;
    p.online = false;
    p.lastSeenMs = Date.now();
    this.touch();
  }

  play(socketId: string, position: Position, value: number): MoveResult {
    const p = this.findPlayer(socketId);
    if (!p) return { ok: false, message: 'Join the room before playing.', broken: [] };

    const r = this.game.play(position, value);
    if (r.ok) this.message = `${p.name}: ${r.message}`;
    p.lastSeenMs = Date.now();
    this.touch();
    return r;
  }

  check(socketId: string, position: Position, value: number): MoveResult {
    if (!this.findPlayer(socketId)) return { ok: false, message: 'Join the room before playing.', broken: [] };
    return this.game.check(position, value);
  }

  findPlayer(socketId: string): Player | null {
    for (const p of this.players.values()) {
      if (p.socketId === socketId) return p;
    }
    return null;
  }
}

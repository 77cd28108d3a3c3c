import type { ConfigurationReader } from '../conf/ConfigurationReader';
import { Table } from '../game/Table';

export class RoomManager {
  private rooms = new Map<string, Table>();

  constructor(private ttlMs: number, private reader: ConfigurationReader) {}

  /** Existing room, or a new one playing `gameName`. Throws GameConfigurationError for unknown games. */
  get(roomId: string, gameName: string): Table {
    let t = this.rooms.get(roomId);
    if (!t) {
      t = new Table(this.reader.readGame(gameName));
      this.rooms.set(roomId, t);
      console.log(`[nikoli-server] room ${roomId} created (${gameName})`);
    }
    return t;
  }

  find(roomId: string): Table | undefined {
    return this.rooms.get(roomId);
  }

  cleanup(now: number = Date.now()) {
    for (const [id, table] of this.rooms.entries()) {
      if (now - table.lastActiveMs > this.ttlMs) {
        this.rooms.delete(id);
      }
    }
  }

  get size(): number {
    return this.rooms.size;
  }
}

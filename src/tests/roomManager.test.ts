import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { ConfigurationReader } from '../conf/ConfigurationReader';
import { GameConfigurationNotFoundError } from '../conf/errors';
import { RoomManager } from '../rooms/RoomManager';

describe('RoomManager', () => {
  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  const reader = new ConfigurationReader();

  it('creates a room once and reuses it', () => {
    const rooms = new RoomManager(1000, reader);
    const t = rooms.get('r1', 'kakuro');
    expect(rooms.get('r1', 'kakuro')).toBe(t);
    expect(rooms.find('r1')).toBe(t);
    expect(rooms.size).toBe(1);
    expect(console.log).toHaveBeenCalledWith('[nikoli-server] room r1 created (kakuro)');
  });

  it('fails for games without configuration', () => {
    const rooms = new RoomManager(1000, reader);
    expect(() => rooms.get('r1', 'nope')).toThrow(GameConfigurationNotFoundError);
    expect(rooms.size).toBe(0);
  });

  it('drops rooms idle longer than the ttl', () => {
    const rooms = new RoomManager(1000, reader);
    const t = rooms.get('old', 'kakuro');
    rooms.get('fresh', 'kakuro').lastActiveMs = t.lastActiveMs + 5000;

    rooms.cleanup(t.lastActiveMs + 2000);
    expect(rooms.find('old')).toBeUndefined();
    expect(rooms.find('fresh')).toBeDefined();
  });
});

import { describe, expect, it } from 'vitest';
import { readConfig } from '../config';
import { DEFAULT_CONFIG_DIR } from '../conf/ConfigurationReader';

describe('readConfig', () => {
  it('falls back to defaults', () => {
    expect(readConfig({})).toEqual({
      port: 5174,
      configDir: DEFAULT_CONFIG_DIR,
      roomTtlMs: 30 * 24 * 60 * 60 * 1000,
      defaultGame: 'kakuro',
    });
  });

  it('reads the environment', () => {
    const c = readConfig({ PORT: '8080', NIKOLI_CONFIG_DIR: '/srv/puzzles', ROOM_TTL_MS: '60000', NIKOLI_DEFAULT_GAME: 'sums' });
    expect(c).toEqual({ port: 8080, configDir: '/srv/puzzles', roomTtlMs: 60000, defaultGame: 'sums' });
  });

  it('ignores numbers it cannot use', () => {
    expect(readConfig({ PORT: 'abc', ROOM_TTL_MS: '-5' })).toMatchObject({ port: 5174, roomTtlMs: 30 * 24 * 60 * 60 * 1000 });
  });
});

import { DEFAULT_CONFIG_DIR } from './conf/ConfigurationReader';

export type ServerConfig = {
  port: number;
  configDir: string;
  roomTtlMs: number;
  defaultGame: string;
};

// 30 days offline retention
const DEFAULT_TTL_MS = 30 * 24 * 60 * 60 * 1000;

function numberOr(raw: string | undefined, fallback: number): number {
  const n = Number(raw ?? '');
  return raw && Number.isFinite(n) && n > 0 ? n : fallback;
}

export function readConfig(env: NodeJS.ProcessEnv = process.env): ServerConfig {
  return {
    port: numberOr(env.PORT, 5174),
    configDir: env.NIKOLI_CONFIG_DIR || DEFAULT_CONFIG_DIR,
    roomTtlMs: numberOr(env.ROOM_TTL_MS, DEFAULT_TTL_MS),
    defaultGame: env.NIKOLI_DEFAULT_GAME || 'kakuro',
  };
}

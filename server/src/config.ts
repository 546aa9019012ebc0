// ============================================
// Server Configuration
// Environment → typed settings
// ============================================

import { ENGINE_CONFIG } from '@asteroid-tap/shared';

export interface ServerConfig {
  port: number;
  logDir: string;
  logLevel: string;
  isDev: boolean;
  dataDir: string;
  // When set, every session uses this seed (reproducible runs)
  fixedSeed: number | undefined;
  maxFrameDeltaMs: number;
}

type Env = Record<string, string | undefined>;

function readInt(value: string | undefined, fallback: number): number {
  if (value === undefined || value.trim() === '') return fallback;
  const parsed = Number.parseInt(value, 10);
  return Number.isFinite(parsed) ? parsed : fallback;
}

function readPositiveNumber(value: string | undefined, fallback: number): number {
  if (value === undefined || value.trim() === '') return fallback;
  const parsed = Number(value);
  return Number.isFinite(parsed) && parsed > 0 ? parsed : fallback;
}

export function loadServerConfig(env: Env): ServerConfig {
  const useFixedSeed = env.FIXED_SEED === 'true';
  return {
    port: readInt(env.PORT, 3000),
    logDir: env.LOG_DIR || 'logs',
    logLevel: env.LOG_LEVEL || 'info',
    isDev: env.NODE_ENV !== 'production',
    dataDir: env.DATA_DIR || 'data',
    fixedSeed: useFixedSeed ? readInt(env.FIXED_SEED_VALUE, 42) : undefined,
    maxFrameDeltaMs: readPositiveNumber(env.MAX_FRAME_DELTA_MS, ENGINE_CONFIG.maxFrameDeltaMs),
  };
}

export const serverConfig = loadServerConfig(process.env);

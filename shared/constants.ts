// ============================================
// Game Constants & Configuration
// ============================================

/**
 * Classic mode tunables.
 * Distances in pixels, speeds in pixels per second, times in milliseconds.
 */
export interface ClassicConfig {
  width: number;
  height: number;
  // Fixed spawn cooldown. When set, the [min, max] range is ignored.
  spawnCooldownMs?: number;
  spawnCooldownMinMs: number;
  spawnCooldownMaxMs: number;
  baseAsteroidSpeed: number;
  asteroidRadius: number;
  asteroidAngularVelocity: number; // rad/s
  escapePadding: number;
  scorePerHit: number;
  defaultSpeedLevel: number;
  defaultDifficultyProgression: boolean;
  defaultUiOpacity: number;
}

export const CLASSIC_CONFIG: ClassicConfig = {
  width: 360,
  height: 640,
  spawnCooldownMinMs: 200,
  spawnCooldownMaxMs: 500,
  baseAsteroidSpeed: 72,
  asteroidRadius: 18,
  asteroidAngularVelocity: 0.4,
  escapePadding: 120,
  scorePerHit: 10,
  defaultSpeedLevel: 3,
  defaultDifficultyProgression: true,
  defaultUiOpacity: 1,
};

export interface EngineConfig {
  // Upper bound for a single simulation step. A longer gap between ticks
  // (process suspended, debugger stop) is simulated as this much time.
  maxFrameDeltaMs: number;
  // Nominal cadence of the host's tick timer
  tickIntervalMs: number;
}

export const ENGINE_CONFIG: EngineConfig = {
  maxFrameDeltaMs: 250,
  tickIntervalMs: 1000 / 60,
};

// Base difficulty multiplier per speed level (index 0 = level 1)
export const SPEED_LEVEL_MULTIPLIERS = [1, 1.5, 2, 3, 4] as const;

export const MIN_SPEED_LEVEL = 1;
export const MAX_SPEED_LEVEL = SPEED_LEVEL_MULTIPLIERS.length;

// Progression adds this much every DIFFICULTY_STEP_SECONDS of run time
export const DIFFICULTY_STEP = 0.1;
export const DIFFICULTY_STEP_SECONDS = 10;
export const MAX_DIFFICULTY_MULTIPLIER = 3.0;

export const MIN_UI_OPACITY = 0.2;
export const MAX_UI_OPACITY = 1;

export const HIT_PARTICLE_KIND = 'asteroid-hit';

// Storage keys
export const STORAGE_KEYS = {
  LAST_RESULT: 'classic.lastResult',
  SETTINGS: 'classic.settings',
} as const;

export function clamp(value: number, min: number, max: number): number {
  return Math.min(max, Math.max(min, value));
}

export function clampSpeedLevel(level: number): number {
  return clamp(Math.round(level), MIN_SPEED_LEVEL, MAX_SPEED_LEVEL);
}

export function clampUiOpacity(opacity: number): number {
  return clamp(opacity, MIN_UI_OPACITY, MAX_UI_OPACITY);
}

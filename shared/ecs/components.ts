// ============================================
// ECS Component Interfaces
// All component data shapes for Classic mode
// ============================================

/**
 * Transform - where an entity is and how it is turned.
 * Units: pixels, rotation in radians. Origin is the top-left of the play area.
 */
export interface TransformComponent {
  x: number;
  y: number;
  rotation: number;
}

/**
 * Velocity - linear and angular speed.
 * Units: pixels per second, radians per second.
 */
export interface VelocityComponent {
  vx: number;
  vy: number;
  angularVelocity: number;
}

/**
 * Circular hit area centred on the Transform.
 */
export interface ColliderCircleComponent {
  radius: number;
}

/**
 * How far past the play rectangle an entity may travel before it counts as
 * escaped.
 */
export interface EscapeBoundsComponent {
  padding: number;
}

/**
 * Marker for the single live asteroid. No fields.
 */
export type AsteroidTagComponent = Record<string, never>;

/**
 * Per-run counters. Lives on the dedicated run entity for the whole run.
 * elapsed and spawnCooldown are milliseconds.
 */
export interface RunStatsComponent {
  spawned: number;
  escaped: number;
  hits: number;
  misses: number;
  score: number;
  difficultyMultiplier: number;
  elapsed: number;
  spawnCooldown: number;
}

/**
 * Component schema for the Classic world.
 */
export type ClassicComponents = {
  Transform: TransformComponent;
  Velocity: VelocityComponent;
  ColliderCircle: ColliderCircleComponent;
  EscapeBounds: EscapeBoundsComponent;
  AsteroidTag: AsteroidTagComponent;
  RunStats: RunStatsComponent;
};

export function createRunStats(): RunStatsComponent {
  return {
    spawned: 0,
    escaped: 0,
    hits: 0,
    misses: 0,
    score: 0,
    difficultyMultiplier: 1,
    elapsed: 0,
    spawnCooldown: 0,
  };
}

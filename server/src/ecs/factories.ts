// ============================================
// Entity Factories
// Creating Classic entities and reading the run entity
// ============================================

import {
  Components,
  createRunStats,
  type EntityId,
  type RunStatsComponent,
} from '@asteroid-tap/shared';
import type { ClassicWorld } from './types';

export interface AsteroidSpec {
  x: number;
  y: number;
  speed: number; // px/s, straight down
  angularVelocity: number;
  radius: number;
  escapePadding: number;
}

/**
 * Create the run entity carrying a zeroed RunStats.
 */
export function createRunEntity(world: ClassicWorld): EntityId {
  const entity = world.createEntity();
  world.attachComponent(entity, Components.RunStats, createRunStats());
  return entity;
}

/**
 * RunStats of the run entity. Throws MissingRequiredComponentError if the
 * run entity lost it.
 */
export function requireRunStats(world: ClassicWorld, runEntity: EntityId): RunStatsComponent {
  return world.requireComponent(runEntity, Components.RunStats);
}

/**
 * Create an asteroid moving straight down.
 */
export function createAsteroid(world: ClassicWorld, spec: AsteroidSpec): EntityId {
  const entity = world.createEntity();
  world.attachComponent(entity, Components.AsteroidTag, {});
  world.attachComponent(entity, Components.Transform, { x: spec.x, y: spec.y, rotation: 0 });
  world.attachComponent(entity, Components.Velocity, {
    vx: 0,
    vy: spec.speed,
    angularVelocity: spec.angularVelocity,
  });
  world.attachComponent(entity, Components.ColliderCircle, { radius: spec.radius });
  world.attachComponent(entity, Components.EscapeBounds, { padding: spec.escapePadding });
  return entity;
}

export function getAsteroids(world: ClassicWorld): EntityId[] {
  return world.query(Components.AsteroidTag);
}

export function hasAsteroid(world: ClassicWorld): boolean {
  return getAsteroids(world).length > 0;
}

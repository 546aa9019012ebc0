// ============================================
// ECS - Entity Component System
// ============================================

// Core types, classes, and components from shared package
export { World, ComponentStore, Components } from '@asteroid-tap/shared';
export type {
  EntityId,
  ComponentType,
  // Component interfaces
  TransformComponent,
  VelocityComponent,
  ColliderCircleComponent,
  EscapeBoundsComponent,
  AsteroidTagComponent,
  RunStatsComponent,
  ClassicComponents,
} from '@asteroid-tap/shared';

export type { ClassicWorld } from './types';

// Factories
export {
  createRunEntity,
  requireRunStats,
  createAsteroid,
  getAsteroids,
  hasAsteroid,
  type AsteroidSpec,
} from './factories';

// Systems
export * from './systems';

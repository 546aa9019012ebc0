// ============================================
// ECS Package Exports
// ============================================

// Core ECS classes
export { World } from './World';
export { ComponentStore } from './Component';
export { GameError, InvalidEntityError, MissingRequiredComponentError } from './errors';

// Types and constants
export { Components, SLOT_CAPACITY, makeEntityId, entitySlot, entityGeneration } from './types';
export type { EntityId, ComponentType, ComponentSchema } from './types';

// Component interfaces
export { createRunStats } from './components';
export type {
  TransformComponent,
  VelocityComponent,
  ColliderCircleComponent,
  EscapeBoundsComponent,
  AsteroidTagComponent,
  RunStatsComponent,
  ClassicComponents,
} from './components';

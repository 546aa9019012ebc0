// ============================================
// ECS Core Types
// ============================================

/**
 * Entity ID - an opaque number.
 * Packs a slot index (low bits) and the slot's generation (high bits), so an
 * id that was removed is never handed out again even when its slot is reused.
 */
export type EntityId = number;

/**
 * Number of addressable slots. Slot index = id % SLOT_CAPACITY.
 */
export const SLOT_CAPACITY = 2 ** 20;

export function makeEntityId(slot: number, generation: number): EntityId {
  return generation * SLOT_CAPACITY + slot;
}

export function entitySlot(id: EntityId): number {
  return id % SLOT_CAPACITY;
}

export function entityGeneration(id: EntityId): number {
  return Math.floor(id / SLOT_CAPACITY);
}

/**
 * Component schema - maps component type names to their data shapes.
 * A World is parameterised by one of these; the keys are the query keys.
 */
export type ComponentSchema = Record<string, object>;

/**
 * Standard component types used by Classic mode.
 * Using const object for type safety while keeping string values.
 */
export const Components = {
  Transform: 'Transform',
  Velocity: 'Velocity',
  ColliderCircle: 'ColliderCircle',
  EscapeBounds: 'EscapeBounds',
  AsteroidTag: 'AsteroidTag',
  RunStats: 'RunStats',
} as const;

export type ComponentType = (typeof Components)[keyof typeof Components];

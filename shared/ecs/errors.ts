// ============================================
// ECS Errors
// ============================================

import type { EntityId } from './types';

/**
 * Base class for errors raised by the simulation core.
 */
export class GameError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/**
 * An operation referenced an entity that was removed or never existed.
 */
export class InvalidEntityError extends GameError {
  constructor(
    readonly entity: EntityId,
    operation: string,
  ) {
    super(`${operation}: entity ${entity} does not exist`);
  }
}

/**
 * A component that must be present is missing. This is a programming error
 * (an invariant was broken), not something callers are expected to recover
 * from.
 */
export class MissingRequiredComponentError extends GameError {
  constructor(
    readonly entity: EntityId,
    readonly componentType: string,
  ) {
    super(`Entity ${entity} is missing required component ${componentType}`);
  }
}

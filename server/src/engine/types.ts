// ============================================
// Engine Types
// ============================================

import type { ComponentSchema, GameEventBus, SeededRandom, World } from '@asteroid-tap/shared';
import type { KeyValueStorage } from '../storage';
import type { Clock } from './clock';

/**
 * Everything a mode may touch. Built by the engine; the world instance is
 * replaced when a run starts again after quit.
 */
export interface GameContext<S extends ComponentSchema> {
  world: World<S>;
  bus: GameEventBus;
  clock: Clock;
  rng: SeededRandom;
  storage: KeyValueStorage;
}

/**
 * A game mode plugged into the engine.
 *
 * onExit returns the pending persistence of the run; the owner awaits it
 * before discarding the world.
 */
export interface GameMode<S extends ComponentSchema> {
  readonly id: string;
  onEnter(context: GameContext<S>): void;
  onUpdate(context: GameContext<S>, deltaMs: number): void;
  onExit(context: GameContext<S>): Promise<void>;
}

// ============================================
// System Context
// State shared by the Classic systems for one run
// ============================================

import type {
  ClassicConfig,
  EntityId,
  GameEventBus,
  GameSettings,
  LifecycleState,
  PointerDownEvent,
  RenderFrame,
  SeededRandom,
} from '@asteroid-tap/shared';
import type { Clock } from '../../engine/clock';
import type { ClassicWorld } from '../types';

/**
 * SystemContext - what every Classic system receives.
 *
 * Created by ClassicMode when a run is entered and reused for every tick of
 * that run. `settings` and `lifecycle` are updated in place by the mode's
 * event handlers; `pendingPointers` is filled by the pointer handler and
 * drained by HitSystem.
 */
export interface SystemContext {
  world: ClassicWorld;
  bus: GameEventBus;
  clock: Clock;
  rng: SeededRandom;
  config: ClassicConfig;

  // The entity carrying RunStats
  runEntity: EntityId;

  // Current tunables
  settings: GameSettings;

  // Last lifecycle state seen on the bus
  lifecycle: LifecycleState;

  // Pointer taps received since the previous tick
  pendingPointers: PointerDownEvent[];

  // Most recently published frame; undefined until the first one
  lastFrame: RenderFrame | undefined;
}

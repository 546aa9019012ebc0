// ============================================
// Game Engine
// Lifecycle state machine + fixed-tick loop
// ============================================

import {
  ENGINE_CONFIG,
  EventBus,
  World,
  clamp,
  type ComponentSchema,
  type EngineConfig,
  type GameEvent,
  type GameEventBus,
  type LifecycleState,
  type SeededRandom,
  type SubscriptionToken,
} from '@asteroid-tap/shared';
import { logger, logLifecycleTransition } from '../logger';
import type { KeyValueStorage } from '../storage';
import type { Clock } from './clock';
import type { GameContext, GameMode } from './types';

export interface GameEngineOptions<S extends ComponentSchema> {
  mode: GameMode<S>;
  clock: Clock;
  rng: SeededRandom;
  storage: KeyValueStorage;
  bus?: GameEventBus;
  config?: Partial<EngineConfig>;
}

/**
 * GameEngine - owns the world, the bus and the active mode.
 *
 * Intents arrive as events on the bus (startRequested, pauseToggleRequested,
 * quitRequested). Each accepted transition runs its side effect, then
 * updates the state, then publishes stateChanged. Intents that make no sense
 * in the current state are ignored.
 */
export class GameEngine<S extends ComponentSchema> {
  private readonly mode: GameMode<S>;
  private readonly context: GameContext<S>;
  private readonly config: EngineConfig;
  private readonly subscriptions: SubscriptionToken[];

  private currentState: LifecycleState = 'idle';
  private lastTickMs: number;
  private ticks = 0;
  private exitTask: Promise<void> = Promise.resolve();
  private disposed = false;

  constructor(options: GameEngineOptions<S>) {
    this.mode = options.mode;
    this.config = { ...ENGINE_CONFIG, ...options.config };
    this.context = {
      world: new World<S>(),
      bus: options.bus ?? new EventBus<GameEvent>(),
      clock: options.clock,
      rng: options.rng,
      storage: options.storage,
    };
    this.lastTickMs = options.clock.nowMs();

    const bus = this.context.bus;
    this.subscriptions = [
      bus.subscribe('startRequested', () => this.handleStart()),
      bus.subscribe('pauseToggleRequested', () => this.handlePauseToggle()),
      bus.subscribe('quitRequested', () => this.handleQuit()),
    ];
  }

  get state(): LifecycleState {
    return this.currentState;
  }

  get bus(): GameEventBus {
    return this.context.bus;
  }

  get world(): World<S> {
    return this.context.world;
  }

  get tickCount(): number {
    return this.ticks;
  }

  get isDisposed(): boolean {
    return this.disposed;
  }

  /**
   * Pending persistence of the most recent mode exit.
   */
  get lastExitTask(): Promise<void> {
    return this.exitTask;
  }

  /**
   * Advance the simulation by the clock time since the previous tick.
   * The step is clamped to [0, maxFrameDeltaMs]. Time spent outside
   * `running` is consumed without being simulated.
   */
  tick(): void {
    if (this.disposed) return;

    const now = this.context.clock.nowMs();
    const deltaMs = clamp(now - this.lastTickMs, 0, this.config.maxFrameDeltaMs);
    this.lastTickMs = now;

    if (this.currentState !== 'running') return;

    this.ticks++;
    this.mode.onUpdate(this.context, deltaMs);
  }

  /**
   * Exit the mode if a run is in progress, detach from the bus and stop
   * ticking. Idempotent.
   */
  dispose(): Promise<void> {
    if (this.disposed) return this.exitTask;
    this.disposed = true;

    if (this.currentState === 'running' || this.currentState === 'paused') {
      this.exitTask = this.mode.onExit(this.context);
    }

    for (const subscription of this.subscriptions) {
      subscription.cancel();
    }
    this.context.bus.clear();
    return this.exitTask;
  }

  private handleStart(): void {
    if (this.currentState !== 'idle' && this.currentState !== 'quit') {
      this.ignore('startRequested');
      return;
    }
    if (this.currentState === 'quit') {
      this.context.world = new World<S>();
    }
    // Time spent before the start is not part of the run
    this.lastTickMs = this.context.clock.nowMs();
    this.mode.onEnter(this.context);
    this.transition('running');
  }

  private handlePauseToggle(): void {
    if (this.currentState === 'running') {
      this.transition('paused');
    } else if (this.currentState === 'paused') {
      this.transition('running');
    } else {
      this.ignore('pauseToggleRequested');
    }
  }

  private handleQuit(): void {
    if (this.currentState !== 'running' && this.currentState !== 'paused') {
      this.ignore('quitRequested');
      return;
    }
    this.exitTask = this.mode.onExit(this.context);
    this.transition('quit');
  }

  private transition(next: LifecycleState): void {
    const previous = this.currentState;
    this.currentState = next;
    this.context.bus.publish({ type: 'stateChanged', previous, current: next });
    logLifecycleTransition(previous, next);
  }

  private ignore(intent: string): void {
    logger.debug(
      { event: 'intent_ignored', intent, state: this.currentState },
      `Ignored ${intent} in state ${this.currentState}`
    );
  }
}

// ============================================
// Classic Mode
// One asteroid at a time; tap it before it escapes
// ============================================

import {
  CLASSIC_CONFIG,
  STORAGE_KEYS,
  clampSpeedLevel,
  clampUiOpacity,
  decodeLastResult,
  encodeLastResult,
  type ClassicComponents,
  type ClassicConfig,
  type GameSettings,
  type LastResult,
  type RenderFrame,
  type SettingsUpdateRequestedEvent,
  type SubscriptionToken,
} from '@asteroid-tap/shared';
import type { GameContext, GameMode } from '../engine/types';
import {
  createClassicSystemRunner,
  createRunEntity,
  publishRenderFrame,
  requireRunStats,
  type SystemContext,
  type SystemRunner,
} from '../ecs';
import { logger, logRunFinished } from '../logger';

export function defaultSettings(config: ClassicConfig): GameSettings {
  return {
    uiOpacity: config.defaultUiOpacity,
    speedLevel: config.defaultSpeedLevel,
    difficultyProgression: config.defaultDifficultyProgression,
  };
}

function logPersistenceError(operation: 'load' | 'save', error: unknown) {
  logger.error(
    {
      event: 'last_result_persistence_error',
      operation,
      error: error instanceof Error ? error.message : String(error),
    },
    `Failed to ${operation} last result`
  );
}

/**
 * ClassicMode - drives the seven-system pipeline for one run.
 *
 * Entered on StartRequested, exited on QuitRequested. Between the two it
 * owns the run entity, its subscriptions on the bus, and the buffered
 * pointer taps.
 */
export class ClassicMode implements GameMode<ClassicComponents> {
  readonly id = 'classic';

  private readonly runner: SystemRunner = createClassicSystemRunner();
  private systemContext: SystemContext | null = null;
  private subscriptions: SubscriptionToken[] = [];

  private loadTask: Promise<LastResult | undefined> = Promise.resolve(undefined);
  private saveTask: Promise<void> = Promise.resolve();
  private loadedResult: LastResult | undefined;

  constructor(private readonly config: ClassicConfig = CLASSIC_CONFIG) {}

  /** Settles with the previous run's result, or undefined if none was stored. */
  get loadLastResultTask(): Promise<LastResult | undefined> {
    return this.loadTask;
  }

  /** Settles once the result of the last exited run is written. */
  get saveLastResultTask(): Promise<void> {
    return this.saveTask;
  }

  get lastLoadedResult(): LastResult | undefined {
    return this.loadedResult;
  }

  get lastFrame(): RenderFrame | undefined {
    return this.systemContext?.lastFrame;
  }

  get settings(): Readonly<GameSettings> | undefined {
    return this.systemContext?.settings;
  }

  get isEntered(): boolean {
    return this.systemContext !== null;
  }

  onEnter(context: GameContext<ClassicComponents>): void {
    const { world, bus } = context;

    const systemContext: SystemContext = {
      world,
      bus,
      clock: context.clock,
      rng: context.rng,
      config: this.config,
      runEntity: createRunEntity(world),
      settings: defaultSettings(this.config),
      lifecycle: 'idle',
      pendingPointers: [],
      lastFrame: undefined,
    };
    this.systemContext = systemContext;

    this.subscriptions = [
      bus.subscribe('pointerDown', (event) => {
        // Taps outside a running game are not gameplay input
        if (systemContext.lifecycle !== 'running') return;
        systemContext.pendingPointers.push(event);
      }),
      bus.subscribe('stateChanged', (event) => {
        systemContext.lifecycle = event.current;
        if (event.current !== 'running') {
          systemContext.pendingPointers.length = 0;
        }
        publishRenderFrame(systemContext);
      }),
      bus.subscribe('settingsUpdateRequested', (event) => {
        this.applySettings(systemContext, event);
      }),
    ];

    this.loadTask = this.loadLastResult(context);
    publishRenderFrame(systemContext);
  }

  onUpdate(_context: GameContext<ClassicComponents>, deltaMs: number): void {
    const systemContext = this.systemContext;
    if (!systemContext) return;

    const stats = requireRunStats(systemContext.world, systemContext.runEntity);
    stats.elapsed += deltaMs;
    this.runner.update(systemContext, deltaMs);
  }

  onExit(context: GameContext<ClassicComponents>): Promise<void> {
    const systemContext = this.systemContext;
    for (const subscription of this.subscriptions) {
      subscription.cancel();
    }
    this.subscriptions = [];
    this.systemContext = null;

    if (!systemContext) return this.saveTask;

    const stats = requireRunStats(systemContext.world, systemContext.runEntity);
    const result: LastResult = {
      spawned: stats.spawned,
      escaped: stats.escaped,
      hits: stats.hits,
      misses: stats.misses,
      score: stats.score,
      difficultyMultiplier: stats.difficultyMultiplier,
      timeMs: stats.elapsed,
    };
    logRunFinished(result);

    this.saveTask = context.storage
      .write(STORAGE_KEYS.LAST_RESULT, encodeLastResult(result))
      .catch((error: unknown) => logPersistenceError('save', error));
    return this.saveTask;
  }

  private applySettings(systemContext: SystemContext, event: SettingsUpdateRequestedEvent): void {
    const current = systemContext.settings;
    systemContext.settings = {
      uiOpacity: Number.isFinite(event.uiOpacity) ? clampUiOpacity(event.uiOpacity) : current.uiOpacity,
      speedLevel: Number.isFinite(event.speedLevel) ? clampSpeedLevel(event.speedLevel) : current.speedLevel,
      difficultyProgression: event.difficultyProgression,
    };
  }

  private async loadLastResult(context: GameContext<ClassicComponents>): Promise<LastResult | undefined> {
    try {
      const raw = await context.storage.read(STORAGE_KEYS.LAST_RESULT);
      this.loadedResult = decodeLastResult(raw);
      return this.loadedResult;
    } catch (error) {
      logPersistenceError('load', error);
      return undefined;
    }
  }
}

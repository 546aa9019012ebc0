// ============================================
// Game Session
// One connected UI shell driving its own engine
// ============================================

import {
  CLASSIC_CONFIG,
  ENGINE_CONFIG,
  EventBus,
  SeededRandom,
  STORAGE_KEYS,
  clampSpeedLevel,
  clampUiOpacity,
  decodeLastResult,
  decodeSettings,
  encodeSettings,
  formatHud,
  summarizeLastResult,
  type ClassicComponents,
  type ClassicConfig,
  type EngineConfig,
  type GameEvent,
  type GameEventBus,
  type GameSettings,
  type LifecycleState,
  type ServerMessage,
} from '@asteroid-tap/shared';
import { GameEngine } from '../engine/GameEngine';
import { systemClock, type Clock } from '../engine/clock';
import { ClassicMode, defaultSettings } from '../modes/ClassicMode';
import { logger, logSessionEnded, logSessionStarted } from '../logger';
import type { KeyValueStorage } from '../storage';
import { parseClientMessage } from './validation';

/**
 * The shell side of a session: something that can receive server messages.
 * In production a Socket.IO socket; in tests a recorder.
 */
export interface ShellConnection {
  readonly id: string;
  send(message: ServerMessage): void;
}

export interface GameSessionOptions {
  connection: ShellConnection;
  storage: KeyValueStorage;
  seed: number;
  clock?: Clock;
  classicConfig?: ClassicConfig;
  engineConfig?: Partial<EngineConfig>;
}

interface SessionRuntime {
  engine: GameEngine<ClassicComponents>;
  mode: ClassicMode;
}

function errorFields(error: unknown) {
  return {
    error: error instanceof Error ? error.message : String(error),
    stack: error instanceof Error ? error.stack : undefined,
  };
}

/**
 * GameSession - owns the engine, the Classic mode and the tick timer for one
 * shell.
 *
 * Shell messages become bus events; bus events become shell messages. A quit
 * tears the engine down once the run is persisted and builds a fresh one in
 * `idle`, so the shell can start another run.
 */
export class GameSession {
  private readonly connection: ShellConnection;
  private readonly storage: KeyValueStorage;
  private readonly clock: Clock;
  private readonly rng: SeededRandom;
  private readonly classicConfig: ClassicConfig;
  private readonly engineConfig: EngineConfig;

  private runtime: SessionRuntime;
  private settings: GameSettings;
  private timer: ReturnType<typeof setInterval> | null = null;
  private quitTask: Promise<void> = Promise.resolve();
  private settingsTask: Promise<void> = Promise.resolve();
  private stopped = false;
  private quitting = false;

  constructor(options: GameSessionOptions) {
    this.connection = options.connection;
    this.storage = options.storage;
    this.clock = options.clock ?? systemClock;
    this.rng = new SeededRandom(options.seed);
    this.classicConfig = options.classicConfig ?? CLASSIC_CONFIG;
    this.engineConfig = { ...ENGINE_CONFIG, ...options.engineConfig };
    this.settings = defaultSettings(this.classicConfig);
    this.runtime = this.createRuntime();
  }

  get id(): string {
    return this.connection.id;
  }

  get seed(): number {
    return this.rng.seed;
  }

  get state(): LifecycleState {
    return this.runtime.engine.state;
  }

  get currentEngine(): GameEngine<ClassicComponents> {
    return this.runtime.engine;
  }

  get currentMode(): ClassicMode {
    return this.runtime.mode;
  }

  get currentSettings(): Readonly<GameSettings> {
    return this.settings;
  }

  /** True from an accepted quit until the fresh engine is in place. */
  get isQuitting(): boolean {
    return this.quitting;
  }

  /** Settles when the most recent quit has finished rebuilding. */
  get pendingQuit(): Promise<void> {
    return this.quitTask;
  }

  /** Settles when the most recent settings update is persisted. */
  get pendingSettingsSave(): Promise<void> {
    return this.settingsTask;
  }

  get isTicking(): boolean {
    return this.timer !== null;
  }

  /**
   * Load persisted settings and the last result, send both to the shell,
   * then start ticking at the engine's cadence.
   */
  async start(): Promise<void> {
    logSessionStarted(this.id, this.seed);

    try {
      const raw = await this.storage.read(STORAGE_KEYS.SETTINGS);
      this.settings = decodeSettings(raw, this.settings) ?? this.settings;
    } catch (error) {
      logger.error({ event: 'settings_load_error', sessionId: this.id, ...errorFields(error) }, 'Failed to load settings');
    }
    this.connection.send({ type: 'settings', settings: { ...this.settings } });
    await this.sendLastResult();

    if (this.stopped || this.timer) return;
    this.timer = setInterval(() => this.runTimerTick(), this.engineConfig.tickIntervalMs);
  }

  /**
   * Handle one raw shell message. Malformed messages are logged and dropped.
   */
  receive(type: string, payload: unknown): void {
    const message = parseClientMessage(type, payload);
    if (!message) {
      logger.warn({ event: 'invalid_client_message', sessionId: this.id, messageType: type }, `Dropped malformed ${type} message`);
      return;
    }

    // The outgoing engine takes no more intents; settings still apply
    if (this.quitting && message.type !== 'updateSettings') {
      logger.debug({ event: 'intent_ignored', sessionId: this.id, messageType: message.type }, `Ignored ${message.type} while quitting`);
      return;
    }

    const bus = this.runtime.engine.bus;
    switch (message.type) {
      case 'startGame':
        bus.publish({ type: 'startRequested' });
        break;
      case 'togglePause':
        bus.publish({ type: 'pauseToggleRequested' });
        break;
      case 'quitGame':
        this.quitTask = this.quit().catch((error: unknown) => {
          logger.error({ event: 'session_quit_error', sessionId: this.id, ...errorFields(error) }, 'Quit failed');
        });
        break;
      case 'pointerDown':
        bus.publish({ type: 'pointerDown', x: message.x, y: message.y, timestampMs: this.clock.nowMs() });
        break;
      case 'updateSettings':
        this.updateSettings({
          uiOpacity: clampUiOpacity(message.uiOpacity),
          speedLevel: clampSpeedLevel(message.speedLevel),
          difficultyProgression: message.difficultyProgression,
        });
        break;
    }
  }

  /**
   * Advance the engine by one tick.
   */
  tick(): void {
    this.runtime.engine.tick();
  }

  /**
   * Stop ticking and tear the engine down. A run in progress is exited and
   * persisted; the returned promise settles when that write has.
   */
  stop(reason = 'stopped'): Promise<void> {
    this.clearTimer();
    if (this.stopped) return this.runtime.engine.lastExitTask;
    this.stopped = true;
    logSessionEnded(this.id, reason);
    return this.runtime.engine.dispose();
  }

  private async quit(): Promise<void> {
    const { engine } = this.runtime;
    engine.bus.publish({ type: 'quitRequested' });
    if (engine.state !== 'quit') return;

    this.quitting = true;
    try {
      await engine.lastExitTask;
      await engine.dispose();
      if (this.stopped) return;

      await this.sendLastResult();
      this.runtime = this.createRuntime();
      this.connection.send({ type: 'stateChanged', previous: 'quit', current: 'idle' });
    } finally {
      this.quitting = false;
    }
  }

  private updateSettings(settings: GameSettings): void {
    this.settings = settings;
    this.runtime.engine.bus.publish({ type: 'settingsUpdateRequested', ...settings });
    this.connection.send({ type: 'settings', settings: { ...settings } });

    this.settingsTask = this.storage
      .write(STORAGE_KEYS.SETTINGS, encodeSettings(settings))
      .catch((error: unknown) => {
        logger.error({ event: 'settings_save_error', sessionId: this.id, ...errorFields(error) }, 'Failed to save settings');
      });
  }

  private async sendLastResult(): Promise<void> {
    try {
      const result = decodeLastResult(await this.storage.read(STORAGE_KEYS.LAST_RESULT));
      this.connection.send({
        type: 'lastResult',
        result: result ?? null,
        summary: result ? summarizeLastResult(result) : null,
      });
    } catch (error) {
      logger.error({ event: 'last_result_load_error', sessionId: this.id, ...errorFields(error) }, 'Failed to load last result');
    }
  }

  /**
   * Fresh bus, mode and engine in `idle`, wired to the shell.
   */
  private createRuntime(): SessionRuntime {
    const bus: GameEventBus = new EventBus<GameEvent>();
    this.forwardToShell(bus);

    const mode = new ClassicMode(this.classicConfig);
    const engine = new GameEngine<ClassicComponents>({
      mode,
      bus,
      clock: this.clock,
      rng: this.rng,
      storage: this.storage,
      config: this.engineConfig,
    });
    return { engine, mode };
  }

  private forwardToShell(bus: GameEventBus): void {
    const send = (message: ServerMessage) => this.connection.send(message);

    bus.subscribe('stateChanged', (event) => {
      // A new run starts on the mode's defaults; the player's settings win
      if (event.current === 'running' && (event.previous === 'idle' || event.previous === 'quit')) {
        bus.publish({ type: 'settingsUpdateRequested', ...this.settings });
      }
      send({ type: 'stateChanged', previous: event.previous, current: event.current });
    });
    bus.subscribe('renderFrameReady', (event) => send({ type: 'renderFrame', frame: event.frame }));
    bus.subscribe('statsUpdated', (event) =>
      send({ type: 'statsUpdated', snapshot: event.snapshot, hud: formatHud(event.snapshot) })
    );
    bus.subscribe('asteroidDestroyed', () => send({ type: 'gameFact', fact: 'asteroid.destroyed' }));
    bus.subscribe('asteroidEscaped', () => send({ type: 'gameFact', fact: 'asteroid.escaped' }));
    bus.subscribe('hitMissed', () => send({ type: 'gameFact', fact: 'hit.missed' }));
    bus.subscribe('particlesRequested', (event) =>
      send({ type: 'particles', x: event.x, y: event.y, kind: event.kind })
    );
  }

  private runTimerTick(): void {
    try {
      this.tick();
    } catch (error) {
      // The world is in an unknown state; stop simulating it
      this.clearTimer();
      logger.error({ event: 'session_tick_error', sessionId: this.id, ...errorFields(error) }, 'Tick failed, session halted');
    }
  }

  private clearTimer(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
  }
}

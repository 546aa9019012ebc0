// ============================================
// Shared Types & Interfaces
// Lifecycle, snapshots and render models
// ============================================

// Engine lifecycle state
export type LifecycleState = 'idle' | 'running' | 'paused' | 'quit';

// JSON-compatible value accepted by the storage collaborator
export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

export interface Vec2 {
  x: number;
  y: number;
}

// ============================================
// Snapshots
// Immutable records published once per tick
// ============================================

export interface RunStatsSnapshot {
  readonly spawned: number;
  readonly escaped: number;
  readonly hits: number;
  readonly misses: number;
  readonly score: number;
  readonly difficultyMultiplier: number;
  readonly timeMs: number;
  readonly paused: boolean;
}

// Drawable primitive. Only circles exist today.
export interface ShapeModel {
  readonly kind: 'circle';
  readonly position: Readonly<Vec2>;
  readonly radius: number;
  readonly rotation: number;
  readonly alpha: number;
}

export interface HudModel {
  readonly destroyed: number;
  readonly misses: number;
  readonly timeMs: number;
  readonly paused: boolean;
}

export interface UiState {
  readonly showStartScreen: boolean;
  readonly showPauseModal: boolean;
  readonly showQuitModal: boolean;
}

export interface RenderFrame {
  readonly timestampMs: number;
  readonly shapes: readonly ShapeModel[];
  readonly hud: HudModel;
  readonly uiState: UiState;
}

// Player-adjustable tunables
export interface GameSettings {
  uiOpacity: number;
  speedLevel: number;
  difficultyProgression: boolean;
}

// Persisted outcome of the previous run
export interface LastResult {
  spawned: number;
  escaped: number;
  hits: number;
  misses: number;
  score: number;
  difficultyMultiplier: number;
  timeMs: number;
}

// Facts surfaced to the HUD as "last thing that happened"
export type GameFact = 'asteroid.destroyed' | 'asteroid.escaped' | 'hit.missed';

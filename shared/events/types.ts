// ============================================
// Game Events
// Everything that flows through the event bus
// ============================================

import type { EntityId } from '../ecs/types';
import type { LifecycleState, RenderFrame, RunStatsSnapshot } from '../types';

// ============================================
// Inbound (UI shell → core)
// ============================================

export interface StartRequestedEvent {
  type: 'startRequested';
}

export interface PauseToggleRequestedEvent {
  type: 'pauseToggleRequested';
}

export interface QuitRequestedEvent {
  type: 'quitRequested';
}

export interface SettingsUpdateRequestedEvent {
  type: 'settingsUpdateRequested';
  uiOpacity: number;
  speedLevel: number;
  difficultyProgression: boolean;
}

export interface PointerDownEvent {
  type: 'pointerDown';
  x: number;
  y: number;
  timestampMs: number;
}

// ============================================
// Outbound (core → UI shell)
// ============================================

export interface StateChangedEvent {
  type: 'stateChanged';
  previous: LifecycleState;
  current: LifecycleState;
}

export interface RenderFrameReadyEvent {
  type: 'renderFrameReady';
  frame: RenderFrame;
}

export interface StatsUpdatedEvent {
  type: 'statsUpdated';
  snapshot: RunStatsSnapshot;
}

export interface AsteroidSpawnedEvent {
  type: 'asteroidSpawned';
  entity: EntityId;
}

export interface AsteroidEscapedEvent {
  type: 'asteroidEscaped';
  entity: EntityId;
}

export interface AsteroidDestroyedEvent {
  type: 'asteroidDestroyed';
  entity: EntityId;
  x: number;
  y: number;
}

export interface HitMissedEvent {
  type: 'hitMissed';
  x: number;
  y: number;
  timestampMs: number;
}

export interface ParticlesRequestedEvent {
  type: 'particlesRequested';
  x: number;
  y: number;
  kind: string;
}

export type InboundEvent =
  | StartRequestedEvent
  | PauseToggleRequestedEvent
  | QuitRequestedEvent
  | SettingsUpdateRequestedEvent
  | PointerDownEvent;

export type OutboundEvent =
  | StateChangedEvent
  | RenderFrameReadyEvent
  | StatsUpdatedEvent
  | AsteroidSpawnedEvent
  | AsteroidEscapedEvent
  | AsteroidDestroyedEvent
  | HitMissedEvent
  | ParticlesRequestedEvent;

export type GameEvent = InboundEvent | OutboundEvent;

export type GameEventType = GameEvent['type'];

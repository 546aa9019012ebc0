// ============================================
// Network Messages
// UI shell ↔ server communication types
// ============================================

import type { LastResultSummary } from './summary';
import type {
  GameFact,
  GameSettings,
  LastResult,
  LifecycleState,
  RenderFrame,
  RunStatsSnapshot,
} from './types';

// ============================================
// Client → Server
// ============================================

export interface StartGameMessage {
  type: 'startGame';
}

export interface TogglePauseMessage {
  type: 'togglePause';
}

export interface QuitGameMessage {
  type: 'quitGame';
}

export interface UpdateSettingsMessage {
  type: 'updateSettings';
  uiOpacity: number;
  speedLevel: number;
  difficultyProgression: boolean;
}

// The server stamps the tap with its own clock on arrival
export interface PointerDownMessage {
  type: 'pointerDown';
  x: number;
  y: number;
}

export type ClientMessage =
  | StartGameMessage
  | TogglePauseMessage
  | QuitGameMessage
  | UpdateSettingsMessage
  | PointerDownMessage;

// ============================================
// Server → Client
// ============================================

export interface StateChangedMessage {
  type: 'stateChanged';
  previous: LifecycleState;
  current: LifecycleState;
}

export interface RenderFrameMessage {
  type: 'renderFrame';
  frame: RenderFrame;
}

export interface StatsUpdatedMessage {
  type: 'statsUpdated';
  snapshot: RunStatsSnapshot;
  hud: string;
}

export interface GameFactMessage {
  type: 'gameFact';
  fact: GameFact;
}

export interface ParticlesMessage {
  type: 'particles';
  x: number;
  y: number;
  kind: string;
}

export interface LastResultMessage {
  type: 'lastResult';
  result: LastResult | null;
  summary: LastResultSummary | null;
}

export interface SettingsMessage {
  type: 'settings';
  settings: GameSettings;
}

export type ServerMessage =
  | StateChangedMessage
  | RenderFrameMessage
  | StatsUpdatedMessage
  | GameFactMessage
  | ParticlesMessage
  | LastResultMessage
  | SettingsMessage;

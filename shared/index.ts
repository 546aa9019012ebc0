// ============================================
// Shared Types & Constants
// Used by the server and by any UI shell
// ============================================

// ECS Module - Entity Component System
export * from './ecs';

// Event bus and the game event union
export * from './events';

// Deterministic randomness
export * from './random';

// Game constants (CLASSIC_CONFIG, ENGINE_CONFIG, storage keys)
export * from './constants';

// Type definitions (lifecycle, snapshots, render models)
export * from './types';

// Persisted record codecs
export * from './persistence';

// Start screen and HUD summaries
export * from './summary';

// Network message types (Client ↔ Server)
export * from './messages';

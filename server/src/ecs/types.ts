// ============================================
// Server ECS Types
// ============================================

import type { ClassicComponents, World } from '@asteroid-tap/shared';

/**
 * The world Classic mode runs in.
 */
export type ClassicWorld = World<ClassicComponents>;

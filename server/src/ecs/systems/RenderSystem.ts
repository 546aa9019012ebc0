// ============================================
// Render System
// Builds and publishes the per-tick render snapshot
// ============================================

import {
  Components,
  type LifecycleState,
  type RenderFrame,
  type RunStatsComponent,
  type ShapeModel,
  type UiState,
} from '@asteroid-tap/shared';
import type { System } from './types';
import type { SystemContext } from './SystemContext';
import { requireRunStats } from '../factories';
import type { ClassicWorld } from '../types';

export function uiStateFor(lifecycle: LifecycleState): UiState {
  return Object.freeze({
    showStartScreen: lifecycle === 'idle',
    showPauseModal: lifecycle === 'paused',
    showQuitModal: lifecycle === 'quit',
  });
}

function collectShapes(world: ClassicWorld, alpha: number): readonly ShapeModel[] {
  const shapes: ShapeModel[] = [];
  for (const entity of world.query(Components.AsteroidTag, Components.Transform, Components.ColliderCircle)) {
    const transform = world.getComponent(entity, Components.Transform);
    const collider = world.getComponent(entity, Components.ColliderCircle);
    if (!transform || !collider) continue;

    shapes.push(
      Object.freeze({
        kind: 'circle',
        position: Object.freeze({ x: transform.x, y: transform.y }),
        radius: collider.radius,
        rotation: transform.rotation,
        alpha,
      })
    );
  }
  return Object.freeze(shapes);
}

/**
 * A frame built from the world as it is now. Every level is frozen.
 */
export function buildRenderFrame(
  context: SystemContext,
  stats: RunStatsComponent
): RenderFrame {
  const paused = context.lifecycle === 'paused';
  return Object.freeze({
    timestampMs: context.clock.nowMs(),
    shapes: collectShapes(context.world, context.settings.uiOpacity),
    hud: Object.freeze({
      destroyed: stats.hits,
      misses: stats.misses,
      timeMs: stats.elapsed,
      paused,
    }),
    uiState: uiStateFor(context.lifecycle),
  });
}

/**
 * Build a frame, remember it as the context's last frame, publish it.
 */
export function publishRenderFrame(context: SystemContext): RenderFrame {
  const frame = buildRenderFrame(context, requireRunStats(context.world, context.runEntity));
  context.lastFrame = frame;
  context.bus.publish({ type: 'renderFrameReady', frame });
  return frame;
}

/**
 * RenderSystem - last in the pipeline; publishes the render snapshot.
 */
export class RenderSystem implements System {
  readonly name = 'RenderSystem';

  update(context: SystemContext): void {
    publishRenderFrame(context);
  }
}

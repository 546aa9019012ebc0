// ============================================
// StatsSystem / RenderSystem Unit Tests
// ============================================

import { describe, it, expect, beforeEach } from 'vitest';
import { StatsSystem, createStatsSnapshot } from '../StatsSystem';
import { RenderSystem, buildRenderFrame, publishRenderFrame, uiStateFor } from '../RenderSystem';
import { requireRunStats } from '../../factories';
import { ManualClock } from '../../../engine/clock';
import type { SystemContext } from '../SystemContext';
import { createTestAsteroid, createTestContext, recordEvents } from './testUtils';

describe('StatsSystem', () => {
  let context: SystemContext;

  beforeEach(() => {
    context = createTestContext();
  });

  it('publishes a frozen copy of the run counters', () => {
    const events = recordEvents(context.bus, ['statsUpdated']);
    const stats = requireRunStats(context.world, context.runEntity);
    Object.assign(stats, { spawned: 3, escaped: 1, hits: 2, misses: 4, score: 20, difficultyMultiplier: 2.1, elapsed: 12_500 });

    new StatsSystem().update(context);

    expect(events).toEqual([
      {
        type: 'statsUpdated',
        snapshot: {
          spawned: 3,
          escaped: 1,
          hits: 2,
          misses: 4,
          score: 20,
          difficultyMultiplier: 2.1,
          timeMs: 12_500,
          paused: false,
        },
      },
    ]);
    const [event] = events;
    expect(event.type === 'statsUpdated' && Object.isFrozen(event.snapshot)).toBe(true);
  });

  it('does not change when the counters change afterwards', () => {
    const stats = requireRunStats(context.world, context.runEntity);
    const snapshot = createStatsSnapshot(stats, false);

    stats.hits = 7;

    expect(snapshot.hits).toBe(0);
  });

  it('is tagged paused while the lifecycle is paused', () => {
    context.lifecycle = 'paused';
    const events = recordEvents(context.bus, ['statsUpdated']);

    new StatsSystem().update(context);

    const [event] = events;
    expect(event.type === 'statsUpdated' && event.snapshot.paused).toBe(true);
  });
});

describe('RenderSystem', () => {
  let context: SystemContext;
  let clock: ManualClock;

  beforeEach(() => {
    clock = new ManualClock(1_000);
    context = createTestContext({ settings: { uiOpacity: 0.5 } });
    context.clock = clock;
  });

  it('draws each asteroid as a circle with the UI opacity', () => {
    createTestAsteroid(context, { x: 100, y: 200 });
    const stats = requireRunStats(context.world, context.runEntity);
    Object.assign(stats, { hits: 2, misses: 1, elapsed: 3_000 });

    const frame = buildRenderFrame(context, stats);

    expect(frame).toEqual({
      timestampMs: 1_000,
      shapes: [{ kind: 'circle', position: { x: 100, y: 200 }, radius: 18, rotation: 0, alpha: 0.5 }],
      hud: { destroyed: 2, misses: 1, timeMs: 3_000, paused: false },
      uiState: { showStartScreen: false, showPauseModal: false, showQuitModal: false },
    });
  });

  it('freezes every level of the frame', () => {
    createTestAsteroid(context);

    const frame = buildRenderFrame(context, requireRunStats(context.world, context.runEntity));

    expect(Object.isFrozen(frame)).toBe(true);
    expect(Object.isFrozen(frame.shapes)).toBe(true);
    expect(Object.isFrozen(frame.shapes[0])).toBe(true);
    expect(Object.isFrozen(frame.shapes[0].position)).toBe(true);
    expect(Object.isFrozen(frame.hud)).toBe(true);
    expect(Object.isFrozen(frame.uiState)).toBe(true);
  });

  it('derives the UI flags from the lifecycle state', () => {
    expect(uiStateFor('idle')).toEqual({ showStartScreen: true, showPauseModal: false, showQuitModal: false });
    expect(uiStateFor('running')).toEqual({ showStartScreen: false, showPauseModal: false, showQuitModal: false });
    expect(uiStateFor('paused')).toEqual({ showStartScreen: false, showPauseModal: true, showQuitModal: false });
    expect(uiStateFor('quit')).toEqual({ showStartScreen: false, showPauseModal: false, showQuitModal: true });
  });

  it('publishes the frame and remembers it as the last frame', () => {
    const events = recordEvents(context.bus, ['renderFrameReady']);

    const frame = publishRenderFrame(context);

    expect(context.lastFrame).toBe(frame);
    expect(events).toEqual([{ type: 'renderFrameReady', frame }]);
  });

  it('publishes an empty frame when no asteroid is alive', () => {
    context.lifecycle = 'paused';
    const events = recordEvents(context.bus, ['renderFrameReady']);

    new RenderSystem().update(context);

    const [event] = events;
    expect(event.type === 'renderFrameReady' && event.frame.shapes).toEqual([]);
    expect(context.lastFrame?.hud.paused).toBe(true);
  });
});

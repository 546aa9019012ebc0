// ============================================
// GameEngine Unit Tests
// Lifecycle transitions, tick stepping, disposal
// ============================================

import { describe, it, expect, vi, beforeEach } from 'vitest';
import { SeededRandom, type ClassicComponents, type GameEvent } from '@asteroid-tap/shared';
import { GameEngine } from '../engine/GameEngine';
import { ManualClock } from '../engine/clock';
import type { GameMode } from '../engine/types';
import { MemoryStorage } from '../storage';

function createStubMode(calls: string[], exitTask: Promise<void> = Promise.resolve()) {
  const deltas: number[] = [];
  const mode: GameMode<ClassicComponents> = {
    id: 'stub',
    onEnter: vi.fn(() => {
      calls.push('enter');
    }),
    onUpdate: vi.fn((_context: unknown, deltaMs: number) => {
      deltas.push(deltaMs);
    }),
    onExit: vi.fn(() => {
      calls.push('exit');
      return exitTask;
    }),
  };
  return { mode, deltas };
}

describe('GameEngine', () => {
  let clock: ManualClock;
  let calls: string[];
  let stub: ReturnType<typeof createStubMode>;
  let engine: GameEngine<ClassicComponents>;
  let stateEvents: GameEvent[];

  function createEngine(maxFrameDeltaMs?: number) {
    const created = new GameEngine<ClassicComponents>({
      mode: stub.mode,
      clock,
      rng: new SeededRandom(7),
      storage: new MemoryStorage(),
      config: maxFrameDeltaMs === undefined ? undefined : { maxFrameDeltaMs },
    });
    created.bus.subscribe('stateChanged', (event) => {
      stateEvents.push(event);
      calls.push(`state:${event.current}`);
    });
    return created;
  }

  function step(ms: number) {
    clock.advance(ms);
    engine.tick();
  }

  beforeEach(() => {
    clock = new ManualClock();
    calls = [];
    stateEvents = [];
    stub = createStubMode(calls);
    engine = createEngine();
  });

  describe('lifecycle', () => {
    it('starts idle', () => {
      expect(engine.state).toBe('idle');
    });

    it('enters the mode before announcing running', () => {
      engine.bus.publish({ type: 'startRequested' });

      expect(engine.state).toBe('running');
      expect(calls).toEqual(['enter', 'state:running']);
      expect(stateEvents).toEqual([{ type: 'stateChanged', previous: 'idle', current: 'running' }]);
    });

    it('toggles between running and paused', () => {
      engine.bus.publish({ type: 'startRequested' });
      engine.bus.publish({ type: 'pauseToggleRequested' });
      expect(engine.state).toBe('paused');

      engine.bus.publish({ type: 'pauseToggleRequested' });
      expect(engine.state).toBe('running');
      expect(stub.mode.onEnter).toHaveBeenCalledTimes(1);
    });

    it('exits the mode before announcing quit, from running or paused', () => {
      engine.bus.publish({ type: 'startRequested' });
      engine.bus.publish({ type: 'pauseToggleRequested' });
      engine.bus.publish({ type: 'quitRequested' });

      expect(engine.state).toBe('quit');
      expect(calls).toEqual(['enter', 'state:running', 'state:paused', 'exit', 'state:quit']);
    });

    it('ignores intents that make no sense in the current state', () => {
      engine.bus.publish({ type: 'pauseToggleRequested' });
      engine.bus.publish({ type: 'quitRequested' });
      expect(engine.state).toBe('idle');

      engine.bus.publish({ type: 'startRequested' });
      engine.bus.publish({ type: 'startRequested' });
      expect(stub.mode.onEnter).toHaveBeenCalledTimes(1);

      engine.bus.publish({ type: 'quitRequested' });
      engine.bus.publish({ type: 'pauseToggleRequested' });
      engine.bus.publish({ type: 'quitRequested' });
      expect(engine.state).toBe('quit');
      expect(stub.mode.onExit).toHaveBeenCalledTimes(1);
      expect(stateEvents).toHaveLength(2);
    });

    it('starts again from quit on a fresh world', () => {
      engine.bus.publish({ type: 'startRequested' });
      const firstWorld = engine.world;
      firstWorld.createEntity();
      engine.bus.publish({ type: 'quitRequested' });

      engine.bus.publish({ type: 'startRequested' });

      expect(engine.state).toBe('running');
      expect(engine.world).not.toBe(firstWorld);
      expect(engine.world.entityCount).toBe(0);
      expect(stub.mode.onEnter).toHaveBeenCalledTimes(2);
      expect(stateEvents.at(-1)).toEqual({ type: 'stateChanged', previous: 'quit', current: 'running' });
    });

    it('exposes the persistence task of the last exit', () => {
      const exitTask = Promise.resolve();
      stub = createStubMode(calls, exitTask);
      engine = createEngine();

      engine.bus.publish({ type: 'startRequested' });
      engine.bus.publish({ type: 'quitRequested' });

      expect(engine.lastExitTask).toBe(exitTask);
    });
  });

  describe('tick', () => {
    it('updates the mode once per running tick with the elapsed time', () => {
      engine.bus.publish({ type: 'startRequested' });

      step(16);
      step(17);

      expect(stub.deltas).toEqual([16, 17]);
      expect(engine.tickCount).toBe(2);
    });

    it('does not simulate time spent idle before the start', () => {
      clock.advance(5_000);
      engine.tick();
      engine.bus.publish({ type: 'startRequested' });

      step(16);

      expect(stub.deltas).toEqual([16]);
    });

    it('does not update while paused and does not replay paused time', () => {
      engine.bus.publish({ type: 'startRequested' });
      step(16);
      engine.bus.publish({ type: 'pauseToggleRequested' });

      for (let i = 0; i < 10; i++) step(16);
      expect(stub.deltas).toEqual([16]);

      engine.bus.publish({ type: 'pauseToggleRequested' });
      step(16);

      expect(stub.deltas).toEqual([16, 16]);
    });

    it('clamps a long gap to maxFrameDeltaMs', () => {
      engine.bus.publish({ type: 'startRequested' });

      step(10_000);

      expect(stub.deltas).toEqual([250]);
    });

    it('takes a configured clamp', () => {
      engine = createEngine(100);
      engine.bus.publish({ type: 'startRequested' });

      step(400);

      expect(stub.deltas).toEqual([100]);
    });

    it('never passes a negative step', () => {
      clock.set(1_000);
      engine.bus.publish({ type: 'startRequested' });

      clock.set(900);
      engine.tick();

      expect(stub.deltas).toEqual([0]);
    });
  });

  describe('dispose', () => {
    it('exits a running mode and detaches from the bus', () => {
      engine.bus.publish({ type: 'startRequested' });

      void engine.dispose();

      expect(stub.mode.onExit).toHaveBeenCalledTimes(1);
      expect(engine.isDisposed).toBe(true);
      expect(engine.bus.subscriberCount('startRequested')).toBe(0);
      expect(engine.bus.subscriberCount('stateChanged')).toBe(0);
    });

    it('makes later ticks no-ops', () => {
      engine.bus.publish({ type: 'startRequested' });
      void engine.dispose();

      step(16);

      expect(stub.deltas).toEqual([]);
      expect(engine.tickCount).toBe(0);
    });

    it('does not exit a mode that was never entered', () => {
      void engine.dispose();

      expect(stub.mode.onExit).not.toHaveBeenCalled();
    });

    it('is idempotent', async () => {
      engine.bus.publish({ type: 'startRequested' });

      await engine.dispose();
      await engine.dispose();

      expect(stub.mode.onExit).toHaveBeenCalledTimes(1);
    });
  });
});

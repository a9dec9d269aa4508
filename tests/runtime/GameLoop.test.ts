import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { GameLoop } from '../../src/runtime/GameLoop';
import { InputState } from '../../src/runtime/InputHandler';
import { BreakoutSimulation } from '../../src/engine/BreakoutSimulation';
import { GamePhase } from '../../src/engine/types';
import type { RenderSnapshot } from '../../src/engine/types';

describe('GameLoop', () => {
  let sim: BreakoutSimulation;
  let input: InputState;
  let loop: GameLoop;

  beforeEach(() => {
    vi.useFakeTimers();
    sim = new BreakoutSimulation();
    input = new InputState();
    loop = new GameLoop(sim, input);
  });

  afterEach(() => {
    loop.stop();
    vi.useRealTimers();
    vi.restoreAllMocks();
  });

  describe('step()', () => {
    it('advances one tick and returns the snapshot', () => {
      const snap = loop.step();
      expect(snap.tick).toBe(1);
      expect(sim.state.tick).toBe(1);
    });

    it('feeds held keys to the paddle', () => {
      input.keyDown('ArrowRight');
      loop.step();
      loop.step();
      expect(sim.state.paddle.x).toBe(318);
    });

    it('applies queued commands before the tick', () => {
      input.keyDown('Space');
      loop.step();
      expect(sim.phase).toBe(GamePhase.InPlay);
      expect(sim.state.ball.y).toBeCloseTo(313.4, 10);
    });

    it('notifies every render callback', () => {
      const seen: number[] = [];
      loop.onRender((s: RenderSnapshot) => seen.push(s.tick));
      loop.onRender((s: RenderSnapshot) => seen.push(s.tick * 10));
      loop.step();
      expect(seen).toEqual([1, 10]);
    });

    it('restart is applied before launch in the same tick', () => {
      input.keyDown('Space');
      loop.step();
      input.keyUp('Space');
      input.keyDown('KeyR');
      input.keyDown('Space');
      loop.step();
      expect(sim.phase).toBe(GamePhase.InPlay);
      expect(sim.snapshot().level).toBe(1);
    });
  });

  describe('refresh', () => {
    it('calls onRefresh when one is given', () => {
      const onRefresh = vi.fn((s: BreakoutSimulation) => {
        s.reloadBricks([{ lineNumber: 1, text: 'fresh' }]);
      });
      const custom = new GameLoop(sim, input, { onRefresh });
      input.queue('refresh');
      custom.step();
      expect(onRefresh).toHaveBeenCalledOnce();
      expect(sim.snapshot().bricks.map((b) => b.label)).toEqual(['fresh']);
    });

    it('re-reads the source otherwise', () => {
      sim.launch();
      input.queue('refresh');
      loop.step();
      expect(sim.phase).toBe(GamePhase.WaitingForLaunch);
      expect(sim.snapshot().bricks).toHaveLength(11);
    });
  });

  describe('start() / stop()', () => {
    it('ticks on a fixed 16ms interval', () => {
      loop.start();
      expect(loop.running).toBe(true);
      vi.advanceTimersByTime(80);
      expect(sim.state.tick).toBe(5);
    });

    it('start twice does not double the rate', () => {
      loop.start();
      loop.start();
      vi.advanceTimersByTime(32);
      expect(sim.state.tick).toBe(2);
    });

    it('stop() cancels further ticks', () => {
      loop.start();
      vi.advanceTimersByTime(16);
      loop.stop();
      vi.advanceTimersByTime(160);
      expect(sim.state.tick).toBe(1);
      expect(loop.running).toBe(false);
    });

    it('honours a custom interval', () => {
      const slow = new GameLoop(sim, input, { intervalMs: 50 });
      slow.start();
      vi.advanceTimersByTime(100);
      slow.stop();
      expect(sim.state.tick).toBe(2);
    });

    it('logs and stops when a tick throws', () => {
      const error = vi.spyOn(console, 'error').mockImplementation(() => {});
      loop.onRender(() => {
        throw new Error('boom');
      });
      loop.start();
      vi.advanceTimersByTime(48);

      expect(error).toHaveBeenCalledWith('[loop] tick failed, stopping:', 'boom');
      expect(loop.running).toBe(false);
      expect(sim.state.tick).toBe(1);
    });

    it('reports the failure to onError', () => {
      vi.spyOn(console, 'error').mockImplementation(() => {});
      const onError = vi.fn((err: Error) => err.message);
      const reporting = new GameLoop(sim, input, { onError });
      reporting.onRender(() => {
        throw new Error('boom');
      });
      reporting.start();
      vi.advanceTimersByTime(48);

      expect(onError).toHaveBeenCalledOnce();
      expect(onError).toHaveReturnedWith('boom');
      expect(reporting.running).toBe(false);
    });
  });
});

import type { RenderSnapshot } from '../engine/types';
import type { BreakoutSimulation } from '../engine/BreakoutSimulation';
import { FIXED_TICK_MS } from '../engine/constants';
import type { InputState, GameCommand } from './InputHandler';

/** Callbacks that renderers register to receive a snapshot after every tick. */
export type RenderCallback = (snapshot: RenderSnapshot) => void;

export interface GameLoopOptions {
  intervalMs?: number;
  /** Called for the refresh command; lets the host fetch a new listing first. */
  onRefresh?: (simulation: BreakoutSimulation) => void;
  /** Called once after a failed tick has stopped the loop. */
  onError?: (error: Error) => void;
}

/**
 * Fixed-interval driver. The interval timer is the only thing that calls
 * simulation.tick(); stopping it is the only way to cancel.
 */
export class GameLoop {
  private readonly simulation: BreakoutSimulation;
  private readonly input: InputState;
  private readonly intervalMs: number;
  private readonly onRefresh?: (simulation: BreakoutSimulation) => void;
  private readonly onError?: (error: Error) => void;
  private renderCallbacks: RenderCallback[] = [];
  private timer: ReturnType<typeof setInterval> | null = null;

  constructor(simulation: BreakoutSimulation, input: InputState, options: GameLoopOptions = {}) {
    this.simulation = simulation;
    this.input = input;
    this.intervalMs = options.intervalMs ?? FIXED_TICK_MS;
    this.onRefresh = options.onRefresh;
    this.onError = options.onError;
  }

  /** Register a callback called after every tick. */
  onRender(cb: RenderCallback): void {
    this.renderCallbacks.push(cb);
  }

  get running(): boolean { return this.timer !== null; }

  start(): void {
    if (this.timer) return;
    this.timer = setInterval(() => {
      try {
        this.step();
      } catch (err) {
        const error = err instanceof Error ? err : new Error(String(err));
        console.error('[loop] tick failed, stopping:', error.message);
        this.stop();
        this.onError?.(error);
      }
    }, this.intervalMs);
  }

  stop(): void {
    if (!this.timer) return;
    clearInterval(this.timer);
    this.timer = null;
  }

  /** Apply queued commands, advance one tick and notify renderers. */
  step(): RenderSnapshot {
    for (const command of this.input.takeCommands()) {
      this.apply(command);
    }
    this.simulation.tick(this.input.paddleInput());

    const snapshot = this.simulation.snapshot();
    for (const cb of this.renderCallbacks) {
      cb(snapshot);
    }
    return snapshot;
  }

  private apply(command: GameCommand): void {
    switch (command) {
      case 'restart':
        this.simulation.restart();
        return;
      case 'refresh':
        if (this.onRefresh) {
          this.onRefresh(this.simulation);
        } else {
          this.simulation.reloadBricks();
        }
        return;
      case 'launch':
        this.simulation.launch();
        return;
      default: {
        const _exhaustive: never = command;
        return _exhaustive;
      }
    }
  }
}

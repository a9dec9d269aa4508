import type { PaddleInput } from '../engine/types';

/** Discrete actions triggered once per key press. */
export type GameCommand = 'launch' | 'restart' | 'refresh';

const LEFT_KEYS = new Set(['ArrowLeft', 'KeyA']);
const RIGHT_KEYS = new Set(['ArrowRight', 'KeyD']);

const COMMAND_KEYS: Record<string, GameCommand> = {
  Space: 'launch',
  KeyR: 'restart',
  KeyN: 'refresh',
};

/**
 * Keyboard state shared between the host's key events and the game loop.
 *
 * Direction keys are plain held flags (last write wins). Command keys are
 * edge-triggered: one press queues one command, auto-repeat is ignored
 * until the key is released.
 */
export class InputState {
  private readonly held = new Set<string>();
  private readonly pending = new Set<GameCommand>();

  keyDown(code: string): void {
    if (this.held.has(code)) return;
    this.held.add(code);

    const command = COMMAND_KEYS[code];
    if (command) this.pending.add(command);
  }

  keyUp(code: string): void {
    this.held.delete(code);
  }

  /** Forget every held key, e.g. when the host window loses focus. */
  release(): void {
    this.held.clear();
  }

  /** Queue a command directly, bypassing key mapping. */
  queue(command: GameCommand): void {
    this.pending.add(command);
  }

  /** Held-key flags for the next tick. */
  paddleInput(): PaddleInput {
    return {
      left: [...LEFT_KEYS].some((k) => this.held.has(k)),
      right: [...RIGHT_KEYS].some((k) => this.held.has(k)),
    };
  }

  /**
   * Drain queued commands in a fixed order: restart, refresh, launch.
   * Each command is returned at most once.
   */
  takeCommands(): GameCommand[] {
    const order: GameCommand[] = ['restart', 'refresh', 'launch'];
    const out = order.filter((c) => this.pending.has(c));
    this.pending.clear();
    return out;
  }

  /** Returns true if the given key code is currently held. */
  isKeyDown(code: string): boolean {
    return this.held.has(code);
  }
}

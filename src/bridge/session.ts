/**
 * BridgeSession — one connected host, one simulation.
 *
 * Adapts BreakoutSimulation to a JSON message interface. Every request gets
 * exactly one reply object; while the game loop is streaming, extra `frame`
 * messages are pushed through the `send` callback, and a failed loop tick
 * pushes one `error` and ends the stream. No sockets in here, so
 * the whole protocol is testable in-process.
 */

import type { DisplayLine, RenderSnapshot, Viewport } from '../engine/types';
import { BreakoutSimulation } from '../engine/BreakoutSimulation';
import { SIMULATION_CONFIG_KEYS, type SimulationConfig } from '../engine/constants';
import { collectDisplayLines, type SourceLines } from '../source/lines';
import { InputState } from '../runtime/InputHandler';
import { GameLoop } from '../runtime/GameLoop';
import { HoverTracker, type TooltipChange } from '../runtime/HoverTracker';
import type { BridgeConfig } from './bridge-config';
import { DEFAULT_BRIDGE_CONFIG } from './bridge-config';

/** Brick details sent back for a hover query. */
export interface HoveredBrick {
  id: number;
  label: string;
  lineNumber: number;
  sourceText: string;
}

export interface BridgeReply {
  type: string;
  snapshot?: RenderSnapshot;
  brick?: HoveredBrick | null;
  tooltip?: TooltipChange;
  message?: string;
}

interface ActiveGame {
  simulation: BreakoutSimulation;
  input: InputState;
  loop: GameLoop;
  hover: HoverTracker;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readFinite(msg: Record<string, unknown>, key: string): number {
  const value = msg[key];
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    throw new Error(`${key} must be a finite number`);
  }
  return value;
}

function readOptionalInteger(msg: Record<string, unknown>, key: string, fallback: number): number {
  if (msg[key] === undefined) return fallback;
  const value = readFinite(msg, key);
  if (!Number.isInteger(value)) {
    throw new Error(`${key} must be an integer`);
  }
  return value;
}

function readViewport(value: unknown): Viewport | undefined {
  if (value === undefined) return undefined;
  if (!isRecord(value)) {
    throw new Error('viewport must be an object { width, height }');
  }
  return { width: readFinite(value, 'width'), height: readFinite(value, 'height') };
}

function readDisplayLines(value: unknown): DisplayLine[] {
  if (!Array.isArray(value)) {
    throw new Error('lines must be an array of { lineNumber, text }');
  }
  return value.map((entry, i) => {
    if (!isRecord(entry) || typeof entry.text !== 'string') {
      throw new Error(`lines[${i}] must have a string text`);
    }
    const lineNumber = entry.lineNumber;
    if (typeof lineNumber !== 'number' || !Number.isInteger(lineNumber) || lineNumber < 1) {
      throw new Error(`lines[${i}].lineNumber must be a positive integer`);
    }
    return { lineNumber, text: entry.text };
  });
}

/**
 * A listing comes either as ready-made `lines` (+ `anchorIndex`) or as raw
 * `text` lines (+ `cursor`) that still need cleaning.
 */
function readSourceLines(msg: Record<string, unknown>): SourceLines {
  if (msg.text !== undefined) {
    const text = msg.text;
    if (!Array.isArray(text) || !text.every((t): t is string => typeof t === 'string')) {
      throw new Error('text must be an array of strings');
    }
    return collectDisplayLines(text, readOptionalInteger(msg, 'cursor', 0));
  }
  if (msg.lines !== undefined) {
    return { lines: readDisplayLines(msg.lines), anchorIndex: readOptionalInteger(msg, 'anchorIndex', 0) };
  }
  return { lines: [], anchorIndex: 0 };
}

function readConfig(value: unknown): Partial<SimulationConfig> {
  if (value === undefined) return {};
  if (!isRecord(value)) {
    throw new Error('config must be an object');
  }
  const config: Partial<SimulationConfig> = {};
  for (const key of Object.keys(value)) {
    const known = SIMULATION_CONFIG_KEYS.find((k) => k === key);
    if (!known) {
      throw new Error(`Unknown config key "${key}". Available: ${SIMULATION_CONFIG_KEYS.join(', ')}`);
    }
    config[known] = readFinite(value, key);
  }
  return config;
}

export class BridgeSession {
  private readonly send: (reply: BridgeReply) => void;
  private readonly config: BridgeConfig;
  private game: ActiveGame | null = null;
  private streaming = false;

  constructor(send: (reply: BridgeReply) => void, config: BridgeConfig = DEFAULT_BRIDGE_CONFIG) {
    this.send = send;
    this.config = config;
  }

  /** Handle one decoded message. Throws on malformed input. */
  handle(raw: unknown): BridgeReply {
    if (!isRecord(raw)) {
      throw new Error('message must be an object with a string type');
    }
    const msg = raw;
    const type = msg.type;
    if (typeof type !== 'string') {
      throw new Error('message must be an object with a string type');
    }

    switch (type) {
      case 'load': {
        this.close();
        const { lines, anchorIndex } = readSourceLines(msg);
        const simulation = new BreakoutSimulation({
          viewport: readViewport(msg.viewport),
          config: readConfig(msg.config),
        });
        simulation.reloadBricks(lines, anchorIndex);
        this.game = this.createGame(simulation);
        return { type: 'load_result', snapshot: simulation.snapshot() };
      }
      case 'key': {
        const { input } = this.requireGame(type);
        if (typeof msg.code !== 'string' || typeof msg.down !== 'boolean') {
          throw new Error('key needs a string code and a boolean down');
        }
        if (msg.down) {
          input.keyDown(msg.code);
        } else {
          input.keyUp(msg.code);
        }
        return { type: 'key_result' };
      }
      case 'launch': {
        const { simulation } = this.requireGame(type);
        simulation.launch();
        return { type: 'launch_result', snapshot: simulation.snapshot() };
      }
      case 'restart': {
        const { simulation } = this.requireGame(type);
        simulation.restart();
        return { type: 'restart_result', snapshot: simulation.snapshot() };
      }
      case 'refresh': {
        const { simulation } = this.requireGame(type);
        if (msg.text !== undefined || msg.lines !== undefined) {
          const { lines, anchorIndex } = readSourceLines(msg);
          simulation.reloadBricks(lines, anchorIndex);
        } else {
          simulation.reloadBricks();
        }
        return { type: 'refresh_result', snapshot: simulation.snapshot() };
      }
      case 'resize': {
        const { simulation } = this.requireGame(type);
        simulation.resize({ width: readFinite(msg, 'width'), height: readFinite(msg, 'height') });
        return { type: 'resize_result', snapshot: simulation.snapshot() };
      }
      case 'tick': {
        const { simulation, loop } = this.requireGame(type);
        const count = readOptionalInteger(msg, 'count', 1);
        if (count < 1 || count > this.config.maxTicksPerRequest) {
          throw new Error(`count must be between 1 and ${this.config.maxTicksPerRequest}`);
        }
        for (let i = 0; i < count; i++) {
          loop.step();
        }
        return { type: 'tick_result', snapshot: simulation.snapshot() };
      }
      case 'snapshot': {
        const { simulation } = this.requireGame(type);
        return { type: 'snapshot_result', snapshot: simulation.snapshot() };
      }
      case 'hover': {
        const { simulation, hover } = this.requireGame(type);
        const point = { x: readFinite(msg, 'x'), y: readFinite(msg, 'y') };
        const brick = simulation.brickAt(point);
        return {
          type: 'hover_result',
          brick: brick
            ? { id: brick.id, label: brick.label, lineNumber: brick.lineNumber, sourceText: brick.sourceText }
            : null,
          tooltip: hover.move(point),
        };
      }
      case 'leave': {
        const { hover } = this.requireGame(type);
        return { type: 'leave_result', tooltip: hover.leave() };
      }
      case 'start': {
        const { loop } = this.requireGame(type);
        this.streaming = true;
        loop.start();
        return { type: 'start_result' };
      }
      case 'stop': {
        const { loop } = this.requireGame(type);
        this.streaming = false;
        loop.stop();
        return { type: 'stop_result' };
      }
      case 'close': {
        this.close();
        return { type: 'close_result' };
      }
      default:
        throw new Error(`Unknown message type: ${type}`);
    }
  }

  /** Stop the loop and drop the simulation. Safe to call repeatedly. */
  close(): void {
    this.streaming = false;
    this.game?.loop.stop();
    this.game = null;
  }

  get active(): boolean { return this.game !== null; }

  private createGame(simulation: BreakoutSimulation): ActiveGame {
    const input = new InputState();
    const loop = new GameLoop(simulation, input, {
      onError: (error) => {
        if (!this.streaming) return;
        this.streaming = false;
        this.send({ type: 'error', message: error.message });
      },
    });
    loop.onRender((snapshot) => {
      if (this.streaming) this.send({ type: 'frame', snapshot });
    });
    const hover = new HoverTracker((point) => simulation.tooltipAt(point));
    return { simulation, input, loop, hover };
  }

  private requireGame(type: string): ActiveGame {
    if (!this.game) {
      throw new Error(`Call load before ${type}`);
    }
    return this.game;
  }
}

/**
 * BreakoutSimulation — Headless Game Controller
 *
 * Owns the world state, the current source listing and the brick layout.
 * Lives in src/engine/ with zero UI imports: a host drives it with tick()
 * and edge commands, and draws from snapshot().
 *
 * Phase transitions:
 *   WaitingForLaunch -> InPlay            launch()
 *   InPlay -> WaitingForLaunch            ball lost, lives left
 *   InPlay -> GameOver                    ball lost, no lives left
 *   any -> WaitingForLaunch               restart()
 */

import type {
  Brick,
  DisplayLine,
  FontMetrics,
  PaddleInput,
  Point,
  RenderLine,
  RenderSnapshot,
  Viewport,
  WorldState,
} from './types';
import { GamePhase } from './types';
import {
  DEFAULT_SIMULATION_CONFIG,
  MIN_VIEWPORT,
  validateSimulationConfig,
  type SimulationConfig,
} from './constants';
import { layoutBricks } from './layout';
import { createMonospaceMetrics } from './metrics';
import { contains } from './rect';
import {
  createWorld,
  stepWorld,
  resetBallOnPaddle,
  effectiveViewport,
  clampPaddleX,
  paddleTop,
  NO_INPUT,
} from './world';
import { StaticLineSource, type LineSource } from '../source/lines';
import { PLACEHOLDER_LINES } from '../source/placeholder';
import { formatStatus } from '../utils/formatHud';

export interface SimulationOptions {
  /** Where listings come from on reload. Defaults to an empty static listing. */
  source?: LineSource;
  /** Host viewport; floored to the minimum play area. */
  viewport?: Viewport;
  metrics?: FontMetrics;
  config?: Partial<SimulationConfig>;
}

export class BreakoutSimulation {
  private readonly config: SimulationConfig;
  private readonly metrics: FontMetrics;
  private source: LineSource;
  private viewport: Viewport;
  private world: WorldState;
  private renderLines: RenderLine[] = [];
  private level = 1;

  /** Throws when `config` would give zero or negative sizes or fractional counts. */
  constructor(options: SimulationOptions = {}) {
    this.config = validateSimulationConfig({ ...DEFAULT_SIMULATION_CONFIG, ...options.config });
    this.metrics = options.metrics ?? createMonospaceMetrics();
    this.source = options.source ?? new StaticLineSource();
    this.viewport = options.viewport ?? { ...MIN_VIEWPORT };
    this.world = createWorld(this.buildLayout(), this.viewport, this.config);
  }

  /** Current world. Bricks are copies; only the simulation kills them. */
  get state(): Readonly<WorldState> {
    return { ...this.world, bricks: this.world.bricks.map((b) => ({ ...b })) };
  }

  get phase(): GamePhase { return this.world.phase; }

  /** Advance one fixed tick using the held-key flags. */
  tick(input: PaddleInput = NO_INPUT): void {
    this.world = stepWorld(this.world, input, this.config);

    if (this.world.levelCleared) {
      this.level++;
      this.reloadBricks();
    }
  }

  /** Release the ball. Ignored unless it is resting on the paddle. */
  launch(): void {
    if (this.world.phase !== GamePhase.WaitingForLaunch) return;
    this.world = { ...this.world, phase: GamePhase.InPlay };
  }

  /** New game: score 0, full lives, fresh bricks. Works from any phase. */
  restart(): void {
    this.level = 1;
    this.world = {
      ...this.world,
      score: 0,
      lives: this.config.startingLives,
      phase: GamePhase.WaitingForLaunch,
    };
    this.reloadBricks();
  }

  /**
   * Rebuild the brick field and put the ball back on the paddle.
   *
   * With no arguments the listing is re-read from the line source. Passing
   * lines pins them as the listing for every later reload as well.
   * A finished game stays finished.
   */
  reloadBricks(lines?: readonly DisplayLine[], anchorIndex = 0): void {
    if (lines) {
      this.source = new StaticLineSource(lines, anchorIndex);
    }
    const bricks = this.buildLayout();
    this.world = resetBallOnPaddle({ ...this.world, bricks }, this.config);
  }

  /**
   * Follow a host resize. Every brick comes back; ball, score and phase
   * are left alone.
   */
  resize(viewport: Viewport): void {
    this.viewport = { ...viewport };
    const area = effectiveViewport(viewport);
    const paddle = { ...this.world.paddle, x: clampPaddleX(this.world.paddle.x, this.world.paddle.width, area) };
    this.world = { ...this.world, viewport: area, paddle, bricks: this.buildLayout() };
  }

  /** The alive brick under a point, if any. */
  brickAt(point: Point): Readonly<Brick> | null {
    return this.world.bricks.find((b) => b.alive && contains(b.rect, point)) ?? null;
  }

  /**
   * Tooltip text for a point: the hovered brick's full line, but only when
   * the line says more than the brick's own label.
   */
  tooltipAt(point: Point): string | null {
    const brick = this.brickAt(point);
    if (!brick || brick.sourceText === brick.label) return null;
    return brick.sourceText;
  }

  /** Read-only copy of everything a renderer needs. */
  snapshot(): RenderSnapshot {
    const w = this.world;
    return {
      tick: w.tick,
      phase: w.phase,
      viewport: { ...w.viewport },
      paddle: {
        x: w.paddle.x,
        y: paddleTop(w.viewport),
        width: w.paddle.width,
        height: w.paddle.height,
      },
      ball: {
        x: w.ball.x,
        y: w.ball.y,
        radius: w.ball.radius,
        launched: w.phase === GamePhase.InPlay,
      },
      bricks: w.bricks
        .filter((b) => b.alive)
        .map((b) => ({ id: b.id, rect: { ...b.rect }, label: b.label, lineNumber: b.lineNumber })),
      renderLines: this.renderLines.map((line) => ({ ...line })),
      score: w.score,
      lives: w.lives,
      gameOver: w.phase === GamePhase.GameOver,
      level: this.level,
      statusText: formatStatus(w.score, w.lives),
    };
  }

  /** Lay out the current listing, or the placeholder when it yields no bricks. */
  private buildLayout(): Brick[] {
    const { lines, anchorIndex } = this.source.readLines();
    const options = {
      maxLines: this.config.maxLines,
      viewport: effectiveViewport(this.viewport),
      metrics: this.metrics,
    };
    let result = layoutBricks(lines, anchorIndex, options);
    if (result.bricks.length === 0) {
      result = layoutBricks(PLACEHOLDER_LINES, 0, options);
    }
    this.renderLines = result.renderLines;
    return result.bricks;
  }
}

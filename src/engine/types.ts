/**
 * Engine Type Contracts
 *
 * All interfaces used by the brick layout and the breakout simulation.
 * World state objects are treated as immutable snapshots -- the step
 * function returns a new WorldState each tick instead of mutating.
 */

/** 2D point as a plain readonly object. */
export interface Point {
  readonly x: number;
  readonly y: number;
}

/** Axis-aligned box. x/y is the top-left corner. */
export interface Rect {
  readonly x: number;
  readonly y: number;
  readonly width: number;
  readonly height: number;
}

export interface Viewport {
  width: number;
  height: number;
}

/** One line of source code as supplied by the host. */
export interface DisplayLine {
  /** 1-based line number shown in the gutter */
  lineNumber: number;
  text: string;
}

/**
 * Text measurement used by the layout. Hosts plug in their real font;
 * the engine ships a monospace approximation.
 */
export interface FontMetrics {
  /** Full line height in pixels */
  readonly height: number;
  /** Distance from the row top to the text baseline */
  readonly ascent: number;
  /** Horizontal advance of the given text in pixels */
  measure(text: string): number;
}

/** One destructible token of a source line. */
export interface Brick {
  readonly id: number;
  readonly rect: Rect;
  /** The token itself (never contains whitespace) */
  readonly label: string;
  /** The full line the token came from */
  readonly sourceText: string;
  readonly lineNumber: number;
  /** Flips to false once, on collision. Only a relayout brings bricks back. */
  readonly alive: boolean;
}

/** Gutter row produced by the layout. */
export interface RenderLine {
  lineNumber: number;
  baselineY: number;
  /** Line number right-aligned to the gutter width */
  label: string;
}

export interface LayoutResult {
  bricks: Brick[];
  renderLines: RenderLine[];
}

export interface PaddleState {
  /** Left edge */
  x: number;
  width: number;
  height: number;
  /** Pixels moved per tick while a direction is held */
  speed: number;
}

export interface BallState {
  /** Centre */
  x: number;
  y: number;
  radius: number;
  vx: number;
  vy: number;
}

/** Held-key state sampled once per tick. */
export interface PaddleInput {
  left: boolean;
  right: boolean;
}

export enum GamePhase {
  WaitingForLaunch = 'waiting_for_launch',
  InPlay           = 'in_play',
  GameOver         = 'game_over',
}

/** Full simulation state at a single tick. */
export interface WorldState {
  /** Current simulation tick number */
  tick: number;
  phase: GamePhase;
  /** Effective viewport (already floored to the minimum play area) */
  viewport: Viewport;
  paddle: PaddleState;
  ball: BallState;
  bricks: readonly Brick[];
  score: number;
  lives: number;
  /** True on the tick the last alive brick is destroyed */
  levelCleared: boolean;
}

/** Read-only view handed to renderers. Every field is a copy. */
export interface RenderSnapshot {
  tick: number;
  phase: GamePhase;
  viewport: Viewport;
  paddle: Rect;
  ball: { x: number; y: number; radius: number; launched: boolean };
  /** Alive bricks only */
  bricks: Array<{ id: number; rect: Rect; label: string; lineNumber: number }>;
  renderLines: RenderLine[];
  score: number;
  lives: number;
  gameOver: boolean;
  /** Starts at 1, increments on every level clear */
  level: number;
  /** HUD text, e.g. "Score: 10   Lives: 3" */
  statusText: string;
}

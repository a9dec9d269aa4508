/**
 * Tuning Constants and Simulation Configuration
 *
 * All breakout tuning lives here. Hosts may override any of the
 * gameplay values through SimulationConfig.
 */

/** Fixed tick interval in milliseconds. No delta-time scaling anywhere. */
export const FIXED_TICK_MS = 16;

/** The play area never shrinks below this, whatever the host reports. */
export const MIN_VIEWPORT = {
  width: 640,
  height: 360,
} as const;

/** Paddle geometry and motion. */
export const PADDLE = {
  width: 130,
  height: 12,
  /** Pixels per tick while a direction key is held */
  speed: 9,
  /** Left edge at construction time */
  startX: 300,
  /** Gap kept between paddle and the side walls */
  margin: 10,
  /** Paddle top sits this far above the viewport bottom */
  bottomOffset: 30,
} as const;

/** Ball geometry and launch vector. */
export const BALL = {
  radius: 7,
  launchVx: 3.8,
  launchVy: -4.6,
  /** Resting ball centre sits this far above the viewport bottom */
  restOffset: 42,
  /** vx range after a paddle hit is [-maxDeflection/2, +maxDeflection/2] */
  maxDeflection: 10,
} as const;

export const SCORING = {
  brickReward: 10,
  startingLives: 3,
} as const;

/** Code area geometry used by the brick layout. */
export const LAYOUT = {
  /** Lines kept after anchor rotation */
  maxLines: 56,
  /** Left edge of the first token (gutter sits to the left) */
  codeLeft: 70,
  /** Distance from the viewport's right edge to the last drawable pixel */
  codeRightMargin: 18,
  codeTop: 64,
  codeBottomMargin: 70,
  minLineHeight: 16,
  /** Extra pixels added to the font height for each row */
  lineLeading: 2,
  /** Gutter line numbers are right-aligned to this many columns */
  gutterColumns: 4,
} as const;

/** Monospace approximation of a 10pt code font. */
export const DEFAULT_FONT = {
  charWidth: 7,
  height: 13,
  ascent: 10,
} as const;

export interface SimulationConfig {
  paddleWidth: number;
  paddleHeight: number;
  paddleSpeed: number;
  paddleStartX: number;
  ballRadius: number;
  launchVx: number;
  launchVy: number;
  maxDeflection: number;
  brickReward: number;
  startingLives: number;
  maxLines: number;
}

export const DEFAULT_SIMULATION_CONFIG = {
  paddleWidth: PADDLE.width,
  paddleHeight: PADDLE.height,
  paddleSpeed: PADDLE.speed,
  paddleStartX: PADDLE.startX,
  ballRadius: BALL.radius,
  launchVx: BALL.launchVx,
  launchVy: BALL.launchVy,
  maxDeflection: BALL.maxDeflection,
  brickReward: SCORING.brickReward,
  startingLives: SCORING.startingLives,
  maxLines: LAYOUT.maxLines,
} as const satisfies SimulationConfig;

/** Every tunable key, in declaration order. */
export const SIMULATION_CONFIG_KEYS: ReadonlyArray<keyof SimulationConfig> = [
  'paddleWidth',
  'paddleHeight',
  'paddleSpeed',
  'paddleStartX',
  'ballRadius',
  'launchVx',
  'launchVy',
  'maxDeflection',
  'brickReward',
  'startingLives',
  'maxLines',
];

const POSITIVE_KEYS = ['paddleWidth', 'paddleHeight', 'ballRadius'] as const;
const COUNT_KEYS = ['startingLives', 'maxLines'] as const;

/**
 * Reject tuning that would produce degenerate geometry: sizes must be
 * positive and counts whole numbers of at least 1.
 */
export function validateSimulationConfig(config: SimulationConfig): SimulationConfig {
  for (const key of SIMULATION_CONFIG_KEYS) {
    if (!Number.isFinite(config[key])) {
      throw new Error(`${key} must be a finite number, got ${config[key]}`);
    }
  }
  for (const key of POSITIVE_KEYS) {
    if (config[key] <= 0) {
      throw new Error(`${key} must be greater than 0, got ${config[key]}`);
    }
  }
  for (const key of COUNT_KEYS) {
    if (!Number.isInteger(config[key]) || config[key] < 1) {
      throw new Error(`${key} must be an integer of at least 1, got ${config[key]}`);
    }
  }
  return config;
}

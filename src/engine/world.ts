/**
 * World Step Function — Simulation Orchestrator
 *
 * Wires paddle motion, ball integration and collision response into a
 * single step function. BreakoutSimulation calls it once per tick.
 *
 * Step sequence per tick:
 *   1. Move and clamp the paddle (every phase)
 *   2. WaitingForLaunch: pin the ball to the paddle and stop
 *      GameOver: stop
 *   3. Integrate the ball by its velocity
 *   4. Resolve walls, then paddle, then at most one brick
 *   5. Flag a level clear, or handle the ball falling out
 *   6. Return new WorldState
 *
 * All functions are pure: (state, input) -> newState.
 * No Math.random, no Date.now — fully deterministic.
 */

import type { Brick, PaddleInput, PaddleState, Viewport, WorldState, BallState } from './types';
import { GamePhase } from './types';
import { BALL, MIN_VIEWPORT, PADDLE, DEFAULT_SIMULATION_CONFIG, type SimulationConfig } from './constants';
import {
  resolveWallCollision,
  resolvePaddleCollision,
  resolveBrickCollision,
  isLevelCleared,
  hasFallenOut,
} from './collision';
import { clamp } from './rect';

/** Zero input — nothing held. */
export const NO_INPUT: PaddleInput = { left: false, right: false };

/** Floor a host-reported viewport to the minimum play area. */
export function effectiveViewport(viewport: Viewport): Viewport {
  return {
    width: Math.max(MIN_VIEWPORT.width, viewport.width),
    height: Math.max(MIN_VIEWPORT.height, viewport.height),
  };
}

/** y of the paddle's top edge. */
export function paddleTop(viewport: Viewport): number {
  return viewport.height - PADDLE.bottomOffset;
}

/** Clamp paddle x to [margin, width - paddleWidth - margin]. */
export function clampPaddleX(x: number, paddleWidth: number, viewport: Viewport): number {
  return clamp(x, PADDLE.margin, viewport.width - paddleWidth - PADDLE.margin);
}

/** Ball resting on the paddle centre with the launch velocity loaded. */
export function restingBall(
  paddle: PaddleState,
  viewport: Viewport,
  config: SimulationConfig,
): BallState {
  return {
    x: paddle.x + paddle.width / 2,
    y: viewport.height - BALL.restOffset,
    radius: config.ballRadius,
    vx: config.launchVx,
    vy: config.launchVy,
  };
}

/**
 * Put the ball back on the paddle. The phase goes to WaitingForLaunch
 * unless the game is already over.
 */
export function resetBallOnPaddle(state: WorldState, config: SimulationConfig): WorldState {
  const paddle = {
    ...state.paddle,
    x: clampPaddleX(state.paddle.x, state.paddle.width, state.viewport),
  };
  return {
    ...state,
    paddle,
    ball: restingBall(paddle, state.viewport, config),
    phase: state.phase === GamePhase.GameOver ? GamePhase.GameOver : GamePhase.WaitingForLaunch,
  };
}

/**
 * Create a world with the ball resting on the paddle.
 *
 * @param bricks - Initial brick set (usually from layoutBricks)
 * @param viewport - Host viewport; floored to the minimum play area
 * @param config - Tuning values
 */
export function createWorld(
  bricks: readonly Brick[],
  viewport: Viewport,
  config: SimulationConfig = DEFAULT_SIMULATION_CONFIG,
): WorldState {
  const area = effectiveViewport(viewport);
  const paddle: PaddleState = {
    x: clampPaddleX(config.paddleStartX, config.paddleWidth, area),
    width: config.paddleWidth,
    height: config.paddleHeight,
    speed: config.paddleSpeed,
  };
  return {
    tick: 0,
    phase: GamePhase.WaitingForLaunch,
    viewport: area,
    paddle,
    ball: restingBall(paddle, area, config),
    bricks,
    score: 0,
    lives: config.startingLives,
    levelCleared: false,
  };
}

/**
 * Advance the simulation by one tick.
 *
 * A level clear is only flagged here; rebuilding the brick field needs the
 * source lines, which the caller owns.
 *
 * @param state - Current world state
 * @param input - Held keys for this tick
 * @param config - Tuning values
 * @returns New WorldState after one tick
 */
export function stepWorld(
  state: WorldState,
  input: PaddleInput,
  config: SimulationConfig = DEFAULT_SIMULATION_CONFIG,
): WorldState {
  const { viewport } = state;

  // 1. Paddle
  let paddleX = state.paddle.x;
  if (input.left) paddleX -= state.paddle.speed;
  if (input.right) paddleX += state.paddle.speed;
  const paddle = { ...state.paddle, x: clampPaddleX(paddleX, state.paddle.width, viewport) };

  const next: WorldState = { ...state, tick: state.tick + 1, paddle, levelCleared: false };

  // 2. Phases without ball physics
  if (state.phase === GamePhase.WaitingForLaunch) {
    return {
      ...next,
      ball: { ...state.ball, x: paddle.x + paddle.width / 2, y: viewport.height - BALL.restOffset },
    };
  }
  if (state.phase === GamePhase.GameOver) {
    return next;
  }

  // 3. Integrate
  let ball: BallState = {
    ...state.ball,
    x: state.ball.x + state.ball.vx,
    y: state.ball.y + state.ball.vy,
  };

  // 4. Collisions
  ball = resolveWallCollision(ball, viewport);
  ball = resolvePaddleCollision(ball, paddle, paddleTop(viewport), config.maxDeflection);
  const hit = resolveBrickCollision(ball, state.bricks);
  ball = hit.ball;
  const score = hit.hitIndex >= 0 ? state.score + config.brickReward : state.score;

  const stepped: WorldState = { ...next, ball, bricks: hit.bricks, score };

  // 5. Level clear takes priority: the caller relayouts and re-rests the ball
  if (isLevelCleared(hit.bricks)) {
    return { ...stepped, levelCleared: true };
  }

  if (hasFallenOut(ball, viewport)) {
    const lives = state.lives - 1;
    if (lives <= 0) {
      return { ...stepped, lives: 0, phase: GamePhase.GameOver };
    }
    return resetBallOnPaddle({ ...stepped, lives }, config);
  }

  return stepped;
}

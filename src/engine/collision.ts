/**
 * Ball Collision Response
 *
 * Wall, paddle and brick resolution for the breakout ball. Each resolver
 * takes the ball after integration and returns a new ball (plus whatever
 * else changed). Nothing here knows about score, lives or phases.
 *
 * Response rules:
 *   - Side and top walls reflect the matching velocity component and clamp
 *     the ball back inside. There is no bottom wall.
 *   - The paddle only catches a falling ball. Bounce angle depends on where
 *     the ball hits: centre goes straight up, edges go steep.
 *   - At most one brick is destroyed per call, the first alive brick in
 *     iteration order that overlaps the ball's box.
 */

import type { BallState, Brick, PaddleState, Viewport } from './types';
import { ballBounds, paddleBounds, intersects, clamp } from './rect';

/**
 * Reflect the ball off the left, right and top walls.
 *
 * @param ball - Ball after integration
 * @param viewport - Effective play area
 * @returns Ball clamped inside the walls, or the same object if untouched
 */
export function resolveWallCollision(ball: BallState, viewport: Viewport): BallState {
  let { x, y, vx, vy } = ball;
  const r = ball.radius;

  if (x - r <= 0) {
    x = r;
    vx = -vx;
  }
  if (x + r >= viewport.width) {
    x = viewport.width - r;
    vx = -vx;
  }
  if (y - r <= 0) {
    y = r;
    vy = -vy;
  }

  if (x === ball.x && y === ball.y && vx === ball.vx && vy === ball.vy) {
    return ball;
  }
  return { ...ball, x, y, vx, vy };
}

/**
 * Bounce a falling ball off the paddle.
 *
 * hit = (ballX - paddleX) / paddleWidth, clamped to [0, 1]
 * vx  = (hit - 0.5) * maxDeflection
 *
 * @param ball - Ball after wall resolution
 * @param paddle - Current paddle
 * @param paddleTop - y of the paddle's top edge
 * @param maxDeflection - Full vx range across the paddle
 * @returns Bounced ball, or the same object when there is no contact
 */
export function resolvePaddleCollision(
  ball: BallState,
  paddle: PaddleState,
  paddleTop: number,
  maxDeflection: number,
): BallState {
  if (ball.vy <= 0) return ball;
  if (!intersects(ballBounds(ball), paddleBounds(paddle, paddleTop))) return ball;

  const hit = clamp((ball.x - paddle.x) / paddle.width, 0, 1);
  return {
    ...ball,
    y: paddleTop - ball.radius,
    vy: -Math.abs(ball.vy),
    vx: (hit - 0.5) * maxDeflection,
  };
}

/** Result of a brick scan. hitIndex is -1 when nothing was struck. */
export interface BrickHitResult {
  ball: BallState;
  bricks: readonly Brick[];
  hitIndex: number;
}

/**
 * Destroy the first alive brick overlapping the ball and reflect vy.
 *
 * The returned brick array is a new array only when a brick was hit;
 * the struck brick is replaced by a copy with alive=false.
 */
export function resolveBrickCollision(
  ball: BallState,
  bricks: readonly Brick[],
): BrickHitResult {
  const bounds = ballBounds(ball);

  for (let i = 0; i < bricks.length; i++) {
    const brick = bricks[i];
    if (!brick.alive || !intersects(bounds, brick.rect)) continue;

    const next = bricks.slice();
    next[i] = { ...brick, alive: false };
    return {
      ball: { ...ball, vy: -ball.vy },
      bricks: next,
      hitIndex: i,
    };
  }

  return { ball, bricks, hitIndex: -1 };
}

/** True when the brick set is non-empty and every brick is dead. */
export function isLevelCleared(bricks: readonly Brick[]): boolean {
  return bricks.length > 0 && !bricks.some((b) => b.alive);
}

/** True once the ball's top edge has dropped below the viewport. */
export function hasFallenOut(ball: BallState, viewport: Viewport): boolean {
  return ball.y - ball.radius > viewport.height;
}

/**
 * Axis-Aligned Box Math
 *
 * Pure functions operating on the Rect and Point interfaces. No classes,
 * no mutation. Collision and hover queries are built on these.
 */

import type { Point, Rect, BallState, PaddleState } from './types';

export type { Point, Rect } from './types';

/** Create a new Rect. */
export function rect(x: number, y: number, width: number, height: number): Rect {
  return { x, y, width, height };
}

/** Right edge (x + width). */
export function right(r: Rect): number {
  return r.x + r.width;
}

/** Bottom edge (y + height). */
export function bottom(r: Rect): number {
  return r.y + r.height;
}

/**
 * True when two boxes overlap with positive area.
 * Boxes that only share an edge do not intersect.
 */
export function intersects(a: Rect, b: Rect): boolean {
  return a.x < right(b) && b.x < right(a) && a.y < bottom(b) && b.y < bottom(a);
}

/** True when the point lies inside the box or on its border. */
export function contains(r: Rect, p: Point): boolean {
  return p.x >= r.x && p.x <= right(r) && p.y >= r.y && p.y <= bottom(r);
}

/** Bounding box of the ball circle. */
export function ballBounds(ball: BallState): Rect {
  return {
    x: ball.x - ball.radius,
    y: ball.y - ball.radius,
    width: ball.radius * 2,
    height: ball.radius * 2,
  };
}

/** Paddle box; the paddle's top edge is `top`. */
export function paddleBounds(paddle: PaddleState, top: number): Rect {
  return { x: paddle.x, y: top, width: paddle.width, height: paddle.height };
}

/** Clamp a scalar to [min, max]. */
export function clamp(value: number, min: number, max: number): number {
  return Math.max(min, Math.min(max, value));
}

/**
 * Ball Collision Response Tests
 *
 * Walls, paddle deflection, single-brick destruction per call, level
 * clear detection and the fall-out boundary.
 */

import { describe, it, expect } from 'vitest';
import {
  resolveWallCollision,
  resolvePaddleCollision,
  resolveBrickCollision,
  isLevelCleared,
  hasFallenOut,
} from '../../src/engine/collision';
import type { BallState, Brick, PaddleState } from '../../src/engine/types';
import { rect } from '../../src/engine/rect';

// --- Helpers ---

const VIEWPORT = { width: 640, height: 360 };

function makeBall(overrides: Partial<BallState> = {}): BallState {
  return { x: 320, y: 180, radius: 7, vx: 0, vy: 0, ...overrides };
}

function makePaddle(overrides: Partial<PaddleState> = {}): PaddleState {
  return { x: 300, width: 130, height: 12, speed: 9, ...overrides };
}

function makeBrick(id: number, x: number, y: number, overrides: Partial<Brick> = {}): Brick {
  return {
    id,
    rect: rect(x, y, 20, 16),
    label: `t${id}`,
    sourceText: `t${id} line`,
    lineNumber: id + 1,
    alive: true,
    ...overrides,
  };
}

// --- Walls ---

describe('resolveWallCollision', () => {
  it('reflects off the left wall and clamps to the radius', () => {
    const ball = resolveWallCollision(makeBall({ x: 3, vx: -2 }), VIEWPORT);
    expect(ball.x).toBe(7);
    expect(ball.vx).toBe(2);
  });

  it('reflects off the right wall', () => {
    const ball = resolveWallCollision(makeBall({ x: 636, vx: 3 }), VIEWPORT);
    expect(ball.x).toBe(633);
    expect(ball.vx).toBe(-3);
  });

  it('reflects off the top wall', () => {
    const ball = resolveWallCollision(makeBall({ y: 2, vy: -4 }), VIEWPORT);
    expect(ball.y).toBe(7);
    expect(ball.vy).toBe(4);
  });

  it('has no bottom wall', () => {
    const start = makeBall({ y: 400, vy: 4 });
    expect(resolveWallCollision(start, VIEWPORT)).toBe(start);
  });

  it('returns the same object when nothing is touched', () => {
    const start = makeBall({ vx: 2, vy: 2 });
    expect(resolveWallCollision(start, VIEWPORT)).toBe(start);
  });
});

// --- Paddle ---

describe('resolvePaddleCollision', () => {
  const PADDLE_TOP = 330;

  it('centre hit bounces straight up and sits the ball on the paddle', () => {
    const ball = resolvePaddleCollision(makeBall({ x: 365, y: 325, vx: 2, vy: 4.6 }), makePaddle(), PADDLE_TOP, 10);
    expect(ball.y).toBe(323);
    expect(ball.vy).toBe(-4.6);
    expect(ball.vx).toBe(0);
  });

  it('left edge hit deflects to -maxDeflection/2', () => {
    const ball = resolvePaddleCollision(makeBall({ x: 300, y: 325, vy: 4 }), makePaddle(), PADDLE_TOP, 10);
    expect(ball.vx).toBe(-5);
  });

  it('right edge hit deflects to +maxDeflection/2', () => {
    const ball = resolvePaddleCollision(makeBall({ x: 430, y: 325, vy: 4 }), makePaddle(), PADDLE_TOP, 10);
    expect(ball.vx).toBe(5);
  });

  it('clamps the hit fraction when the ball centre is past the paddle edge', () => {
    const ball = resolvePaddleCollision(makeBall({ x: 295, y: 325, vy: 4 }), makePaddle(), PADDLE_TOP, 10);
    expect(ball.vx).toBe(-5);
  });

  it('edge hits are steeper than centre hits', () => {
    const centre = resolvePaddleCollision(makeBall({ x: 365, y: 325, vy: 4 }), makePaddle(), PADDLE_TOP, 10);
    const edge = resolvePaddleCollision(makeBall({ x: 420, y: 325, vy: 4 }), makePaddle(), PADDLE_TOP, 10);
    expect(Math.abs(edge.vx)).toBeGreaterThan(Math.abs(centre.vx));
  });

  it('ignores a rising ball', () => {
    const start = makeBall({ x: 365, y: 325, vy: -4.6 });
    expect(resolvePaddleCollision(start, makePaddle(), PADDLE_TOP, 10)).toBe(start);
  });

  it('ignores a ball that misses the paddle', () => {
    const start = makeBall({ x: 100, y: 325, vy: 4.6 });
    expect(resolvePaddleCollision(start, makePaddle(), PADDLE_TOP, 10)).toBe(start);
  });
});

// --- Bricks ---

describe('resolveBrickCollision', () => {
  it('destroys only the first overlapping brick in iteration order', () => {
    const bricks = [makeBrick(0, 100, 100), makeBrick(1, 110, 100)];
    const result = resolveBrickCollision(makeBall({ x: 115, y: 108, vy: -3 }), bricks);

    expect(result.hitIndex).toBe(0);
    expect(result.bricks[0].alive).toBe(false);
    expect(result.bricks[1].alive).toBe(true);
    expect(result.ball.vy).toBe(3);
  });

  it('skips dead bricks', () => {
    const bricks = [makeBrick(0, 100, 100, { alive: false }), makeBrick(1, 110, 100)];
    const result = resolveBrickCollision(makeBall({ x: 115, y: 108, vy: -3 }), bricks);

    expect(result.hitIndex).toBe(1);
    expect(result.bricks[1].alive).toBe(false);
  });

  it('does not mutate the input array', () => {
    const bricks = [makeBrick(0, 100, 100)];
    const result = resolveBrickCollision(makeBall({ x: 110, y: 108, vy: -3 }), bricks);

    expect(bricks[0].alive).toBe(true);
    expect(result.bricks).not.toBe(bricks);
  });

  it('returns inputs unchanged on a miss', () => {
    const bricks = [makeBrick(0, 100, 100)];
    const ball = makeBall({ x: 400, y: 300, vy: -3 });
    const result = resolveBrickCollision(ball, bricks);

    expect(result.hitIndex).toBe(-1);
    expect(result.ball).toBe(ball);
    expect(result.bricks).toBe(bricks);
  });
});

describe('isLevelCleared', () => {
  it('an empty set is not a clear', () => {
    expect(isLevelCleared([])).toBe(false);
  });

  it('is true only when every brick is dead', () => {
    expect(isLevelCleared([makeBrick(0, 0, 0, { alive: false })])).toBe(true);
    expect(isLevelCleared([makeBrick(0, 0, 0, { alive: false }), makeBrick(1, 0, 0)])).toBe(false);
  });
});

describe('hasFallenOut', () => {
  it('requires the top edge to pass the viewport bottom', () => {
    expect(hasFallenOut(makeBall({ y: 367 }), VIEWPORT)).toBe(false);
    expect(hasFallenOut(makeBall({ y: 368 }), VIEWPORT)).toBe(true);
  });
});

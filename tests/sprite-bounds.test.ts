/**
 * Sprite corner points and edge accessor tests
 * 精灵角点与边缘访问器测试
 */

import { describe, test, expect } from 'vitest';
import { Sprite } from '../src/sprites/Sprite';
import { createTexture } from '../src/resources/Texture';
import { rotate } from '../src/math/rotate';
import type { Point2D } from '../src/math/rotate';

function makeSprite(width: number, height: number, x = 0, y = 0): Sprite {
  const sprite = new Sprite(createTexture('box', width, height), 1);
  sprite.setPosition(x, y);
  return sprite;
}

function expectPoint(actual: Point2D, x: number, y: number): void {
  expect(actual.x).toBeCloseTo(x, 10);
  expect(actual.y).toBeCloseTo(y, 10);
}

describe('Sprite corner points', () => {
  test('should return axis-aligned corners for an unrotated sprite', () => {
    const sprite = makeSprite(4, 2, 10, 20);
    const points = sprite.getPoints();

    expectPoint(points[0], 8, 19);
    expectPoint(points[1], 12, 19);
    expectPoint(points[2], 12, 21);
    expectPoint(points[3], 8, 21);
  });

  test('should report edges of an unrotated sprite', () => {
    const sprite = makeSprite(4, 2, 10, 20);

    expect(sprite.bottom).toBe(19);
    expect(sprite.top).toBe(21);
    expect(sprite.left).toBe(8);
    expect(sprite.right).toBe(12);
  });

  test('should rotate corners about the center', () => {
    const sprite = makeSprite(4, 2);
    sprite.angle = 90;
    const points = sprite.getPoints();

    expectPoint(points[0], 1, -2);
    expectPoint(points[1], 1, 2);
    expectPoint(points[2], -1, 2);
    expectPoint(points[3], -1, -2);

    expect(sprite.bottom).toBeCloseTo(-2, 10);
    expect(sprite.top).toBeCloseTo(2, 10);
    expect(sprite.left).toBeCloseTo(-1, 10);
    expect(sprite.right).toBeCloseTo(1, 10);
  });

  test.each([90, 180, 270])('should agree with rotate() at %i degrees', (angle) => {
    const sprite = makeSprite(6, 3, -5, 7);
    sprite.angle = angle;

    const corners: Array<[number, number]> = [
      [-8, 5.5],
      [-2, 5.5],
      [-2, 8.5],
      [-8, 8.5],
    ];
    const points = sprite.getPoints();

    corners.forEach(([x, y], i) => {
      const expected = rotate(x, y, -5, 7, angle);
      expectPoint(points[i], expected.x, expected.y);
    });
  });

  test('should recompute points after the sprite moves', () => {
    const sprite = makeSprite(2, 2);
    const before = sprite.points;

    sprite.setPosition(5, 5);
    const after = sprite.points;

    expectPoint(before[0], -1, -1);
    expectPoint(after[0], 4, 4);
  });

  test('should collapse to the center for a frame-less sprite', () => {
    const sprite = new Sprite();
    sprite.setPosition(3, 4);

    for (const point of sprite.getPoints()) {
      expectPoint(point, 3, 4);
    }
  });
});

describe('Sprite edge setters', () => {
  test('should move the bottom edge to the target', () => {
    const sprite = makeSprite(1, 1);

    expect(sprite.bottom).toBe(-0.5);

    sprite.bottom = 1;

    expect(sprite.centerY).toBe(1.5);
    expect(sprite.bottom).toBe(1);
  });

  test('should move the top edge to the target', () => {
    const sprite = makeSprite(2, 2);

    sprite.top = 0;

    expect(sprite.centerY).toBe(-1);
    expect(sprite.top).toBe(0);
  });

  test('should move the left edge to the target', () => {
    const sprite = makeSprite(2, 2);

    sprite.left = 3;

    expect(sprite.centerX).toBe(4);
    expect(sprite.left).toBe(3);
  });

  test('should move the right edge to the target', () => {
    const sprite = makeSprite(2, 2);

    sprite.right = -2;

    expect(sprite.centerX).toBe(-3);
    expect(sprite.right).toBe(-2);
  });

  test('should only translate the sprite', () => {
    const sprite = makeSprite(4, 2, 1, 1);
    sprite.angle = 30;

    sprite.bottom = 10;
    sprite.left = -10;

    expect(sprite.width).toBe(4);
    expect(sprite.height).toBe(2);
    expect(sprite.angle).toBe(30);
  });

  test.each([0, 30, 90, 135, 200])('should round-trip every edge at %i degrees', (angle) => {
    const sprite = makeSprite(5, 3, 2, -1);
    sprite.scale = 1;
    sprite.angle = angle;

    sprite.top = 7;
    expect(sprite.top).toBeCloseTo(7, 10);

    sprite.bottom = -4;
    expect(sprite.bottom).toBeCloseTo(-4, 10);

    sprite.left = 12;
    expect(sprite.left).toBeCloseTo(12, 10);

    sprite.right = -6;
    expect(sprite.right).toBeCloseTo(-6, 10);
  });

  test('should round-trip edges on a scaled sprite', () => {
    const sprite = new Sprite(createTexture('box', 10, 4), 0.25);
    sprite.angle = 45;

    sprite.top = 2;
    sprite.right = 2;

    expect(sprite.top).toBeCloseTo(2, 10);
    expect(sprite.right).toBeCloseTo(2, 10);
  });
});

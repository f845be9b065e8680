/**
 * Tests for point rotation utilities
 * 点旋转工具测试
 */

import { describe, test, expect } from 'vitest';
import { rotate, toRadians, toDegrees } from '../src/math/rotate';

describe('rotate', () => {
  test('should leave a point unchanged at zero degrees', () => {
    expect(rotate(3, 4, 0, 0, 0)).toEqual({ x: 3, y: 4 });
  });

  test('should rotate counter-clockwise for positive angles', () => {
    const p = rotate(1, 0, 0, 0, 90);

    expect(p.x).toBeCloseTo(0, 10);
    expect(p.y).toBeCloseTo(1, 10);
  });

  test('should rotate clockwise for negative angles', () => {
    const p = rotate(1, 0, 0, 0, -90);

    expect(p.x).toBeCloseTo(0, 10);
    expect(p.y).toBeCloseTo(-1, 10);
  });

  test('should rotate about an arbitrary pivot', () => {
    const p = rotate(2, 1, 1, 1, 180);

    expect(p.x).toBeCloseTo(0, 10);
    expect(p.y).toBeCloseTo(1, 10);
  });

  test('should accept angles outside [0, 360)', () => {
    const a = rotate(5, 2, 1, -1, 450);
    const b = rotate(5, 2, 1, -1, 90);

    expect(a.x).toBeCloseTo(b.x, 10);
    expect(a.y).toBeCloseTo(b.y, 10);
  });
});

describe('angle conversion', () => {
  test('should convert degrees to radians', () => {
    expect(toRadians(180)).toBeCloseTo(Math.PI, 12);
    expect(toRadians(0)).toBe(0);
  });

  test('should convert radians to degrees', () => {
    expect(toDegrees(Math.PI / 2)).toBeCloseTo(90, 10);
    expect(toDegrees(0)).toBe(0);
  });
});

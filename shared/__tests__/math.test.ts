import { describe, it, expect } from 'vitest';
import {
  aabbFromCenter,
  centerOf,
  clampInside,
  contains,
  facingOf,
  facingVector,
  intersects,
  normalize,
  setCenter,
} from '../math';
import type { Aabb } from '../types';

const ARENA: Aabb = { left: 48, top: 48, width: 544, height: 384 };

describe('facingOf', () => {
  it('defaults to up for the zero vector', () => {
    expect(facingOf({ x: 0, y: 0 })).toBe('up');
  });

  it('picks the dominant axis', () => {
    expect(facingOf({ x: 1, y: 0 })).toBe('right');
    expect(facingOf({ x: -3, y: 1 })).toBe('left');
    expect(facingOf({ x: 0.2, y: -5 })).toBe('up');
    expect(facingOf({ x: 0, y: 2 })).toBe('down');
  });

  it('goes vertical on ties', () => {
    expect(facingOf({ x: 1, y: 1 })).toBe('down');
    expect(facingOf({ x: -1, y: -1 })).toBe('up');
  });

  it('round-trips through facingVector', () => {
    expect(facingVector('left')).toEqual({ x: -1, y: 0 });
    expect(facingOf(facingVector('right'))).toBe('right');
  });
});

describe('normalize', () => {
  it('scales to unit length', () => {
    expect(normalize({ x: 3, y: 4 })).toEqual({ x: 0.6, y: 0.8 });
  });

  it('leaves the zero vector alone', () => {
    expect(normalize({ x: 0, y: 0 })).toEqual({ x: 0, y: 0 });
  });
});

describe('bounding boxes', () => {
  it('centers a box on a position', () => {
    const box = aabbFromCenter({ x: 100, y: 100 }, 52, 56);
    expect(box).toEqual({ left: 74, top: 72, width: 52, height: 56 });
    expect(centerOf(box)).toEqual({ x: 100, y: 100 });
  });

  it('rounds fractional positions when centering', () => {
    const box = aabbFromCenter({ x: 0, y: 0 }, 52, 56);
    setCenter(box, { x: 100.5, y: 99.4 });
    expect(box.left).toBe(75);
    expect(box.top).toBe(71);
  });

  it('puts the center of odd sizes toward the top-left', () => {
    const box = aabbFromCenter({ x: 10, y: 10 }, 5, 5);
    expect(box.left).toBe(8);
    expect(centerOf(box)).toEqual({ x: 10, y: 10 });
  });

  it('does not count shared edges as overlap', () => {
    const a: Aabb = { left: 0, top: 0, width: 10, height: 10 };
    expect(intersects(a, { left: 10, top: 0, width: 10, height: 10 })).toBe(false);
    expect(intersects(a, { left: 9, top: 0, width: 10, height: 10 })).toBe(true);
  });

  it('treats touching edges as contained', () => {
    expect(contains(ARENA, { ...ARENA })).toBe(true);
    expect(contains(ARENA, { left: 47, top: 100, width: 10, height: 10 })).toBe(false);
  });

  it('clamps a box back inside bounds', () => {
    const box: Aabb = { left: 590, top: 40, width: 52, height: 56 };
    clampInside(box, ARENA);
    expect(box.left).toBe(540);
    expect(box.top).toBe(48);
  });

  it('centers a box wider than the bounds', () => {
    const box: Aabb = { left: 0, top: 100, width: 600, height: 10 };
    clampInside(box, ARENA);
    expect(box.left).toBe(20);
    expect(box.top).toBe(100);
  });
});

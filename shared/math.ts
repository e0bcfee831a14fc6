// ============================================
// Shared Math Helpers
// Vector, orientation, and bounding-box geometry
// ============================================

import type { Aabb, Facing, Position, Vector2 } from './types';

/**
 * Calculate distance between two positions
 */
export function distance(p1: Position, p2: Position): number {
  const dx = p1.x - p2.x;
  const dy = p1.y - p2.y;
  return Math.sqrt(dx * dx + dy * dy);
}

export function lengthSquared(v: Vector2): number {
  return v.x * v.x + v.y * v.y;
}

export function isZeroVector(v: Vector2): boolean {
  return v.x === 0 && v.y === 0;
}

/**
 * Normalize a vector to unit length.
 * Zero vectors come back as zero - callers decide the fallback direction.
 */
export function normalize(v: Vector2): Vector2 {
  const len = Math.sqrt(lengthSquared(v));
  if (len === 0) {
    return { x: 0, y: 0 };
  }
  return { x: v.x / len, y: v.y / len };
}

// ============================================
// Orientation
// ============================================

const FACING_VECTORS: Record<Facing, Vector2> = {
  up: { x: 0, y: -1 },
  down: { x: 0, y: 1 },
  left: { x: -1, y: 0 },
  right: { x: 1, y: 0 },
};

/**
 * Closest cardinal facing for a direction.
 * Strictly larger |x| picks horizontal; ties go vertical; zero is 'up'.
 */
export function facingOf(direction: Vector2): Facing {
  if (isZeroVector(direction)) {
    return 'up';
  }
  if (Math.abs(direction.x) > Math.abs(direction.y)) {
    return direction.x > 0 ? 'right' : 'left';
  }
  return direction.y > 0 ? 'down' : 'up';
}

/**
 * Unit vector for a facing (screen space: up is -y).
 */
export function facingVector(facing: Facing): Vector2 {
  const v = FACING_VECTORS[facing];
  return { x: v.x, y: v.y };
}

export function isHorizontal(facing: Facing): boolean {
  return facing === 'left' || facing === 'right';
}

// ============================================
// Axis-Aligned Bounding Boxes
// Integer edges; centers round toward the top-left like a raster rect
// ============================================

export function aabbFromCenter(center: Position, width: number, height: number): Aabb {
  const box: Aabb = { left: 0, top: 0, width, height };
  setCenter(box, center);
  return box;
}

export function right(box: Aabb): number {
  return box.left + box.width;
}

export function bottom(box: Aabb): number {
  return box.top + box.height;
}

export function centerX(box: Aabb): number {
  return box.left + Math.floor(box.width / 2);
}

export function centerY(box: Aabb): number {
  return box.top + Math.floor(box.height / 2);
}

export function centerOf(box: Aabb): Position {
  return { x: centerX(box), y: centerY(box) };
}

/**
 * Move a box so its center sits on the rounded position.
 */
export function setCenter(box: Aabb, position: Position): void {
  box.left = Math.round(position.x) - Math.floor(box.width / 2);
  box.top = Math.round(position.y) - Math.floor(box.height / 2);
}

/**
 * Strict overlap test. Boxes that only share an edge do not intersect.
 */
export function intersects(a: Aabb, b: Aabb): boolean {
  return (
    a.left < right(b) &&
    a.top < bottom(b) &&
    right(a) > b.left &&
    bottom(a) > b.top
  );
}

/**
 * True when inner lies entirely within outer (shared edges count as inside).
 */
export function contains(outer: Aabb, inner: Aabb): boolean {
  return (
    inner.left >= outer.left &&
    inner.top >= outer.top &&
    right(inner) <= right(outer) &&
    bottom(inner) <= bottom(outer)
  );
}

/**
 * Shift a box in place so it lies inside bounds.
 * A box wider (or taller) than bounds is centered on that axis.
 */
export function clampInside(box: Aabb, bounds: Aabb): void {
  if (box.width >= bounds.width) {
    box.left = centerX(bounds) - Math.floor(box.width / 2);
  } else if (box.left < bounds.left) {
    box.left = bounds.left;
  } else if (right(box) > right(bounds)) {
    box.left = right(bounds) - box.width;
  }

  if (box.height >= bounds.height) {
    box.top = centerY(bounds) - Math.floor(box.height / 2);
  } else if (box.top < bounds.top) {
    box.top = bounds.top;
  } else if (bottom(box) > bottom(bounds)) {
    box.top = bottom(bounds) - box.height;
  }
}

export function copyAabb(box: Aabb): Aabb {
  return { left: box.left, top: box.top, width: box.width, height: box.height };
}

// ============================================
// Spawning Helpers
// Rejection-sampled obstacle placement around the spawn points
// ============================================

import { aabbFromCenter, distance, intersects } from '@tank-arena/shared';
import type { Aabb, Position } from '@tank-arena/shared';
import { getConfig } from '../config';
import { randomInt, type RandomSource } from './random';

export interface ObstaclePlacementOptions {
  count?: number;
  maxAttempts?: number;
  /** Sampling area is the arena shrunk by this much on every side */
  inset?: number;
  minDistance?: number;
  safeRadius?: number;
  width?: number;
  height?: number;
}

export interface ObstaclePlacement {
  positions: Position[];
  attempts: number;
  requested: number;
}

/**
 * Check if a candidate position is far enough from both spawn points
 */
export function isClearOfSpawns(
  position: Position,
  spawns: readonly Position[],
  safeRadius: number
): boolean {
  return spawns.every((spawn) => distance(position, spawn) >= safeRadius);
}

/**
 * Place up to `count` obstacles by rejection sampling.
 *
 * Candidates are integer centers drawn uniformly from the inset area (both
 * ends inclusive). A candidate is rejected when its box overlaps a placed
 * obstacle, when it sits closer than minDistance to a placed obstacle's
 * center, or when it is inside safeRadius of either spawn. Running out of
 * attempts returns whatever was placed.
 */
export function generateObstacles(
  arena: Aabb,
  playerSpawn: Position,
  enemySpawn: Position,
  random: RandomSource,
  options: ObstaclePlacementOptions = {}
): ObstaclePlacement {
  const count = options.count ?? getConfig('OBSTACLE_COUNT');
  const maxAttempts = options.maxAttempts ?? getConfig('OBSTACLE_MAX_ATTEMPTS');
  const inset = options.inset ?? getConfig('OBSTACLE_INSET');
  const minDistance = options.minDistance ?? getConfig('OBSTACLE_MIN_DISTANCE');
  const safeRadius = options.safeRadius ?? getConfig('OBSTACLE_SAFE_RADIUS');
  const width = options.width ?? getConfig('OBSTACLE_WIDTH');
  const height = options.height ?? getConfig('OBSTACLE_HEIGHT');

  const minX = arena.left + inset;
  const maxX = arena.left + arena.width - inset;
  const minY = arena.top + inset;
  const maxY = arena.top + arena.height - inset;

  const positions: Position[] = [];
  const boxes: Aabb[] = [];
  const spawns = [playerSpawn, enemySpawn];
  let attempts = 0;

  while (positions.length < count && attempts < maxAttempts) {
    attempts++;
    const candidate = { x: randomInt(random, minX, maxX), y: randomInt(random, minY, maxY) };
    const box = aabbFromCenter(candidate, width, height);

    const tooClose = positions.some(
      (placed, i) => intersects(box, boxes[i]) || distance(candidate, placed) < minDistance
    );
    if (tooClose || !isClearOfSpawns(candidate, spawns, safeRadius)) continue;

    positions.push(candidate);
    boxes.push(box);
  }

  return { positions, attempts, requested: count };
}

// ============================================
// ECS Component Interfaces
// All component data shapes for the ECS
// ============================================

import type { Aabb, Blocker, Facing, RoundOutcome, TankRole, Vector2 } from '../types';
import type { EntityId } from './types';

// ============================================
// Core Components (shared by multiple entity types)
// ============================================

/**
 * Position - authoritative float position of an entity's center.
 * Used by: Tanks, Projectiles, Obstacles
 */
export interface PositionComponent {
  x: number;
  y: number;
}

/**
 * Body - collision footprint.
 * Kept in sync with Position after every mutation:
 * center(aabb) === round(position).
 */
export interface BodyComponent {
  aabb: Aabb;
}

// ============================================
// Tank Components
// ============================================

export interface TankComponent {
  role: TankRole;
  facing: Facing; // Derived from the last non-zero move direction
  speed: number; // px/s
}

/**
 * Health - integer hit points. Strictly decreasing, may go negative.
 */
export interface HealthComponent {
  current: number;
  max: number;
}

/**
 * Cannon - reload bookkeeping for a tank's main gun.
 * lastShotAt starts at -Infinity so the first shot is always allowed.
 */
export interface CannonComponent {
  reloadMs: number;
  lastShotAt: number; // Monotonic ms
  projectileSpeed: number; // px/s
}

/**
 * Input - current intent from the input collaborator.
 * direction components are -1, 0, or 1.
 */
export interface InputComponent {
  direction: Vector2;
  fire: boolean;
}

/**
 * AIController - enemy decision state machine.
 * committed: keep driving in `direction` until the timer runs out.
 * deciding: pick a new direction on the next update.
 */
export type AIControllerMode = 'committed' | 'deciding';

export interface AIControllerComponent {
  mode: AIControllerMode;
  direction: Vector2;
  decisionTimer: number; // seconds
  target: EntityId; // The tank this controller hunts
}

// ============================================
// Projectile Components
// ============================================

export interface ProjectileComponent {
  direction: Vector2; // Unit length
  speed: number; // px/s
  facing: Facing;
  ownerEntity: EntityId; // Attribution only - owner may already be gone
}

// ============================================
// Resources (singleton data)
// ============================================

export interface TimeResource {
  nowMs: number;
  tick: number;
}

export interface ArenaResource {
  bounds: Aabb;
}

export interface RoundResource {
  outcome: RoundOutcome;
  endedAtMs?: number;
}

/**
 * Blockers - the ordered blocker set for the current tick.
 * Tanks first, then obstacles, in creation order.
 */
export interface BlockersResource {
  list: Blocker[];
}

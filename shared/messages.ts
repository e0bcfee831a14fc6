// ============================================
// Arena Events
// Emitted by the simulation each tick for presentation and logging
// ============================================

import type { Aabb, Facing, Position, RoundOutcome, TankRole } from './types';

export interface TankMovedEvent {
  type: 'tankMoved';
  entity: number;
  role: TankRole;
  position: Position;
  facing: Facing;
}

export interface ProjectileFiredEvent {
  type: 'projectileFired';
  projectile: number;
  ownerEntity: number;
  bounds: Aabb;
  facing: Facing;
}

// Projectile left the arena
export interface ProjectileExpiredEvent {
  type: 'projectileExpired';
  projectile: number;
}

// Projectile absorbed by an obstacle
export interface ProjectileBlockedEvent {
  type: 'projectileBlocked';
  projectile: number;
  obstacle: number;
}

export interface TankHitEvent {
  type: 'tankHit';
  entity: number;
  role: TankRole;
  attackerEntity: number;
  healthRemaining: number;
}

export interface TankDestroyedEvent {
  type: 'tankDestroyed';
  entity: number;
  role: TankRole;
  position: Position;
}

export interface RoundEndedEvent {
  type: 'roundEnded';
  outcome: Exclude<RoundOutcome, 'playing'>;
}

export type ArenaEvent =
  | TankMovedEvent
  | ProjectileFiredEvent
  | ProjectileExpiredEvent
  | ProjectileBlockedEvent
  | TankHitEvent
  | TankDestroyedEvent
  | RoundEndedEvent;

export type ArenaEventType = ArenaEvent['type'];

/**
 * Receiver for simulation events. The render or logging layer
 * plugs in here; the core never draws.
 */
export interface ArenaEventSink {
  emit(event: ArenaEvent): void;
}

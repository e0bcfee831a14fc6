// ============================================
// ECS System Types
// ============================================

import type { ArenaEventSink, World } from '@tank-arena/shared';

/**
 * Base System interface
 * All arena systems implement this interface
 */
export interface System {
  /** System name for debugging/logging */
  readonly name: string;

  /**
   * Called every tick
   * @param world The ECS World containing all entities and components
   * @param deltaTime Time since last tick in seconds
   * @param events Sink for simulation events (render, logging)
   */
  update(world: World, deltaTime: number, events: ArenaEventSink): void;
}

/**
 * System priority - determines update order
 * Lower numbers run first
 *
 * 1. Player drives and fires
 * 2. Enemy controller decides, drives and fires
 * 3. Projectiles advance, out-of-arena ones expire
 * 4. Hits resolve (obstacles absorb, tanks take damage, round may end)
 */
export const SystemPriority = {
  PLAYER_CONTROL: 100,
  TANK_AI: 200,
  PROJECTILE: 300,
  HIT: 400,
} as const;

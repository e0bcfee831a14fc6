// ============================================
// Tank Movement & Damage
// ============================================

import {
  Components,
  centerX,
  centerY,
  clampInside,
  contains,
  facingOf,
  isZeroVector,
  normalize,
  setCenter,
} from '@tank-arena/shared';
import type { Aabb, ArenaEventSink, Blocker, EntityId, Vector2, World } from '@tank-arena/shared';
import { getConfig } from './config';
import { getArena, requireBody, requireHealth, requirePosition, requireTank } from './ecs/factories';
import { findOverlap, othersOf, pushApart, slide, type Contact } from './helpers/collision';

export interface MoveOutcome {
  /** Whether the box center changed */
  moved: boolean;
  /** Blockers overlapped while resolving, in blocker order */
  contacts: Contact[];
}

/**
 * Move a tank by direction * speed * dt, resolving collisions against
 * `blockers` (the mover's own entry is skipped).
 *
 * 1. Full diagonal move, clamped to the arena.
 * 2. One push-apart pass over overlapping blockers.
 * 3. If something still overlaps, slide along the dominant axis from the
 *    pre-move position with flush contact.
 *
 * A non-zero direction always updates facing, even when dt is 0.
 * Negative or non-finite dt leaves the tank untouched.
 */
export function moveTank(
  world: World,
  entity: EntityId,
  direction: Vector2,
  dt: number,
  blockers: readonly Blocker[] = []
): MoveOutcome {
  if (!Number.isFinite(dt) || dt < 0) return { moved: false, contacts: [] };

  const tank = requireTank(world, entity);
  const position = requirePosition(world, entity);
  const box = requireBody(world, entity).aabb;
  const arena = getArena(world).bounds;

  let unit: Vector2 = { x: 0, y: 0 };
  if (!isZeroVector(direction)) {
    unit = normalize(direction);
    tank.facing = facingOf(unit);
  }

  const displacement = { x: unit.x * tank.speed * dt, y: unit.y * tank.speed * dt };
  if (displacement.x === 0 && displacement.y === 0) return { moved: false, contacts: [] };

  const origin = { x: position.x, y: position.y };
  const startX = centerX(box);
  const startY = centerY(box);

  position.x += displacement.x;
  position.y += displacement.y;
  setCenter(box, position);
  keepInArena(position, box, arena);

  const others = othersOf(blockers, entity);
  const contacts = pushApart(
    position,
    box,
    others,
    getConfig('COLLISION_PUSH_DISTANCE'),
    getConfig('TANK_COLLISION_THRESHOLD')
  );

  if (contacts.length > 0 && findOverlap(box, others)) {
    slide(position, box, origin, displacement, others);
  }

  keepInArena(position, box, arena);

  return {
    moved: centerX(box) !== startX || centerY(box) !== startY,
    contacts,
  };
}

function keepInArena(position: Vector2, box: Aabb, arena: Aabb): void {
  if (contains(arena, box)) return;
  clampInside(box, arena);
  position.x = centerX(box);
  position.y = centerY(box);
}

/**
 * Apply one hit. Returns true when the tank is destroyed (health <= 0).
 * Health is not clamped.
 */
export function takeHit(world: World, entity: EntityId): boolean {
  const health = requireHealth(world, entity);
  health.current -= 1;
  return health.current <= 0;
}

export function isAlive(world: World, entity: EntityId): boolean {
  const health = world.getComponent(entity, Components.Health);
  return health !== undefined && health.current > 0;
}

export function emitTankMoved(world: World, entity: EntityId, events: ArenaEventSink): void {
  const tank = requireTank(world, entity);
  const pos = requirePosition(world, entity);
  events.emit({
    type: 'tankMoved',
    entity,
    role: tank.role,
    position: { x: pos.x, y: pos.y },
    facing: tank.facing,
  });
}

// ============================================
// Arena Snapshot
// Convert arena entities into the per-tick render format
// ============================================

import { Components, Tags, copyAabb } from '@tank-arena/shared';
import type {
  ArenaSnapshot,
  EntityId,
  ObstacleSnapshot,
  ProjectileSnapshot,
  TankSnapshot,
  World,
} from '@tank-arena/shared';
import { getArena, getRound } from '../factories';

/**
 * Build a TankSnapshot for a tank entity.
 * Returns null if components are missing. Health is clamped at 0 for display.
 */
export function buildTankSnapshot(world: World, entity: EntityId): TankSnapshot | null {
  const tank = world.getComponent(entity, Components.Tank);
  const pos = world.getComponent(entity, Components.Position);
  const body = world.getComponent(entity, Components.Body);
  const health = world.getComponent(entity, Components.Health);
  if (!tank || !pos || !body || !health) return null;

  return {
    entity,
    role: tank.role,
    position: { x: pos.x, y: pos.y },
    bounds: copyAabb(body.aabb),
    facing: tank.facing,
    health: Math.max(0, health.current),
    maxHealth: health.max,
  };
}

export function buildProjectileSnapshot(world: World, entity: EntityId): ProjectileSnapshot | null {
  const projectile = world.getComponent(entity, Components.Projectile);
  const body = world.getComponent(entity, Components.Body);
  if (!projectile || !body) return null;

  return {
    entity,
    ownerEntity: projectile.ownerEntity,
    bounds: copyAabb(body.aabb),
    facing: projectile.facing,
  };
}

export function buildObstacleSnapshot(world: World, entity: EntityId): ObstacleSnapshot | null {
  const body = world.getComponent(entity, Components.Body);
  if (!body) return null;
  return { entity, bounds: copyAabb(body.aabb) };
}

function collect<T>(
  world: World,
  entities: EntityId[],
  build: (world: World, entity: EntityId) => T | null
): T[] {
  const result: T[] = [];
  for (const entity of entities) {
    const snapshot = build(world, entity);
    if (snapshot) result.push(snapshot);
  }
  return result;
}

/**
 * Everything the render collaborator needs for one frame.
 * Boxes are copies; mutating the snapshot never touches the world.
 */
export function buildArenaSnapshot(world: World): ArenaSnapshot {
  return {
    arena: copyAabb(getArena(world).bounds),
    outcome: getRound(world).outcome,
    tanks: collect(world, world.getEntitiesWithTag(Tags.Tank), buildTankSnapshot),
    projectiles: collect(world, world.getEntitiesWithTag(Tags.Projectile), buildProjectileSnapshot),
    obstacles: collect(world, world.getEntitiesWithTag(Tags.Obstacle), buildObstacleSnapshot),
  };
}

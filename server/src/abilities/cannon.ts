import { facingVector, centerX, centerY, right, bottom, copyAabb } from '@tank-arena/shared';
import type { Aabb, EntityId, Facing, Position, World } from '@tank-arena/shared';
import { getConfig } from '../config';
import { logger } from '../logger';
import { createProjectile, requireBody, requireCannon, requireProjectile, requireTank } from '../ecs/factories';
import type { AbilityContext } from './types';

/**
 * Check if a tank's cannon has reloaded at `nowMs`.
 */
export function canFire(world: World, entity: EntityId, nowMs: number): boolean {
  const cannon = requireCannon(world, entity);
  return nowMs - cannon.lastShotAt >= cannon.reloadMs;
}

/**
 * Where a projectile fired from `box` toward `facing` starts: centered on the
 * cross axis, half a projectile beyond the facing edge so it never begins
 * inside the tank.
 */
export function projectileSpawnPoint(box: Aabb, facing: Facing, projectileSize: number): Position {
  const half = Math.floor(projectileSize / 2);
  switch (facing) {
    case 'up':
      return { x: centerX(box), y: box.top - half };
    case 'down':
      return { x: centerX(box), y: bottom(box) + half };
    case 'left':
      return { x: box.left - half, y: centerY(box) };
    case 'right':
      return { x: right(box) + half, y: centerY(box) };
  }
}

/**
 * Fire the tank's cannon along its facing.
 * @returns the projectile entity, or null while reloading
 */
export function shoot(ctx: AbilityContext, entity: EntityId, nowMs: number): EntityId | null {
  const { world } = ctx;
  if (!canFire(world, entity, nowMs)) return null;

  const tank = requireTank(world, entity);
  const cannon = requireCannon(world, entity);
  const box = requireBody(world, entity).aabb;

  const spawn = projectileSpawnPoint(box, tank.facing, getConfig('PROJECTILE_SIZE'));
  const projectile = createProjectile(
    world,
    spawn,
    facingVector(tank.facing),
    cannon.projectileSpeed,
    entity
  );
  cannon.lastShotAt = nowMs;

  const { facing } = requireProjectile(world, projectile);
  ctx.events.emit({
    type: 'projectileFired',
    projectile,
    ownerEntity: entity,
    bounds: copyAabb(requireBody(world, projectile).aabb),
    facing,
  });

  logger.debug({ event: 'projectile_fired', entity, projectile, facing, nowMs });

  return projectile;
}

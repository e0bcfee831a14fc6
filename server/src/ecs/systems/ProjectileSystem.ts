// ============================================
// Projectile System
// Straight-line flight and arena expiry
// ============================================

import { intersects, setCenter, type ArenaEventSink, type EntityId, type World } from '@tank-arena/shared';
import type { System } from './types';
import { destroyEntity, forEachProjectile, getArena, requireBody, requirePosition, requireProjectile } from '../factories';

/**
 * Advance a projectile by direction * speed * dt.
 * @returns true once its box no longer touches the arena (expired)
 */
export function advanceProjectile(world: World, entity: EntityId, dt: number): boolean {
  const projectile = requireProjectile(world, entity);
  const position = requirePosition(world, entity);
  const box = requireBody(world, entity).aabb;

  if (Number.isFinite(dt) && dt > 0) {
    position.x += projectile.direction.x * projectile.speed * dt;
    position.y += projectile.direction.y * projectile.speed * dt;
    setCenter(box, position);
  }

  return !intersects(getArena(world).bounds, box);
}

/**
 * ProjectileSystem - moves projectiles, destroys the ones that left the arena
 */
export class ProjectileSystem implements System {
  readonly name = 'ProjectileSystem';

  update(world: World, deltaTime: number, events: ArenaEventSink): void {
    forEachProjectile(world, (entity) => {
      if (advanceProjectile(world, entity, deltaTime)) {
        destroyEntity(world, entity);
        events.emit({ type: 'projectileExpired', projectile: entity });
      }
    });
  }
}

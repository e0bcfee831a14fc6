// ============================================
// Hit System
// Projectile impacts: obstacles absorb, tanks take damage
// ============================================

import { intersects, type ArenaEventSink, type EntityId, type World } from '@tank-arena/shared';
import type { System } from './types';
import {
  destroyEntity,
  forEachProjectile,
  getBlockers,
  getRound,
  getTime,
  requireBody,
  requireHealth,
  requirePosition,
  requireProjectile,
  requireTank,
} from '../factories';
import { takeHit } from '../../tanks';
import { logRoundEnded, logTankDestroyed } from '../../logger';

/**
 * HitSystem - resolves every projectile overlap once per tick
 *
 * - A projectile touching an obstacle is absorbed, even if it also touches a tank.
 * - Otherwise a projectile touching a tank other than its owner is destroyed.
 * - A tank struck by any number of projectiles in one tick takes one hit.
 * - A destroyed tank leaves the world and ends the round. When both tanks
 *   die in the same tick the player's loss wins out.
 */
export class HitSystem implements System {
  readonly name = 'HitSystem';

  update(world: World, _deltaTime: number, events: ArenaEventSink): void {
    const blockers = getBlockers(world);
    // Struck tank -> first projectile owner that hit it this tick
    const struck = new Map<EntityId, EntityId>();

    forEachProjectile(world, (projectile) => {
      const { ownerEntity } = requireProjectile(world, projectile);
      const box = requireBody(world, projectile).aabb;

      const overlapping = blockers.filter(
        (blocker) => world.hasEntity(blocker.entity) && intersects(box, blocker.aabb)
      );

      const obstacle = overlapping.find((blocker) => blocker.kind === 'obstacle');
      if (obstacle) {
        destroyEntity(world, projectile);
        events.emit({ type: 'projectileBlocked', projectile, obstacle: obstacle.entity });
        return;
      }

      const tank = overlapping.find(
        (blocker) => blocker.kind === 'tank' && blocker.entity !== ownerEntity
      );
      if (!tank) return;

      destroyEntity(world, projectile);
      if (!struck.has(tank.entity)) {
        struck.set(tank.entity, ownerEntity);
      }
    });

    let playerDestroyed = false;
    let enemyDestroyed = false;

    for (const [entity, attackerEntity] of struck) {
      const { role } = requireTank(world, entity);
      const destroyed = takeHit(world, entity);

      events.emit({
        type: 'tankHit',
        entity,
        role,
        attackerEntity,
        healthRemaining: Math.max(0, requireHealth(world, entity).current),
      });

      if (!destroyed) continue;

      const { x, y } = requirePosition(world, entity);
      destroyEntity(world, entity);
      events.emit({ type: 'tankDestroyed', entity, role, position: { x, y } });
      logTankDestroyed(entity, role, attackerEntity);

      if (role === 'player') {
        playerDestroyed = true;
      } else {
        enemyDestroyed = true;
      }
    }

    if (!playerDestroyed && !enemyDestroyed) return;

    const round = getRound(world);
    if (round.outcome !== 'playing') return;

    const time = getTime(world);
    const outcome = playerDestroyed ? 'defeat' : 'victory';
    round.outcome = outcome;
    round.endedAtMs = time.nowMs;
    events.emit({ type: 'roundEnded', outcome });
    logRoundEnded(outcome, time.tick, time.nowMs);
  }
}

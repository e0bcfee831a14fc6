// ============================================
// Cannon tests: reload gating and projectile spawn
// ============================================

import { describe, it, expect, beforeEach } from 'vitest';
import { bottom, intersects, right, Tags } from '@tank-arena/shared';
import type { Facing, World } from '@tank-arena/shared';
import { canFire, shoot, type AbilityContext } from '../abilities';
import { takeHit } from '../tanks';
import {
  getRound,
  getTime,
  requireBody,
  requireCannon,
  requireHealth,
  requireProjectile,
  requireTank,
} from '../ecs/factories';
import { HitSystem, ProjectileSystem } from '../ecs/systems';
import {
  createMockEvents,
  createTestTank,
  createTestWorld,
  type MockEvents,
} from '../ecs/systems/__tests__/testUtils';

describe('cannon', () => {
  let world: World;
  let events: MockEvents;
  let ctx: AbilityContext;

  beforeEach(() => {
    world = createTestWorld();
    events = createMockEvents();
    ctx = { world, events };
  });

  describe('reload', () => {
    it('is loaded from the start', () => {
      const tank = createTestTank(world);
      expect(canFire(world, tank, 0)).toBe(true);
    });

    it('refuses to fire before the reload interval has passed', () => {
      const tank = createTestTank(world);
      expect(shoot(ctx, tank, 0)).not.toBeNull();

      expect(shoot(ctx, tank, 449)).toBeNull();

      expect(world.getEntitiesWithTag(Tags.Projectile)).toHaveLength(1);
      expect(requireCannon(world, tank).lastShotAt).toBe(0);
      expect(events.ofType('projectileFired')).toHaveLength(1);
    });

    it('fires exactly when the reload interval has passed', () => {
      const tank = createTestTank(world);
      shoot(ctx, tank, 0);

      expect(canFire(world, tank, 450)).toBe(true);
      expect(shoot(ctx, tank, 450)).not.toBeNull();
      expect(requireCannon(world, tank).lastShotAt).toBe(450);
    });
  });

  describe('projectile spawn', () => {
    // Tank at (320, 240): box left 294, top 212, right 346, bottom 268
    const cases: Array<{ facing: Facing; center: { x: number; y: number } }> = [
      { facing: 'up', center: { x: 320, y: 202 } },
      { facing: 'down', center: { x: 320, y: 278 } },
      { facing: 'left', center: { x: 284, y: 240 } },
      { facing: 'right', center: { x: 356, y: 240 } },
    ];

    it.each(cases)('starts flush with the tank edge when facing $facing', ({ facing, center }) => {
      const tank = createTestTank(world);
      requireTank(world, tank).facing = facing;

      const projectile = shoot(ctx, tank, 0);
      expect(projectile).not.toBeNull();
      if (projectile === null) return;

      expect(world.getComponent(projectile, 'Position')).toEqual(center);
      const box = requireBody(world, projectile).aabb;
      expect(intersects(box, requireBody(world, tank).aabb)).toBe(false);
      expect(requireProjectile(world, projectile).facing).toBe(facing);
    });

    it('travels along the facing at the cannon speed', () => {
      const tank = createTestTank(world);
      requireTank(world, tank).facing = 'right';

      const projectile = shoot(ctx, tank, 0);
      if (projectile === null) throw new Error('expected a projectile');

      const component = requireProjectile(world, projectile);
      expect(component.direction).toEqual({ x: 1, y: 0 });
      expect(component.speed).toBe(360);
      expect(component.ownerEntity).toBe(tank);
      expect(requireBody(world, projectile).aabb.left).toBe(right(requireBody(world, tank).aabb));
    });

    it('touches the tank top edge when facing up', () => {
      const tank = createTestTank(world);

      const projectile = shoot(ctx, tank, 0);
      if (projectile === null) throw new Error('expected a projectile');

      expect(bottom(requireBody(world, projectile).aabb)).toBe(212);
    });

    it('reports the shot', () => {
      const tank = createTestTank(world);

      const projectile = shoot(ctx, tank, 0);

      expect(events.ofType('projectileFired')).toEqual([
        {
          type: 'projectileFired',
          projectile,
          ownerEntity: tank,
          bounds: { left: 310, top: 192, width: 20, height: 20 },
          facing: 'up',
        },
      ]);
    });
  });

  it('takes four reloaded shots to destroy a full-health tank', () => {
    const shooter = createTestTank(world);
    const target = createTestTank(world, { role: 'enemy', x: 320, y: 100 });

    const results = [0, 450, 900, 1350].map((nowMs) => {
      expect(shoot(ctx, shooter, nowMs)).not.toBeNull();
      return takeHit(world, target);
    });

    expect(results).toEqual([false, false, false, true]);
    expect(world.getComponent(target, 'Health')?.current).toBe(0);
  });

  it('destroys a full-health tank with four shots that fly and land', () => {
    const projectiles = new ProjectileSystem();
    const hits = new HitSystem();
    // Shooter faces up; target box spans 72..128, shots start at 192..212
    const shooter = createTestTank(world);
    const target = createTestTank(world, { role: 'enemy', x: 320, y: 100 });
    const shotTimes = [0, 450, 900, 1350];
    const healthAfterTick: number[] = [];

    // 18px per 50ms tick: each shot lands on its fourth tick
    for (let nowMs = 0; nowMs <= 1500 && getRound(world).outcome === 'playing'; nowMs += 50) {
      getTime(world).nowMs = nowMs;
      if (shotTimes.includes(nowMs)) {
        expect(shoot(ctx, shooter, nowMs)).not.toBeNull();
      }
      projectiles.update(world, 0.05, events);
      hits.update(world, 0.05, events);
      if (world.hasEntity(target)) {
        healthAfterTick.push(requireHealth(world, target).current);
      }
    }

    expect(events.ofType('tankHit').map((event) => event.healthRemaining)).toEqual([3, 2, 1, 0]);
    expect(healthAfterTick.slice(0, 4)).toEqual([4, 4, 4, 3]);
    expect(
      events.emitted
        .filter((event) => event.type !== 'projectileFired')
        .map((event) => event.type)
    ).toEqual(['tankHit', 'tankHit', 'tankHit', 'tankHit', 'tankDestroyed', 'roundEnded']);
    expect(events.ofType('tankDestroyed')[0].entity).toBe(target);
    expect(world.hasEntity(target)).toBe(false);
    expect(getRound(world)).toEqual({ outcome: 'victory', endedAtMs: 1500 });
  });
});

// ============================================
// ECS Entity Factories
// Functions to create entities with proper components
// ============================================

import {
  World,
  Components,
  Tags,
  Resources,
  aabbFromCenter,
  facingOf,
  isZeroVector,
  normalize,
} from '@tank-arena/shared';
import type {
  Aabb,
  Blocker,
  EntityId,
  Position,
  TankRole,
  Vector2,
  PositionComponent,
  BodyComponent,
  TankComponent,
  HealthComponent,
  CannonComponent,
  InputComponent,
  AIControllerComponent,
  ProjectileComponent,
  TimeResource,
  ArenaResource,
  RoundResource,
} from '@tank-arena/shared';
import { getConfig } from '../config';

// ============================================
// World Setup
// ============================================

/**
 * Arena rectangle from config.
 */
export function defaultArenaBounds(): Aabb {
  return {
    left: getConfig('ARENA_LEFT'),
    top: getConfig('ARENA_TOP'),
    width: getConfig('ARENA_WIDTH'),
    height: getConfig('ARENA_HEIGHT'),
  };
}

/**
 * Create a World with the clock, arena and round resources in place.
 */
export function createWorld(arena: Aabb = defaultArenaBounds()): World {
  const world = new World();

  world.setResource(Resources.Time, { nowMs: 0, tick: 0 });
  world.setResource(Resources.Arena, { bounds: { ...arena } });
  world.setResource(Resources.Round, { outcome: 'playing' });

  return world;
}

// ============================================
// Entity Factories
// ============================================

export interface TankOptions {
  speed?: number;
  health?: number;
  reloadMs?: number;
  projectileSpeed?: number;
}

/**
 * Spawn point for a role, offset inward from the arena corners.
 * Player starts bottom-left, enemy top-right.
 */
export function spawnPointFor(role: TankRole, arena: Aabb): Position {
  if (role === 'player') {
    return {
      x: arena.left + getConfig('PLAYER_SPAWN_OFFSET_X'),
      y: arena.top + arena.height - getConfig('PLAYER_SPAWN_OFFSET_Y'),
    };
  }
  return {
    x: arena.left + arena.width - getConfig('ENEMY_SPAWN_OFFSET_X'),
    y: arena.top + getConfig('ENEMY_SPAWN_OFFSET_Y'),
  };
}

/**
 * Create a tank entity facing up with full health and a loaded cannon.
 */
export function createTank(
  world: World,
  role: TankRole,
  position: Position,
  options: TankOptions = {}
): EntityId {
  const entity = world.createEntity();
  const health = options.health ?? getConfig('TANK_HEALTH');
  const speed =
    options.speed ??
    (role === 'player' ? getConfig('PLAYER_TANK_SPEED') : getConfig('ENEMY_TANK_SPEED'));

  world.addComponent(entity, Components.Position, { x: position.x, y: position.y });
  world.addComponent(entity, Components.Body, {
    aabb: aabbFromCenter(position, getConfig('TANK_WIDTH'), getConfig('TANK_HEIGHT')),
  });
  world.addComponent(entity, Components.Tank, { role, facing: 'up', speed });
  world.addComponent(entity, Components.Health, { current: health, max: health });
  world.addComponent(entity, Components.Cannon, {
    reloadMs: options.reloadMs ?? getConfig('TANK_RELOAD_MS'),
    lastShotAt: Number.NEGATIVE_INFINITY,
    projectileSpeed: options.projectileSpeed ?? getConfig('PROJECTILE_SPEED'),
  });
  world.addComponent(entity, Components.Input, { direction: { x: 0, y: 0 }, fire: false });

  world.addTag(entity, Tags.Tank);
  world.addTag(entity, role === 'player' ? Tags.Player : Tags.Enemy);

  return entity;
}

/**
 * Attach an autonomous controller hunting `target`.
 * Starts deciding on the first update, driving up until then.
 */
export function attachController(world: World, entity: EntityId, target: EntityId): void {
  world.addComponent(entity, Components.AIController, {
    mode: 'deciding',
    direction: { x: 0, y: -1 },
    decisionTimer: 0,
    target,
  });
}

/**
 * Create an obstacle entity. Obstacles never move after placement and are
 * identified by their tag alone.
 */
export function createObstacle(world: World, position: Position): EntityId {
  const entity = world.createEntity();

  world.addComponent(entity, Components.Position, { x: position.x, y: position.y });
  world.addComponent(entity, Components.Body, {
    aabb: aabbFromCenter(position, getConfig('OBSTACLE_WIDTH'), getConfig('OBSTACLE_HEIGHT')),
  });
  world.addTag(entity, Tags.Obstacle);

  return entity;
}

/**
 * Create a projectile entity.
 * A zero direction is replaced by straight up.
 */
export function createProjectile(
  world: World,
  position: Position,
  direction: Vector2,
  speed: number,
  ownerEntity: EntityId
): EntityId {
  const entity = world.createEntity();
  const unit = isZeroVector(direction) ? { x: 0, y: -1 } : normalize(direction);
  const size = getConfig('PROJECTILE_SIZE');

  world.addComponent(entity, Components.Position, { x: position.x, y: position.y });
  world.addComponent(entity, Components.Body, { aabb: aabbFromCenter(position, size, size) });
  world.addComponent(entity, Components.Projectile, {
    direction: unit,
    speed,
    facing: facingOf(unit),
    ownerEntity,
  });

  world.addTag(entity, Tags.Projectile);

  return entity;
}

/**
 * Destroy an entity.
 */
export function destroyEntity(world: World, entity: EntityId): void {
  world.destroyEntity(entity);
}

// ============================================
// Query Helpers
// ============================================

export function forEachTank(world: World, callback: (entity: EntityId) => void): void {
  world.forEachWithTag(Tags.Tank, callback);
}

export function forEachProjectile(world: World, callback: (entity: EntityId) => void): void {
  world.forEachWithTag(Tags.Projectile, callback);
}

export function forEachObstacle(world: World, callback: (entity: EntityId) => void): void {
  world.forEachWithTag(Tags.Obstacle, callback);
}

/**
 * Assemble the blocker set: live tanks first, then obstacles.
 * Each entry shares the entity's live box.
 */
export function collectBlockers(world: World): Blocker[] {
  const blockers: Blocker[] = [];
  forEachTank(world, (entity) => {
    blockers.push({ entity, kind: 'tank', aabb: requireBody(world, entity).aabb });
  });
  forEachObstacle(world, (entity) => {
    blockers.push({ entity, kind: 'obstacle', aabb: requireBody(world, entity).aabb });
  });
  return blockers;
}

/**
 * Blocker set for this tick, or a fresh one when none was assembled.
 */
export function getBlockers(world: World): Blocker[] {
  return world.getResource(Resources.Blockers)?.list ?? collectBlockers(world);
}

export function setInput(world: World, entity: EntityId, direction: Vector2, fire: boolean): void {
  const input = requireInput(world, entity);
  input.direction = { x: direction.x, y: direction.y };
  input.fire = fire;
}

// ============================================
// Resource Accessors
// Throw if resource is missing (world not built by createWorld)
// ============================================

export function getTime(world: World): TimeResource {
  const time = world.getResource(Resources.Time);
  if (!time) {
    throw new Error('WorldMissingResource: time');
  }
  return time;
}

export function getArena(world: World): ArenaResource {
  const arena = world.getResource(Resources.Arena);
  if (!arena) {
    throw new Error('WorldMissingResource: arena');
  }
  return arena;
}

export function getRound(world: World): RoundResource {
  const round = world.getResource(Resources.Round);
  if (!round) {
    throw new Error('WorldMissingResource: round');
  }
  return round;
}

// ============================================
// Direct Component Access by EntityId
// Throw if component is missing (invariant violation)
// ============================================

export function requirePosition(world: World, entity: EntityId): PositionComponent {
  const comp = world.getComponent(entity, Components.Position);
  if (!comp) {
    throw new Error(`EntityMissingComponent: Position missing on entity ${entity}`);
  }
  return comp;
}

export function requireBody(world: World, entity: EntityId): BodyComponent {
  const comp = world.getComponent(entity, Components.Body);
  if (!comp) {
    throw new Error(`EntityMissingComponent: Body missing on entity ${entity}`);
  }
  return comp;
}

export function requireTank(world: World, entity: EntityId): TankComponent {
  const comp = world.getComponent(entity, Components.Tank);
  if (!comp) {
    throw new Error(`EntityMissingComponent: Tank missing on entity ${entity}`);
  }
  return comp;
}

export function requireHealth(world: World, entity: EntityId): HealthComponent {
  const comp = world.getComponent(entity, Components.Health);
  if (!comp) {
    throw new Error(`EntityMissingComponent: Health missing on entity ${entity}`);
  }
  return comp;
}

export function requireCannon(world: World, entity: EntityId): CannonComponent {
  const comp = world.getComponent(entity, Components.Cannon);
  if (!comp) {
    throw new Error(`EntityMissingComponent: Cannon missing on entity ${entity}`);
  }
  return comp;
}

export function requireInput(world: World, entity: EntityId): InputComponent {
  const comp = world.getComponent(entity, Components.Input);
  if (!comp) {
    throw new Error(`EntityMissingComponent: Input missing on entity ${entity}`);
  }
  return comp;
}

export function requireController(world: World, entity: EntityId): AIControllerComponent {
  const comp = world.getComponent(entity, Components.AIController);
  if (!comp) {
    throw new Error(`EntityMissingComponent: AIController missing on entity ${entity}`);
  }
  return comp;
}

export function requireProjectile(world: World, entity: EntityId): ProjectileComponent {
  const comp = world.getComponent(entity, Components.Projectile);
  if (!comp) {
    throw new Error(`EntityMissingComponent: Projectile missing on entity ${entity}`);
  }
  return comp;
}

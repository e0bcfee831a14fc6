// ============================================
// ECS Core Types
// ============================================

import type {
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
  BlockersResource,
} from './components';

/**
 * Entity ID - just a number.
 * Entities have no data themselves, they're just IDs that
 * components are attached to.
 */
export type EntityId = number;

/**
 * Component name -> data shape. Every store the World can hold is listed here,
 * so lookups come back typed without casts.
 */
export interface ComponentMap {
  Position: PositionComponent;
  Body: BodyComponent;
  Tank: TankComponent;
  Health: HealthComponent;
  Cannon: CannonComponent;
  Input: InputComponent;
  AIController: AIControllerComponent;
  Projectile: ProjectileComponent;
}

export type ComponentType = keyof ComponentMap;

/**
 * Standard component types used throughout the ECS.
 */
export const Components = {
  // Core components
  Position: 'Position',
  Body: 'Body',

  // Tank components
  Tank: 'Tank',
  Health: 'Health',
  Cannon: 'Cannon',
  Input: 'Input',
  AIController: 'AIController',

  // Entity-type components
  Projectile: 'Projectile',
} as const satisfies Record<ComponentType, ComponentType>;

/**
 * Entity tags for quick type identification.
 * Tags are lightweight - just a Set<string> per entity.
 */
export const Tags = {
  Tank: 'tank',
  Player: 'player',
  Enemy: 'enemy',
  Projectile: 'projectile',
  Obstacle: 'obstacle',
} as const;

export type Tag = (typeof Tags)[keyof typeof Tags];

// ============================================
// Resource Keys
// ============================================

export interface ResourceMap {
  time: TimeResource;
  arena: ArenaResource;
  round: RoundResource;
  blockers: BlockersResource;
}

export type ResourceKey = keyof ResourceMap;

/**
 * Standard resource keys for world.getResource/setResource.
 * Resources are singleton data not tied to entities.
 */
export const Resources = {
  Time: 'time',
  Arena: 'arena',
  Round: 'round',
  Blockers: 'blockers',
} as const satisfies Record<string, ResourceKey>;

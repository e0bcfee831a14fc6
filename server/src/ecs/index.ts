// ============================================
// ECS - Entity Component System
// ============================================

// Core types, classes, and components from shared package
export { World, Components, Tags, Resources } from '@tank-arena/shared';
export type {
  EntityId,
  ComponentType,
  PositionComponent,
  BodyComponent,
  TankComponent,
  HealthComponent,
  CannonComponent,
  InputComponent,
  AIControllerComponent,
  ProjectileComponent,
} from '@tank-arena/shared';

// Factories and World Setup
export {
  createWorld,
  defaultArenaBounds,
  spawnPointFor,
  createTank,
  attachController,
  createObstacle,
  createProjectile,
  destroyEntity,
  // Query helpers
  forEachTank,
  forEachProjectile,
  forEachObstacle,
  collectBlockers,
  getBlockers,
  setInput,
  // Resources
  getTime,
  getArena,
  getRound,
  // Direct component access
  requirePosition,
  requireBody,
  requireTank,
  requireHealth,
  requireCannon,
  requireInput,
  requireController,
  requireProjectile,
} from './factories';
export type { TankOptions } from './factories';

// Serialization
export {
  buildArenaSnapshot,
  buildTankSnapshot,
  buildProjectileSnapshot,
  buildObstacleSnapshot,
} from './serialization/snapshot';

// Systems
export * from './systems';

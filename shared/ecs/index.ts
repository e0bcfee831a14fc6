// ============================================
// ECS Package Exports
// ============================================

// Core ECS class
export { World } from './World';

// Types and constants
export { Components, Tags, Resources } from './types';
export type {
  EntityId,
  ComponentMap,
  ComponentType,
  Tag,
  ResourceMap,
  ResourceKey,
} from './types';

// Component and resource interfaces
export type {
  PositionComponent,
  BodyComponent,
  TankComponent,
  HealthComponent,
  CannonComponent,
  InputComponent,
  AIControllerMode,
  AIControllerComponent,
  ProjectileComponent,
  TimeResource,
  ArenaResource,
  RoundResource,
  BlockersResource,
} from './components';

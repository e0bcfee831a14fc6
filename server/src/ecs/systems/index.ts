// ============================================
// ECS Systems - Index
// ============================================

// Types
export type { System } from './types';
export { SystemPriority } from './types';

// Runner
export { SystemRunner } from './SystemRunner';

// Control Systems
export { PlayerControlSystem } from './PlayerControlSystem';
export { TankAISystem } from './TankAISystem';

// Projectile Systems
export { ProjectileSystem, advanceProjectile } from './ProjectileSystem';
export { HitSystem } from './HitSystem';

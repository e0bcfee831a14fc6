// ============================================
// Shared Types & Constants
// Used by the simulation and anything that presents it
// ============================================

// ECS Module - Entity Component System
export * from './ecs';

// Math utilities - vectors, facing, bounding boxes
export * from './math';

// Game constants (GAME_CONFIG, TUNABLE_CONFIGS)
export * from './constants';

// Type definitions (Aabb, Facing, snapshots)
export * from './types';

// Simulation event types
export * from './messages';

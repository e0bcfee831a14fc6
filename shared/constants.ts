// ============================================
// Game Constants & Configuration
// Runtime-tunable values and static configuration
// ============================================

// Runtime config that can be overridden (subset of GAME_CONFIG keys)
export const TUNABLE_CONFIGS = [
  // Tanks
  'PLAYER_TANK_SPEED',
  'ENEMY_TANK_SPEED',
  'TANK_HEALTH',
  'TANK_RELOAD_MS',
  'PROJECTILE_SPEED',

  // Collision
  'COLLISION_PUSH_DISTANCE',
  'TANK_COLLISION_THRESHOLD',

  // Obstacles
  'OBSTACLE_COUNT',
  'OBSTACLE_SAFE_RADIUS',
  'OBSTACLE_MIN_DISTANCE',

  // Enemy AI
  'AI_DECISION_MIN_TIME',
  'AI_DECISION_MAX_TIME',
  'AI_TARGET_SEEK_PROBABILITY',
  'AI_RANDOM_FIRE_PROBABILITY',
  'AI_ALIGNMENT_TOLERANCE',
] as const;

export type TunableConfigKey = (typeof TUNABLE_CONFIGS)[number];

export const GAME_CONFIG = {
  // Arena (playfield inside a 640x480 window, 48px margin)
  ARENA_LEFT: 48,
  ARENA_TOP: 48,
  ARENA_WIDTH: 544,
  ARENA_HEIGHT: 384,

  // Footprints (pixel-art sprites at 4px per cell)
  TANK_WIDTH: 52, // 13 cells
  TANK_HEIGHT: 56, // 14 cells
  PROJECTILE_SIZE: 20, // 5x5 cells
  OBSTACLE_WIDTH: 100, // 25 cells
  OBSTACLE_HEIGHT: 32, // 8 cells

  // Tanks
  TANK_HEALTH: 4,
  TANK_RELOAD_MS: 450,
  PLAYER_TANK_SPEED: 140, // px/s
  ENEMY_TANK_SPEED: 110, // px/s
  PROJECTILE_SPEED: 360, // px/s

  // Spawn points (offset inward from the arena corners)
  PLAYER_SPAWN_OFFSET_X: 70, // From left edge
  PLAYER_SPAWN_OFFSET_Y: 70, // From bottom edge
  ENEMY_SPAWN_OFFSET_X: 70, // From right edge
  ENEMY_SPAWN_OFFSET_Y: 70, // From top edge

  // Collision
  COLLISION_PUSH_DISTANCE: 2, // px per push-apart nudge
  TANK_COLLISION_THRESHOLD: 35, // Push only when centers are this close on both axes

  // Obstacles
  OBSTACLE_COUNT: 6,
  OBSTACLE_SAFE_RADIUS: 80, // Keep-out radius around spawn points
  OBSTACLE_MIN_DISTANCE: 100, // Center-to-center spacing
  OBSTACLE_INSET: 100, // Sampling area is the arena shrunk by this on every side
  OBSTACLE_MAX_ATTEMPTS: 1000,

  // Enemy AI
  AI_DECISION_MIN_TIME: 0.35, // seconds
  AI_DECISION_MAX_TIME: 0.9, // seconds
  AI_TARGET_SEEK_PROBABILITY: 0.6,
  AI_RANDOM_FIRE_PROBABILITY: 0.008, // Per tick
  AI_ALIGNMENT_TOLERANCE: 18, // px on the perpendicular axis

  // Simulation
  TICK_RATE: 60,
};

export type GameConfig = typeof GAME_CONFIG;

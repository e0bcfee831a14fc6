// ============================================
// Helper Functions
// ============================================

export { createSeededRandom, defaultRandom, randomInt, randomUniform } from './random';
export type { RandomSource } from './random';

export { findOverlap, othersOf, pushApart, slide, stepAxis } from './collision';
export type { Axis, Contact } from './collision';

export { generateObstacles, isClearOfSpawns } from './spawning';
export type { ObstaclePlacement, ObstaclePlacementOptions } from './spawning';

// ============================================
// Shared Types & Interfaces
// Arena entities, roles, and snapshot shapes
// ============================================

// Position in arena space (pixels, y grows downward like screen space)
export interface Position {
  x: number;
  y: number;
}

// Direction or displacement. Same shape as Position, different meaning.
export interface Vector2 {
  x: number;
  y: number;
}

// Cardinal orientation used for display and firing
export type Facing = 'up' | 'down' | 'left' | 'right';

/**
 * Axis-aligned bounding box with integer edges.
 * Center is left + floor(width / 2), top + floor(height / 2).
 */
export interface Aabb {
  left: number;
  top: number;
  width: number;
  height: number;
}

// Which side of the round a tank plays
export type TankRole = 'player' | 'enemy';

// Round lifecycle as seen by the orchestrating layer
export type RoundOutcome = 'playing' | 'victory' | 'defeat';

// Kinds of collidable blockers the movement resolver knows about
export type BlockerKind = 'tank' | 'obstacle';

/**
 * A collidable footprint handed to the movement resolver.
 * aabb is the live box of the entity, not a copy.
 */
export interface Blocker {
  entity: number;
  kind: BlockerKind;
  aabb: Aabb;
}

// ============================================
// Snapshots (what the render collaborator reads each tick)
// ============================================

export interface TankSnapshot {
  entity: number;
  role: TankRole;
  position: Position;
  bounds: Aabb;
  facing: Facing;
  health: number; // Clamped at 0 for display
  maxHealth: number;
}

export interface ProjectileSnapshot {
  entity: number;
  ownerEntity: number;
  bounds: Aabb;
  facing: Facing;
}

export interface ObstacleSnapshot {
  entity: number;
  bounds: Aabb;
}

export interface ArenaSnapshot {
  arena: Aabb;
  outcome: RoundOutcome;
  tanks: TankSnapshot[];
  projectiles: ProjectileSnapshot[];
  obstacles: ObstacleSnapshot[];
}

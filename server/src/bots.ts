import { Components, centerOf, isHorizontal, isZeroVector } from '@tank-arena/shared';
import type { Blocker, EntityId, Position, Vector2, World } from '@tank-arena/shared';
import { getConfig } from './config';
import { requireBody, requireController, requireTank } from './ecs/factories';
import { canFire, shoot, type AbilityContext } from './abilities';
import { moveTank } from './tanks';
import { randomUniform, type RandomSource } from './helpers/random';

// ============================================
// Enemy Controller - autonomous driver for a tank
// ============================================

// Wander choices, in draw order. The last one holds position.
const WANDER_DIRECTIONS: readonly Vector2[] = [
  { x: 1, y: 0 },
  { x: -1, y: 0 },
  { x: 0, y: 1 },
  { x: 0, y: -1 },
  { x: 0, y: 0 },
];

/**
 * Choose a new direction. With the seek probability, head along the axis
 * of greater distance toward the target; otherwise wander.
 * Draws one number for the seek roll, and one more when wandering.
 */
export function pickDirection(from: Position, target: Position, random: RandomSource): Vector2 {
  if (random() < getConfig('AI_TARGET_SEEK_PROBABILITY')) {
    const dx = target.x - from.x;
    const dy = target.y - from.y;
    if (Math.abs(dx) > Math.abs(dy)) {
      return { x: Math.sign(dx), y: 0 };
    }
    // Ties go vertical; already on top of the target means hold
    return { x: 0, y: Math.sign(dy) };
  }
  const index = Math.min(
    WANDER_DIRECTIONS.length - 1,
    Math.floor(random() * WANDER_DIRECTIONS.length)
  );
  const choice = WANDER_DIRECTIONS[index];
  return { x: choice.x, y: choice.y };
}

/**
 * True when the shooter lines up with the target on the axis it faces.
 */
export function isAlignedForShot(world: World, entity: EntityId, target: Position): boolean {
  const { facing } = requireTank(world, entity);
  const center = centerOf(requireBody(world, entity).aabb);
  const tolerance = getConfig('AI_ALIGNMENT_TOLERANCE');

  if (isHorizontal(facing)) {
    return Math.abs(center.y - target.y) <= tolerance;
  }
  return Math.abs(center.x - target.x) <= tolerance;
}

export interface ControllerTickResult {
  moved: boolean;
  fired: EntityId | null;
}

/**
 * One controller tick: decide when the timer runs out, drive, then maybe fire.
 *
 * committed -> deciding when the timer reaches zero or the tank stalls
 * against a blocker; deciding -> committed once a direction and a new
 * timer are drawn.
 */
export function updateEnemyController(
  ctx: AbilityContext,
  entity: EntityId,
  dt: number,
  nowMs: number,
  blockers: readonly Blocker[],
  random: RandomSource
): ControllerTickResult {
  const { world } = ctx;
  const controller = requireController(world, entity);
  const box = requireBody(world, entity).aabb;

  // Target gone (destroyed): sit still
  const targetBody = world.getComponent(controller.target, Components.Body);
  if (!targetBody) {
    return { moved: false, fired: null };
  }
  const target = centerOf(targetBody.aabb);

  controller.decisionTimer -= Math.max(0, dt);
  if (controller.decisionTimer <= 0) {
    controller.mode = 'deciding';
  }

  if (controller.mode === 'deciding') {
    controller.direction = pickDirection(centerOf(box), target, random);
    controller.decisionTimer = randomUniform(
      random,
      getConfig('AI_DECISION_MIN_TIME'),
      getConfig('AI_DECISION_MAX_TIME')
    );
    controller.mode = 'committed';
  }

  const { moved } = moveTank(world, entity, controller.direction, dt, blockers);
  if (!moved && !isZeroVector(controller.direction)) {
    // Wedged against something - decide again next tick
    controller.decisionTimer = 0;
    controller.mode = 'deciding';
  }

  const wantsToFire =
    isAlignedForShot(world, entity, target) ||
    random() < getConfig('AI_RANDOM_FIRE_PROBABILITY');

  let fired: EntityId | null = null;
  if (wantsToFire && canFire(world, entity, nowMs)) {
    fired = shoot(ctx, entity, nowMs);
  }

  return { moved, fired };
}

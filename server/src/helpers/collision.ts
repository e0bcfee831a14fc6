// ============================================
// Collision Resolution
// Box-vs-box push-apart and axis slide for tank movement
// ============================================

import {
  centerX,
  centerY,
  intersects,
  right,
  bottom,
  setCenter,
} from '@tank-arena/shared';
import type { Aabb, Blocker, BlockerKind, EntityId, Position } from '@tank-arena/shared';

export type Axis = 'x' | 'y';

export interface Contact {
  entity: EntityId;
  kind: BlockerKind;
}

/**
 * Blockers other than the mover, in their given order.
 */
export function othersOf(blockers: readonly Blocker[], self: EntityId): Blocker[] {
  return blockers.filter((blocker) => blocker.entity !== self);
}

/**
 * First blocker overlapping the box, if any.
 */
export function findOverlap(box: Aabb, blockers: readonly Blocker[]): Blocker | undefined {
  return blockers.find((blocker) => intersects(box, blocker.aabb));
}

/**
 * One push-apart pass. For every blocker overlapping the box, nudge the
 * position away along the dominant axis of the center delta, but only when
 * the centers are within `threshold` on both axes. The box follows the
 * position after each blocker. Returns every blocker that overlapped.
 */
export function pushApart(
  position: Position,
  box: Aabb,
  blockers: readonly Blocker[],
  pushDistance: number,
  threshold: number
): Contact[] {
  const contacts: Contact[] = [];

  for (const blocker of blockers) {
    if (!intersects(box, blocker.aabb)) continue;
    contacts.push({ entity: blocker.entity, kind: blocker.kind });

    const dx = centerX(box) - centerX(blocker.aabb);
    const dy = centerY(box) - centerY(blocker.aabb);
    if (dx === 0 && dy === 0) continue;

    if (Math.abs(dx) < threshold && Math.abs(dy) < threshold) {
      if (Math.abs(dx) > Math.abs(dy)) {
        position.x += Math.sign(dx) * pushDistance;
      } else {
        position.y += Math.sign(dy) * pushDistance;
      }
    }
    setCenter(box, position);
  }

  return contacts;
}

/**
 * Move along one axis by `delta`, then snap flush against every blocker the
 * box now overlaps. Snapping goes in blocker order, so the last overlapping
 * blocker decides the edge. Returns true if anything was hit.
 */
export function stepAxis(
  position: Position,
  box: Aabb,
  axis: Axis,
  delta: number,
  blockers: readonly Blocker[]
): boolean {
  position[axis] += delta;
  setCenter(box, position);

  let hit = false;
  for (const blocker of blockers) {
    if (!intersects(box, blocker.aabb)) continue;
    hit = true;

    if (axis === 'x') {
      box.left = delta > 0 ? blocker.aabb.left - box.width : right(blocker.aabb);
      position.x = centerX(box);
    } else {
      box.top = delta > 0 ? blocker.aabb.top - box.height : bottom(blocker.aabb);
      position.y = centerY(box);
    }
  }
  return hit;
}

/**
 * Slide fallback. Starting over from `origin`, retry the move along the
 * dominant axis of the displacement only; if that collides, follow with the
 * other axis. Runs once per blocker still overlapping the box and stops at
 * the first attempt that moves cleanly.
 */
export function slide(
  position: Position,
  box: Aabb,
  origin: Position,
  displacement: Position,
  blockers: readonly Blocker[]
): void {
  const dominant: Axis = Math.abs(displacement.x) > Math.abs(displacement.y) ? 'x' : 'y';
  const secondary: Axis = dominant === 'x' ? 'y' : 'x';

  for (const blocker of blockers) {
    if (!intersects(box, blocker.aabb)) continue;

    position.x = origin.x;
    position.y = origin.y;
    setCenter(box, position);

    const blocked = stepAxis(position, box, dominant, displacement[dominant], blockers);
    if (!blocked) break;

    if (displacement[secondary] !== 0) {
      stepAxis(position, box, secondary, displacement[secondary], blockers);
    }
  }
}

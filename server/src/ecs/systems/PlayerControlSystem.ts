// ============================================
// Player Control System
// Applies the player's input intent: drive, then fire
// ============================================

import { Components, Tags, type ArenaEventSink, type World } from '@tank-arena/shared';
import type { System } from './types';
import { getBlockers, getTime, requireInput } from '../factories';
import { emitTankMoved, moveTank } from '../../tanks';
import { shoot } from '../../abilities';

/**
 * PlayerControlSystem - human-driven tanks
 *
 * Reads the Input component set by the input collaborator. Tanks with an
 * AIController are left to TankAISystem.
 */
export class PlayerControlSystem implements System {
  readonly name = 'PlayerControlSystem';

  update(world: World, deltaTime: number, events: ArenaEventSink): void {
    const { nowMs } = getTime(world);
    const blockers = getBlockers(world);

    world.forEachWithTag(Tags.Player, (entity) => {
      if (world.hasComponent(entity, Components.AIController)) return;

      const input = requireInput(world, entity);
      const { moved } = moveTank(world, entity, input.direction, deltaTime, blockers);
      if (moved) {
        emitTankMoved(world, entity, events);
      }

      if (input.fire) {
        shoot({ world, events }, entity, nowMs);
      }
    });
  }
}

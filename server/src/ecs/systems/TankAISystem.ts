// ============================================
// Tank AI System
// Drives every tank that carries an AIController
// ============================================

import { Components, type ArenaEventSink, type World } from '@tank-arena/shared';
import type { System } from './types';
import { forEachTank, getBlockers, getTime } from '../factories';
import { updateEnemyController } from '../../bots';
import { emitTankMoved } from '../../tanks';
import { defaultRandom, type RandomSource } from '../../helpers/random';

/**
 * TankAISystem - autonomous tanks
 *
 * Calls updateEnemyController for each controlled tank in creation order,
 * with this tick's blocker set and clock.
 */
export class TankAISystem implements System {
  readonly name = 'TankAISystem';

  constructor(private readonly random: RandomSource = defaultRandom) {}

  update(world: World, deltaTime: number, events: ArenaEventSink): void {
    const { nowMs } = getTime(world);
    const blockers = getBlockers(world);

    forEachTank(world, (entity) => {
      if (!world.hasComponent(entity, Components.AIController)) return;

      const { moved } = updateEnemyController(
        { world, events },
        entity,
        deltaTime,
        nowMs,
        blockers,
        this.random
      );

      if (moved) {
        emitTankMoved(world, entity, events);
      }
    });
  }
}

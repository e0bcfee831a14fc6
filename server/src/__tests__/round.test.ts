// ============================================
// Arena round tests
// ============================================

import { describe, it, expect, afterEach } from 'vitest';
import { setCenter } from '@tank-arena/shared';
import { ArenaRound, IDLE_INTENT } from '../round';
import { clearConfigOverrides, setConfigOverride } from '../config';
import {
  getRound,
  getTime,
  requireBody,
  requireController,
  requireHealth,
  requirePosition,
} from '../ecs/factories';
import { createMockEvents } from '../ecs/systems/__tests__/testUtils';
import { logRoundStarted } from '../logger';

const DT = 1 / 60;

describe('ArenaRound', () => {
  afterEach(() => {
    clearConfigOverrides();
  });

  it('places the tanks on their spawn points', () => {
    const round = ArenaRound.create({ seed: 1, obstacleCount: 0, events: createMockEvents() });
    const { tanks, obstacles, outcome } = round.snapshot();

    expect(outcome).toBe('playing');
    expect(obstacles).toEqual([]);
    expect(tanks.map((tank) => [tank.role, tank.position])).toEqual([
      ['player', { x: 118, y: 362 }],
      ['enemy', { x: 522, y: 118 }],
    ]);
    expect(logRoundStarted).toHaveBeenCalledWith(1, 0);
  });

  it('builds the same obstacle layout for the same seed', () => {
    const first = ArenaRound.create({ seed: 11, events: createMockEvents() }).snapshot().obstacles;
    const second = ArenaRound.create({ seed: 11, events: createMockEvents() }).snapshot().obstacles;

    expect(first.length).toBeLessThanOrEqual(6);
    expect(second).toEqual(first);
  });

  it('drives the player from the intent', () => {
    const events = createMockEvents();
    const round = ArenaRound.create({ seed: 1, obstacleCount: 0, events });

    const stepped = round.step({ direction: { x: 1, y: 0 }, fire: false }, 0.1, 100);

    expect(stepped).toBe(true);
    const position = requirePosition(round.world, round.player);
    expect(position.x).toBeCloseTo(132, 6);
    expect(position.y).toBe(362);
    expect(getTime(round.world)).toEqual({ nowMs: 100, tick: 1 });
    expect(events.ofType('tankMoved').some((event) => event.entity === round.player)).toBe(true);
  });

  it('fires the player cannon on a fire intent', () => {
    const round = ArenaRound.create({ seed: 1, obstacleCount: 0, events: createMockEvents() });

    round.step({ direction: { x: 0, y: 0 }, fire: true }, DT, 0);

    const shots = round.snapshot().projectiles.filter((p) => p.ownerEntity === round.player);
    expect(shots).toHaveLength(1);
    expect(shots[0].facing).toBe('up');
  });

  it('ends in victory when the player destroys the enemy', () => {
    setConfigOverride('TANK_HEALTH', 1);
    const events = createMockEvents();
    const round = ArenaRound.create({ seed: 1, obstacleCount: 0, events });

    // Park the enemy straight above the player
    const enemyPosition = requirePosition(round.world, round.enemy);
    enemyPosition.x = 118;
    enemyPosition.y = 200;
    setCenter(requireBody(round.world, round.enemy).aabb, enemyPosition);
    const controller = requireController(round.world, round.enemy);
    controller.direction = { x: 0, y: 0 };
    controller.mode = 'committed';
    controller.decisionTimer = 100;

    round.step({ direction: { x: 0, y: 0 }, fire: true }, DT, 0);
    let ticks = 1;
    while (!round.isOver && ticks < 120) {
      ticks++;
      round.step(IDLE_INTENT, DT, (ticks * 1000) / 60);
    }

    expect(round.outcome).toBe('victory');
    expect(events.ofType('roundEnded')).toEqual([{ type: 'roundEnded', outcome: 'victory' }]);
    expect(round.world.hasEntity(round.enemy)).toBe(false);
    expect(round.snapshot().tanks.map((tank) => tank.role)).toEqual(['player']);
  });

  it('ignores steps once the round is over', () => {
    const round = ArenaRound.create({ seed: 1, obstacleCount: 0, events: createMockEvents() });
    getRound(round.world).outcome = 'defeat';

    expect(round.isOver).toBe(true);
    expect(round.step({ direction: { x: 1, y: 0 }, fire: true }, 0.1, 100)).toBe(false);
    expect(getTime(round.world).tick).toBe(0);
    expect(requirePosition(round.world, round.player)).toEqual({ x: 118, y: 362 });
  });

  it('reports health clamped at zero', () => {
    const round = ArenaRound.create({ seed: 1, obstacleCount: 0, events: createMockEvents() });
    requireHealth(round.world, round.player).current = -1;

    const player = round.snapshot().tanks.find((tank) => tank.entity === round.player);

    expect(player?.health).toBe(0);
    expect(player?.maxHealth).toBe(4);
  });
});

// ============================================
// PlayerControlSystem Tests
// ============================================

import { describe, it, expect, beforeEach } from 'vitest';
import type { World } from '@tank-arena/shared';
import { PlayerControlSystem } from '../PlayerControlSystem';
import { attachController, getTime, requireInput, requirePosition } from '../../factories';
import { createMockEvents, createTestTank, createTestWorld, type MockEvents } from './testUtils';

describe('PlayerControlSystem', () => {
  let world: World;
  let events: MockEvents;
  let system: PlayerControlSystem;

  beforeEach(() => {
    world = createTestWorld();
    events = createMockEvents();
    system = new PlayerControlSystem();
  });

  it('drives the player from its input and reports the move', () => {
    const player = createTestTank(world, { role: 'player' });
    requireInput(world, player).direction = { x: 1, y: 0 };

    system.update(world, 0.1, events);

    expect(requirePosition(world, player).x).toBeCloseTo(334, 6);
    const moves = events.ofType('tankMoved');
    expect(moves).toHaveLength(1);
    expect(moves[0].entity).toBe(player);
    expect(moves[0].facing).toBe('right');
  });

  it('stays quiet when there is nothing to do', () => {
    createTestTank(world, { role: 'player' });

    system.update(world, 0.1, events);

    expect(events.emitted).toEqual([]);
  });

  it('fires when the fire flag is set and the cannon is loaded', () => {
    const player = createTestTank(world, { role: 'player' });
    requireInput(world, player).fire = true;

    system.update(world, 0.1, events);
    getTime(world).nowMs = 200;
    system.update(world, 0.1, events);
    getTime(world).nowMs = 450;
    system.update(world, 0.1, events);

    expect(events.ofType('projectileFired').map((event) => event.ownerEntity)).toEqual([player, player]);
  });

  it('leaves autopiloted tanks to the AI', () => {
    const player = createTestTank(world, { role: 'player' });
    const enemy = createTestTank(world, { role: 'enemy', x: 500, y: 120 });
    attachController(world, player, enemy);
    requireInput(world, player).direction = { x: 1, y: 0 };
    requireInput(world, player).fire = true;

    system.update(world, 0.1, events);

    expect(requirePosition(world, player)).toEqual({ x: 320, y: 240 });
    expect(events.emitted).toEqual([]);
  });
});

// ============================================
// Arena Round
// Builds one round (two tanks, obstacles) and steps it tick by tick
// ============================================

import { Resources } from '@tank-arena/shared';
import type {
  Aabb,
  ArenaEvent,
  ArenaEventSink,
  ArenaSnapshot,
  EntityId,
  RoundOutcome,
  Vector2,
  World,
} from '@tank-arena/shared';
import {
  attachController,
  buildArenaSnapshot,
  collectBlockers,
  createObstacle,
  createTank,
  createWorld,
  defaultArenaBounds,
  getArena,
  getRound,
  getTime,
  setInput,
  spawnPointFor,
  HitSystem,
  PlayerControlSystem,
  ProjectileSystem,
  SystemPriority,
  SystemRunner,
  TankAISystem,
} from './ecs';
import { createSeededRandom, defaultRandom, generateObstacles, type RandomSource } from './helpers';
import { logger, logObstaclesPlaced, logRoundStarted } from './logger';
import { isAlive } from './tanks';

export interface PlayerIntent {
  /** Components in {-1, 0, 1}; diagonals allowed */
  direction: Vector2;
  fire: boolean;
}

export const IDLE_INTENT: PlayerIntent = { direction: { x: 0, y: 0 }, fire: false };

export interface ArenaRoundOptions {
  /** Seed for a reproducible round. Ignored when `random` is given. */
  seed?: number;
  random?: RandomSource;
  arena?: Aabb;
  obstacleCount?: number;
  /** Let the controller drive the player tank too (headless matches) */
  autopilotPlayer?: boolean;
  events?: ArenaEventSink;
}

/**
 * Default sink: every event goes to the debug log.
 */
export const loggingEventSink: ArenaEventSink = {
  emit(event: ArenaEvent) {
    logger.debug({ ...event, event: `arena_${event.type}` });
  },
};

/**
 * ArenaRound - the orchestrating layer around the ECS world
 *
 * Owns the world, the system pipeline and the blocker set. Each step stores
 * the player's intent and the clock, assembles this tick's blockers, then
 * runs the systems. Once a tank is destroyed the round is over and further
 * steps do nothing.
 */
export class ArenaRound {
  private readonly runner = new SystemRunner();

  private constructor(
    readonly world: World,
    readonly player: EntityId,
    readonly enemy: EntityId,
    private readonly events: ArenaEventSink,
    random: RandomSource
  ) {
    this.runner.register(new PlayerControlSystem(), SystemPriority.PLAYER_CONTROL);
    this.runner.register(new TankAISystem(random), SystemPriority.TANK_AI);
    this.runner.register(new ProjectileSystem(), SystemPriority.PROJECTILE);
    this.runner.register(new HitSystem(), SystemPriority.HIT);
  }

  static create(options: ArenaRoundOptions = {}): ArenaRound {
    const seed = options.random ? null : options.seed ?? null;
    const random = options.random ?? (seed === null ? defaultRandom : createSeededRandom(seed));
    const world = createWorld(options.arena ?? defaultArenaBounds());
    const arena = getArena(world).bounds;

    const playerSpawn = spawnPointFor('player', arena);
    const enemySpawn = spawnPointFor('enemy', arena);

    // Tanks first so they lead the blocker set
    const player = createTank(world, 'player', playerSpawn);
    const enemy = createTank(world, 'enemy', enemySpawn);
    attachController(world, enemy, player);
    if (options.autopilotPlayer) {
      attachController(world, player, enemy);
    }

    const placement = generateObstacles(arena, playerSpawn, enemySpawn, random, {
      count: options.obstacleCount,
    });
    for (const position of placement.positions) {
      createObstacle(world, position);
    }
    logObstaclesPlaced(placement.positions.length, placement.requested, placement.attempts);
    logRoundStarted(seed, placement.positions.length);

    return new ArenaRound(world, player, enemy, options.events ?? loggingEventSink, random);
  }

  get outcome(): RoundOutcome {
    return getRound(this.world).outcome;
  }

  get isOver(): boolean {
    return this.outcome !== 'playing';
  }

  /**
   * Advance one tick.
   * @param dt Seconds since the previous tick
   * @param nowMs Monotonic clock for reload timing
   * @returns false when the round was already over
   */
  step(intent: PlayerIntent, dt: number, nowMs: number): boolean {
    if (this.isOver) return false;

    const time = getTime(this.world);
    time.nowMs = nowMs;
    time.tick++;

    if (isAlive(this.world, this.player)) {
      setInput(this.world, this.player, intent.direction, intent.fire);
    }

    this.world.setResource(Resources.Blockers, { list: collectBlockers(this.world) });
    this.runner.update(this.world, dt, this.events);
    return true;
  }

  snapshot(): ArenaSnapshot {
    return buildArenaSnapshot(this.world);
  }
}

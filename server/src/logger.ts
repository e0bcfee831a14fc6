import pino from 'pino';
import type { RoundOutcome, TankRole } from '@tank-arena/shared';

// ============================================
// Logger Configuration
// ============================================

const LOG_DIR = process.env.LOG_DIR || 'logs';
const LOG_LEVEL = process.env.LOG_LEVEL || 'info';
const IS_DEV = process.env.NODE_ENV !== 'production';

/**
 * Create a logger with console + rotating file output
 * pino-roll is used as a Pino transport for file rotation
 * @param filename - Log file name (e.g., 'arena.log')
 * @param component - Component name for filtering (e.g., 'arena', 'perf')
 */
function createLogger(filename: string, component: string) {
  const targets: pino.TransportTargetOptions[] = [];

  // Console stream with pretty printing (development only)
  if (IS_DEV) {
    targets.push({
      level: LOG_LEVEL,
      target: 'pino-pretty',
      options: {
        colorize: true,
        translateTime: 'HH:MM:ss.l',
        ignore: 'pid,hostname',
      },
    });
  }

  // Rotating file stream with JSON (always enabled)
  targets.push({
    level: 'info',
    target: 'pino-roll',
    options: {
      file: `${LOG_DIR}/${filename}`,
      size: '10m',
      limit: { count: 5 },
      mkdir: true,
    },
  });

  return pino(
    {
      level: LOG_LEVEL,
      base: { component },
    },
    pino.transport({ targets })
  );
}

// ============================================
// Logger Instances
// ============================================

// Round events (spawns, hits, deaths, outcomes)
export const logger = createLogger('arena.log', 'arena');

// Tick timing
export const perfLogger = createLogger('performance.log', 'perf');

// ============================================
// Convenience Methods for Round Events
// ============================================

export function logRoundStarted(seed: number | null, obstacleCount: number) {
  logger.info(
    { seed, obstacleCount, event: 'round_started' },
    `Round started with ${obstacleCount} obstacles${seed === null ? '' : ` (seed ${seed})`}`
  );
}

/**
 * Log obstacle placement. Placement may fall short of the request when the
 * sampler runs out of attempts - that is logged as a warning, not an error.
 */
export function logObstaclesPlaced(placed: number, requested: number, attempts: number) {
  if (placed < requested) {
    logger.warn(
      { placed, requested, attempts, event: 'obstacles_short' },
      `Placed ${placed}/${requested} obstacles after ${attempts} attempts`
    );
    return;
  }
  logger.info({ placed, attempts, event: 'obstacles_placed' }, `Placed ${placed} obstacles`);
}

export function logTankDestroyed(entity: number, role: TankRole, attackerEntity: number) {
  logger.info(
    { entity, role, attackerEntity, event: 'tank_destroyed' },
    `${role === 'player' ? 'Player' : 'Enemy'} tank destroyed`
  );
}

export function logRoundEnded(outcome: RoundOutcome, tick: number, nowMs: number) {
  logger.info(
    { outcome, tick, nowMs, event: 'round_ended' },
    `Round ended: ${outcome} after ${tick} ticks`
  );
}

// ============================================
// Headless Match
// Runs a whole round on a simulated clock, no window, no timers
// ============================================

import type { ArenaEvent, ArenaEventSink, RoundOutcome } from '@tank-arena/shared';
import { getConfig } from './config';
import { logger, perfLogger } from './logger';
import { ArenaRound, IDLE_INTENT, loggingEventSink } from './round';

const DEFAULT_MAX_SECONDS = 120;

export interface MatchOptions {
  seed?: number;
  /** Simulated time limit; the round is a draw ('playing') if it runs out */
  maxSeconds?: number;
  tickRate?: number;
  events?: ArenaEventSink;
}

export interface MatchResult {
  outcome: RoundOutcome;
  ticks: number;
  simulatedMs: number;
  shotsFired: number;
  hits: number;
}

/**
 * Play one round with both tanks on autopilot.
 * Each tick advances the clock by exactly 1 / tickRate seconds.
 */
export function runHeadlessMatch(options: MatchOptions = {}): MatchResult {
  const tickRate =
    options.tickRate !== undefined && options.tickRate > 0 ? options.tickRate : getConfig('TICK_RATE');
  const maxSeconds = options.maxSeconds ?? DEFAULT_MAX_SECONDS;
  const dt = 1 / tickRate;
  const maxTicks = Math.ceil(maxSeconds * tickRate);
  const downstream = options.events ?? loggingEventSink;

  let shotsFired = 0;
  let hits = 0;
  const events: ArenaEventSink = {
    emit(event: ArenaEvent) {
      if (event.type === 'projectileFired') shotsFired++;
      if (event.type === 'tankHit') hits++;
      downstream.emit(event);
    },
  };

  const round = ArenaRound.create({ seed: options.seed, autopilotPlayer: true, events });
  const started = performance.now();

  let ticks = 0;
  while (!round.isOver && ticks < maxTicks) {
    ticks++;
    round.step(IDLE_INTENT, dt, (ticks * 1000) / tickRate);
  }

  const result: MatchResult = {
    outcome: round.outcome,
    ticks,
    simulatedMs: (ticks * 1000) / tickRate,
    shotsFired,
    hits,
  };

  perfLogger.info(
    { event: 'match_timing', ticks, wallMs: Number((performance.now() - started).toFixed(1)) },
    `Simulated ${ticks} ticks`
  );
  logger.info({ ...result, event: 'match_finished' }, `Match finished: ${result.outcome}`);

  return result;
}

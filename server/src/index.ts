// ============================================
// Headless match entry point
//
//   MATCH_SEED=7 MATCH_MAX_SECONDS=60 npm start
//
// Tunables can be overridden with ARENA_<KEY>, e.g. ARENA_OBSTACLE_COUNT=3
// ============================================

import { applyEnvConfigOverrides } from './config';
import { logger } from './logger';
import { runHeadlessMatch } from './match';

function envNumber(name: string): number | undefined {
  const raw = process.env[name];
  if (raw === undefined || raw.trim() === '') return undefined;
  const value = Number(raw);
  if (!Number.isFinite(value)) {
    logger.warn({ event: 'env_ignored', name, raw }, `Ignoring non-numeric ${name}`);
    return undefined;
  }
  return value;
}

const overrides = applyEnvConfigOverrides();
if (overrides.length > 0) {
  logger.info({ event: 'config_overrides', keys: overrides }, `Applied ${overrides.length} config overrides`);
}

runHeadlessMatch({
  seed: envNumber('MATCH_SEED'),
  maxSeconds: envNumber('MATCH_MAX_SECONDS'),
  tickRate: envNumber('MATCH_TICK_RATE'),
});

// ============================================
// Runtime Config
// GAME_CONFIG with tunable overrides applied on top
// ============================================

import {
  GAME_CONFIG,
  TUNABLE_CONFIGS,
  type GameConfig,
  type TunableConfigKey,
} from '@tank-arena/shared';
import { logger } from './logger';

// Runtime config overrides (applied on top of GAME_CONFIG)
const configOverrides = new Map<string, number>();

/**
 * Get a config value, checking overrides first
 */
export function getConfig(key: keyof GameConfig): number {
  return configOverrides.get(key) ?? GAME_CONFIG[key];
}

export function isTunableConfigKey(key: string): key is TunableConfigKey {
  return TUNABLE_CONFIGS.some((tunable) => tunable === key);
}

interface ConfigRange {
  min: number;
  max?: number;
  integer?: boolean;
}

// Accepted values per tunable key
const CONFIG_RANGES: Record<TunableConfigKey, ConfigRange> = {
  PLAYER_TANK_SPEED: { min: 0 },
  ENEMY_TANK_SPEED: { min: 0 },
  TANK_HEALTH: { min: 1, integer: true },
  TANK_RELOAD_MS: { min: 0 },
  PROJECTILE_SPEED: { min: 0 },
  COLLISION_PUSH_DISTANCE: { min: 0 },
  TANK_COLLISION_THRESHOLD: { min: 0 },
  OBSTACLE_COUNT: { min: 0, integer: true },
  OBSTACLE_SAFE_RADIUS: { min: 0 },
  OBSTACLE_MIN_DISTANCE: { min: 0 },
  AI_DECISION_MIN_TIME: { min: 0 },
  AI_DECISION_MAX_TIME: { min: 0 },
  AI_TARGET_SEEK_PROBABILITY: { min: 0, max: 1 },
  AI_RANDOM_FIRE_PROBABILITY: { min: 0, max: 1 },
  AI_ALIGNMENT_TOLERANCE: { min: 0 },
};

/**
 * Why `value` is not acceptable for `key` on its own, or null when it is.
 */
function checkConfigRange(key: TunableConfigKey, value: number): string | null {
  if (!Number.isFinite(value)) return 'must be a finite number';
  const range = CONFIG_RANGES[key];
  if (value < range.min) return `must be at least ${range.min}`;
  if (range.max !== undefined && value > range.max) return `must be at most ${range.max}`;
  if (range.integer && !Number.isInteger(value)) return 'must be a whole number';
  return null;
}

// The decision timer is drawn from [min, max]
function checkDecisionInterval(
  key: TunableConfigKey,
  value: number,
  valueOf: (key: TunableConfigKey) => number
): string | null {
  if (key === 'AI_DECISION_MIN_TIME' && value > valueOf('AI_DECISION_MAX_TIME')) {
    return 'must not exceed AI_DECISION_MAX_TIME';
  }
  if (key === 'AI_DECISION_MAX_TIME' && value < valueOf('AI_DECISION_MIN_TIME')) {
    return 'must not be below AI_DECISION_MIN_TIME';
  }
  return null;
}

function applyOverride(
  key: TunableConfigKey,
  value: number,
  valueOf: (key: TunableConfigKey) => number
): boolean {
  const problem = checkConfigRange(key, value) ?? checkDecisionInterval(key, value, valueOf);
  if (problem !== null) {
    logger.warn(
      { key, value, reason: problem, event: 'config_override_rejected' },
      `Rejected override for ${key}: ${problem}`
    );
    return false;
  }
  configOverrides.set(key, value);
  logger.info({ key, value, event: 'config_override' }, `Config ${key} = ${value}`);
  return true;
}

/**
 * Override a tunable value for every subsequent getConfig call.
 * Values outside the key's range, or a decision interval with min above max,
 * are rejected and logged.
 */
export function setConfigOverride(key: TunableConfigKey, value: number): boolean {
  return applyOverride(key, value, getConfig);
}

export function clearConfigOverrides(): void {
  configOverrides.clear();
}

/**
 * Read overrides from ARENA_<KEY> environment variables,
 * e.g. ARENA_OBSTACLE_COUNT=3. Returns the keys that were applied.
 * Paired keys are checked against each other's requested values, so both
 * ends of the decision interval can move in one go.
 */
export function applyEnvConfigOverrides(env: NodeJS.ProcessEnv = process.env): TunableConfigKey[] {
  const requested = new Map<TunableConfigKey, number>();
  for (const key of TUNABLE_CONFIGS) {
    const raw = env[`ARENA_${key}`];
    if (raw === undefined || raw.trim() === '') continue;
    const value = Number(raw);
    const problem = checkConfigRange(key, value);
    if (problem !== null) {
      logger.warn(
        { key, raw, reason: problem, event: 'config_override_rejected' },
        `Rejected override for ${key}: ${problem}`
      );
      continue;
    }
    requested.set(key, value);
  }

  const valueOf = (key: TunableConfigKey) => requested.get(key) ?? getConfig(key);
  const applied: TunableConfigKey[] = [];
  for (const [key, value] of requested) {
    if (applyOverride(key, value, valueOf)) {
      applied.push(key);
    }
  }
  return applied;
}

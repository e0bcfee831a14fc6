import { describe, it, expect, afterEach } from 'vitest';
import { GAME_CONFIG } from '@tank-arena/shared';
import {
  applyEnvConfigOverrides,
  clearConfigOverrides,
  getConfig,
  isTunableConfigKey,
  setConfigOverride,
} from '../config';
import { logger } from '../logger';

describe('config overrides', () => {
  afterEach(() => {
    clearConfigOverrides();
  });

  it('falls back to GAME_CONFIG', () => {
    expect(getConfig('TANK_HEALTH')).toBe(GAME_CONFIG.TANK_HEALTH);
  });

  it('applies an override until cleared', () => {
    expect(setConfigOverride('TANK_HEALTH', 1)).toBe(true);
    expect(getConfig('TANK_HEALTH')).toBe(1);

    clearConfigOverrides();

    expect(getConfig('TANK_HEALTH')).toBe(4);
  });

  it('rejects non-finite values', () => {
    expect(setConfigOverride('TANK_HEALTH', Number.NaN)).toBe(false);
    expect(getConfig('TANK_HEALTH')).toBe(4);
    expect(logger.warn).toHaveBeenCalledWith(
      expect.objectContaining({ key: 'TANK_HEALTH', event: 'config_override_rejected' }),
      'Rejected override for TANK_HEALTH: must be a finite number'
    );
  });

  it.each([
    ['TANK_HEALTH', 0],
    ['TANK_HEALTH', 1.5],
    ['OBSTACLE_COUNT', -1],
    ['TANK_RELOAD_MS', -10],
    ['AI_TARGET_SEEK_PROBABILITY', 1.5],
  ] as const)('rejects %s = %d', (key, value) => {
    expect(setConfigOverride(key, value)).toBe(false);
    expect(getConfig(key)).toBe(GAME_CONFIG[key]);
  });

  it('accepts the ends of a range', () => {
    expect(setConfigOverride('OBSTACLE_COUNT', 0)).toBe(true);
    expect(setConfigOverride('AI_RANDOM_FIRE_PROBABILITY', 1)).toBe(true);
  });

  it('keeps the decision interval ordered', () => {
    expect(setConfigOverride('AI_DECISION_MIN_TIME', 2)).toBe(false);
    expect(logger.warn).toHaveBeenCalledWith(
      expect.objectContaining({ key: 'AI_DECISION_MIN_TIME', event: 'config_override_rejected' }),
      'Rejected override for AI_DECISION_MIN_TIME: must not exceed AI_DECISION_MAX_TIME'
    );
    expect(setConfigOverride('AI_DECISION_MAX_TIME', 0.2)).toBe(false);
    expect(getConfig('AI_DECISION_MIN_TIME')).toBe(0.35);
    expect(getConfig('AI_DECISION_MAX_TIME')).toBe(0.9);

    expect(setConfigOverride('AI_DECISION_MAX_TIME', 3)).toBe(true);
    expect(setConfigOverride('AI_DECISION_MIN_TIME', 2)).toBe(true);
  });

  it('knows which keys are tunable', () => {
    expect(isTunableConfigKey('OBSTACLE_COUNT')).toBe(true);
    expect(isTunableConfigKey('ARENA_WIDTH')).toBe(false);
  });

  it('reads ARENA_ prefixed environment variables', () => {
    const applied = applyEnvConfigOverrides({
      ARENA_OBSTACLE_COUNT: '3',
      ARENA_TANK_HEALTH: 'abc',
      ARENA_NOT_A_KEY: '1',
      ARENA_TANK_RELOAD_MS: ' ',
    });

    expect(applied).toEqual(['OBSTACLE_COUNT']);
    expect(getConfig('OBSTACLE_COUNT')).toBe(3);
    expect(getConfig('TANK_HEALTH')).toBe(4);
    expect(getConfig('TANK_RELOAD_MS')).toBe(450);
  });

  it('moves both decision bounds together from the environment', () => {
    expect(
      applyEnvConfigOverrides({ ARENA_AI_DECISION_MIN_TIME: '0.1', ARENA_AI_DECISION_MAX_TIME: '0.2' })
    ).toEqual(['AI_DECISION_MIN_TIME', 'AI_DECISION_MAX_TIME']);
    expect(getConfig('AI_DECISION_MAX_TIME')).toBe(0.2);
  });

  it('rejects an environment interval with min above max', () => {
    expect(
      applyEnvConfigOverrides({ ARENA_AI_DECISION_MIN_TIME: '2', ARENA_TANK_HEALTH: '-3' })
    ).toEqual([]);
    expect(getConfig('AI_DECISION_MIN_TIME')).toBe(0.35);
    expect(getConfig('TANK_HEALTH')).toBe(4);
  });
});

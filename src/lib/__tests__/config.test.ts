import { afterEach, describe, it, expect, vi } from 'vitest';
import { applyRuntimeConfig, loadEvaluationDefaults, loadRuntimeConfig } from '../config';
import { getLogThreshold, setLogThreshold } from '../logger';

describe('config', () => {
  afterEach(() => {
    vi.restoreAllMocks();
    setLogThreshold('info');
  });

  it('should use the defaults when nothing is set', () => {
    expect(loadRuntimeConfig({})).toEqual({
      evaluation: {
        excess_threshold_pct: 25,
        inexequible_threshold_pct: 75,
        decimal_places: 2,
        use_nbr_rounding: true,
      },
      logLevel: 'info',
      warnings: [],
    });
  });

  it('should read valid values', () => {
    const config = loadRuntimeConfig({
      PRICE_EXCESS_THRESHOLD_PCT: '30',
      PRICE_INEXEQUIBLE_THRESHOLD_PCT: ' 70 ',
      PRICE_DECIMAL_PLACES: '4',
      PRICE_USE_NBR_ROUNDING: 'No',
      LOG_LEVEL: 'DEBUG',
    });

    expect(config.evaluation).toEqual({
      excess_threshold_pct: 30,
      inexequible_threshold_pct: 70,
      decimal_places: 4,
      use_nbr_rounding: false,
    });
    expect(config.logLevel).toBe('debug');
    expect(config.warnings).toEqual([]);
  });

  it('should fall back with a warning on invalid values', () => {
    const config = loadRuntimeConfig({
      PRICE_EXCESS_THRESHOLD_PCT: '12.5',
      PRICE_DECIMAL_PLACES: '9',
      PRICE_USE_NBR_ROUNDING: 'maybe',
      LOG_LEVEL: 'loud',
    });

    expect(config.evaluation).toEqual({
      excess_threshold_pct: 25,
      inexequible_threshold_pct: 75,
      decimal_places: 2,
      use_nbr_rounding: true,
    });
    expect(config.warnings).toEqual([
      'PRICE_EXCESS_THRESHOLD_PCT="12.5" is not an integer in [0, 100]; using 25',
      'PRICE_DECIMAL_PLACES="9" is not an integer in [0, 7]; using 2',
      'PRICE_USE_NBR_ROUNDING="maybe" is not a boolean; using true',
      'LOG_LEVEL="loud" is not one of debug, info, warn, error, silent; using info',
    ]);
  });

  it('should return only the evaluation defaults', () => {
    expect(loadEvaluationDefaults({ PRICE_DECIMAL_PLACES: '0' }).decimal_places).toBe(0);
  });

  it('should apply the log level and report warnings once', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});

    applyRuntimeConfig(loadRuntimeConfig({ LOG_LEVEL: 'warn', PRICE_DECIMAL_PLACES: 'x' }));

    expect(getLogThreshold()).toBe('warn');
    expect(warn).toHaveBeenCalledTimes(1);
    const entry = JSON.parse(String(warn.mock.calls[0][0]));
    expect(entry).toMatchObject({
      service: 'config',
      op: 'load',
      meta: { warnings: ['PRICE_DECIMAL_PLACES="x" is not an integer in [0, 7]; using 2'] },
    });
  });
});

/**
 * Runtime configuration read from environment variables.
 *
 * Invalid values fall back to the defaults and are reported as warnings
 * instead of failing the process.
 */

import {
  DEFAULT_DECIMAL_PLACES,
  DEFAULT_EXCESS_THRESHOLD_PCT,
  DEFAULT_INEXEQUIBLE_THRESHOLD_PCT,
  MAX_DECIMAL_PLACES,
} from '@/features/pricing/constants';
import type { EvaluationContext } from '@/features/pricing/domain/types';
import { createLogger, setLogThreshold, type LogThreshold } from './logger';

export type Env = Readonly<Record<string, string | undefined>>;

export interface RuntimeConfig {
  readonly evaluation: Required<EvaluationContext>;
  readonly logLevel: LogThreshold;
  readonly warnings: ReadonlyArray<string>;
}

const LOG_THRESHOLDS: ReadonlyArray<LogThreshold> = ['debug', 'info', 'warn', 'error', 'silent'];

const TRUE_VALUES = ['true', '1', 'yes', 'on'];
const FALSE_VALUES = ['false', '0', 'no', 'off'];

function readInteger(
  env: Env,
  key: string,
  fallback: number,
  min: number,
  max: number,
  warnings: string[]
): number {
  const raw = env[key]?.trim();
  if (!raw) return fallback;
  const n = Number(raw);
  if (!Number.isInteger(n) || n < min || n > max) {
    warnings.push(`${key}="${raw}" is not an integer in [${min}, ${max}]; using ${fallback}`);
    return fallback;
  }
  return n;
}

function readBoolean(env: Env, key: string, fallback: boolean, warnings: string[]): boolean {
  const raw = env[key]?.trim().toLowerCase();
  if (!raw) return fallback;
  if (TRUE_VALUES.includes(raw)) return true;
  if (FALSE_VALUES.includes(raw)) return false;
  warnings.push(`${key}="${raw}" is not a boolean; using ${fallback}`);
  return fallback;
}

function readLogLevel(env: Env, warnings: string[]): LogThreshold {
  const raw = env.LOG_LEVEL?.trim().toLowerCase();
  if (!raw) return 'info';
  const level = LOG_THRESHOLDS.find(l => l === raw);
  if (!level) {
    warnings.push(`LOG_LEVEL="${raw}" is not one of ${LOG_THRESHOLDS.join(', ')}; using info`);
    return 'info';
  }
  return level;
}

export function loadRuntimeConfig(env: Env = process.env): RuntimeConfig {
  const warnings: string[] = [];

  const evaluation: Required<EvaluationContext> = {
    excess_threshold_pct: readInteger(
      env, 'PRICE_EXCESS_THRESHOLD_PCT', DEFAULT_EXCESS_THRESHOLD_PCT, 0, 100, warnings
    ),
    inexequible_threshold_pct: readInteger(
      env, 'PRICE_INEXEQUIBLE_THRESHOLD_PCT', DEFAULT_INEXEQUIBLE_THRESHOLD_PCT, 0, 100, warnings
    ),
    decimal_places: readInteger(
      env, 'PRICE_DECIMAL_PLACES', DEFAULT_DECIMAL_PLACES, 0, MAX_DECIMAL_PLACES, warnings
    ),
    use_nbr_rounding: readBoolean(env, 'PRICE_USE_NBR_ROUNDING', true, warnings),
  };

  return { evaluation, logLevel: readLogLevel(env, warnings), warnings };
}

export function loadEvaluationDefaults(env: Env = process.env): Required<EvaluationContext> {
  return loadRuntimeConfig(env).evaluation;
}

/**
 * Apply the log threshold and report configuration warnings once.
 */
export function applyRuntimeConfig(config: RuntimeConfig): void {
  setLogThreshold(config.logLevel);
  if (config.warnings.length > 0) {
    createLogger('config').warn({
      op: 'load',
      meta: { warnings: [...config.warnings] },
    });
  }
}

/**
 * Pricing Domain — Barrel Export
 */

export * from './types';
export * from './decimal';
export * from './guards';
export * from './rounding';
export * from './rules';
export { runPriceEvaluation, evaluate } from './engine';

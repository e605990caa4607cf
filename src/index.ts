/**
 * Public API
 */

export * from './features/pricing/domain';
export * from './features/pricing/constants';
export * from './features/pricing/utils/parsing';
export * from './features/pricing/utils/formatting';
export * from './features/pricing/services/itemAnalysis';
export * from './features/pricing/services/batchBySource';
export * from './features/pricing/services/consolidation';
export * from './lib/errors';
export * from './lib/logger';
export * from './lib/config';

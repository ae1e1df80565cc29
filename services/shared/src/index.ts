// Database
export * from './db/client';

// Configuration
export * from './config/engine-config';

// Engine
export * from './engine/context';
export * from './engine/velocity';
export * from './engine/decay';
export * from './engine/pricing';
export * from './engine/forecast';
export * from './engine/bundle-scoring';
export * from './engine/simulator';
export * from './engine/optimizer';
export * from './engine/metrics';

// Events
export * from './events/event-log';

// Services
export * from './services/inventory-repository';
export * from './services/price-snapshot-service';
export * from './services/strategy-report-service';

// Types
export * from './types/revenue.types';

// Utils
export * from './utils/logger';
export * from './utils/errors';
export * from './utils/dates';
export * from './utils/numbers';
export * from './utils/assert';

export * from './utils/decimal-utils.js';
export * from './utils/date-utils.js';
export * from './errors/index.js';
export * from './schemas/primitives.js';
export * from './schemas/records.js';
export * from './types/trade.js';

export * from './calendar-date.js';
export * from './currency.js';
export * from './errors.js';
export * from './utils/type-guard-utils.js';

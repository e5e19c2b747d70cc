export * from './ids.js';
export * from './logging/json-log.js';
export * from './standards.js';

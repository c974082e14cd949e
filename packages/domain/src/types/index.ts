export * from './enums.js';
export * from './entities.js';
export * from './messages.js';

export * from './schemas.js';
export * from './relay-config.js';

export * from './errors/index.js';

// Logging: pino with redaction plus the JSON Lines event log
export * from './logging/index.js';

export * from './memory/index.js';
export * from './core/errors.js';
export * from './core/logger.js';
export * from './core/context-builder.js';
export * from './config/index.js';

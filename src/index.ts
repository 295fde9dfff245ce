export * from './core/index.js';
export * from './browser/index.js';
export * from './llm/index.js';
export * from './schema/index.js';
export * from './config/index.js';

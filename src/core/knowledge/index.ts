export * from './schema.js';
export * from './knowledge-base.js';
export * from './loader.js';

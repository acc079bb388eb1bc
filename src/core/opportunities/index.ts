export * from './types.js';
export * from './scoring.js';

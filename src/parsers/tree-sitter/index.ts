export * from './TreeSitterUtils.js';
export * from './python.js';

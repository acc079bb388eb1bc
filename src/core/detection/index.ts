export * from './types.js';
export * from './naming.js';
export * from './detectors/index.js';
export * from './file-analyzer.js';

export * from './types.js';
export * from './discovery.js';
export * from './insights.js';
export * from './analyzer.js';
export * from './serializer.js';
export * from './report.js';

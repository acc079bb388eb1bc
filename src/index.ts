/**
 * pattern-scout: design pattern opportunity analysis for Python code.
 * Main library exports barrel file.
 */

// Configuration
export * from './core/config/index.js';

// Pattern knowledge base
export * from './core/knowledge/index.js';

// Findings and scoring
export * from './core/opportunities/index.js';

// Single-file analysis
export * from './core/detection/index.js';

// Repository aggregation and output
export * from './core/repository/index.js';

// Python parsing
export * from './parsers/tree-sitter/index.js';

// Utilities
export * from './utils/index.js';

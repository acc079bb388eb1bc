import type Parser from 'tree-sitter';
import type { Config } from '../config/index.js';
import type { PatternKnowledgeBase } from '../knowledge/index.js';
import type { ArchitecturalInsight, PatternOpportunity } from '../opportunities/index.js';

/**
 * Result of analyzing one repository.
 */
export interface RepositoryAnalysis {
  readonly repositoryPath: string;
  /** Files with at least one finding */
  readonly totalFilesAnalyzed: number;
  readonly totalOpportunities: number;
  /** Only files with at least one finding, keyed by path */
  readonly opportunitiesByFile: Readonly<Record<string, readonly PatternOpportunity[]>>;
  readonly architecturalInsights: readonly ArchitecturalInsight[];
  /** Pattern name to finding count */
  readonly patternUsageSummary: Readonly<Record<string, number>>;
  /** e.g. "Complexity Level: Low (Well-structured codebase)" */
  readonly complexityAssessment: string;
  readonly recommendationsSummary: readonly string[];
}

export interface RepositoryAnalyzerOptions {
  knowledgeBase: PatternKnowledgeBase;
  config?: Config;
  parser?: Parser;
  /** Files read in parallel per batch (default: 75% of CPUs, min 2, max 32) */
  concurrency?: number;
}

export interface AnalyzeRepositoryOptions {
  knowledgeBase: PatternKnowledgeBase;
  config?: Config;
  excludePatterns?: string[];
  /** Write the JSON snapshot here after analysis */
  saveTo?: string;
}

/**
 * Totals read back from a saved snapshot.
 */
export interface AnalysisSummary {
  repositoryPath: string;
  totalFilesAnalyzed: number;
  totalOpportunities: number;
  patternUsageSummary: Record<string, number>;
  complexityAssessment: string;
}

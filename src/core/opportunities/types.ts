/**
 * Records produced by the detectors and the repository aggregator.
 */

export type Confidence = 'low' | 'medium' | 'high' | 'critical';

export type OpportunityType =
  | 'refactor_to_pattern'
  | 'anti_pattern_detected'
  | 'optimization_opportunity'
  | 'complexity_reduction';

export type Effort = 'low' | 'medium' | 'high';
export type Impact = 'low' | 'medium' | 'high';

export type InsightType =
  | 'architectural_pattern'
  | 'anti_pattern'
  | 'optimization'
  | 'complexity_reduction'
  | 'assessment';

export type InsightImpact = Impact | 'critical';
export type InsightEffort = Effort | 'n/a';

/**
 * A single detector finding in one file.
 */
export interface PatternOpportunity {
  /** Knowledge-base key, e.g. "builder" */
  readonly patternName: string;
  readonly opportunityType: OpportunityType;
  readonly confidence: Confidence;
  readonly filePath: string;
  /** 1-based line of the node that triggered the finding */
  readonly lineNumber: number;
  readonly lineEnd?: number;
  readonly description: string;
  readonly currentCodeSnippet: string;
  readonly suggestedImprovement: string;
  readonly reasoning: string;
  readonly effortEstimate: Effort;
  readonly impactEstimate: Impact;
  readonly priorityScore: number;
}

export type PatternOpportunityInput = Omit<PatternOpportunity, 'priorityScore'>;

/**
 * A repository-level conclusion drawn from many findings.
 */
export interface ArchitecturalInsight {
  readonly insightType: InsightType;
  readonly title: string;
  readonly description: string;
  readonly affectedFiles: readonly string[];
  readonly confidence: Confidence;
  readonly impact: InsightImpact;
  readonly effort: InsightEffort;
  readonly recommendations: readonly string[];
  readonly priorityScore: number;
}

export type ArchitecturalInsightInput = Omit<ArchitecturalInsight, 'priorityScore'>;

/**
 * Priority scoring for findings and insights.
 */
import type {
  ArchitecturalInsight,
  ArchitecturalInsightInput,
  Confidence,
  Effort,
  Impact,
  InsightEffort,
  InsightImpact,
  PatternOpportunity,
  PatternOpportunityInput,
} from './types.js';

export const CONFIDENCE_ORDER: readonly Confidence[] = ['low', 'medium', 'high', 'critical'];

const CONFIDENCE_WEIGHT: Record<Confidence, number> = {
  low: 0.2,
  medium: 0.5,
  high: 0.8,
  critical: 1.0,
};

/** Lower effort scores higher. */
const EFFORT_INVERSE: Record<InsightEffort, number> = {
  low: 1.0,
  medium: 0.7,
  high: 0.4,
  'n/a': 0,
};

const OPPORTUNITY_IMPACT: Record<Impact, number> = {
  low: 0.3,
  medium: 0.6,
  high: 1.0,
};

const INSIGHT_IMPACT: Record<InsightImpact, number> = {
  low: 0.3,
  medium: 0.6,
  high: 0.8,
  critical: 1.0,
};

/**
 * Negative when a ranks below b.
 */
export function compareConfidence(a: Confidence, b: Confidence): number {
  return CONFIDENCE_ORDER.indexOf(a) - CONFIDENCE_ORDER.indexOf(b);
}

export function opportunityPriority(
  confidence: Confidence,
  effort: Effort,
  impact: Impact
): number {
  return (
    CONFIDENCE_WEIGHT[confidence] * 0.4 +
    EFFORT_INVERSE[effort] * 0.3 +
    OPPORTUNITY_IMPACT[impact] * 0.3
  );
}

export function insightPriority(
  confidence: Confidence,
  effort: InsightEffort,
  impact: InsightImpact
): number {
  return (
    CONFIDENCE_WEIGHT[confidence] * 0.4 +
    EFFORT_INVERSE[effort] * 0.2 +
    INSIGHT_IMPACT[impact] * 0.4
  );
}

export function createOpportunity(input: PatternOpportunityInput): PatternOpportunity {
  return Object.freeze({
    ...input,
    priorityScore: opportunityPriority(input.confidence, input.effortEstimate, input.impactEstimate),
  });
}

export function createInsight(input: ArchitecturalInsightInput): ArchitecturalInsight {
  return Object.freeze({
    ...input,
    affectedFiles: Object.freeze([...input.affectedFiles]),
    recommendations: Object.freeze([...input.recommendations]),
    priorityScore: insightPriority(input.confidence, input.effort, input.impact),
  });
}

/**
 * Stable sort by priority, highest first.
 */
export function byPriority<T extends { readonly priorityScore: number }>(items: readonly T[]): T[] {
  return [...items].sort((a, b) => b.priorityScore - a.priorityScore);
}

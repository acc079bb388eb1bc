/**
 * JSON snapshot of a repository analysis, with snake_case keys.
 */
import { z } from 'zod';
import { readFile, writeFile } from '../../utils/file-system.js';
import { ErrorCodes, SystemError } from '../../utils/errors.js';
import type { ArchitecturalInsight, PatternOpportunity } from '../opportunities/index.js';
import type { AnalysisSummary, RepositoryAnalysis } from './types.js';

export interface OpportunityJson {
  pattern_name: string;
  opportunity_type: string;
  confidence: string;
  file_path: string;
  line_number: number;
  line_end: number | null;
  description: string;
  current_code_snippet: string;
  suggested_improvement: string;
  reasoning: string;
  effort_estimate: string;
  impact_estimate: string;
  priority_score: number;
}

export interface InsightJson {
  insight_type: string;
  title: string;
  description: string;
  affected_files: string[];
  confidence: string;
  impact: string;
  effort: string;
  recommendations: string[];
  priority_score: number;
}

export interface AnalysisJson {
  repository_path: string;
  total_files_analyzed: number;
  total_opportunities: number;
  opportunities_by_file: Record<string, OpportunityJson[]>;
  architectural_insights: InsightJson[];
  pattern_usage_summary: Record<string, number>;
  complexity_assessment: string;
  recommendations_summary: string[];
}

/** The fields loadAnalysisSummary reads back. */
const AnalysisSummaryJsonSchema = z.object({
  repository_path: z.string(),
  total_files_analyzed: z.number().int().min(0),
  total_opportunities: z.number().int().min(0),
  pattern_usage_summary: z.record(z.string(), z.number().int().min(0)),
  complexity_assessment: z.string(),
});

function opportunityToJson(opp: PatternOpportunity): OpportunityJson {
  return {
    pattern_name: opp.patternName,
    opportunity_type: opp.opportunityType,
    confidence: opp.confidence,
    file_path: opp.filePath,
    line_number: opp.lineNumber,
    line_end: opp.lineEnd ?? null,
    description: opp.description,
    current_code_snippet: opp.currentCodeSnippet,
    suggested_improvement: opp.suggestedImprovement,
    reasoning: opp.reasoning,
    effort_estimate: opp.effortEstimate,
    impact_estimate: opp.impactEstimate,
    priority_score: opp.priorityScore,
  };
}

function insightToJson(insight: ArchitecturalInsight): InsightJson {
  return {
    insight_type: insight.insightType,
    title: insight.title,
    description: insight.description,
    affected_files: [...insight.affectedFiles],
    confidence: insight.confidence,
    impact: insight.impact,
    effort: insight.effort,
    recommendations: [...insight.recommendations],
    priority_score: insight.priorityScore,
  };
}

export function toAnalysisJson(analysis: RepositoryAnalysis): AnalysisJson {
  const opportunitiesByFile: Record<string, OpportunityJson[]> = {};
  for (const [filePath, opportunities] of Object.entries(analysis.opportunitiesByFile)) {
    opportunitiesByFile[filePath] = opportunities.map(opportunityToJson);
  }

  return {
    repository_path: analysis.repositoryPath,
    total_files_analyzed: analysis.totalFilesAnalyzed,
    total_opportunities: analysis.totalOpportunities,
    opportunities_by_file: opportunitiesByFile,
    architectural_insights: analysis.architecturalInsights.map(insightToJson),
    pattern_usage_summary: { ...analysis.patternUsageSummary },
    complexity_assessment: analysis.complexityAssessment,
    recommendations_summary: [...analysis.recommendationsSummary],
  };
}

/**
 * Write the snapshot as indented JSON, creating parent directories.
 */
export async function saveAnalysis(analysis: RepositoryAnalysis, outputPath: string): Promise<void> {
  const content = JSON.stringify(toAnalysisJson(analysis), null, 2) + '\n';
  try {
    await writeFile(outputPath, content);
  } catch (error) {
    throw new SystemError(
      ErrorCodes.WRITE_ERROR,
      `Failed to write analysis to ${outputPath}: ${error instanceof Error ? error.message : String(error)}`,
      { outputPath }
    );
  }
}

/**
 * Read the totals and pattern histogram back from a saved snapshot.
 */
export async function loadAnalysisSummary(inputPath: string): Promise<AnalysisSummary> {
  let parsed: unknown;
  try {
    parsed = JSON.parse(await readFile(inputPath));
  } catch (error) {
    throw new SystemError(
      ErrorCodes.PARSE_ERROR,
      `Failed to read analysis from ${inputPath}: ${error instanceof Error ? error.message : String(error)}`,
      { inputPath }
    );
  }

  const result = AnalysisSummaryJsonSchema.safeParse(parsed);
  if (!result.success) {
    throw new SystemError(
      ErrorCodes.INVALID_SCHEMA,
      `Analysis file ${inputPath} is not a pattern-scout snapshot`,
      { inputPath, errors: result.error.issues }
    );
  }

  return {
    repositoryPath: result.data.repository_path,
    totalFilesAnalyzed: result.data.total_files_analyzed,
    totalOpportunities: result.data.total_opportunities,
    patternUsageSummary: result.data.pattern_usage_summary,
    complexityAssessment: result.data.complexity_assessment,
  };
}

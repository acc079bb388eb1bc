/**
 * Markdown report for a repository analysis.
 */
import * as path from 'node:path';
import { byPriority } from '../opportunities/index.js';
import type { RepositoryAnalysis } from './types.js';

const TOP_INSIGHTS = 5;
const INSIGHT_RECOMMENDATIONS = 3;
const ACTION_ITEMS = 8;
const FILE_OPPORTUNITIES = 8;
const HIGH_PRIORITY_SCORE = 0.7;

/** `architectural_pattern` -> Architectural Pattern, `n/a` -> N/A */
export function titleCase(value: string): string {
  return value
    .replace(/_/g, ' ')
    .replace(/(^|[^A-Za-z])([a-z])/g, (_match, boundary: string, letter: string) => boundary + letter.toUpperCase());
}

export function generateReport(analysis: RepositoryAnalysis): string {
  const lines: string[] = [
    '# Repository Pattern Analysis Report',
    '',
    `**Repository**: ${analysis.repositoryPath}`,
    `**Files Analyzed**: ${analysis.totalFilesAnalyzed}`,
    `**Total Opportunities**: ${analysis.totalOpportunities}`,
    `**Complexity**: ${analysis.complexityAssessment}`,
    '',
  ];

  if (analysis.totalOpportunities === 0) {
    lines.push(
      '**Excellent!** No pattern opportunities detected. Your codebase appears well-structured.',
      ''
    );
    return lines.join('\n');
  }

  lines.push('## Pattern Opportunity Summary', '', '| Pattern | Opportunities |', '|---|---|');
  const histogram = Object.entries(analysis.patternUsageSummary).sort((a, b) => b[1] - a[1]);
  for (const [pattern, count] of histogram) {
    lines.push(`| ${titleCase(pattern)} | ${count} |`);
  }
  lines.push('');

  lines.push('## Key Architectural Insights', '');
  byPriority(analysis.architecturalInsights)
    .slice(0, TOP_INSIGHTS)
    .forEach((insight, index) => {
      lines.push(
        `### ${index + 1}. ${insight.title}`,
        `**Type**: ${titleCase(insight.insightType)}`,
        `**Impact**: ${titleCase(insight.impact)} | **Effort**: ${titleCase(insight.effort)}`,
        `**Description**: ${insight.description}`
      );
      if (insight.affectedFiles.length > 0) {
        lines.push(`**Affected Files**: ${insight.affectedFiles.length} files`);
      }
      lines.push('**Recommendations**:');
      for (const recommendation of insight.recommendations.slice(0, INSIGHT_RECOMMENDATIONS)) {
        lines.push(`- ${recommendation}`);
      }
      lines.push('');
    });

  lines.push('## Priority Action Items', '');
  analysis.recommendationsSummary.slice(0, ACTION_ITEMS).forEach((recommendation, index) => {
    lines.push(`${index + 1}. ${recommendation}`);
  });
  lines.push('');

  lines.push('## High-Priority File Opportunities', '');
  const highPriority = byPriority(
    Object.values(analysis.opportunitiesByFile)
      .flat()
      .filter((opp) => opp.priorityScore > HIGH_PRIORITY_SCORE)
  ).slice(0, FILE_OPPORTUNITIES);

  for (const opp of highPriority) {
    lines.push(
      `**${titleCase(opp.patternName)}** in \`${path.basename(opp.filePath)}:${opp.lineNumber}\``,
      `- ${opp.description}`,
      `- Effort: ${titleCase(opp.effortEstimate)} | Impact: ${titleCase(opp.impactEstimate)}`,
      ''
    );
  }

  return lines.join('\n');
}

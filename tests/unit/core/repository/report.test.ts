import { describe, it, expect } from 'vitest';
import { generateReport, titleCase } from '../../../../src/core/repository/report.js';
import {
  deriveInsights,
  groupByPattern,
  summarizeRecommendations,
} from '../../../../src/core/repository/insights.js';
import { createOpportunity } from '../../../../src/core/opportunities/scoring.js';
import type { PatternOpportunity, PatternOpportunityInput } from '../../../../src/core/opportunities/types.js';
import type { RepositoryAnalysis } from '../../../../src/core/repository/types.js';

function opportunity(overrides: Partial<PatternOpportunityInput>): PatternOpportunity {
  return createOpportunity({
    patternName: 'builder',
    opportunityType: 'refactor_to_pattern',
    confidence: 'high',
    filePath: '/repo/shipping.py',
    lineNumber: 2,
    description: 'Constructor with 7 parameters could benefit from Builder pattern',
    currentCodeSnippet: '',
    suggestedImprovement: '',
    reasoning: '',
    effortEstimate: 'medium',
    impactEstimate: 'medium',
    ...overrides,
  });
}

function analysisOf(opportunities: PatternOpportunity[], totalFiles: number): RepositoryAnalysis {
  const byFile: Record<string, PatternOpportunity[]> = {};
  for (const opp of opportunities) {
    const list = byFile[opp.filePath] ?? [];
    list.push(opp);
    byFile[opp.filePath] = list;
  }
  const byPattern = groupByPattern(opportunities);
  const insights = deriveInsights(byPattern, opportunities);
  const histogram: Record<string, number> = {};
  for (const [name, opps] of byPattern) histogram[name] = opps.length;

  return {
    repositoryPath: '/repo',
    totalFilesAnalyzed: totalFiles,
    totalOpportunities: opportunities.length,
    opportunitiesByFile: byFile,
    architecturalInsights: insights,
    patternUsageSummary: histogram,
    complexityAssessment: insights[insights.length - 1].description,
    recommendationsSummary: summarizeRecommendations(insights),
  };
}

describe('report', () => {
  describe('titleCase', () => {
    it('should turn identifiers into titles', () => {
      expect(titleCase('architectural_pattern')).toBe('Architectural Pattern');
      expect(titleCase('builder')).toBe('Builder');
      expect(titleCase('n/a')).toBe('N/A');
    });
  });

  describe('generateReport', () => {
    it('should congratulate a codebase without findings', () => {
      expect(generateReport(analysisOf([], 4))).toBe(
        [
          '# Repository Pattern Analysis Report',
          '',
          '**Repository**: /repo',
          '**Files Analyzed**: 4',
          '**Total Opportunities**: 0',
          '**Complexity**: Complexity Level: Low (Well-structured codebase)',
          '',
          '**Excellent!** No pattern opportunities detected. Your codebase appears well-structured.',
          '',
        ].join('\n')
      );
    });

    it('should render every section in order', () => {
      const report = generateReport(
        analysisOf(
          [
            opportunity({}),
            opportunity({
              patternName: 'command',
              opportunityType: 'optimization_opportunity',
              confidence: 'low',
              filePath: '/repo/jobs.py',
              lineNumber: 5,
              description: 'Function run stores state - consider Command pattern',
              impactEstimate: 'low',
            }),
          ],
          3
        )
      );

      expect(report).toBe(
        [
          '# Repository Pattern Analysis Report',
          '',
          '**Repository**: /repo',
          '**Files Analyzed**: 3',
          '**Total Opportunities**: 2',
          '**Complexity**: Complexity Level: Low (Well-structured codebase)',
          '',
          '## Pattern Opportunity Summary',
          '',
          '| Pattern | Opportunities |',
          '|---|---|',
          '| Builder | 1 |',
          '| Command | 1 |',
          '',
          '## Key Architectural Insights',
          '',
          '### 1. Codebase Complexity Assessment',
          '**Type**: Assessment',
          '**Impact**: Critical | **Effort**: N/A',
          '**Description**: Complexity Level: Low (Well-structured codebase)',
          '**Recommendations**:',
          '- Maintain current good practices',
          '',
          '## Priority Action Items',
          '',
          '1. Maintain current good practices',
          '',
          '## High-Priority File Opportunities',
          '',
          '**Builder** in `shipping.py:2`',
          '- Constructor with 7 parameters could benefit from Builder pattern',
          '- Effort: Medium | Impact: Medium',
          '',
        ].join('\n')
      );
    });

    it('should sort the summary table by count', () => {
      const report = generateReport(
        analysisOf(
          [
            opportunity({ patternName: 'command', confidence: 'low' }),
            opportunity({ patternName: 'factory', confidence: 'low' }),
            opportunity({ patternName: 'factory', confidence: 'low', lineNumber: 9 }),
          ],
          1
        )
      );
      const lines = report.split('\n');

      expect(lines.indexOf('| Factory | 2 |')).toBeLessThan(lines.indexOf('| Command | 1 |'));
    });

    it('should show affected file counts and cap recommendations at three', () => {
      const report = generateReport(
        analysisOf(
          ['a', 'b', 'c'].map((name) =>
            opportunity({ patternName: 'factory', confidence: 'medium', filePath: `/repo/${name}.py` })
          ),
          3
        )
      );
      const lines = report.split('\n');
      const start = lines.indexOf('**Affected Files**: 3 files');

      expect(start).toBeGreaterThan(-1);
      expect(lines.slice(start + 1, start + 6)).toEqual([
        '**Recommendations**:',
        '- Implement factory methods for complex object creation',
        '- Consider Abstract Factory for families of related objects',
        '- Centralize creation logic to improve maintainability',
        '',
      ]);
    });

    it('should list at most eight high-priority findings', () => {
      const findings = Array.from({ length: 10 }, (_, i) => opportunity({ lineNumber: i + 1 }));
      const report = generateReport(analysisOf(findings, 1));

      expect(report.split('\n').filter((line) => line.startsWith('**Builder** in'))).toHaveLength(8);
    });

    it('should leave out findings at or below 0.7', () => {
      const report = generateReport(analysisOf([opportunity({ confidence: 'medium' })], 1));

      expect(report.endsWith('## High-Priority File Opportunities\n')).toBe(true);
    });
  });
});

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, readFile, rm, writeFile } from 'fs/promises';
import { join } from 'path';
import { tmpdir } from 'os';
import {
  loadAnalysisSummary,
  saveAnalysis,
  toAnalysisJson,
} from '../../../../src/core/repository/serializer.js';
import { createInsight, createOpportunity } from '../../../../src/core/opportunities/scoring.js';
import type { RepositoryAnalysis } from '../../../../src/core/repository/types.js';
import { ErrorCodes, SystemError } from '../../../../src/utils/errors.js';

const builder = createOpportunity({
  patternName: 'builder',
  opportunityType: 'refactor_to_pattern',
  confidence: 'high',
  filePath: '/repo/shipping.py',
  lineNumber: 2,
  lineEnd: 9,
  description: 'Constructor with 7 parameters could benefit from Builder pattern',
  currentCodeSnippet: 'def __init__(self, a, b, c, d, e, f, g):',
  suggestedImprovement: 'Implement Builder pattern for more readable object construction',
  reasoning: 'Constructor has 7 parameters (0 optional). Builder pattern threshold: 5+ parameters',
  effortEstimate: 'medium',
  impactEstimate: 'medium',
});

const command = createOpportunity({
  patternName: 'command',
  opportunityType: 'optimization_opportunity',
  confidence: 'low',
  filePath: '/repo/jobs.py',
  lineNumber: 4,
  description: 'Function run stores state - consider Command pattern',
  currentCodeSnippet: 'def run(self):',
  suggestedImprovement: 'Consider Command pattern if undo/redo or queuing needed',
  reasoning: 'Function stores state and has an execution-like name - possible command',
  effortEstimate: 'medium',
  impactEstimate: 'low',
});

const assessment = createInsight({
  insightType: 'assessment',
  title: 'Codebase Complexity Assessment',
  description: 'Complexity Level: Low (Well-structured codebase)',
  affectedFiles: [],
  confidence: 'high',
  impact: 'critical',
  effort: 'n/a',
  recommendations: ['Maintain current good practices'],
});

const analysis: RepositoryAnalysis = {
  repositoryPath: '/repo',
  totalFilesAnalyzed: 3,
  totalOpportunities: 2,
  opportunitiesByFile: { '/repo/shipping.py': [builder], '/repo/jobs.py': [command] },
  architecturalInsights: [assessment],
  patternUsageSummary: { builder: 1, command: 1 },
  complexityAssessment: 'Complexity Level: Low (Well-structured codebase)',
  recommendationsSummary: ['Maintain current good practices'],
};

describe('serializer', () => {
  let testDir: string;

  beforeEach(async () => {
    testDir = await mkdtemp(join(tmpdir(), 'pattern-scout-serializer-'));
  });

  afterEach(async () => {
    await rm(testDir, { recursive: true, force: true });
  });

  describe('toAnalysisJson', () => {
    it('should use snake_case keys and lowercase enum values', () => {
      const json = toAnalysisJson(analysis);

      expect(json.repository_path).toBe('/repo');
      expect(json.opportunities_by_file['/repo/shipping.py'][0]).toMatchObject({
        pattern_name: 'builder',
        opportunity_type: 'refactor_to_pattern',
        confidence: 'high',
        line_number: 2,
        line_end: 9,
        effort_estimate: 'medium',
      });
      expect(json.architectural_insights[0]).toMatchObject({
        insight_type: 'assessment',
        impact: 'critical',
        effort: 'n/a',
      });
    });

    it('should write a missing end line as null', () => {
      expect(toAnalysisJson(analysis).opportunities_by_file['/repo/jobs.py'][0].line_end).toBeNull();
    });

    it('should keep priority scores', () => {
      expect(toAnalysisJson(analysis).opportunities_by_file['/repo/shipping.py'][0].priority_score).toBe(
        builder.priorityScore
      );
    });
  });

  describe('saveAnalysis', () => {
    it('should write indented JSON, creating parent directories', async () => {
      const outputPath = join(testDir, 'reports', 'latest', 'analysis.json');
      await saveAnalysis(analysis, outputPath);

      const content = await readFile(outputPath, 'utf-8');
      expect(content).toBe(JSON.stringify(toAnalysisJson(analysis), null, 2) + '\n');
    });

    it('should surface write failures as WRITE_ERROR', async () => {
      const blocker = join(testDir, 'blocker');
      await writeFile(blocker, 'not a directory');

      let caught: unknown;
      try {
        await saveAnalysis(analysis, join(blocker, 'analysis.json'));
      } catch (error) {
        caught = error;
      }

      expect(caught).toBeInstanceOf(SystemError);
      expect(caught).toMatchObject({ code: ErrorCodes.WRITE_ERROR });
    });
  });

  describe('loadAnalysisSummary', () => {
    it('should read back the totals and histogram', async () => {
      const outputPath = join(testDir, 'analysis.json');
      await saveAnalysis(analysis, outputPath);

      expect(await loadAnalysisSummary(outputPath)).toEqual({
        repositoryPath: '/repo',
        totalFilesAnalyzed: 3,
        totalOpportunities: 2,
        patternUsageSummary: { builder: 1, command: 1 },
        complexityAssessment: 'Complexity Level: Low (Well-structured codebase)',
      });
    });

    it('should reject files that are not JSON', async () => {
      const inputPath = join(testDir, 'broken.json');
      await writeFile(inputPath, '{ not json');

      await expect(loadAnalysisSummary(inputPath)).rejects.toMatchObject({ code: ErrorCodes.PARSE_ERROR });
    });

    it('should reject JSON of the wrong shape', async () => {
      const inputPath = join(testDir, 'other.json');
      await writeFile(inputPath, JSON.stringify({ name: 'something else' }));

      await expect(loadAnalysisSummary(inputPath)).rejects.toMatchObject({
        code: ErrorCodes.INVALID_SCHEMA,
        message: `Analysis file ${inputPath} is not a pattern-scout snapshot`,
      });
    });

    it('should report a missing file as PARSE_ERROR', async () => {
      await expect(loadAnalysisSummary(join(testDir, 'missing.json'))).rejects.toMatchObject({
        code: ErrorCodes.PARSE_ERROR,
      });
    });
  });
});

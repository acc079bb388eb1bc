/**
 * Repository-wide analysis: discover files, analyze each, aggregate.
 */
import * as os from 'node:os';
import * as path from 'node:path';
import type Parser from 'tree-sitter';
import { createPythonParser, parsePython } from '../../parsers/tree-sitter/index.js';
import { readFile } from '../../utils/file-system.js';
import { logger } from '../../utils/logger.js';
import { getDefaultConfig, type Config } from '../config/index.js';
import { FileAnalyzer } from '../detection/index.js';
import type { PatternKnowledgeBase } from '../knowledge/index.js';
import type { PatternOpportunity } from '../opportunities/index.js';
import { DEFAULT_EXCLUSIONS, discoverSourceFiles } from './discovery.js';
import { ASSESSMENT_TITLE, deriveInsights, groupByPattern, summarizeRecommendations } from './insights.js';
import { saveAnalysis } from './serializer.js';
import type {
  AnalyzeRepositoryOptions,
  RepositoryAnalysis,
  RepositoryAnalyzerOptions,
} from './types.js';

export class RepositoryAnalyzer {
  private readonly rootPath: string;
  private readonly config: Config;
  private readonly parser: Parser;
  private readonly fileAnalyzer: FileAnalyzer;
  private readonly concurrency: number;
  private readonly log = logger.child('repository');

  constructor(rootPath: string, options: RepositoryAnalyzerOptions) {
    this.rootPath = path.resolve(rootPath);
    this.config = options.config ?? getDefaultConfig();
    if (options.config) {
      this.log.setLevel(options.config.log_level);
    }

    const knowledge = options.knowledgeBase.withThresholds(this.config.thresholds);
    this.parser = options.parser ?? createPythonParser();
    this.fileAnalyzer = new FileAnalyzer(knowledge, { parser: this.parser });
    // Default to 75% of CPU cores, min 2, max 32
    this.concurrency =
      options.concurrency ??
      Math.min(Math.max(Math.floor(os.cpus().length * 0.75), 2), 32);
  }

  async analyze(excludePatterns: string[] = []): Promise<RepositoryAnalysis> {
    const exclusions = [...DEFAULT_EXCLUSIONS, ...this.config.files.exclude, ...excludePatterns];
    const files = await discoverSourceFiles(this.rootPath, this.config.files.include, exclusions);
    this.log.debug(`Found ${files.length} source files under ${this.rootPath}`);

    const results = new Map<string, PatternOpportunity[]>();
    await this.processInBatches(files, this.concurrency, async (relativePath) => {
      const absolutePath = path.join(this.rootPath, relativePath);
      results.set(absolutePath, await this.analyzeFile(absolutePath));
    });

    // Batches finish out of order; rebuild in discovery order
    const opportunitiesByFile: Record<string, readonly PatternOpportunity[]> = {};
    for (const relativePath of files) {
      const absolutePath = path.join(this.rootPath, relativePath);
      const opportunities = results.get(absolutePath) ?? [];
      if (opportunities.length > 0) {
        opportunitiesByFile[absolutePath] = Object.freeze(opportunities);
      }
    }

    return this.summarize(opportunitiesByFile);
  }

  private async analyzeFile(absolutePath: string): Promise<PatternOpportunity[]> {
    let source: string;
    try {
      source = await readFile(absolutePath);
    } catch (error) {
      this.log.warn(`Skipping unreadable file ${absolutePath}: ${error instanceof Error ? error.message : String(error)}`);
      return [];
    }

    const tree = parsePython(this.parser, source);
    if (!tree) {
      this.log.warn(`Skipping unparsable file ${absolutePath}`);
      return [];
    }

    const opportunities = this.fileAnalyzer.analyzeTree(absolutePath, tree);
    this.log.debug(`${absolutePath}: ${opportunities.length} opportunities`);
    return opportunities;
  }

  private summarize(
    opportunitiesByFile: Record<string, readonly PatternOpportunity[]>
  ): RepositoryAnalysis {
    const all = Object.values(opportunitiesByFile).flat();
    const byPattern = groupByPattern(all);
    const insights = deriveInsights(byPattern, all);

    const patternUsageSummary: Record<string, number> = {};
    for (const [name, opportunities] of byPattern) {
      patternUsageSummary[name] = opportunities.length;
    }

    const assessment = insights.find((insight) => insight.title === ASSESSMENT_TITLE);

    return Object.freeze({
      repositoryPath: this.rootPath,
      totalFilesAnalyzed: Object.keys(opportunitiesByFile).length,
      totalOpportunities: all.length,
      opportunitiesByFile: Object.freeze(opportunitiesByFile),
      architecturalInsights: Object.freeze(insights),
      patternUsageSummary: Object.freeze(patternUsageSummary),
      complexityAssessment: assessment?.description ?? 'Unknown',
      recommendationsSummary: Object.freeze(summarizeRecommendations(insights)),
    });
  }

  /**
   * Process items in fixed-size batches.
   * Allows parallel reads while controlling concurrency.
   */
  private async processInBatches<T>(
    items: T[],
    batchSize: number,
    processor: (item: T) => Promise<void>
  ): Promise<void> {
    for (let i = 0; i < items.length; i += batchSize) {
      const batch = items.slice(i, i + batchSize);
      await Promise.all(batch.map(processor));
    }
  }
}

/**
 * Analyze a repository and optionally save the JSON snapshot.
 */
export async function analyzeRepository(
  rootPath: string,
  options: AnalyzeRepositoryOptions
): Promise<RepositoryAnalysis> {
  const analyzer = new RepositoryAnalyzer(rootPath, {
    knowledgeBase: options.knowledgeBase,
    config: options.config,
  });
  const analysis = await analyzer.analyze(options.excludePatterns);

  if (options.saveTo) {
    await saveAnalysis(analysis, options.saveTo);
  }
  return analysis;
}

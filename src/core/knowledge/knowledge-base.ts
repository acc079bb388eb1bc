/**
 * Read-only catalog of design pattern knowledge, with lookup and
 * free-text scoring helpers. Built once and handed to the analyzers.
 */
import { KnowledgeBaseError, ErrorCodes } from '../../utils/errors.js';
import type {
  ComplexityLevel,
  PatternCategory,
  PatternKnowledge,
  ThresholdOverrides,
} from './schema.js';

/** A pattern matched against free-text indicators. */
export interface IndicatorScore {
  patternName: string;
  /** Fraction of the pattern's indicators matched, capped at 1 */
  score: number;
}

/** A red flag found in a problem description. */
export interface AntiPatternWarning {
  patternName: string;
  warning: string;
}

const COMPLEXITY_ORDER: readonly ComplexityLevel[] = ['simple', 'moderate', 'complex', 'enterprise'];

function freezeDeep(value: unknown): void {
  if (value !== null && typeof value === 'object' && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) {
      freezeDeep(child);
    }
  }
}

export class PatternKnowledgeBase {
  private readonly patterns: ReadonlyMap<string, PatternKnowledge>;

  constructor(patterns: Record<string, PatternKnowledge>) {
    const entries = new Map<string, PatternKnowledge>();
    for (const [key, knowledge] of Object.entries(patterns)) {
      const copy = structuredClone(knowledge);
      freezeDeep(copy);
      entries.set(key.toLowerCase(), copy);
    }
    this.patterns = entries;
  }

  /**
   * Pattern keys in registry order.
   */
  names(): string[] {
    return [...this.patterns.keys()];
  }

  has(name: string): boolean {
    return this.patterns.has(name.toLowerCase());
  }

  /**
   * Case-insensitive exact lookup.
   */
  lookup(name: string): PatternKnowledge | undefined {
    return this.patterns.get(name.toLowerCase());
  }

  /**
   * Lookup for callers that treat a missing pattern as a defect.
   */
  require(name: string): PatternKnowledge {
    const knowledge = this.lookup(name);
    if (!knowledge) {
      throw new KnowledgeBaseError(
        ErrorCodes.UNKNOWN_PATTERN,
        `Unknown pattern '${name}'`,
        { pattern: name, known: this.names() }
      );
    }
    return knowledge;
  }

  byCategory(category: PatternCategory): PatternKnowledge[] {
    return [...this.patterns.values()].filter((p) => p.category === category);
  }

  /**
   * Numeric detector threshold for a pattern.
   */
  threshold(patternName: string, key: string): number {
    const value = this.require(patternName).when_to_use.thresholds[key];
    if (value === undefined) {
      throw new KnowledgeBaseError(
        ErrorCodes.UNKNOWN_PATTERN,
        `Pattern '${patternName}' has no threshold '${key}'`,
        { pattern: patternName, threshold: key }
      );
    }
    return value;
  }

  /**
   * Score every pattern against free-text tokens.
   *
   * Each token adds 1/|indicators| for every indicator phrase containing it.
   * Scores are capped at 1, zero scores are dropped, and ties keep registry
   * order.
   */
  scoreIndicators(tokens: readonly string[]): IndicatorScore[] {
    const needles = tokens.map((token) => token.toLowerCase());
    const results: IndicatorScore[] = [];

    for (const [patternName, knowledge] of this.patterns) {
      const indicators = knowledge.when_to_use.indicators.map((i) => i.toLowerCase());
      const unit = 1 / indicators.length;
      let score = 0;

      for (const needle of needles) {
        for (const indicator of indicators) {
          if (indicator.includes(needle)) {
            score += unit;
          }
        }
      }

      if (score > 0) {
        results.push({ patternName, score: Math.min(score, 1) });
      }
    }

    return results.sort((a, b) => b.score - a.score);
  }

  /**
   * One warning per red-flag phrase found in the text.
   */
  detectAntiPatternMentions(text: string): AntiPatternWarning[] {
    const haystack = text.toLowerCase();
    const warnings: AntiPatternWarning[] = [];

    for (const [patternName, knowledge] of this.patterns) {
      for (const redFlag of knowledge.when_not_to_use.red_flags) {
        if (haystack.includes(redFlag.toLowerCase())) {
          warnings.push({
            patternName,
            warning: `Potential ${patternName} anti-pattern detected: ${redFlag}`,
          });
        }
      }
    }

    return warnings;
  }

  /**
   * Whether a pattern suits a scenario of the given complexity.
   */
  complexityRecommendation(patternName: string, scenario: ComplexityLevel): string {
    const knowledge = this.lookup(patternName);
    if (!knowledge) {
      return 'Pattern not found';
    }

    const required = COMPLEXITY_ORDER.indexOf(knowledge.when_to_use.minimum_complexity);
    if (COMPLEXITY_ORDER.indexOf(scenario) < required) {
      return `${knowledge.name} might be overkill for ${scenario} scenarios`;
    }
    return `${knowledge.name} is appropriate for ${scenario} scenarios`;
  }

  /**
   * Copy of this knowledge base with threshold overrides merged in.
   */
  withThresholds(overrides: ThresholdOverrides): PatternKnowledgeBase {
    const merged: Record<string, PatternKnowledge> = {};

    const byKey: ThresholdOverrides = {};
    for (const [name, values] of Object.entries(overrides)) {
      this.require(name);
      const key = name.toLowerCase();
      byKey[key] = { ...byKey[key], ...values };
    }

    for (const [name, knowledge] of this.patterns) {
      const extra = byKey[name];
      merged[name] = extra
        ? {
            ...knowledge,
            when_to_use: {
              ...knowledge.when_to_use,
              thresholds: { ...knowledge.when_to_use.thresholds, ...extra },
            },
          }
        : knowledge;
    }

    return new PatternKnowledgeBase(merged);
  }
}

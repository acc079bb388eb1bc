/**
 * Repository-level insights derived from the combined findings.
 */
import {
  byPriority,
  createInsight,
  type ArchitecturalInsight,
  type PatternOpportunity,
} from '../opportunities/index.js';

export const ASSESSMENT_TITLE = 'Codebase Complexity Assessment';

const OVERUSE_THRESHOLD = 5;
const HIGH_COMPLEXITY_THRESHOLD = 20;
const SHARED_RESOURCE_PATH_WORDS = ['database', 'connection', 'db'];

export type OpportunitiesByPattern = ReadonlyMap<string, readonly PatternOpportunity[]>;

interface ComplexityTier {
  level: string;
  recommendation: string;
}

function uniqueFiles(opportunities: readonly PatternOpportunity[]): string[] {
  return [...new Set(opportunities.map((opp) => opp.filePath))];
}

function countWhere(
  opportunities: readonly PatternOpportunity[],
  predicate: (opp: PatternOpportunity) => boolean
): number {
  return opportunities.filter(predicate).length;
}

function singletonInsights(singletons: readonly PatternOpportunity[]): ArchitecturalInsight[] {
  const insights: ArchitecturalInsight[] = [];
  const antiPatterns = singletons.filter((opp) => opp.opportunityType === 'anti_pattern_detected');
  const candidates = singletons.filter((opp) => opp.opportunityType !== 'anti_pattern_detected');

  if (antiPatterns.length >= 2) {
    insights.push(
      createInsight({
        insightType: 'anti_pattern',
        title: 'Singleton Pattern Overuse Detected',
        description:
          `Found ${antiPatterns.length} inappropriate singleton implementations. ` +
          'Singletons should not be used for data models or entity classes.',
        affectedFiles: uniqueFiles(antiPatterns),
        confidence: 'high',
        impact: 'high',
        effort: 'medium',
        recommendations: [
          'Convert data model singletons to regular classes',
          'Use dependency injection for better testability',
          'Consider Repository pattern for data access centralization',
          "Review singleton usage - ensure they're truly needed",
        ],
      })
    );
  }

  if (candidates.length >= 2) {
    const configFiles = candidates.filter((opp) => opp.filePath.toLowerCase().includes('config'));
    const dbFiles = candidates.filter((opp) => {
      const lower = opp.filePath.toLowerCase();
      return SHARED_RESOURCE_PATH_WORDS.some((word) => lower.includes(word));
    });

    if (configFiles.length > 0 || dbFiles.length > 0) {
      insights.push(
        createInsight({
          insightType: 'optimization',
          title: 'Centralize Shared Resources with Singleton',
          description:
            'Multiple configuration or database connection classes could benefit from singleton pattern.',
          affectedFiles: uniqueFiles([...configFiles, ...dbFiles]),
          confidence: 'medium',
          impact: 'medium',
          effort: 'low',
          recommendations: [
            'Implement singleton for configuration management',
            'Centralize database connections with singleton pattern',
            'Ensure thread-safety for multi-threaded applications',
            'Consider lazy initialization for performance',
          ],
        })
      );
    }
  }

  return insights;
}

function singlePatternInsights(byPattern: OpportunitiesByPattern): ArchitecturalInsight[] {
  const insights: ArchitecturalInsight[] = [];
  const factory = byPattern.get('factory') ?? [];
  const observer = byPattern.get('observer') ?? [];
  const strategy = byPattern.get('strategy') ?? [];
  const builder = byPattern.get('builder') ?? [];
  const repository = byPattern.get('repository') ?? [];

  if (factory.length >= 3) {
    insights.push(
      createInsight({
        insightType: 'architectural_pattern',
        title: 'Standardize Object Creation with Factory Pattern',
        description:
          `Found ${factory.length} factory pattern opportunities. ` +
          'Consider implementing a consistent object creation strategy.',
        affectedFiles: uniqueFiles(factory),
        confidence: 'medium',
        impact: 'medium',
        effort: 'medium',
        recommendations: [
          'Implement factory methods for complex object creation',
          'Consider Abstract Factory for families of related objects',
          'Centralize creation logic to improve maintainability',
          'Use factories to support polymorphism and extensibility',
        ],
      })
    );
  }

  if (observer.length >= 2) {
    insights.push(
      createInsight({
        insightType: 'architectural_pattern',
        title: 'Implement Event-Driven Architecture',
        description:
          `Found ${observer.length} observer pattern opportunities. ` +
          'Consider implementing a centralized event system.',
        affectedFiles: uniqueFiles(observer),
        confidence: 'medium',
        impact: 'high',
        effort: 'medium',
        recommendations: [
          'Implement centralized event bus or observer registry',
          'Define clear event contracts and interfaces',
          'Consider async event handling for performance',
          'Implement proper error handling in event notifications',
        ],
      })
    );
  }

  if (strategy.length >= 3) {
    insights.push(
      createInsight({
        insightType: 'complexity_reduction',
        title: 'Reduce Complexity with Strategy Pattern',
        description:
          `Found ${strategy.length} strategy pattern opportunities. ` +
          'Multiple conditional chains suggest high algorithmic complexity.',
        affectedFiles: uniqueFiles(strategy),
        confidence: 'high',
        impact: 'medium',
        effort: 'medium',
        recommendations: [
          'Replace complex conditional logic with strategy patterns',
          'Create strategy interfaces for algorithm families',
          'Implement strategy selection mechanisms',
          'Consider configuration-driven strategy selection',
        ],
      })
    );
  }

  if (builder.length >= 2) {
    insights.push(
      createInsight({
        insightType: 'optimization',
        title: 'Simplify Object Construction with Builder Pattern',
        description:
          `Found ${builder.length} builder pattern opportunities. ` +
          'Complex constructors suggest need for builder pattern.',
        affectedFiles: uniqueFiles(builder),
        confidence: 'medium',
        impact: 'medium',
        effort: 'low',
        recommendations: [
          'Implement builder pattern for complex object construction',
          'Use fluent interfaces for better readability',
          'Add validation at each construction step',
          'Consider immutable objects with builders',
        ],
      })
    );
  }

  if (repository.length > 0) {
    insights.push(
      createInsight({
        insightType: 'architectural_pattern',
        title: 'Centralize Data Access with Repository Pattern',
        description: 'Data access logic could benefit from repository pattern implementation.',
        affectedFiles: uniqueFiles(repository),
        confidence: 'medium',
        impact: 'high',
        effort: 'high',
        recommendations: [
          'Implement repository interfaces for data access',
          'Separate domain logic from data access logic',
          'Consider Unit of Work pattern for transaction management',
          'Implement repository abstractions for testing',
        ],
      })
    );
  }

  return insights;
}

function crossPatternInsights(byPattern: OpportunitiesByPattern): ArchitecturalInsight[] {
  const insights: ArchitecturalInsight[] = [];
  const factory = byPattern.get('factory') ?? [];
  const strategy = byPattern.get('strategy') ?? [];
  const observer = byPattern.get('observer') ?? [];
  const command = byPattern.get('command') ?? [];

  if (factory.length > 0 && strategy.length > 0) {
    insights.push(
      createInsight({
        insightType: 'architectural_pattern',
        title: 'Combine Factory and Strategy Patterns',
        description:
          'Factory and Strategy opportunities detected. Consider creating strategies through factories.',
        affectedFiles: uniqueFiles([...factory, ...strategy]),
        confidence: 'low',
        impact: 'medium',
        effort: 'medium',
        recommendations: [
          'Use Factory pattern to create Strategy instances',
          'Implement strategy registry for dynamic selection',
          'Consider configuration-driven strategy creation',
        ],
      })
    );
  }

  if (observer.length > 0 && command.length > 0) {
    insights.push(
      createInsight({
        insightType: 'architectural_pattern',
        title: 'Event Sourcing Architecture Opportunity',
        description:
          'Observer and Command patterns together suggest event sourcing possibilities.',
        affectedFiles: uniqueFiles([...observer, ...command]),
        confidence: 'low',
        impact: 'high',
        effort: 'high',
        recommendations: [
          'Consider implementing event sourcing architecture',
          'Use Command pattern for event creation',
          'Use Observer pattern for event handling',
          'Implement event store for audit and replay capabilities',
        ],
      })
    );
  }

  return insights;
}

function overuseInsights(
  byPattern: OpportunitiesByPattern,
  all: readonly PatternOpportunity[]
): ArchitecturalInsight[] {
  const insights: ArchitecturalInsight[] = [];
  const overused = [...byPattern].filter(([, opps]) => opps.length >= OVERUSE_THRESHOLD);

  if (overused.length > 0) {
    const patternList = overused.map(([name, opps]) => `${name} (${opps.length})`).join(', ');
    insights.push(
      createInsight({
        insightType: 'anti_pattern',
        title: 'Potential Pattern Overuse',
        description:
          `High number of pattern opportunities detected: ${patternList}. ` +
          'Consider if simpler solutions might be more appropriate.',
        affectedFiles: [],
        confidence: 'low',
        impact: 'medium',
        effort: 'low',
        recommendations: [
          'Review each pattern opportunity carefully',
          'Consider simpler alternatives where appropriate',
          'Ensure patterns solve real problems, not imaginary ones',
          "Follow YAGNI (You Aren't Gonna Need It) principle",
        ],
      })
    );
  }

  if (all.length >= HIGH_COMPLEXITY_THRESHOLD) {
    insights.push(
      createInsight({
        insightType: 'anti_pattern',
        title: 'High Complexity Warning',
        description:
          `Found ${all.length} pattern opportunities. ` +
          'High pattern density might indicate over-engineering.',
        affectedFiles: [],
        confidence: 'medium',
        impact: 'high',
        effort: 'low',
        recommendations: [
          'Prioritize high-impact, low-effort improvements',
          'Focus on anti-pattern elimination first',
          'Consider architectural simplification',
          'Implement patterns incrementally, not all at once',
        ],
      })
    );
  }

  return insights;
}

/**
 * Complexity tier, checked in order: anti-patterns, then strong findings,
 * then total volume.
 */
export function assessComplexity(all: readonly PatternOpportunity[]): ComplexityTier {
  const antiPatterns = countWhere(all, (opp) => opp.opportunityType === 'anti_pattern_detected');
  const strong = countWhere(all, (opp) => opp.confidence === 'high' || opp.confidence === 'critical');

  if (antiPatterns > 0) {
    return {
      level: 'High (Anti-patterns detected)',
      recommendation: 'Focus on eliminating anti-patterns first',
    };
  }
  if (strong >= 5) {
    return {
      level: 'Medium-High (Multiple clear improvement opportunities)',
      recommendation: 'Implement high-confidence patterns for immediate benefits',
    };
  }
  if (all.length >= 10) {
    return {
      level: 'Medium (Multiple opportunities available)',
      recommendation: 'Prioritize patterns by business value and technical debt reduction',
    };
  }
  if (all.length >= 5) {
    return {
      level: 'Low-Medium (Some improvement opportunities)',
      recommendation: 'Selective pattern implementation based on team capacity',
    };
  }
  return {
    level: 'Low (Well-structured codebase)',
    recommendation: 'Maintain current good practices',
  };
}

/**
 * All insight rules in their fixed order. The assessment insight is
 * always last and always present.
 */
export function deriveInsights(
  byPattern: OpportunitiesByPattern,
  all: readonly PatternOpportunity[]
): ArchitecturalInsight[] {
  const tier = assessComplexity(all);

  return [
    ...singletonInsights(byPattern.get('singleton') ?? []),
    ...singlePatternInsights(byPattern),
    ...crossPatternInsights(byPattern),
    ...overuseInsights(byPattern, all),
    createInsight({
      insightType: 'assessment',
      title: ASSESSMENT_TITLE,
      description: `Complexity Level: ${tier.level}`,
      affectedFiles: [],
      confidence: 'high',
      impact: 'critical',
      effort: 'n/a',
      recommendations: [tier.recommendation],
    }),
  ];
}

/**
 * First two recommendations of each of the five highest-priority insights,
 * without duplicates, at most ten.
 */
export function summarizeRecommendations(insights: readonly ArchitecturalInsight[]): string[] {
  const picked = byPriority(insights)
    .slice(0, 5)
    .flatMap((insight) => insight.recommendations.slice(0, 2));
  return [...new Set(picked)].slice(0, 10);
}

export function groupByPattern(
  opportunities: readonly PatternOpportunity[]
): Map<string, PatternOpportunity[]> {
  const groups = new Map<string, PatternOpportunity[]>();
  for (const opp of opportunities) {
    const group = groups.get(opp.patternName);
    if (group) {
      group.push(opp);
    } else {
      groups.set(opp.patternName, [opp]);
    }
  }
  return groups;
}

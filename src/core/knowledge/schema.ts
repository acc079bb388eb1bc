import { z } from 'zod';

/** Scenario complexity, ordered from least to most demanding. */
export const ComplexityLevelSchema = z.enum(['simple', 'moderate', 'complex', 'enterprise']);

export const PatternCategorySchema = z.enum(['creational', 'structural', 'behavioral']);

/** When to reach for a pattern. */
export const PatternCriteriaSchema = z.object({
  minimum_complexity: ComplexityLevelSchema,
  /** Phrases or scenarios that suggest this pattern */
  indicators: z.array(z.string()).min(1),
  /** Numeric thresholds read by the detectors */
  thresholds: z.record(z.string(), z.number().int().min(0)).default({}),
  use_cases: z.array(z.string()).default([]),
  benefits: z.array(z.string()).default([]),
});

/** When not to reach for a pattern. */
export const AntiPatternCriteriaSchema = z.object({
  /** Phrases that indicate pattern misuse */
  red_flags: z.array(z.string()).default([]),
  scenarios_to_avoid: z.array(z.string()).default([]),
  better_alternatives: z.array(z.string()).default([]),
  common_mistakes: z.array(z.string()).default([]),
});

export const AdvancedScenariosSchema = z.object({
  threading: z.array(z.string()).default([]),
  performance: z.array(z.string()).default([]),
  testing: z.array(z.string()).default([]),
  optimization: z.array(z.string()).default([]),
  enterprise: z.array(z.string()).default([]),
});

export const PatternKnowledgeSchema = z.object({
  name: z.string(),
  category: PatternCategorySchema,
  description: z.string(),
  /** 1-10, how complex the pattern is to implement */
  complexity_score: z.number().int().min(1).max(10),
  /** 1-10, how hard it is to understand */
  learning_difficulty: z.number().int().min(1).max(10),
  when_to_use: PatternCriteriaSchema,
  when_not_to_use: AntiPatternCriteriaSchema,
  advanced: z.preprocess((val) => val ?? {}, AdvancedScenariosSchema),
  alternatives: z.array(z.string()).default([]),
});

/** The catalog file: pattern key (lowercase) to knowledge. */
export const PatternCatalogSchema = z.object({
  patterns: z
    .record(z.string(), PatternKnowledgeSchema)
    .refine((patterns) => Object.keys(patterns).every((key) => key === key.toLowerCase()), {
      message: 'Pattern keys must be lowercase',
    }),
});

export type ComplexityLevel = z.infer<typeof ComplexityLevelSchema>;
export type PatternCategory = z.infer<typeof PatternCategorySchema>;
export type PatternCriteria = z.infer<typeof PatternCriteriaSchema>;
export type AntiPatternCriteria = z.infer<typeof AntiPatternCriteriaSchema>;
export type AdvancedScenarios = z.infer<typeof AdvancedScenariosSchema>;
export type PatternKnowledge = z.infer<typeof PatternKnowledgeSchema>;
export type PatternCatalog = z.infer<typeof PatternCatalogSchema>;

/** Per-pattern threshold overrides, as accepted from config. */
export type ThresholdOverrides = Record<string, Record<string, number>>;

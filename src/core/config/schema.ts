import { z } from 'zod';

/**
 * Helper to create an optional field with schema defaults.
 * In Zod 4, .default({}) doesn't work for objects with inner defaults.
 * Both undefined and null are treated as "missing" and converted to {}.
 */
function withDefaults<T extends z.ZodTypeAny>(schema: T) {
  return z.preprocess((val) => val ?? {}, schema);
}

export const LogLevelSchema = z.enum(['debug', 'info', 'warn', 'error', 'silent']);

/** Which files the repository analyzer looks at. */
export const FilesConfigSchema = z.object({
  /** Glob patterns for eligible source files */
  include: z.array(z.string()).min(1).default(['**/*.py']),
  /** Path substrings to skip, appended to the built-in exclusions */
  exclude: z.array(z.string()).default([]),
});

/** Per-pattern overrides of knowledge-base thresholds. */
export const ThresholdsConfigSchema = z.record(
  z.string(),
  z.record(z.string(), z.number().int().min(0))
);

export const ConfigSchema = z.object({
  files: withDefaults(FilesConfigSchema),
  thresholds: z.preprocess((val) => val ?? {}, ThresholdsConfigSchema),
  log_level: LogLevelSchema.default('info'),
});

export type LogLevelSetting = z.infer<typeof LogLevelSchema>;
export type FilesConfig = z.infer<typeof FilesConfigSchema>;
export type ThresholdsConfig = z.infer<typeof ThresholdsConfigSchema>;
export type Config = z.infer<typeof ConfigSchema>;

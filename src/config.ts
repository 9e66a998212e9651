// src/config.ts
// Option schemas for the engines. Defaults live here so every entry point agrees on them.

import { z } from 'zod';
import { ConfigurationError } from './errors';

export const DEFAULT_BASELINE_XG = 1.3;
export const DEFAULT_XG_FACTOR = 1.05;

export const TransformConfigSchema = z.object({
  /** Expected goals for exactly equal sides. */
  baseline: z.number().finite().positive().default(DEFAULT_BASELINE_XG),
  /** Growth of expected goals per unit of strength differential. */
  factor: z.number().finite().gt(1).default(DEFAULT_XG_FACTOR),
});

export const ScheduleConfigSchema = z.object({
  iterations: z.number().int().positive().default(1),
});

export const PointsConfigSchema = z.object({
  win: z.number().finite().default(3),
  draw: z.number().finite().default(1),
  loss: z.number().finite().default(0),
});

export const GenerateConfigSchema = z
  .object({
    minStrength: z.number().int().nonnegative(),
    maxStrength: z.number().int().nonnegative(),
  })
  .refine((c) => c.minStrength <= c.maxStrength, {
    message: 'minStrength must not exceed maxStrength',
    path: ['minStrength'],
  });

export const GoalsSchema = z.number().int().nonnegative();

export type TransformConfig = z.input<typeof TransformConfigSchema>;
export type ScheduleConfig = z.input<typeof ScheduleConfigSchema>;
export type PointsConfig = z.input<typeof PointsConfigSchema>;
export type ResolvedPoints = z.output<typeof PointsConfigSchema>;
export type GenerateConfig = z.input<typeof GenerateConfigSchema>;

/**
 * Validate caller options against a schema, filling in defaults.
 * Throws ConfigurationError listing every issue.
 */
export function parseConfig<S extends z.ZodTypeAny>(
  schema: S,
  input: unknown,
  where: string
): z.output<S> {
  const parsed = schema.safeParse(input ?? {});
  if (!parsed.success) {
    const issues = parsed.error.issues.map(
      (i) => `${i.path.length ? i.path.join('.') : '(root)'}: ${i.message}`
    );
    throw new ConfigurationError(`${where}: invalid options (${issues.join('; ')})`, { issues });
  }
  return parsed.data;
}

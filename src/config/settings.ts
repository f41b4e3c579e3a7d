/**
 * Environment-backed settings
 */

import { z } from 'zod';
import { PIPELINE_DEFAULTS } from './defaults.js';

const emptyToUndefined = (value: unknown) => (value === '' ? undefined : value);

export const SettingsSchema = z.object({
  LOG_LEVEL: z.preprocess(
    emptyToUndefined,
    z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']).default('info')
  ),
  FUSION_BREAKPOINT_TOLERANCE: z.preprocess(
    emptyToUndefined,
    z.coerce.number().int().nonnegative().default(PIPELINE_DEFAULTS.BREAKPOINT_TOLERANCE)
  ),
  FUSION_OUTPUT_DIR: z.preprocess(
    emptyToUndefined,
    z.string().default(PIPELINE_DEFAULTS.OUTPUT_DIR)
  ),
  FUSION_PROJECT_NAME: z.preprocess(emptyToUndefined, z.string().optional()),
});

export type Settings = z.infer<typeof SettingsSchema>;

export function loadSettings(env: Record<string, string | undefined> = process.env): Settings {
  const parsed = SettingsSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `  - ${issue.path.join('.')}: ${issue.message}`)
      .join('\n');
    throw new Error(`Invalid environment configuration:\n${issues}`);
  }
  return parsed.data;
}

/**
 * Parse a tolerance given on the command line; falls back to the environment value.
 */
export function resolveTolerance(option: string | undefined, settings: Settings): number {
  if (option === undefined) return settings.FUSION_BREAKPOINT_TOLERANCE;
  const parsed = z.coerce.number().int().nonnegative().safeParse(option);
  if (!parsed.success) {
    throw new Error(`Invalid breakpoint tolerance: ${option}`);
  }
  return parsed.data;
}

import { z, ZodError } from 'zod';
import { DEFAULT_CENTURY_PIVOT } from '../dates/constants';

/**
 * Environment schema.
 * Every variable has a default so the library works without any setup.
 */
const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  LOG_LEVEL: z.enum(['error', 'warn', 'info', 'debug']).default('info'),

  /** Two-digit years above this value belong to the previous century */
  DATE_CENTURY_PIVOT: z.coerce.number().int().min(0).max(99).default(DEFAULT_CENTURY_PIVOT),
  /** Year whose century counts as "current" when expanding two-digit years */
  DATE_REFERENCE_YEAR: z.coerce
    .number()
    .int()
    .default(() => new Date().getFullYear()),
});

export type Env = z.infer<typeof envSchema>;

/**
 * Validates an environment source and returns the typed configuration.
 * Throws with the list of offending variables when validation fails.
 */
export function parseEnv(source: NodeJS.ProcessEnv): Env {
  try {
    return envSchema.parse(source);
  } catch (error) {
    if (error instanceof ZodError) {
      const problems = error.errors.map((err) => `${err.path.join('.')}: ${err.message}`);
      throw new Error(`Invalid environment configuration: ${problems.join('; ')}`);
    }
    throw error;
  }
}

export const env: Env = parseEnv(process.env);

import { z } from 'zod';
import { ConfigurationError } from '../utils/errors';
import { logger } from '../utils/logger';

export function validateInput<S extends z.ZodTypeAny>(schema: S, input: unknown): z.output<S> {
  try {
    return schema.parse(input);
  } catch (error) {
    if (error instanceof z.ZodError) {
      const fieldErrors = error.issues.map((issue: z.ZodIssue) => ({
        field: issue.path.join('.'),
        message: issue.message,
      }));

      logger.warn('Configuration validation failed', {
        errors: fieldErrors,
        input: typeof input === 'object' ? JSON.stringify(input) : input,
      });

      const field = fieldErrors[0]?.field || 'unknown';
      throw new ConfigurationError(
        `Invalid configuration: ${fieldErrors.map((e) => `${e.field}: ${e.message}`).join(', ')}`,
        field,
        valueAt(input, error.issues[0]?.path ?? [])
      );
    }
    throw error;
  }
}

function valueAt(input: unknown, path: ReadonlyArray<string | number>): unknown {
  let current: unknown = input;
  for (const key of path) {
    if (typeof current !== 'object' || current === null || !(key in current)) {
      return undefined;
    }
    current = Reflect.get(current, key);
  }
  return current;
}

export const criticalityThresholdsSchema = z
  .object({
    critical: z.number().positive('Critical threshold must be positive'),
    high: z.number().positive('High threshold must be positive'),
    medium: z.number().positive('Medium threshold must be positive'),
  })
  .refine((t) => t.critical < t.high && t.high < t.medium, {
    message: 'Thresholds must increase from critical to high to medium',
  });

export const analysisConfigSchema = z.object({
  keepRemarkCode: z.string().trim().min(1, 'Keep remark code is required'),
  leadTimeDays: z.number().positive('Lead time must be positive').finite(),
  serviceLevelZ: z.number().min(0, 'Service level multiplier must be non-negative').finite(),
  criticalityThresholds: criticalityThresholdsSchema,
  highVariabilityCv: z.number().positive('Variability threshold must be positive').finite(),
  currentStockTieBreak: z.enum(['latest-date', 'last-seen', 'first-seen']),
});

export const processFilterSchema = z.string().trim().min(1, 'Process filter must not be empty').nullable();

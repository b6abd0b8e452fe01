/**
 * Zod validation schemas for CLI inputs
 *
 * Commander.js parses arguments, then we validate with Zod for:
 * - Type coercion (string "5" -> number 5)
 * - Preset names checked against the known lists
 * - Helpful error messages
 */

import { z } from 'zod';
import { LAYOUT_PRESETS, THEME_PRESETS } from '../navigation/presets.js';
import { ValidationError, formatZodIssues } from '../errors/index.js';

// ============================================================================
// RUN COMMAND SCHEMA
// ============================================================================

export const RunOptionsSchema = z.object({
  save: z.string().min(1, 'State file path cannot be empty').optional(),
  restore: z.string().min(1, 'State file path cannot be empty').optional(),
  pageSize: z
    .string()
    .transform((val) => Number(val))
    .refine((val) => Number.isInteger(val) && val >= 1 && val <= 100, {
      message: 'page-size must be a whole number between 1 and 100',
    })
    .optional(),
  theme: z
    .enum(THEME_PRESETS, {
      errorMap: () => ({ message: `theme must be one of: ${THEME_PRESETS.join(', ')}` }),
    })
    .optional(),
  layout: z
    .enum(LAYOUT_PRESETS, {
      errorMap: () => ({ message: `layout must be one of: ${LAYOUT_PRESETS.join(', ')}` }),
    })
    .optional(),
});

export type RunOptions = z.output<typeof RunOptionsSchema>;

// ============================================================================
// VALIDATION HELPER
// ============================================================================

/**
 * Validate input with a Zod schema.
 *
 * @throws ValidationError listing every issue
 *
 * @example
 * ```typescript
 * const options = validateInput(RunOptionsSchema, rawOptions);
 * ```
 */
export function validateInput<T extends z.ZodTypeAny>(schema: T, input: unknown): z.output<T> {
  const result = schema.safeParse(input);

  if (!result.success) {
    throw new ValidationError('Invalid options', formatZodIssues(result.error.issues));
  }

  return result.data;
}

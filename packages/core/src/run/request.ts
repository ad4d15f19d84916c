import { z } from 'zod';
import { formatZodIssues, InputInvalidError } from '../errors.js';

export const MAX_QUARTERS = 12;

export const RunRequestSchema = z.object({
  quarters: z.number().int().min(1).max(MAX_QUARTERS),
  sources: z.array(z.string().trim().min(1)).min(1).superRefine((sources, ctx) => {
    const seen = new Set<string>();
    for (const [index, source] of sources.entries()) {
      if (seen.has(source)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `duplicate source "${source}"`,
          path: [index],
        });
      }
      seen.add(source);
    }
  }),
  ticker: z.string().trim().min(1).max(16).optional(),
}).strict();

export interface RunRequest {
  readonly quarters: number;
  readonly sources: readonly string[];
  readonly ticker: string;
}

/**
 * Validate an untrusted request body. Throws InputInvalidError with
 * `path: message` issues; the returned request is frozen.
 */
export function parseRunRequest(input: unknown, defaultTicker: string): RunRequest {
  const parsed = RunRequestSchema.safeParse(input);
  if (!parsed.success) {
    throw new InputInvalidError(formatZodIssues(parsed.error.issues));
  }

  return Object.freeze({
    quarters: parsed.data.quarters,
    sources: Object.freeze([...parsed.data.sources]),
    ticker: (parsed.data.ticker ?? defaultTicker).toUpperCase(),
  });
}

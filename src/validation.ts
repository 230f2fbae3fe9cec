import { z } from 'zod';
import { InvalidOptionsError } from './errors';
import type { RequestOptions } from './tasks/request-builder';
import type { PerformOptions } from './types';

// tolerance for sums like 0.1 + 0.2
const EPSILON = 1e-9;

const RegionOfInterestSchema = z
  .object({
    x: z.number().min(0).max(1),
    y: z.number().min(0).max(1),
    width: z.number().positive().max(1),
    height: z.number().positive().max(1),
  })
  .refine(rect => rect.x + rect.width <= 1 + EPSILON && rect.y + rect.height <= 1 + EPSILON, {
    message: 'Region of interest must lie inside the unit square',
  });

const PerformOptionsSchema = z.object({
  regionOfInterest: RegionOfInterestSchema.optional(),
  revision: z.number().int().positive().optional(),
  preferBackgroundProcessing: z.boolean().optional(),
});

export function validatePerformOptions(options: PerformOptions): RequestOptions {
  const parsed = PerformOptionsSchema.safeParse({
    regionOfInterest: options.regionOfInterest,
    revision: options.revision,
    preferBackgroundProcessing: options.preferBackgroundProcessing,
  });
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map(issue => (issue.path.length ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
      .join('; ');
    throw new InvalidOptionsError(`Invalid perform options: ${issues}`);
  }
  return parsed.data;
}

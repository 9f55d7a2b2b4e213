/**
 * Zod schema for batch requests.
 */

import { z } from 'zod';
import { DEFAULT_BATCH_CONFIG } from '../config/batch';
import { InvalidConfigurationError } from './errors';

export const BatchRequestSchema = z.object({
  selectedJobIds: z
    .array(z.string().min(1, { message: 'job id must not be empty' }))
    .min(1, { message: 'No analysis types selected' })
    .refine((ids) => new Set(ids).size === ids.length, { message: 'Job ids must be unique' }),
  inputDir: z.string().min(1, { message: 'inputDir must not be empty' }),
  outputDir: z.string().min(1, { message: 'outputDir must not be empty' }),
  concurrencyLimit: z
    .number()
    .int({ message: 'concurrencyLimit must be an integer' })
    .positive({ message: 'concurrencyLimit must be positive' })
    .default(DEFAULT_BATCH_CONFIG.concurrency),
});

export type ValidatedBatchRequest = z.infer<typeof BatchRequestSchema>;

/**
 * Parse a batch request, throwing InvalidConfigurationError with every issue
 * joined into `details`.
 */
export function parseBatchRequest(input: unknown): ValidatedBatchRequest {
  const result = BatchRequestSchema.safeParse(input);
  if (!result.success) {
    const details = result.error.issues
      .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
      .join('; ');
    throw new InvalidConfigurationError('Invalid batch request', details);
  }
  return result.data;
}

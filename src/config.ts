/**
 * Submission configuration
 * Validates caller-supplied options and fills in defaults
 */

import { z } from 'zod';
import { DEFAULT_SIGNPOST_CATEGORY } from './metrics/signposts.js';
import { ConfigurationError } from './utils/errors.js';

export const submissionConfigSchema = z.object({
  /** Analytics service base URL; the submission path is resolved against it */
  baseUrl: z.string().url(),
  /** Request timeout in milliseconds */
  timeout: z.number().int().positive().default(30000),
  /** Headers sent with every request */
  headers: z.record(z.string()).default({}),
  /** Log the request instead of sending it */
  dryRun: z.boolean().default(false),
  /** Signpost category the app records metrics under */
  signpostCategory: z.string().min(1).default(DEFAULT_SIGNPOST_CATEGORY),
  /** Echo debug records to the console */
  debug: z.boolean().default(false),
  /** Directory for daily log files; file logging is off when unset */
  logDirectory: z.string().min(1).optional(),
});

export type SubmissionConfig = z.infer<typeof submissionConfigSchema>;
export type SubmissionOptions = z.input<typeof submissionConfigSchema>;

/**
 * Load submission configuration
 * @throws ConfigurationError listing every invalid option
 */
export function loadSubmissionConfig(options: unknown): SubmissionConfig {
  const result = submissionConfigSchema.safeParse(options);

  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new ConfigurationError(`Invalid submission config: ${issues}`);
  }

  return result.data;
}

// Main exports for the mobile analytics submission package

// Metrics
export * from './metrics/index.js';

// Submission
export * from './submission/index.js';

// Config
export { loadSubmissionConfig, submissionConfigSchema } from './config.js';
export type { SubmissionConfig, SubmissionOptions } from './config.js';

// Utils
export { logger, LogLevel } from './utils/logger.js';
export * from './utils/errors.js';

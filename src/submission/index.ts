/**
 * Metrics submission
 *
 * Encodes a submission payload and posts it to /submission/mobile-analytics.
 */

export { MetricSubmissionEndpoint, SUBMISSION_PATH } from './endpoint.js';
export { MetricsSubmitter, createMetricsSubmitter } from './submitter.js';
export type { MetricsSubmitterOptions } from './submitter.js';
export { HTTPClient } from './http-client.js';
export type { HTTPClientConfig } from './http-client.js';
export { encodeSubmissionPayload, decodeSubmissionPayload, formatISODate } from './encoder.js';
export type {
  HTTPMethod,
  HTTPRequest,
  HTTPResponse,
  HTTPTransport,
  SubmissionLogger
} from './types.js';

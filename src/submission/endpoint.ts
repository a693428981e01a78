/**
 * Metric Submission Endpoint
 *
 * Builds the POST request for one analytics window. The response body is
 * not used; success is decided by the transport from the status code.
 */

import { createSubmissionPayload } from '../metrics/payload-mapper.js';
import type { MetricsInfo } from '../metrics/types.js';
import { logger } from '../utils/logger.js';
import { encodeSubmissionPayload } from './encoder.js';
import type { HTTPRequest, HTTPResponse, SubmissionLogger } from './types.js';

export const SUBMISSION_PATH = '/submission/mobile-analytics';

export class MetricSubmissionEndpoint {
  private log: SubmissionLogger;

  constructor(log: SubmissionLogger = logger) {
    this.log = log;
  }

  /**
   * Map, log and encode one window
   * @throws SubmissionEncodingError when the payload cannot be encoded
   */
  request(info: MetricsInfo): HTTPRequest {
    const payload = createSubmissionPayload(info);
    this.log.info('Submitting metrics', payload);

    return {
      method: 'POST',
      path: SUBMISSION_PATH,
      headers: { 'Content-Type': 'application/json' },
      body: encodeSubmissionPayload(payload)
    };
  }

  parse(_response: HTTPResponse): void {
    // Body intentionally unread
  }
}

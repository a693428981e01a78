/**
 * Metrics Submitter
 *
 * One window per call: build request → send → parse.
 * Errors propagate to the caller, who decides whether the next
 * scheduled cycle tries again.
 */

import { loadSubmissionConfig } from '../config.js';
import type { SubmissionOptions } from '../config.js';
import { DEFAULT_SIGNPOST_CATEGORY, recordedMetricsFromSignposts } from '../metrics/signposts.js';
import type { MetricsInfo, SystemPayload } from '../metrics/types.js';
import { logger } from '../utils/logger.js';
import { MetricSubmissionEndpoint } from './endpoint.js';
import { HTTPClient } from './http-client.js';
import type { HTTPTransport, SubmissionLogger } from './types.js';

export interface MetricsSubmitterOptions {
  transport: HTTPTransport;
  endpoint?: MetricSubmissionEndpoint;
  log?: SubmissionLogger;
  dryRun?: boolean;  // Dry-run mode: log the request without sending
  signpostCategory?: string;
}

export class MetricsSubmitter {
  private transport: HTTPTransport;
  private endpoint: MetricSubmissionEndpoint;
  private log: SubmissionLogger;
  private dryRun: boolean;
  private signpostCategory: string;

  constructor(options: MetricsSubmitterOptions) {
    this.transport = options.transport;
    this.log = options.log ?? logger;
    this.endpoint = options.endpoint ?? new MetricSubmissionEndpoint(this.log);
    this.dryRun = options.dryRun ?? false;
    this.signpostCategory = options.signpostCategory ?? DEFAULT_SIGNPOST_CATEGORY;
  }

  /**
   * Submit metrics for one analytics window
   */
  async submit(info: MetricsInfo): Promise<void> {
    const request = this.endpoint.request(info);

    if (this.dryRun) {
      this.log.info('[MetricsSubmitter] [DRY-RUN] Would submit metrics:', {
        endpoint: `${request.method} ${request.path}`,
        bytes: request.body === undefined ? 0 : Buffer.byteLength(request.body)
      });
      return;
    }

    const response = await this.transport.send(request);
    this.endpoint.parse(response);

    this.log.debug(`[MetricsSubmitter] Metrics submitted (HTTP ${response.status})`);
  }

  /**
   * Submit an OS-collected window, counting metrics from its signposts
   */
  async submitSystemPayload(payload: SystemPayload, postalDistrict: string): Promise<void> {
    await this.submit({
      payload,
      postalDistrict,
      recordedMetrics: recordedMetricsFromSignposts(payload, this.signpostCategory)
    });
  }
}

/**
 * Create a submitter that posts to the configured analytics service
 * @throws ConfigurationError for invalid options
 */
export function createMetricsSubmitter(options: SubmissionOptions): MetricsSubmitter {
  const config = loadSubmissionConfig(options);

  logger.setDebugMode(config.debug);
  logger.setLogDirectory(config.logDirectory ?? null);

  return new MetricsSubmitter({
    transport: new HTTPClient({
      baseUrl: config.baseUrl,
      timeout: config.timeout,
      headers: config.headers
    }),
    dryRun: config.dryRun,
    signpostCategory: config.signpostCategory
  });
}

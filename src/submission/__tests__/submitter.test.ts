/**
 * Metrics Submitter Tests
 */

import { describe, it, expect, vi, beforeEach } from 'vitest';
import type { Mock } from 'vitest';
import { MetricsSubmitter, createMetricsSubmitter } from '../submitter.js';
import { decodeSubmissionPayload, encodeSubmissionPayload } from '../encoder.js';
import { createSubmissionPayload } from '../../metrics/payload-mapper.js';
import { ConfigurationError, HTTPStatusError, SubmissionEncodingError } from '../../utils/errors.js';
import type { HTTPRequest, HTTPResponse } from '../types.js';
import { metricsInfo, systemPayload, triggeredPayload } from '../../../tests/helpers/fixtures.js';

const OK: HTTPResponse = { status: 204, statusText: 'No Content', headers: {}, body: '' };

describe('MetricsSubmitter', () => {
  let send: Mock<(request: HTTPRequest) => Promise<HTTPResponse>>;
  let log: { debug: Mock; info: Mock };

  beforeEach(() => {
    send = vi.fn<(request: HTTPRequest) => Promise<HTTPResponse>>().mockResolvedValue(OK);
    log = { debug: vi.fn(), info: vi.fn() };
  });

  it('should send one request per window', async () => {
    const submitter = new MetricsSubmitter({ transport: { send }, log });

    await submitter.submit(metricsInfo({ recordedMetrics: { checkedIn: 3 } }));

    expect(send).toHaveBeenCalledTimes(1);
    const request = send.mock.calls[0][0];
    expect(request.method).toBe('POST');
    expect(request.path).toBe('/submission/mobile-analytics');
    expect(decodeSubmissionPayload(request.body ?? '').metrics.checkedIn).toBe(3);
  });

  it('should log the payload before sending', async () => {
    const submitter = new MetricsSubmitter({ transport: { send }, log });

    await submitter.submit(metricsInfo());

    expect(log.info).toHaveBeenCalledWith('Submitting metrics', expect.objectContaining({
      metadata: expect.objectContaining({ postalDistrict: 'AB1' })
    }));
    expect(log.info.mock.invocationCallOrder[0]).toBeLessThan(send.mock.invocationCallOrder[0]);
  });

  it('should propagate transport failures unchanged', async () => {
    const failure = new HTTPStatusError(503, 'Service Unavailable');
    send.mockRejectedValue(failure);
    const submitter = new MetricsSubmitter({ transport: { send }, log });

    await expect(submitter.submit(metricsInfo())).rejects.toBe(failure);
    expect(send).toHaveBeenCalledTimes(1);
  });

  it('should not send when encoding fails', async () => {
    const submitter = new MetricsSubmitter({ transport: { send }, log });
    const info = metricsInfo({ payload: triggeredPayload({ endDate: new Date(Number.NaN) }) });

    await expect(submitter.submit(info)).rejects.toBeInstanceOf(SubmissionEncodingError);
    expect(send).not.toHaveBeenCalled();
  });

  it('should only log in dry-run mode', async () => {
    const submitter = new MetricsSubmitter({ transport: { send }, log, dryRun: true });

    await submitter.submit(metricsInfo());

    expect(send).not.toHaveBeenCalled();
    expect(log.info).toHaveBeenCalledWith('[MetricsSubmitter] [DRY-RUN] Would submit metrics:', expect.objectContaining({
      endpoint: 'POST /submission/mobile-analytics'
    }));
  });

  it('should report the dry-run body size in UTF-8 bytes', async () => {
    const submitter = new MetricsSubmitter({ transport: { send }, log, dryRun: true });
    const info = metricsInfo({ postalDistrict: 'Ŝ1' });
    const body = encodeSubmissionPayload(createSubmissionPayload(info));

    await submitter.submit(info);

    expect(Buffer.byteLength(body)).toBe(body.length + 1);
    expect(log.info).toHaveBeenCalledWith('[MetricsSubmitter] [DRY-RUN] Would submit metrics:', {
      endpoint: 'POST /submission/mobile-analytics',
      bytes: Buffer.byteLength(body)
    });
  });

  describe('submitSystemPayload', () => {
    it('should count metrics from signposts of the configured category', async () => {
      const submitter = new MetricsSubmitter({ transport: { send }, log, signpostCategory: 'App' });

      await submitter.submitSystemPayload(systemPayload({
        signpostMetrics: [
          { signpostCategory: 'App', signpostName: 'completedOnboarding', totalCount: 1 },
          { signpostCategory: 'App', signpostName: 'pauseTick', totalCount: 6 },
          { signpostCategory: 'Metrics', signpostName: 'checkedIn', totalCount: 9 },
        ]
      }), 'CD2');

      const decoded = decodeSubmissionPayload(send.mock.calls[0][0].body ?? '');
      expect(decoded.metadata.postalDistrict).toBe('CD2');
      expect(decoded.metrics.completedOnboarding).toBe(1);
      expect(decoded.metrics.encounterDetectionPausedBackgroundTick).toBe(6);
      expect(decoded.metrics.checkedIn).toBe(0);
    });
  });
});

describe('createMetricsSubmitter', () => {
  it('should reject invalid options', () => {
    expect(() => createMetricsSubmitter({ baseUrl: 'not a url' })).toThrow(ConfigurationError);
  });

  it('should create a submitter from valid options', () => {
    expect(createMetricsSubmitter({ baseUrl: 'https://analytics.example.test' })).toBeInstanceOf(MetricsSubmitter);
  });
});

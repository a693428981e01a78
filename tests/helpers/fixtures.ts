/**
 * Test fixtures for metrics windows
 */

import type { MetricsInfo, SystemPayload, TriggeredPayload } from '../../src/metrics/types.js';

export const WINDOW_START = new Date('2024-03-01T00:00:00Z');
export const WINDOW_END = new Date('2024-03-02T00:00:00Z');

export function systemPayload(overrides: Partial<SystemPayload> = {}): SystemPayload {
  return {
    kind: 'system',
    timeStampBegin: WINDOW_START,
    timeStampEnd: WINDOW_END,
    metaData: { deviceType: 'iPhone12,1', osVersion: 'iPhone OS 14.2 (18B92)' },
    latestApplicationVersion: '3.0.1',
    includesMultipleApplicationVersions: false,
    ...overrides
  };
}

export function triggeredPayload(overrides: Partial<TriggeredPayload> = {}): TriggeredPayload {
  return {
    kind: 'triggered',
    startDate: WINDOW_START,
    endDate: WINDOW_END,
    deviceModel: 'iPhone13,2',
    operatingSystemVersion: '14.4',
    latestApplicationVersion: '3.1.0',
    includesMultipleApplicationVersions: true,
    ...overrides
  };
}

export function metricsInfo(overrides: Partial<MetricsInfo> = {}): MetricsInfo {
  return {
    payload: systemPayload(),
    postalDistrict: 'AB1',
    recordedMetrics: {},
    ...overrides
  };
}

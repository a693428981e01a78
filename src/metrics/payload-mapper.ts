/**
 * Payload Mapper
 *
 * Transforms a collected MetricsInfo window into the backend-aligned
 * SubmissionPayload. Total: every missing value has a default.
 */

import { ALL_METRICS, METRIC_FIELDS } from './metric.js';
import { toWholeBytes } from './measurement.js';
import type {
  EventCounters,
  MetricsInfo,
  NetworkCounters,
  NetworkTransferMetrics,
  RecordedMetrics,
  SubmissionPayload,
  SystemPayload,
  TriggeredPayload
} from './types.js';

const ZERO_NETWORK_COUNTERS: NetworkCounters = {
  cumulativeWifiUploadBytes: 0,
  cumulativeWifiDownloadBytes: 0,
  cumulativeCellularUploadBytes: 0,
  cumulativeCellularDownloadBytes: 0,
  cumulativeDownloadBytes: 0,
  cumulativeUploadBytes: 0,
};

/**
 * Helper: Network counters in whole bytes, totals derived from wifi + cellular
 */
function networkCounters(transfer: NetworkTransferMetrics | undefined): NetworkCounters {
  if (!transfer) {
    return { ...ZERO_NETWORK_COUNTERS };
  }

  const wifiUpload = toWholeBytes(transfer.cumulativeWifiUpload);
  const wifiDownload = toWholeBytes(transfer.cumulativeWifiDownload);
  const cellularUpload = toWholeBytes(transfer.cumulativeCellularUpload);
  const cellularDownload = toWholeBytes(transfer.cumulativeCellularDownload);

  return {
    cumulativeWifiUploadBytes: wifiUpload,
    cumulativeWifiDownloadBytes: wifiDownload,
    cumulativeCellularUploadBytes: cellularUpload,
    cumulativeCellularDownloadBytes: cellularDownload,
    cumulativeDownloadBytes: wifiDownload + cellularDownload,
    cumulativeUploadBytes: wifiUpload + cellularUpload,
  };
}

/**
 * Helper: One counter per metric, absent metrics count as zero
 */
export function eventCounters(recordedMetrics: RecordedMetrics): EventCounters {
  const counters: EventCounters = {
    completedOnboarding: 0,
    checkedIn: 0,
    canceledCheckIn: 0,
    completedQuestionnaireAndStartedIsolation: 0,
    completedQuestionnaireButDidNotStartIsolation: 0,
    receivedPositiveTestResult: 0,
    receivedNegativeTestResult: 0,
    receivedVoidTestResult: 0,
    totalBackgroundTasks: 0,
    runningNormallyBackgroundTick: 0,
    isIsolatingBackgroundTick: 0,
    hasHadRiskyContactBackgroundTick: 0,
    hasSelfDiagnosedPositiveBackgroundTick: 0,
    encounterDetectionPausedBackgroundTick: 0,
  };

  for (const metric of ALL_METRICS) {
    counters[METRIC_FIELDS[metric]] = recordedMetrics[metric] ?? 0;
  }

  return counters;
}

function fromSystemPayload(payload: SystemPayload, info: MetricsInfo): SubmissionPayload {
  return {
    includesMultipleApplicationVersions: payload.includesMultipleApplicationVersions,
    analyticsWindow: {
      startDate: payload.timeStampBegin,
      endDate: payload.timeStampEnd,
    },
    metadata: {
      postalDistrict: info.postalDistrict,
      deviceModel: payload.metaData?.deviceType ?? '',
      operatingSystemVersion: payload.metaData?.osVersion ?? '',
      latestApplicationVersion: payload.latestApplicationVersion,
    },
    metrics: {
      ...networkCounters(payload.networkTransferMetrics),
      ...eventCounters(info.recordedMetrics),
    },
  };
}

function fromTriggeredPayload(payload: TriggeredPayload, info: MetricsInfo): SubmissionPayload {
  return {
    includesMultipleApplicationVersions: payload.includesMultipleApplicationVersions,
    analyticsWindow: {
      startDate: payload.startDate,
      endDate: payload.endDate,
    },
    metadata: {
      postalDistrict: info.postalDistrict,
      deviceModel: payload.deviceModel,
      operatingSystemVersion: payload.operatingSystemVersion,
      latestApplicationVersion: payload.latestApplicationVersion,
    },
    metrics: {
      ...ZERO_NETWORK_COUNTERS,
      ...eventCounters(info.recordedMetrics),
    },
  };
}

/**
 * Create submission payload for one analytics window
 */
export function createSubmissionPayload(info: MetricsInfo): SubmissionPayload {
  const { payload } = info;

  switch (payload.kind) {
    case 'system':
      return fromSystemPayload(payload, info);
    case 'triggered':
      return fromTriggeredPayload(payload, info);
  }
}

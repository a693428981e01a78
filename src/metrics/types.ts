/**
 * Metrics types for mobile analytics submission
 *
 * Input side: what the metrics collection subsystem hands over per window.
 * Output side: the flat record the analytics backend expects.
 */

import type { Metric } from './metric.js';

// ============================================================================
// Input (collected metrics)
// ============================================================================

/**
 * Information storage units reported by the OS
 * Decimal units are 1000-based, binary units 1024-based
 */
export type InformationUnit =
  | 'bits'
  | 'bytes'
  | 'kilobytes'
  | 'megabytes'
  | 'gigabytes'
  | 'terabytes'
  | 'kibibytes'
  | 'mebibytes'
  | 'gibibytes';

export interface Measurement {
  value: number;
  unit: InformationUnit;
}

/**
 * Cumulative network transfer over the window
 */
export interface NetworkTransferMetrics {
  cumulativeWifiUpload: Measurement;
  cumulativeWifiDownload: Measurement;
  cumulativeCellularUpload: Measurement;
  cumulativeCellularDownload: Measurement;
}

export interface DeviceMetaData {
  deviceType?: string;
  osVersion?: string;
}

/**
 * OS-level named event counter
 */
export interface SignpostMetric {
  signpostCategory: string;
  signpostName: string;
  totalCount: number;
}

/**
 * Window collected by the OS metrics subsystem
 */
export interface SystemPayload {
  kind: 'system';
  timeStampBegin: Date;
  timeStampEnd: Date;
  metaData?: DeviceMetaData;
  latestApplicationVersion: string;
  includesMultipleApplicationVersions: boolean;
  networkTransferMetrics?: NetworkTransferMetrics;
  signpostMetrics?: SignpostMetric[];
}

/**
 * Window produced on demand by the app itself (no network totals)
 */
export interface TriggeredPayload {
  kind: 'triggered';
  startDate: Date;
  endDate: Date;
  deviceModel: string;
  operatingSystemVersion: string;
  latestApplicationVersion: string;
  includesMultipleApplicationVersions: boolean;
}

export type MetricsInfoPayload = SystemPayload | TriggeredPayload;

export type RecordedMetrics = Partial<Record<Metric, number>>;

export interface MetricsInfo {
  payload: MetricsInfoPayload;
  postalDistrict: string;
  recordedMetrics: RecordedMetrics;
}

// ============================================================================
// Output (submission payload)
// ============================================================================

export interface AnalyticsWindow {
  startDate: Date;
  endDate: Date;
}

export interface SubmissionMetadata {
  postalDistrict: string;
  deviceModel: string;
  operatingSystemVersion: string;
  latestApplicationVersion: string;
}

export interface NetworkCounters {
  cumulativeWifiUploadBytes: number;
  cumulativeWifiDownloadBytes: number;
  cumulativeCellularUploadBytes: number;
  cumulativeCellularDownloadBytes: number;
  cumulativeDownloadBytes: number;
  cumulativeUploadBytes: number;
}

export interface EventCounters {
  // Events triggered
  completedOnboarding: number;
  checkedIn: number;
  canceledCheckIn: number;
  completedQuestionnaireAndStartedIsolation: number;
  completedQuestionnaireButDidNotStartIsolation: number;
  receivedPositiveTestResult: number;
  receivedNegativeTestResult: number;
  receivedVoidTestResult: number;

  // How many times background tasks ran
  totalBackgroundTasks: number;

  // Background tasks that ran while the app was running normally (max: totalBackgroundTasks)
  runningNormallyBackgroundTick: number;

  // Background ticks (max: runningNormallyBackgroundTick)
  isIsolatingBackgroundTick: number;
  hasHadRiskyContactBackgroundTick: number;
  hasSelfDiagnosedPositiveBackgroundTick: number;
  encounterDetectionPausedBackgroundTick: number;
}

export type EventCounterField = keyof EventCounters;

export type SubmissionMetrics = NetworkCounters & EventCounters;

export interface SubmissionPayload {
  includesMultipleApplicationVersions: boolean;
  analyticsWindow: AnalyticsWindow;
  metadata: SubmissionMetadata;
  metrics: SubmissionMetrics;
}

/**
 * Metrics mapping
 *
 * Collected window → backend-aligned submission payload.
 */

export { ALL_METRICS, METRIC_FIELDS, isMetric } from './metric.js';
export type { Metric } from './metric.js';
export { createSubmissionPayload, eventCounters } from './payload-mapper.js';
export { toWholeBytes, bytes } from './measurement.js';
export {
  collectSignpostCounts,
  recordedMetricsFromSignposts,
  DEFAULT_SIGNPOST_CATEGORY
} from './signposts.js';
export type {
  InformationUnit,
  Measurement,
  NetworkTransferMetrics,
  DeviceMetaData,
  SignpostMetric,
  SystemPayload,
  TriggeredPayload,
  MetricsInfoPayload,
  RecordedMetrics,
  MetricsInfo,
  AnalyticsWindow,
  SubmissionMetadata,
  NetworkCounters,
  EventCounters,
  EventCounterField,
  SubmissionMetrics,
  SubmissionPayload
} from './types.js';

/**
 * Submission payload JSON encoding
 *
 * Dates use ISO-8601 internet date-time with whole seconds
 * (2024-03-01T09:30:00Z). Output is pretty printed with fields in
 * declared order.
 */

import { z } from 'zod';
import type { SubmissionPayload } from '../metrics/types.js';
import { SubmissionDecodingError, SubmissionEncodingError, getErrorMessage } from '../utils/errors.js';

/**
 * Format a date as `YYYY-MM-DDTHH:MM:SSZ`; throws RangeError for invalid dates
 */
export function formatISODate(date: Date): string {
  return date.toISOString().replace(/\.\d{3}Z$/, 'Z');
}

function toWire(payload: SubmissionPayload) {
  const { analyticsWindow, metadata, metrics } = payload;

  return {
    includesMultipleApplicationVersions: payload.includesMultipleApplicationVersions,
    analyticsWindow: {
      startDate: formatISODate(analyticsWindow.startDate),
      endDate: formatISODate(analyticsWindow.endDate),
    },
    metadata: {
      postalDistrict: metadata.postalDistrict,
      deviceModel: metadata.deviceModel,
      operatingSystemVersion: metadata.operatingSystemVersion,
      latestApplicationVersion: metadata.latestApplicationVersion,
    },
    metrics: {
      // Networking
      cumulativeWifiUploadBytes: metrics.cumulativeWifiUploadBytes,
      cumulativeWifiDownloadBytes: metrics.cumulativeWifiDownloadBytes,
      cumulativeCellularUploadBytes: metrics.cumulativeCellularUploadBytes,
      cumulativeCellularDownloadBytes: metrics.cumulativeCellularDownloadBytes,
      cumulativeDownloadBytes: metrics.cumulativeDownloadBytes,
      cumulativeUploadBytes: metrics.cumulativeUploadBytes,

      // Events triggered
      completedOnboarding: metrics.completedOnboarding,
      checkedIn: metrics.checkedIn,
      canceledCheckIn: metrics.canceledCheckIn,
      completedQuestionnaireAndStartedIsolation: metrics.completedQuestionnaireAndStartedIsolation,
      completedQuestionnaireButDidNotStartIsolation: metrics.completedQuestionnaireButDidNotStartIsolation,
      receivedPositiveTestResult: metrics.receivedPositiveTestResult,
      receivedNegativeTestResult: metrics.receivedNegativeTestResult,
      receivedVoidTestResult: metrics.receivedVoidTestResult,

      // Background tasks
      totalBackgroundTasks: metrics.totalBackgroundTasks,
      runningNormallyBackgroundTick: metrics.runningNormallyBackgroundTick,
      isIsolatingBackgroundTick: metrics.isIsolatingBackgroundTick,
      hasHadRiskyContactBackgroundTick: metrics.hasHadRiskyContactBackgroundTick,
      hasSelfDiagnosedPositiveBackgroundTick: metrics.hasSelfDiagnosedPositiveBackgroundTick,
      encounterDetectionPausedBackgroundTick: metrics.encounterDetectionPausedBackgroundTick,
    },
  };
}

/**
 * Encode payload as the JSON request body
 * @throws SubmissionEncodingError when a value cannot be represented
 */
export function encodeSubmissionPayload(payload: SubmissionPayload): string {
  let wire: ReturnType<typeof toWire>;
  try {
    wire = toWire(payload);
  } catch (error) {
    throw new SubmissionEncodingError(getErrorMessage(error));
  }

  // JSON.stringify would write NaN and Infinity as null
  for (const [field, value] of Object.entries(wire.metrics)) {
    if (!Number.isSafeInteger(value)) {
      throw new SubmissionEncodingError(`metrics.${field} must be an integer, got ${value}`);
    }
  }

  return JSON.stringify(wire, null, 2);
}

// ============================================================================
// Decoding
// ============================================================================

const isoDate = z
  .string()
  .datetime({ offset: true })
  .transform((value) => new Date(value));

const counter = z.number().int();

const submissionPayloadSchema = z.object({
  includesMultipleApplicationVersions: z.boolean(),
  analyticsWindow: z.object({
    startDate: isoDate,
    endDate: isoDate,
  }),
  metadata: z.object({
    postalDistrict: z.string(),
    deviceModel: z.string(),
    operatingSystemVersion: z.string(),
    latestApplicationVersion: z.string(),
  }),
  metrics: z.object({
    cumulativeWifiUploadBytes: counter,
    cumulativeWifiDownloadBytes: counter,
    cumulativeCellularUploadBytes: counter,
    cumulativeCellularDownloadBytes: counter,
    cumulativeDownloadBytes: counter,
    cumulativeUploadBytes: counter,
    completedOnboarding: counter,
    checkedIn: counter,
    canceledCheckIn: counter,
    completedQuestionnaireAndStartedIsolation: counter,
    completedQuestionnaireButDidNotStartIsolation: counter,
    receivedPositiveTestResult: counter,
    receivedNegativeTestResult: counter,
    receivedVoidTestResult: counter,
    totalBackgroundTasks: counter,
    runningNormallyBackgroundTick: counter,
    isIsolatingBackgroundTick: counter,
    hasHadRiskyContactBackgroundTick: counter,
    hasSelfDiagnosedPositiveBackgroundTick: counter,
    encounterDetectionPausedBackgroundTick: counter,
  }),
});

/**
 * Decode a JSON request body back into a payload
 * @throws SubmissionDecodingError for malformed JSON or a mismatched shape
 */
export function decodeSubmissionPayload(json: string): SubmissionPayload {
  let parsed: unknown;
  try {
    parsed = JSON.parse(json);
  } catch (error) {
    throw new SubmissionDecodingError(getErrorMessage(error));
  }

  const result = submissionPayloadSchema.safeParse(parsed);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new SubmissionDecodingError(issues);
  }

  return result.data;
}

import type { EventCounterField } from './types.js';

/**
 * Every event kind the app records, in submission order.
 * Identifiers double as signpost names.
 */
export const ALL_METRICS = [
  'backgroundTasks',
  'completedOnboarding',
  'checkedIn',
  'deletedLastCheckIn',
  'completedQuestionnaireAndStartedIsolation',
  'completedQuestionnaireButDidNotStartIsolation',
  'receivedPositiveTestResult',
  'receivedNegativeTestResult',
  'receivedVoidTestResult',
  'contactCaseBackgroundTick',
  'indexCaseBackgroundTick',
  'isolationBackgroundTick',
  'pauseTick',
  'runningNormallyTick',
] as const;

export type Metric = (typeof ALL_METRICS)[number];

/**
 * Output field for each metric
 */
export const METRIC_FIELDS: Readonly<Record<Metric, EventCounterField>> = {
  backgroundTasks: 'totalBackgroundTasks',
  completedOnboarding: 'completedOnboarding',
  checkedIn: 'checkedIn',
  deletedLastCheckIn: 'canceledCheckIn',
  completedQuestionnaireAndStartedIsolation: 'completedQuestionnaireAndStartedIsolation',
  completedQuestionnaireButDidNotStartIsolation: 'completedQuestionnaireButDidNotStartIsolation',
  receivedPositiveTestResult: 'receivedPositiveTestResult',
  receivedNegativeTestResult: 'receivedNegativeTestResult',
  receivedVoidTestResult: 'receivedVoidTestResult',
  contactCaseBackgroundTick: 'hasHadRiskyContactBackgroundTick',
  indexCaseBackgroundTick: 'hasSelfDiagnosedPositiveBackgroundTick',
  isolationBackgroundTick: 'isIsolatingBackgroundTick',
  pauseTick: 'encounterDetectionPausedBackgroundTick',
  runningNormallyTick: 'runningNormallyBackgroundTick',
};

export function isMetric(name: string): name is Metric {
  return (ALL_METRICS as readonly string[]).includes(name);
}

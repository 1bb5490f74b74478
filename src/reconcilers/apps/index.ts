/**
 * App reconciler exports
 *
 * Classifies desired app definitions against the apps installed on the NAS
 * and drives the resulting create/update jobs.
 */

// Types from types.ts
export type {
  RemoteApp,
  RemoteInventory,
  PlanActionType,
  ConfigDrift,
  DriftResult,
  CreateDriftResult,
  UpdateDriftResult,
  SkipDriftResult,
  ActionableDriftResult,
  ReconcilePlan,
  JobPhase,
  ProgressEntry,
  FailureKind,
  JobOutcome,
  JobEvent,
  FailedApp,
  SyncSummary,
} from './types.js';

// Errors
export {
  ReconcileError,
  FetchError,
  SubmissionError,
  JobPollError,
  errorMessage,
  type ReconcileErrorCode,
} from './errors.js';

// Remote state
export { fetchRemoteApps, checkDockerService, DOCKER_READY_STATE, type FetchOptions } from './remote.js';

// Diff functions
export {
  diffConfig,
  classifyApp,
  classifyAll,
  describeDrifts,
  formatDriftDetails,
  MAX_REASON_PATHS,
} from './diff.js';

// Job functions
export {
  buildCreateRequest,
  buildUpdateRequest,
  submitJob,
  watchJob,
  nextPhase,
  isTerminalState,
  isActionable,
  executeAction,
  runJobs,
  formatJobEvent,
  DEFAULT_POLL_INTERVAL_MS,
  type WatchJobOptions,
  type RunJobsOptions,
  type JobWatchResult,
} from './jobs.js';

// Report functions
export {
  formatDecisionLine,
  formatPlanLine,
  formatPlanTotals,
  buildSummary,
  emptySummary,
  getExitCode,
  getOneLinerSummary,
  formatSummary,
  type SummaryInput,
} from './report.js';

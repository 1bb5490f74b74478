/**
 * Types for app reconciliation
 *
 * Desired state comes from AppDefinitions, actual state from the NAS app
 * inventory. Each definition is classified into exactly one DriftResult and
 * each actionable result yields exactly one JobOutcome.
 */

import type { TerminalJobState } from '../../api/types.js';
import type { AppDefinition, ConfigMapping, ConfigValue, LoadError } from '../../definitions/types.js';

// =============================================================================
// Remote State
// =============================================================================

/**
 * Read-only mirror of an app deployed on the NAS
 */
export interface RemoteApp {
  readonly name: string;
  /** Handle used for update calls */
  readonly id: string;
  /** Configuration as currently reported by the platform */
  readonly configSnapshot: ConfigMapping;
  readonly state?: string;
  readonly customApp: boolean;
  readonly version?: string;
}

/**
 * Remote inventory keyed by app name, in the order the platform listed it
 */
export type RemoteInventory = ReadonlyMap<string, RemoteApp>;

// =============================================================================
// Classification
// =============================================================================

export type PlanActionType = 'create' | 'update' | 'skip';

/**
 * A single field that differs between desired and actual config
 */
export interface ConfigDrift {
  /** Dotted path, e.g. `services.nginx.image` or `ports[0]` */
  path: string;
  /** `missing` when the platform does not report the field at all */
  kind: 'changed' | 'missing';
  desired: ConfigValue;
  actual?: ConfigValue;
}

interface DriftResultBase {
  appName: string;
  /** Human-readable reason for the action */
  reason: string;
  definition: AppDefinition;
}

export interface CreateDriftResult extends DriftResultBase {
  action: 'create';
  drifts: [];
}

export interface UpdateDriftResult extends DriftResultBase {
  action: 'update';
  drifts: ConfigDrift[];
  remote: RemoteApp;
}

export interface SkipDriftResult extends DriftResultBase {
  action: 'skip';
  drifts: [];
  remote: RemoteApp;
}

/**
 * Classification of one definition against the remote inventory
 */
export type DriftResult = CreateDriftResult | UpdateDriftResult | SkipDriftResult;

/**
 * A result that requires a job
 */
export type ActionableDriftResult = CreateDriftResult | UpdateDriftResult;

/**
 * Reconciliation plan
 */
export interface ReconcilePlan {
  /** One result per definition, in discovery order */
  results: DriftResult[];
  summary: {
    toCreate: number;
    toUpdate: number;
    unchanged: number;
    total: number;
  };
}

// =============================================================================
// Jobs
// =============================================================================

/**
 * Job state machine phases: SUBMITTED -> RUNNING -> SUCCESS | FAILED | ABORTED
 */
export type JobPhase = 'SUBMITTED' | 'RUNNING' | TerminalJobState;

/**
 * One distinct progress update observed while polling
 */
export interface ProgressEntry {
  percent: number | null;
  message: string;
}

/**
 * Why an app's job did not succeed
 * - submission: the platform rejected the create/update request
 * - job: the job reached FAILED or ABORTED
 * - poll: the job's status could no longer be read
 */
export type FailureKind = 'submission' | 'job' | 'poll';

/**
 * Outcome of processing one actionable app
 */
export interface JobOutcome {
  appName: string;
  action: 'create' | 'update';
  /** Absent only when submission failed */
  jobId?: number;
  finalStatus: TerminalJobState;
  progressLog: ProgressEntry[];
  error?: string;
  failureKind?: FailureKind;
}

/**
 * Events emitted while a job is submitted and watched
 */
export type JobEvent =
  | { type: 'submitted'; appName: string; action: 'create' | 'update'; jobId: number }
  | { type: 'progress'; jobId: number; state: string; percent: number | null; message: string }
  | { type: 'logs'; jobId: number; excerpt: string }
  | { type: 'finished'; jobId: number; state: TerminalJobState; error?: string };

// =============================================================================
// Summary
// =============================================================================

export interface FailedApp {
  appName: string;
  reason: string;
}

/**
 * Aggregated run result
 */
export interface SyncSummary {
  dryRun: boolean;
  /** In a dry run: apps that would be created */
  created: number;
  /** In a dry run: apps that would be updated */
  updated: number;
  skipped: number;
  failed: number;
  failures: FailedApp[];
  loadErrors: LoadError[];
  plan: Array<{ appName: string; action: PlanActionType; reason: string }>;
  outcomes: JobOutcome[];
}

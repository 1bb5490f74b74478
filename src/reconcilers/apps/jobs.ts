/**
 * Job orchestration
 *
 * Turns actionable drift results into create/update jobs on the NAS and
 * follows each job to a terminal state. Apps are processed one at a time in
 * plan order; a failure is recorded against its app and the run moves on.
 *
 * Interrupting the process does not cancel a job that was already submitted:
 * the NAS keeps running it and its final state is unknown to this run.
 */

import type { NasClient } from '../../api/client.js';
import { logger as defaultLogger, type ApiLogger } from '../../api/logger.js';
import { sleep as defaultSleep } from '../../api/retry.js';
import type {
  CreateAppRequest,
  Job,
  TerminalJobState,
  UpdateAppRequest,
} from '../../api/types.js';
import type { AppDefinition } from '../../definitions/types.js';
import { toPlainObject } from '../../definitions/value.js';
import { JobPollError, SubmissionError, errorMessage } from './errors.js';
import type {
  ActionableDriftResult,
  DriftResult,
  JobEvent,
  JobOutcome,
  JobPhase,
  ProgressEntry,
} from './types.js';

/** Default delay between job status polls */
export const DEFAULT_POLL_INTERVAL_MS = 1000;

const TERMINAL_STATES: readonly TerminalJobState[] = ['SUCCESS', 'FAILED', 'ABORTED'];

// =============================================================================
// Options
// =============================================================================

export interface WatchJobOptions {
  /** Delay between polls (default: 1000ms) */
  pollIntervalMs?: number;
  /** Receives progress, log and completion events */
  onEvent?: (event: JobEvent) => void;
  /** Replaceable for tests */
  sleep?: (ms: number) => Promise<void>;
  logger?: ApiLogger;
}

export interface RunJobsOptions extends WatchJobOptions {
  /** Called for every result, skips included, before its job starts */
  onDecision?: (result: DriftResult) => void;
  /** Called once an actionable app has an outcome */
  onAppComplete?: (outcome: JobOutcome) => void;
}

/**
 * What watching a job observed
 */
export interface JobWatchResult {
  jobId: number;
  finalStatus: TerminalJobState;
  progressLog: ProgressEntry[];
  error?: string;
}

// =============================================================================
// Payloads
// =============================================================================

/**
 * Build the install payload for a definition
 */
export function buildCreateRequest(definition: AppDefinition): CreateAppRequest {
  if (definition.catalog) {
    return {
      app_name: definition.name,
      catalog_app: definition.catalog.catalogApp,
      train: definition.catalog.train,
      version: definition.catalog.version,
      values: toPlainObject(definition.config),
    };
  }
  return {
    app_name: definition.name,
    custom_app: true,
    custom_compose_config: toPlainObject(definition.config),
  };
}

/**
 * Build the reconfigure payload for a definition
 */
export function buildUpdateRequest(definition: AppDefinition): UpdateAppRequest {
  if (definition.sourceKind === 'catalog') {
    return { values: toPlainObject(definition.config) };
  }
  return { custom_compose_config: toPlainObject(definition.config) };
}

/**
 * Submit the create or update job for an actionable result
 *
 * @returns The platform-assigned job id
 * @throws SubmissionError if the platform rejects the request
 */
export async function submitJob(client: NasClient, result: ActionableDriftResult): Promise<number> {
  try {
    if (result.action === 'create') {
      return await client.apps.create(buildCreateRequest(result.definition));
    }
    return await client.apps.update(result.remote.id, buildUpdateRequest(result.definition));
  } catch (err) {
    throw new SubmissionError(
      result.appName,
      `Failed to ${result.action} app "${result.appName}": ${errorMessage(err)}`,
      err
    );
  }
}

// =============================================================================
// Job State Machine
// =============================================================================

export function isTerminalState(state: string): state is TerminalJobState {
  return TERMINAL_STATES.some((terminal) => terminal === state);
}

/**
 * Advance the job state machine with a state reported by the platform
 *
 * Terminal phases are absorbing. Any non-terminal report (WAITING, RUNNING,
 * or a state this client does not know) counts as running.
 */
export function nextPhase(phase: JobPhase, reported: string): JobPhase {
  if (isTerminalState(phase)) {
    return phase;
  }
  if (isTerminalState(reported)) {
    return reported;
  }
  return 'RUNNING';
}

function jobError(job: Job): string | undefined {
  return job.error ?? job.exception ?? job.result_encoding_error ?? undefined;
}

/**
 * Poll a job until it reaches SUCCESS, FAILED or ABORTED
 *
 * A progress event is emitted only when the percent or message changed
 * since the previous poll. There is no overall timeout.
 *
 * @throws JobPollError (POLL_FAILED) if the job status cannot be read
 */
export async function watchJob(
  client: NasClient,
  jobId: number,
  options: WatchJobOptions = {}
): Promise<JobWatchResult> {
  const pollIntervalMs = options.pollIntervalMs ?? DEFAULT_POLL_INTERVAL_MS;
  const wait = options.sleep ?? defaultSleep;
  const emit = options.onEvent ?? (() => undefined);
  const log = (options.logger ?? defaultLogger).child({ jobId });

  const progressLog: ProgressEntry[] = [];
  let phase: JobPhase = 'SUBMITTED';
  let lastProgress: ProgressEntry | undefined;
  let lastExcerpt: string | undefined;

  for (;;) {
    let job: Job;
    try {
      job = await client.jobs.get(jobId);
    } catch (err) {
      throw new JobPollError(
        jobId,
        progressLog,
        `Lost track of job ${jobId}: ${errorMessage(err)}`,
        { lastPhase: phase },
        err
      );
    }

    phase = nextPhase(phase, job.state);

    const progress: ProgressEntry = {
      percent: job.progress?.percent ?? null,
      message: job.progress?.description ?? '',
    };
    if (
      lastProgress === undefined ||
      lastProgress.percent !== progress.percent ||
      lastProgress.message !== progress.message
    ) {
      progressLog.push(progress);
      lastProgress = progress;
      emit({ type: 'progress', jobId, state: job.state, ...progress });
    }

    const excerpt = job.logs_excerpt ?? undefined;
    if (excerpt && excerpt !== lastExcerpt) {
      lastExcerpt = excerpt;
      emit({ type: 'logs', jobId, excerpt });
    }

    if (isTerminalState(phase)) {
      const error = phase === 'SUCCESS' ? undefined : jobError(job) ?? `Job ended in state ${phase}`;
      log.debug('Job finished', { state: phase });
      emit({ type: 'finished', jobId, state: phase, error });
      return { jobId, finalStatus: phase, progressLog, error };
    }

    await wait(pollIntervalMs);
  }
}

// =============================================================================
// Execution
// =============================================================================

export function isActionable(result: DriftResult): result is ActionableDriftResult {
  return result.action !== 'skip';
}

/**
 * Submit and watch the job for one app; never throws
 */
export async function executeAction(
  client: NasClient,
  result: ActionableDriftResult,
  options: WatchJobOptions = {}
): Promise<JobOutcome> {
  const log = (options.logger ?? defaultLogger).child({ app: result.appName });

  let jobId: number;
  try {
    jobId = await submitJob(client, result);
  } catch (err) {
    log.debug('Submission failed', { error: errorMessage(err) });
    return {
      appName: result.appName,
      action: result.action,
      finalStatus: 'FAILED',
      progressLog: [],
      error: errorMessage(err),
      failureKind: 'submission',
    };
  }

  options.onEvent?.({ type: 'submitted', appName: result.appName, action: result.action, jobId });

  try {
    const watched = await watchJob(client, jobId, options);
    return {
      appName: result.appName,
      action: result.action,
      jobId,
      finalStatus: watched.finalStatus,
      progressLog: watched.progressLog,
      error: watched.error,
      failureKind: watched.finalStatus === 'SUCCESS' ? undefined : 'job',
    };
  } catch (err) {
    return {
      appName: result.appName,
      action: result.action,
      jobId,
      finalStatus: 'FAILED',
      progressLog: err instanceof JobPollError ? err.progressLog : [],
      error: errorMessage(err),
      failureKind: 'poll',
    };
  }
}

/**
 * Process every result in order, running one job at a time
 *
 * @returns One outcome per actionable result, in plan order
 */
export async function runJobs(
  client: NasClient,
  results: readonly DriftResult[],
  options: RunJobsOptions = {}
): Promise<JobOutcome[]> {
  const outcomes: JobOutcome[] = [];

  for (const result of results) {
    options.onDecision?.(result);
    if (!isActionable(result)) {
      continue;
    }

    const outcome = await executeAction(client, result, options);
    outcomes.push(outcome);
    options.onAppComplete?.(outcome);
  }

  return outcomes;
}

// =============================================================================
// Formatting
// =============================================================================

/**
 * Render a job event as console text
 *
 * Progress lines read `[job <id>] <STATE> <percent>%[ - <message>]`.
 */
export function formatJobEvent(event: JobEvent): string {
  switch (event.type) {
    case 'submitted':
      return `[job ${event.jobId}] Submitted ${event.action} for '${event.appName}'`;
    case 'progress': {
      const suffix = event.message ? ` - ${event.message}` : '';
      return `[job ${event.jobId}] ${event.state} ${event.percent ?? 0}%${suffix}`;
    }
    case 'logs':
      return `[job ${event.jobId} logs]\n${event.excerpt.trimEnd()}`;
    case 'finished':
      if (event.state === 'SUCCESS') {
        return `[job ${event.jobId}] Finished.`;
      }
      return `[job ${event.jobId}] ${event.state}. error = ${event.error ?? 'unknown error'}`;
  }
}

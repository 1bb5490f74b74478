/**
 * Reconciliation error types
 *
 * FetchError is fatal to a run. SubmissionError and poll failures are caught
 * by the orchestrator and recorded against the app they belong to.
 */

import type { ProgressEntry } from './types.js';

export type ReconcileErrorCode =
  | 'FETCH_FAILED'
  | 'SERVICE_UNAVAILABLE'
  | 'SUBMISSION_FAILED'
  | 'POLL_FAILED';

export class ReconcileError extends Error {
  constructor(
    message: string,
    public readonly code: ReconcileErrorCode,
    public readonly details?: Record<string, unknown>,
    cause?: unknown
  ) {
    super(message, cause !== undefined ? { cause } : undefined);
    this.name = 'ReconcileError';
  }
}

/**
 * The remote inventory could not be obtained; nothing can be diffed
 */
export class FetchError extends ReconcileError {
  constructor(
    message: string,
    code: Extract<ReconcileErrorCode, 'FETCH_FAILED' | 'SERVICE_UNAVAILABLE'> = 'FETCH_FAILED',
    details?: Record<string, unknown>,
    cause?: unknown
  ) {
    super(message, code, details, cause);
    this.name = 'FetchError';
  }
}

/**
 * The platform rejected a create/update request for one app
 */
export class SubmissionError extends ReconcileError {
  constructor(
    public readonly appName: string,
    message: string,
    cause?: unknown
  ) {
    super(message, 'SUBMISSION_FAILED', { app: appName }, cause);
    this.name = 'SubmissionError';
  }
}

/**
 * A submitted job's status could no longer be read
 *
 * Carries the progress seen before the failure so the outcome keeps it.
 */
export class JobPollError extends ReconcileError {
  constructor(
    public readonly jobId: number,
    public readonly progressLog: ProgressEntry[],
    message: string,
    details?: Record<string, unknown>,
    cause?: unknown
  ) {
    super(message, 'POLL_FAILED', { jobId, ...details }, cause);
    this.name = 'JobPollError';
  }
}

/**
 * Render any thrown value as a one-line message
 */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

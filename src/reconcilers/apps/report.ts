/**
 * Reconciliation report formatting
 *
 * Renders classification decisions, dry-run plans and the end-of-run
 * summary for the console, and derives the process exit code.
 *
 * @module reconcilers/apps/report
 */

import chalk from 'chalk';
import type { LoadError } from '../../definitions/types.js';
import type {
  DriftResult,
  JobOutcome,
  ReconcilePlan,
  SyncSummary,
} from './types.js';

// =============================================================================
// Decision Lines
// =============================================================================

const UP_TO_DATE = 'App exists, and the config is up to date.';

function pluralize(count: number, singular: string, plural?: string): string {
  return count === 1 ? singular : (plural ?? `${singular}s`);
}

/**
 * Line printed when an app is classified during a real run
 */
export function formatDecisionLine(result: DriftResult): string {
  switch (result.action) {
    case 'create':
      return chalk.green(`[CREATE] ${result.appName} -- ${result.reason}. Deploying...`);
    case 'update':
      return chalk.yellow(`[UPDATE] ${result.appName} -- Config has drifted (${result.reason}). Updating....`);
    case 'skip':
      return chalk.gray(`[SKIP] ${result.appName} -- ${UP_TO_DATE}`);
  }
}

/**
 * Line printed for an app in a dry run
 */
export function formatPlanLine(result: DriftResult): string {
  switch (result.action) {
    case 'create':
      return chalk.green(`[PLAN] [CREATE] ${result.appName} -- ${result.reason}. Would deploy.`);
    case 'update':
      return chalk.yellow(
        `[PLAN] [UPDATE] ${result.appName} -- Config has drifted (${result.reason}). Would update.`
      );
    case 'skip':
      return chalk.gray(`[PLAN] [SKIP] ${result.appName} -- ${UP_TO_DATE}`);
  }
}

/**
 * One-line plan totals
 */
export function formatPlanTotals(plan: ReconcilePlan): string {
  const { toCreate, toUpdate, unchanged } = plan.summary;
  return `Plan: ${toCreate} to create, ${toUpdate} to update, ${unchanged} unchanged`;
}

// =============================================================================
// Summary
// =============================================================================

export interface SummaryInput {
  plan: ReconcilePlan;
  outcomes: JobOutcome[];
  loadErrors: LoadError[];
  dryRun: boolean;
}

/**
 * Aggregate a run into a SyncSummary
 *
 * In a dry run the created/updated counts are what would have happened.
 */
export function buildSummary(input: SummaryInput): SyncSummary {
  const { plan, outcomes, loadErrors, dryRun } = input;
  const succeeded = outcomes.filter((o) => o.finalStatus === 'SUCCESS');
  const failed = outcomes.filter((o) => o.finalStatus !== 'SUCCESS');

  return {
    dryRun,
    created: dryRun ? plan.summary.toCreate : succeeded.filter((o) => o.action === 'create').length,
    updated: dryRun ? plan.summary.toUpdate : succeeded.filter((o) => o.action === 'update').length,
    skipped: plan.summary.unchanged,
    failed: failed.length,
    failures: failed.map((o) => ({
      appName: o.appName,
      reason: o.error ?? `job ended in state ${o.finalStatus}`,
    })),
    loadErrors,
    plan: plan.results.map((r) => ({ appName: r.appName, action: r.action, reason: r.reason })),
    outcomes,
  };
}

/**
 * An empty summary, for runs that found nothing to reconcile
 */
export function emptySummary(loadErrors: LoadError[], dryRun: boolean): SyncSummary {
  return buildSummary({
    plan: { results: [], summary: { toCreate: 0, toUpdate: 0, unchanged: 0, total: 0 } },
    outcomes: [],
    loadErrors,
    dryRun,
  });
}

/**
 * 0 when every app ended skipped or successful and every definition loaded
 */
export function getExitCode(summary: SyncSummary): number {
  return summary.failed > 0 || summary.loadErrors.length > 0 ? 1 : 0;
}

/**
 * One-line summary
 */
export function getOneLinerSummary(summary: SyncSummary): string {
  const verbs = summary.dryRun ? ['to create', 'to update'] : ['created', 'updated'];
  const parts = [
    `${summary.created} ${verbs[0]}`,
    `${summary.updated} ${verbs[1]}`,
    `${summary.skipped} unchanged`,
    `${summary.failed} failed`,
  ];
  return parts.join(', ');
}

/**
 * Human-readable end-of-run summary
 */
export function formatSummary(summary: SyncSummary): string {
  const lines: string[] = [];

  lines.push('');
  lines.push(chalk.bold('Summary'));
  if (summary.dryRun) {
    lines.push(`  Would create: ${summary.created}`);
    lines.push(`  Would update: ${summary.updated}`);
  } else {
    lines.push(`  Created:   ${summary.created}`);
    lines.push(`  Updated:   ${summary.updated}`);
  }
  lines.push(`  Unchanged: ${summary.skipped}`);
  lines.push(`  Failed:    ${summary.failed}`);

  if (summary.failures.length > 0) {
    lines.push('');
    lines.push(chalk.red.bold(`Failed ${pluralize(summary.failures.length, 'app')}:`));
    for (const failure of summary.failures) {
      lines.push(chalk.red(`  - ${failure.appName}: ${failure.reason}`));
    }
  }

  if (summary.loadErrors.length > 0) {
    lines.push('');
    lines.push(chalk.red.bold(`${summary.loadErrors.length} ${pluralize(summary.loadErrors.length, 'definition')} failed to load:`));
    for (const loadError of summary.loadErrors) {
      lines.push(chalk.red(`  - ${loadError.path}: ${loadError.message}`));
    }
  }

  return lines.join('\n');
}

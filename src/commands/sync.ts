/**
 * sync command - Bring the apps on the NAS in line with local definitions
 *
 * Flow: load definitions -> check docker -> fetch installed apps -> classify
 * -> (dry run: print plan | run jobs) -> summary.
 *
 * Apps are only ever created or updated. Remote apps without a local
 * definition are left alone.
 */

import type { CommandContext, CommandResult } from '../types.js';
import {
  info,
  warn,
  error as printError,
  line,
  verbose,
  header,
  dryRunNotice,
} from '../utils/output.js';
import { loadDefinitions, type LoadResult } from '../definitions/index.js';
import {
  buildSummary,
  checkDockerService,
  classifyAll,
  emptySummary,
  errorMessage,
  fetchRemoteApps,
  formatDecisionLine,
  formatDriftDetails,
  formatJobEvent,
  formatPlanLine,
  formatPlanTotals,
  formatSummary,
  getExitCode,
  getOneLinerSummary,
  runJobs,
  type RemoteInventory,
  type SyncSummary,
} from '../reconcilers/apps/index.js';

export interface SyncOptions {
  /** Override the delay between job polls (tests use 0) */
  pollIntervalMs?: number;
  /** Replaceable sleep for job polling */
  sleep?: (ms: number) => Promise<void>;
}

function failure(message: string, data: SyncSummary): CommandResult<SyncSummary> {
  return { success: false, message, data, errors: [message] };
}

function reportLoad(load: LoadResult, isVerbose: boolean): void {
  for (const source of load.sources) {
    if (source.status === 'missing') {
      warn(`${source.kind} directory ${source.dir ?? ''} does not exist; skipping`);
    } else if (source.status === 'loaded') {
      verbose(`Loaded ${source.loaded} ${source.kind} definition(s) from ${source.dir ?? ''}`, isVerbose);
    }
  }
  for (const loadError of load.errors) {
    printError(`${loadError.path}: ${loadError.message}`);
  }
  for (const conflict of load.conflicts) {
    warn(
      `App "${conflict.name}" is defined twice; using ${conflict.kept.originPath} ` +
        `and ignoring ${conflict.discarded.originPath}`
    );
  }
}

/**
 * Execute the sync command
 *
 * Never throws: fatal problems are returned as a failed result.
 */
export async function syncCommand(
  ctx: CommandContext,
  options: SyncOptions = {}
): Promise<CommandResult<SyncSummary>> {
  const { options: globalOpts, outputFormat, client, logger } = ctx;
  const dryRun = globalOpts.dryRun;

  verbose(`Executing sync command`, globalOpts.verbose);
  verbose(`Target: ${client.getConfig().baseUrl}`, globalOpts.verbose);

  if (outputFormat === 'human') {
    header(dryRun ? 'App Sync Plan' : 'App Sync');
    if (dryRun) {
      dryRunNotice();
    }
  }

  // Load definitions
  let load: LoadResult;
  try {
    load = await loadDefinitions({
      composeDir: globalOpts.composeDir,
      catalogDir: globalOpts.catalogDir,
    });
  } catch (err) {
    const message = `Failed to load definitions: ${errorMessage(err)}`;
    printError(message);
    return failure(message, emptySummary([], dryRun));
  }
  reportLoad(load, globalOpts.verbose);

  if (load.definitions.length === 0) {
    const summary = emptySummary(load.errors, dryRun);
    const exitCode = getExitCode(summary);
    info('Nothing to do: no app definitions found');
    return {
      success: exitCode === 0,
      message: 'Nothing to do',
      data: summary,
      errors: load.errors.map((e) => `${e.path}: ${e.message}`),
    };
  }

  // Fetch remote state
  let remote: RemoteInventory;
  try {
    await checkDockerService(client);
    remote = await fetchRemoteApps(client, { logger });
  } catch (err) {
    const message = errorMessage(err);
    printError(message);
    return failure(message, emptySummary(load.errors, dryRun));
  }
  verbose(`Found ${remote.size} installed app(s)`, globalOpts.verbose);

  const plan = classifyAll(load.definitions, remote);

  if (dryRun) {
    for (const result of plan.results) {
      line(formatPlanLine(result));
      if (globalOpts.verbose) {
        for (const detail of formatDriftDetails(result.drifts)) {
          line(`    ${detail}`);
        }
      }
    }
    line('');
    line(formatPlanTotals(plan));

    const summary = buildSummary({ plan, outcomes: [], loadErrors: load.errors, dryRun: true });
    const exitCode = getExitCode(summary);
    return {
      success: exitCode === 0,
      message: formatPlanTotals(plan),
      data: summary,
      errors: summary.loadErrors.map((e) => `${e.path}: ${e.message}`),
    };
  }

  // Apply
  const outcomes = await runJobs(client, plan.results, {
    pollIntervalMs: options.pollIntervalMs ?? globalOpts.pollIntervalMs,
    sleep: options.sleep,
    logger,
    onDecision: (result) => {
      line(formatDecisionLine(result));
      if (globalOpts.verbose) {
        for (const detail of formatDriftDetails(result.drifts)) {
          line(`    ${detail}`);
        }
      }
    },
    onEvent: (event) => line(formatJobEvent(event)),
    onAppComplete: (outcome) => {
      // job failures were already reported by the 'finished' event
      if (outcome.failureKind !== undefined && outcome.failureKind !== 'job' && outcome.error) {
        printError(outcome.error);
      }
    },
  });

  const summary = buildSummary({ plan, outcomes, loadErrors: load.errors, dryRun: false });
  line(formatSummary(summary));

  const exitCode = getExitCode(summary);
  return {
    success: exitCode === 0,
    message: getOneLinerSummary(summary),
    data: summary,
    errors: [
      ...summary.failures.map((f) => `${f.appName}: ${f.reason}`),
      ...summary.loadErrors.map((e) => `${e.path}: ${e.message}`),
    ],
  };
}

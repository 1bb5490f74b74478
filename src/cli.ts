/**
 * nas-app-sync CLI - Keep apps on a NAS in line with local definitions
 *
 * Commands:
 * - sync: Create or update apps so they match the definition directories
 * - diff: Show what sync would do without changing anything
 * - status: Show the docker service state and installed apps
 */

import { Command, Option } from 'commander';
import type { CommandContext, CommandResult } from './types.js';
import { diffCommand, syncCommand, statusCommand } from './commands/index.js';
import {
  configureOutput,
  printResult,
  error,
  verbose as verboseLog,
} from './utils/output.js';
import {
  loadSettings,
  resolveGlobalOptions,
  resolveCredentials,
  promptHidden,
  defaultSettingsPath,
  type CliOptions,
} from './config/index.js';
import { createClient, logger } from './api/index.js';

const VERSION = '0.1.0';

const INTERRUPT_NOTE = `
Note: jobs are started on the NAS and then watched. Interrupting this command
does not cancel a job that was already submitted; it keeps running on the NAS
and its outcome is not reported. Check the NAS job list before re-running.`;

/**
 * Create the command context from parsed options
 * Resolves settings, credentials and the API client
 */
async function createContext(cli: CliOptions): Promise<CommandContext> {
  const settingsPath = defaultSettingsPath();
  const settings = loadSettings(settingsPath);
  const options = resolveGlobalOptions(cli, process.env, settings);

  if (options.verbose) {
    logger.setConfig({ level: 'debug' });
    verboseLog(`Settings file: ${settingsPath}`, true);
  }

  const credentials = await resolveCredentials({
    user: options.user,
    settings,
    prompt: process.stdin.isTTY ? promptHidden : undefined,
  });

  const client = createClient({
    host: options.host,
    credentials,
    insecure: options.insecure,
    debug: options.verbose,
  });

  return {
    options,
    outputFormat: options.json ? 'json' : 'human',
    client,
    logger,
  };
}

/**
 * Run a command action and set the exit code from its result
 */
async function run<T>(
  name: string,
  execute: (ctx: CommandContext) => Promise<CommandResult<T>>
): Promise<void> {
  const cli = program.opts<CliOptions>();
  configureOutput(cli.json ? 'json' : 'human');

  try {
    const ctx = await createContext(cli);
    const result = await execute(ctx);
    if (ctx.outputFormat === 'json') {
      printResult(result);
    }
    process.exitCode = result.success ? 0 : 1;
  } catch (err) {
    error(`${name} failed: ${err instanceof Error ? err.message : String(err)}`);
    process.exitCode = 1;
  }
}

/**
 * Main CLI program
 */
const program = new Command()
  .name('nas-app-sync')
  .description('Deploy and update NAS apps from compose files and catalog exports')
  .version(VERSION)
  // Global options available to all commands
  .addOption(
    new Option('--host <host>', 'NAS hostname or IP')
      .env('NAS_HOST')
  )
  .addOption(
    new Option('--user <user>', 'User for password authentication (default: admin)')
      .env('NAS_USER')
  )
  .addOption(
    new Option('--compose-dir <dir>', 'Directory of compose files (one app per file)')
  )
  .addOption(
    new Option('--catalog-dir <dir>', 'Directory of catalog app exports')
  )
  .addOption(
    new Option('--dry-run', 'Show what would happen without making changes')
      .default(false)
  )
  .addOption(
    new Option('--json', 'Output JSON for CI/automation')
      .default(false)
  )
  .addOption(
    new Option('--insecure', 'Use plain http instead of https')
      .default(false)
  )
  .addOption(
    new Option('--poll-interval <ms>', 'Delay between job status polls in milliseconds')
  )
  .addOption(
    new Option('-v, --verbose', 'Enable verbose logging')
      .default(false)
  )
  .addHelpText('after', INTERRUPT_NOTE);

/**
 * sync command - Create or update apps (default)
 */
program
  .command('sync', { isDefault: true })
  .description('Create missing apps and update drifted ones')
  .addHelpText('after', INTERRUPT_NOTE)
  .action(async () => {
    await run('Sync', (ctx) => syncCommand(ctx));
  });

/**
 * diff command - Plan only
 */
program
  .command('diff')
  .description('Show what sync would change (same as sync --dry-run)')
  .option('--details', 'Show the drifted values for each app')
  .action(async (cmdOpts: { details?: boolean }) => {
    await run('Diff', (ctx) => diffCommand(ctx, { details: cmdOpts.details }));
  });

/**
 * status command - Docker service and installed apps
 */
program
  .command('status')
  .description('Show the docker service state and installed apps')
  .option('--problems', 'Only list apps that are not running')
  .action(async (cmdOpts: { problems?: boolean }) => {
    await run('Status', (ctx) => statusCommand(ctx, { all: !cmdOpts.problems }));
  });

program.parseAsync().catch((err: unknown) => {
  error(err instanceof Error ? err.message : String(err));
  process.exitCode = 1;
});

/**
 * Settings resolution for nas-app-sync
 *
 * Every option is resolved in the same order:
 *
 * 1. Command-line flag
 * 2. Environment variable
 * 3. ~/.nas-app-sync/settings.json
 * 4. Built-in default
 *
 * ## Environment Variables
 *
 * - NAS_HOST: NAS hostname or IP
 * - NAS_USER: user for password authentication (default: admin)
 * - NAS_API_KEY: API key; takes precedence over any password
 * - NAS_PASSWORD: password for NAS_USER
 * - NAS_POLL_INTERVAL_MS: delay between job polls
 * - NAS_INSECURE: "true" to use plain http
 * - NAS_SYNC_SETTINGS: alternate settings file path
 */

import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import { isRecord } from '../api/validate.js';
import { DEFAULT_POLL_INTERVAL_MS } from '../reconcilers/apps/jobs.js';
import type { GlobalOptions } from '../types.js';

export const DEFAULT_USER = 'admin';

/**
 * Contents of the settings file; every field is optional
 */
export interface Settings {
  host?: string;
  user?: string;
  apiKey?: string;
  pollIntervalMs?: number;
  insecure?: boolean;
}

/**
 * Options as given on the command line, before resolution
 */
export type CliOptions = {
  host?: string;
  user?: string;
  composeDir?: string;
  catalogDir?: string;
  dryRun?: boolean;
  json?: boolean;
  insecure?: boolean;
  pollInterval?: string;
  verbose?: boolean;
};

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

export function defaultSettingsPath(env: NodeJS.ProcessEnv = process.env): string {
  return env.NAS_SYNC_SETTINGS ?? path.join(os.homedir(), '.nas-app-sync', 'settings.json');
}

function nonEmpty(value: unknown): string | undefined {
  return typeof value === 'string' && value.trim().length > 0 ? value.trim() : undefined;
}

/**
 * Read the settings file
 *
 * A missing file yields empty settings. A file that exists but is not valid
 * JSON is an error, since silently ignoring it would hide a typo.
 *
 * @throws ConfigError if the file is unreadable or malformed
 */
export function loadSettings(settingsPath: string = defaultSettingsPath()): Settings {
  let raw: string;
  try {
    raw = fs.readFileSync(settingsPath, 'utf-8');
  } catch (err) {
    if (err instanceof Error && 'code' in err && err.code === 'ENOENT') {
      return {};
    }
    throw new ConfigError(`Cannot read settings file ${settingsPath}: ${err instanceof Error ? err.message : String(err)}`);
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (err) {
    throw new ConfigError(`Settings file ${settingsPath} is not valid JSON: ${err instanceof Error ? err.message : String(err)}`);
  }
  if (!isRecord(parsed)) {
    throw new ConfigError(`Settings file ${settingsPath} must contain a JSON object`);
  }

  return {
    host: nonEmpty(parsed.host),
    user: nonEmpty(parsed.user),
    apiKey: nonEmpty(parsed.apiKey),
    pollIntervalMs: typeof parsed.pollIntervalMs === 'number' ? parsed.pollIntervalMs : undefined,
    insecure: typeof parsed.insecure === 'boolean' ? parsed.insecure : undefined,
  };
}

/**
 * Parse a poll interval given as text
 *
 * @throws ConfigError unless it is a non-negative integer
 */
export function parsePollInterval(value: string, source: string): number {
  if (!/^\d+$/.test(value.trim())) {
    throw new ConfigError(`${source} must be a non-negative integer (milliseconds), got "${value}"`);
  }
  return Number(value.trim());
}

function parseBooleanEnv(value: string | undefined): boolean | undefined {
  if (value === undefined) return undefined;
  return ['1', 'true', 'yes'].includes(value.trim().toLowerCase());
}

/**
 * Resolve global options from flags, environment and settings
 *
 * @throws ConfigError when no host is configured or a value is invalid
 */
export function resolveGlobalOptions(
  cli: CliOptions,
  env: NodeJS.ProcessEnv = process.env,
  settings: Settings = {}
): GlobalOptions {
  const host = nonEmpty(cli.host) ?? nonEmpty(env.NAS_HOST) ?? settings.host;
  if (!host) {
    throw new ConfigError('No NAS host given: pass --host, set NAS_HOST, or add "host" to the settings file');
  }

  let pollIntervalMs = settings.pollIntervalMs ?? DEFAULT_POLL_INTERVAL_MS;
  if (cli.pollInterval !== undefined) {
    pollIntervalMs = parsePollInterval(cli.pollInterval, '--poll-interval');
  } else if (nonEmpty(env.NAS_POLL_INTERVAL_MS)) {
    pollIntervalMs = parsePollInterval(env.NAS_POLL_INTERVAL_MS ?? '', 'NAS_POLL_INTERVAL_MS');
  }

  return {
    host,
    user: nonEmpty(cli.user) ?? nonEmpty(env.NAS_USER) ?? settings.user ?? DEFAULT_USER,
    composeDir: nonEmpty(cli.composeDir),
    catalogDir: nonEmpty(cli.catalogDir),
    dryRun: cli.dryRun ?? false,
    json: cli.json ?? false,
    insecure: cli.insecure || parseBooleanEnv(env.NAS_INSECURE) || settings.insecure || false,
    pollIntervalMs,
    verbose: cli.verbose ?? false,
  };
}

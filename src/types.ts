/**
 * Shared types and interfaces for the nas-app-sync CLI
 */

import type { NasClient } from './api/client.js';
import type { ApiLogger } from './api/logger.js';

// ============================================================================
// Global Options and Context
// ============================================================================

/**
 * Global options available to all commands, after settings resolution
 */
export interface GlobalOptions {
  /** NAS hostname or IP (may include a port or scheme) */
  host: string;
  /** User for password authentication */
  user: string;
  /** Directory of compose files, one app per file */
  composeDir?: string;
  /** Directory of catalog app exports */
  catalogDir?: string;
  /** Don't apply changes, just show what would happen */
  dryRun: boolean;
  /** Output JSON for CI/automation */
  json: boolean;
  /** Talk plain http instead of https */
  insecure: boolean;
  /** Delay between job status polls */
  pollIntervalMs: number;
  /** Enable verbose logging */
  verbose: boolean;
}

/**
 * Output format for command results
 */
export type OutputFormat = 'human' | 'json';

/**
 * Everything a command needs; passed explicitly, never held globally
 */
export interface CommandContext {
  options: GlobalOptions;
  outputFormat: OutputFormat;
  client: NasClient;
  logger: ApiLogger;
}

/**
 * Result of a command execution
 */
export interface CommandResult<T = unknown> {
  success: boolean;
  message: string;
  data?: T;
  errors?: string[];
}

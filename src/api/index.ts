/**
 * NAS API client module
 *
 * Provides:
 * - NasClient with apps, jobs and docker sub-clients
 * - Retry logic with exponential backoff
 * - JSON logging with secret redaction
 * - Type definitions for API entities
 */

// Main client
export { createClient, buildBaseUrl, buildAuthorization } from './client.js';

export type {
  NasClient,
  AppsClient,
  JobsClient,
  DockerClient,
} from './client.js';

// Retry utilities
export {
  withRetry,
  ApiRequestError,
  calculateDelay,
  isRetryableError,
  parseRetryAfter,
  resolveRetryPolicy,
  sleep,
  DEFAULT_RETRY_CONFIG,
} from './retry.js';

export type { RetryOptions, RetryPolicy } from './retry.js';

// Logger utilities
export {
  logger,
  ApiLogger,
  parseLogLevel,
  redactString,
  redactPatterns,
  redactObject,
  redactValue,
  redactHeaders,
} from './logger.js';

export type { LogLevel, LogEntry, LoggerConfig } from './logger.js';

// Types
export type {
  HttpMethod,
  JsonValue,
  JsonObject,
  App,
  CreateAppRequest,
  CreateComposeAppRequest,
  CreateCatalogAppRequest,
  UpdateAppRequest,
  Job,
  JobProgress,
  JobState,
  TerminalJobState,
  DockerStatus,
  NasCredentials,
  NasClientConfig,
  RetryConfig,
  RetryResult,
} from './types.js';

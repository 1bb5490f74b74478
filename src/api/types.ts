/**
 * Type definitions for the NAS middleware REST API
 *
 * Only the slice of the API the reconciler consumes is modelled here:
 * apps, their configuration, jobs and the docker service status.
 */

// =============================================================================
// Common Types
// =============================================================================

/**
 * HTTP methods supported by the API
 */
export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'DELETE';

/**
 * JSON value as accepted and returned by the middleware
 */
export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

/**
 * JSON object
 */
export type JsonObject = { [key: string]: JsonValue };

// =============================================================================
// App Types
// =============================================================================

/**
 * An installed app as reported by `GET /app`
 */
export interface App {
  /** App name (unique on the host) */
  name: string;
  /** Identifier used by `PUT /app/id/{id}`; equal to the name on current releases */
  id: string;
  /** Runtime state (RUNNING, STOPPED, DEPLOYING, CRASHED, ...) */
  state?: string;
  /** Whether the app was installed from a compose file rather than the catalog */
  custom_app?: boolean;
  /** Installed catalog app version */
  version?: string;
  /** Catalog metadata for catalog apps */
  metadata?: Record<string, unknown>;
}

/**
 * Payload for `POST /app` when installing a custom (compose) app
 */
export interface CreateComposeAppRequest {
  app_name: string;
  custom_app: true;
  custom_compose_config: JsonObject;
}

/**
 * Payload for `POST /app` when installing an app from the catalog
 */
export interface CreateCatalogAppRequest {
  app_name: string;
  catalog_app: string;
  train: string;
  version: string;
  values: JsonObject;
}

/**
 * Payload for `POST /app`
 */
export type CreateAppRequest = CreateComposeAppRequest | CreateCatalogAppRequest;

/**
 * Payload for `PUT /app/id/{id}`
 */
export type UpdateAppRequest =
  | { custom_compose_config: JsonObject }
  | { values: JsonObject };

// =============================================================================
// Job Types
// =============================================================================

/**
 * Job states reported by the middleware
 */
export type JobState = 'WAITING' | 'RUNNING' | 'SUCCESS' | 'FAILED' | 'ABORTED';

/**
 * Terminal job states
 */
export type TerminalJobState = Extract<JobState, 'SUCCESS' | 'FAILED' | 'ABORTED'>;

/**
 * Job progress block
 */
export interface JobProgress {
  percent: number | null;
  description: string | null;
  extra?: unknown;
}

/**
 * A job as returned by `GET /core/get_jobs`
 */
export interface Job {
  id: number;
  method?: string;
  /** Reported state; kept as a string since the middleware may add states */
  state: string;
  progress?: JobProgress | null;
  result?: unknown;
  error?: string | null;
  exception?: string | null;
  logs_excerpt?: string | null;
  result_encoding_error?: string | null;
  time_started?: unknown;
  time_finished?: unknown;
}

// =============================================================================
// Docker Service Types
// =============================================================================

/**
 * Docker service status from `GET /docker/status`
 */
export interface DockerStatus {
  /** RUNNING, UNCONFIGURED, FAILED, STOPPED, INITIALIZING, ... */
  status: string;
  description?: string | null;
}

// =============================================================================
// Client Configuration Types
// =============================================================================

/**
 * Credentials accepted by the client
 */
export type NasCredentials =
  | { kind: 'apiKey'; apiKey: string }
  | { kind: 'password'; user: string; password: string };

/**
 * Client configuration
 */
export interface NasClientConfig {
  /** Hostname or IP of the NAS (may include a port) */
  host: string;
  /** Credentials used for every request */
  credentials: NasCredentials;
  /** Use plain http instead of https */
  insecure?: boolean;
  /** Request timeout in milliseconds (default: 30000) */
  timeout?: number;
  /** Enable debug logging */
  debug?: boolean;
  /** Retry configuration for transient failures */
  retry?: RetryConfig;
}

/**
 * Retry configuration
 */
export interface RetryConfig {
  /** Maximum number of retry attempts (default: 3) */
  maxRetries?: number;
  /** Base delay in milliseconds (default: 1000) */
  baseDelayMs?: number;
  /** Maximum delay in milliseconds (default: 30000) */
  maxDelayMs?: number;
  /** Jitter factor (0-1) to add randomness (default: 0.1) */
  jitterFactor?: number;
  /** HTTP status codes to retry on (default: [429, 500, 502, 503, 504]) */
  retryableStatuses?: number[];
}

/**
 * Result of a retry operation
 */
export type RetryResult<T> =
  | {
      success: true;
      /** The result data */
      data: T;
      /** Number of attempts made */
      attempts: number;
      /** Total time spent on retries (ms) */
      totalTimeMs: number;
    }
  | {
      success: false;
      /** The last error seen */
      error: Error;
      attempts: number;
      totalTimeMs: number;
    };

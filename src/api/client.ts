/**
 * NAS API Client
 *
 * Provides a typed interface to the middleware's REST transport with:
 * - Retry with exponential backoff for idempotent reads
 * - Rate limit handling (429 status)
 * - JSON logging with secret redaction
 * - API key (Bearer) or username/password (Basic) authentication
 */

import type {
  App,
  CreateAppRequest,
  UpdateAppRequest,
  Job,
  DockerStatus,
  JsonObject,
  NasClientConfig,
  NasCredentials,
  HttpMethod,
} from './types.js';
import { withRetry, ApiRequestError, parseRetryAfter, resolveRetryPolicy } from './retry.js';
import { logger, ApiLogger } from './logger.js';
import {
  isRecord,
  parseAppList,
  parseAppConfig,
  parseJobId,
  parseJob,
  parseDockerStatus,
} from './validate.js';

// =============================================================================
// Types
// =============================================================================

/**
 * Apps sub-client
 */
export interface AppsClient {
  list(): Promise<App[]>;
  /** Current user-facing configuration (compose config or catalog values) */
  config(name: string): Promise<JsonObject>;
  /** Install an app; resolves to the id of the install job */
  create(request: CreateAppRequest): Promise<number>;
  /** Reconfigure an app; resolves to the id of the update job */
  update(id: string, request: UpdateAppRequest): Promise<number>;
}

/**
 * Jobs sub-client
 */
export interface JobsClient {
  get(jobId: number): Promise<Job>;
}

/**
 * Docker service sub-client
 */
export interface DockerClient {
  status(): Promise<DockerStatus>;
}

/**
 * Main NAS client interface
 */
export interface NasClient {
  readonly apps: AppsClient;
  readonly jobs: JobsClient;
  readonly docker: DockerClient;

  /** Get current configuration (without secrets) */
  getConfig(): { baseUrl: string; user?: string; authMethod: NasCredentials['kind'] };
}

// =============================================================================
// Helpers
// =============================================================================

/**
 * Build the REST base URL for a host
 */
export function buildBaseUrl(host: string, insecure = false): string {
  const trimmed = host.replace(/\/+$/, '');
  if (/^https?:\/\//.test(trimmed)) {
    return `${trimmed}/api/v2.0`;
  }
  return `${insecure ? 'http' : 'https'}://${trimmed}/api/v2.0`;
}

/**
 * Build the Authorization header value for a set of credentials
 */
export function buildAuthorization(credentials: NasCredentials): string {
  if (credentials.kind === 'apiKey') {
    return `Bearer ${credentials.apiKey}`;
  }
  const token = Buffer.from(`${credentials.user}:${credentials.password}`, 'utf-8').toString('base64');
  return `Basic ${token}`;
}

function extractErrorMessage(body: unknown, fallback: string): string {
  if (isRecord(body)) {
    for (const key of ['message', 'detail', 'error']) {
      const value = body[key];
      if (typeof value === 'string' && value.length > 0) {
        return value;
      }
    }
  }
  return fallback;
}

// =============================================================================
// Client Implementation
// =============================================================================

/**
 * Create a NAS API client with retry and logging
 */
export function createClient(config: NasClientConfig): NasClient {
  const baseUrl = buildBaseUrl(config.host, config.insecure);
  const timeout = config.timeout ?? 30000;
  const log = config.debug ? logger : new ApiLogger({ level: 'warn' });
  const retry = resolveRetryPolicy(config.retry);

  const defaultHeaders: Record<string, string> = {
    'Content-Type': 'application/json',
    Accept: 'application/json',
    Authorization: buildAuthorization(config.credentials),
  };

  /**
   * Make an API request; reads retry transient failures, writes never do
   * since a retried write could start a second job.
   */
  async function request(
    method: HttpMethod,
    path: string,
    options: {
      params?: Record<string, string | number | boolean | undefined>;
      body?: unknown;
      skipRetry?: boolean;
    } = {}
  ): Promise<unknown> {
    const url = new URL(`${baseUrl}${path}`);
    if (options.params) {
      for (const [key, value] of Object.entries(options.params)) {
        if (value !== undefined) {
          url.searchParams.set(key, String(value));
        }
      }
    }

    log.request(method, url.toString(), { headers: defaultHeaders, body: options.body });

    const makeRequest = async (): Promise<unknown> => {
      const controller = new AbortController();
      const timeoutId = setTimeout(() => controller.abort(), timeout);

      try {
        const startTime = Date.now();
        const response = await fetch(url.toString(), {
          method,
          headers: defaultHeaders,
          body: options.body !== undefined ? JSON.stringify(options.body) : undefined,
          signal: controller.signal,
        });

        log.response(response.status, url.toString(), { durationMs: Date.now() - startTime });

        const text = await response.text();
        let parsed: unknown = undefined;
        if (text.length > 0) {
          try {
            parsed = JSON.parse(text);
          } catch {
            parsed = text;
          }
        }

        if (!response.ok) {
          const fallback =
            typeof parsed === 'string' && parsed.length > 0
              ? parsed.substring(0, 200)
              : `NAS API error (${response.status})`;
          throw new ApiRequestError(extractErrorMessage(parsed, fallback), response.status, {
            details: isRecord(parsed) ? parsed : undefined,
            retryAfter: parseRetryAfter(response.headers.get('Retry-After')),
          });
        }

        return parsed;
      } finally {
        clearTimeout(timeoutId);
      }
    };

    if (options.skipRetry) {
      return makeRequest();
    }

    const result = await withRetry(makeRequest, { ...retry, logger: log });

    if (!result.success) {
      throw result.error;
    }

    return result.data;
  }

  // ---------------------------------------------------------------------------
  // Apps Client
  // ---------------------------------------------------------------------------

  const apps: AppsClient = {
    async list(): Promise<App[]> {
      return parseAppList(await request('GET', '/app'));
    },

    async config(name: string): Promise<JsonObject> {
      return parseAppConfig(name, await request('POST', '/app/config', { body: name }));
    },

    async create(req: CreateAppRequest): Promise<number> {
      return parseJobId(await request('POST', '/app', { body: req, skipRetry: true }));
    },

    async update(id: string, req: UpdateAppRequest): Promise<number> {
      return parseJobId(
        await request('PUT', `/app/id/${encodeURIComponent(id)}`, { body: req, skipRetry: true })
      );
    },
  };

  // ---------------------------------------------------------------------------
  // Jobs Client
  // ---------------------------------------------------------------------------

  const jobs: JobsClient = {
    async get(jobId: number): Promise<Job> {
      const body = await request('GET', '/core/get_jobs', { params: { id: jobId } });
      const entries = Array.isArray(body) ? body : [body];
      const match = entries.find((entry) => isRecord(entry) && entry.id === jobId);
      if (match === undefined) {
        throw new ApiRequestError(`Job ${jobId} not found`, 404, { code: 'JOB_NOT_FOUND' });
      }
      return parseJob(match);
    },
  };

  // ---------------------------------------------------------------------------
  // Docker Client
  // ---------------------------------------------------------------------------

  const docker: DockerClient = {
    async status(): Promise<DockerStatus> {
      return parseDockerStatus(await request('GET', '/docker/status'));
    },
  };

  return {
    apps,
    jobs,
    docker,

    getConfig() {
      return {
        baseUrl,
        user: config.credentials.kind === 'password' ? config.credentials.user : undefined,
        authMethod: config.credentials.kind,
      };
    },
  };
}

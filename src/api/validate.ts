/**
 * Response validation for the NAS API client
 *
 * The middleware returns loosely-typed JSON; these guards turn it into the
 * entities in ./types.ts or fail with an ApiRequestError naming the field.
 */

import type { App, DockerStatus, Job, JobProgress, JsonObject, JsonValue } from './types.js';
import { ApiRequestError } from './retry.js';

/** Status used for responses that parsed but had the wrong shape */
const MALFORMED_RESPONSE_STATUS = 502;

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function isJsonValue(value: unknown): value is JsonValue {
  if (value === null) return true;
  switch (typeof value) {
    case 'string':
    case 'boolean':
      return true;
    case 'number':
      return Number.isFinite(value);
    case 'object':
      if (Array.isArray(value)) {
        return value.every(isJsonValue);
      }
      return Object.values(value).every(isJsonValue);
    default:
      return false;
  }
}

export function isJsonObject(value: unknown): value is JsonObject {
  return isRecord(value) && isJsonValue(value);
}

function malformed(what: string, details?: Record<string, unknown>): ApiRequestError {
  return new ApiRequestError(`Malformed API response: ${what}`, MALFORMED_RESPONSE_STATUS, {
    code: 'MALFORMED_RESPONSE',
    details,
  });
}

function optionalString(value: unknown): string | undefined {
  return typeof value === 'string' ? value : undefined;
}

function nullableString(value: unknown): string | null {
  return typeof value === 'string' ? value : null;
}

export function parseApp(value: unknown): App {
  if (!isRecord(value) || typeof value.name !== 'string') {
    throw malformed('app entry without a name');
  }
  const id = typeof value.id === 'string' || typeof value.id === 'number' ? String(value.id) : value.name;
  return {
    name: value.name,
    id,
    state: optionalString(value.state),
    custom_app: typeof value.custom_app === 'boolean' ? value.custom_app : undefined,
    version: optionalString(value.version),
    metadata: isRecord(value.metadata) ? value.metadata : undefined,
  };
}

export function parseAppList(value: unknown): App[] {
  if (!Array.isArray(value)) {
    throw malformed('expected a list of apps');
  }
  return value.map(parseApp);
}

export function parseAppConfig(name: string, value: unknown): JsonObject {
  if (!isJsonObject(value)) {
    throw malformed(`config of app "${name}" is not an object`, { app: name });
  }
  return value;
}

/**
 * Mutating app calls answer with the id of the job they started
 */
export function parseJobId(value: unknown): number {
  if (typeof value === 'number' && Number.isInteger(value)) {
    return value;
  }
  if (typeof value === 'string' && /^\d+$/.test(value)) {
    return Number(value);
  }
  throw malformed('expected a job id');
}

function parseProgress(value: unknown): JobProgress | null {
  if (!isRecord(value)) return null;
  return {
    percent: typeof value.percent === 'number' ? value.percent : null,
    description: nullableString(value.description),
    extra: value.extra,
  };
}

export function parseJob(value: unknown): Job {
  if (!isRecord(value) || typeof value.id !== 'number' || typeof value.state !== 'string') {
    throw malformed('job entry without id or state');
  }
  return {
    id: value.id,
    method: optionalString(value.method),
    state: value.state,
    progress: parseProgress(value.progress),
    result: value.result,
    error: nullableString(value.error),
    exception: nullableString(value.exception),
    logs_excerpt: nullableString(value.logs_excerpt),
    result_encoding_error: nullableString(value.result_encoding_error),
    time_started: value.time_started,
    time_finished: value.time_finished,
  };
}

export function parseDockerStatus(value: unknown): DockerStatus {
  if (!isRecord(value) || typeof value.status !== 'string') {
    throw malformed('docker status without a status field');
  }
  return {
    status: value.status,
    description: nullableString(value.description),
  };
}

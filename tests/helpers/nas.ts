/**
 * In-process NAS client fakes shared by the unit tests
 */

import { vi } from 'vitest';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import type { AppsClient, DockerClient, JobsClient, NasClient } from '../../src/api/client.js';
import type { App, Job, JsonObject } from '../../src/api/types.js';
import type { AppDefinition } from '../../src/definitions/types.js';
import { toConfigMapping } from '../../src/definitions/value.js';
import type { RemoteApp } from '../../src/reconcilers/apps/types.js';

// =============================================================================
// Client
// =============================================================================

export interface MockClientOverrides {
  apps?: Partial<AppsClient>;
  jobs?: Partial<JobsClient>;
  docker?: Partial<DockerClient>;
}

/**
 * NAS client whose every method is a vi.fn
 *
 * Defaults: no apps installed, docker RUNNING, every job succeeds at once.
 */
export function createMockClient(overrides: MockClientOverrides = {}) {
  const apps = {
    list: vi.fn<AppsClient['list']>().mockResolvedValue([]),
    config: vi.fn<AppsClient['config']>().mockRejectedValue(new Error('no such app')),
    create: vi.fn<AppsClient['create']>().mockResolvedValue(1),
    update: vi.fn<AppsClient['update']>().mockResolvedValue(1),
  };
  const jobs = {
    get: vi.fn<JobsClient['get']>().mockImplementation(async (id) => job(id, 'SUCCESS', 100, 'done')),
  };
  const docker = {
    status: vi.fn<DockerClient['status']>().mockResolvedValue({ status: 'RUNNING', description: null }),
  };

  const client = {
    apps: { ...apps, ...overrides.apps },
    jobs: { ...jobs, ...overrides.jobs },
    docker: { ...docker, ...overrides.docker },
    getConfig: () => ({ baseUrl: 'https://nas.test/api/v2.0', authMethod: 'apiKey' as const }),
  } satisfies NasClient;

  return client;
}

/**
 * Overrides serving the given installed apps and their configs
 */
export function installedApps(configs: Record<string, JsonObject>): Partial<AppsClient> {
  const list: App[] = Object.keys(configs).map((name) => ({
    name,
    id: name,
    state: 'RUNNING',
    custom_app: true,
  }));
  return {
    list: vi.fn<AppsClient['list']>().mockResolvedValue(list),
    config: vi.fn<AppsClient['config']>().mockImplementation(async (name) => {
      const config = configs[name];
      if (config === undefined) {
        throw new Error(`no such app ${name}`);
      }
      return config;
    }),
  };
}

export function job(id: number, state: string, percent: number | null, description: string | null): Job {
  return { id, state, progress: { percent, description } };
}

// =============================================================================
// Definitions
// =============================================================================

export function composeDefinition(name: string, config: JsonObject): AppDefinition {
  return {
    name,
    sourceKind: 'compose',
    config: toConfigMapping(config),
    originPath: `/defs/compose/${name}.yaml`,
  };
}

export function catalogDefinition(name: string, catalogApp: string, values: JsonObject): AppDefinition {
  return {
    name,
    sourceKind: 'catalog',
    config: toConfigMapping(values),
    originPath: `/defs/catalog/${name}.yaml`,
    catalog: { catalogApp, train: 'stable', version: '1.0.0' },
  };
}

export function remoteApp(name: string, config: JsonObject): RemoteApp {
  return {
    name,
    id: name,
    configSnapshot: toConfigMapping(config),
    state: 'RUNNING',
    customApp: true,
  };
}

// =============================================================================
// Filesystem
// =============================================================================

export async function createTempDir(): Promise<string> {
  return mkdtemp(join(tmpdir(), 'nas-app-sync-test-'));
}

export async function cleanupTempDir(dir: string): Promise<void> {
  await rm(dir, { recursive: true, force: true });
}

export async function writeFiles(dir: string, files: Record<string, string>): Promise<void> {
  for (const [name, content] of Object.entries(files)) {
    await writeFile(join(dir, name), content, 'utf-8');
  }
}

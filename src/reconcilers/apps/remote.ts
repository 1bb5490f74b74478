/**
 * Remote state fetching
 *
 * Builds a read-only snapshot of the apps installed on the NAS. The snapshot
 * is taken once per run and never mutated; any failure aborts the run since
 * nothing can be classified without it.
 */

import type { NasClient } from '../../api/client.js';
import type { App, DockerStatus } from '../../api/types.js';
import { logger as defaultLogger, type ApiLogger } from '../../api/logger.js';
import type { ConfigMapping } from '../../definitions/types.js';
import { toConfigMapping } from '../../definitions/value.js';
import { FetchError, errorMessage } from './errors.js';
import type { RemoteApp, RemoteInventory } from './types.js';

/** The only docker service state apps can be deployed in */
export const DOCKER_READY_STATE = 'RUNNING';

export interface FetchOptions {
  logger?: ApiLogger;
}

/**
 * Verify the container service is ready to run apps
 *
 * @throws FetchError (SERVICE_UNAVAILABLE) when it is unconfigured or not running
 */
export async function checkDockerService(client: NasClient): Promise<DockerStatus> {
  let status: DockerStatus;
  try {
    status = await client.docker.status();
  } catch (err) {
    throw new FetchError(`Could not read docker service status: ${errorMessage(err)}`, 'FETCH_FAILED', undefined, err);
  }

  if (status.status === DOCKER_READY_STATE) {
    return status;
  }

  const hint =
    status.status === 'UNCONFIGURED'
      ? 'Docker is not configured on the NAS; choose a pool for apps first'
      : `Docker service is ${status.status}`;
  throw new FetchError(
    status.description ? `${hint}: ${status.description}` : hint,
    'SERVICE_UNAVAILABLE',
    { status: status.status }
  );
}

/**
 * Fetch every installed app together with its current configuration
 *
 * @returns Apps keyed by name, in the order the platform listed them
 * @throws FetchError if the listing or any app's configuration cannot be read
 */
export async function fetchRemoteApps(
  client: NasClient,
  options: FetchOptions = {}
): Promise<RemoteInventory> {
  const log = (options.logger ?? defaultLogger).child({ component: 'remote' });

  let apps: App[];
  try {
    apps = await client.apps.list();
  } catch (err) {
    throw new FetchError(`Failed to list installed apps: ${errorMessage(err)}`, 'FETCH_FAILED', undefined, err);
  }

  const inventory = new Map<string, RemoteApp>();
  for (const app of apps) {
    let configSnapshot: ConfigMapping;
    try {
      configSnapshot = toConfigMapping(await client.apps.config(app.name), `config of ${app.name}`);
    } catch (err) {
      throw new FetchError(
        `Failed to read configuration of app "${app.name}": ${errorMessage(err)}`,
        'FETCH_FAILED',
        { app: app.name },
        err
      );
    }

    const remote: RemoteApp = {
      name: app.name,
      id: app.id,
      configSnapshot,
      state: app.state,
      customApp: app.custom_app ?? false,
      version: app.version,
    };
    inventory.set(app.name, Object.freeze(remote));
  }

  log.debug('Fetched remote inventory', { apps: inventory.size });
  return inventory;
}

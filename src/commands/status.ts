/**
 * status command - Show the docker service state and the installed apps
 */

import type { CommandContext, CommandResult } from '../types.js';
import type { DockerStatus } from '../api/types.js';
import { header, info, printTable, verbose, warn, error as printError } from '../utils/output.js';
import { DOCKER_READY_STATE } from '../reconcilers/apps/remote.js';
import { errorMessage } from '../reconcilers/apps/errors.js';

export interface StatusOptions {
  /** Also list apps whose state is RUNNING */
  all?: boolean;
}

export interface AppStatusEntry {
  name: string;
  state: string;
  type: 'compose' | 'catalog';
  version?: string;
}

export interface StatusResult {
  docker: DockerStatus;
  apps: AppStatusEntry[];
}

/**
 * Execute the status command
 */
export async function statusCommand(
  ctx: CommandContext,
  options: StatusOptions = { all: true }
): Promise<CommandResult<StatusResult>> {
  const { options: globalOpts, outputFormat, client } = ctx;

  verbose(`Executing status command`, globalOpts.verbose);

  let docker: DockerStatus;
  let apps: AppStatusEntry[];
  try {
    docker = await client.docker.status();
    apps = (await client.apps.list()).map((app) => ({
      name: app.name,
      state: app.state ?? 'UNKNOWN',
      type: app.custom_app ? 'compose' : 'catalog',
      version: app.version,
    }));
  } catch (err) {
    const message = `Failed to read NAS status: ${errorMessage(err)}`;
    printError(message);
    return { success: false, message, errors: [message] };
  }

  const shown = options.all === false ? apps.filter((app) => app.state !== 'RUNNING') : apps;

  if (outputFormat === 'human') {
    header('NAS Status');
    if (docker.status === DOCKER_READY_STATE) {
      info(`Docker service: ${docker.status}`);
    } else {
      warn(`Docker service: ${docker.status}${docker.description ? ` (${docker.description})` : ''}`);
    }

    if (shown.length === 0) {
      info(options.all === false ? 'All apps are running' : 'No apps installed');
    } else {
      printTable(
        ['NAME', 'STATE', 'TYPE', 'VERSION'],
        shown.map((app) => [app.name, app.state, app.type, app.version ?? '-'])
      );
    }
  }

  return {
    success: true,
    message: `${apps.length} app(s) installed, docker ${docker.status}`,
    data: { docker, apps: shown },
  };
}

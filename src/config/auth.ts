/**
 * Credential resolution for nas-app-sync
 *
 * ## Resolution Order
 *
 * 1. NAS_API_KEY environment variable (Bearer auth)
 * 2. apiKey from the settings file
 * 3. NAS_PASSWORD environment variable (Basic auth as the resolved user)
 * 4. Interactive prompt, when stdin is a terminal
 *
 * Credentials are never logged.
 */

import * as readline from 'node:readline';
import { Writable } from 'node:stream';
import type { NasCredentials } from '../api/types.js';
import type { Settings } from './settings.js';
import { ConfigError } from './settings.js';

/**
 * Asks the user for a secret; resolves to the entered text
 */
export type SecretPrompt = (question: string) => Promise<string>;

export interface ResolveCredentialsOptions {
  user: string;
  env?: NodeJS.ProcessEnv;
  settings?: Settings;
  /** Omit to fail instead of prompting */
  prompt?: SecretPrompt;
}

/**
 * Prompt on the terminal without echoing what is typed
 */
export function promptHidden(question: string): Promise<string> {
  let muted = false;
  const output = new Writable({
    write(chunk: Buffer | string, _encoding, callback) {
      if (!muted) {
        process.stderr.write(chunk);
      }
      callback();
    },
  });

  const rl = readline.createInterface({ input: process.stdin, output, terminal: true });

  return new Promise((resolve) => {
    rl.question(question, (answer) => {
      rl.close();
      process.stderr.write('\n');
      resolve(answer);
    });
    muted = true;
  });
}

/**
 * Resolve credentials for the NAS
 *
 * @throws ConfigError if nothing is configured and no prompt is available
 */
export async function resolveCredentials(options: ResolveCredentialsOptions): Promise<NasCredentials> {
  const env = options.env ?? process.env;

  const apiKey = env.NAS_API_KEY?.trim() || options.settings?.apiKey;
  if (apiKey) {
    return { kind: 'apiKey', apiKey };
  }

  const password = env.NAS_PASSWORD;
  if (password) {
    return { kind: 'password', user: options.user, password };
  }

  if (!options.prompt) {
    throw new ConfigError('No credentials: set NAS_API_KEY or NAS_PASSWORD, or run interactively');
  }

  const entered = await options.prompt(`Password for ${options.user}: `);
  if (entered.length === 0) {
    throw new ConfigError('No password entered');
  }
  return { kind: 'password', user: options.user, password: entered };
}

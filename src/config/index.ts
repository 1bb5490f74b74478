/**
 * Configuration module exports
 */

export {
  loadSettings,
  resolveGlobalOptions,
  parsePollInterval,
  defaultSettingsPath,
  ConfigError,
  DEFAULT_USER,
  type Settings,
  type CliOptions,
} from './settings.js';

export {
  resolveCredentials,
  promptHidden,
  type SecretPrompt,
  type ResolveCredentialsOptions,
} from './auth.js';

/**
 * Command exports
 */

export { diffCommand, type DiffOptions } from './diff.js';
export { syncCommand, type SyncOptions } from './sync.js';
export { statusCommand, type StatusOptions, type StatusResult, type AppStatusEntry } from './status.js';
